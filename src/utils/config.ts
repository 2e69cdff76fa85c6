/**
 * Client configuration derived from the environment (and `.env`).
 *
 * The configuration is cached after the first call; tests that change
 * `process.env` call resetClientConfig() afterwards.
 */

import * as dotenv from "dotenv";

dotenv.config();

export interface ClientConfig {
  /** CUCM publisher host (CUCM_HOST) */
  host: string;
  /** AXL / RisPort HTTPS port (CUCM_PORT, default 8443) */
  port: number;
  username: string;
  password: string;
  /** Pin the AXL schema version instead of asking the server (CUCM_API_VERSION) */
  apiVersion?: string;
  /** Unity Connection host for CUPI (UNITY_HOST, defaults to CUCM_HOST) */
  unityHost: string;
  /** Root of the `<backend>/<version>/` schema tree (CUCM_SCHEMA_DIR) */
  schemaDir: string;
  timeoutMs: number;
}

let cachedConfig: ClientConfig | null = null;

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function parsePositiveInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${key} must be a positive integer (got '${raw}')`);
  }
  return value;
}

export function getClientConfig(): ClientConfig {
  if (cachedConfig) return cachedConfig;

  const host = getEnvOrDefault("CUCM_HOST", "");
  cachedConfig = {
    host,
    port: parsePositiveInt("CUCM_PORT", 8443),
    username: getEnvOrDefault("CUCM_USERNAME", ""),
    password: getEnvOrDefault("CUCM_PASSWORD", ""),
    apiVersion: process.env.CUCM_API_VERSION || undefined,
    unityHost: getEnvOrDefault("UNITY_HOST", host),
    schemaDir: getEnvOrDefault("CUCM_SCHEMA_DIR", "schemas"),
    timeoutMs: parsePositiveInt("CUCM_TIMEOUT_MS", 30_000),
  };
  return cachedConfig;
}

export function resetClientConfig(): void {
  cachedConfig = null;
}
