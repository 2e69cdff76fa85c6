/**
 * Transport collaborator — executes one verified operation against a
 * server and returns the raw response tree for the normalizer.
 *
 * Implementations classify their failures as TransportError subclasses;
 * the facade attaches call context before re-throwing them.
 */

import type { RequestPayload } from "../schemas/field-spec";
import {
  AuthenticationError,
  ConnectionError,
  TimeoutError,
} from "../utils/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export interface Transport {
  send(operation: string, apiVersion: string, payload: RequestPayload): Promise<unknown>;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface HttpRequest {
  url: string;
  method: "GET" | "POST" | "PUT" | "DELETE";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
  credentials?: Credentials;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  contentType: string;
  body: string;
}

// ── HTTP ────────────────────────────────────────────────────────────────────

export function basicAuthHeader({ username, password }: Credentials): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

/**
 * fetch with a timeout. Network failures become ConnectionError, an
 * expired timeout TimeoutError, and HTTP 401 AuthenticationError; every
 * other status is returned to the caller.
 */
export async function httpRequest(request: HttpRequest): Promise<HttpResponse> {
  const headers: Record<string, string> = { ...request.headers };
  if (request.credentials) headers["Authorization"] = basicAuthHeader(request.credentials);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers,
      body: request.body,
      signal: controller.signal,
    });
    const body = await response.text();

    if (response.status === 401) {
      throw new AuthenticationError(request.url, request.credentials?.username ?? "");
    }
    return {
      status: response.status,
      statusText: response.statusText,
      contentType: response.headers.get("content-type") ?? "",
      body,
    };
  } catch (error) {
    if (error instanceof AuthenticationError) throw error;
    if (controller.signal.aborted) throw new TimeoutError(request.url, request.timeoutMs);
    throw new ConnectionError(request.url, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}
