/**
 * RisPort70 facade — real-time device registration status over SOAP at
 * `/realtimeservice2/services/RISService70`.
 */

import { ApiFacade } from "./api-facade";
import { SoapTransport } from "./soap-transport";
import type { Transport } from "./transport";
import type { SchemaIndex } from "../schemas/schema-index";
import { getIndex } from "../schemas/schema-registry";
import { getClientConfig } from "../utils/config";
import { generateProperUrl, joinUrl } from "../utils/url";

export const RISPORT_PATH = "realtimeservice2/services/RISService70";
export const RISPORT_VERSION = "70";

export interface RisPortClientOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  index: SchemaIndex;
  apiVersion?: string;
  timeoutMs?: number;
  transport?: Transport;
}

export class RisPortClient extends ApiFacade {
  constructor(options: RisPortClientOptions) {
    super(
      {
        index: options.index,
        apiVersion: options.apiVersion ?? RISPORT_VERSION,
        transport:
          options.transport ??
          new SoapTransport({
            url: joinUrl(generateProperUrl(options.host, options.port ?? 8443), RISPORT_PATH),
            credentials: { username: options.username, password: options.password },
            index: options.index,
            timeoutMs: options.timeoutMs ?? getClientConfig().timeoutMs,
          }),
      },
      "risport"
    );
  }

  static async connect(overrides: Partial<RisPortClientOptions> = {}): Promise<RisPortClient> {
    const config = getClientConfig();
    const apiVersion = overrides.apiVersion ?? RISPORT_VERSION;
    return new RisPortClient({
      host: overrides.host ?? config.host,
      port: overrides.port ?? config.port,
      username: overrides.username ?? config.username,
      password: overrides.password ?? config.password,
      apiVersion,
      index: overrides.index ?? (await getIndex("risport", apiVersion, config.schemaDir)),
      timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
      transport: overrides.transport,
    });
  }
}
