/**
 * CUPI facade — Unity Connection provisioning REST API under `/vmrest/`.
 * Operations and their HTTP bindings come from a JSON description.
 */

import { ApiFacade } from "./api-facade";
import { RestTransport } from "./rest-transport";
import type { Transport } from "./transport";
import { SchemaIndex, listSchemaVersions } from "../schemas/schema-index";
import { getIndex } from "../schemas/schema-registry";
import { getClientConfig } from "../utils/config";
import { SchemaParseError } from "../utils/errors";
import { generateProperUrl, joinUrl } from "../utils/url";

export interface CupiClientOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  apiVersion: string;
  index: SchemaIndex;
  timeoutMs?: number;
  transport?: Transport;
}

export class CupiClient extends ApiFacade {
  constructor(options: CupiClientOptions) {
    super(
      {
        index: options.index,
        apiVersion: options.apiVersion,
        transport:
          options.transport ??
          new RestTransport({
            baseUrl: joinUrl(generateProperUrl(options.host, options.port), "vmrest"),
            credentials: { username: options.username, password: options.password },
            index: options.index,
            timeoutMs: options.timeoutMs ?? getClientConfig().timeoutMs,
          }),
      },
      "cupi"
    );
  }

  /** Uses UNITY_HOST and the newest CUPI description unless told otherwise. */
  static async connect(overrides: Partial<CupiClientOptions> = {}): Promise<CupiClient> {
    const config = getClientConfig();
    const apiVersion = overrides.apiVersion ?? listSchemaVersions("cupi", config.schemaDir).pop();
    if (!apiVersion) {
      throw new SchemaParseError(config.schemaDir, "no CUPI description versions found");
    }
    return new CupiClient({
      host: overrides.host ?? config.unityHost,
      port: overrides.port,
      username: overrides.username ?? config.username,
      password: overrides.password ?? config.password,
      apiVersion,
      index: overrides.index ?? (await getIndex("cupi", apiVersion, config.schemaDir)),
      timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
      transport: overrides.transport,
    });
  }
}
