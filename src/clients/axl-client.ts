/**
 * AXL facade — CUCM administrative SOAP API at `https://<host>:<port>/axl/`.
 *
 * Every operation of the loaded AXL schema version is available under
 * `client.operations`. Get/list operations take a `returnedTags` call
 * option; without it every tag the schema declares is requested.
 *
 *   const axl = await AxlClient.connect();
 *   const { return: found } = await axl.operations.getPhone(
 *     { name: "SEP001122334455" },
 *     { returnedTags: ["name", "model", "lines"] }
 *   );
 */

import { ApiFacade } from "./api-facade";
import { RETURNED_TAGS, buildReturnedTags } from "./returned-tags";
import { getUcmVersion } from "./server-diagnostics";
import { SoapTransport } from "./soap-transport";
import type { Transport } from "./transport";
import { OperationSchema, RequestPayload, isPlainObject } from "../schemas/field-spec";
import type { SchemaIndex } from "../schemas/schema-index";
import { getIndex } from "../schemas/schema-registry";
import { assertValid } from "../schemas/signature-verifier";
import { getClientConfig } from "../utils/config";
import { generateProperUrl, joinUrl } from "../utils/url";

export interface AxlCallOptions {
  /** Tags to return; an empty list or no list means all of them. */
  returnedTags?: readonly string[];
}

export interface AxlClientOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  apiVersion: string;
  index: SchemaIndex;
  timeoutMs?: number;
  /** Replaces the SOAP transport (tests, proxies). */
  transport?: Transport;
}

export function axlNamespace(apiVersion: string): string {
  return `http://www.cisco.com/AXL/API/${apiVersion}`;
}

export function axlSoapAction(apiVersion: string, operation: string): string {
  return `CUCM:DB ver=${apiVersion} ${operation}`;
}

export class AxlClient extends ApiFacade<AxlCallOptions> {
  readonly url: string;

  constructor(options: AxlClientOptions) {
    super(
      {
        index: options.index,
        apiVersion: options.apiVersion,
        transport: options.transport ?? AxlClient.soapTransport(options),
      },
      "axl"
    );
    this.url = AxlClient.endpoint(options);
  }

  /**
   * Build a client from the environment. The schema version is
   * CUCM_API_VERSION when set, otherwise the version the server reports.
   */
  static async connect(overrides: Partial<AxlClientOptions> = {}): Promise<AxlClient> {
    const config = getClientConfig();
    const host = overrides.host ?? config.host;
    const port = overrides.port ?? config.port;
    const apiVersion =
      overrides.apiVersion ?? config.apiVersion ?? (await getUcmVersion(host, port, config.schemaDir));

    return new AxlClient({
      host,
      port,
      username: overrides.username ?? config.username,
      password: overrides.password ?? config.password,
      apiVersion,
      index: overrides.index ?? (await getIndex("axl", apiVersion, config.schemaDir)),
      timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
      transport: overrides.transport,
    });
  }

  static endpoint(options: Pick<AxlClientOptions, "host" | "port">): string {
    return joinUrl(generateProperUrl(options.host, options.port ?? 8443), "axl/");
  }

  private static soapTransport(options: AxlClientOptions): SoapTransport {
    return new SoapTransport({
      url: AxlClient.endpoint(options),
      credentials: { username: options.username, password: options.password },
      index: options.index,
      timeoutMs: options.timeoutMs ?? getClientConfig().timeoutMs,
      soapAction: (schema) => axlSoapAction(schema.apiVersion, schema.name),
      namespace: (schema) => axlNamespace(schema.apiVersion),
    });
  }

  protected override prepare(
    schema: OperationSchema,
    args: unknown,
    options?: AxlCallOptions
  ): RequestPayload {
    const field = schema.request.get(RETURNED_TAGS);
    const supplied = isPlainObject(args) && args[RETURNED_TAGS] !== undefined;
    const fromOption = options?.returnedTags !== undefined || (field !== undefined && !supplied);

    // The tags are built after verification, so a required element gets a stand-in first.
    const payload = assertValid(
      schema,
      fromOption && field && isPlainObject(args) ? { ...args, [RETURNED_TAGS]: {} } : args
    );
    if (fromOption) {
      const tags = buildReturnedTags(schema, options?.returnedTags);
      if (tags) payload[RETURNED_TAGS] = tags;
    }
    return payload;
  }
}
