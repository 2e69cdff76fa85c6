/**
 * REST transport for operations that carry an HTTP binding (CUPI, UDS).
 *
 * `{param}` placeholders in the binding path are filled from the payload,
 * the binding's query fields go to the query string, and whatever is left
 * is sent as a JSON body on POST and PUT.
 */

import { Credentials, Transport, httpRequest } from "./transport";
import { formatScalar } from "../schemas/coercion";
import {
  RequestPayload,
  RequestValue,
  isAbsent,
  isPlainObject,
} from "../schemas/field-spec";
import type { SchemaIndex } from "../schemas/schema-index";
import { HttpStatusError, TransportError } from "../utils/errors";
import { joinUrl } from "../utils/url";

export interface RestTransportOptions {
  /** API root, e.g. `https://unity:443/vmrest` */
  baseUrl: string;
  credentials: Credentials;
  index: SchemaIndex;
  timeoutMs: number;
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const PLACEHOLDER = /\{([^}]+)\}/g;

export class RestTransport implements Transport {
  constructor(private readonly options: RestTransportOptions) {}

  async send(operation: string, apiVersion: string, payload: RequestPayload): Promise<unknown> {
    const schema = this.options.index.lookup(operation, apiVersion);
    const binding = schema.http;
    if (!binding) throw new TransportError(`${operation} has no HTTP binding`);

    const used = new Set<string>();
    const resourcePath = binding.path.replace(PLACEHOLDER, (_match, name: string) => {
      const value = payload[name];
      if (!isParam(value)) {
        throw new TransportError(`${operation}: path parameter '${name}' has no value`);
      }
      used.add(name);
      return encodeURIComponent(formatScalar(value));
    });

    const query = new URLSearchParams();
    for (const name of binding.query) {
      used.add(name);
      const value = payload[name];
      const values: (RequestValue | undefined)[] = Array.isArray(value) ? value : [value];
      for (const item of values) if (isParam(item)) query.append(name, formatScalar(item));
    }

    const body: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(payload)) {
      if (used.has(key) || isAbsent(value)) continue;
      body[key] = toJson(value);
    }

    const search = query.toString();
    const url = joinUrl(this.options.baseUrl, resourcePath) + (search ? `?${search}` : "");
    const hasBody = binding.method === "POST" || binding.method === "PUT";

    const response = await httpRequest({
      url,
      method: binding.method,
      headers: {
        Accept: "application/json",
        ...(hasBody ? { "Content-Type": "application/json" } : {}),
      },
      body: hasBody ? JSON.stringify(body) : undefined,
      timeoutMs: this.options.timeoutMs,
      credentials: this.options.credentials,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(url, response.status, response.statusText, response.body);
    }
    if (response.body.trim() === "") return {};
    if (!response.contentType.includes("json")) {
      throw new TransportError(`${operation}: expected a JSON response, got '${response.contentType}'`);
    }
    try {
      const parsed: unknown = JSON.parse(response.body);
      return parsed;
    } catch (error) {
      throw new TransportError(`${operation}: response is not valid JSON`, { cause: error });
    }
  }
}

function isParam(value: RequestValue | undefined): value is string | number | boolean | Date {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  );
}

function toJson(value: RequestValue): JsonValue {
  if (value === null || isAbsent(value)) return null;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.filter((v) => !isAbsent(v)).map(toJson);
  if (isPlainObject(value)) {
    const out: Record<string, JsonValue> = {};
    for (const [key, member] of Object.entries(value)) {
      if (!isAbsent(member)) out[key] = toJson(member);
    }
    return out;
  }
  return value;
}
