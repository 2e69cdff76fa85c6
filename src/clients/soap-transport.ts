/**
 * SOAP transport — posts an envelope built from the verified payload and
 * returns the `<operation>Response` tree.
 */

import { buildEnvelope, findFault, parseEnvelope } from "./soap-envelope";
import { Credentials, Transport, httpRequest } from "./transport";
import type { OperationSchema, RequestPayload } from "../schemas/field-spec";
import type { SchemaIndex } from "../schemas/schema-index";
import { HttpStatusError } from "../utils/errors";
import { getLogger } from "../utils/logger";

export interface SoapTransportOptions {
  /** Full endpoint, e.g. `https://cucm:8443/axl/` */
  url: string;
  credentials: Credentials;
  /** Index the operations are looked up in, for attribute and namespace data. */
  index: SchemaIndex;
  timeoutMs: number;
  /** SOAPAction header; defaults to the binding's soapAction, then the operation name. */
  soapAction?: (schema: OperationSchema) => string;
  /** Operation namespace for schemas that declare no targetNamespace. */
  namespace?: (schema: OperationSchema) => string;
}

export class SoapTransport implements Transport {
  private readonly logger = getLogger("soap-transport");

  constructor(private readonly options: SoapTransportOptions) {}

  get url(): string {
    return this.options.url;
  }

  async send(operation: string, apiVersion: string, payload: RequestPayload): Promise<unknown> {
    const schema = this.options.index.lookup(operation, apiVersion);
    const soapAction = this.options.soapAction?.(schema) ?? schema.soapAction ?? operation;

    this.logger.debug(`POST ${this.options.url}`, { operation, soapAction });
    const response = await httpRequest({
      url: this.options.url,
      method: "POST",
      headers: {
        "Content-Type": "text/xml; charset=utf-8",
        SOAPAction: `"${soapAction}"`,
      },
      body: buildEnvelope(schema, payload, this.options.namespace?.(schema)),
      timeoutMs: this.options.timeoutMs,
      credentials: this.options.credentials,
    });

    if (response.status < 200 || response.status >= 300) {
      const fault = findFault(response.body);
      if (fault) throw fault;
      throw new HttpStatusError(this.options.url, response.status, response.statusText, response.body);
    }
    return parseEnvelope(response.body, operation);
  }
}
