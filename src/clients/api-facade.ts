/**
 * API Facade — composes the Schema Index, the Signature Verifier, a
 * Transport and the Response Normalizer into one callable per operation.
 *
 *   const facade = new ApiFacade({ index, apiVersion: "14.0", transport });
 *   const phone = await facade.operations.getPhone({ name: "SEP001122334455" });
 *
 * Invalid arguments throw before the transport is touched. Transport
 * failures are re-thrown with the call context attached; nothing is retried.
 */

import { v4 as uuidv4 } from "uuid";
import type { Transport } from "./transport";
import type {
  NormalizedResponse,
  OperationSchema,
  RequestPayload,
} from "../schemas/field-spec";
import { normalize } from "../schemas/response-normalizer";
import type { SchemaIndex } from "../schemas/schema-index";
import { assertValid } from "../schemas/signature-verifier";
import { CallContext, TransportError } from "../utils/errors";
import { Logger, getLogger } from "../utils/logger";

export type OperationCall<TOptions> = (
  args?: unknown,
  options?: TOptions
) => Promise<NormalizedResponse>;

export interface FacadeOptions {
  index: SchemaIndex;
  apiVersion: string;
  transport: Transport;
}

export class ApiFacade<TOptions = never> {
  readonly index: SchemaIndex;
  readonly apiVersion: string;
  readonly operations: Readonly<Record<string, OperationCall<TOptions>>>;
  protected readonly transport: Transport;
  protected readonly logger: Logger;

  constructor(options: FacadeOptions, component: string = "facade") {
    this.index = options.index;
    this.apiVersion = options.apiVersion;
    this.transport = options.transport;
    this.logger = getLogger(component);

    const calls: Record<string, OperationCall<TOptions>> = {};
    for (const name of this.index.operations(this.apiVersion)) {
      calls[name] = (args, callOptions) => this.call(name, args, callOptions);
    }
    this.operations = Object.freeze(calls);
  }

  /** Verify, send and normalize one operation. */
  async call(operation: string, args?: unknown, options?: TOptions): Promise<NormalizedResponse> {
    const schema = this.index.lookup(operation, this.apiVersion);
    const payload = this.prepare(schema, args ?? {}, options);
    const context: CallContext = {
      operation,
      apiVersion: this.apiVersion,
      requestId: uuidv4(),
    };

    this.logger.debug(`calling ${operation}`, { ...context });
    const started = Date.now();

    let raw: unknown;
    try {
      raw = await this.transport.send(operation, this.apiVersion, payload);
    } catch (error) {
      const classified =
        error instanceof TransportError
          ? error
          : new TransportError(
              `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
              { cause: error }
            );
      classified.attachContext(context);
      this.logger.warn(`${operation} failed: ${classified.message}`, {
        ...context,
        error: classified.name,
      });
      throw classified;
    }

    const result = normalize(schema, raw);
    this.logger.debug(`${operation} completed`, { ...context, ms: Date.now() - started });
    return result;
  }

  /** Turn caller arguments into the payload handed to the transport. */
  protected prepare(schema: OperationSchema, args: unknown, _options?: TOptions): RequestPayload {
    return assertValid(schema, args);
  }
}
