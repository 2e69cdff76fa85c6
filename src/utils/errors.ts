/**
 * Error taxonomy for the CUCM SDK layer.
 *
 * Schema errors come from loading and looking up operation schemas,
 * validation errors from checking caller arguments (never sent to the
 * server), normalization errors from response walking, and transport
 * errors from the network collaborator. Diagnostics errors describe why a
 * server could not be reached or identified.
 */

// ── Base ────────────────────────────────────────────────────────────────────

export class CucmError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ── Schema Index ────────────────────────────────────────────────────────────

export class SchemaParseError extends CucmError {
  constructor(
    readonly source: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not parse schema source '${source}': ${reason}`, options);
  }
}

export class UnknownOperationError extends CucmError {
  constructor(
    readonly operation: string,
    readonly apiVersion: string,
    readonly backend: string
  ) {
    super(
      `Operation '${operation}' is not defined for ${backend} version ${apiVersion}`
    );
  }
}

// ── Signature Verifier ──────────────────────────────────────────────────────

export abstract class ValidationError extends CucmError {
  constructor(
    readonly operation: string,
    readonly path: string,
    message: string
  ) {
    super(`${operation}: ${message}`);
  }
}

export class UnexpectedFieldError extends ValidationError {
  constructor(
    operation: string,
    path: string,
    readonly key: string
  ) {
    super(operation, path, `'${path}' is not a valid argument`);
  }
}

export class MissingFieldError extends ValidationError {
  constructor(
    operation: string,
    path: string,
    readonly alternatives: string[][] = []
  ) {
    super(
      operation,
      path,
      alternatives.length > 0
        ? `one of the following is required at '${path}': ${formatBranches(alternatives)}`
        : `required field '${path}' is missing`
    );
  }
}

export class TypeMismatchError extends ValidationError {
  constructor(
    operation: string,
    path: string,
    readonly expected: string,
    readonly received: string,
    readonly allowedValues?: readonly string[]
  ) {
    super(
      operation,
      path,
      allowedValues
        ? `'${path}' must be one of ${allowedValues.map((v) => `'${v}'`).join(", ")} (got ${received})`
        : `'${path}' must be ${expected} (got ${received})`
    );
  }
}

export class ChoiceConflictError extends ValidationError {
  constructor(
    operation: string,
    path: string,
    readonly branches: string[][]
  ) {
    super(
      operation,
      path,
      `choose only ONE of the following at '${path}': ${formatBranches(branches)}`
    );
  }
}

function formatBranches(branches: string[][]): string {
  return branches
    .map((branch, i) => `${i + 1}) ${branch.map((b) => `'${b}'`).join(" + ")}`)
    .join(" ");
}

// ── Response Normalizer ─────────────────────────────────────────────────────

export abstract class NormalizationError extends CucmError {
  constructor(
    readonly operation: string,
    readonly path: string,
    message: string
  ) {
    super(`${operation}: ${message}`);
  }
}

export class UnknownEnumValueError extends NormalizationError {
  constructor(
    operation: string,
    path: string,
    readonly value: string,
    readonly allowedValues: readonly string[]
  ) {
    super(
      operation,
      path,
      `server returned '${value}' for '${path}', which is not one of the ${allowedValues.length} known values`
    );
  }
}

export class ResponseCoercionError extends NormalizationError {
  constructor(
    operation: string,
    path: string,
    readonly expected: string,
    readonly received: string
  ) {
    super(operation, path, `'${path}' could not be read as ${expected} (got ${received})`);
  }
}

// ── Transport ───────────────────────────────────────────────────────────────

export interface CallContext {
  operation: string;
  apiVersion: string;
  requestId?: string;
}

export class TransportError extends CucmError {
  context?: CallContext;

  attachContext(context: CallContext): this {
    this.context = context;
    return this;
  }

  override toString(): string {
    if (!this.context) return `${this.name}: ${this.message}`;
    const { operation, apiVersion, requestId } = this.context;
    const id = requestId ? ` #${requestId}` : "";
    return `${this.name} [${operation} v${apiVersion}${id}]: ${this.message}`;
  }
}

export class ConnectionError extends TransportError {
  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not connect to ${url}`, options);
  }
}

export class TimeoutError extends TransportError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
  }
}

export class AuthenticationError extends TransportError {
  constructor(
    readonly url: string,
    readonly username: string
  ) {
    super(`Credentials not accepted for ${username} at ${url}`);
  }
}

export class HttpStatusError extends TransportError {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
    readonly body: string
  ) {
    super(`HTTP ${status} ${statusText} for url: ${url}`);
  }
}

export class RemoteFaultError extends TransportError {
  constructor(
    readonly faultCode: string,
    readonly faultString: string,
    readonly detail?: unknown,
    readonly axlCode?: number
  ) {
    super(faultString || `SOAP fault ${faultCode}`);
  }
}

// ── Server diagnostics ──────────────────────────────────────────────────────

export abstract class ServerError extends CucmError {
  constructor(
    readonly server: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UrlInvalidError extends ServerError {
  constructor(server: string) {
    super(server, `${server} is not a valid URL.`);
  }
}

export class UcmInvalidError extends ServerError {
  constructor(server: string) {
    super(server, `${server} is not a valid UCM server.`);
  }
}

export class UcmNotFoundError extends ServerError {
  constructor(server: string, options?: { cause?: unknown }) {
    super(server, `Could not locate ${server}, please check that the URL is correct.`, options);
  }
}

export class UcmConnectionFailure extends ServerError {
  constructor(server: string, options?: { cause?: unknown }) {
    super(
      server,
      `Could not connect to ${server}, please check your connection or try again.`,
      options
    );
  }
}

export class AxlInvalidCredentials extends ServerError {
  constructor(
    server: string,
    readonly username: string
  ) {
    super(server, `Credentials not accepted for ${username} at ${server}`);
  }
}

export class AxlNotFoundError extends ServerError {
  constructor(server: string, options?: { cause?: unknown }) {
    super(server, `Could not find AXL API at ${server}, is the service activated?`, options);
  }
}

export class AxlConnectionFailure extends ServerError {
  constructor(server: string, options?: { cause?: unknown }) {
    super(server, `Could not connect to the AXL API at ${server}.`, options);
  }
}

export class UdsConnectionError extends ServerError {
  constructor(server: string, options?: { cause?: unknown }) {
    super(server, `Could not connect to CUCM UDS service at ${server}`, options);
  }
}

export class UdsParseError extends ServerError {
  constructor(
    server: string,
    readonly wanted: string,
    readonly xml: string
  ) {
    super(server, `Could not find '${wanted}' at ${server}`);
  }
}

export class UcmVersionError extends ServerError {
  constructor(
    server: string,
    readonly version: string
  ) {
    super(server, `The UCM server at ${server} has an unsupported version '${version}'`);
  }
}
