/**
 * Structured description parser — the JSON equivalent of an XSD source.
 *
 * Used for REST backends (CUPI/UDS) whose operations have no WSDL, and for
 * hand-written SOAP descriptions. Documents are validated against
 * `schemas/source-description.schema.json` with Ajv before any field tree
 * is built; both structural and semantic problems are SchemaParseErrors.
 */

import Ajv, { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import descriptionSchema from "../../schemas/source-description.schema.json";
import { coerceDefault } from "./coercion";
import {
  Backend,
  DraftField,
  FieldSpec,
  FieldType,
  HttpBinding,
  OperationSchema,
  PrimitiveName,
  RequestValue,
  freezeField,
} from "./field-spec";
import { SchemaParseError } from "../utils/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export interface FieldDescription {
  name: string;
  type: PrimitiveName | "enum" | "object";
  values?: string[];
  required?: boolean;
  repeated?: boolean;
  nillable?: boolean;
  attribute?: boolean;
  maxLength?: number;
  default?: string | number | boolean;
  fields?: FieldDescription[];
}

export interface OperationDescription {
  soapAction?: string;
  http?: { method: HttpBinding["method"]; path: string; query?: string[] };
  request?: FieldDescription[];
  response?: FieldDescription[];
}

export interface SourceDescription {
  namespace?: string;
  generatedAt?: string;
  operations: Record<string, OperationDescription>;
}

export interface DescriptionSourceOptions {
  sourceName: string;
  backend: Backend;
  apiVersion: string;
}

// ── Validator ───────────────────────────────────────────────────────────────

let validateDescription: ValidateFunction<SourceDescription> | null = null;

function getDescriptionValidator(): ValidateFunction<SourceDescription> {
  if (!validateDescription) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    addFormats(ajv);
    validateDescription = ajv.compile<SourceDescription>(descriptionSchema);
  }
  return validateDescription;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("; ");
}

// ── Parser ──────────────────────────────────────────────────────────────────

/**
 * Validate a description document and build its operations.
 */
export function parseDescriptionSource(
  document: unknown,
  options: DescriptionSourceOptions
): OperationSchema[] {
  const fail = (reason: string): never => {
    throw new SchemaParseError(options.sourceName, reason);
  };

  const validate = getDescriptionValidator();
  if (!validate(document)) {
    fail(`description does not match schema: ${formatErrors(validate.errors)}`);
    return [];
  }

  const names = Object.keys(document.operations);
  if (names.length === 0) fail("no operations found");

  return names.map((name) => {
    const op = document.operations[name];
    return new OperationSchema({
      name,
      apiVersion: options.apiVersion,
      backend: options.backend,
      request: buildRoot(name, op.request ?? [], fail),
      response: buildRoot(`${name}Response`, op.response ?? [], fail),
      soapAction: op.soapAction,
      namespace: document.namespace,
      http: op.http && {
        method: op.http.method,
        path: op.http.path,
        query: Object.freeze([...(op.http.query ?? [])]),
      },
    });
  });
}

function buildRoot(
  name: string,
  fields: FieldDescription[],
  fail: (reason: string) => never
): FieldSpec {
  const root: DraftField = {
    name,
    type: { kind: "object" },
    minOccurs: 1,
    maxOccurs: 1,
    nillable: false,
    attribute: false,
    inChoice: false,
    children: fields.map((f) => toDraft(f, name, fail)),
    choices: [],
  };
  return freezeField(root, null, (path) => fail(`duplicate field '${path}' in ${name}`));
}

function toDraft(
  field: FieldDescription,
  context: string,
  fail: (reason: string) => never
): DraftField {
  const where = `${context}.${field.name}`;
  const type = toFieldType(field, where, fail);

  if (field.fields && type.kind !== "object") {
    fail(`'${where}' declares nested fields but is of type ${field.type}`);
  }

  const draft: DraftField = {
    name: field.name,
    type,
    minOccurs: field.required ? 1 : 0,
    maxOccurs: field.repeated ? "unbounded" : 1,
    nillable: field.nillable ?? false,
    attribute: field.attribute ?? false,
    inChoice: false,
    children: (field.fields ?? []).map((f) => toDraft(f, where, fail)),
    choices: [],
  };

  if (field.default !== undefined) {
    draft.default = toDefault(field.default, type, where, fail);
  }
  return draft;
}

function toFieldType(
  field: FieldDescription,
  where: string,
  fail: (reason: string) => never
): FieldType {
  if (field.values && field.type !== "enum") {
    fail(`'${where}' lists enum values but is of type ${field.type}`);
  }
  if (field.maxLength !== undefined && field.type !== "string") {
    fail(`'${where}' has maxLength but is of type ${field.type}`);
  }

  switch (field.type) {
    case "enum":
      if (!field.values) return fail(`enum '${where}' has no values`);
      return { kind: "enum", values: Object.freeze([...field.values]) };
    case "object":
      return { kind: "object" };
    default:
      return field.maxLength !== undefined
        ? { kind: "primitive", primitive: field.type, maxLength: field.maxLength }
        : { kind: "primitive", primitive: field.type };
  }
}

function toDefault(
  value: string | number | boolean,
  type: FieldType,
  where: string,
  fail: (reason: string) => never
): RequestValue {
  if (type.kind === "primitive") {
    if (typeof value === "boolean" && type.primitive === "boolean") return value;
    if (typeof value === "number" && (type.primitive === "int" || type.primitive === "decimal")) {
      if (type.primitive === "int" && !Number.isInteger(value)) {
        return fail(`default ${value} of '${where}' is not an integer`);
      }
      return value;
    }
  }
  const coerced = coerceDefault(String(value), type);
  if (coerced === undefined) return fail(`default '${String(value)}' is not valid for '${where}'`);
  return coerced;
}
