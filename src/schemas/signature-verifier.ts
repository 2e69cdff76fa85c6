/**
 * Signature Verifier — checks caller arguments against an operation's
 * request tree and produces the canonical request payload.
 *
 * At every object level the checks run in a fixed order: unexpected keys,
 * then choice groups, then each declared field in schema order. The first
 * failure is reported. The output always carries every declared field:
 * optional fields that were not supplied hold their default or ABSENT.
 */

import { parseBooleanToken, parseDateText, parseNumberText } from "./coercion";
import {
  ABSENT,
  FieldSpec,
  OperationSchema,
  RequestPayload,
  RequestValue,
  Scalar,
  describeType,
  describeValue,
  isPlainObject,
} from "./field-spec";
import {
  ChoiceConflictError,
  MissingFieldError,
  TypeMismatchError,
  UnexpectedFieldError,
  ValidationError,
} from "../utils/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export type ValidationResult =
  | { ok: true; payload: RequestPayload }
  | { ok: false; error: ValidationError };

/** Key that carries the text of an element that also has attributes. */
export const VALUE_KEY = "_value";

// ── Entry points ────────────────────────────────────────────────────────────

export function verify(schema: OperationSchema, args: unknown): ValidationResult {
  try {
    return { ok: true, payload: new Verifier(schema).run(args) };
  } catch (error) {
    if (error instanceof ValidationError) return { ok: false, error };
    throw error;
  }
}

/** Like verify(), but throws the ValidationError. */
export function assertValid(schema: OperationSchema, args: unknown): RequestPayload {
  const result = verify(schema, args);
  if (!result.ok) throw result.error;
  return result.payload;
}

// ── Verifier ────────────────────────────────────────────────────────────────

function isSupplied(value: unknown): boolean {
  return value !== undefined && value !== null && value !== ABSENT;
}

function joinPath(base: string, key: string): string {
  return base === "" ? key : `${base}.${key}`;
}

function hasAttributes(field: FieldSpec): boolean {
  return field.children.some((c) => c.attribute);
}

class Verifier {
  private readonly operation: string;

  constructor(private readonly schema: OperationSchema) {
    this.operation = schema.name;
  }

  run(args: unknown): RequestPayload {
    const root = this.schema.request.root;
    if (args === undefined || args === null) return this.object(root, {}, "", false);
    if (!isPlainObject(args)) {
      throw new TypeMismatchError(this.operation, root.name, "object", describeValue(args));
    }
    return this.object(root, args, "", false);
  }

  private object(
    field: FieldSpec,
    value: Record<string, unknown>,
    path: string,
    allowValueKey: boolean
  ): RequestPayload {
    const declared = new Set(field.children.map((c) => c.name));
    for (const key of Object.keys(value)) {
      if (!declared.has(key) && !(allowValueKey && key === VALUE_KEY)) {
        throw new UnexpectedFieldError(this.operation, joinPath(path, key), key);
      }
    }

    const active = this.checkChoices(field, value, path);

    const out: RequestPayload = {};
    for (const child of field.children) {
      const required = child.required || (child.minOccurs > 0 && active.has(child.name));
      out[child.name] = this.member(child, value[child.name], joinPath(path, child.name), required);
    }
    return out;
  }

  /** Names of the branches the caller took; they become required together. */
  private checkChoices(
    field: FieldSpec,
    value: Record<string, unknown>,
    path: string
  ): Set<string> {
    const active = new Set<string>();
    const at = path === "" ? field.name : path;

    for (const group of field.choices) {
      const taken = group.branches.filter((branch) =>
        branch.some((name) => isSupplied(value[name]))
      );
      const branches = group.branches.map((b) => [...b]);
      if (taken.length > 1) {
        throw new ChoiceConflictError(this.operation, at, branches);
      }
      if (taken.length === 0) {
        if (group.required) throw new MissingFieldError(this.operation, at, branches);
        continue;
      }
      taken[0].forEach((name) => active.add(name));
    }
    return active;
  }

  private member(field: FieldSpec, value: unknown, path: string, required: boolean): RequestValue {
    if (value === undefined || value === ABSENT) {
      if (required) throw new MissingFieldError(this.operation, path);
      return field.default ?? ABSENT;
    }
    if (value === null) {
      if (field.nillable) return null;
      if (required) throw new MissingFieldError(this.operation, path);
      return field.default ?? ABSENT;
    }

    if (!field.repeated) {
      if (Array.isArray(value)) {
        throw new TypeMismatchError(this.operation, path, describeType(field.type), "array");
      }
      return this.value(field, value, path);
    }

    const items: unknown[] = Array.isArray(value) ? value : [value];
    if (items.length === 0 && required) throw new MissingFieldError(this.operation, path);
    if (items.length > 0 && items.length < field.minOccurs) {
      throw new TypeMismatchError(
        this.operation,
        path,
        `at least ${field.minOccurs} items`,
        `${items.length} items`
      );
    }
    if (field.maxOccurs !== "unbounded" && items.length > field.maxOccurs) {
      throw new TypeMismatchError(
        this.operation,
        path,
        `at most ${field.maxOccurs} items`,
        `${items.length} items`
      );
    }
    return items.map((item, i) => {
      const itemPath = `${path}[${i}]`;
      if (item === null || item === undefined || item === ABSENT) {
        throw new MissingFieldError(this.operation, itemPath);
      }
      return this.value(field, item, itemPath);
    });
  }

  private value(field: FieldSpec, value: unknown, path: string): RequestValue {
    if (field.type.kind === "object") {
      if (!isPlainObject(value)) {
        throw new TypeMismatchError(this.operation, path, "object", describeValue(value));
      }
      return this.object(field, value, path, false);
    }

    if (hasAttributes(field) && isPlainObject(value)) {
      const out = this.object(field, value, path, true);
      const text = value[VALUE_KEY];
      out[VALUE_KEY] = isSupplied(text) ? this.scalar(field, text, path) : ABSENT;
      return out;
    }
    return this.scalar(field, value, path);
  }

  private scalar(field: FieldSpec, value: unknown, path: string): Scalar {
    const { type } = field;

    if (type.kind === "enum") {
      if (typeof value !== "string" || !type.values.includes(value)) {
        throw new TypeMismatchError(this.operation, path, "enum", describeValue(value), type.values);
      }
      return value;
    }
    if (type.kind === "object") {
      throw new TypeMismatchError(this.operation, path, "object", describeValue(value));
    }

    const mismatch = (): never => {
      throw new TypeMismatchError(this.operation, path, describeType(type), describeValue(value));
    };

    switch (type.primitive) {
      case "string": {
        if (typeof value !== "string") return mismatch();
        // maxLength counts characters, not UTF-16 code units
        const length = [...value].length;
        if (type.maxLength !== undefined && length > type.maxLength) {
          throw new TypeMismatchError(
            this.operation,
            path,
            describeType(type),
            `string of length ${length}`
          );
        }
        return value;
      }
      case "int":
      case "decimal": {
        const parsed =
          typeof value === "number"
            ? value
            : typeof value === "string"
              ? parseNumberText(value, type.primitive)
              : undefined;
        if (parsed === undefined || !Number.isFinite(parsed)) return mismatch();
        if (type.primitive === "int" && !Number.isSafeInteger(parsed)) return mismatch();
        return parsed;
      }
      case "boolean": {
        if (typeof value === "boolean") return value;
        const parsed = typeof value === "string" ? parseBooleanToken(value) : undefined;
        return parsed ?? mismatch();
      }
      case "date":
      case "dateTime": {
        if (value instanceof Date) return Number.isNaN(value.getTime()) ? mismatch() : value;
        const parsed = typeof value === "string" ? parseDateText(value) : undefined;
        return parsed ?? mismatch();
      }
    }
  }
}

