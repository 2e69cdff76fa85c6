/**
 * Response Normalizer — walks a raw response in lockstep with the
 * operation's response tree.
 *
 * Raw trees come from fast-xml-parser (attributes as `@_name`, element text
 * as `#text`) or from a JSON body. The schema decides the shape: every
 * declared field appears in the result, repeated fields are always arrays,
 * and keys the schema does not declare are ignored.
 */

import { coercePrimitiveText } from "./coercion";
import {
  ABSENT,
  FieldSpec,
  NormalizedResponse,
  NormalizedValue,
  OperationSchema,
  Scalar,
  describeType,
  describeValue,
  isPlainObject,
} from "./field-spec";
import { VALUE_KEY } from "./signature-verifier";
import { ResponseCoercionError, UnknownEnumValueError } from "../utils/errors";

const TEXT_KEY = "#text";
const NIL_KEYS = ["@_xsi:nil", "@_nil", "xsi:nil"];

export function normalize(schema: OperationSchema, raw: unknown): NormalizedResponse {
  return new Normalizer(schema).run(raw);
}

function isNil(value: Record<string, unknown>): boolean {
  return NIL_KEYS.some((key) => {
    const flag = value[key];
    return flag === true || flag === "true" || flag === "1";
  });
}

function joinPath(base: string, key: string): string {
  return base === "" ? key : `${base}.${key}`;
}

class Normalizer {
  private readonly operation: string;

  constructor(private readonly schema: OperationSchema) {
    this.operation = schema.name;
  }

  run(raw: unknown): NormalizedResponse {
    const root = this.schema.response.root;
    if (raw === undefined || raw === null || raw === "") return this.object(root, {}, "");
    if (!isPlainObject(raw)) {
      throw new ResponseCoercionError(this.operation, root.name, "object", describeValue(raw));
    }
    return this.object(root, raw, "");
  }

  private object(field: FieldSpec, raw: Record<string, unknown>, path: string): NormalizedResponse {
    const out: NormalizedResponse = {};
    for (const child of field.children) {
      const value = child.attribute ? (raw[`@_${child.name}`] ?? raw[child.name]) : raw[child.name];
      out[child.name] = this.member(child, value, joinPath(path, child.name));
    }
    return out;
  }

  private member(field: FieldSpec, raw: unknown, path: string): NormalizedValue {
    if (raw === undefined) return ABSENT;
    if (!field.repeated) return this.value(field, raw, path);

    const items: unknown[] = Array.isArray(raw) ? raw : [raw];
    return items.map((item, i) => this.value(field, item, `${path}[${i}]`));
  }

  private value(field: FieldSpec, raw: unknown, path: string): NormalizedValue {
    if (raw === null) return null;
    if (isPlainObject(raw) && isNil(raw)) return null;

    if (field.type.kind === "object") {
      if (raw === "") return this.object(field, {}, path);
      if (!isPlainObject(raw)) {
        throw new ResponseCoercionError(this.operation, path, "object", describeValue(raw));
      }
      return this.object(field, raw, path);
    }

    // simple content collapses to its text; attributes are dropped
    let text: unknown = raw;
    if (isPlainObject(raw)) text = raw[TEXT_KEY] ?? raw[VALUE_KEY] ?? "";
    return this.scalar(field, text, path);
  }

  private scalar(field: FieldSpec, raw: unknown, path: string): Scalar {
    const { type } = field;

    if (typeof raw !== "string") {
      // JSON bodies carry native numbers and booleans
      if (type.kind === "primitive") {
        if (typeof raw === "number" && type.primitive === "int") {
          if (Number.isSafeInteger(raw)) return raw;
          throw new ResponseCoercionError(this.operation, path, describeType(type), describeValue(raw));
        }
        if (typeof raw === "number" && type.primitive === "decimal" && Number.isFinite(raw)) return raw;
        if (typeof raw === "boolean" && type.primitive === "boolean") return raw;
        if (raw instanceof Date && (type.primitive === "date" || type.primitive === "dateTime")) {
          return raw;
        }
      }
      if (typeof raw === "number" || typeof raw === "boolean") return this.scalar(field, String(raw), path);
      throw new ResponseCoercionError(this.operation, path, describeType(type), describeValue(raw));
    }

    const text = raw.trim();
    if (type.kind === "primitive" && type.primitive === "string") return text;
    if (text === "") return null;

    if (type.kind === "enum") {
      if (!type.values.includes(text)) {
        throw new UnknownEnumValueError(this.operation, path, text, type.values);
      }
      return text;
    }
    if (type.kind === "object") {
      throw new ResponseCoercionError(this.operation, path, "object", describeValue(raw));
    }

    const value = coercePrimitiveText(text, type.primitive);
    if (value === undefined) {
      throw new ResponseCoercionError(this.operation, path, describeType(type), describeValue(text));
    }
    return value;
  }
}
