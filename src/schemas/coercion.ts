/**
 * Text ↔ value coercion rules shared by the verifier and the normalizer.
 *
 * Booleans:  true/t/1/yes and false/f/0/no, case-insensitive.
 * Numbers:   optional sign, digits, and for decimals a fraction part.
 * Dates:     ISO-8601, or `YYYY-MM-DD HH:mm:ss` / `YYYY-MM-DD` read as UTC.
 */

import type { FieldType, PrimitiveName, RequestValue } from "./field-spec";

const TRUE_TOKENS = new Set(["true", "t", "1", "yes"]);
const FALSE_TOKENS = new Set(["false", "f", "0", "no"]);

const INT_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const SPACED_DATE_TIME = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;
const PLAIN_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function parseBooleanToken(text: string): boolean | undefined {
  const token = text.trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  return undefined;
}

export function parseNumberText(
  text: string,
  primitive: "int" | "decimal"
): number | undefined {
  const trimmed = text.trim();
  const pattern = primitive === "int" ? INT_PATTERN : DECIMAL_PATTERN;
  if (!pattern.test(trimmed)) return undefined;
  const value = Number(trimmed);
  if (primitive === "int") return Number.isSafeInteger(value) ? value : undefined;
  return Number.isFinite(value) ? value : undefined;
}

export function parseDateText(text: string): Date | undefined {
  const trimmed = text.trim();
  let iso: string;
  if (ISO_DATE_TIME.test(trimmed)) {
    iso = trimmed;
  } else if (SPACED_DATE_TIME.test(trimmed)) {
    iso = trimmed.replace(SPACED_DATE_TIME, "$1T$2Z");
  } else if (PLAIN_DATE.test(trimmed)) {
    iso = `${trimmed}T00:00:00Z`;
  } else {
    return undefined;
  }
  const date = new Date(iso);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function formatDate(date: Date, primitive: "date" | "dateTime"): string {
  const iso = date.toISOString();
  return primitive === "date" ? iso.slice(0, 10) : iso;
}

/**
 * Coerce scalar text to the canonical value of a primitive.
 * Returns undefined when the text is not a valid literal of the type.
 */
export function coercePrimitiveText(
  text: string,
  primitive: PrimitiveName
): string | number | boolean | Date | undefined {
  switch (primitive) {
    case "string":
      return text;
    case "int":
    case "decimal":
      return parseNumberText(text, primitive);
    case "boolean":
      return parseBooleanToken(text);
    case "date":
    case "dateTime":
      return parseDateText(text);
  }
}

/** Render a canonical request value as XML/query text. */
export function formatScalar(value: string | number | boolean | Date, type?: FieldType): string {
  if (value instanceof Date) {
    const primitive =
      type?.kind === "primitive" && type.primitive === "date" ? "date" : "dateTime";
    return formatDate(value, primitive);
  }
  return String(value);
}

/** Schema-declared default text turned into the field's canonical value. */
export function coerceDefault(text: string, type: FieldType): RequestValue | undefined {
  switch (type.kind) {
    case "enum":
      return type.values.includes(text) ? text : undefined;
    case "primitive":
      return coercePrimitiveText(text, type.primitive);
    case "object":
      return undefined;
  }
}
