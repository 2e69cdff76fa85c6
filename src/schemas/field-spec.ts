/**
 * Field model shared by the Schema Index, the Signature Verifier and the
 * Response Normalizer.
 *
 * An OperationSchema owns two FieldTrees (request and response). Each tree
 * keeps its nodes in document order plus a flat path index; a node points
 * at its parent by path only, so the tree itself holds no cycles.
 */

// ── Types ───────────────────────────────────────────────────────────────────

export type Backend = "axl" | "risport" | "cupi";

export type PrimitiveName =
  | "string"
  | "int"
  | "decimal"
  | "boolean"
  | "dateTime"
  | "date";

export type FieldType =
  | { kind: "primitive"; primitive: PrimitiveName; maxLength?: number }
  | { kind: "enum"; values: readonly string[] }
  | { kind: "object" };

export type MaxOccurs = number | "unbounded";

/** Mutually exclusive groups of sibling fields; each branch is a list of names. */
export interface ChoiceGroup {
  required: boolean;
  branches: readonly (readonly string[])[];
}

export interface FieldSpec {
  readonly name: string;
  readonly path: string;
  readonly parentPath: string | null;
  readonly type: FieldType;
  readonly required: boolean;
  readonly repeated: boolean;
  readonly minOccurs: number;
  readonly maxOccurs: MaxOccurs;
  readonly nillable: boolean;
  readonly attribute: boolean;
  readonly default?: RequestValue;
  readonly children: readonly FieldSpec[];
  readonly choices: readonly ChoiceGroup[];
}

export interface HttpBinding {
  method: "GET" | "POST" | "PUT" | "DELETE";
  path: string;
  query: readonly string[];
}

// ── Values ──────────────────────────────────────────────────────────────────

/** Marks an optional field that was not supplied (request) or not returned (response). */
export const ABSENT: unique symbol = Symbol("absent");
export type Absent = typeof ABSENT;

export function isAbsent(value: unknown): value is Absent {
  return value === ABSENT;
}

export type Scalar = string | number | boolean | Date | null;

export type RequestValue =
  | Scalar
  | Absent
  | RequestValue[]
  | { [field: string]: RequestValue };

export type RequestPayload = { [field: string]: RequestValue };

export type NormalizedValue =
  | Scalar
  | Absent
  | NormalizedValue[]
  | NormalizedResponse;

export interface NormalizedResponse {
  [field: string]: NormalizedValue;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

export function describeValue(value: unknown): string {
  if (value === ABSENT) return "<absent>";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  if (typeof value === "string") return `'${value}'`;
  if (typeof value === "object") return "object";
  return `${typeof value} ${String(value)}`;
}

export function describeType(type: FieldType): string {
  switch (type.kind) {
    case "primitive":
      return type.maxLength !== undefined
        ? `${type.primitive} (max ${type.maxLength} chars)`
        : type.primitive;
    case "enum":
      return "enum";
    case "object":
      return "object";
  }
}

// ── Field tree ──────────────────────────────────────────────────────────────

export class FieldTree {
  private readonly byPath = new Map<string, FieldSpec>();

  constructor(readonly root: FieldSpec) {
    this.index(root);
  }

  /** Top-level fields of the message. */
  get fields(): readonly FieldSpec[] {
    return this.root.children;
  }

  get(path: string): FieldSpec | undefined {
    return this.byPath.get(path);
  }

  parentOf(field: FieldSpec): FieldSpec | undefined {
    return field.parentPath === null ? undefined : this.byPath.get(field.parentPath);
  }

  /** Every node except the root, depth first in document order. */
  all(): FieldSpec[] {
    const out: FieldSpec[] = [];
    const walk = (node: FieldSpec): void => {
      for (const child of node.children) {
        out.push(child);
        walk(child);
      }
    };
    walk(this.root);
    return out;
  }

  private index(node: FieldSpec): void {
    this.byPath.set(node.path, node);
    for (const child of node.children) this.index(child);
  }
}

export interface OperationSchemaInit {
  name: string;
  apiVersion: string;
  backend: Backend;
  request: FieldSpec;
  response: FieldSpec;
  soapAction?: string;
  namespace?: string;
  http?: HttpBinding;
}

export class OperationSchema {
  readonly name: string;
  readonly apiVersion: string;
  readonly backend: Backend;
  readonly request: FieldTree;
  readonly response: FieldTree;
  readonly soapAction?: string;
  readonly namespace?: string;
  readonly http?: HttpBinding;

  constructor(init: OperationSchemaInit) {
    this.name = init.name;
    this.apiVersion = init.apiVersion;
    this.backend = init.backend;
    this.request = new FieldTree(init.request);
    this.response = new FieldTree(init.response);
    this.soapAction = init.soapAction;
    this.namespace = init.namespace;
    this.http = init.http;
    Object.freeze(this);
  }
}

// ── Builders ────────────────────────────────────────────────────────────────

/** Mutable node used while a parser assembles a tree; frozen by `freezeField`. */
export interface DraftField {
  name: string;
  type: FieldType;
  minOccurs: number;
  maxOccurs: MaxOccurs;
  nillable: boolean;
  attribute: boolean;
  inChoice: boolean;
  default?: RequestValue;
  children: DraftField[];
  choices: ChoiceGroup[];
}

export function isRepeated(maxOccurs: MaxOccurs): boolean {
  return maxOccurs === "unbounded" || maxOccurs > 1;
}

/**
 * Turn a draft into immutable FieldSpecs, assigning paths. The message root
 * (called with a null parent) gets the empty path; its children are named
 * from there, e.g. `phone.lines.line`.
 */
export function freezeField(
  draft: DraftField,
  parentPath: string | null,
  onDuplicate: (path: string) => never
): FieldSpec {
  const path =
    parentPath === null ? "" : parentPath === "" ? draft.name : `${parentPath}.${draft.name}`;
  const seen = new Set<string>();
  const children: FieldSpec[] = [];
  for (const child of draft.children) {
    if (seen.has(child.name)) onDuplicate(path === "" ? child.name : `${path}.${child.name}`);
    seen.add(child.name);
    children.push(freezeField(child, path, onDuplicate));
  }

  return Object.freeze({
    name: draft.name,
    path,
    parentPath,
    type: draft.type,
    required: draft.minOccurs > 0 && !draft.inChoice,
    repeated: isRepeated(draft.maxOccurs),
    minOccurs: draft.minOccurs,
    maxOccurs: draft.maxOccurs,
    nillable: draft.nillable,
    attribute: draft.attribute,
    default: draft.default,
    children: Object.freeze(children),
    choices: Object.freeze(draft.choices),
  });
}
