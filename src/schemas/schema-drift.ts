/**
 * Schema drift — what changed in a backend's API between two loaded
 * versions: operations added or removed, and per operation the request and
 * response fields that were added, removed or redeclared.
 */

import { FieldSpec, FieldTree, OperationSchema, describeType } from "./field-spec";
import { SchemaIndex } from "./schema-index";

// ── Types ───────────────────────────────────────────────────────────────────

export type ChangeKind = "added" | "removed" | "changed";

export interface FieldChange {
  path: string;
  change: ChangeKind;
  details: string[];
}

export interface OperationDrift {
  operation: string;
  change: ChangeKind;
  request: FieldChange[];
  response: FieldChange[];
}

export interface DriftReport {
  backend: string;
  from: string;
  to: string;
  operations: OperationDrift[];
  summary: { added: number; removed: number; changed: number; unchanged: number };
}

// ── Diff ────────────────────────────────────────────────────────────────────

export function diffSchemaVersions(index: SchemaIndex, from: string, to: string): DriftReport {
  const before = new Set(index.operations(from));
  const after = new Set(index.operations(to));
  const names = [...new Set([...before, ...after])].sort();

  const operations: OperationDrift[] = [];
  let unchanged = 0;

  for (const name of names) {
    if (!after.has(name)) {
      operations.push({ operation: name, change: "removed", request: [], response: [] });
    } else if (!before.has(name)) {
      operations.push({ operation: name, change: "added", request: [], response: [] });
    } else {
      const drift = diffOperation(index.lookup(name, from), index.lookup(name, to));
      if (drift) operations.push(drift);
      else unchanged++;
    }
  }

  const count = (kind: ChangeKind): number => operations.filter((o) => o.change === kind).length;
  return {
    backend: index.backend,
    from,
    to,
    operations,
    summary: { added: count("added"), removed: count("removed"), changed: count("changed"), unchanged },
  };
}

export function diffOperation(before: OperationSchema, after: OperationSchema): OperationDrift | null {
  const request = diffTrees(before.request, after.request);
  const response = diffTrees(before.response, after.response);
  if (before.soapAction !== after.soapAction && request.length === 0 && response.length === 0) {
    request.push({
      path: "",
      change: "changed",
      details: [`soapAction: ${before.soapAction ?? "-"} -> ${after.soapAction ?? "-"}`],
    });
  }
  if (request.length === 0 && response.length === 0) return null;
  return { operation: after.name, change: "changed", request, response };
}

function diffTrees(before: FieldTree, after: FieldTree): FieldChange[] {
  const changes: FieldChange[] = [];
  const oldFields = before.all();
  const newFields = after.all();

  for (const field of oldFields) {
    const counterpart = after.get(field.path);
    if (!counterpart) {
      changes.push({ path: field.path, change: "removed", details: [] });
      continue;
    }
    const details = compareFields(field, counterpart);
    if (details.length > 0) changes.push({ path: field.path, change: "changed", details });
  }
  for (const field of newFields) {
    if (!before.get(field.path)) {
      changes.push({
        path: field.path,
        change: "added",
        details: field.required ? ["required"] : [],
      });
    }
  }
  return changes;
}

function compareFields(before: FieldSpec, after: FieldSpec): string[] {
  const details: string[] = [];
  const flag = (label: string, a: boolean, b: boolean): void => {
    if (a !== b) details.push(`${label}: ${a} -> ${b}`);
  };

  const oldType = describeType(before.type);
  const newType = describeType(after.type);
  if (oldType !== newType) details.push(`type: ${oldType} -> ${newType}`);

  if (before.type.kind === "enum" && after.type.kind === "enum") {
    const oldValues = before.type.values;
    const newValues = after.type.values;
    const added = newValues.filter((v) => !oldValues.includes(v));
    const removed = oldValues.filter((v) => !newValues.includes(v));
    if (added.length > 0) details.push(`enum values added: ${added.join(", ")}`);
    if (removed.length > 0) details.push(`enum values removed: ${removed.join(", ")}`);
  }

  flag("required", before.required, after.required);
  flag("repeated", before.repeated, after.repeated);
  flag("nillable", before.nillable, after.nillable);
  flag("attribute", before.attribute, after.attribute);
  return details;
}
