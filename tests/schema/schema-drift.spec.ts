/**
 * Schema Tests — drift between stored schema versions
 */

import { diffOperation, diffSchemaVersions } from "../../src/schemas/schema-drift";
import { SchemaIndex } from "../../src/schemas/schema-index";
import { loadFixtureIndex } from "../../src/utils/test-helpers";

describe("Schema Drift: AXL 12.5 -> 14.0", () => {
  let index: SchemaIndex;

  beforeAll(async () => {
    index = await loadFixtureIndex("axl", "12.5", "14.0");
  });

  test("should summarize added, removed, changed and unchanged operations", () => {
    const report = diffSchemaVersions(index, "12.5", "14.0");
    expect(report.backend).toBe("axl");
    expect(report.summary).toEqual({ added: 1, removed: 1, changed: 2, unchanged: 1 });
    expect(report.operations.map((o) => [o.operation, o.change])).toEqual([
      ["addPhone", "changed"],
      ["getCCMVersion", "removed"],
      ["getPhone", "changed"],
      ["listPhone", "added"],
    ]);
  });

  test("should list changed fields before added ones", () => {
    const report = diffSchemaVersions(index, "12.5", "14.0");
    const addPhone = report.operations.find((o) => o.operation === "addPhone");
    expect(addPhone?.request).toEqual([
      {
        path: "phone.model",
        change: "changed",
        details: ["enum values added: 8865", "enum values removed: 7821"],
      },
      { path: "phone.enableExtensionMobility", change: "added", details: [] },
    ]);
    expect(addPhone?.response).toEqual([]);
  });

  test("should compare response trees as well", () => {
    const report = diffSchemaVersions(index, "12.5", "14.0");
    const getPhone = report.operations.find((o) => o.operation === "getPhone");
    expect(getPhone?.response.map((c) => [c.path, c.change])).toEqual([
      ["return.phone.model", "changed"],
      ["return.phone.enableExtensionMobility", "added"],
    ]);
  });

  test("should report removals and requirement changes in the reverse direction", () => {
    const report = diffSchemaVersions(index, "14.0", "12.5");
    expect(report.summary).toEqual({ added: 1, removed: 1, changed: 2, unchanged: 1 });
    const addPhone = report.operations.find((o) => o.operation === "addPhone");
    expect(addPhone?.request[1]).toEqual({
      path: "phone.enableExtensionMobility",
      change: "removed",
      details: [],
    });
  });

  test("should find nothing between a version and itself", () => {
    const report = diffSchemaVersions(index, "14.0", "14.0");
    expect(report.operations).toEqual([]);
    expect(report.summary.unchanged).toBe(4);
  });
});

describe("Schema Drift: field declarations", () => {
  const build = (request: unknown[], soapAction?: string) => {
    const index = new SchemaIndex("cupi");
    index.load({ format: "description", document: { operations: { op: { request, soapAction } } } }, "1");
    return index.lookup("op", "1");
  };

  test("should describe type and flag changes", () => {
    const drift = diffOperation(
      build([{ name: "count", type: "string" }]),
      build([{ name: "count", type: "int", required: true, repeated: true }])
    );
    expect(drift?.request).toEqual([
      {
        path: "count",
        change: "changed",
        details: ["type: string -> int", "required: false -> true", "repeated: false -> true"],
      },
    ]);
  });

  test("should mark added required fields", () => {
    const drift = diffOperation(build([]), build([{ name: "id", type: "string", required: true }]));
    expect(drift?.request).toEqual([{ path: "id", change: "added", details: ["required"] }]);
  });

  test("should report a changed soapAction on its own", () => {
    const drift = diffOperation(build([], "urn:a"), build([], "urn:b"));
    expect(drift?.request).toEqual([{ path: "", change: "changed", details: ["soapAction: urn:a -> urn:b"] }]);
  });

  test("should return null for identical operations", () => {
    expect(diffOperation(build([{ name: "x", type: "string" }]), build([{ name: "x", type: "string" }]))).toBeNull();
  });
});
