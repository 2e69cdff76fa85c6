/**
 * Schema Drift Detection Script
 *
 * Compares two stored schema versions of one backend and reports the
 * operations and fields that changed between them.
 *
 * Run: npm run schema:drift-check -- <from> <to> [backend]
 *      npm run schema:drift-check -- 12.5 14.0
 */

import * as fs from "fs";
import * as path from "path";
import { Backend } from "../src/schemas/field-spec";
import { DriftReport, FieldChange, diffSchemaVersions } from "../src/schemas/schema-drift";
import { SchemaIndex, loadSchemaSources } from "../src/schemas/schema-index";
import { getClientConfig } from "../src/utils/config";

const BACKENDS: readonly Backend[] = ["axl", "risport", "cupi"];

function isBackend(value: string): value is Backend {
  return BACKENDS.some((b) => b === value);
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const [from, to, backendArg = "axl"] = process.argv.slice(2);
  if (!from || !to || !isBackend(backendArg)) {
    console.error("Usage: schema-drift-check <from> <to> [axl|risport|cupi]");
    process.exit(2);
  }

  console.log("═══════════════════════════════════════════════════════════");
  console.log(`  Schema Drift Detection: ${backendArg} ${from} -> ${to}`);
  console.log("═══════════════════════════════════════════════════════════\n");

  const { schemaDir } = getClientConfig();
  const index = new SchemaIndex(backendArg);
  index.load(await loadSchemaSources(backendArg, from, schemaDir), from);
  index.load(await loadSchemaSources(backendArg, to, schemaDir), to);

  const report = diffSchemaVersions(index, from, to);
  generateReport(report);

  if (report.operations.length > 0) {
    console.error("\n⚠️  Schema drift detected! Review the report above.");
    process.exit(1);
  } else {
    console.log("\n✅ No schema drift detected.");
  }
}

// ── Report Generator ────────────────────────────────────────────────────────

function describeChange(side: string, change: FieldChange): string {
  const details = change.details.length > 0 ? ` (${change.details.join(", ")})` : "";
  return `${side} ${change.change} ${change.path || "<root>"}${details}`;
}

function generateReport(report: DriftReport): void {
  const reportDir = path.resolve("reports/drift");
  fs.mkdirSync(reportDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const reportPath = path.join(
    reportDir,
    `drift-${report.backend}-${report.from}-${report.to}-${timestamp}.json`
  );

  fs.writeFileSync(
    reportPath,
    JSON.stringify({ timestamp: new Date().toISOString(), ...report }, null, 2)
  );
  console.log(`Report saved to: ${reportPath}`);

  console.log("\n┌─────────────────────────────────────────────────────────┐");
  console.log("│  Drift Detection Summary                                │");
  console.log("├─────────────────────────────────────────────────────────┤");
  for (const op of report.operations) {
    const icon = op.change === "added" ? "➕" : op.change === "removed" ? "➖" : "✏️ ";
    console.log(`│  ${icon} ${`${op.operation} ${op.change}`.padEnd(52)} │`);
    for (const change of op.request) console.log(`│     ${describeChange("request", change).padEnd(50)} │`);
    for (const change of op.response) console.log(`│     ${describeChange("response", change).padEnd(50)} │`);
  }
  const { added, removed, changed, unchanged } = report.summary;
  const totals = `added ${added}, removed ${removed}, changed ${changed}, unchanged ${unchanged}`;
  console.log("├─────────────────────────────────────────────────────────┤");
  console.log(`│  ${totals.padEnd(54)} │`);
  console.log("└─────────────────────────────────────────────────────────┘");
}

// ── Run ─────────────────────────────────────────────────────────────────────

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
