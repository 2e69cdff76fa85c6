/**
 * Schema Index — (apiVersion, operationName) → OperationSchema, per backend.
 *
 * A load parses every source of a version into a staging map and commits
 * it with a single assignment, so readers either see the previous version
 * set or the complete new one. A failed load leaves the index untouched.
 */

import * as fs from "fs";
import * as path from "path";
import { parseDescriptionSource } from "./description-parser";
import { Backend, OperationSchema } from "./field-spec";
import { parseXsdSources } from "./xsd-parser";
import { SchemaParseError, UnknownOperationError } from "../utils/errors";

// ── Types ───────────────────────────────────────────────────────────────────

export type SchemaSource =
  | { format: "xsd"; text: string; name?: string }
  | { format: "description"; document: unknown; name?: string };

type VersionTable = ReadonlyMap<string, OperationSchema>;

const SCHEMA_EXTENSIONS = new Set([".xsd", ".wsdl", ".json"]);

// ── Index ───────────────────────────────────────────────────────────────────

export class SchemaIndex {
  private tables: ReadonlyMap<string, VersionTable> = new Map();

  constructor(readonly backend: Backend) {}

  /**
   * Parse `source` (one or more files of the same version) and register its
   * operations under `apiVersion`, replacing any previous load of it.
   */
  load(source: SchemaSource | SchemaSource[], apiVersion: string): this {
    const sources = Array.isArray(source) ? source : [source];
    if (sources.length === 0) {
      throw new SchemaParseError(`${this.backend} ${apiVersion}`, "no schema sources given");
    }

    const staging = new Map<string, OperationSchema>();
    const add = (operations: OperationSchema[], sourceName: string): void => {
      for (const op of operations) {
        if (staging.has(op.name)) {
          throw new SchemaParseError(sourceName, `operation '${op.name}' is defined twice`);
        }
        staging.set(op.name, op);
      }
    };

    const options = { backend: this.backend, apiVersion };
    const named = sources.map((src, i) => ({
      src,
      sourceName: src.name ?? `${this.backend} ${apiVersion} source #${i + 1}`,
    }));

    // XSD/WSDL files of one version may include each other, so they parse as one set
    const xsdTexts = named.flatMap(({ src, sourceName }) =>
      src.format === "xsd" ? [{ text: src.text, sourceName }] : []
    );
    if (xsdTexts.length > 0) {
      add(parseXsdSources(xsdTexts, options), xsdTexts.map((x) => x.sourceName).join(", "));
    }
    for (const { src, sourceName } of named) {
      if (src.format === "description") {
        add(parseDescriptionSource(src.document, { ...options, sourceName }), sourceName);
      }
    }

    const next = new Map(this.tables);
    next.set(apiVersion, staging);
    this.tables = next;
    return this;
  }

  lookup(operationName: string, apiVersion: string): OperationSchema {
    const schema = this.tables.get(apiVersion)?.get(operationName);
    if (!schema) throw new UnknownOperationError(operationName, apiVersion, this.backend);
    return schema;
  }

  /** Operation names of a loaded version, sorted. */
  operations(apiVersion: string): string[] {
    return [...(this.tables.get(apiVersion)?.keys() ?? [])].sort();
  }

  versions(): string[] {
    return [...this.tables.keys()].sort(compareVersions);
  }

  has(apiVersion: string): boolean {
    return this.tables.has(apiVersion);
  }

  unload(apiVersion: string): boolean {
    if (!this.tables.has(apiVersion)) return false;
    const next = new Map(this.tables);
    next.delete(apiVersion);
    this.tables = next;
    return true;
  }
}

// ── Version helpers ─────────────────────────────────────────────────────────

/** Orders dotted versions numerically: 9.1 < 11.5 < 12.0 < 14.0. */
export function compareVersions(a: string, b: string): number {
  const left = a.split(".");
  const right = b.split(".");
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const x = Number(left[i] ?? 0);
    const y = Number(right[i] ?? 0);
    if (Number.isNaN(x) || Number.isNaN(y)) {
      const cmp = (left[i] ?? "").localeCompare(right[i] ?? "");
      if (cmp !== 0) return cmp;
    } else if (x !== y) {
      return x - y;
    }
  }
  return 0;
}

// ── Schema directory ────────────────────────────────────────────────────────

/**
 * Version directories available for a backend: `<dir>/<backend>/<version>/`.
 */
export function listSchemaVersions(backend: Backend, schemaDir: string): string[] {
  const backendDir = path.resolve(schemaDir, backend);
  if (!fs.existsSync(backendDir)) return [];
  return fs
    .readdirSync(backendDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(compareVersions);
}

/**
 * Read every `.xsd`, `.wsdl` and `.json` file of one version directory.
 */
export async function loadSchemaSources(
  backend: Backend,
  apiVersion: string,
  schemaDir: string
): Promise<SchemaSource[]> {
  const versionDir = path.resolve(schemaDir, backend, apiVersion);
  if (!fs.existsSync(versionDir)) {
    throw new SchemaParseError(versionDir, `no schema directory for ${backend} version ${apiVersion}`);
  }

  const files = (await fs.promises.readdir(versionDir))
    .filter((file) => SCHEMA_EXTENSIONS.has(path.extname(file).toLowerCase()))
    .sort();
  if (files.length === 0) {
    throw new SchemaParseError(versionDir, "directory contains no schema files");
  }

  return Promise.all(
    files.map(async (file): Promise<SchemaSource> => {
      const filePath = path.join(versionDir, file);
      const text = await fs.promises.readFile(filePath, "utf-8");
      if (path.extname(file).toLowerCase() !== ".json") {
        return { format: "xsd", text, name: filePath };
      }
      try {
        return { format: "description", document: JSON.parse(text), name: filePath };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new SchemaParseError(filePath, `malformed JSON: ${reason}`, { cause: error });
      }
    })
  );
}
