/**
 * Process-wide SchemaIndex cache, one index per backend.
 *
 * Loads are serialized per (backend, version): concurrent callers share the
 * in-flight promise, and a version is committed to its index only once the
 * whole directory has parsed.
 */

import { Backend } from "./field-spec";
import { SchemaIndex, loadSchemaSources } from "./schema-index";
import { getClientConfig } from "../utils/config";
import { getLogger } from "../utils/logger";

const logger = getLogger("schema-registry");

const indexes = new Map<Backend, SchemaIndex>();
const inFlight = new Map<string, Promise<SchemaIndex>>();

function indexFor(backend: Backend): SchemaIndex {
  let index = indexes.get(backend);
  if (!index) {
    index = new SchemaIndex(backend);
    indexes.set(backend, index);
  }
  return index;
}

function loadOnce(
  backend: Backend,
  apiVersion: string,
  schemaDir: string
): Promise<SchemaIndex> {
  const key = `${backend}@${apiVersion}`;
  const pending = inFlight.get(key);
  if (pending) return pending;

  const started = Date.now();
  const promise = loadSchemaSources(backend, apiVersion, schemaDir)
    .then((sources) => {
      const index = indexFor(backend).load(sources, apiVersion);
      logger.info(`loaded ${backend} schema ${apiVersion}`, {
        operations: index.operations(apiVersion).length,
        ms: Date.now() - started,
      });
      return index;
    })
    .finally(() => inFlight.delete(key));

  inFlight.set(key, promise);
  return promise;
}

/**
 * The backend's index with `apiVersion` loaded, reading
 * `<schemaDir>/<backend>/<apiVersion>/` on first use.
 */
export async function getIndex(
  backend: Backend,
  apiVersion: string,
  schemaDir: string = getClientConfig().schemaDir
): Promise<SchemaIndex> {
  const index = indexes.get(backend);
  if (index?.has(apiVersion)) return index;
  return loadOnce(backend, apiVersion, schemaDir);
}

/** Re-read a version from disk and swap it in. */
export async function refresh(
  backend: Backend,
  apiVersion: string,
  schemaDir: string = getClientConfig().schemaDir
): Promise<SchemaIndex> {
  const pending = inFlight.get(`${backend}@${apiVersion}`);
  if (pending) await pending.catch(() => undefined);
  return loadOnce(backend, apiVersion, schemaDir);
}

/** Forget every loaded index (for tests). */
export function resetSchemaRegistry(): void {
  indexes.clear();
  inFlight.clear();
}
