/**
 * Print the request (and with --response, the response) layout of
 * operations from a stored schema version.
 *
 * Run: npm run show-tree -- <backend> <version> <operation...> [--response]
 *      npm run show-tree -- axl 14.0 addPhone getPhone
 */

import { Backend } from "../src/schemas/field-spec";
import { getIndex } from "../src/schemas/schema-registry";
import { formatFieldTree } from "../src/utils/field-tree";

const BACKENDS: readonly Backend[] = ["axl", "risport", "cupi"];

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const withResponse = args.includes("--response");
  const [backend, version, ...operations] = args.filter((a) => a !== "--response");

  const selected = BACKENDS.find((b) => b === backend);
  if (!selected || !version) {
    console.error("Usage: show-tree <axl|risport|cupi> <version> [operation...] [--response]");
    process.exit(2);
  }

  const index = await getIndex(selected, version);
  const names = operations.length > 0 ? operations : index.operations(version);

  for (const name of names) {
    const schema = index.lookup(name, version);
    console.log(`${name}${schema.soapAction ? `  [${schema.soapAction}]` : ""}`);
    for (const line of formatFieldTree(schema.request)) console.log(`  ${line}`);
    if (withResponse) {
      console.log(`${name} -> ${schema.response.root.name}`);
      for (const line of formatFieldTree(schema.response)) console.log(`  ${line}`);
    }
    console.log("");
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
