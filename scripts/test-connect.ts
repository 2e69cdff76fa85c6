/**
 * Connectivity check against the configured CUCM (CUCM_HOST, CUCM_PORT,
 * CUCM_USERNAME, CUCM_PASSWORD): server banner, AXL credentials and the
 * reported version.
 *
 * Run: npm run test-connect
 */

import {
  getUcmVersion,
  validateAxlAuth,
  validateUcmServer,
} from "../src/clients/server-diagnostics";
import { getClientConfig } from "../src/utils/config";

async function main(): Promise<void> {
  const config = getClientConfig();
  if (!config.host) {
    console.error("CUCM_HOST is not set");
    process.exit(2);
  }

  console.log(`Checking ${config.host}:${config.port} ...`);

  const isUcm = await validateUcmServer(config.host, config.port);
  console.log(`${isUcm ? "✅" : "❌"} CUCM web service`);
  if (!isUcm) process.exit(1);

  const authenticated = await validateAxlAuth(
    config.host,
    config.username,
    config.password,
    config.port
  );
  console.log(`${authenticated ? "✅" : "❌"} AXL credentials`);
  if (!authenticated) process.exit(1);

  const version = await getUcmVersion(config.host, config.port, config.schemaDir);
  console.log(`✅ Schema version ${version} available`);
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
