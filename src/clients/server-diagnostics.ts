/**
 * Server diagnostics — is this a reachable CUCM, does AXL accept these
 * credentials, and which schema version does the server run.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { httpRequest } from "./transport";
import { isPlainObject } from "../schemas/field-spec";
import { listSchemaVersions } from "../schemas/schema-index";
import { getClientConfig } from "../utils/config";
import {
  AuthenticationError,
  AxlConnectionFailure,
  AxlInvalidCredentials,
  AxlNotFoundError,
  ConnectionError,
  TimeoutError,
  UcmConnectionFailure,
  UcmInvalidError,
  UcmNotFoundError,
  UcmVersionError,
  UdsConnectionError,
  UdsParseError,
} from "../utils/errors";
import { generateProperUrl, joinUrl } from "../utils/url";

const UCM_BANNER = "Cisco Unified Communications Manager";

const PROBE_TIMEOUT_MS = 10_000;
const AUTH_TIMEOUT_MS = 3_000;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
});

/**
 * True when `url` serves the CUCM landing page. Throws UcmInvalidError for
 * another server, UcmNotFoundError when the host cannot be reached and
 * UcmConnectionFailure on timeout. Any other HTTP status gives false.
 */
export async function validateUcmServer(url: string, port: number = 8443): Promise<boolean> {
  const fullUrl = generateProperUrl(url, port);
  try {
    const response = await httpRequest({ url: fullUrl, method: "GET", timeoutMs: PROBE_TIMEOUT_MS });
    if (response.status !== 200) return false;
    if (!response.body.includes(UCM_BANNER)) throw new UcmInvalidError(fullUrl);
    return true;
  } catch (error) {
    if (error instanceof AuthenticationError) return false;
    if (error instanceof TimeoutError) throw new UcmConnectionFailure(fullUrl, { cause: error });
    if (error instanceof ConnectionError) throw new UcmNotFoundError(fullUrl, { cause: error });
    throw error;
  }
}

/**
 * True when `<ucm>/axl/` answers 200 to these credentials; false when no
 * credentials are given or for any other status.
 */
export async function validateAxlAuth(
  ucm: string,
  username: string,
  password: string,
  port: number = 8443
): Promise<boolean> {
  if (!username || !password) return false;
  const axlUrl = joinUrl(generateProperUrl(ucm, port), "axl/");

  try {
    const response = await httpRequest({
      url: axlUrl,
      method: "GET",
      timeoutMs: AUTH_TIMEOUT_MS,
      credentials: { username, password },
    });
    return response.status === 200;
  } catch (error) {
    if (error instanceof AuthenticationError) throw new AxlInvalidCredentials(axlUrl, username);
    if (error instanceof TimeoutError) throw new AxlConnectionFailure(axlUrl, { cause: error });
    if (error instanceof ConnectionError) throw new AxlNotFoundError(axlUrl, { cause: error });
    throw error;
  }
}

function readVersion(xml: string): string | undefined {
  const parsed: unknown = xmlParser.parse(xml);
  const info = isPlainObject(parsed) ? parsed["versionInformation"] : undefined;
  if (!isPlainObject(info)) return undefined;
  const fromAttribute = info["@_version"];
  if (typeof fromAttribute === "string" && fromAttribute.trim()) return fromAttribute.trim();
  const fromElement = info["version"];
  if (typeof fromElement === "string" && fromElement.trim()) return fromElement.trim();
  return undefined;
}

/**
 * The server's version as `major.minor` (e.g. "14.0"), read from UDS
 * `/cucm-uds/version`. Throws UcmVersionError when no AXL schema of that
 * version is available under the schema directory.
 */
export async function getUcmVersion(
  ucmUrl: string,
  port: number = 8443,
  schemaDir: string = getClientConfig().schemaDir
): Promise<string> {
  const url = joinUrl(generateProperUrl(ucmUrl, port), "cucm-uds/version");

  let body: string;
  try {
    const response = await httpRequest({ url, method: "GET", timeoutMs: PROBE_TIMEOUT_MS });
    body = response.body;
  } catch (error) {
    throw new UdsConnectionError(url, { cause: error });
  }
  if (XMLValidator.validate(body) !== true) throw new UdsConnectionError(url);

  const rawVersion = readVersion(body);
  if (!rawVersion) throw new UdsParseError(url, "version", body);

  const concise = rawVersion.split(".").slice(0, 2).join(".");
  if (!listSchemaVersions("axl", schemaDir).includes(concise)) {
    throw new UcmVersionError(ucmUrl, concise);
  }
  return concise;
}
