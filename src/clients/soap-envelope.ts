/**
 * SOAP 1.1 envelope building and parsing.
 *
 * Requests are serialized from a verified payload in schema order: ABSENT
 * fields are left out, null becomes `xsi:nil`, attribute fields become XML
 * attributes and Dates are written in the field's date or dateTime form.
 * Responses are parsed with namespace prefixes removed, so the body of
 * `<ns:getPhoneResponse>` is found under `getPhoneResponse`.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { formatScalar } from "../schemas/coercion";
import {
  FieldSpec,
  OperationSchema,
  RequestPayload,
  RequestValue,
  isAbsent,
  isPlainObject,
} from "../schemas/field-spec";
import { VALUE_KEY } from "../schemas/signature-verifier";
import { RemoteFaultError, TransportError } from "../utils/errors";

// ── Constants ───────────────────────────────────────────────────────────────

export const SOAP_ENV_NAMESPACE = "http://schemas.xmlsoap.org/soap/envelope/";
const XSI_NAMESPACE = "http://www.w3.org/2001/XMLSchema-instance";

type XmlObject = Record<string, unknown>;

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  suppressEmptyNode: false,
  suppressBooleanAttributes: false,
  format: false,
});

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  removeNSPrefix: true,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

// ── Envelope builder ────────────────────────────────────────────────────────

export function buildEnvelope(
  schema: OperationSchema,
  payload: RequestPayload,
  fallbackNamespace: string = ""
): string {
  const namespace = schema.namespace ?? fallbackNamespace;
  const envelope: XmlObject = {
    "soapenv:Envelope": {
      "@_xmlns:soapenv": SOAP_ENV_NAMESPACE,
      "@_xmlns:ns": namespace,
      "@_xmlns:xsi": XSI_NAMESPACE,
      "soapenv:Header": "",
      "soapenv:Body": {
        [`ns:${schema.name}`]: serializeObject(schema.request.root, payload),
      },
    },
  };
  return `<?xml version="1.0" encoding="UTF-8"?>${xmlBuilder.build(envelope)}`;
}

function isText(value: unknown): value is string | number | boolean | Date {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  );
}

function serializeObject(field: FieldSpec, value: RequestPayload): XmlObject {
  const out: XmlObject = {};
  for (const child of field.children) {
    const member = value[child.name];
    if (member === undefined || isAbsent(member)) continue;

    if (child.attribute) {
      if (isText(member)) out[`@_${child.name}`] = formatScalar(member, child.type);
      continue;
    }

    out[child.name] = Array.isArray(member)
      ? member.map((item) => serializeValue(child, item))
      : serializeValue(child, member);
  }
  return out;
}

function serializeValue(field: FieldSpec, value: RequestValue): unknown {
  if (value === null) return { "@_xsi:nil": "true" };
  if (isAbsent(value)) return "";
  if (Array.isArray(value)) return value.map((item) => serializeValue(field, item));

  if (isPlainObject(value)) {
    const out = serializeObject(field, value);
    const text = value[VALUE_KEY];
    if (isText(text)) out["#text"] = formatScalar(text, field.type);
    return out;
  }
  return formatScalar(value, field.type);
}

// ── Response parser ─────────────────────────────────────────────────────────

function textOf(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (isPlainObject(value)) return textOf(value["#text"]);
  return String(value).trim();
}

function readFault(fault: XmlObject): RemoteFaultError {
  const detail = fault["detail"];
  const axlError = isPlainObject(detail) ? detail["axlError"] : undefined;
  let axlCode: number | undefined;
  if (isPlainObject(axlError)) {
    const code = Number(textOf(axlError["axlcode"]));
    if (Number.isFinite(code)) axlCode = code;
  }
  return new RemoteFaultError(
    textOf(fault["faultcode"]),
    textOf(fault["faultstring"]),
    detail === "" ? undefined : detail,
    axlCode
  );
}

/**
 * The `<operation>Response` content of a SOAP response. Throws
 * RemoteFaultError for a `<Fault>` body.
 */
export function parseEnvelope(xml: string, operation: string): unknown {
  if (XMLValidator.validate(xml) !== true) {
    throw new TransportError(`${operation}: response is not well-formed XML`);
  }

  const parsed: unknown = xmlParser.parse(xml);
  const envelope = isPlainObject(parsed) ? parsed["Envelope"] : undefined;
  const body = isPlainObject(envelope) ? envelope["Body"] : undefined;
  if (!isPlainObject(body)) {
    throw new TransportError(`${operation}: response has no SOAP Body`);
  }

  const fault = body["Fault"];
  if (isPlainObject(fault)) throw readFault(fault);

  const key = `${operation}Response`;
  if (!(key in body)) {
    throw new TransportError(`${operation}: SOAP Body has no <${key}> element`);
  }
  return body[key];
}

/** Fault carried by a response, if any; used for non-200 SOAP replies. */
export function findFault(xml: string): RemoteFaultError | undefined {
  if (XMLValidator.validate(xml) !== true) return undefined;
  const parsed: unknown = xmlParser.parse(xml);
  const envelope = isPlainObject(parsed) ? parsed["Envelope"] : undefined;
  const body = isPlainObject(envelope) ? envelope["Body"] : undefined;
  const fault = isPlainObject(body) ? body["Fault"] : undefined;
  return isPlainObject(fault) ? readFault(fault) : undefined;
}
