/**
 * Contract Tests — SOAP envelopes sent to and read from AXL
 *
 * Verifies the wire shape of requests built from verified payloads, and
 * that responses and faults are read back the way the server sends them.
 */

import { ABSENT, OperationSchema } from "../../src/schemas/field-spec";
import { assertValid } from "../../src/schemas/signature-verifier";
import { SchemaIndex } from "../../src/schemas/schema-index";
import { buildEnvelope, findFault, parseEnvelope } from "../../src/clients/soap-envelope";
import { RemoteFaultError, TransportError } from "../../src/utils/errors";
import {
  catchError,
  createSampleLine,
  createSamplePhoneArgs,
  loadFixtureIndex,
  soapEnvelope,
  soapFault,
} from "../../src/utils/test-helpers";

describe("SOAP Contract: request envelopes", () => {
  let index: SchemaIndex;
  let addPhone: OperationSchema;

  beforeAll(async () => {
    index = await loadFixtureIndex("axl", "14.0");
    addPhone = index.lookup("addPhone", "14.0");
  });

  test("should declare the envelope, operation and xsi namespaces", () => {
    const xml = buildEnvelope(addPhone, assertValid(addPhone, createSamplePhoneArgs()));
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?><soapenv:Envelope ')).toBe(true);
    expect(xml).toContain('xmlns:soapenv="http://schemas.xmlsoap.org/soap/envelope/"');
    expect(xml).toContain('xmlns:ns="http://www.cisco.com/AXL/API/14.0"');
    expect(xml).toContain('xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"');
  });

  test("should serialize fields in schema order and leave absent ones out", () => {
    const xml = buildEnvelope(addPhone, assertValid(addPhone, createSamplePhoneArgs()));
    expect(xml).toContain(
      "<soapenv:Body><ns:addPhone><phone>" +
        "<name>SEP001122334455</name><model>7841</model><protocol>SIP</protocol><maxNumCalls>4</maxNumCalls>" +
        "</phone></ns:addPhone></soapenv:Body>"
    );
  });

  test("should write attributes, simple content text and xsi:nil", () => {
    const payload = assertValid(
      addPhone,
      createSamplePhoneArgs({
        devicePoolName: { _value: "Default", uuid: "{POOL-1}" },
        lines: {
          line: [{ ...createSampleLine(1, "1000"), dirn: { pattern: "1000", routePartitionName: null } }],
        },
      })
    );
    const xml = buildEnvelope(addPhone, payload);
    expect(xml).toContain('<devicePoolName uuid="{POOL-1}">Default</devicePoolName>');
    expect(xml).toContain(
      '<lines><line><index>1</index><dirn><pattern>1000</pattern><routePartitionName xsi:nil="true"></routePartitionName></dirn></line></lines>'
    );
  });

  test("should repeat elements of a list", () => {
    const payload = assertValid(
      addPhone,
      createSamplePhoneArgs({ lines: { line: [createSampleLine(1, "1000"), createSampleLine(2, "1001")] } })
    );
    const xml = buildEnvelope(addPhone, payload);
    expect(xml).toContain(
      "<lines><line><index>1</index><dirn><pattern>1000</pattern></dirn></line>" +
        "<line><index>2</index><dirn><pattern>1001</pattern></dirn></line></lines>"
    );
  });

  test("should fall back to the given namespace when the schema declares none", () => {
    const bare = new SchemaIndex("axl").load(
      { format: "description", document: { operations: { doStatus: { request: [{ name: "id", type: "string" }] } } } },
      "1"
    );
    const schema = bare.lookup("doStatus", "1");
    const xml = buildEnvelope(schema, { id: ABSENT }, "urn:fallback");
    expect(xml).toContain('xmlns:ns="urn:fallback"');
    expect(xml).toContain("<ns:doStatus></ns:doStatus>");
  });
});

describe("SOAP Contract: responses", () => {
  test("should return the <operation>Response content with prefixes removed", () => {
    const xml = soapEnvelope(
      '<ns:getPhoneResponse xmlns:ns="http://www.cisco.com/AXL/API/14.0">' +
        '<return><phone uuid="{PHONE-1}"><name>SEP001122334455</name><maxNumCalls>4</maxNumCalls></phone></return>' +
        "</ns:getPhoneResponse>"
    );
    expect(parseEnvelope(xml, "getPhone")).toMatchObject({
      return: { phone: { "@_uuid": "{PHONE-1}", name: "SEP001122334455", maxNumCalls: "4" } },
    });
  });

  test("should return an empty string for an empty response element", () => {
    expect(parseEnvelope(soapEnvelope("<removePhoneResponse/>"), "removePhone")).toBe("");
  });

  test("should raise the SOAP fault with its AXL error code", () => {
    const error = catchError(() =>
      parseEnvelope(soapFault("Item not valid: The specified Phone was not found", 5007), "getPhone")
    );
    expect(error).toBeInstanceOf(RemoteFaultError);
    expect(error).toMatchObject({
      faultCode: "soapenv:Server",
      faultString: "Item not valid: The specified Phone was not found",
      axlCode: 5007,
      message: "Item not valid: The specified Phone was not found",
    });
  });

  test("should leave axlCode undefined for faults without AXL detail", () => {
    const fault = findFault(soapFault("Server busy"));
    expect(fault?.faultString).toBe("Server busy");
    expect(fault?.axlCode).toBeUndefined();
    expect(fault?.detail).toBeUndefined();
  });

  test("should reject a body without the expected response element", () => {
    const error = catchError(() => parseEnvelope(soapEnvelope("<otherResponse/>"), "getPhone"));
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty("message", "getPhone: SOAP Body has no <getPhoneResponse> element");
  });

  test("should reject responses that are not SOAP envelopes", () => {
    expect(() => parseEnvelope("<html><body>Service Unavailable", "getPhone")).toThrow(
      "getPhone: response is not well-formed XML"
    );
    expect(() => parseEnvelope("<status>ok</status>", "getPhone")).toThrow("getPhone: response has no SOAP Body");
    expect(findFault("not xml")).toBeUndefined();
  });
});
