/**
 * Virtual Integration Test — AXL facade
 *
 * Runs the full call path (verify → SOAP → normalize) against an in-memory
 * transport and against a stubbed `fetch`. No CUCM is needed.
 *
 * Use case: "Re-provision a phone"
 *   1. getPhone returns a phone with its lines
 *   2. the returned phone is submitted unchanged to addPhone
 */

import { AxlClient } from "../../../src/clients/axl-client";
import { ABSENT, isPlainObject } from "../../../src/schemas/field-spec";
import { SchemaIndex } from "../../../src/schemas/schema-index";
import { resetSchemaRegistry } from "../../../src/schemas/schema-registry";
import { resetClientConfig } from "../../../src/utils/config";
import {
  AuthenticationError,
  ConnectionError,
  HttpStatusError,
  RemoteFaultError,
  TimeoutError,
  TransportError,
  TypeMismatchError,
  UnknownOperationError,
} from "../../../src/utils/errors";
import {
  FIXTURE_SCHEMA_DIR,
  FakeTransport,
  catchAsyncError,
  createSamplePhoneArgs,
  loadFixtureIndex,
  requestHeader,
  soapEnvelope,
  soapFault,
  xmlResponse,
} from "../../../src/utils/test-helpers";

const HOST = "cucm.example.test";
const AXL_URL = "https://cucm.example.test:8443/axl/";

const RAW_PHONE = {
  "@_uuid": "{PHONE-1}",
  name: "SEP001122334455",
  model: "7841",
  protocol: "SIP",
  devicePoolName: { "#text": "Default", "@_uuid": "{POOL-1}" },
  maxNumCalls: "4",
  lines: {
    line: {
      "@_uuid": "{LINE-1}",
      index: "1",
      dirn: { pattern: "1000", routePartitionName: { "@_nil": "true" } },
    },
  },
};

describe("AXL Virtual Integration: call path", () => {
  let index: SchemaIndex;
  let transport: FakeTransport;
  let axl: AxlClient;

  beforeAll(async () => {
    index = await loadFixtureIndex("axl", "14.0");
  });

  beforeEach(() => {
    transport = new FakeTransport();
    axl = new AxlClient({
      host: HOST,
      username: "axl-user",
      password: "test-secret",
      apiVersion: "14.0",
      index,
      transport,
    });
  });

  test("should expose one callable per operation of the version", () => {
    expect(Object.keys(axl.operations)).toEqual(["addPhone", "getPhone", "listPhone", "removePhone"]);
    expect(axl.url).toBe(AXL_URL);
  });

  test("should reject invalid arguments before the transport is touched", async () => {
    const error = await catchAsyncError(() => axl.operations.addPhone(createSamplePhoneArgs({ model: "9999" })));
    expect(error).toBeInstanceOf(TypeMismatchError);
    expect(transport.calls).toEqual([]);
  });

  test("should raise UnknownOperationError for operations outside the version", async () => {
    await expect(axl.call("getCCMVersion")).rejects.toThrow(UnknownOperationError);
    expect(transport.calls).toEqual([]);
  });

  test("should request only the tags named in the call options", async () => {
    transport.reply({ return: { phone: { name: "SEP001122334455", model: "7841" } } });
    await axl.operations.getPhone({ name: "SEP001122334455" }, { returnedTags: ["name", "model"] });

    expect(transport.calls[0]).toEqual({
      operation: "getPhone",
      apiVersion: "14.0",
      payload: { name: "SEP001122334455", uuid: ABSENT, returnedTags: { name: "", model: "" } },
    });
  });

  test("should request every tag when none are named", async () => {
    transport.reply({ return: { phone: RAW_PHONE } });
    await axl.operations.getPhone({ uuid: "{PHONE-1}" });

    const payload = transport.calls[0].payload;
    expect(isPlainObject(payload.returnedTags) && Object.keys(payload.returnedTags)).toEqual([
      "name",
      "description",
      "model",
      "protocol",
      "devicePoolName",
      "enableExtensionMobility",
      "maxNumCalls",
      "lines",
    ]);
  });

  test("should keep returnedTags the caller passed as an argument", async () => {
    await axl.operations.getPhone({ name: "SEP001122334455", returnedTags: { name: "" } });
    expect(transport.calls[0].payload.returnedTags).toMatchObject({ name: "", model: ABSENT });
  });

  test("should fill a required returnedTags element for list operations", async () => {
    transport.reply({ return: { phone: [{ name: "SEP001122334455" }, { name: "SEP001122334466" }] } });
    const result = await axl.operations.listPhone({ searchCriteria: { name: "SEP%" } });

    expect(transport.calls[0].payload).toEqual({
      searchCriteria: { name: "SEP%", description: ABSENT },
      returnedTags: { name: "", description: "", model: "" },
      skip: ABSENT,
      first: ABSENT,
    });
    expect(result).toMatchObject({
      return: { phone: [{ name: "SEP001122334455" }, { name: "SEP001122334466" }] },
    });
  });

  test("should accept a normalized getPhone result as addPhone input", async () => {
    transport.reply({ return: { phone: RAW_PHONE } }).reply({ return: "{NEW-PHONE}" });

    const found = await axl.operations.getPhone({ name: "SEP001122334455" });
    const ret = found["return"];
    const phone = isPlainObject(ret) ? ret["phone"] : undefined;
    expect(phone).toMatchObject({ devicePoolName: "Default", maxNumCalls: 4, uuid: "{PHONE-1}" });

    const added = await axl.operations.addPhone({ phone });
    expect(added).toEqual({ return: "{NEW-PHONE}" });
    expect(transport.calls[1].payload.phone).toMatchObject({
      lines: { line: [{ index: 1, dirn: { pattern: "1000", routePartitionName: null }, uuid: "{LINE-1}" }] },
    });
  });

  test("should attach call context to transport failures", async () => {
    transport.fail(new RemoteFaultError("soapenv:Server", "Item not valid", undefined, 5007));
    const error = await catchAsyncError(() => axl.operations.removePhone({ name: "SEP001122334455" }));

    expect(error).toBeInstanceOf(RemoteFaultError);
    expect(error).toMatchObject({
      axlCode: 5007,
      context: { operation: "removePhone", apiVersion: "14.0", requestId: expect.any(String) },
    });
  });

  test("should wrap unclassified failures in TransportError", async () => {
    transport.fail(new Error("socket hang up"));
    const error = await catchAsyncError(() => axl.operations.removePhone({ name: "SEP001122334455" }));

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty("message", "removePhone failed: socket hang up");
    expect(error).toHaveProperty("cause", new Error("socket hang up"));
  });

  test("should give every call its own request id", async () => {
    transport.fail(new Error("first")).fail(new Error("second"));
    const first = await catchAsyncError(() => axl.operations.removePhone({ name: "a" }));
    const second = await catchAsyncError(() => axl.operations.removePhone({ name: "b" }));

    const idOf = (error: unknown): unknown =>
      error instanceof TransportError ? error.context?.requestId : undefined;
    expect(idOf(first)).toEqual(expect.any(String));
    expect(idOf(first)).not.toBe(idOf(second));
  });
});

describe("AXL Virtual Integration: SOAP over HTTP", () => {
  let index: SchemaIndex;
  let axl: AxlClient;
  let fetchMock: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeAll(async () => {
    index = await loadFixtureIndex("axl", "14.0");
  });

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, "fetch");
    axl = new AxlClient({
      host: HOST,
      username: "axl-user",
      password: "test-secret",
      apiVersion: "14.0",
      index,
      timeoutMs: 1_000,
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should POST the envelope with AXL headers", async () => {
    fetchMock.mockResolvedValueOnce(
      xmlResponse(
        soapEnvelope(
          '<ns:getPhoneResponse xmlns:ns="http://www.cisco.com/AXL/API/14.0">' +
            "<return><phone><name>SEP001122334455</name></phone></return></ns:getPhoneResponse>"
        )
      )
    );

    const result = await axl.operations.getPhone({ name: "SEP001122334455" }, { returnedTags: ["name"] });

    expect(result).toMatchObject({ return: { phone: { name: "SEP001122334455", model: ABSENT } } });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(AXL_URL);
    expect(init?.method).toBe("POST");
    expect(requestHeader(init, "SOAPAction")).toBe('"CUCM:DB ver=14.0 getPhone"');
    expect(requestHeader(init, "Content-Type")).toBe("text/xml; charset=utf-8");
    expect(requestHeader(init, "Authorization")).toBe(
      `Basic ${Buffer.from("axl-user:test-secret").toString("base64")}`
    );
    expect(String(init?.body)).toContain(
      "<ns:getPhone><name>SEP001122334455</name><returnedTags><name></name></returnedTags></ns:getPhone>"
    );
  });

  test("should raise the SOAP fault of an HTTP 500 reply", async () => {
    fetchMock.mockResolvedValueOnce(xmlResponse(soapFault("Item not valid: The specified Phone was not found", 5007), 500));
    const error = await catchAsyncError(() => axl.operations.getPhone({ name: "SEP000000000000" }));

    expect(error).toBeInstanceOf(RemoteFaultError);
    expect(error).toMatchObject({ axlCode: 5007, context: { operation: "getPhone" } });
  });

  test("should raise HttpStatusError for other failed replies", async () => {
    fetchMock.mockResolvedValueOnce(xmlResponse("Service Unavailable", 503));
    const error = await catchAsyncError(() => axl.operations.getPhone({ name: "SEP001122334455" }));

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 503, url: AXL_URL, body: "Service Unavailable" });
  });

  test("should raise AuthenticationError for HTTP 401", async () => {
    fetchMock.mockResolvedValueOnce(xmlResponse("", 401));
    const error = await catchAsyncError(() => axl.operations.getPhone({ name: "SEP001122334455" }));

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toHaveProperty("message", `Credentials not accepted for axl-user at ${AXL_URL}`);
  });

  test("should raise ConnectionError when the host cannot be reached", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(axl.operations.getPhone({ name: "SEP001122334455" })).rejects.toThrow(ConnectionError);
  });

  test("should raise TimeoutError when the server does not answer in time", async () => {
    const slow = new AxlClient({
      host: HOST,
      username: "axl-user",
      password: "test-secret",
      apiVersion: "14.0",
      index,
      timeoutMs: 5,
    });
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    const error = await catchAsyncError(() => slow.operations.getPhone({ name: "SEP001122334455" }));
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty("message", `Request to ${AXL_URL} timed out after 5ms`);
  });
});

describe("AXL Virtual Integration: connect", () => {
  const saved = { ...process.env };

  beforeEach(() => {
    process.env.CUCM_HOST = HOST;
    process.env.CUCM_USERNAME = "axl-user";
    process.env.CUCM_PASSWORD = "test-secret";
    process.env.CUCM_SCHEMA_DIR = FIXTURE_SCHEMA_DIR;
    delete process.env.CUCM_API_VERSION;
    resetClientConfig();
    resetSchemaRegistry();
  });

  afterEach(() => {
    process.env = { ...saved };
    resetClientConfig();
    resetSchemaRegistry();
    jest.restoreAllMocks();
  });

  test("should pick the schema version the server reports", async () => {
    const fetchMock = jest
      .spyOn(globalThis, "fetch")
      .mockResolvedValueOnce(xmlResponse('<versionInformation version="12.5.1.11900-146"/>'));

    const axl = await AxlClient.connect();

    expect(fetchMock.mock.calls[0][0]).toBe("https://cucm.example.test:8443/cucm-uds/version");
    expect(axl.apiVersion).toBe("12.5");
    expect(Object.keys(axl.operations)).toContain("getCCMVersion");
  });

  test("should use CUCM_API_VERSION without asking the server", async () => {
    process.env.CUCM_API_VERSION = "14.0";
    resetClientConfig();
    const fetchMock = jest.spyOn(globalThis, "fetch");

    const axl = await AxlClient.connect();

    expect(fetchMock).not.toHaveBeenCalled();
    expect(axl.apiVersion).toBe("14.0");
    expect(axl.url).toBe(AXL_URL);
  });
});
