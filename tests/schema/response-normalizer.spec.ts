/**
 * Schema Tests — Response Normalizer
 *
 * Raw trees below have the shape fast-xml-parser produces for a SOAP
 * response (text values, `@_` attributes, `#text`) or that a JSON body has.
 */

import { ABSENT, OperationSchema } from "../../src/schemas/field-spec";
import { normalize } from "../../src/schemas/response-normalizer";
import { SchemaIndex } from "../../src/schemas/schema-index";
import { ResponseCoercionError, UnknownEnumValueError } from "../../src/utils/errors";
import { catchError, loadFixtureIndex } from "../../src/utils/test-helpers";

describe("Response Normalizer: AXL getPhone", () => {
  let getPhone: OperationSchema;

  beforeAll(async () => {
    getPhone = (await loadFixtureIndex("axl", "14.0")).lookup("getPhone", "14.0");
  });

  const rawPhone = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
    return: {
      phone: {
        "@_uuid": "{PHONE-1}",
        name: "SEP001122334455",
        model: "7841",
        maxNumCalls: "4",
        enableExtensionMobility: "true",
        devicePoolName: { "#text": "Default", "@_uuid": "{POOL-1}" },
        lines: {
          line: {
            "@_uuid": "{LINE-1}",
            index: "1",
            dirn: { pattern: "1000", routePartitionName: { "@_nil": "true" } },
          },
        },
        ...overrides,
      },
    },
  });

  test("should coerce values and fill every declared field", () => {
    expect(normalize(getPhone, rawPhone())).toEqual({
      return: {
        phone: {
          name: "SEP001122334455",
          description: ABSENT,
          model: "7841",
          protocol: ABSENT,
          devicePoolName: "Default",
          enableExtensionMobility: true,
          maxNumCalls: 4,
          lines: {
            line: [
              {
                index: 1,
                label: ABSENT,
                display: ABSENT,
                dirn: { pattern: "1000", routePartitionName: null },
                uuid: "{LINE-1}",
              },
            ],
          },
          uuid: "{PHONE-1}",
        },
      },
    });
  });

  test("should always return repeated fields as arrays", () => {
    const two = normalize(
      getPhone,
      rawPhone({ lines: { line: [{ index: "1" }, { index: "2" }] } })
    );
    expect(two).toMatchObject({ return: { phone: { lines: { line: [{ index: 1 }, { index: 2 }] } } } });
  });

  test("should ignore keys the schema does not declare", () => {
    const result = normalize(getPhone, rawPhone({ ownerUserName: "jdoe" }));
    expect(result).toMatchObject({ return: { phone: { name: "SEP001122334455" } } });
    expect(Object.keys(result)).toEqual(["return"]);
  });

  test("should read empty text as null for non-string types and keep it for strings", () => {
    const result = normalize(getPhone, rawPhone({ maxNumCalls: "", description: "" }));
    expect(result).toMatchObject({ return: { phone: { maxNumCalls: null, description: "" } } });
  });

  test("should trim surrounding whitespace", () => {
    const result = normalize(getPhone, rawPhone({ name: "  SEP001122334455 \n" }));
    expect(result).toMatchObject({ return: { phone: { name: "SEP001122334455" } } });
  });

  test("should raise UnknownEnumValueError for values outside the enum", () => {
    const error = catchError(() => normalize(getPhone, rawPhone({ model: "9999" })));
    expect(error).toBeInstanceOf(UnknownEnumValueError);
    expect(error).toHaveProperty(
      "message",
      "getPhone: server returned '9999' for 'return.phone.model', which is not one of the 2 known values"
    );
  });

  test("should raise ResponseCoercionError for text that is not a valid literal", () => {
    const error = catchError(() => normalize(getPhone, rawPhone({ maxNumCalls: "four" })));
    expect(error).toBeInstanceOf(ResponseCoercionError);
    expect(error).toHaveProperty(
      "message",
      "getPhone: 'return.phone.maxNumCalls' could not be read as int (got 'four')"
    );
  });

  test("should report the item index in paths of repeated fields", () => {
    const error = catchError(() =>
      normalize(getPhone, rawPhone({ lines: { line: [{ index: "1" }, { index: "x" }] } }))
    );
    expect(error).toHaveProperty("path", "return.phone.lines.line[1].index");
  });

  test("should treat an empty response as every field absent", () => {
    expect(normalize(getPhone, undefined)).toEqual({ return: ABSENT });
    expect(normalize(getPhone, "")).toEqual({ return: ABSENT });
  });

  test("should reject a response root that is not an object", () => {
    const error = catchError(() => normalize(getPhone, 5));
    expect(error).toHaveProperty("message", "getPhone: 'getPhoneResponse' could not be read as object (got number 5)");
  });

  test("should reject text where an object is declared", () => {
    const error = catchError(() => normalize(getPhone, { return: "oops" }));
    expect(error).toMatchObject({ path: "return", expected: "object", received: "'oops'" });
  });
});

describe("Response Normalizer: AXL listPhone", () => {
  let index: SchemaIndex;

  beforeAll(async () => {
    index = await loadFixtureIndex("axl", "14.0");
  });

  test("should wrap a single returned element in an array", () => {
    const listPhone = index.lookup("listPhone", "14.0");
    expect(normalize(listPhone, { return: { phone: { "@_uuid": "{PHONE-1}", name: "SEP001122334455" } } })).toEqual({
      return: {
        phone: [{ name: "SEP001122334455", description: ABSENT, model: ABSENT, uuid: "{PHONE-1}" }],
      },
    });
  });

  test("should leave an empty list result absent", () => {
    const listPhone = index.lookup("listPhone", "14.0");
    expect(normalize(listPhone, { return: "" })).toEqual({ return: { phone: ABSENT } });
  });
});

describe("Response Normalizer: JSON bodies", () => {
  let index: SchemaIndex;

  beforeAll(async () => {
    index = await loadFixtureIndex("cupi", "14.0");
  });

  test("should accept native JSON numbers and booleans", () => {
    const getUser = index.lookup("getUser", "14.0");
    const result = normalize(getUser, {
      ObjectId: "u-1",
      Alias: "jdoe",
      Language: 1033,
      IsVmEnrolled: false,
      CreationTime: "2024-01-15 08:30:00",
    });
    expect(result).toEqual({
      ObjectId: "u-1",
      Alias: "jdoe",
      FirstName: ABSENT,
      LastName: ABSENT,
      DisplayName: ABSENT,
      DtmfAccessId: ABSENT,
      EmailAddress: ABSENT,
      Language: 1033,
      IsVmEnrolled: false,
      CreationTime: new Date("2024-01-15T08:30:00Z"),
    });
  });

  test("should reject a native JSON number with a fraction for an int field", () => {
    const getUser = index.lookup("getUser", "14.0");
    const error = catchError(() => normalize(getUser, { ObjectId: "u-1", Language: 10.5 }));
    expect(error).toBeInstanceOf(ResponseCoercionError);
    expect(error).toHaveProperty("message", "getUser: 'Language' could not be read as int (got number 10.5)");
  });

  test("should reject int values beyond the safe integer range", () => {
    const getUser = index.lookup("getUser", "14.0");
    expect(() => normalize(getUser, { ObjectId: "u-1", Language: 2 ** 53 })).toThrow(ResponseCoercionError);
    expect(() => normalize(getUser, { ObjectId: "u-1", Language: "99999999999999999999" })).toThrow(
      "getUser: 'Language' could not be read as int (got '99999999999999999999')"
    );
  });

  test("should coerce textual numbers and booleans", () => {
    const listUsers = index.lookup("listUsers", "14.0");
    const result = normalize(listUsers, {
      "@total": "1",
      User: { ObjectId: "u-1", Alias: "jdoe", IsVmEnrolled: "true" },
    });
    expect(result).toEqual({
      "@total": 1,
      User: [
        {
          ObjectId: "u-1",
          Alias: "jdoe",
          DisplayName: ABSENT,
          DtmfAccessId: ABSENT,
          IsVmEnrolled: true,
        },
      ],
    });
  });

  test("should turn JSON null into null", () => {
    const getUser = index.lookup("getUser", "14.0");
    expect(normalize(getUser, { ObjectId: "u-1", EmailAddress: null })).toMatchObject({
      ObjectId: "u-1",
      EmailAddress: null,
    });
  });
});
