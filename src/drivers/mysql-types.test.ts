import { describe, expect, it } from "vitest";
import { fromTypeName, isUnsignedTypeName, toCanonical, typeNameForCode } from "./mysql-types.js";
import { NULL_VALUE, num, text } from "./values.js";

describe("fromTypeName", () => {
  it("accepts DESCRIBE column types", () => {
    expect(fromTypeName("int(11) unsigned")).toBe("Int");
    expect(fromTypeName("enum('a','b')")).toBe("Enum");
    expect(fromTypeName("varchar(255)")).toBe("Varchar");
    expect(fromTypeName("double precision")).toBe("Double");
    expect(fromTypeName("geometry")).toBe("Unknown");
  });

  it("detects unsigned columns", () => {
    expect(isUnsignedTypeName("bigint(20) unsigned")).toBe(true);
    expect(isUnsignedTypeName("bigint(20)")).toBe(false);
  });
});

describe("typeNameForCode", () => {
  it("tells text from blob by character set", () => {
    expect(typeNameForCode(252, 33)).toBe("TEXT");
    expect(typeNameForCode(252, 63)).toBe("BLOB");
    expect(typeNameForCode(253, 63)).toBe("VARBINARY");
    expect(typeNameForCode(254, 63)).toBe("BINARY");
    expect(typeNameForCode(253, 33)).toBe("VARCHAR");
  });

  it("names unknown codes", () => {
    expect(typeNameForCode(undefined)).toBe("UNKNOWN");
    expect(typeNameForCode(999)).toBe("TYPE(999)");
  });
});

describe("toCanonical", () => {
  it("applies the unsigned range", () => {
    expect(toCanonical("TinyInt", 200)).toEqual(NULL_VALUE);
    expect(toCanonical("TinyInt", 200, true)).toEqual(num(200));
    expect(toCanonical("BigInt", "18446744073709551615", true)).toEqual(text("18446744073709551615"));
    expect(toCanonical("MediumInt", 8388608)).toEqual(NULL_VALUE);
  });

  it("decodes years, decimals and binaries", () => {
    expect(toCanonical("Year", 2024)).toEqual(num(2024));
    expect(toCanonical("Decimal", "99.90")).toEqual(text("99.90"));
    expect(toCanonical("Varbinary", Buffer.from([0xff]))).toEqual(text("/w=="));
  });

  it("keeps date strings from dateStrings mode", () => {
    expect(toCanonical("DateTime", "2024-05-06 07:08:09")).toEqual(text("2024-05-06 07:08:09"));
    expect(toCanonical("Date", "2024-05-06")).toEqual(text("2024-05-06"));
  });

  it("falls back to text", () => {
    expect(toCanonical("Enum", "small")).toEqual(text("small"));
    expect(toCanonical("Text", Buffer.from("plain"))).toEqual(text("plain"));
  });
});
