import { describe, expect, it } from "vitest";
import { fromTypeName, toCanonical, typeNameForOid } from "./postgres-types.js";
import { NULL_VALUE, num, text } from "./values.js";

describe("fromTypeName", () => {
  it("maps aliases case-insensitively", () => {
    expect(fromTypeName("int4")).toBe("Integer");
    expect(fromTypeName("character varying")).toBe("Varchar");
    expect(fromTypeName(" TIMESTAMPTZ ")).toBe("TimestampTz");
  });

  it("recognises array types", () => {
    expect(fromTypeName("_int4")).toBe("Array");
    expect(fromTypeName("text[]")).toBe("Array");
  });

  it("falls back to Unknown", () => {
    expect(fromTypeName("geometry")).toBe("Unknown");
    expect(fromTypeName(typeNameForOid(99999))).toBe("Unknown");
  });
});

describe("typeNameForOid", () => {
  it("names builtin oids", () => {
    expect(typeNameForOid(23)).toBe("INT4");
    expect(typeNameForOid(3802)).toBe("JSONB");
    expect(typeNameForOid(99999)).toBe("OID(99999)");
  });
});

describe("toCanonical", () => {
  it("bounds integers by column width", () => {
    expect(toCanonical("SmallInt", 40000)).toEqual(NULL_VALUE);
    expect(toCanonical("Integer", 42)).toEqual(num(42));
    expect(toCanonical("BigInt", "9223372036854775807")).toEqual(text("9223372036854775807"));
    expect(toCanonical("BigInt", "9223372036854775808")).toEqual(NULL_VALUE);
  });

  it("keeps numeric and money values as text", () => {
    expect(toCanonical("Decimal", "10.50")).toEqual(text("10.50"));
    expect(toCanonical("Money", "$1,000.00")).toEqual(text("$1,000.00"));
  });

  it("formats dates without a time part", () => {
    expect(toCanonical("Date", new Date(Date.UTC(2024, 4, 6)))).toEqual(text("2024-05-06"));
    expect(toCanonical("Date", "2024-05-06")).toEqual(text("2024-05-06"));
  });

  it("renders interval objects", () => {
    expect(toCanonical("Interval", { days: 3, hours: 4, minutes: 5 })).toEqual(text("3 days 04:05:00"));
    expect(toCanonical("Interval", { months: 1 })).toEqual(text("1 month"));
    expect(toCanonical("Interval", {})).toEqual(text("00:00:00"));
  });

  it("decodes json and bytea", () => {
    expect(toCanonical("Jsonb", { a: 1 })).toEqual({ kind: "object", entries: [["a", num(1)]] });
    expect(toCanonical("Bytea", Buffer.from("hi"))).toEqual(text("aGk="));
  });

  it("returns null for null input", () => {
    expect(toCanonical("Text", null)).toEqual(NULL_VALUE);
  });
});
