import {
  NULL_VALUE,
  decodeBinary,
  decodeBoolean,
  decodeDecimal,
  decodeFloat,
  decodeInteger,
  decodeJson,
  decodeTemporal,
  decodeText,
  type CanonicalValue,
} from "./values.js";

export type PostgresCategory =
  | "SmallInt"
  | "Integer"
  | "BigInt"
  | "Decimal"
  | "Real"
  | "DoublePrecision"
  | "Serial"
  | "BigSerial"
  | "Char"
  | "Varchar"
  | "Text"
  | "Bytea"
  | "Date"
  | "Time"
  | "Timestamp"
  | "TimestampTz"
  | "Interval"
  | "Boolean"
  | "Uuid"
  | "Json"
  | "Jsonb"
  | "Array"
  | "Inet"
  | "Cidr"
  | "MacAddr"
  | "Point"
  | "Line"
  | "Circle"
  | "Box"
  | "Money"
  | "Unknown";

const BY_NAME: Record<string, PostgresCategory> = {
  INT2: "SmallInt",
  SMALLINT: "SmallInt",
  INT4: "Integer",
  INTEGER: "Integer",
  INT: "Integer",
  INT8: "BigInt",
  BIGINT: "BigInt",
  NUMERIC: "Decimal",
  DECIMAL: "Decimal",
  REAL: "Real",
  FLOAT4: "Real",
  "DOUBLE PRECISION": "DoublePrecision",
  FLOAT8: "DoublePrecision",
  SERIAL: "Serial",
  SERIAL4: "Serial",
  BIGSERIAL: "BigSerial",
  SERIAL8: "BigSerial",
  CHAR: "Char",
  CHARACTER: "Char",
  BPCHAR: "Char",
  VARCHAR: "Varchar",
  "CHARACTER VARYING": "Varchar",
  TEXT: "Text",
  NAME: "Text",
  BYTEA: "Bytea",
  DATE: "Date",
  TIME: "Time",
  "TIME WITHOUT TIME ZONE": "Time",
  TIMETZ: "Time",
  TIMESTAMP: "Timestamp",
  "TIMESTAMP WITHOUT TIME ZONE": "Timestamp",
  TIMESTAMPTZ: "TimestampTz",
  "TIMESTAMP WITH TIME ZONE": "TimestampTz",
  INTERVAL: "Interval",
  BOOLEAN: "Boolean",
  BOOL: "Boolean",
  UUID: "Uuid",
  JSON: "Json",
  JSONB: "Jsonb",
  ARRAY: "Array",
  INET: "Inet",
  CIDR: "Cidr",
  MACADDR: "MacAddr",
  POINT: "Point",
  LINE: "Line",
  CIRCLE: "Circle",
  BOX: "Box",
  MONEY: "Money",
};

export function fromTypeName(name: string): PostgresCategory {
  const upper = name.trim().toUpperCase();
  if (upper.startsWith("_") || upper.endsWith("[]")) return "Array";
  return BY_NAME[upper] ?? "Unknown";
}

/**
 * Type names for the builtin OIDs reported in `FieldDef.dataTypeID`.
 * Anything missing resolves to `OID(<n>)`, which maps to `Unknown`.
 */
const OID_NAMES: Record<number, string> = {
  16: "BOOL",
  17: "BYTEA",
  18: "CHAR",
  19: "NAME",
  20: "INT8",
  21: "INT2",
  23: "INT4",
  25: "TEXT",
  114: "JSON",
  650: "CIDR",
  700: "FLOAT4",
  701: "FLOAT8",
  718: "CIRCLE",
  790: "MONEY",
  829: "MACADDR",
  869: "INET",
  600: "POINT",
  603: "BOX",
  628: "LINE",
  1000: "_BOOL",
  1005: "_INT2",
  1007: "_INT4",
  1009: "_TEXT",
  1016: "_INT8",
  1042: "BPCHAR",
  1043: "VARCHAR",
  1082: "DATE",
  1083: "TIME",
  1114: "TIMESTAMP",
  1184: "TIMESTAMPTZ",
  1186: "INTERVAL",
  1266: "TIMETZ",
  1700: "NUMERIC",
  2950: "UUID",
  3802: "JSONB",
};

export function typeNameForOid(oid: number): string {
  return OID_NAMES[oid] ?? `OID(${oid})`;
}

/** Decode one value as produced by `pg` for a column of `category`. */
export function toCanonical(category: PostgresCategory, raw: unknown): CanonicalValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  switch (category) {
    case "SmallInt":
      return decodeInteger(raw, 16);
    case "Integer":
    case "Serial":
      return decodeInteger(raw, 32);
    case "BigInt":
    case "BigSerial":
      return decodeInteger(raw, 64);
    case "Decimal":
      return decodeDecimal(raw);
    case "Real":
    case "DoublePrecision":
      return decodeFloat(raw);
    case "Boolean":
      return decodeBoolean(raw);
    case "Date":
      return decodeTemporal(raw, "date");
    case "Time":
    case "Timestamp":
    case "TimestampTz":
      return decodeTemporal(raw);
    case "Json":
    case "Jsonb":
      return decodeJson(raw);
    case "Bytea":
      return decodeBinary(raw);
    case "Interval":
      return typeof raw === "object" ? decodeInterval(raw) : decodeText(raw);
    default:
      return decodeText(raw);
  }
}

/** `pg` hands intervals over as `{ days, hours, ... }`; render them like psql. */
function decodeInterval(raw: object): CanonicalValue {
  if (raw instanceof Uint8Array || Array.isArray(raw)) return decodeText(raw);
  const parts = new Map<string, number>();
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "number") parts.set(key, value);
  }
  const out: string[] = [];
  for (const unit of ["years", "months", "days"] as const) {
    const n = parts.get(unit);
    if (n) out.push(`${n} ${n === 1 ? unit.slice(0, -1) : unit}`);
  }
  const h = parts.get("hours") ?? 0;
  const m = parts.get("minutes") ?? 0;
  const s = parts.get("seconds") ?? 0;
  const ms = parts.get("milliseconds") ?? 0;
  if (h || m || s || ms || out.length === 0) {
    const time = [h, m, s].map((n) => String(Math.abs(n)).padStart(2, "0")).join(":");
    const sign = h < 0 || m < 0 || s < 0 ? "-" : "";
    out.push(`${sign}${time}${ms ? `.${String(Math.abs(ms)).padStart(3, "0")}` : ""}`);
  }
  return { kind: "text", value: out.join(" ") };
}
