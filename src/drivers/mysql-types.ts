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

export type MysqlCategory =
  | "TinyInt"
  | "SmallInt"
  | "MediumInt"
  | "Int"
  | "BigInt"
  | "Decimal"
  | "Float"
  | "Double"
  | "Char"
  | "Varchar"
  | "TinyText"
  | "Text"
  | "MediumText"
  | "LongText"
  | "Date"
  | "Time"
  | "Year"
  | "DateTime"
  | "Timestamp"
  | "Binary"
  | "Varbinary"
  | "TinyBlob"
  | "Blob"
  | "MediumBlob"
  | "LongBlob"
  | "Json"
  | "Boolean"
  | "Enum"
  | "Set"
  | "Unknown";

const BY_NAME: Record<string, MysqlCategory> = {
  TINYINT: "TinyInt",
  SMALLINT: "SmallInt",
  MEDIUMINT: "MediumInt",
  INT: "Int",
  INTEGER: "Int",
  BIGINT: "BigInt",
  DECIMAL: "Decimal",
  DEC: "Decimal",
  NUMERIC: "Decimal",
  FLOAT: "Float",
  DOUBLE: "Double",
  "DOUBLE PRECISION": "Double",
  REAL: "Double",
  CHAR: "Char",
  VARCHAR: "Varchar",
  TINYTEXT: "TinyText",
  TEXT: "Text",
  MEDIUMTEXT: "MediumText",
  LONGTEXT: "LongText",
  DATE: "Date",
  TIME: "Time",
  YEAR: "Year",
  DATETIME: "DateTime",
  TIMESTAMP: "Timestamp",
  BINARY: "Binary",
  VARBINARY: "Varbinary",
  TINYBLOB: "TinyBlob",
  BLOB: "Blob",
  MEDIUMBLOB: "MediumBlob",
  LONGBLOB: "LongBlob",
  JSON: "Json",
  BOOLEAN: "Boolean",
  BOOL: "Boolean",
  ENUM: "Enum",
  SET: "Set",
};

/**
 * Accepts bare names ("INT") as well as column definitions from DESCRIBE
 * ("int(11) unsigned", "enum('a','b')").
 */
export function fromTypeName(name: string): MysqlCategory {
  const base = name.trim().toUpperCase().replace(/\(.*$/, "").replace(/\s+(UNSIGNED|SIGNED|ZEROFILL).*$/, "");
  return BY_NAME[base] ?? "Unknown";
}

export function isUnsignedTypeName(name: string): boolean {
  return /\bunsigned\b/i.test(name);
}

/** Character set id the server reports for binary (non-text) columns. */
export const BINARY_CHARSET = 63;

/** Wire protocol column type codes, as found in `FieldPacket.type`. */
const TYPE_CODE_NAMES: Record<number, string> = {
  0: "DECIMAL",
  1: "TINYINT",
  2: "SMALLINT",
  3: "INT",
  4: "FLOAT",
  5: "DOUBLE",
  7: "TIMESTAMP",
  8: "BIGINT",
  9: "MEDIUMINT",
  10: "DATE",
  11: "TIME",
  12: "DATETIME",
  13: "YEAR",
  14: "DATE",
  15: "VARCHAR",
  16: "BIT",
  245: "JSON",
  246: "DECIMAL",
  247: "ENUM",
  248: "SET",
  249: "TINYBLOB",
  250: "MEDIUMBLOB",
  251: "LONGBLOB",
  252: "BLOB",
  253: "VARCHAR",
  254: "CHAR",
  255: "GEOMETRY",
};

const BLOB_AS_TEXT: Record<string, string> = {
  TINYBLOB: "TINYTEXT",
  BLOB: "TEXT",
  MEDIUMBLOB: "MEDIUMTEXT",
  LONGBLOB: "LONGTEXT",
};

/**
 * Resolves a protocol type code to a type name. TEXT columns travel as BLOB
 * codes and are told apart by their character set.
 */
export function typeNameForCode(code: number | undefined, characterSet?: number): string {
  if (code === undefined) return "UNKNOWN";
  const name = TYPE_CODE_NAMES[code] ?? `TYPE(${code})`;
  if (characterSet !== undefined && characterSet !== BINARY_CHARSET) {
    const textName = BLOB_AS_TEXT[name];
    if (textName) return textName;
  }
  if (characterSet === BINARY_CHARSET && (name === "VARCHAR" || name === "CHAR")) {
    return name === "VARCHAR" ? "VARBINARY" : "BINARY";
  }
  return name;
}

/** Decode one value as produced by `mysql2` for a column of `category`. */
export function toCanonical(category: MysqlCategory, raw: unknown, unsigned = false): CanonicalValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  switch (category) {
    case "TinyInt":
      return decodeInteger(raw, 8, unsigned);
    case "SmallInt":
      return decodeInteger(raw, 16, unsigned);
    case "MediumInt":
      return decodeInteger(raw, 24, unsigned);
    case "Int":
      return decodeInteger(raw, 32, unsigned);
    case "BigInt":
      return decodeInteger(raw, 64, unsigned);
    case "Year":
      return decodeInteger(raw, 16, true);
    case "Decimal":
      return decodeDecimal(raw);
    case "Float":
    case "Double":
      return decodeFloat(raw);
    case "Boolean":
      return decodeBoolean(raw);
    case "Date":
      return decodeTemporal(raw, "date");
    case "Time":
    case "DateTime":
    case "Timestamp":
      return decodeTemporal(raw);
    case "Json":
      return decodeJson(raw);
    case "Binary":
    case "Varbinary":
    case "TinyBlob":
    case "Blob":
    case "MediumBlob":
    case "LongBlob":
      return decodeBinary(raw);
    default:
      return decodeText(raw);
  }
}
