/**
 * Backend-agnostic cell values. Every decoder in the `*-types.ts` modules
 * produces one of these and never throws: anything it cannot represent in
 * the column's category becomes `NULL_VALUE`.
 */
export type CanonicalValue =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "number"; value: number }
  | { kind: "text"; value: string }
  | { kind: "array"; items: CanonicalValue[] }
  | OrderedObject;

/** Key order is the backend's column order; keys are unique. */
export interface OrderedObject {
  kind: "object";
  entries: [string, CanonicalValue][];
}

export const NULL_VALUE: CanonicalValue = { kind: "null" };

export const bool = (value: boolean): CanonicalValue => ({ kind: "bool", value });
export const num = (value: number): CanonicalValue => ({ kind: "number", value });
export const text = (value: string): CanonicalValue => ({ kind: "text", value });

/**
 * A repeated key keeps the position of its first occurrence and the value of
 * its last, so `SELECT 1 AS id, 2 AS id` reads as `{id: 2}`.
 */
export function orderedObject(entries: [string, CanonicalValue][]): OrderedObject {
  return { kind: "object", entries: [...new Map(entries)] };
}

export function get(obj: OrderedObject, key: string): CanonicalValue | undefined {
  return obj.entries.find(([k]) => k === key)?.[1];
}

/** Plain JSON view, mainly for logging and tests. */
export function toJson(value: CanonicalValue): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "text":
      return value.value;
    case "array":
      return value.items.map(toJson);
    case "object":
      return Object.fromEntries(value.entries.map(([k, v]) => [k, toJson(v)]));
  }
}

/** Display form used by `queryWithColumnOrder`. */
export function toDisplayString(value: CanonicalValue): string {
  switch (value.kind) {
    case "null":
      return "NULL";
    case "text":
      return value.value;
    case "bool":
    case "number":
      return String(value.value);
    default:
      return JSON.stringify(toJson(value));
  }
}

// ── Decoders shared by the per-backend type maps ─────────────────────

/** Signed integer widths in bits. */
export type IntWidth = 8 | 16 | 24 | 32 | 64;

function intBounds(bits: IntWidth): [bigint, bigint] {
  const half = 1n << BigInt(bits - 1);
  return [-half, half - 1n];
}

function toBigInt(raw: unknown): bigint | null {
  if (typeof raw === "bigint") return raw;
  if (typeof raw === "number") return Number.isInteger(raw) ? BigInt(raw) : null;
  if (typeof raw === "string" && /^\s*[-+]?\d+\s*$/.test(raw)) return BigInt(raw.trim());
  return null;
}

/**
 * Integers outside the category's width decode to null. A 64-bit value that
 * fits the width but not a JS double exactly is kept as text.
 */
export function decodeInteger(raw: unknown, bits: IntWidth, unsigned = false): CanonicalValue {
  const big = toBigInt(raw);
  if (big === null) return NULL_VALUE;
  let [min, max] = intBounds(bits);
  if (unsigned) {
    min = 0n;
    max = (1n << BigInt(bits)) - 1n;
  }
  if (big < min || big > max) return NULL_VALUE;
  if (big > BigInt(Number.MAX_SAFE_INTEGER) || big < BigInt(Number.MIN_SAFE_INTEGER)) {
    return text(big.toString());
  }
  return num(Number(big));
}

/** Binary floating point; NaN and infinities have no canonical form. */
export function decodeFloat(raw: unknown): CanonicalValue {
  let n: number;
  if (typeof raw === "number") n = raw;
  else if (typeof raw === "string" && raw.trim() !== "") n = Number(raw);
  else return NULL_VALUE;
  return Number.isFinite(n) ? num(n) : NULL_VALUE;
}

/** Arbitrary precision stays textual so no digit is lost to a double. */
export function decodeDecimal(raw: unknown): CanonicalValue {
  if (typeof raw === "string") return /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/.test(raw) ? text(raw.trim()) : NULL_VALUE;
  if (typeof raw === "number" && Number.isFinite(raw)) return text(String(raw));
  if (typeof raw === "bigint") return text(raw.toString());
  return NULL_VALUE;
}

export function decodeBoolean(raw: unknown): CanonicalValue {
  if (typeof raw === "boolean") return bool(raw);
  if (typeof raw === "number" || typeof raw === "bigint") {
    if (raw == 0) return bool(false);
    if (raw == 1) return bool(true);
    return NULL_VALUE;
  }
  if (typeof raw === "string") {
    switch (raw.trim().toLowerCase()) {
      case "t":
      case "true":
      case "1":
        return bool(true);
      case "f":
      case "false":
      case "0":
        return bool(false);
    }
  }
  return NULL_VALUE;
}

export function decodeBinary(raw: unknown): CanonicalValue {
  if (raw instanceof Uint8Array) return text(Buffer.from(raw).toString("base64"));
  if (typeof raw === "string") return text(Buffer.from(raw, "utf8").toString("base64"));
  return NULL_VALUE;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYY-MM-DD HH:MM:SS[.fff]` in UTC, or just the date part. */
export function formatDate(d: Date, part: "date" | "datetime"): string | null {
  if (Number.isNaN(d.getTime())) return null;
  const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  if (part === "date") return date;
  const ms = d.getUTCMilliseconds();
  const time = `${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
  return `${date} ${time}${ms ? `.${pad(ms, 3)}` : ""}`;
}

export function decodeTemporal(raw: unknown, part: "date" | "datetime" = "datetime"): CanonicalValue {
  if (raw instanceof Date) {
    const formatted = formatDate(raw, part);
    return formatted === null ? NULL_VALUE : text(formatted);
  }
  if (typeof raw === "string") return text(raw);
  if (typeof raw === "number" && Number.isFinite(raw)) return text(String(raw));
  return NULL_VALUE;
}

/** Structural JSON pass-through; JSON text is parsed first. */
export function decodeJson(raw: unknown): CanonicalValue {
  if (typeof raw === "string") {
    try {
      return fromJson(JSON.parse(raw));
    } catch {
      return NULL_VALUE;
    }
  }
  return fromJson(raw);
}

export function fromJson(raw: unknown): CanonicalValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (typeof raw === "boolean") return bool(raw);
  if (typeof raw === "number") return Number.isFinite(raw) ? num(raw) : NULL_VALUE;
  if (typeof raw === "string") return text(raw);
  if (Array.isArray(raw)) return { kind: "array", items: raw.map(fromJson) };
  if (typeof raw === "object") {
    return orderedObject(Object.entries(raw).map(([k, v]): [string, CanonicalValue] => [k, fromJson(v)]));
  }
  return NULL_VALUE;
}

/** Fallback for categories without a dedicated decoder. */
export function decodeText(raw: unknown): CanonicalValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (typeof raw === "string") return text(raw);
  if (typeof raw === "number" || typeof raw === "boolean" || typeof raw === "bigint") return text(String(raw));
  if (raw instanceof Date) return decodeTemporal(raw);
  if (raw instanceof Uint8Array) return text(Buffer.from(raw).toString("utf8"));
  try {
    const json = JSON.stringify(raw);
    return typeof json === "string" ? text(json) : NULL_VALUE;
  } catch {
    return NULL_VALUE;
  }
}
