import { silentLogger, type Logger } from "../logger.js";
import { orderedObject, toDisplayString, type CanonicalValue, type OrderedObject } from "./values.js";

export type { CanonicalValue, OrderedObject };

export type BackendKind = "postgres" | "mysql" | "sqlite";

export interface ColumnSchema {
  name: string;
  /** Backend-native type name, e.g. "integer" or "varchar(255)". */
  dataType: string;
  isNullable: boolean;
  default: string | null;
}

export interface TableSchema {
  tableName: string;
  columns: ColumnSchema[];
  /** Reserved; always empty. */
  indexes: never[];
}

/** Column names plus stringified cells, both in result order. */
export interface OrderedResult {
  header: string[];
  rows: string[][];
}

/** A decoded result before it is shaped for `query` or `queryWithColumnOrder`. */
export interface DecodedRows {
  columns: string[];
  rows: CanonicalValue[][];
}

export function toOrderedObjects({ columns, rows }: DecodedRows): OrderedObject[] {
  return rows.map((row) => orderedObject(columns.map((name, i): [string, CanonicalValue] => [name, row[i] ?? { kind: "null" }])));
}

export function toOrderedResult({ columns, rows }: DecodedRows): OrderedResult {
  return { header: [...columns], rows: rows.map((row) => row.map(toDisplayString)) };
}

export interface ClientOptions {
  /** Pool size for pooled backends. */
  poolSize: number;
  logger: Logger;
}

export const DEFAULT_CLIENT_OPTIONS: ClientOptions = { poolSize: 5, logger: silentLogger };

/**
 * A transaction bound to one pooled connection. `commit` and `rollback`
 * consume the handle: any call after either one throws `TransactionError`.
 */
export interface Transaction {
  readonly state: "open" | "committed" | "rolled-back";
  execute(sql: string): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface DbClient {
  /** Which backend this client talks to. */
  readonly backend: BackendKind;

  /** Run a statement for its side effect only. */
  execute(sql: string): Promise<void>;

  /** Run a result-producing statement; one ordered object per row. */
  query(sql: string): Promise<OrderedObject[]>;

  /** Same statement as `query`, returned as parallel header/cell arrays for display. */
  queryWithColumnOrder(sql: string): Promise<OrderedResult>;

  beginTransaction(): Promise<Transaction>;

  listDatabases(): Promise<string[]>;

  listTables(): Promise<string[]>;

  /**
   * Describe columns for a specific table. The name is spliced into the SQL
   * text unescaped, so never pass untrusted input.
   */
  describeTable(table: string): Promise<TableSchema>;

  /** Test if the connection is alive. */
  ping(): Promise<boolean>;

  /** Roll back any unfinished transaction, then release the pool. */
  close(): Promise<void>;
}
