import mysql, { type Pool, type PoolConnection } from "mysql2/promise";
import {
  DEFAULT_CLIENT_OPTIONS,
  toOrderedObjects,
  toOrderedResult,
  type ClientOptions,
  type DbClient,
  type DecodedRows,
  type OrderedObject,
  type OrderedResult,
  type TableSchema,
  type Transaction,
} from "./base.js";
import { fromTypeName, toCanonical, typeNameForCode } from "./mysql-types.js";
import { OpenTransactions } from "./transaction.js";
import { ConnectionError, errorMessage, redact, toExecutionError, toTransactionError } from "../errors.js";
import type { Logger } from "../logger.js";

const UNSIGNED_FLAG = 32;

interface FieldInfo {
  name: string;
  typeName: string;
  unsigned: boolean;
}

function numberProp(obj: object, key: string): number | undefined {
  if (!(key in obj)) return undefined;
  const value: unknown = Reflect.get(obj, key);
  return typeof value === "number" ? value : undefined;
}

/** Reads name, type code, charset and flags off a `FieldPacket`. */
export function describeField(field: object): FieldInfo {
  const name = "name" in field && typeof field.name === "string" ? field.name : "";
  const code = numberProp(field, "columnType") ?? numberProp(field, "type");
  const flags = numberProp(field, "flags") ?? 0;
  return {
    name,
    typeName: typeNameForCode(code, numberProp(field, "characterSet")),
    unsigned: (flags & UNSIGNED_FLAG) !== 0,
  };
}

function rowArrays(rows: unknown): unknown[][] {
  if (!Array.isArray(rows)) return [];
  return rows.filter((row): row is unknown[] => Array.isArray(row));
}

/** Metadata columns (DESCRIBE, SHOW) may arrive as binary; read them as UTF-8. */
function cellText(raw: unknown): string | null {
  if (raw === null || raw === undefined) return null;
  if (raw instanceof Uint8Array) return Buffer.from(raw).toString("utf8");
  return String(raw);
}

export class MysqlClient implements DbClient {
  readonly backend = "mysql";
  private readonly transactions: OpenTransactions;
  private closed = false;

  private constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
  ) {
    this.transactions = new OpenTransactions(logger);
  }

  static async connect(url: string, options: ClientOptions = DEFAULT_CLIENT_OPTIONS): Promise<MysqlClient> {
    const pool = mysql.createPool({
      uri: url,
      connectionLimit: options.poolSize,
      dateStrings: true,
      supportBigNumbers: true,
      bigNumberStrings: true,
    });

    try {
      const conn = await pool.getConnection();
      conn.release();
    } catch (e) {
      await pool.end().catch((endErr: unknown) => options.logger.debug(`pool.end after failed connect: ${errorMessage(endErr)}`));
      const msg = redact(errorMessage(e));
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectionError(`Cannot connect to MySQL: connection refused. Is the server running? ${msg}`, { cause: e });
      }
      if (msg.includes("Access denied")) {
        throw new ConnectionError(`MySQL access denied. ${msg}`, { cause: e });
      }
      if (msg.includes("Unknown database")) {
        throw new ConnectionError(`MySQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectionError(`MySQL connection failed: ${msg}`, { cause: e });
    }

    options.logger.info(`Connected to MySQL (pool size ${options.poolSize})`);
    return new MysqlClient(pool, options.logger);
  }

  async execute(sql: string): Promise<void> {
    try {
      await this.pool.query(sql);
    } catch (e) {
      throw toExecutionError(e);
    }
  }

  async query(sql: string): Promise<OrderedObject[]> {
    return toOrderedObjects(await this.fetch(sql));
  }

  async queryWithColumnOrder(sql: string): Promise<OrderedResult> {
    return toOrderedResult(await this.fetch(sql));
  }

  async beginTransaction(): Promise<Transaction> {
    let conn: PoolConnection;
    try {
      conn = await this.pool.getConnection();
    } catch (e) {
      throw toTransactionError(e);
    }
    try {
      await conn.beginTransaction();
    } catch (e) {
      conn.release();
      throw toTransactionError(e);
    }
    return this.transactions.begin({
      execute: async (sql) => {
        await conn.query(sql);
      },
      commit: () => conn.commit(),
      rollback: () => conn.rollback(),
      release: () => conn.release(),
    });
  }

  async listDatabases(): Promise<string[]> {
    return this.firstColumn("SHOW DATABASES");
  }

  async listTables(): Promise<string[]> {
    return this.firstColumn("SHOW TABLES");
  }

  async describeTable(table: string): Promise<TableSchema> {
    const { fields, rows } = await this.raw(`DESCRIBE ${table}`);
    const at = (label: string) => fields.findIndex((f) => f.name === label);
    const [field, type, nullable, dflt] = [at("Field"), at("Type"), at("Null"), at("Default")];
    return {
      tableName: table,
      columns: rows.map((row) => ({
        name: cellText(row[field]) ?? "",
        dataType: cellText(row[type]) ?? "",
        isNullable: cellText(row[nullable]) === "YES",
        default: cellText(row[dflt]),
      })),
      indexes: [],
    };
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (e) {
      this.logger.debug(`MySQL ping failed: ${errorMessage(e)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transactions.rollbackAll();
    await this.pool.end();
  }

  private async raw(sql: string): Promise<{ fields: FieldInfo[]; rows: unknown[][] }> {
    try {
      const [rows, fields] = await this.pool.query({ sql, rowsAsArray: true });
      // Statements that return no result set (INSERT, DDL) have no fields.
      return {
        fields: Array.isArray(fields) ? fields.map(describeField) : [],
        rows: rowArrays(rows),
      };
    } catch (e) {
      throw toExecutionError(e);
    }
  }

  private async fetch(sql: string): Promise<DecodedRows> {
    const { fields, rows } = await this.raw(sql);
    const decoders = fields.map((f) => ({ category: fromTypeName(f.typeName), unsigned: f.unsigned }));
    return {
      columns: fields.map((f) => f.name),
      rows: rows.map((row) => decoders.map(({ category, unsigned }, i) => toCanonical(category, row[i], unsigned))),
    };
  }

  private async firstColumn(sql: string): Promise<string[]> {
    const { rows } = await this.raw(sql);
    return rows.flatMap((row) => {
      const value = cellText(row[0]);
      return value === null ? [] : [value];
    });
  }
}
