import pg, { type Pool, type PoolClient, type QueryArrayResult } from "pg";
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
import { fromTypeName, toCanonical, typeNameForOid } from "./postgres-types.js";
import { OpenTransactions } from "./transaction.js";
import { toDisplayString } from "./values.js";
import { ConnectionError, errorMessage, redact, toExecutionError, toTransactionError } from "../errors.js";
import type { Logger } from "../logger.js";

// DATE, TIME, TIMESTAMP, TIMESTAMPTZ, TIMETZ: keep the server's text instead
// of a local-time Date.
for (const oid of [1082, 1083, 1114, 1184, 1266]) {
  pg.types.setTypeParser(oid, (value: string) => value);
}

export class PostgresClient implements DbClient {
  readonly backend = "postgres";
  private readonly transactions: OpenTransactions;
  private closed = false;

  private constructor(
    private readonly pool: Pool,
    private readonly logger: Logger,
  ) {
    this.transactions = new OpenTransactions(logger);
  }

  static async connect(url: string, options: ClientOptions = DEFAULT_CLIENT_OPTIONS): Promise<PostgresClient> {
    const pool = new pg.Pool({ connectionString: url, max: options.poolSize });
    // Idle clients emit errors on the pool when the server drops them.
    pool.on("error", (e) => options.logger.warn(`PostgreSQL pool error: ${redact(e.message)}`));

    try {
      const client = await pool.connect();
      client.release();
    } catch (e) {
      await pool.end().catch((endErr: unknown) => options.logger.debug(`pool.end after failed connect: ${errorMessage(endErr)}`));
      const msg = redact(errorMessage(e));
      if (msg.includes("ECONNREFUSED")) {
        throw new ConnectionError(`Cannot connect to PostgreSQL: connection refused. Is the server running? ${msg}`, { cause: e });
      }
      if (msg.includes("password authentication failed")) {
        throw new ConnectionError(`PostgreSQL authentication failed. ${msg}`, { cause: e });
      }
      if (msg.includes("does not exist")) {
        throw new ConnectionError(`PostgreSQL database not found. ${msg}`, { cause: e });
      }
      throw new ConnectionError(`PostgreSQL connection failed: ${msg}`, { cause: e });
    }

    options.logger.info(`Connected to PostgreSQL (pool size ${options.poolSize})`);
    return new PostgresClient(pool, options.logger);
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
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (e) {
      throw toTransactionError(e);
    }
    try {
      await client.query("BEGIN");
    } catch (e) {
      client.release();
      throw toTransactionError(e);
    }
    return this.transactions.begin({
      execute: async (sql) => {
        await client.query(sql);
      },
      commit: async () => {
        await client.query("COMMIT");
      },
      rollback: async () => {
        await client.query("ROLLBACK");
      },
      release: () => client.release(),
    });
  }

  async listDatabases(): Promise<string[]> {
    return this.firstColumn("SELECT datname FROM pg_database WHERE datistemplate = false");
  }

  async listTables(): Promise<string[]> {
    return this.firstColumn("SELECT table_name FROM information_schema.tables WHERE table_schema = 'public'");
  }

  async describeTable(table: string): Promise<TableSchema> {
    const { rows } = await this.queryWithColumnOrder(
      `SELECT column_name, data_type, is_nullable, column_default
       FROM information_schema.columns
       WHERE table_name = '${table}'
       ORDER BY ordinal_position`,
    );
    return {
      tableName: table,
      columns: rows.map(([name = "", dataType = "", nullable = "", dflt = "NULL"]) => ({
        name,
        dataType,
        isNullable: nullable === "YES",
        default: dflt === "NULL" ? null : dflt,
      })),
      indexes: [],
    };
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (e) {
      this.logger.debug(`PostgreSQL ping failed: ${errorMessage(e)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transactions.rollbackAll();
    await this.pool.end();
  }

  private async fetch(sql: string): Promise<DecodedRows> {
    let result: QueryArrayResult<unknown[]>;
    try {
      result = await this.pool.query<unknown[]>({ text: sql, rowMode: "array" });
    } catch (e) {
      throw toExecutionError(e);
    }
    // Statements without a row description (INSERT, DDL) carry no fields.
    const fields = result.fields ?? [];
    const categories = fields.map((f) => fromTypeName(typeNameForOid(f.dataTypeID)));
    return {
      columns: fields.map((f) => f.name),
      rows: (result.rows ?? []).map((row) => categories.map((category, i) => toCanonical(category, row[i]))),
    };
  }

  private async firstColumn(sql: string): Promise<string[]> {
    const { rows } = await this.fetch(sql);
    return rows.flatMap((row) => (row[0] ? [toDisplayString(row[0])] : []));
  }
}
