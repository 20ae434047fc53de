import Database from "better-sqlite3";
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
import { OpenTransactions } from "./transaction.js";
import {
  NULL_VALUE,
  decodeBinary,
  decodeDecimal,
  decodeFloat,
  decodeInteger,
  decodeText,
  get,
  toDisplayString,
  type CanonicalValue,
} from "./values.js";
import { ConnectionError, errorMessage, toExecutionError, toTransactionError } from "../errors.js";
import type { Logger } from "../logger.js";

export type SqliteAffinity = "Integer" | "Text" | "Blob" | "Real" | "Numeric";

/** Column affinity from a declared type, following SQLite's own rules in order. */
export function affinityOf(declared: string | null): SqliteAffinity {
  const t = (declared ?? "").toUpperCase();
  if (t.includes("INT")) return "Integer";
  if (t.includes("CHAR") || t.includes("CLOB") || t.includes("TEXT")) return "Text";
  if (t === "" || t.includes("BLOB")) return "Blob";
  if (t.includes("REAL") || t.includes("FLOA") || t.includes("DOUB")) return "Real";
  return "Numeric";
}

/**
 * SQLite stores values by storage class, not by column type, so the runtime
 * value decides first and the affinity only refines numbers.
 */
export function toCanonical(affinity: SqliteAffinity, raw: unknown): CanonicalValue {
  if (raw === null || raw === undefined) return NULL_VALUE;
  if (raw instanceof Uint8Array) return decodeBinary(raw);
  if (typeof raw === "bigint") {
    return affinity === "Real" ? decodeFloat(Number(raw)) : decodeInteger(raw, 64);
  }
  if (typeof raw === "number") {
    if (affinity === "Integer" && Number.isInteger(raw)) return decodeInteger(raw, 64);
    return decodeFloat(raw);
  }
  if (typeof raw === "string" && affinity === "Numeric") {
    const decimal = decodeDecimal(raw);
    return decimal.kind === "null" ? decodeText(raw) : decimal;
  }
  return decodeText(raw);
}

export class SqliteClient implements DbClient {
  readonly backend = "sqlite";
  private readonly transactions: OpenTransactions;
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    private readonly logger: Logger,
  ) {
    this.transactions = new OpenTransactions(logger);
  }

  /**
   * `path` is a file path or `:memory:`; a `sqlite://` prefix is accepted.
   * A missing file is created.
   */
  static async connect(path: string, options: ClientOptions = DEFAULT_CLIENT_OPTIONS): Promise<SqliteClient> {
    const file = path.replace(/^sqlite:\/\//, "");
    let db: Database.Database;
    try {
      db = new Database(file);
      db.prepare("SELECT 1").get();
    } catch (e) {
      throw new ConnectionError(`Failed to open SQLite database at ${file}: ${errorMessage(e)}`, { cause: e });
    }
    options.logger.info(`Opened SQLite database ${file}`);
    return new SqliteClient(db, options.logger);
  }

  async execute(sql: string): Promise<void> {
    try {
      this.db.exec(sql);
    } catch (e) {
      throw toExecutionError(e);
    }
  }

  async query(sql: string): Promise<OrderedObject[]> {
    return toOrderedObjects(this.fetch(sql));
  }

  async queryWithColumnOrder(sql: string): Promise<OrderedResult> {
    return toOrderedResult(this.fetch(sql));
  }

  /**
   * better-sqlite3 holds a single connection, so only one transaction can be
   * open at a time; a second `beginTransaction` fails at BEGIN.
   */
  async beginTransaction(): Promise<Transaction> {
    try {
      this.db.exec("BEGIN");
    } catch (e) {
      throw toTransactionError(e);
    }
    return this.transactions.begin({
      execute: async (sql) => {
        this.db.exec(sql);
      },
      commit: async () => {
        this.db.exec("COMMIT");
      },
      rollback: async () => {
        if (this.db.inTransaction) this.db.exec("ROLLBACK");
      },
      release: () => undefined,
    });
  }

  async listDatabases(): Promise<string[]> {
    return ["main"];
  }

  async listTables(): Promise<string[]> {
    const { rows } = this.fetch("SELECT name FROM sqlite_master WHERE type = 'table'");
    return rows.flatMap(([name]) => (name && name.kind === "text" ? [name.value] : []));
  }

  async describeTable(table: string): Promise<TableSchema> {
    const objects = toOrderedObjects(this.fetch(`PRAGMA table_info('${table}')`));
    const field = (row: OrderedObject, key: string): CanonicalValue => get(row, key) ?? NULL_VALUE;
    return {
      tableName: table,
      columns: objects.map((row) => {
        const name = field(row, "name");
        const type = field(row, "type");
        const notnull = field(row, "notnull");
        const dflt = field(row, "dflt_value");
        return {
          name: name.kind === "text" ? name.value : "",
          dataType: type.kind === "text" ? type.value : "",
          isNullable: !(notnull.kind === "number" && notnull.value !== 0),
          default: dflt.kind === "null" ? null : toDisplayString(dflt),
        };
      }),
      indexes: [],
    };
  }

  async ping(): Promise<boolean> {
    try {
      this.db.prepare("SELECT 1").get();
      return true;
    } catch (e) {
      this.logger.debug(`SQLite ping failed: ${errorMessage(e)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transactions.rollbackAll();
    this.db.close();
  }

  private fetch(sql: string): DecodedRows {
    try {
      const stmt = this.db.prepare(sql);
      if (!stmt.reader) {
        stmt.run();
        return { columns: [], rows: [] };
      }
      const columns = stmt.columns();
      const affinities = columns.map((c) => affinityOf(c.type));
      // INTEGER cells arrive as bigint so 64-bit values keep every digit.
      const raw: unknown[] = stmt.safeIntegers(true).raw(true).all();
      return {
        columns: columns.map((c) => c.name),
        rows: raw.map((row) =>
          Array.isArray(row) ? affinities.map((affinity, i) => toCanonical(affinity, row[i])) : [],
        ),
      };
    } catch (e) {
      throw toExecutionError(e);
    }
  }
}
