import type { BackendKind, ClientOptions, DbClient, OrderedResult, TableSchema, Transaction } from "../drivers/base.js";
import { text, orderedObject, type CanonicalValue, type OrderedObject } from "../drivers/values.js";
import type { ClientFactory } from "../drivers/index.js";
import { ConnectionError, ExecutionError, TransactionError } from "../errors.js";

export interface FakeScript {
  databases?: string[];
  tables?: string[];
  /** Column names per table, as `describeTable` reports them. */
  columns?: Record<string, string[]>;
  /** Results keyed by the exact SQL text. */
  results?: Record<string, OrderedResult>;
  /** SQL text that fails with the given message. */
  failures?: Record<string, string>;
  /** Awaited before `listDatabases` and `listTables` resolve. */
  gate?: Promise<void>;
}

/** In-process `DbClient` that records calls and replays a script. */
export class FakeClient implements DbClient {
  readonly calls: string[] = [];
  closed = false;

  constructor(
    readonly backend: BackendKind,
    readonly url: string,
    private readonly script: FakeScript,
  ) {}

  async execute(sql: string): Promise<void> {
    this.calls.push(`execute:${sql}`);
    this.failIfScripted(sql);
  }

  async query(sql: string): Promise<OrderedObject[]> {
    const { header, rows } = await this.queryWithColumnOrder(sql);
    return rows.map((row) => orderedObject(header.map((h, i): [string, CanonicalValue] => [h, text(row[i] ?? "")])));
  }

  async queryWithColumnOrder(sql: string): Promise<OrderedResult> {
    this.calls.push(`query:${sql}`);
    this.failIfScripted(sql);
    return this.script.results?.[sql] ?? { header: [], rows: [] };
  }

  async beginTransaction(): Promise<Transaction> {
    throw new TransactionError("transactions are not scripted");
  }

  async listDatabases(): Promise<string[]> {
    this.calls.push("listDatabases");
    await this.script.gate;
    return [...(this.script.databases ?? [])];
  }

  async listTables(): Promise<string[]> {
    this.calls.push("listTables");
    await this.script.gate;
    return [...(this.script.tables ?? [])];
  }

  async describeTable(table: string): Promise<TableSchema> {
    this.calls.push(`describe:${table}`);
    return {
      tableName: table,
      columns: (this.script.columns?.[table] ?? []).map((name) => ({
        name,
        dataType: "text",
        isNullable: false,
        default: null,
      })),
      indexes: [],
    };
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private failIfScripted(sql: string): void {
    const message = this.script.failures?.[sql];
    if (message !== undefined) throw new ExecutionError(message);
  }
}

export interface FakeFactory {
  factory: ClientFactory;
  /** Every client handed out, oldest first. */
  clients: FakeClient[];
  options: ClientOptions[];
}

/**
 * Factory that hands out `FakeClient`s. URLs listed in `refuse` fail with
 * `ConnectionError` instead.
 */
export function fakeFactory(script: FakeScript, refuse: string[] = []): FakeFactory {
  const clients: FakeClient[] = [];
  const options: ClientOptions[] = [];
  return {
    clients,
    options,
    factory: async (kind, url, opts) => {
      options.push(opts);
      if (refuse.includes(url)) throw new ConnectionError(`connection refused: ${url}`);
      const client = new FakeClient(kind, url, script);
      clients.push(client);
      return client;
    },
  };
}
