import type { BackendKind, ClientOptions, DbClient } from "./base.js";
import { MysqlClient } from "./mysql.js";
import { PostgresClient } from "./postgres.js";
import { SqliteClient } from "./sqlite.js";

export type { BackendKind, ClientOptions, DbClient, OrderedResult, TableSchema, Transaction } from "./base.js";

/** Opens a client for `kind`; `url` is a connection string or, for SQLite, a file path. */
export async function createClient(kind: BackendKind, url: string, options: ClientOptions): Promise<DbClient> {
  switch (kind) {
    case "postgres":
      return PostgresClient.connect(url, options);
    case "mysql":
      return MysqlClient.connect(url, options);
    case "sqlite":
      return SqliteClient.connect(url, options);
  }
}

export type ClientFactory = typeof createClient;
