import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteClient, affinityOf, toCanonical } from "./sqlite.js";
import { NULL_VALUE, num, text, toJson } from "./values.js";
import { ConnectionError, ExecutionError, TransactionError } from "../errors.js";

describe("affinityOf", () => {
  it("follows the declared-type rules in order", () => {
    expect(affinityOf("INTEGER")).toBe("Integer");
    expect(affinityOf("BIGINT")).toBe("Integer");
    expect(affinityOf("VARCHAR(20)")).toBe("Text");
    expect(affinityOf("CHARINT")).toBe("Integer");
    expect(affinityOf(null)).toBe("Blob");
    expect(affinityOf("DOUBLE")).toBe("Real");
    expect(affinityOf("DECIMAL(10,2)")).toBe("Numeric");
  });
});

describe("toCanonical", () => {
  it("lets the runtime value decide", () => {
    expect(toCanonical("Text", 3)).toEqual(num(3));
    expect(toCanonical("Integer", 3)).toEqual(num(3));
    expect(toCanonical("Integer", 2.5)).toEqual(num(2.5));
    expect(toCanonical("Blob", Buffer.from("hi"))).toEqual(text("aGk="));
    expect(toCanonical("Text", null)).toEqual(NULL_VALUE);
  });

  it("reads bigints by affinity", () => {
    expect(toCanonical("Integer", 9007199254740993n)).toEqual(text("9007199254740993"));
    expect(toCanonical("Integer", 7n)).toEqual(num(7));
    expect(toCanonical("Real", 7n)).toEqual(num(7));
  });

  it("keeps numeric-looking text in numeric columns as decimal text", () => {
    expect(toCanonical("Numeric", "1.50")).toEqual(text("1.50"));
    expect(toCanonical("Numeric", "n/a")).toEqual(text("n/a"));
  });
});

describe("SqliteClient", () => {
  let client: SqliteClient;

  beforeEach(async () => {
    client = await SqliteClient.connect(":memory:");
    await client.execute(`
      CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL, score REAL DEFAULT 0);
      INSERT INTO users (id, name, score) VALUES (1, 'alice', 1.5), (2, 'bob', NULL);
    `);
  });

  afterEach(async () => {
    await client.close();
  });

  it("returns ordered objects", async () => {
    const rows = await client.query("SELECT name, id FROM users ORDER BY id");
    expect(rows.map(toJson)).toEqual([
      { name: "alice", id: 1 },
      { name: "bob", id: 2 },
    ]);
    expect(rows[0]?.entries.map(([k]) => k)).toEqual(["name", "id"]);
  });

  it("returns header and display strings in column order", async () => {
    const result = await client.queryWithColumnOrder("SELECT id, name, score FROM users ORDER BY id");
    expect(result).toEqual({
      header: ["id", "name", "score"],
      rows: [
        ["1", "alice", "1.5"],
        ["2", "bob", "NULL"],
      ],
    });
  });

  it("keeps every digit of 64-bit integers", async () => {
    await client.execute("CREATE TABLE big (n INTEGER); INSERT INTO big VALUES (9007199254740993), (-9007199254740995), (42);");
    expect((await client.queryWithColumnOrder("SELECT n FROM big")).rows).toEqual([
      ["9007199254740993"],
      ["-9007199254740995"],
      ["42"],
    ]);
    expect((await client.query("SELECT n FROM big WHERE n = 42"))[0]).toEqual({ kind: "object", entries: [["n", num(42)]] });
  });

  it("returns nothing for statements without rows", async () => {
    expect(await client.queryWithColumnOrder("UPDATE users SET score = 2 WHERE id = 2")).toEqual({ header: [], rows: [] });
    expect(await client.query("SELECT score FROM users WHERE id = 2")).toEqual([
      { kind: "object", entries: [["score", num(2)]] },
    ]);
  });

  it("lists the main database and its tables", async () => {
    await client.execute("CREATE TABLE posts (id INTEGER)");
    expect(await client.listDatabases()).toEqual(["main"]);
    expect(await client.listTables()).toEqual(["users", "posts"]);
  });

  it("describes columns", async () => {
    const schema = await client.describeTable("users");
    expect(schema).toEqual({
      tableName: "users",
      columns: [
        { name: "id", dataType: "INTEGER", isNullable: true, default: null },
        { name: "name", dataType: "TEXT", isNullable: false, default: null },
        { name: "score", dataType: "REAL", isNullable: true, default: "0" },
      ],
      indexes: [],
    });
  });

  it("wraps statement failures", async () => {
    await expect(client.execute("INSERT INTO missing VALUES (1)")).rejects.toBeInstanceOf(ExecutionError);
    await expect(client.query("SELEC 1")).rejects.toBeInstanceOf(ExecutionError);
  });

  it("pings while open", async () => {
    expect(await client.ping()).toBe(true);
  });
});

describe("SqliteClient transactions", () => {
  let client: SqliteClient;

  beforeEach(async () => {
    client = await SqliteClient.connect(":memory:");
    await client.execute("CREATE TABLE t (n INTEGER)");
  });

  afterEach(async () => {
    await client.close();
  });

  const count = async () => (await client.queryWithColumnOrder("SELECT COUNT(*) AS c FROM t")).rows[0]?.[0];

  it("commits and then refuses further use", async () => {
    const tx = await client.beginTransaction();
    await tx.execute("INSERT INTO t VALUES (1)");
    await tx.commit();
    expect(tx.state).toBe("committed");
    expect(await count()).toBe("1");
    await expect(tx.commit()).rejects.toThrow("Cannot commit: transaction already committed.");
    await expect(tx.execute("INSERT INTO t VALUES (2)")).rejects.toBeInstanceOf(TransactionError);
  });

  it("rolls back", async () => {
    const tx = await client.beginTransaction();
    await tx.execute("INSERT INTO t VALUES (1)");
    await tx.rollback();
    expect(tx.state).toBe("rolled-back");
    expect(await count()).toBe("0");
    await expect(tx.rollback()).rejects.toThrow("Cannot rollback: transaction already rolled-back.");
  });

  it("allows only one open transaction", async () => {
    const tx = await client.beginTransaction();
    await expect(client.beginTransaction()).rejects.toBeInstanceOf(TransactionError);
    await tx.rollback();
  });
});

describe("SqliteClient files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sqlpane-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates a missing file and accepts a sqlite:// prefix", async () => {
    const path = join(dir, "app.db");
    const first = await SqliteClient.connect(`sqlite://${path}`);
    await first.execute("CREATE TABLE kept (id INTEGER)");
    await first.close();

    const second = await SqliteClient.connect(path);
    expect(await second.listTables()).toEqual(["kept"]);
    await second.close();
  });

  it("rolls back an unfinished transaction on close", async () => {
    const path = join(dir, "tx.db");
    const first = await SqliteClient.connect(path);
    await first.execute("CREATE TABLE t (n INTEGER)");
    const tx = await first.beginTransaction();
    await tx.execute("INSERT INTO t VALUES (1)");
    await first.close();
    expect(tx.state).toBe("rolled-back");

    const second = await SqliteClient.connect(path);
    expect((await second.queryWithColumnOrder("SELECT COUNT(*) FROM t")).rows).toEqual([["0"]]);
    await second.close();
  });

  it("fails with a connection error for an unreachable path", async () => {
    await expect(SqliteClient.connect(join(dir, "missing", "nested.db"))).rejects.toBeInstanceOf(ConnectionError);
  });
});
