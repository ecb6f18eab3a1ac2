/**
 * Intent: SQLite v1 storage lock: boot, schema integrity, idempotent re-open, version gate and lock translation.
 * Scope: SQLiteStorage and the canvas/user/proof stores against a temp canvas.db.
 * Non-Goals: Write ordering and read isolation (see concurrency_properties.test.ts).
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import BetterSqlite3 from "better-sqlite3";
import {
  CanvasStore,
  CanvasWriter,
  ReviewProofWriter,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  UserWriter,
  translateSqliteError,
} from "../../src/adapter/storage/sqlite";
import { CoreError, StoreBusyError, notFound } from "../../src/core/errors/core.errors";

function createTempDb(t: test.TestContext): { readonly dir: string; readonly dbPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "sqlite-v1-it-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return {
    dir,
    dbPath: path.join(dir, "canvas.db"),
  };
}

function openStorage(
  t: test.TestContext,
  dbPath: string,
  options: { readonly readonly?: boolean; readonly busyTimeoutMs?: number } = {}
): SQLiteStorage {
  const storage = new SQLiteStorage({ dbPath, ...options });
  storage.connect();
  t.after(() => storage.close());
  return storage;
}

function firstValue(rows: readonly Record<string, unknown>[]): unknown {
  const row = rows[0] ?? {};
  return Object.values(row)[0];
}

test("A) boot/schema: tables, index, pragmas and a seeded blank canvas", (t) => {
  const { dbPath } = createTempDb(t);
  const storage = openStorage(t, dbPath);

  const tables = storage.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name ASC"
  );
  assert.deepEqual(
    tables.map((row) => row.name),
    ["canvas", "review_proofs", "schema_version", "users"]
  );

  const indexes = storage.query<{ name: string }>(
    "SELECT name FROM sqlite_master WHERE type = 'index' AND name = 'idx_canvas_last_user'"
  );
  assert.equal(indexes.length, 1);

  assert.equal(Number(firstValue(storage.query("PRAGMA foreign_keys"))), 1);
  assert.equal(String(firstValue(storage.query("PRAGMA journal_mode"))).toLowerCase(), "wal");
  assert.equal(Number(firstValue(storage.query("PRAGMA synchronous"))), 2);

  const grid = new CanvasStore(storage).readGrid();
  assert.equal(grid.length, 1024);
  assert.equal(
    grid.every((color) => color === 0),
    true
  );
  assert.equal(
    Number(storage.get<{ c: number }>("SELECT COUNT(*) AS c FROM canvas")?.c),
    1024
  );
});

test("B) version gate: wrong schema_version fails fast", (t) => {
  const { dbPath } = createTempDb(t);

  const setup = new SQLiteStorage({ dbPath });
  setup.connect();
  setup.exec("DELETE FROM schema_version");
  setup.exec("INSERT INTO schema_version(version) VALUES (?)", ["wrong"]);
  setup.close();

  const probe = new SQLiteStorage({ dbPath });
  assert.throws(() => probe.connect(), {
    code: "STORE_ERROR",
    message: `SQLITE_STORAGE_VERSION_MISMATCH expected=${SQLITE_STORAGE_SCHEMA_VERSION} actual=wrong`,
  });
});

test("B) version gate: tampered schema_version shape fails fast", (t) => {
  const { dbPath } = createTempDb(t);

  const db = new BetterSqlite3(dbPath);
  db.exec(`
    CREATE TABLE schema_version (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      extra_col TEXT
    );
  `);
  db.prepare("INSERT INTO schema_version(version, extra_col) VALUES (?, ?)").run(
    SQLITE_STORAGE_SCHEMA_VERSION,
    "x"
  );
  db.close();

  const probe = new SQLiteStorage({ dbPath });
  assert.throws(() => probe.connect(), /SQLITE_STORAGE_SCHEMA_CORRUPTED/);
});

function dumpState(storage: SQLiteStorage): string {
  const objects = storage.query<{ type: string; name: string; sql: string | null }>(
    "SELECT type, name, sql FROM sqlite_master ORDER BY type, name"
  );
  const tables = objects.filter((row) => row.type === "table").map((row) => row.name);
  const rows = tables.map((table) => [table, storage.query(`SELECT * FROM ${table} ORDER BY rowid`)]);
  return JSON.stringify({ objects, rows });
}

test("C) re-open is idempotent: stored state is identical before and after", (t) => {
  const { dbPath } = createTempDb(t);

  const first = new SQLiteStorage({ dbPath });
  first.connect();
  new UserWriter(first).insertUser({ userId: "u1", username: "ada", createdAt: 100 });
  new CanvasWriter(first).paint({ x: 3, y: 4, color: 7, userId: "u1", modifiedAt: 101 });
  const before = dumpState(first);
  first.close();

  const second = openStorage(t, dbPath);

  assert.equal(dumpState(second), before);
  assert.equal(new CanvasStore(second).readGrid()[4 * 32 + 3], 7);
  assert.equal(new UserWriter(second).getUser("u1")?.username, "ada");
});

test("C) re-open leaves the closed file byte-identical", (t) => {
  const { dir, dbPath } = createTempDb(t);

  const first = new SQLiteStorage({ dbPath });
  first.connect();
  new UserWriter(first).insertUser({ userId: "u1", username: "ada", createdAt: 100 });
  first.close();
  const before = fs.readFileSync(dbPath);

  const second = new SQLiteStorage({ dbPath });
  second.connect();
  second.close();
  const after = fs.readFileSync(dbPath);

  assert.deepEqual(fs.readdirSync(dir), ["canvas.db"]);
  assert.equal(before.equals(after), true);
});

test("C) re-open re-seeds a canvas table that was left empty", (t) => {
  const { dbPath } = createTempDb(t);

  const first = new SQLiteStorage({ dbPath });
  first.connect();
  first.exec("DELETE FROM canvas");
  first.close();

  const second = openStorage(t, dbPath);
  assert.equal(Number(second.get<{ c: number }>("SELECT COUNT(*) AS c FROM canvas")?.c), 1024);
});

test("D) a file that is not a database is reported as STORE_ERROR", (t) => {
  const { dbPath } = createTempDb(t);
  fs.writeFileSync(dbPath, "not a sqlite database ".repeat(512));

  const probe = new SQLiteStorage({ dbPath });
  assert.throws(
    () => probe.connect(),
    (error: unknown) => {
      assert.ok(error instanceof CoreError);
      assert.equal(error.code, "STORE_ERROR");
      assert.match(error.message, /^SQLITE_STORAGE_ERROR (open|initialize) /);
      return true;
    }
  );
});

test("E) readonly mode: reads a live db and blocks every write path", (t) => {
  const { dbPath } = createTempDb(t);
  openStorage(t, dbPath);
  const reader = openStorage(t, dbPath, { readonly: true });

  assert.equal(reader.isReadOnly, true);
  const count = reader.readSnapshot((store) =>
    Number(store.get<{ c: number }>("SELECT COUNT(*) AS c FROM canvas")?.c)
  );
  assert.equal(count, 1024);

  assert.throws(() => reader.exec("DELETE FROM canvas"), /SQLITE_STORAGE_READONLY_WRITE_BLOCKED/);
  assert.throws(() => reader.begin(), /SQLITE_STORAGE_READONLY_WRITE_BLOCKED/);
});

test("E) readonly mode: a missing file is not created", (t) => {
  const { dir, dbPath } = createTempDb(t);

  const reader = new SQLiteStorage({ dbPath, readonly: true });
  assert.throws(() => reader.connect(), { code: "STORE_ERROR" });
  assert.deepEqual(fs.readdirSync(dir), []);
});

test("F) a write lock held elsewhere surfaces as StoreBusyError without a blocking wait", (t) => {
  const { dbPath } = createTempDb(t);
  const storage = openStorage(t, dbPath);

  const holder = new BetterSqlite3(dbPath);
  t.after(() => holder.close());
  holder.exec("BEGIN IMMEDIATE");

  const started = Date.now();
  assert.throws(
    () => storage.begin(),
    (error: unknown) => {
      assert.ok(error instanceof StoreBusyError);
      assert.equal(error.sqliteCode, "SQLITE_BUSY");
      return true;
    }
  );
  assert.ok(Date.now() - started < 200);
  assert.equal(storage.inTransaction, false);
  holder.exec("ROLLBACK");

  storage.begin();
  storage.rollback();
});

test("G) rollback discards the paint and the balance change together", (t) => {
  const { dbPath } = createTempDb(t);
  const storage = openStorage(t, dbPath);
  const users = new UserWriter(storage);
  users.insertUser({ userId: "u1", username: "ada", createdAt: 1 });
  users.adjustBalance("u1", 2);

  storage.begin();
  new CanvasWriter(storage).paint({ x: 0, y: 0, color: 5, userId: "u1", modifiedAt: 2 });
  users.adjustBalance("u1", -1);
  storage.rollback();

  assert.equal(users.getUser("u1")?.paintBalance, 2);
  const pixel = new CanvasStore(storage).getPixelDetails(0, 0);
  assert.deepEqual(pixel, {
    x: 0,
    y: 0,
    color: 0,
    lastUserId: null,
    username: null,
    lastModified: 0,
  });
});

test("H) balance cannot go negative and proofs are recorded once", (t) => {
  const { dbPath } = createTempDb(t);
  const storage = openStorage(t, dbPath);
  new UserWriter(storage).insertUser({ userId: "u1", username: "ada", createdAt: 1 });

  assert.throws(() => new UserWriter(storage).adjustBalance("u1", -1), {
    code: "STORE_ERROR",
  });

  const proofs = new ReviewProofWriter(storage);
  assert.equal(proofs.recordIfAbsent({ userId: "u1", cardId: 9, timestamp: 1.5 }), true);
  assert.equal(proofs.recordIfAbsent({ userId: "u1", cardId: 9, timestamp: 1.5 }), false);
  assert.throws(
    () => proofs.recordIfAbsent({ userId: "ghost", cardId: 1, timestamp: 1 }),
    /FOREIGN KEY/
  );
});

test("I) pixel details join the last painter's username", (t) => {
  const { dbPath } = createTempDb(t);
  const storage = openStorage(t, dbPath);
  new UserWriter(storage).insertUser({ userId: "u1", username: "ada", createdAt: 1 });
  new CanvasWriter(storage).paint({ x: 31, y: 2, color: 15, userId: "u1", modifiedAt: 42.5 });

  assert.deepEqual(new CanvasStore(storage).getPixelDetails(31, 2), {
    x: 31,
    y: 2,
    color: 15,
    lastUserId: "u1",
    username: "ada",
    lastModified: 42.5,
  });
  assert.equal(new CanvasStore(storage).getPixelDetails(32, 0), undefined);
});

test("J) driver errors are classified: lock contention is transient, the rest is STORE_ERROR", () => {
  const sqliteError = (code: string, message: string): Error => Object.assign(new Error(message), { code });

  const busy = translateSqliteError(sqliteError("SQLITE_BUSY_SNAPSHOT", "database is locked"), "commit");
  assert.ok(busy instanceof StoreBusyError);
  assert.equal(busy.sqliteCode, "SQLITE_BUSY_SNAPSHOT");
  assert.equal(busy.message, "SQLITE_STORAGE_BUSY commit: database is locked");

  const locked = translateSqliteError(sqliteError("SQLITE_LOCKED", "table is locked"), "exec");
  assert.ok(locked instanceof StoreBusyError);

  const full = translateSqliteError(sqliteError("SQLITE_FULL", "database or disk is full"), "exec");
  assert.ok(full instanceof CoreError);
  assert.equal(full.code, "STORE_ERROR");
  assert.deepEqual(full.details, { sqliteCode: "SQLITE_FULL" });
  assert.equal(full.message, "SQLITE_STORAGE_ERROR exec: database or disk is full");

  const plain = translateSqliteError(new Error("EACCES"), "open /x");
  assert.ok(plain instanceof CoreError);
  assert.equal(plain.message, "SQLITE_STORAGE_ERROR open /x: EACCES");

  const domain = notFound("User not found");
  assert.equal(translateSqliteError(domain, "exec"), domain);
});
