import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";
import { storeError } from "../../../core/errors/core.errors";
import { CANVAS_HEIGHT, CANVAS_PIXEL_COUNT, CANVAS_WIDTH } from "../../../core/canvas/canvas.rules";
import type {
  ReadableStore,
  SnapshotStore,
  StoreParam,
  StoreRunResult,
  TransactionalStore,
} from "../../../core/store/store.port";
import { translateSqliteError } from "./sqlite.errors";

export type SQLiteParam = StoreParam;

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
  readonly ["readonly"]?: boolean;
  readonly busyTimeoutMs?: number;
}

export const DEFAULT_SQLITE_DB_REL_PATH = "canvas.db";
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";
// The driver's busy wait blocks the event loop; contention is retried by the callers instead.
export const DEFAULT_BUSY_TIMEOUT_MS = 0;

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_CANVAS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS canvas (
  x INTEGER NOT NULL,
  y INTEGER NOT NULL,
  color INTEGER NOT NULL DEFAULT 0,
  last_user_id TEXT,
  last_modified REAL,
  PRIMARY KEY (x, y)
);

CREATE TABLE IF NOT EXISTS users (
  user_id TEXT PRIMARY KEY,
  username TEXT NOT NULL,
  paint_balance INTEGER NOT NULL DEFAULT 0 CHECK (paint_balance >= 0),
  created_at REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS review_proofs (
  user_id TEXT NOT NULL,
  card_id INTEGER NOT NULL,
  timestamp REAL NOT NULL,
  PRIMARY KEY (user_id, card_id, timestamp),
  FOREIGN KEY(user_id) REFERENCES users(user_id)
);

CREATE INDEX IF NOT EXISTS idx_canvas_last_user
  ON canvas(last_user_id);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

/**
 * One connection to the store file. Opened writable it is the single handle the
 * write serializer drives; opened read-only it backs one slot of the read pool.
 */
export class SQLiteStorage implements TransactionalStore, SnapshotStore {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private readonly readOnlyMode: boolean;
  private readonly busyTimeoutMs: number;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
    this.readOnlyMode = options["readonly"] === true;
    this.busyTimeoutMs = options.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS;
  }

  get isReadOnly(): boolean {
    return this.readOnlyMode;
  }

  get inTransaction(): boolean {
    return this.db !== null && this.db.inTransaction;
  }

  connect(): void {
    if (this.closed) {
      throw storeError("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw storeError("SQLITE_STORAGE_ERROR single connection already opened");
    }

    let db: BetterSqliteDatabase;
    try {
      if (!this.readOnlyMode) {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
      }
      db = this.readOnlyMode
        ? new BetterSqlite3(this.dbPath, {
            readonly: true,
            fileMustExist: true,
            timeout: this.busyTimeoutMs,
          })
        : new BetterSqlite3(this.dbPath, { timeout: this.busyTimeoutMs });
    } catch (error) {
      throw translateSqliteError(error, `open ${this.dbPath}`);
    }

    try {
      if (!this.readOnlyMode) {
        db.exec("PRAGMA journal_mode = WAL;");
        db.exec("PRAGMA synchronous = FULL;");
      }
      db.exec("PRAGMA foreign_keys = ON;");
      this.db = db;
      if (!this.readOnlyMode) {
        this.assertIntegrity();
      }
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw translateSqliteError(error, `initialize ${this.dbPath}`);
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): StoreRunResult {
    this.assertWritable();
    const db = this.requireDb();
    try {
      const result = db.prepare(sql).run(...params);
      return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
    } catch (error) {
      throw translateSqliteError(error, "exec");
    }
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    try {
      return db.prepare(sql).all(...params) as T[];
    } catch (error) {
      throw translateSqliteError(error, "query");
    }
  }

  get<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): T | undefined {
    const db = this.requireDb();
    try {
      return db.prepare(sql).get(...params) as T | undefined;
    } catch (error) {
      throw translateSqliteError(error, "get");
    }
  }

  begin(): void {
    this.assertWritable();
    this.runControl("BEGIN IMMEDIATE;", "begin");
  }

  commit(): void {
    this.runControl("COMMIT;", "commit");
  }

  rollback(): void {
    this.runControl("ROLLBACK;", "rollback");
  }

  readSnapshot<T>(fn: (store: ReadableStore) => T): T {
    const db = this.requireDb();
    try {
      return db.transaction(() => fn(this))();
    } catch (error) {
      throw translateSqliteError(error, "read snapshot");
    }
  }

  private runControl(sql: string, context: string): void {
    const db = this.requireDb();
    try {
      db.exec(sql);
    } catch (error) {
      throw translateSqliteError(error, context);
    }
  }

  private assertIntegrity(): void {
    const rows = this.query<Record<string, unknown>>("PRAGMA quick_check");
    const findings = rows.map((row) => String(Object.values(row)[0] ?? ""));
    if (findings.length !== 1 || findings[0] !== "ok") {
      throw storeError(
        `SQLITE_STORAGE_CORRUPTED quick_check failed for ${this.dbPath}: ${findings.slice(0, 3).join("; ")}`
      );
    }
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    if (!this.readOnlyMode) {
      db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);
    }

    this.validateSchemaVersionTableShape();

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (this.readOnlyMode) {
      this.assertSchemaVersionMatch(versions);
      return;
    }

    if (versions.length === 0) {
      db.exec("BEGIN IMMEDIATE;");
      try {
        db.exec(CREATE_CANVAS_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
        this.seedCanvasIfEmpty();
        db.exec("COMMIT;");
      } catch (error) {
        db.exec("ROLLBACK;");
        throw error;
      }
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_CANVAS_SCHEMA_SQL);
    if (this.countPixels() === 0) {
      db.transaction(() => this.seedCanvasIfEmpty())();
    }
  }

  private countPixels(): number {
    const row = this.get<{ pixel_count: unknown }>("SELECT COUNT(*) AS pixel_count FROM canvas");
    return Number(row?.pixel_count ?? 0);
  }

  private seedCanvasIfEmpty(): void {
    if (this.countPixels() > 0) {
      return;
    }
    const insert = this.requireDb().prepare(
      "INSERT INTO canvas (x, y, color, last_user_id, last_modified) VALUES (?, ?, 0, NULL, 0)"
    );
    for (let x = 0; x < CANVAS_WIDTH; x += 1) {
      for (let y = 0; y < CANVAS_HEIGHT; y += 1) {
        insert.run(x, y);
      }
    }
    if (this.countPixels() !== CANVAS_PIXEL_COUNT) {
      throw storeError("SQLITE_STORAGE_ERROR canvas seed produced an unexpected pixel count");
    }
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw storeError(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private validateSchemaVersionTableShape(): void {
    const columns = this.query<{
      name?: unknown;
      type?: unknown;
      pk?: unknown;
    }>("PRAGMA table_info(schema_version)");

    const normalized = columns.map((column) => ({
      name: typeof column.name === "string" ? column.name : "",
      type: typeof column.type === "string" ? column.type.toUpperCase() : "",
      pk: Number(column.pk ?? 0),
    }));

    const isExactShape =
      normalized.length === 2 &&
      normalized[0]?.name === "version" &&
      normalized[0]?.type === "TEXT" &&
      normalized[0]?.pk === 1 &&
      normalized[1]?.name === "applied_at" &&
      normalized[1]?.type === "TIMESTAMP" &&
      normalized[1]?.pk === 0;

    if (!isExactShape) {
      throw storeError("SQLITE_STORAGE_SCHEMA_CORRUPTED schema_version shape mismatch");
    }
  }

  private assertWritable(): void {
    if (this.readOnlyMode) {
      throw storeError("SQLITE_STORAGE_READONLY_WRITE_BLOCKED");
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw storeError("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw storeError("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
