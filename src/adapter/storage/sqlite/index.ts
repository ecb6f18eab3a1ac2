export {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_SQLITE_DB_REL_PATH,
  SQLITE_STORAGE_SCHEMA_VERSION,
  SQLiteStorage,
  type SQLiteParam,
  type SQLiteStorageOptions,
} from "./sqlite.storage";

export { isTransientSqliteCode, readSqliteCode, translateSqliteError } from "./sqlite.errors";

export {
  CanvasStore,
  CanvasWriter,
  ReviewProofWriter,
  UserStore,
  UserWriter,
  type PaintInput,
  type PixelDetails,
  type ReviewProofInput,
  type UserInsertInput,
  type UserRecord,
} from "./sqlite.stores";
