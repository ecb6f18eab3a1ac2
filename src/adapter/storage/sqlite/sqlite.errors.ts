import { CoreError, StoreBusyError, storeError } from "../../../core/errors/core.errors";

// SQLITE_BUSY_SNAPSHOT, SQLITE_LOCKED_SHAREDCACHE, ... share these prefixes.
const TRANSIENT_CODE_PREFIXES = ["SQLITE_BUSY", "SQLITE_LOCKED"] as const;

export function readSqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code.startsWith("SQLITE_") ? error.code : undefined;
  }
  return undefined;
}

export function isTransientSqliteCode(code: string): boolean {
  return TRANSIENT_CODE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/**
 * Maps a driver failure onto the core taxonomy: lock contention becomes a
 * retryable StoreBusyError, every other driver error a STORE_ERROR. Errors that
 * are already classified pass through untouched.
 */
export function translateSqliteError(error: unknown, context: string): Error {
  if (error instanceof CoreError || error instanceof StoreBusyError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readSqliteCode(error);
  if (code === undefined) {
    return storeError(`SQLITE_STORAGE_ERROR ${context}: ${message}`, undefined, error);
  }
  if (isTransientSqliteCode(code)) {
    return new StoreBusyError(`SQLITE_STORAGE_BUSY ${context}: ${message}`, {
      sqliteCode: code,
      cause: error,
    });
  }
  return storeError(`SQLITE_STORAGE_ERROR ${context}: ${message}`, { sqliteCode: code }, error);
}
