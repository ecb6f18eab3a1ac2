import { SQLiteStorage } from "../../src/adapter/storage/sqlite";
import type { RetryPolicy } from "../../src/core/store/backoff";
import { ReadPool } from "../../src/core/store/read_pool";
import { WriteSerializer } from "../../src/core/store/write_serializer";

export interface StoreRuntimeOptions {
  readonly dbPath: string;
  readonly readPoolSize: number;
  readonly busyTimeoutMs?: number;
  readonly writeRetry?: Partial<RetryPolicy>;
  readonly shutdownGraceMs?: number;
  readonly onWarn?: (message: string) => void;
}

export interface StoreRuntime {
  readonly writer: WriteSerializer;
  readonly readPool: ReadPool;
  close(graceMs?: number): Promise<void>;
}

/**
 * Opens the writable handle, then the read-only pool handles against the same
 * file. Anything opened before a failure is closed again before the error
 * propagates.
 */
export function openStoreRuntime(options: StoreRuntimeOptions): StoreRuntime {
  const writable = new SQLiteStorage({
    dbPath: options.dbPath,
    busyTimeoutMs: options.busyTimeoutMs,
  });
  writable.connect();

  const readers: SQLiteStorage[] = [];
  try {
    for (let i = 0; i < options.readPoolSize; i += 1) {
      const reader = new SQLiteStorage({
        dbPath: options.dbPath,
        readonly: true,
        busyTimeoutMs: options.busyTimeoutMs,
      });
      reader.connect();
      readers.push(reader);
    }
  } catch (error) {
    for (const reader of readers) {
      reader.close();
    }
    writable.close();
    throw error;
  }

  const writer = new WriteSerializer({
    store: writable,
    retry: options.writeRetry,
    shutdownGraceMs: options.shutdownGraceMs,
    onWarn: options.onWarn,
  });
  const readPool = new ReadPool({ stores: readers });

  let closing: Promise<void> | null = null;
  return {
    writer,
    readPool,
    close(graceMs?: number): Promise<void> {
      if (closing === null) {
        readPool.close();
        closing = writer.close(graceMs);
      }
      return closing;
    },
  };
}
