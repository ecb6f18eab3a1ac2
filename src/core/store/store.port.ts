export type StoreParam = string | number | bigint | Buffer | null;

export interface StoreRunResult {
  readonly changes: number;
  readonly lastInsertRowid: number | bigint;
}

export interface ReadableStore {
  query<T extends Record<string, unknown>>(sql: string, params?: readonly StoreParam[]): readonly T[];
  get<T extends Record<string, unknown>>(sql: string, params?: readonly StoreParam[]): T | undefined;
}

export interface WritableStore extends ReadableStore {
  exec(sql: string, params?: readonly StoreParam[]): StoreRunResult;
}

// Writable handle as seen by the write serializer, which alone drives transactions on it.
export interface TransactionalStore extends WritableStore {
  readonly inTransaction: boolean;
  begin(): void;
  commit(): void;
  rollback(): void;
  close(): void;
}

// Read-only handle as seen by the read pool. `readSnapshot` runs `fn` inside one
// read transaction so every statement observes the same committed state.
export interface SnapshotStore extends ReadableStore {
  readSnapshot<T>(fn: (store: ReadableStore) => T): T;
  close(): void;
}
