import type { ReadableStore, WritableStore } from "./store.port";

export interface OperationMeta {
  readonly id: string;
  /** Absolute epoch milliseconds after which an operation that has not started is abandoned. */
  readonly deadline: number;
}

export interface WriteOperation<T> extends OperationMeta {
  readonly kind: "write";
  run(tx: WritableStore): T | Promise<T>;
}

export interface ReadOperation<T> extends OperationMeta {
  readonly kind: "read";
  run(store: ReadableStore): T;
}

export interface CommitResult<T> {
  readonly operationId: string;
  readonly value: T;
  readonly attempts: number;
  readonly committedAt: number;
}

export interface ReadResult<T> {
  readonly operationId: string;
  readonly value: T;
  readonly attempts: number;
}

export interface WriteSubmitter {
  readonly queueDepth: number;
  submit<T>(op: WriteOperation<T>): Promise<CommitResult<T>>;
}

export interface ReadQuerier {
  query<T>(op: ReadOperation<T>): Promise<ReadResult<T>>;
}

export function createOperationMeta(input: {
  readonly id: string;
  readonly timeoutMs: number;
  readonly now?: number;
}): OperationMeta {
  const now = input.now ?? Date.now();
  return {
    id: input.id,
    deadline: now + input.timeoutMs,
  };
}
