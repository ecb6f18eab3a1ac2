import { StoreBusyError, deadlineExceeded, toCoreError, unavailable } from "../errors/core.errors";
import { DEFAULT_READ_BACKOFF_POLICY, computeBackoffDelay, sleep, type BackoffPolicy } from "./backoff";
import type { ReadOperation, ReadQuerier, ReadResult } from "./operation.types";
import type { SnapshotStore } from "./store.port";

export interface ReadPoolOptions {
  readonly stores: readonly SnapshotStore[];
  readonly backoff?: Partial<BackoffPolicy>;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

export class ReadPool implements ReadQuerier {
  private readonly stores: readonly SnapshotStore[];
  private readonly backoff: BackoffPolicy;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private cursor = 0;
  private closed = false;

  constructor(options: ReadPoolOptions) {
    if (options.stores.length === 0) {
      throw new Error("READ_POOL_ERROR at least one read-only store is required");
    }
    this.stores = [...options.stores];
    this.backoff = { ...DEFAULT_READ_BACKOFF_POLICY, ...options.backoff };
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  get size(): number {
    return this.stores.length;
  }

  async query<T>(op: ReadOperation<T>): Promise<ReadResult<T>> {
    if (this.now() >= op.deadline) {
      throw deadlineExceeded(op.id);
    }

    for (let attempt = 1; ; attempt += 1) {
      if (this.closed) {
        throw unavailable(`UNAVAILABLE read pool is closed operation=${op.id}`);
      }
      try {
        const value = this.nextStore().readSnapshot((store) => op.run(store));
        return { operationId: op.id, value, attempts: attempt };
      } catch (error) {
        if (!(error instanceof StoreBusyError)) {
          throw toCoreError(error);
        }
        const delayMs = computeBackoffDelay(attempt, this.backoff);
        if (this.now() + delayMs >= op.deadline) {
          throw unavailable(
            `UNAVAILABLE store stayed locked until the read deadline operation=${op.id}`,
            error
          );
        }
        await this.sleep(delayMs);
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const store of this.stores) {
      store.close();
    }
  }

  private nextStore(): SnapshotStore {
    const store = this.stores[this.cursor % this.stores.length];
    this.cursor = (this.cursor + 1) % this.stores.length;
    if (store === undefined) {
      throw new Error("READ_POOL_ERROR store slot is empty");
    }
    return store;
  }
}
