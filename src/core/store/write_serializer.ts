import {
  CoreError,
  StoreBusyError,
  deadlineExceeded,
  toCoreError,
  unavailable,
} from "../errors/core.errors";
import { DEFAULT_WRITE_RETRY_POLICY, computeBackoffDelay, sleep, type RetryPolicy } from "./backoff";
import type { CommitResult, WriteOperation, WriteSubmitter } from "./operation.types";
import type { TransactionalStore } from "./store.port";

export interface WriteSerializerOptions {
  readonly store: TransactionalStore;
  readonly retry?: Partial<RetryPolicy>;
  readonly shutdownGraceMs?: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly onWarn?: (message: string) => void;
}

interface PendingWrite {
  readonly id: string;
  readonly deadline: number;
  timer: NodeJS.Timeout | null;
  start(): Promise<void>;
  abandon(error: CoreError): void;
}

const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;
// Largest delay a Node timer honours; longer ones fire after 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Funnels every mutating operation through the one writable store handle.
 *
 * Operations are applied strictly in submission order, one at a time, each in
 * its own `BEGIN IMMEDIATE` transaction. A queued operation whose deadline
 * passes before it starts is dropped with DEADLINE_EXCEEDED; one that has
 * started always runs to commit or rollback.
 */
export class WriteSerializer implements WriteSubmitter {
  private readonly store: TransactionalStore;
  private readonly retry: RetryPolicy;
  private readonly shutdownGraceMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onWarn?: (message: string) => void;
  private readonly queue: PendingWrite[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private inFlight: Promise<void> | null = null;
  private accepting = true;
  private closing: Promise<void> | null = null;

  constructor(options: WriteSerializerOptions) {
    this.store = options.store;
    this.retry = { ...DEFAULT_WRITE_RETRY_POLICY, ...options.retry };
    if (!Number.isInteger(this.retry.maxAttempts) || this.retry.maxAttempts < 1) {
      throw new Error("WRITE_SERIALIZER_ERROR retry.maxAttempts must be a positive integer");
    }
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.onWarn = options.onWarn;
  }

  get queueDepth(): number {
    return this.queue.length + (this.inFlight === null ? 0 : 1);
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  submit<T>(op: WriteOperation<T>): Promise<CommitResult<T>> {
    if (!this.accepting) {
      return Promise.reject(unavailable(`UNAVAILABLE write rejected during shutdown operation=${op.id}`));
    }
    if (this.now() >= op.deadline) {
      return Promise.reject(deadlineExceeded(op.id));
    }

    return new Promise<CommitResult<T>>((resolve, reject) => {
      const pending: PendingWrite = {
        id: op.id,
        deadline: op.deadline,
        timer: null,
        start: () =>
          this.apply(op).then(resolve, (error: unknown) => {
            reject(error);
          }),
        abandon: (error) => {
          reject(error);
        },
      };

      this.armDeadline(pending);
      this.queue.push(pending);
      this.pump();
    });
  }

  /**
   * Stops accepting writes, lets queued operations finish within `graceMs`,
   * rejects whatever is still waiting afterwards, waits for the operation in
   * flight, then closes the store handle.
   */
  close(graceMs: number = this.shutdownGraceMs): Promise<void> {
    if (this.closing !== null) {
      return this.closing;
    }
    this.accepting = false;
    this.closing = this.drain(graceMs).finally(() => {
      this.store.close();
    });
    return this.closing;
  }

  private async drain(graceMs: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), graceMs);
    });
    const expired = await Promise.race([this.whenIdle().then(() => false), graceElapsed]);
    clearTimeout(timer);

    if (expired) {
      const abandoned = this.queue.splice(0);
      if (abandoned.length > 0) {
        this.onWarn?.(`[writer] shutdown grace elapsed, abandoning ${String(abandoned.length)} queued write(s)`);
      }
      for (const pending of abandoned) {
        this.clearTimer(pending);
        pending.abandon(
          unavailable(`UNAVAILABLE write abandoned during shutdown operation=${pending.id}`)
        );
      }
    }

    if (this.inFlight !== null) {
      await this.inFlight;
    }
  }

  private whenIdle(): Promise<void> {
    if (this.inFlight === null && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    if (this.inFlight !== null) {
      return;
    }

    let next = this.queue.shift();
    while (next !== undefined && this.now() >= next.deadline) {
      this.clearTimer(next);
      next.abandon(deadlineExceeded(next.id));
      next = this.queue.shift();
    }

    if (next === undefined) {
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve();
      }
      return;
    }

    this.clearTimer(next);
    this.inFlight = next.start().finally(() => {
      this.inFlight = null;
      this.pump();
    });
  }

  private armDeadline(pending: PendingWrite): void {
    const remaining = pending.deadline - this.now();
    if (!Number.isFinite(remaining)) {
      return;
    }
    pending.timer = setTimeout(() => {
      pending.timer = null;
      if (this.now() < pending.deadline) {
        this.armDeadline(pending);
        return;
      }
      this.expire(pending);
    }, Math.min(Math.max(0, remaining), MAX_TIMER_DELAY_MS));
    pending.timer.unref();
  }

  private expire(pending: PendingWrite): void {
    pending.timer = null;
    const index = this.queue.indexOf(pending);
    if (index === -1) {
      return;
    }
    this.queue.splice(index, 1);
    pending.abandon(deadlineExceeded(pending.id));
    if (this.queue.length === 0 && this.inFlight === null) {
      this.pump();
    }
  }

  private clearTimer(pending: PendingWrite): void {
    if (pending.timer !== null) {
      clearTimeout(pending.timer);
      pending.timer = null;
    }
  }

  private async apply<T>(op: WriteOperation<T>): Promise<CommitResult<T>> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        const value = await this.runInTransaction(op);
        return {
          operationId: op.id,
          value,
          attempts: attempt,
          committedAt: this.now(),
        };
      } catch (error) {
        if (!(error instanceof StoreBusyError)) {
          throw toCoreError(error);
        }
        if (attempt >= this.retry.maxAttempts) {
          throw unavailable(
            `UNAVAILABLE store stayed locked after ${String(attempt)} attempt(s) operation=${op.id}`,
            error
          );
        }
        const delayMs = computeBackoffDelay(attempt, this.retry);
        this.onWarn?.(
          `[writer] store busy operation=${op.id} attempt=${String(attempt)} retryInMs=${String(delayMs)}`
        );
        await this.sleep(delayMs);
      }
    }
  }

  private async runInTransaction<T>(op: WriteOperation<T>): Promise<T> {
    this.store.begin();
    try {
      const value = await op.run(this.store);
      this.store.commit();
      return value;
    } catch (error) {
      if (this.store.inTransaction) {
        this.store.rollback();
      }
      throw error;
    }
  }
}
