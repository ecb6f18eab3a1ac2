export interface PaintCooldownOptions {
  readonly cooldownMs?: number;
  readonly maxTracked?: number;
  readonly now?: () => number;
}

export const DEFAULT_PAINT_COOLDOWN_MS = 1_000;
const DEFAULT_MAX_TRACKED = 10_000;

/**
 * Per-user paint throttle. Process-local, which is enough because the service
 * runs as a single process.
 */
export class PaintCooldown {
  private readonly cooldownMs: number;
  private readonly maxTracked: number;
  private readonly now: () => number;
  private readonly lastAcceptedAt = new Map<string, number>();

  constructor(options: PaintCooldownOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_PAINT_COOLDOWN_MS;
    this.maxTracked = options.maxTracked ?? DEFAULT_MAX_TRACKED;
    this.now = options.now ?? Date.now;
  }

  get trackedUsers(): number {
    return this.lastAcceptedAt.size;
  }

  /** Records the attempt and returns true when the user is outside their cooldown window. */
  tryAcquire(userId: string): boolean {
    const now = this.now();
    const last = this.lastAcceptedAt.get(userId);
    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }
    this.lastAcceptedAt.set(userId, now);
    if (this.lastAcceptedAt.size > this.maxTracked) {
      this.prune(now);
    }
    return true;
  }

  private prune(now: number): void {
    for (const [userId, acceptedAt] of this.lastAcceptedAt) {
      if (now - acceptedAt >= this.cooldownMs) {
        this.lastAcceptedAt.delete(userId);
      }
    }
  }
}
