import { componentLogger, type Logger } from "../../logger";

type CooldownEntry = {
  startedAt: number;
  durationMs: number;
};

export type CooldownAcquireResult = { acquired: true } | { acquired: false; remainingMs: number };

export type CooldownStoreOptions = {
  now?: () => number;
  /** Interval of the background sweep; 0 disables it. */
  sweepIntervalMs?: number;
  logger?: Logger;
};

export function cooldownKey(senderId: string, path: readonly string[]): string {
  return `${senderId}:${path.join(" ")}`;
}

/**
 * Process-local cooldown windows keyed by sender and command path.
 * `tryAcquire` checks and starts a window in one synchronous step.
 */
export class CooldownStore {
  private readonly entries = new Map<string, CooldownEntry>();
  private readonly now: () => number;
  private readonly log: Logger;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(options: CooldownStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? componentLogger("cooldowns");
    const interval = options.sweepIntervalMs ?? 0;
    if (interval > 0) {
      this.sweeper = setInterval(() => this.sweep(), interval);
      this.sweeper.unref();
    }
  }

  tryAcquire(key: string, durationMs: number): CooldownAcquireResult {
    const now = this.now();
    const remainingMs = this.remainingAt(key, now);
    if (remainingMs > 0) {
      return { acquired: false, remainingMs };
    }
    if (durationMs > 0) {
      this.entries.set(key, { startedAt: now, durationMs });
    }
    return { acquired: true };
  }

  remaining(key: string): number {
    return this.remainingAt(key, this.now());
  }

  isActive(key: string): boolean {
    return this.remaining(key) > 0;
  }

  reset(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drops every window held by one sender. */
  resetSender(senderId: string): number {
    const prefix = `${senderId}:`;
    let removed = 0;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /** Removes expired windows and returns how many were dropped. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.startedAt + entry.durationMs <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.log.trace({ removed }, "Expired cooldowns swept");
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  private remainingAt(key: string, now: number): number {
    const entry = this.entries.get(key);
    if (!entry) {
      return 0;
    }
    const remaining = entry.startedAt + entry.durationMs - now;
    if (remaining <= 0) {
      this.entries.delete(key);
      return 0;
    }
    return remaining;
  }
}
