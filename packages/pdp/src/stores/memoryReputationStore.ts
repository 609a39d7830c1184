import type { IncrementArgs, ReputationStore } from "../types.js";

interface Entry {
  count: number;
  windowStart: number;
  windowMs: number;
}

/**
 * In-process reputation counters over a fixed window that opens at a key's
 * first attempt and closes `windowMs` later; the next attempt starts a new one.
 *
 * The read-modify-write in incrementAndCheck never yields to the event loop,
 * so concurrent callers cannot lose increments. Elapsed windows are reset
 * lazily on access; `sweep` / `startSweeper` reclaim keys nobody asks about.
 */
export class MemoryReputationStore implements ReputationStore {
  private entries = new Map<string, Entry>();
  private sweeper: NodeJS.Timeout | null = null;

  async incrementAndCheck(args: IncrementArgs): Promise<number> {
    const { key, windowMs, now } = args;
    const entry = this.entries.get(key);
    if (!entry || now - entry.windowStart >= entry.windowMs) {
      this.entries.set(key, { count: 1, windowStart: now, windowMs });
      return 1;
    }
    entry.count += 1;
    return entry.count;
  }

  /** Drop entries whose window has elapsed. Returns how many were removed. */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.windowStart >= entry.windowMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Sweep every `intervalMs` on a timer that does not keep the process alive. */
  startSweeper(intervalMs: number, clock: () => number = Date.now): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => this.sweep(clock()), intervalMs);
    this.sweeper.unref();
  }

  stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
