import { RateLimitStore, RateLimitWindow } from "../interfaces/rateLimit";

/**
 * Process-local counters. Suitable for tests and single-instance runs;
 * expired windows are pruned on every increment.
 */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();

  constructor(private readonly now: () => number = Date.now) {}

  async increment(key: string, windowMs: number): Promise<RateLimitWindow> {
    this.prune();

    const current = this.windows.get(key);

    const next: RateLimitWindow = current
      ? { count: current.count + 1, resetAt: current.resetAt }
      : { count: 1, resetAt: this.now() + windowMs };

    this.windows.set(key, next);
    return { ...next };
  }

  shutdown(): void {
    this.windows.clear();
  }

  private prune(): void {
    const now = this.now();
    for (const [key, entry] of this.windows.entries()) {
      if (entry.resetAt <= now) {
        this.windows.delete(key);
      }
    }
  }
}
