export interface RateLimitDecision {
  limited: boolean;
  /** Empty when the call is allowed. */
  message: string;
}

export interface RateLimitWindow {
  count: number;
  /** Epoch ms at which the current window closes. */
  resetAt: number;
}

/**
 * Counter storage behind the per-agent rate limiter.
 */
export interface RateLimitStore {
  /**
   * Increments the counter for `key`, opening a new window of `windowMs`
   * when none is active.
   */
  increment(key: string, windowMs: number): Promise<RateLimitWindow>;
  /** Releases connections and timers held by the store. */
  shutdown(): void;
}
