import { RateLimitDecision, RateLimitStore } from "../interfaces/rateLimit";
import { logger } from "../logger";

export const RATE_LIMIT_MESSAGE = "Rate limit exceeded";
export const ANONYMOUS_AGENT = "anonymous";

export type RateLimiterConfig = {
  /** Scopes the counters, normally the tool name. */
  name: string;
  maxRequests: number;
  intervalMinutes: number;
};

/**
 * Fixed-window limiter keyed by agent. The first call opens a window of
 * `intervalMinutes`; calls beyond `maxRequests` inside it are refused.
 */
export class RateLimiter {
  constructor(
    private readonly store: RateLimitStore,
    private readonly config: RateLimiterConfig
  ) {}

  async check(agentId: string | null): Promise<RateLimitDecision> {
    const key = this.keyFor(agentId);
    const windowMs = this.config.intervalMinutes * 60_000;

    const window = await this.store.increment(key, windowMs);

    if (window.count > this.config.maxRequests) {
      logger.info(
        {
          name: this.config.name,
          agentId: agentId ?? ANONYMOUS_AGENT,
          resetAt: new Date(window.resetAt).toISOString(),
        },
        "Rate limit exceeded"
      );
      return { limited: true, message: RATE_LIMIT_MESSAGE };
    }

    return { limited: false, message: "" };
  }

  shutdown(): void {
    this.store.shutdown();
  }

  private keyFor(agentId: string | null): string {
    return `${agentId ?? ANONYMOUS_AGENT}:${this.config.name}`;
  }
}
