import IORedis, { RedisOptions } from "ioredis";
import { RateLimitStore, RateLimitWindow } from "../interfaces/rateLimit";
import { logger } from "../logger";

export type ValkeyStoreOptions = {
  host: string;
  port: number;
  password?: string;
  keyPrefix?: string;
};

/**
 * Rate-limit counters in Valkey, shared by every instance of the service.
 */
export class ValkeyRateLimitStore implements RateLimitStore {
  private readonly redis: IORedis;
  private readonly keyPrefix: string;
  private isShuttingDown = false;
  private available = false;

  constructor(options: ValkeyStoreOptions) {
    this.keyPrefix = options.keyPrefix ?? "ratelimit:";

    const redisOpts: RedisOptions = {
      host: options.host,
      port: options.port,
      password: options.password,
      retryStrategy: () => (this.isShuttingDown ? null : 5000),
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      lazyConnect: false,
    };

    this.redis = new IORedis(redisOpts);

    this.redis.on("connect", () => {
      if (!this.available) {
        this.available = true;
        logger.info("Valkey connected");
      }
    });

    this.redis.on("error", (err: Error) => {
      if (this.available) {
        this.available = false;
        logger.warn({ err: err.message }, "Valkey unavailable");
      }
    });

    this.redis.on("close", () => {
      if (this.available) {
        this.available = false;
        logger.warn("Valkey connection closed");
      }
    });
  }

  async increment(key: string, windowMs: number): Promise<RateLimitWindow> {
    const fullKey = this.keyPrefix + key;
    const count = await this.redis.incr(fullKey);

    if (count === 1) {
      await this.redis.pexpire(fullKey, windowMs);
    }

    const ttl = await this.redis.pttl(fullKey);
    // -1: key without expiry (expire lost after a crash), re-arm it
    if (ttl < 0) {
      await this.redis.pexpire(fullKey, windowMs);
      return { count, resetAt: Date.now() + windowMs };
    }

    return { count, resetAt: Date.now() + ttl };
  }

  shutdown(): void {
    this.isShuttingDown = true;
    this.redis.disconnect();
  }
}
