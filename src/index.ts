import axios, { AxiosInstance } from "axios";
import https from "https";
import { ServiceConfig } from "./config";
import { RateLimitStore } from "./interfaces/rateLimit";
import { fetchNews } from "./modules/fetchNews";
import {
  FETCH_NEWS_TOOL_NAME,
  FetchNewsTool,
} from "./modules/fetchNewsTool";
import { RateLimiter } from "./modules/rateLimiter";
import { ValkeyRateLimitStore } from "./store/valkeyStore";

export { loadConfig, ConfigError } from "./config";
export type { ServiceConfig } from "./config";
export { logger } from "./logger";
export * from "./interfaces/news";
export type * from "./interfaces/rateLimit";
export type * from "./interfaces/tool";
export {
  FetchNewsTool,
  FetchNewsInputSchema,
  FETCH_NEWS_TOOL_NAME,
  FETCH_NEWS_PROMPT,
} from "./modules/fetchNewsTool";
export type {
  FetchNewsInput,
  FetchNewsToolDeps,
  NewsFetcher,
} from "./modules/fetchNewsTool";
export { fetchNews, NEWS_URL } from "./modules/fetchNews";
export { RateLimiter, RATE_LIMIT_MESSAGE } from "./modules/rateLimiter";
export { MemoryRateLimitStore } from "./store/memoryStore";
export { ValkeyRateLimitStore } from "./store/valkeyStore";
export {
  FetchNewsError,
  InvalidResponseFormatError,
  RateLimitExceededError,
  INVALID_RESPONSE_MESSAGE,
} from "./utils/errors";

export type FetchNewsToolOverrides = {
  axiosClient?: AxiosInstance;
  store?: RateLimitStore;
  now?: () => number;
};

export function createAxiosClient(): AxiosInstance {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  return axios.create({
    timeout: 10_000,
    httpsAgent,
  });
}

/**
 * Wires the tool with its HTTP client and rate-limit store.
 * Without an injected store, counters go to Valkey.
 */
export function createFetchNewsTool(
  config: ServiceConfig,
  overrides: FetchNewsToolOverrides = {}
): FetchNewsTool {
  const axiosClient = overrides.axiosClient ?? createAxiosClient();
  const store = overrides.store ?? new ValkeyRateLimitStore(config.valkey);

  const rateLimiter = new RateLimiter(store, {
    name: FETCH_NEWS_TOOL_NAME,
    maxRequests: config.rateLimit.maxRequests,
    intervalMinutes: config.rateLimit.intervalMinutes,
  });

  return new FetchNewsTool({
    fetcher: (apiKey, token, timestamp) =>
      fetchNews({ axiosClient, apiKey, token, timestamp }),
    rateLimiter,
    defaultApiKey: config.cryptoCompareApiKey,
    now: overrides.now,
  });
}
