import Bottleneck from "bottleneck";

/**
 * Outbound pacing for CryptoCompare: at most 4 requests in flight,
 * spaced 250ms apart (well under the free tier's 50 req/s).
 */
export const cryptoCompareLimiter = new Bottleneck({
  maxConcurrent: 4,
  minTime: 250,
});
