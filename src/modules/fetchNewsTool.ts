import { z } from "zod";
import { failure, FetchNewsResult, success } from "../interfaces/news";
import { RateLimitDecision } from "../interfaces/rateLimit";
import { ToolContext } from "../interfaces/tool";
import { parseNewsResponse } from "../mappers/rawToArticle";
import { logger } from "../logger";
import {
  errorMessage,
  FetchNewsError,
  InvalidResponseFormatError,
  RateLimitExceededError,
} from "../utils/errors";

export const FETCH_NEWS_TOOL_NAME = "cryptocompare_fetch_news";

export const FETCH_NEWS_PROMPT = `
This tool fetches the latest cryptocurrency news articles for a specific token.
Articles are the most recent ones published up to the current time.
Returns articles in English with details like title, body, source, and publish time.
`;

export const FetchNewsInputSchema = z.object({
  token: z
    .string()
    .refine((value) => value.trim().length > 0, "token must not be empty")
    .describe('Cryptocurrency token symbol, e.g. "BTC" or "ETH"'),
});

export type FetchNewsInput = z.infer<typeof FetchNewsInputSchema>;

/** Remote news lookup: (apiKey, token, unix seconds) -> raw JSON body. */
export type NewsFetcher = (
  apiKey: string,
  token: string,
  timestamp: number
) => Promise<unknown>;

export interface RateLimitCheck {
  check(agentId: string | null): Promise<RateLimitDecision>;
  shutdown(): void;
}

export type FetchNewsToolDeps = {
  fetcher: NewsFetcher;
  rateLimiter: RateLimitCheck;
  /** Used when the call context carries no `api_key`. */
  defaultApiKey?: string;
  now?: () => number;
};

export class FetchNewsTool {
  readonly name = FETCH_NEWS_TOOL_NAME;
  readonly description = FETCH_NEWS_PROMPT;
  readonly inputSchema = FetchNewsInputSchema;

  private readonly now: () => number;

  constructor(private readonly deps: FetchNewsToolDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Never rejects: every failure is reported through the `error` branch.
   */
  async invoke(
    input: unknown,
    context: ToolContext = {}
  ): Promise<FetchNewsResult> {
    const parsed = FetchNewsInputSchema.safeParse(input);
    if (!parsed.success) {
      return failure("invalid_input", parsed.error.issues[0].message);
    }

    const { token } = parsed.data;
    const agentId = context.agent?.id ?? null;

    try {
      const decision = await this.deps.rateLimiter.check(agentId);
      if (decision.limited) {
        throw new RateLimitExceededError(decision.message);
      }

      const timestamp = Math.floor(this.now() / 1000);
      const apiKey = context.config?.api_key ?? this.deps.defaultApiKey ?? "";

      const payload = await this.deps.fetcher(apiKey, token, timestamp);
      const articles = parseNewsResponse(payload);

      logger.debug(
        { token, agentId, count: articles.length },
        "Fetched CryptoCompare news"
      );

      return success(articles);
    } catch (err) {
      if (err instanceof FetchNewsError) {
        logger.warn(
          {
            token,
            agentId,
            kind: err.kind,
            issues:
              err instanceof InvalidResponseFormatError ? err.issues : undefined,
          },
          "CryptoCompare news request rejected"
        );
        return failure(err.kind, err.message);
      }

      logger.error(
        { err, token, agentId },
        "CryptoCompare news request failed"
      );
      return failure("unexpected", errorMessage(err));
    }
  }

  /**
   * Closes the rate-limit store connection. The tool must not be invoked
   * afterwards.
   */
  shutdown(): void {
    this.deps.rateLimiter.shutdown();
  }
}
