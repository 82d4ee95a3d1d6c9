/**
 * Normalized news article returned to the agent.
 */
export interface Article {
  readonly id: string;
  readonly title: string;
  readonly body: string;
  /** Unix timestamp, seconds. */
  readonly publishedAt: number;
  readonly url: string;
  readonly source: string;
  readonly categories: readonly string[];
}

export type FetchNewsErrorKind =
  | "invalid_input"
  | "rate_limited"
  | "invalid_response"
  | "unexpected";

export interface FetchNewsSuccess {
  status: "success";
  articles: Article[];
}

export interface FetchNewsFailure {
  status: "error";
  kind: FetchNewsErrorKind;
  error: string;
}

export type FetchNewsResult = FetchNewsSuccess | FetchNewsFailure;

export function success(articles: Article[]): FetchNewsSuccess {
  return { status: "success", articles };
}

export function failure(
  kind: FetchNewsErrorKind,
  error: string
): FetchNewsFailure {
  return { status: "error", kind, error };
}

export function isSuccess(result: FetchNewsResult): result is FetchNewsSuccess {
  return result.status === "success";
}
