import { FetchNewsErrorKind } from "../interfaces/news";

export const INVALID_RESPONSE_MESSAGE =
  "Invalid response format from CryptoCompare API";

export class FetchNewsError extends Error {
  constructor(readonly kind: FetchNewsErrorKind, message: string) {
    super(message);
    this.name = "FetchNewsError";
  }
}

export class RateLimitExceededError extends FetchNewsError {
  constructor(message: string) {
    super("rate_limited", message);
    this.name = "RateLimitExceededError";
  }
}

export class InvalidResponseFormatError extends FetchNewsError {
  constructor(readonly issues: unknown[] = []) {
    super("invalid_response", INVALID_RESPONSE_MESSAGE);
    this.name = "InvalidResponseFormatError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
