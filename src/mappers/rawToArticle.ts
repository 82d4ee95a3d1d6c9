import { Article } from "../interfaces/news";
import {
  NewsEnvelopeSchema,
  RawArticle,
  RawArticleListSchema,
} from "../schemas/cryptoCompareNews.schema";
import { InvalidResponseFormatError } from "../utils/errors";

export function rawToArticle(raw: RawArticle): Article {
  return Object.freeze({
    id: raw.id,
    title: raw.title,
    body: raw.body,
    publishedAt: raw.published_on,
    url: raw.url,
    source: raw.source,
    categories: Object.freeze([...raw.categories]),
  });
}

/**
 * Decodes a raw provider payload into articles, in provider order.
 * Throws InvalidResponseFormatError when the envelope or any entry
 * does not match.
 */
export function parseNewsResponse(payload: unknown): Article[] {
  const envelope = NewsEnvelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new InvalidResponseFormatError(envelope.error.issues);
  }

  const entries = RawArticleListSchema.safeParse(envelope.data.Data);
  if (!entries.success) {
    throw new InvalidResponseFormatError(entries.error.issues);
  }

  return entries.data.map(rawToArticle);
}
