import { z } from "zod";

/**
 * Single entry of the CryptoCompare `/data/v2/news/` feed
 */
export const RawArticleSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string(),
  body: z.string(),
  published_on: z.number().int(),
  url: z.string(),
  source: z.string(),

  // "Blockchain|Mining|Trading"; an empty string yields [""]
  categories: z.string().transform((value) => value.split("|")),
});

/**
 * Response envelope. Only `Data` is required, the provider's other
 * fields (Type, Message, Promoted, RateLimit...) are kept untouched.
 */
export const NewsEnvelopeSchema = z
  .object({
    Data: z.array(z.unknown()),
  })
  .passthrough();

export const RawArticleListSchema = z.array(RawArticleSchema);

export type RawArticle = z.infer<typeof RawArticleSchema>;
export type NewsEnvelope = z.infer<typeof NewsEnvelopeSchema>;
