/**
 * Zod schemas for external Data API responses, checked at the system
 * boundary before any row reaches the stores.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Aggregate bars  (v2/aggs/ticker/…)
// ---------------------------------------------------------------------------

/** A single OHLCV bar as returned by the aggregate endpoint. */
export const AggBarSchema = z
  .object({
    t: z.number(), // bar open, ms epoch
    o: z.number(),
    h: z.number(),
    l: z.number(),
    c: z.number(),
    v: z.number(),
  })
  .passthrough();

export type AggBar = z.infer<typeof AggBarSchema>;

/** `results` is omitted entirely when the provider has no bars for the range. */
export const AggregateResponseSchema = z
  .object({
    status: z.string().optional(),
    ticker: z.string().optional(),
    resultsCount: z.number().optional(),
    results: z.array(AggBarSchema).optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type AggregateResponse = z.infer<typeof AggregateResponseSchema>;
