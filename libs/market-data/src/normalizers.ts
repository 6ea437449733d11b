import { z } from 'zod';
import { TRADING_PAIR_PATTERN } from '@libs/core';
import { TopOfBook } from './models';

const numeric = z.union([z.string(), z.number()]).transform((value) => Number(value));

const depthLevelSchema = z.array(numeric).min(1);

export const quantoDepthResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    bids: z.array(depthLevelSchema).default([]),
    asks: z.array(depthLevelSchema).default([]),
  }),
});

export const mexcTickerResponseSchema = z.object({
  success: z.literal(true),
  data: z.object({
    symbol: z.string(),
    lastPrice: numeric.optional(),
  }),
});

export const mexcContractDetailResponseSchema = z.object({
  success: z.literal(true),
  data: z.array(
    z
      .object({
        symbol: z.string(),
        baseCoin: z.string(),
        quoteCoin: z.string(),
        state: z.number().optional(),
      })
      .passthrough(),
  ),
});

/** Level-1 book from a depth payload; `null` unless both sides carry a finite positive price. */
export const normalizeQuantoDepth = (payload: unknown): TopOfBook | null => {
  const parsed = quantoDepthResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const [bestBidLevel] = parsed.data.data.bids;
  const [bestAskLevel] = parsed.data.data.asks;
  if (!bestBidLevel || !bestAskLevel) {
    return null;
  }
  const bestBid = bestBidLevel[0];
  const bestAsk = bestAskLevel[0];
  if (![bestBid, bestAsk].every((value) => Number.isFinite(value) && value > 0)) {
    return null;
  }
  return { bestBid, bestAsk };
};

export const normalizeMexcLastPrice = (payload: unknown): number | null => {
  const parsed = mexcTickerResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  const last = parsed.data.data.lastPrice;
  return last !== undefined && Number.isFinite(last) && last > 0 ? last : null;
};

/** Active contracts quoted in `quote`, as `BASE/QUOTE` pairs. */
export const normalizeMexcContractPairs = (payload: unknown, quote: string): string[] => {
  const parsed = mexcContractDetailResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return [];
  }
  const wanted = quote.toUpperCase();
  return parsed.data.data
    .filter((item) => (item.state ?? 0) === 0 && item.quoteCoin.toUpperCase() === wanted)
    .map((item) => `${item.baseCoin.toUpperCase()}/${wanted}`)
    .filter((pair) => TRADING_PAIR_PATTERN.test(pair));
};
