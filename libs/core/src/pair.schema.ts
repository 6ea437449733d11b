import { z } from 'zod';

/** `BASE/QUOTE`, uppercase alphanumerics on both sides. */
export const TRADING_PAIR_PATTERN = /^[A-Z0-9]+\/[A-Z0-9]+$/;

export type TradingPair = string;

export const tradingPairSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(TRADING_PAIR_PATTERN, 'Pair must look like BASE/QUOTE, e.g. BTC/USDT');

export const pairsFileSchema = z.object({
  pairs: z.array(z.string()).default([]),
});

export type PairsFile = z.infer<typeof pairsFileSchema>;
