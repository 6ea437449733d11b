import type { TradingPair } from '@libs/core';
import { VenueBDepthSource } from './interfaces';
import { VenueBMatch } from './models';

// Order decides which market wins when several exist: USD before USDT,
// linear swaps before inverse swaps before spot.
export const VENUE_B_TEMPLATES: ReadonlyArray<(base: string) => string> = [
  (base) => `${base}-USD-SWAP-LIN`,
  (base) => `${base}-USDT-SWAP-LIN`,
  (base) => `${base}-USD-SWAP`,
  (base) => `${base}-USDT-SWAP`,
  (base) => `${base}-USD`,
  (base) => `${base}-USDT`,
];

export function* venueBCandidates(baseAsset: string): Generator<string, void, undefined> {
  for (const template of VENUE_B_TEMPLATES) {
    yield template(baseAsset);
  }
}

export const baseAssetOf = (pair: TradingPair): string => {
  const [base] = pair.split('/');
  return (base ?? '').trim().toUpperCase();
};

/** `BTC/USDT` → `BTC_USDT`, the MEXC contract naming. */
export const venueASymbolOf = (pair: TradingPair): string =>
  pair
    .trim()
    .toUpperCase()
    .split('/')
    .map((part) => part.trim())
    .join('_');

export const midPriceOf = (bestBid: number, bestAsk: number): number => (bestBid + bestAsk) / 2;

/**
 * Walks the candidate market codes in order and stops at the first one venue B
 * quotes on both sides. A rejected lookup counts as a miss.
 */
export const mapSymbol = async (
  baseAsset: string,
  depthSource: VenueBDepthSource,
  signal?: AbortSignal,
): Promise<VenueBMatch | null> => {
  for (const marketCode of venueBCandidates(baseAsset)) {
    if (signal?.aborted) {
      return null;
    }
    const book = await depthSource.fetchTopOfBook(marketCode, signal).catch(() => null);
    if (book) {
      return { marketCode, midPrice: midPriceOf(book.bestBid, book.bestAsk) };
    }
  }
  return null;
};
