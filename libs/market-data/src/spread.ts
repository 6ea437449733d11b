import type { TradingPair } from '@libs/core';
import { AlertDecision, SpreadDirection } from './models';

/** Signed percentage of venue B over venue A; venue A is always the denominator. */
export const computeSpread = (venueAPrice: number, venueBPrice: number): number =>
  ((venueBPrice - venueAPrice) / venueAPrice) * 100;

export const roundSpread = (spread: number): number => Math.round(spread * 100) / 100;

export const spreadDirectionOf = (spread: number): SpreadDirection =>
  spread > 0 ? 'BUY_A_SELL_B' : 'SELL_A_BUY_B';

export const isUsablePrice = (price: number | null | undefined): price is number =>
  typeof price === 'number' && Number.isFinite(price) && price > 0;

/**
 * Last spread per pair. Fires only when the magnitude crosses the threshold and
 * grows relative to the previous observation; the stored value is replaced on
 * every evaluation.
 */
export class AlertGate {
  private readonly lastSpread = new Map<TradingPair, number>();

  constructor(private readonly threshold: number) {}

  evaluate(pair: TradingPair, spread: number): AlertDecision {
    const previous = this.lastSpread.get(pair) ?? 0;
    const magnitude = Math.abs(spread);
    const fire = magnitude >= this.threshold && magnitude > Math.abs(previous);
    this.lastSpread.set(pair, spread);
    return { pair, spread, previous, fire, direction: spreadDirectionOf(spread) };
  }

  previousOf(pair: TradingPair): number | undefined {
    return this.lastSpread.get(pair);
  }

  forget(pairs: Iterable<TradingPair>): void {
    for (const pair of pairs) {
      this.lastSpread.delete(pair);
    }
  }

  get size(): number {
    return this.lastSpread.size;
  }
}
