import type { TradingPair } from '@libs/core';

export interface TopOfBook {
  bestBid: number;
  bestAsk: number;
}

export interface VenueBMatch {
  marketCode: string;
  midPrice: number;
}

export interface SpreadObservation {
  pair: TradingPair;
  venueAPrice: number;
  venueBPrice: number;
  venueBMarketCode: string;
  spreadPercent: number;
  ts: number;
}

export type SpreadDirection = 'BUY_A_SELL_B' | 'SELL_A_BUY_B';

export interface AlertDecision {
  pair: TradingPair;
  spread: number;
  previous: number;
  fire: boolean;
  direction: SpreadDirection;
}

export type PairOutcome =
  | { pair: TradingPair; status: 'observed'; observation: SpreadObservation; alert: AlertDecision }
  | { pair: TradingPair; status: 'skipped'; reason: 'no_venue_a_price' | 'no_venue_b_match' }
  | { pair: TradingPair; status: 'failed'; message: string }
  | { pair: TradingPair; status: 'timed_out' };

export interface CycleSummary {
  startedAt: number;
  finishedAt: number;
  pairs: number;
  observed: number;
  skipped: number;
  alerted: number;
  failed: number;
  timedOut: number;
  autoDiscovered: boolean;
}

export interface ProviderSnapshot {
  provider: string;
  requests: number;
  failures: number;
  lastSuccessTs: number | null;
  lastError: string | null;
}
