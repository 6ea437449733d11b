import type { TradingPair } from '@libs/core';
import { TopOfBook } from './models';

/**
 * Reference venue. Implementations return `null` for unknown symbols and
 * transport errors instead of throwing.
 */
export interface VenueAPriceSource {
  readonly venue: string;
  fetchLastPrice(pair: TradingPair, signal?: AbortSignal): Promise<number | null>;
  listPairs(quote: string, limit: number, signal?: AbortSignal): Promise<TradingPair[]>;
}

/** Comparison venue, queried by market code at depth level 1. */
export interface VenueBDepthSource {
  readonly venue: string;
  fetchTopOfBook(marketCode: string, signal?: AbortSignal): Promise<TopOfBook | null>;
}

export const VENUE_A_PRICE_SOURCE = Symbol('VENUE_A_PRICE_SOURCE');
export const VENUE_B_DEPTH_SOURCE = Symbol('VENUE_B_DEPTH_SOURCE');
