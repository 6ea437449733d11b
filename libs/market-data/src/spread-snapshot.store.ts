import { Injectable } from '@nestjs/common';
import type { TradingPair } from '@libs/core';
import { CycleSummary, SpreadObservation } from './models';
import { roundSpread } from './spread';

export interface SpreadSnapshot {
  observations: Readonly<Record<TradingPair, Readonly<SpreadObservation>>>;
  lastCycle: Readonly<CycleSummary> | null;
}

/**
 * Latest observation per pair. The polling loop is the only writer; readers
 * receive frozen copies and never see the live map.
 */
@Injectable()
export class SpreadSnapshotStore {
  private readonly observations = new Map<TradingPair, SpreadObservation>();
  private lastCycle: CycleSummary | null = null;

  record(observation: SpreadObservation): void {
    this.observations.set(observation.pair, { ...observation });
  }

  /** Drops observations for pairs that are no longer monitored; returns what was dropped. */
  retain(pairs: Iterable<TradingPair>): TradingPair[] {
    const keep = new Set(pairs);
    const dropped: TradingPair[] = [];
    for (const pair of this.observations.keys()) {
      if (!keep.has(pair)) {
        dropped.push(pair);
      }
    }
    dropped.forEach((pair) => this.observations.delete(pair));
    return dropped;
  }

  recordCycle(summary: CycleSummary): void {
    this.lastCycle = { ...summary };
  }

  get(pair: TradingPair): Readonly<SpreadObservation> | undefined {
    const observation = this.observations.get(pair);
    return observation ? Object.freeze({ ...observation }) : undefined;
  }

  getSnapshot(): SpreadSnapshot {
    const observations: Record<TradingPair, Readonly<SpreadObservation>> = {};
    for (const [pair, observation] of this.observations) {
      observations[pair] = Object.freeze({ ...observation });
    }
    return Object.freeze({
      observations: Object.freeze(observations),
      lastCycle: this.lastCycle ? Object.freeze({ ...this.lastCycle }) : null,
    });
  }

  /** Pair → spread rounded to 2 decimals, the shape the dashboard renders. */
  getRoundedSpreads(): Record<TradingPair, number> {
    const spreads: Record<TradingPair, number> = {};
    for (const [pair, observation] of this.observations) {
      spreads[pair] = roundSpread(observation.spreadPercent);
    }
    return spreads;
  }

  getLastCycle(): Readonly<CycleSummary> | null {
    return this.lastCycle ? Object.freeze({ ...this.lastCycle }) : null;
  }
}
