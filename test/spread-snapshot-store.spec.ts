import { describe, expect, it } from 'vitest';
import { SpreadObservation, SpreadSnapshotStore } from '@libs/market-data';

const observation = (pair: string, spreadPercent: number): SpreadObservation => ({
  pair,
  venueAPrice: 100,
  venueBPrice: 100 + spreadPercent,
  venueBMarketCode: `${pair.split('/')[0]}-USDT-SWAP`,
  spreadPercent,
  ts: 1_700_000_000_000,
});

describe('SpreadSnapshotStore', () => {
  it('keeps the latest observation per pair', () => {
    const store = new SpreadSnapshotStore();
    store.record(observation('BTC/USDT', 0.4));
    store.record(observation('BTC/USDT', 1.234));

    expect(store.get('BTC/USDT')?.spreadPercent).toBe(1.234);
    expect(store.getRoundedSpreads()).toEqual({ 'BTC/USDT': 1.23 });
  });

  it('hands readers frozen copies', () => {
    const store = new SpreadSnapshotStore();
    store.record(observation('ETH/USDT', -0.5));

    const snapshot = store.getSnapshot();
    expect(Object.isFrozen(snapshot.observations)).toBe(true);
    expect(Object.isFrozen(snapshot.observations['ETH/USDT'])).toBe(true);

    store.record(observation('ETH/USDT', 2));
    expect(snapshot.observations['ETH/USDT'].spreadPercent).toBe(-0.5);
  });

  it('drops pairs that are no longer monitored', () => {
    const store = new SpreadSnapshotStore();
    store.record(observation('BTC/USDT', 1));
    store.record(observation('ETH/USDT', 1));

    expect(store.retain(['ETH/USDT'])).toEqual(['BTC/USDT']);
    expect(Object.keys(store.getSnapshot().observations)).toEqual(['ETH/USDT']);
  });

  it('records the last cycle summary', () => {
    const store = new SpreadSnapshotStore();
    expect(store.getLastCycle()).toBeNull();

    store.recordCycle({
      startedAt: 1,
      finishedAt: 2,
      pairs: 3,
      observed: 1,
      skipped: 1,
      alerted: 0,
      failed: 1,
      timedOut: 0,
      autoDiscovered: false,
    });
    expect(store.getLastCycle()).toMatchObject({ pairs: 3, observed: 1, failed: 1 });
  });
});
