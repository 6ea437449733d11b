import { afterEach, describe, expect, it, vi } from 'vitest';
import { SpreadSnapshotStore, TopOfBook, VenueAPriceSource, VenueBDepthSource } from '@libs/market-data';
import { SpreadPollerService } from '../apps/monitor/src/spread/spread-poller.service';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const buildConfigService = (overrides: Record<string, unknown> = {}) => ({
  get: (key: string, fallback?: unknown) => {
    const map: Record<string, unknown> = {
      POLL_INTERVAL_SECONDS: 5,
      MONITOR_CONCURRENCY: 10,
      PAIR_TIMEOUT_MS: 60_000,
      SPREAD_THRESHOLD: 1.0,
      AUTO_DISCOVERY_ENABLED: true,
      AUTO_DISCOVERY_QUOTE: 'USDT',
      AUTO_DISCOVERY_MAX_PAIRS: 50,
      STARTUP_NOTIFICATION_ENABLED: true,
      ...overrides,
    };
    return map[key] ?? fallback;
  },
});

const buildScheduler = () => {
  const handles = new Map<string, NodeJS.Timeout>();
  return {
    addInterval: vi.fn((name: string, handle: NodeJS.Timeout) => {
      handles.set(name, handle);
    }),
    doesExist: vi.fn((_type: string, name: string) => handles.has(name)),
    deleteInterval: vi.fn((name: string) => {
      clearInterval(handles.get(name));
      handles.delete(name);
    }),
  };
};

const buildVenueA = (prices: Record<string, number | null>): VenueAPriceSource => ({
  venue: 'MEXC',
  fetchLastPrice: vi.fn(async (pair: string) => prices[pair] ?? null),
  listPairs: vi.fn(async () => []),
});

const buildVenueB = (books: Record<string, TopOfBook>): VenueBDepthSource => ({
  venue: 'Quanto',
  fetchTopOfBook: vi.fn(async (marketCode: string) => books[marketCode] ?? null),
});

const setup = (options: {
  pairs?: string[];
  venueA?: VenueAPriceSource;
  venueB?: VenueBDepthSource;
  config?: Record<string, unknown>;
} = {}) => {
  let pairs = options.pairs ?? ['BTC/USDT'];
  const pairRegistry = { list: vi.fn(() => [...pairs]) };
  const venueA = options.venueA ?? buildVenueA({ 'BTC/USDT': 50_000 });
  const venueB =
    options.venueB ?? buildVenueB({ 'BTC-USDT-SWAP': { bestBid: 50_400, bestAsk: 50_600 } });
  const store = new SpreadSnapshotStore();
  const telegram = { notify: vi.fn().mockResolvedValue(undefined) };
  const scheduler = buildScheduler();
  const poller = new SpreadPollerService(
    buildConfigService(options.config) as never,
    scheduler as never,
    pairRegistry as never,
    venueA,
    venueB,
    store,
    telegram as never,
  );
  return {
    poller,
    store,
    telegram,
    scheduler,
    venueA,
    venueB,
    setPairs: (next: string[]) => {
      pairs = next;
    },
  };
};

describe('SpreadPollerService', () => {
  const pollers: SpreadPollerService[] = [];

  afterEach(async () => {
    await Promise.all(pollers.splice(0).map((poller) => poller.onModuleDestroy()));
    vi.restoreAllMocks();
  });

  it('observes BTC/USDT end to end and sends the alert', async () => {
    const { poller, store, telegram } = setup();

    const summary = await poller.runCycle();

    expect(summary).toMatchObject({ pairs: 1, observed: 1, alerted: 1, skipped: 0, failed: 0 });
    expect(store.get('BTC/USDT')).toMatchObject({
      venueAPrice: 50_000,
      venueBPrice: 50_500,
      venueBMarketCode: 'BTC-USDT-SWAP',
      spreadPercent: 1,
    });
    expect(store.getRoundedSpreads()).toEqual({ 'BTC/USDT': 1 });
    expect(telegram.notify).toHaveBeenCalledWith('🟢 <b>BTC/USDT</b>\nSpread: 1.00%\nBuy on MEXC / Sell on Quanto');
  });

  it('does not repeat an alert while the spread holds steady', async () => {
    const { poller, telegram } = setup();

    await poller.runCycle();
    await poller.runCycle();

    expect(telegram.notify).toHaveBeenCalledTimes(1);
  });

  it.each([null, 0])('skips a pair when venue A returns %s', async (price) => {
    const venueA = buildVenueA({ 'BTC/USDT': price });
    const { poller, store, venueB } = setup({ venueA });

    await expect(poller.processPair('BTC/USDT')).resolves.toEqual({
      pair: 'BTC/USDT',
      status: 'skipped',
      reason: 'no_venue_a_price',
    });
    expect(store.get('BTC/USDT')).toBeUndefined();
    expect(venueB.fetchTopOfBook).not.toHaveBeenCalled();
  });

  it('leaves the alert state untouched for skipped pairs', async () => {
    const prices: Record<string, number | null> = { 'BTC/USDT': 50_000 };
    const venueA = buildVenueA(prices);
    const { poller } = setup({ venueA });

    await poller.processPair('BTC/USDT');
    prices['BTC/USDT'] = null;
    await poller.processPair('BTC/USDT');
    prices['BTC/USDT'] = 50_000;
    const outcome = await poller.processPair('BTC/USDT');

    expect(outcome).toMatchObject({ status: 'observed', alert: { previous: 1, fire: false } });
  });

  it('skips a pair venue B does not list', async () => {
    const venueA = buildVenueA({ 'DOGE/USDT': 0.1 });
    const { poller, store, venueB } = setup({ pairs: ['DOGE/USDT'], venueA });

    await expect(poller.processPair('DOGE/USDT')).resolves.toMatchObject({
      status: 'skipped',
      reason: 'no_venue_b_match',
    });
    expect(venueB.fetchTopOfBook).toHaveBeenCalledTimes(6);
    expect(store.get('DOGE/USDT')).toBeUndefined();
  });

  it('isolates a failing pair from the rest of the cycle', async () => {
    const venueA: VenueAPriceSource = {
      venue: 'MEXC',
      fetchLastPrice: vi.fn(async (pair: string) => {
        if (pair === 'ETH/USDT') {
          throw new Error('socket hang up');
        }
        return 50_000;
      }),
      listPairs: vi.fn(async () => []),
    };
    const { poller, store } = setup({ pairs: ['ETH/USDT', 'BTC/USDT'], venueA });

    const summary = await poller.runCycle();

    expect(summary).toMatchObject({ pairs: 2, observed: 1, failed: 1 });
    expect(store.get('BTC/USDT')?.spreadPercent).toBe(1);
    expect(store.get('ETH/USDT')).toBeUndefined();
  });

  it('keeps at most MONITOR_CONCURRENCY pairs in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const venueA: VenueAPriceSource = {
      venue: 'MEXC',
      fetchLastPrice: vi.fn(async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await sleep(5);
        inFlight -= 1;
        return null;
      }),
      listPairs: vi.fn(async () => []),
    };
    const pairs = Array.from({ length: 12 }, (_, index) => `C${index}/USDT`);
    const { poller } = setup({ pairs, venueA, config: { MONITOR_CONCURRENCY: 3 } });

    const summary = await poller.runCycle();

    expect(summary).toMatchObject({ pairs: 12, skipped: 12 });
    expect(peak).toBe(3);
  });

  it('turns an overlapping tick into a no-op', async () => {
    let release: (price: number) => void = () => undefined;
    const venueA: VenueAPriceSource = {
      venue: 'MEXC',
      fetchLastPrice: vi.fn(
        () =>
          new Promise<number>((resolve) => {
            release = resolve;
          }),
      ),
      listPairs: vi.fn(async () => []),
    };
    const { poller } = setup({ venueA });

    const first = poller.runCycle();
    expect(poller.isRunning()).toBe(true);
    await expect(poller.runCycle()).resolves.toBeNull();
    await sleep(0);

    release(50_000);
    await expect(first).resolves.toMatchObject({ observed: 1 });
    expect(poller.isRunning()).toBe(false);
    expect(venueA.fetchLastPrice).toHaveBeenCalledTimes(1);
  });

  it('times out a slow pair and ignores its late result', async () => {
    let release: (price: number) => void = () => undefined;
    const venueA: VenueAPriceSource = {
      venue: 'MEXC',
      fetchLastPrice: vi.fn(
        () =>
          new Promise<number>((resolve) => {
            release = resolve;
          }),
      ),
      listPairs: vi.fn(async () => []),
    };
    const { poller, store, venueB } = setup({ venueA, config: { PAIR_TIMEOUT_MS: 20 } });

    const summary = await poller.runCycle();
    expect(summary).toMatchObject({ pairs: 1, timedOut: 1, observed: 0 });

    release(50_000);
    await sleep(10);
    expect(store.get('BTC/USDT')).toBeUndefined();
    expect(venueB.fetchTopOfBook).not.toHaveBeenCalled();
  });

  it('discovers pairs on venue A when none are configured', async () => {
    const venueA = buildVenueA({ 'BTC/USDT': 50_000 });
    vi.mocked(venueA.listPairs).mockResolvedValue(['BTC/USDT']);
    const { poller, store } = setup({ pairs: [], venueA });

    const summary = await poller.runCycle();
    await poller.runCycle();

    expect(summary).toMatchObject({ pairs: 1, observed: 1, autoDiscovered: true });
    expect(venueA.listPairs).toHaveBeenCalledTimes(1);
    expect(venueA.listPairs).toHaveBeenCalledWith('USDT', 50, expect.any(AbortSignal));
    expect(store.get('BTC/USDT')?.spreadPercent).toBe(1);
  });

  it('keeps discovered pairs and their alert state when a rediscovery comes back empty', async () => {
    let now = 1_700_000_000_000;
    vi.spyOn(Date, 'now').mockImplementation(() => now);
    const venueA = buildVenueA({ 'BTC/USDT': 50_000 });
    vi.mocked(venueA.listPairs)
      .mockResolvedValueOnce(['BTC/USDT'])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce(['BTC/USDT']);
    const { poller, store, telegram } = setup({ pairs: [], venueA });

    await poller.runCycle();
    now += 11 * 60_000;
    const emptyRediscovery = await poller.runCycle();
    now += 60_000;
    await poller.runCycle();

    expect(venueA.listPairs).toHaveBeenCalledTimes(3);
    expect(emptyRediscovery).toMatchObject({ pairs: 1, observed: 1, alerted: 0 });
    expect(store.get('BTC/USDT')?.spreadPercent).toBe(1);
    expect(telegram.notify).toHaveBeenCalledTimes(1);
  });

  it('leaves existing observations alone when the first discovery is empty', async () => {
    const { poller, store, setPairs } = setup();

    await poller.runCycle();
    setPairs([]);
    const summary = await poller.runCycle();

    expect(summary).toMatchObject({ pairs: 0, autoDiscovered: true });
    expect(store.get('BTC/USDT')?.spreadPercent).toBe(1);
  });

  it('does not discover pairs when auto-discovery is disabled', async () => {
    const { poller, venueA } = setup({ pairs: [], config: { AUTO_DISCOVERY_ENABLED: false } });

    await expect(poller.runCycle()).resolves.toMatchObject({ pairs: 0 });
    expect(venueA.listPairs).not.toHaveBeenCalled();
  });

  it('drops observations for pairs the operator removed', async () => {
    const venueA = buildVenueA({ 'BTC/USDT': 50_000, 'ETH/USDT': 3_000 });
    const venueB = buildVenueB({
      'BTC-USDT-SWAP': { bestBid: 50_400, bestAsk: 50_600 },
      'ETH-USD-SWAP-LIN': { bestBid: 3_000, bestAsk: 3_002 },
    });
    const { poller, store, setPairs } = setup({ pairs: ['BTC/USDT', 'ETH/USDT'], venueA, venueB });

    await poller.runCycle();
    expect(Object.keys(store.getSnapshot().observations).sort()).toEqual(['BTC/USDT', 'ETH/USDT']);

    setPairs(['ETH/USDT']);
    await poller.runCycle();
    expect(Object.keys(store.getSnapshot().observations)).toEqual(['ETH/USDT']);
  });

  it('reports a loop-level failure and keeps going', async () => {
    const venueA = buildVenueA({});
    vi.mocked(venueA.listPairs).mockRejectedValue(new Error('boom'));
    const { poller, telegram } = setup({ pairs: [], venueA });

    await expect(poller.runCycle()).resolves.toBeNull();
    expect(telegram.notify).toHaveBeenCalledWith('❌ Error: boom');
    expect(poller.isRunning()).toBe(false);
  });

  it('schedules the poll interval on bootstrap and clears it on shutdown', async () => {
    const { poller, scheduler, telegram } = setup();
    pollers.push(poller);

    poller.onApplicationBootstrap();
    expect(scheduler.addInterval).toHaveBeenCalledWith('spread-poll', expect.anything());
    expect(telegram.notify).toHaveBeenCalledWith('🤖 Bot started.\nMonitoring 1 pairs on MEXC.');

    await poller.onModuleDestroy();
    expect(scheduler.deleteInterval).toHaveBeenCalledWith('spread-poll');
    expect(poller.isRunning()).toBe(false);
  });
});
