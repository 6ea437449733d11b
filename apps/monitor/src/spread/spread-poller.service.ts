import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { PairRegistryService, TradingPair } from '@libs/core';
import {
  AlertGate,
  CycleSummary,
  DeadlineExceededError,
  PairOutcome,
  SpreadSnapshotStore,
  VENUE_A_PRICE_SOURCE,
  VENUE_B_DEPTH_SOURCE,
  baseAssetOf,
  computeSpread,
  isUsablePrice,
  mapSymbol,
  runWithConcurrency,
  withDeadline,
} from '@libs/market-data';
import type { VenueAPriceSource, VenueBDepthSource } from '@libs/market-data';
import {
  TelegramService,
  VenueLabels,
  formatLoopErrorMessage,
  formatSpreadAlert,
  formatStartupMessage,
} from '@libs/telegram';

export const SPREAD_POLL_INTERVAL = 'spread-poll';
const DISCOVERY_TTL_MS = 10 * 60_000;

@Injectable()
export class SpreadPollerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(SpreadPollerService.name);
  private readonly intervalMs: number;
  private readonly concurrency: number;
  private readonly pairTimeoutMs: number;
  private readonly threshold: number;
  private readonly autoDiscoveryEnabled: boolean;
  private readonly autoDiscoveryQuote: string;
  private readonly autoDiscoveryMax: number;
  private readonly startupNotification: boolean;
  private readonly venues: VenueLabels;
  private readonly alertGate: AlertGate;
  private readonly shutdown = new AbortController();
  private currentCycle: Promise<CycleSummary | null> | null = null;
  private discovered: { pairs: TradingPair[]; at: number } | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly pairRegistry: PairRegistryService,
    @Inject(VENUE_A_PRICE_SOURCE) private readonly venueA: VenueAPriceSource,
    @Inject(VENUE_B_DEPTH_SOURCE) private readonly venueB: VenueBDepthSource,
    private readonly store: SpreadSnapshotStore,
    private readonly telegramService: TelegramService,
  ) {
    this.intervalMs = configService.get<number>('POLL_INTERVAL_SECONDS', 5) * 1000;
    this.concurrency = configService.get<number>('MONITOR_CONCURRENCY', 10);
    this.pairTimeoutMs = configService.get<number>('PAIR_TIMEOUT_MS', 60_000);
    this.threshold = configService.get<number>('SPREAD_THRESHOLD', 1.0);
    this.autoDiscoveryEnabled = configService.get<boolean>('AUTO_DISCOVERY_ENABLED', true);
    this.autoDiscoveryQuote = configService.get<string>('AUTO_DISCOVERY_QUOTE', 'USDT');
    this.autoDiscoveryMax = configService.get<number>('AUTO_DISCOVERY_MAX_PAIRS', 50);
    this.startupNotification = configService.get<boolean>('STARTUP_NOTIFICATION_ENABLED', true);
    this.venues = { venueA: venueA.venue, venueB: venueB.venue };
    this.alertGate = new AlertGate(this.threshold);
  }

  onApplicationBootstrap(): void {
    const pairCount = this.pairRegistry.list().length;
    this.logger.log(
      `Monitoring ${pairCount} pairs on ${this.venues.venueA} against ${this.venues.venueB} every ${this.intervalMs / 1000}s (threshold ${this.threshold}%)`,
    );
    if (this.startupNotification) {
      void this.telegramService.notify(formatStartupMessage(pairCount, this.venues.venueA));
    }

    const handle = setInterval(() => {
      void this.runCycle();
    }, this.intervalMs);
    this.schedulerRegistry.addInterval(SPREAD_POLL_INTERVAL, handle);
    void this.runCycle();
  }

  async onModuleDestroy(): Promise<void> {
    if (this.schedulerRegistry.doesExist('interval', SPREAD_POLL_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(SPREAD_POLL_INTERVAL);
    }
    this.shutdown.abort(new Error('Spread poller is shutting down'));
    if (this.currentCycle) {
      await this.currentCycle;
    }
  }

  isRunning(): boolean {
    return this.currentCycle !== null;
  }

  getThreshold(): number {
    return this.threshold;
  }

  /**
   * One polling pass. Returns `null` without doing anything while the previous
   * pass is still draining, or after a loop-level failure.
   */
  runCycle(): Promise<CycleSummary | null> {
    if (this.currentCycle) {
      this.logger.debug('Previous cycle still running; skipping tick');
      return Promise.resolve(null);
    }
    const cycle = this.executeCycle().finally(() => {
      this.currentCycle = null;
    });
    this.currentCycle = cycle;
    return cycle;
  }

  /** Full per-pair workflow: venue A price, venue B match, spread, alert gate. */
  async processPair(pair: TradingPair, signal?: AbortSignal): Promise<PairOutcome> {
    const venueAPrice = await this.venueA.fetchLastPrice(pair, signal);
    if (!isUsablePrice(venueAPrice)) {
      return { pair, status: 'skipped', reason: 'no_venue_a_price' };
    }

    const match = await mapSymbol(baseAssetOf(pair), this.venueB, signal);
    if (!match || !isUsablePrice(match.midPrice)) {
      return { pair, status: 'skipped', reason: 'no_venue_b_match' };
    }

    signal?.throwIfAborted();

    const spread = computeSpread(venueAPrice, match.midPrice);
    if (!Number.isFinite(spread)) {
      throw new Error(`Non-finite spread for ${pair}`);
    }

    const observation = {
      pair,
      venueAPrice,
      venueBPrice: match.midPrice,
      venueBMarketCode: match.marketCode,
      spreadPercent: spread,
      ts: Date.now(),
    };
    this.store.record(observation);

    const alert = this.alertGate.evaluate(pair, spread);
    if (alert.fire) {
      const message = formatSpreadAlert(alert, this.venues);
      this.logger.log(
        JSON.stringify({
          event: 'spread_alert',
          pair,
          spread: Number(spread.toFixed(2)),
          previous: Number(alert.previous.toFixed(2)),
          marketCode: match.marketCode,
        }),
      );
      void this.telegramService.notify(message);
    }

    return { pair, status: 'observed', observation, alert };
  }

  private async executeCycle(): Promise<CycleSummary | null> {
    const startedAt = Date.now();
    try {
      const configured = this.pairRegistry.list();
      const autoDiscovered = configured.length === 0;
      const resolved = autoDiscovered ? await this.discoverPairs() : configured;
      const pairs = resolved ?? [];

      // An empty discovery says nothing about which pairs are gone.
      if (resolved) {
        const dropped = this.store.retain(resolved);
        this.alertGate.forget(dropped);
      }

      const outcomes = await runWithConcurrency(pairs, this.concurrency, (pair) =>
        this.processPairWithDeadline(pair),
      );

      const summary = this.summarize(outcomes, startedAt, autoDiscovered);
      this.store.recordCycle(summary);
      this.logger.debug(JSON.stringify({ event: 'cycle_done', ...summary }));
      return summary;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      const stack = error instanceof Error ? error.stack : undefined;
      this.logger.error(`Polling cycle failed: ${message}`, stack);
      void this.telegramService.notify(formatLoopErrorMessage(message));
      return null;
    }
  }

  private async processPairWithDeadline(pair: TradingPair): Promise<PairOutcome> {
    try {
      return await withDeadline(
        this.pairTimeoutMs,
        (signal) => this.processPair(pair, signal),
        this.shutdown.signal,
      );
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        this.logger.warn(JSON.stringify({ event: 'pair_timed_out', pair, timeoutMs: error.timeoutMs }));
        return { pair, status: 'timed_out' };
      }
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.debug(JSON.stringify({ event: 'pair_failed', pair, message }));
      return { pair, status: 'failed', message };
    }
  }

  /**
   * Active contracts on venue A, cached for ten minutes. An empty answer keeps
   * the last discovered list; with nothing to fall back on it yields `null`.
   */
  private async discoverPairs(): Promise<TradingPair[] | null> {
    if (!this.autoDiscoveryEnabled) {
      this.logger.warn('No pairs configured and auto-discovery is disabled');
      return [];
    }
    const now = Date.now();
    if (this.discovered && now - this.discovered.at < DISCOVERY_TTL_MS) {
      return [...this.discovered.pairs];
    }

    const pairs = await this.venueA.listPairs(
      this.autoDiscoveryQuote,
      this.autoDiscoveryMax,
      this.shutdown.signal,
    );
    if (pairs.length === 0) {
      this.logger.warn(
        JSON.stringify({
          event: 'auto_discovery_empty',
          venue: this.venues.venueA,
          quote: this.autoDiscoveryQuote,
          keeping: this.discovered?.pairs.length ?? 0,
        }),
      );
      return this.discovered ? [...this.discovered.pairs] : null;
    }
    this.discovered = { pairs, at: now };
    this.logger.log(`Auto-discovered ${pairs.length} ${this.autoDiscoveryQuote} pairs on ${this.venues.venueA}`);
    return [...pairs];
  }

  private summarize(outcomes: PairOutcome[], startedAt: number, autoDiscovered: boolean): CycleSummary {
    const summary: CycleSummary = {
      startedAt,
      finishedAt: Date.now(),
      pairs: outcomes.length,
      observed: 0,
      skipped: 0,
      alerted: 0,
      failed: 0,
      timedOut: 0,
      autoDiscovered,
    };
    for (const outcome of outcomes) {
      switch (outcome.status) {
        case 'observed':
          summary.observed += 1;
          if (outcome.alert.fire) summary.alerted += 1;
          break;
        case 'skipped':
          summary.skipped += 1;
          break;
        case 'failed':
          summary.failed += 1;
          break;
        case 'timed_out':
          summary.timedOut += 1;
          break;
      }
    }
    return summary;
  }
}
