import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  Post,
  Query,
  Redirect,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PairRegistryService, TradingPair, tradingPairSchema } from '@libs/core';
import { SpreadSnapshotStore } from '@libs/market-data';
import { SpreadPollerService } from '../spread/spread-poller.service';
import { renderDashboard } from './dashboard.view';

const dashboardRedirect = (message: string): { url: string } => ({
  url: `/dashboard?msg=${encodeURIComponent(message)}`,
});

@Controller()
export class DashboardController {
  private readonly title: string;

  constructor(
    configService: ConfigService,
    private readonly pairRegistry: PairRegistryService,
    private readonly store: SpreadSnapshotStore,
    private readonly poller: SpreadPollerService,
  ) {
    const venueA = configService.get<string>('VENUE_A_NAME', 'MEXC');
    const venueB = configService.get<string>('VENUE_B_NAME', 'Quanto');
    this.title = `${venueA} ${venueB} Spread Dashboard`;
  }

  @Get()
  @Header('Content-Type', 'text/plain; charset=utf-8')
  root(): string {
    return `✅ ${this.title} is running`;
  }

  @Get('dashboard')
  @Header('Content-Type', 'text/html; charset=utf-8')
  dashboard(@Query('msg') msg?: unknown): string {
    return renderDashboard({
      title: this.title,
      pairs: this.pairRegistry.list(),
      spreads: this.store.getRoundedSpreads(),
      threshold: this.poller.getThreshold(),
      message: typeof msg === 'string' ? msg : undefined,
    });
  }

  @Post('addpair')
  @Redirect('/dashboard', 303)
  async addPair(@Body('pair') rawPair?: unknown): Promise<{ url: string }> {
    if (typeof rawPair !== 'string' || !rawPair.trim()) {
      throw new BadRequestException('No pair specified');
    }
    const parsed = tradingPairSchema.safeParse(rawPair);
    if (!parsed.success) {
      return dashboardRedirect(`⚠️ Invalid pair ${rawPair.trim().toUpperCase()}`);
    }
    const { pair, result } = await this.pairRegistry.add(parsed.data);
    return result === 'added'
      ? dashboardRedirect(`✅ Pair ${pair} added`)
      : dashboardRedirect(`⚠️ Pair ${pair} is already monitored`);
  }

  @Post('removepair')
  @Redirect('/dashboard', 303)
  async removePair(@Body('pair') rawPair?: unknown): Promise<{ url: string }> {
    if (typeof rawPair !== 'string' || !rawPair.trim()) {
      return dashboardRedirect('⚠️ Pair not found');
    }
    const { pair, removed } = await this.pairRegistry.remove(rawPair);
    return removed ? dashboardRedirect(`❌ Pair ${pair} removed`) : dashboardRedirect('⚠️ Pair not found');
  }

  @Get('status')
  status(): {
    running: boolean;
    pairs: TradingPair[];
    prices: Record<TradingPair, number>;
    spread_threshold: number;
  } {
    return {
      running: true,
      pairs: this.pairRegistry.list(),
      prices: this.store.getRoundedSpreads(),
      spread_threshold: this.poller.getThreshold(),
    };
  }
}
