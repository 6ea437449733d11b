import { Controller, Get } from '@nestjs/common';
import {
  CycleSummary,
  MexcPriceSource,
  ProviderSnapshot,
  QuantoDepthSource,
  SpreadSnapshotStore,
} from '@libs/market-data';
import { TelegramService } from '@libs/telegram';
import { SpreadPollerService } from './spread/spread-poller.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly store: SpreadSnapshotStore,
    private readonly poller: SpreadPollerService,
    private readonly venueA: MexcPriceSource,
    private readonly venueB: QuantoDepthSource,
    private readonly telegramService: TelegramService,
  ) {}

  @Get()
  health(): {
    ok: true;
    cycleInFlight: boolean;
    lastCycle: Readonly<CycleSummary> | null;
    venues: ProviderSnapshot[];
    notificationsEnabled: boolean;
  } {
    return {
      ok: true,
      cycleInFlight: this.poller.isRunning(),
      lastCycle: this.store.getLastCycle(),
      venues: [this.venueA.getSnapshot(), this.venueB.getSnapshot()],
      notificationsEnabled: this.telegramService.enabled,
    };
  }
}
