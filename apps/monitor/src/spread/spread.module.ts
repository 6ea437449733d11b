import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { TelegramModule } from '@libs/telegram';
import { SpreadPollerService } from './spread-poller.service';

@Module({
  imports: [CoreModule, MarketDataModule, TelegramModule],
  providers: [SpreadPollerService],
  exports: [SpreadPollerService],
})
export class SpreadModule {}
