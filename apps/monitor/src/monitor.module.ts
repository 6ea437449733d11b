import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { TelegramModule } from '@libs/telegram';
import { DashboardModule } from './dashboard/dashboard.module';
import { HealthController } from './health.controller';
import { SpreadModule } from './spread/spread.module';

@Module({
  imports: [
    CoreModule,
    MarketDataModule,
    TelegramModule,
    SpreadModule,
    DashboardModule,
    ScheduleModule.forRoot(),
  ],
  controllers: [HealthController],
})
export class MonitorModule {}
