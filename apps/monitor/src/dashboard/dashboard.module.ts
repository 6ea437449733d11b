import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { SpreadModule } from '../spread/spread.module';
import { DashboardController } from './dashboard.controller';
import { PairsController } from './pairs.controller';

@Module({
  imports: [CoreModule, MarketDataModule, SpreadModule],
  controllers: [DashboardController, PairsController],
})
export class DashboardModule {}
