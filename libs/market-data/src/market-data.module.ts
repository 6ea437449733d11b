import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { VENUE_A_PRICE_SOURCE, VENUE_B_DEPTH_SOURCE } from './interfaces';
import { MexcPriceSource } from './providers/mexc.provider';
import { QuantoDepthSource } from './providers/quanto.provider';
import { SpreadSnapshotStore } from './spread-snapshot.store';

@Module({
  imports: [ConfigModule],
  providers: [
    MexcPriceSource,
    QuantoDepthSource,
    SpreadSnapshotStore,
    { provide: VENUE_A_PRICE_SOURCE, useExisting: MexcPriceSource },
    { provide: VENUE_B_DEPTH_SOURCE, useExisting: QuantoDepthSource },
  ],
  exports: [
    MexcPriceSource,
    QuantoDepthSource,
    SpreadSnapshotStore,
    VENUE_A_PRICE_SOURCE,
    VENUE_B_DEPTH_SOURCE,
  ],
})
export class MarketDataModule {}
