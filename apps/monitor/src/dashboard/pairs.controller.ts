import {
  BadRequestException,
  Body,
  ConflictException,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { z } from 'zod';
import { PairRegistryService, TradingPair, tradingPairSchema } from '@libs/core';
import { SpreadObservation, SpreadSnapshotStore } from '@libs/market-data';

const addPairBodySchema = z.object({ pair: tradingPairSchema });

interface PairView {
  pair: TradingPair;
  observation: Readonly<SpreadObservation> | null;
}

@Controller('pairs')
export class PairsController {
  constructor(
    private readonly pairRegistry: PairRegistryService,
    private readonly store: SpreadSnapshotStore,
  ) {}

  @Get()
  list(): { ok: true; pairs: PairView[] } {
    const { observations } = this.store.getSnapshot();
    return {
      ok: true,
      pairs: this.pairRegistry.list().map((pair) => ({ pair, observation: observations[pair] ?? null })),
    };
  }

  @Post()
  @HttpCode(201)
  async add(@Body() body: unknown): Promise<{ ok: true; pair: TradingPair }> {
    const parsed = addPairBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    const { pair, result } = await this.pairRegistry.add(parsed.data.pair);
    if (result === 'duplicate') {
      throw new ConflictException(`Pair ${pair} is already monitored`);
    }
    return { ok: true, pair };
  }

  @Delete(':base/:quote')
  async remove(
    @Param('base') base: string,
    @Param('quote') quote: string,
  ): Promise<{ ok: true; pair: TradingPair }> {
    const { pair, removed } = await this.pairRegistry.remove(`${base}/${quote}`);
    if (!removed) {
      throw new NotFoundException(`Pair ${pair} is not monitored`);
    }
    return { ok: true, pair };
  }
}
