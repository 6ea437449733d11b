import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import type { TradingPair } from '@libs/core';
import { VenueAPriceSource } from '../interfaces';
import { normalizeMexcContractPairs, normalizeMexcLastPrice } from '../normalizers';
import { venueASymbolOf } from '../symbol-mapper';
import { createHttpClient } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';
import { getVenueEndpoint } from './providers.config';

/** Venue A: MEXC perpetual swap tickers. */
@Injectable()
export class MexcPriceSource extends BaseRestProvider implements VenueAPriceSource {
  private readonly restClient: AxiosInstance;

  constructor(configService: ConfigService) {
    super(configService.get<string>('VENUE_A_NAME', 'MEXC'));
    const endpoint = getVenueEndpoint(configService, 'mexc');
    this.restClient = createHttpClient(endpoint.rest, endpoint.timeoutMs);
  }

  async fetchLastPrice(pair: TradingPair, signal?: AbortSignal): Promise<number | null> {
    const symbol = venueASymbolOf(pair);
    return this.track(`ticker ${symbol}`, async () => {
      const response = await this.restClient.get('/api/v1/contract/ticker', {
        params: { symbol },
        signal,
      });
      return normalizeMexcLastPrice(response.data);
    });
  }

  async listPairs(quote: string, limit: number, signal?: AbortSignal): Promise<TradingPair[]> {
    const pairs = await this.track('contract detail', async () => {
      const response = await this.restClient.get('/api/v1/contract/detail', { signal });
      const listed = normalizeMexcContractPairs(response.data, quote);
      return listed.length ? listed : null;
    });
    return (pairs ?? []).slice(0, limit);
  }
}
