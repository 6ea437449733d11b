import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { VenueBDepthSource } from '../interfaces';
import { TopOfBook } from '../models';
import { normalizeQuantoDepth } from '../normalizers';
import { createHttpClient } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';
import { getVenueEndpoint } from './providers.config';

/** Venue B: Quanto order book, top level only. */
@Injectable()
export class QuantoDepthSource extends BaseRestProvider implements VenueBDepthSource {
  private readonly restClient: AxiosInstance;

  constructor(configService: ConfigService) {
    super(configService.get<string>('VENUE_B_NAME', 'Quanto'));
    const endpoint = getVenueEndpoint(configService, 'quanto');
    this.restClient = createHttpClient(endpoint.rest, endpoint.timeoutMs);
  }

  async fetchTopOfBook(marketCode: string, signal?: AbortSignal): Promise<TopOfBook | null> {
    return this.track(`depth ${marketCode}`, async () => {
      const response = await this.restClient.get('/v3/depth', {
        params: { marketCode, level: 1 },
        signal,
      });
      return normalizeQuantoDepth(response.data);
    });
  }
}
