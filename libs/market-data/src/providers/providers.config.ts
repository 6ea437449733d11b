import { ConfigService } from '@nestjs/config';

export interface VenueEndpoint {
  rest: string;
  timeoutMs: number;
}

const DEFAULTS: Record<'mexc' | 'quanto', { urlKey: string; url: string; timeoutKey: string; timeoutMs: number }> = {
  mexc: {
    urlKey: 'MEXC_CONTRACT_REST_URL',
    url: 'https://contract.mexc.com',
    timeoutKey: 'VENUE_A_TIMEOUT_MS',
    timeoutMs: 10000,
  },
  quanto: {
    urlKey: 'QUANTO_REST_URL',
    url: 'https://api.quanto.trade',
    timeoutKey: 'VENUE_B_TIMEOUT_MS',
    timeoutMs: 8000,
  },
};

export const getVenueEndpoint = (
  configService: ConfigService,
  venue: keyof typeof DEFAULTS,
): VenueEndpoint => {
  const defaults = DEFAULTS[venue];
  return {
    rest: configService.get<string>(defaults.urlKey, defaults.url),
    timeoutMs: configService.get<number>(defaults.timeoutKey, defaults.timeoutMs),
  };
};
