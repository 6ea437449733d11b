import { Logger } from '@nestjs/common';
import { ProviderSnapshot } from '../models';
import { describeHttpError } from '../utils/http.util';

/**
 * Shared bookkeeping for the venue REST clients: every call goes through
 * `track`, which counts requests and failures and turns errors into `null`.
 */
export abstract class BaseRestProvider {
  protected readonly logger: Logger;
  protected requests = 0;
  protected failures = 0;
  protected lastSuccessTs: number | null = null;
  protected lastError: string | null = null;

  protected constructor(readonly venue: string) {
    this.logger = new Logger(`${venue}-provider`);
  }

  protected async track<T>(
    label: string,
    call: () => Promise<T | null>,
  ): Promise<T | null> {
    this.requests += 1;
    try {
      const result = await call();
      if (result === null) {
        this.failures += 1;
        this.lastError = `${label}: unusable response`;
        return null;
      }
      this.lastSuccessTs = Date.now();
      return result;
    } catch (error) {
      this.failures += 1;
      const message = describeHttpError(error);
      this.lastError = `${label}: ${message}`;
      this.logger.debug(JSON.stringify({ event: 'venue_request_failed', venue: this.venue, label, message }));
      return null;
    }
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.venue,
      requests: this.requests,
      failures: this.failures,
      lastSuccessTs: this.lastSuccessTs,
      lastError: this.lastError,
    };
  }
}
