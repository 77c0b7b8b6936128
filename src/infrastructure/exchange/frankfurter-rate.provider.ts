import { Injectable } from '@nestjs/common';
import { IRateProvider } from '@application/adaptors/rate-provider.interface';
import { IClock } from '@application/adaptors/clock.interface';
import { RateSnapshot } from '@domain/entities/rate-snapshot';
import { CurrencyCode } from '@domain/value-objects/currency-code';
import {
  ProviderBadResponseException,
  ProviderTimeoutException,
  ProviderUnavailableException,
  UnknownCurrencyCodeException,
} from '@domain/exceptions/domain.exceptions';
import { AppConfigService } from '@infrastructure/config/config.service';
import { LoggingService } from '@infrastructure/observability/logging/logging.service';

type FrankfurterLatestResponse = {
  amount?: number;
  base?: string;
  date?: string;
  rates?: Record<string, unknown>;
};

export const FRANKFURTER_PROVIDER_NAME = 'frankfurter.dev';

@Injectable()
export class FrankfurterRateProvider implements IRateProvider {
  constructor(
    private readonly config: AppConfigService,
    private readonly clock: IClock,
    private readonly logger: LoggingService,
  ) {}

  private get timeoutMs(): number {
    return Math.round(this.config.providerTimeoutSeconds * 1000);
  }

  async fetch(base: CurrencyCode): Promise<RateSnapshot> {
    const code = base.getValue();
    const url =
      `${this.config.providerBaseUrl}/latest` +
      `?base=${encodeURIComponent(code)}`;
    const timeoutMs = this.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let body: unknown;
    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
          headers: {
            'User-Agent': this.config.providerClientTag,
            Accept: 'application/json',
          },
        });
      } catch (err) {
        throw this.transportFailure(code, err, controller.signal, timeoutMs);
      }

      if (response.status === 404 || response.status === 422) {
        await this.discardBody(response);
        throw new UnknownCurrencyCodeException(code);
      }
      if (!response.ok) {
        await this.discardBody(response);
        throw new ProviderUnavailableException(
          code,
          `provider returned ${response.status}`,
          response.status,
        );
      }

      try {
        body = await response.json();
      } catch {
        if (controller.signal.aborted) {
          throw new ProviderTimeoutException(code, timeoutMs);
        }
        throw new ProviderBadResponseException(code, 'body is not valid JSON');
      }
    } finally {
      clearTimeout(timeoutId);
    }

    const snapshot = this.toSnapshot(base, body);
    this.logger.debug(
      `Fetched ${Object.keys(snapshot.rates).length} rates for ${code}`,
      { ctx: FrankfurterRateProvider.name, asOf: snapshot.asOf },
    );
    return snapshot;
  }

  // An unread body keeps the pooled connection busy
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error: unknown) {
      this.logger.debug('Could not discard provider response body', {
        ctx: FrankfurterRateProvider.name,
        error,
      });
    }
  }

  private transportFailure(
    base: string,
    err: unknown,
    signal: AbortSignal,
    timeoutMs: number,
  ): Error {
    if (signal.aborted) {
      this.logger.warn(`Rate provider timed out after ${timeoutMs}ms`, {
        ctx: FrankfurterRateProvider.name,
        base,
      });
      return new ProviderTimeoutException(base, timeoutMs);
    }
    const reason = err instanceof Error ? err.message : String(err);
    this.logger.error('Rate provider fetch failed', {
      ctx: FrankfurterRateProvider.name,
      base,
      error: err,
    });
    return new ProviderUnavailableException(base, reason);
  }

  private toSnapshot(base: CurrencyCode, body: unknown): RateSnapshot {
    const code = base.getValue();
    if (!isLatestResponse(body)) {
      throw new ProviderBadResponseException(code, 'payload is not an object');
    }
    const rawRates = body.rates;
    if (!rawRates || typeof rawRates !== 'object' || Array.isArray(rawRates)) {
      throw new ProviderBadResponseException(code, 'payload has no rates');
    }
    if (body.base !== undefined && String(body.base).toUpperCase() !== code) {
      throw new ProviderBadResponseException(
        code,
        `payload is quoted against ${String(body.base)}`,
      );
    }

    const rates: Record<string, number> = {};
    for (const [target, value] of Object.entries(rawRates)) {
      if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ProviderBadResponseException(
          code,
          `rate for ${target} is not a positive number`,
        );
      }
      rates[target.toUpperCase()] = value;
    }

    return RateSnapshot.create({
      base,
      rates,
      fetchedAt: new Date(this.clock.now()),
      asOf: typeof body.date === 'string' ? body.date : null,
      provider: FRANKFURTER_PROVIDER_NAME,
    });
  }
}

function isLatestResponse(value: unknown): value is FrankfurterLatestResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
