import { Inject, Injectable } from '@nestjs/common';
import { IRateProvider } from '@application/adaptors/rate-provider.interface';
import { Conversion, RateQuote } from '@application/dtos/rate-result.dto';
import { RateSnapshot } from '@domain/entities/rate-snapshot';
import { CurrencyCode } from '@domain/value-objects/currency-code';
import {
  DomainException,
  InvalidAmountException,
  UnknownCurrencyCodeException,
} from '@domain/exceptions/domain.exceptions';
import {
  RATE_SNAPSHOT_CACHE,
  RateSnapshotCache,
} from '@infrastructure/cache/rate-snapshot-cache.provider';
import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';

/** Provider tag reported when a currency is converted to itself. */
export const IDENTITY_PROVIDER = 'identity';

@Injectable()
export class RateService {
  constructor(
    private readonly provider: IRateProvider,
    @Inject(RATE_SNAPSHOT_CACHE) private readonly cache: RateSnapshotCache,
    private readonly logger: LoggingService,
    private readonly metrics: MetricsService,
  ) {}

  /**
   * Current rate for base → target. Codes are case-insensitive; validation
   * happens before the cache or provider is touched.
   */
  async getRate(base: string, target: string): Promise<RateQuote> {
    const from = CurrencyCode.from(base, 'base');
    const to = CurrencyCode.from(target, 'target');
    return this.quote(from, to);
  }

  /**
   * Converts `amount` at the current rate. No rounding is applied; a currency
   * converts to itself without consulting the provider.
   */
  async convert(
    amount: number,
    fromCurrency: string,
    toCurrency: string,
  ): Promise<Conversion> {
    const value = this.validateAmount(amount);
    const from = CurrencyCode.from(fromCurrency, 'from_currency');
    const to = CurrencyCode.from(toCurrency, 'to_currency');

    const quote = await this.quote(from, to);
    return {
      from: quote.base,
      to: quote.target,
      amount: value,
      converted: from.equals(to) ? value : value * quote.rate,
      rate: quote.rate,
      asOf: quote.asOf,
      fetchedAt: quote.fetchedAt,
      provider: quote.provider,
    };
  }

  /** Drops the cached snapshot for `base`; the next lookup refetches. */
  invalidate(base: string): void {
    const code = CurrencyCode.from(base, 'base').getValue();
    this.cache.invalidate(code);
    this.logger.log(`Invalidated cached rates for ${code}`, {
      ctx: RateService.name,
    });
  }

  /** Drops every cached snapshot and detaches fetches still in flight. */
  clearCache(): void {
    const dropped = this.cache.size;
    this.cache.clear();
    this.logger.log(`Cleared ${dropped} cached rate snapshot(s)`, {
      ctx: RateService.name,
    });
  }

  get cachedBaseCount(): number {
    return this.cache.size;
  }

  private async quote(base: CurrencyCode, target: CurrencyCode): Promise<RateQuote> {
    if (base.equals(target)) {
      this.logger.debug(`Short-circuit ${base} == ${target}`, {
        ctx: RateService.name,
      });
      return {
        base: base.getValue(),
        target: target.getValue(),
        rate: 1,
        asOf: null,
        fetchedAt: null,
        provider: IDENTITY_PROVIDER,
      };
    }

    const snapshot = await this.cache.getOrFetch(base.getValue(), () =>
      this.fetchSnapshot(base),
    );
    const rate = snapshot.rateFor(target);
    if (rate === undefined) {
      throw new UnknownCurrencyCodeException(target.getValue(), base.getValue());
    }

    return {
      base: snapshot.base,
      target: target.getValue(),
      rate,
      asOf: snapshot.asOf,
      fetchedAt: snapshot.fetchedAt,
      provider: snapshot.provider,
    };
  }

  private async fetchSnapshot(base: CurrencyCode): Promise<RateSnapshot> {
    try {
      const snapshot = await this.provider.fetch(base);
      this.metrics.incProviderFetch('SUCCESS');
      return snapshot;
    } catch (error: unknown) {
      const code =
        error instanceof DomainException ? error.errorCode : 'UNEXPECTED';
      this.metrics.incProviderFetch(code);
      this.logger.warn(`Rate fetch for ${base} failed with ${code}`, {
        ctx: RateService.name,
        error,
      });
      throw error;
    }
  }

  private validateAmount(amount: unknown): number {
    if (typeof amount !== 'number' || !Number.isFinite(amount) || amount < 0) {
      throw new InvalidAmountException(amount);
    }
    return amount;
  }
}
