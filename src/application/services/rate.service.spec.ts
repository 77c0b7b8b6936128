import { IDENTITY_PROVIDER, RateService } from './rate.service';
import { RateSnapshot } from '@domain/entities/rate-snapshot';
import {
  InvalidAmountException,
  InvalidCurrencyCodeException,
  ProviderTimeoutException,
  ProviderUnavailableException,
  UnknownCurrencyCodeException,
} from '@domain/exceptions/domain.exceptions';
import { TtlCache } from '@infrastructure/cache/ttl-cache';
import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import {
  FakeRateProvider,
  ManualClock,
  START_OF_DAY,
  makeConfig,
} from '../../__fixtures__/fakes';

const TTL_MS = 30_000;

describe('RateService', () => {
  let clock: ManualClock;
  let provider: FakeRateProvider;
  let metrics: MetricsService;
  let service: RateService;

  beforeEach(() => {
    clock = new ManualClock();
    provider = new FakeRateProvider(
      {
        USD: { EUR: 0.9, GBP: 0.8 },
        EUR: { USD: 1.1, GBP: 0.88 },
      },
      clock,
    );
    metrics = new MetricsService();
    service = new RateService(
      provider,
      new TtlCache<string, RateSnapshot>({ ttlMs: TTL_MS, clock }),
      new LoggingService(makeConfig()),
      metrics,
    );
  });

  describe('getRate', () => {
    it('quotes the target from the base snapshot', async () => {
      await expect(service.getRate('USD', 'EUR')).resolves.toEqual({
        base: 'USD',
        target: 'EUR',
        rate: 0.9,
        asOf: '2024-01-02',
        fetchedAt: new Date(START_OF_DAY),
        provider: 'fake',
      });
    });

    it('normalises codes before touching the cache', async () => {
      await service.getRate('usd', 'eur');
      await service.getRate('USD', 'gbp');

      expect(provider.requested).toEqual(['USD']);
    });

    it('serves every target of a base from one fetch within the ttl', async () => {
      const eur = await service.getRate('USD', 'EUR');
      clock.advance(TTL_MS - 1);
      const gbp = await service.getRate('USD', 'GBP');

      expect(eur.rate).toBe(0.9);
      expect(gbp.rate).toBe(0.8);
      expect(provider.requested).toEqual(['USD']);
    });

    it('refetches once the ttl has elapsed', async () => {
      await service.getRate('USD', 'EUR');
      clock.advance(TTL_MS);
      await service.getRate('USD', 'EUR');

      expect(provider.requested).toEqual(['USD', 'USD']);
    });

    it('shares one fetch between concurrent requests', async () => {
      const quotes = await Promise.all([
        service.getRate('USD', 'EUR'),
        service.getRate('usd', 'GBP'),
        service.getRate('USD', 'eur'),
      ]);

      expect(quotes.map((q) => q.rate)).toEqual([0.9, 0.8, 0.9]);
      expect(provider.requested).toEqual(['USD']);
    });

    it('returns rate 1 for identical codes without fetching', async () => {
      await expect(service.getRate('usd', 'USD')).resolves.toEqual({
        base: 'USD',
        target: 'USD',
        rate: 1,
        asOf: null,
        fetchedAt: null,
        provider: IDENTITY_PROVIDER,
      });
      expect(provider.requested).toEqual([]);
    });

    it('rejects a target the snapshot does not quote', async () => {
      const result = service.getRate('USD', 'JPY');

      await expect(result).rejects.toBeInstanceOf(UnknownCurrencyCodeException);
      await expect(result).rejects.toThrow('Currency JPY is not quoted against USD');
    });

    it('propagates an unknown base from the provider', async () => {
      await expect(service.getRate('XYZ', 'USD')).rejects.toThrow(
        'Currency XYZ is not supported by the rate provider',
      );
    });

    it.each([
      ['US', 'EUR', 'base'],
      ['USD', 'E1R', 'target'],
    ])('rejects %p/%p before any fetch', async (base, target, field) => {
      const result = service.getRate(base, target);

      await expect(result).rejects.toBeInstanceOf(InvalidCurrencyCodeException);
      await expect(result).rejects.toMatchObject({ field });
      expect(provider.requested).toEqual([]);
    });
  });

  describe('provider failures', () => {
    it('does not cache a timeout and recovers on the next call', async () => {
      provider.failNextWith(new ProviderTimeoutException('USD', 6000));

      await expect(service.getRate('USD', 'EUR')).rejects.toBeInstanceOf(
        ProviderTimeoutException,
      );
      expect(service.cachedBaseCount).toBe(0);

      await expect(service.getRate('USD', 'EUR')).resolves.toMatchObject({
        rate: 0.9,
      });
      await service.getRate('USD', 'GBP');

      expect(provider.requested).toEqual(['USD', 'USD']);
      expect(service.cachedBaseCount).toBe(1);
    });

    it('counts fetch outcomes by status', async () => {
      provider.failNextWith(new ProviderUnavailableException('USD', 'provider returned 503', 503));
      await expect(service.getRate('USD', 'EUR')).rejects.toBeInstanceOf(
        ProviderUnavailableException,
      );
      await service.getRate('USD', 'EUR');

      const text = await metrics.render();
      expect(text).toContain('fx_provider_fetches_total{status="PROVIDER_UNAVAILABLE"} 1');
      expect(text).toContain('fx_provider_fetches_total{status="SUCCESS"} 1');
    });

    it('labels non-domain errors as unexpected', async () => {
      provider.failNextWith(new Error('socket hang up'));

      await expect(service.getRate('USD', 'EUR')).rejects.toThrow('socket hang up');
      expect(await metrics.render()).toContain(
        'fx_provider_fetches_total{status="UNEXPECTED"} 1',
      );
    });
  });

  describe('convert', () => {
    it('multiplies the amount by the rate', async () => {
      const conversion = await service.convert(100, 'USD', 'GBP');

      expect(conversion).toMatchObject({
        from: 'USD',
        to: 'GBP',
        amount: 100,
        rate: 0.8,
        asOf: '2024-01-02',
        provider: 'fake',
      });
      expect(conversion.converted).toBeCloseTo(80, 10);
    });

    it('converts zero', async () => {
      await expect(service.convert(0, 'USD', 'EUR')).resolves.toMatchObject({
        converted: 0,
      });
    });

    it('returns the amount unchanged for a self-conversion', async () => {
      await expect(service.convert(42.5, 'eur', 'EUR')).resolves.toEqual({
        from: 'EUR',
        to: 'EUR',
        amount: 42.5,
        converted: 42.5,
        rate: 1,
        asOf: null,
        fetchedAt: null,
        provider: IDENTITY_PROVIDER,
      });
      expect(provider.requested).toEqual([]);
    });

    it('round-trips through the reverse rate', async () => {
      provider = new FakeRateProvider(
        { USD: { EUR: 0.9 }, EUR: { USD: 1 / 0.9 } },
        clock,
      );
      service = new RateService(
        provider,
        new TtlCache<string, RateSnapshot>({ ttlMs: TTL_MS, clock }),
        new LoggingService(makeConfig()),
        metrics,
      );

      const there = await service.convert(250, 'USD', 'EUR');
      const back = await service.convert(there.converted, 'EUR', 'USD');

      expect(back.converted).toBeCloseTo(250, 9);
    });

    it.each([-5, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY])(
      'rejects amount %p before any fetch',
      async (amount) => {
        await expect(service.convert(amount, 'USD', 'EUR')).rejects.toBeInstanceOf(
          InvalidAmountException,
        );
        expect(provider.requested).toEqual([]);
      },
    );

    it('validates the amount before the codes', async () => {
      await expect(service.convert(-1, 'US', 'EUR')).rejects.toBeInstanceOf(
        InvalidAmountException,
      );
    });

    it('reports which currency field is invalid', async () => {
      await expect(service.convert(10, 'USD', 'EURO')).rejects.toMatchObject({
        errorCode: 'INVALID_CURRENCY_CODE',
        field: 'to_currency',
      });
    });
  });

  describe('invalidate', () => {
    it('drops the cached base so the next lookup refetches', async () => {
      await service.getRate('USD', 'EUR');
      service.invalidate('usd');

      expect(service.cachedBaseCount).toBe(0);
      await service.getRate('USD', 'EUR');
      expect(provider.requested).toEqual(['USD', 'USD']);
    });

    it('clearCache drops every base', async () => {
      await service.getRate('USD', 'EUR');
      await service.getRate('EUR', 'USD');
      expect(service.cachedBaseCount).toBe(2);

      service.clearCache();

      expect(service.cachedBaseCount).toBe(0);
      await service.getRate('EUR', 'GBP');
      expect(provider.requested).toEqual(['USD', 'EUR', 'EUR']);
    });

    it('stops counting a base once its snapshot expires', async () => {
      await service.getRate('USD', 'EUR');
      clock.advance(TTL_MS);

      expect(service.cachedBaseCount).toBe(0);
    });

    it('rejects a malformed base', () => {
      expect(() => service.invalidate('U$D')).toThrow(InvalidCurrencyCodeException);
    });
  });
});
