import { ConfigService } from '@nestjs/config';
import { IClock } from '@application/adaptors/clock.interface';
import { IRateProvider } from '@application/adaptors/rate-provider.interface';
import { RateSnapshot } from '@domain/entities/rate-snapshot';
import { CurrencyCode } from '@domain/value-objects/currency-code';
import { UnknownCurrencyCodeException } from '@domain/exceptions/domain.exceptions';
import { AppConfigService } from '@infrastructure/config/config.service';

export const START_OF_DAY = Date.UTC(2024, 0, 2);

export class ManualClock implements IClock {
  constructor(private current: number = START_OF_DAY) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeConfig(
  overrides: Record<string, string> = {},
): AppConfigService {
  return new AppConfigService(
    new ConfigService({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...overrides }),
  );
}

/** Serves fixed rate tables and records every base it was asked for. */
export class FakeRateProvider implements IRateProvider {
  readonly requested: string[] = [];
  private readonly failures: Error[] = [];

  constructor(
    private readonly tables: Record<string, Record<string, number>>,
    private readonly clock: IClock,
  ) {}

  failNextWith(error: Error): void {
    this.failures.push(error);
  }

  async fetch(base: CurrencyCode): Promise<RateSnapshot> {
    const code = base.getValue();
    this.requested.push(code);

    const failure = this.failures.shift();
    if (failure) throw failure;

    const rates = this.tables[code];
    if (!rates) throw new UnknownCurrencyCodeException(code);

    return RateSnapshot.create({
      base,
      rates,
      fetchedAt: new Date(this.clock.now()),
      asOf: '2024-01-02',
      provider: 'fake',
    });
  }
}

export class Deferred<T> {
  readonly promise: Promise<T>;
  private settle:
    | { resolve: (value: T) => void; reject: (reason: unknown) => void }
    | undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  resolve(value: T): void {
    this.settle?.resolve(value);
  }

  reject(reason: unknown): void {
    this.settle?.reject(reason);
  }
}
