import { RateSnapshot } from '@domain/entities/rate-snapshot';
import { CurrencyCode } from '@domain/value-objects/currency-code';

export abstract class IRateProvider {
  /**
   * Fetches every rate the provider quotes against `base`.
   * One upstream call per invocation, never retried here.
   *
   * Rejects with a `ProviderException` subtype on network, timeout or
   * payload failures.
   */
  abstract fetch(base: CurrencyCode): Promise<RateSnapshot>;
}
