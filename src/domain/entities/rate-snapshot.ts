import { CurrencyCode } from '@domain/value-objects/currency-code';

export type RateTable = Readonly<Record<string, number>>;

/**
 * Rates for one base currency as published by the provider at one instant.
 * Instances are frozen; a refresh produces a new snapshot.
 */
export class RateSnapshot {
  private readonly _base: string;
  private readonly _rates: RateTable;
  private readonly _fetchedAt: Date;
  private readonly _asOf: string | null;
  private readonly _provider: string;

  private constructor(
    base: CurrencyCode,
    rates: Record<string, number>,
    fetchedAt: Date,
    asOf: string | null,
    provider: string,
  ) {
    this._base = base.getValue();
    this._rates = Object.freeze({ ...rates });
    this._fetchedAt = new Date(fetchedAt.getTime());
    this._asOf = asOf;
    this._provider = provider;
    Object.freeze(this);
  }

  static create(props: {
    base: CurrencyCode;
    rates: Record<string, number>;
    fetchedAt: Date;
    asOf?: string | null;
    provider: string;
  }): RateSnapshot {
    for (const [code, rate] of Object.entries(props.rates)) {
      if (!Number.isFinite(rate) || rate <= 0) {
        throw new Error(`Rate for ${code} must be a positive finite number`);
      }
    }
    return new RateSnapshot(
      props.base,
      props.rates,
      props.fetchedAt,
      props.asOf ?? null,
      props.provider,
    );
  }

  get base(): string {
    return this._base;
  }
  get rates(): RateTable {
    return this._rates;
  }
  get fetchedAt(): Date {
    return new Date(this._fetchedAt.getTime());
  }
  get asOf(): string | null {
    return this._asOf;
  }
  get provider(): string {
    return this._provider;
  }

  rateFor(target: CurrencyCode): number | undefined {
    const code = target.getValue();
    return Object.prototype.hasOwnProperty.call(this._rates, code)
      ? this._rates[code]
      : undefined;
  }
}
