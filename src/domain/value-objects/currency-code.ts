import { InvalidCurrencyCodeException } from '@domain/exceptions/domain.exceptions';

export class CurrencyCode {
  private static readonly PATTERN = /^[A-Za-z]{3}$/;
  private readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /**
   * Normalises a caller-supplied code to upper case and checks it has the
   * ISO-4217 shape. Whether the provider actually quotes it is decided later.
   */
  static from(raw: unknown, field?: string): CurrencyCode {
    if (typeof raw !== 'string') {
      throw new InvalidCurrencyCodeException(raw, field);
    }
    if (!CurrencyCode.PATTERN.test(raw)) {
      throw new InvalidCurrencyCodeException(raw, field);
    }
    return new CurrencyCode(raw.toUpperCase());
  }

  getValue(): string {
    return this.value;
  }

  equals(other: CurrencyCode): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
