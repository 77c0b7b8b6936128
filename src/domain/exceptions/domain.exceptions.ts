export type ExchangeErrorCode =
  | 'INVALID_CURRENCY_CODE'
  | 'INVALID_AMOUNT'
  | 'UNKNOWN_CURRENCY_CODE'
  | 'PROVIDER_UNAVAILABLE'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_BAD_RESPONSE';

export abstract class DomainException extends Error {
  abstract readonly errorCode: ExchangeErrorCode;
  constructor(message: string) {
    super(message);
    this.name = 'DOMAIN_EXCEPTION';
  }
  abstract serializeError(): { message: string; field?: string }[];
}

export class InvalidCurrencyCodeException extends DomainException {
  readonly errorCode = 'INVALID_CURRENCY_CODE';
  constructor(
    readonly value: unknown,
    readonly field: string = 'currency',
  ) {
    super(
      `Invalid currency code ${JSON.stringify(value)}: expected 3 ASCII letters`,
    );
  }

  serializeError(): { message: string; field?: string }[] {
    return [{ message: this.message, field: this.field }];
  }
}

export class InvalidAmountException extends DomainException {
  readonly errorCode = 'INVALID_AMOUNT';
  constructor(readonly value: unknown) {
    super(
      `Invalid amount ${String(value)}: expected a finite, non-negative number`,
    );
  }

  serializeError(): { message: string; field?: string }[] {
    return [{ message: this.message, field: 'amount' }];
  }
}

export class UnknownCurrencyCodeException extends DomainException {
  readonly errorCode = 'UNKNOWN_CURRENCY_CODE';
  constructor(
    readonly code: string,
    readonly base?: string,
  ) {
    super(
      base
        ? `Currency ${code} is not quoted against ${base}`
        : `Currency ${code} is not supported by the rate provider`,
    );
  }

  serializeError(): { message: string; field?: string }[] {
    return [{ message: this.message, field: 'currency' }];
  }
}

/**
 * Base for failures of the upstream rate provider. These are never cached, so
 * the next lookup for the same base performs a fresh fetch.
 */
export abstract class ProviderException extends DomainException {
  constructor(
    message: string,
    readonly base: string,
  ) {
    super(message);
  }

  serializeError(): { message: string; field?: string }[] {
    return [{ message: this.message, field: 'provider' }];
  }
}

export class ProviderUnavailableException extends ProviderException {
  readonly errorCode = 'PROVIDER_UNAVAILABLE';
  constructor(
    base: string,
    readonly reason: string,
    readonly status?: number,
  ) {
    super(`Rate provider unavailable for ${base}: ${reason}`, base);
  }
}

export class ProviderTimeoutException extends ProviderException {
  readonly errorCode = 'PROVIDER_TIMEOUT';
  constructor(
    base: string,
    readonly timeoutMs: number,
  ) {
    super(`Rate provider did not answer for ${base} within ${timeoutMs}ms`, base);
  }
}

export class ProviderBadResponseException extends ProviderException {
  readonly errorCode = 'PROVIDER_BAD_RESPONSE';
  constructor(base: string, reason: string) {
    super(`Invalid response from rate provider for ${base}: ${reason}`, base);
  }
}
