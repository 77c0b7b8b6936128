import { CurrencyCode } from './currency-code';
import { InvalidCurrencyCodeException } from '@domain/exceptions/domain.exceptions';

describe('CurrencyCode', () => {
  it('accepts three letters and upper-cases them', () => {
    expect(CurrencyCode.from('USD').getValue()).toBe('USD');
    expect(CurrencyCode.from('eur').getValue()).toBe('EUR');
    expect(CurrencyCode.from('gBp').toString()).toBe('GBP');
  });

  it('compares by normalised value', () => {
    expect(CurrencyCode.from('usd').equals(CurrencyCode.from('USD'))).toBe(true);
    expect(CurrencyCode.from('usd').equals(CurrencyCode.from('EUR'))).toBe(false);
  });

  it.each(['US', 'USDX', 'U1D', '', ' USD', 'US ', 'ÉUR'])(
    'rejects %p',
    (raw) => {
      expect(() => CurrencyCode.from(raw)).toThrow(InvalidCurrencyCodeException);
    },
  );

  it('rejects non-string input and reports the field', () => {
    let caught: unknown;
    try {
      CurrencyCode.from(840, 'base');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidCurrencyCodeException);
    expect(caught).toMatchObject({
      errorCode: 'INVALID_CURRENCY_CODE',
      field: 'base',
      message: 'Invalid currency code 840: expected 3 ASCII letters',
    });
  });
});
