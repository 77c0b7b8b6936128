import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ConvertQueryDto } from './convert-query.dto';

describe('ConvertQueryDto', () => {
  const pipe = new ValidationPipe({ transform: true, whitelist: true });

  function transform(query: Record<string, unknown>): Promise<unknown> {
    return pipe.transform(query, { type: 'query', metatype: ConvertQueryDto });
  }

  it('parses the amount from the query string', async () => {
    await expect(
      transform({ amount: '12.5', from: 'usd', to: 'EUR' }),
    ).resolves.toEqual({ amount: 12.5, from: 'usd', to: 'EUR' });
  });

  it('accepts a zero amount', async () => {
    await expect(
      transform({ amount: '0', from: 'USD', to: 'EUR' }),
    ).resolves.toEqual({ amount: 0, from: 'USD', to: 'EUR' });
  });

  it.each(['', '   ', 'ten', '1e400', '-3'])(
    'rejects amount=%p',
    async (amount) => {
      await expect(
        transform({ amount, from: 'USD', to: 'EUR' }),
      ).rejects.toBeInstanceOf(BadRequestException);
    },
  );

  it('rejects a missing amount', async () => {
    await expect(transform({ from: 'USD', to: 'EUR' })).rejects.toMatchObject({
      response: {
        message: expect.arrayContaining([
          'amount must be a number conforming to the specified constraints',
        ]),
      },
    });
  });
});
