import { IsString, Matches } from 'class-validator';
import { GetRateRequest } from '../exchange-rate.types';

export const CURRENCY_CODE_PATTERN = /^[A-Za-z]{3}$/;

export class GetRateDto implements GetRateRequest {
  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'base must be a 3-letter currency code',
  })
  base!: string;

  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'target must be a 3-letter currency code',
  })
  target!: string;
}
