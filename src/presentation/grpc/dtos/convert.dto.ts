import { IsNumber, IsString, Matches, Min } from 'class-validator';
import { ConvertRequest } from '../exchange-rate.types';
import { CURRENCY_CODE_PATTERN } from './get-rate.dto';

export class ConvertDto implements ConvertRequest {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  amount!: number;

  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'fromCurrency must be a 3-letter currency code',
  })
  fromCurrency!: string;

  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'toCurrency must be a 3-letter currency code',
  })
  toCurrency!: string;
}
