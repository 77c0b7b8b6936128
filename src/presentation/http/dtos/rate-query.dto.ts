import { IsString, Matches } from 'class-validator';
import { CURRENCY_CODE_PATTERN } from 'src/presentation/grpc/dtos/get-rate.dto';

export class RateQueryDto {
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
