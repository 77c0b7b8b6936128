import { Transform } from 'class-transformer';
import { IsNumber, IsString, Matches, Min } from 'class-validator';
import { CURRENCY_CODE_PATTERN } from 'src/presentation/grpc/dtos/get-rate.dto';

// Number('') is 0; a blank query value must fail validation instead
function toAmount({ value }: { value: unknown }): unknown {
  if (typeof value !== 'string') return value;
  return value.trim() === '' ? Number.NaN : Number(value);
}

export class ConvertQueryDto {
  @Transform(toAmount)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  amount!: number;

  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'from must be a 3-letter currency code',
  })
  from!: string;

  @IsString()
  @Matches(CURRENCY_CODE_PATTERN, {
    message: 'to must be a 3-letter currency code',
  })
  to!: string;
}
