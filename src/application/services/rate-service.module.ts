import { Module } from '@nestjs/common';
import { ExchangeModule } from '@infrastructure/exchange/exchange.module';
import { RateService } from './rate.service';

@Module({
  imports: [ExchangeModule],
  providers: [RateService],
  exports: [RateService],
})
export class RateServiceModule {}
