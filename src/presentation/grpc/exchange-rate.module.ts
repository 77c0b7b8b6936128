import { Module } from '@nestjs/common';
import { RateServiceModule } from '@application/services/rate-service.module';
import { ExchangeRateController } from './exchange-rate.controller';

@Module({
  imports: [RateServiceModule],
  controllers: [ExchangeRateController],
})
export class ExchangeRateModule {}
