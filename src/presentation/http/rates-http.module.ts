import { Module } from '@nestjs/common';
import { RateServiceModule } from '@application/services/rate-service.module';
import { RatesController } from './rates.controller';

@Module({
  imports: [RateServiceModule],
  controllers: [RatesController],
})
export class RatesHttpModule {}
