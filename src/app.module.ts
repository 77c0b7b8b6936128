import { Module } from '@nestjs/common';
import { ConfigModule } from '@infrastructure/config/config.module';
import { LoggingModule } from '@infrastructure/observability/logging/logging.module';
import { MetricsModule } from '@infrastructure/observability/metrics/metrics.module';
import { TracingModule } from '@infrastructure/observability/tracing/tracing.module';
import { ExchangeRateModule } from 'src/presentation/grpc/exchange-rate.module';
import { RatesHttpModule } from 'src/presentation/http/rates-http.module';

@Module({
  imports: [
    ConfigModule,

    LoggingModule,
    MetricsModule,
    TracingModule,

    ExchangeRateModule,
    RatesHttpModule,
  ],
})
export class AppModule {}
