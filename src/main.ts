import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport } from '@nestjs/microservices';
import path from 'path';
import { AppModule } from './app.module';
import { AppConfigService } from '@infrastructure/config/config.service';
import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  const configService = app.get(AppConfigService);
  const logger = app.get(LoggingService);

  app.useLogger(logger);
  app.get(MetricsService).enableDefaultMetrics();
  app.enableShutdownHooks();

  app.connectMicroservice({
    transport: Transport.GRPC,
    options: {
      url: `0.0.0.0:${configService.grpcPort}`,
      package: 'fx_service',
      protoPath: path.join(
        __dirname,
        '..',
        'src',
        'infrastructure',
        'grpc',
        'protos',
        'fx_service.proto',
      ),
      keepalive: {
        keepaliveTimeMs: 10000,
        keepaliveTimeoutMs: 5000,
        keepalivePermitWithoutCalls: 1,
      },
    },
  });

  await app.startAllMicroservices();
  await app.listen(configService.apiPort);
  logger.log(
    `${configService.serviceName} running on port ${configService.apiPort} (HTTP) and ${configService.grpcPort} (gRPC)`,
    {
      ctx: 'Bootstrap',
      cacheTtlSeconds: configService.cacheTtlSeconds,
      provider: configService.providerBaseUrl,
    },
  );
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start fx-rates-srv', error);
  process.exit(1);
});
