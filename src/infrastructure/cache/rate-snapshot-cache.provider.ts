import { FactoryProvider } from '@nestjs/common';
import { IClock } from '@application/adaptors/clock.interface';
import { RateSnapshot } from '@domain/entities/rate-snapshot';
import { AppConfigService } from '@infrastructure/config/config.service';
import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { TtlCache } from './ttl-cache';

export const RATE_SNAPSHOT_CACHE = Symbol('RATE_SNAPSHOT_CACHE');

export type RateSnapshotCache = TtlCache<string, RateSnapshot>;

export const rateSnapshotCacheProvider: FactoryProvider<RateSnapshotCache> = {
  provide: RATE_SNAPSHOT_CACHE,
  inject: [AppConfigService, IClock, MetricsService, LoggingService],
  useFactory: (
    config: AppConfigService,
    clock: IClock,
    metrics: MetricsService,
    logger: LoggingService,
  ): RateSnapshotCache =>
    new TtlCache<string, RateSnapshot>({
      ttlMs: config.cacheTtlSeconds * 1000,
      clock,
      onLookup: (base, outcome) => {
        metrics.incCacheLookup(outcome);
        logger.debug(`Rate cache ${outcome} for ${base}`, {
          ctx: 'RateSnapshotCache',
        });
      },
    }),
};
