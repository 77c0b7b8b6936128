import { Module } from '@nestjs/common';
import { IRateProvider } from '@application/adaptors/rate-provider.interface';
import { IClock } from '@application/adaptors/clock.interface';
import { SystemClock } from '@infrastructure/clock/system-clock';
import {
  RATE_SNAPSHOT_CACHE,
  rateSnapshotCacheProvider,
} from '@infrastructure/cache/rate-snapshot-cache.provider';
import { FrankfurterRateProvider } from './frankfurter-rate.provider';

@Module({
  providers: [
    { provide: IClock, useClass: SystemClock },
    { provide: IRateProvider, useClass: FrankfurterRateProvider },
    rateSnapshotCacheProvider,
  ],
  exports: [IRateProvider, IClock, RATE_SNAPSHOT_CACHE],
})
export class ExchangeModule {}
