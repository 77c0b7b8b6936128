import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { CacheLookupOutcome } from '@infrastructure/cache/ttl-cache';

export type RequestStatus = 'SUCCESS' | 'FAILED';

@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  readonly requestCounter = new Counter({
    name: 'fx_requests_total',
    help: 'Rate and conversion requests by method and outcome',
    labelNames: ['method', 'status'] as const,
    registers: [this.registry],
  });

  readonly requestLatency = new Histogram({
    name: 'fx_request_duration_seconds',
    help: 'Request handling time in seconds',
    labelNames: ['method'] as const,
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
    registers: [this.registry],
  });

  readonly cacheLookups = new Counter({
    name: 'fx_cache_lookups_total',
    help: 'Rate snapshot cache lookups by outcome',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  });

  readonly providerFetches = new Counter({
    name: 'fx_provider_fetches_total',
    help: 'Upstream rate provider fetches by outcome',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  enableDefaultMetrics(): void {
    collectDefaultMetrics({ register: this.registry });
  }

  incRequestCounter(labels: { method: string; status: RequestStatus }): void {
    this.requestCounter.inc(labels);
  }

  incCacheLookup(outcome: CacheLookupOutcome): void {
    this.cacheLookups.inc({ outcome });
  }

  incProviderFetch(status: string): void {
    this.providerFetches.inc({ status });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
