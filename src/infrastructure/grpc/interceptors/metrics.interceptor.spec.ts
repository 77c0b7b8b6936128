import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { MetricsInterceptor } from './metrics.interceptor';

class FakeController {
  getRate(): void {}
}

describe('MetricsInterceptor', () => {
  let metrics: MetricsService;
  let interceptor: MetricsInterceptor;
  const context = new ExecutionContextHost(
    [],
    FakeController,
    FakeController.prototype.getRate,
  );

  beforeEach(() => {
    metrics = new MetricsService();
    interceptor = new MetricsInterceptor(metrics);
  });

  it('counts successful calls per handler', async () => {
    await lastValueFrom(interceptor.intercept(context, { handle: () => of('ok') }));

    const text = await metrics.render();
    expect(text).toContain('fx_requests_total{method="getRate",status="SUCCESS"} 1');
    expect(text).toContain('fx_request_duration_seconds_count{method="getRate"} 1');
  });

  it('counts failed calls and lets the error through', async () => {
    const boom = new Error('boom');

    await expect(
      lastValueFrom(
        interceptor.intercept(context, { handle: () => throwError(() => boom) }),
      ),
    ).rejects.toBe(boom);

    expect(await metrics.render()).toContain(
      'fx_requests_total{method="getRate",status="FAILED"} 1',
    );
  });
});
