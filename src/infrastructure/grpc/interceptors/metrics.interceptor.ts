import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const method = context.getHandler().name;
    const observe = () =>
      this.metrics.requestLatency.observe(
        { method },
        (Date.now() - startTime) / 1000,
      );

    return next.handle().pipe(
      tap({
        next: () => {
          this.metrics.incRequestCounter({ method, status: 'SUCCESS' });
          observe();
        },
        error: () => {
          this.metrics.incRequestCounter({ method, status: 'FAILED' });
          observe();
        },
      }),
    );
  }
}
