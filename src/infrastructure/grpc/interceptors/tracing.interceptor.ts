import { Metadata } from '@grpc/grpc-js';
import { TracingService } from '@infrastructure/observability/tracing/tracing.service';
import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Context, SpanStatusCode, context as ctx, propagation } from '@opentelemetry/api';
import { Observable, finalize, tap } from 'rxjs';

@Injectable()
export class TracingInterceptor implements NestInterceptor {
  constructor(private readonly tracer: TracingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const transport = context.getType();
    const methodName = context.getHandler().name;

    const span = this.tracer.startSpan(
      `${transport}.${methodName}`,
      this.parentContext(context),
      { 'rpc.method': methodName, 'fx.transport': transport },
    );

    return next.handle().pipe(
      tap({
        next: () => span.setStatus({ code: SpanStatusCode.OK }),
        error: (error: unknown) => {
          span.recordException(error instanceof Error ? error : String(error));
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: error instanceof Error ? error.message : String(error),
          });
        },
      }),
      finalize(() => span.end()),
    );
  }

  // gRPC callers propagate trace context through call metadata
  private parentContext(context: ExecutionContext): Context {
    if (context.getType() !== 'rpc') return ctx.active();
    const metadata: unknown = context.switchToRpc().getContext();
    if (!(metadata instanceof Metadata)) return ctx.active();
    return propagation.extract(ctx.active(), metadata.getMap());
  }
}
