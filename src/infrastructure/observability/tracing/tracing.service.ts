import { Injectable } from '@nestjs/common';
import { Context, Span, Tracer, context, trace } from '@opentelemetry/api';
import { AppConfigService } from '@infrastructure/config/config.service';

/**
 * Thin wrapper over the global OpenTelemetry tracer. Without a registered SDK
 * every span is a no-op, so the service runs the same with tracing off.
 */
@Injectable()
export class TracingService {
  private readonly tracer: Tracer;

  constructor(config: AppConfigService) {
    this.tracer = trace.getTracer(config.serviceName);
  }

  startSpan(
    name: string,
    parent: Context = context.active(),
    attributes: Record<string, string> = {},
  ): Span {
    return this.tracer.startSpan(name, { attributes }, parent);
  }
}
