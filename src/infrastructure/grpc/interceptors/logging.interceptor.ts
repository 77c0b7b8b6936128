import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: LoggingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const startTime = Date.now();
    const transport = context.getType();
    const methodName = context.getHandler().name;

    this.logger.debug(`${transport} method ${methodName} called`, {
      ctx: 'LoggingInterceptor',
    });

    return next.handle().pipe(
      tap({
        next: () =>
          this.logger.debug(
            `${transport} method ${methodName} completed in ${Date.now() - startTime}ms`,
            { ctx: 'LoggingInterceptor' },
          ),
        error: (error: unknown) =>
          this.logger.warn(
            `${transport} method ${methodName} failed: ${error instanceof Error ? error.message : String(error)}`,
            { ctx: 'LoggingInterceptor' },
          ),
      }),
    );
  }
}
