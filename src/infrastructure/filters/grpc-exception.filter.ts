import { ArgumentsHost, Catch, RpcExceptionFilter } from '@nestjs/common';
import { Metadata, status } from '@grpc/grpc-js';
import { Observable, throwError } from 'rxjs';
import { LoggingService } from '../observability/logging/logging.service';
import { describeException } from './exception-mapping';

export type GrpcErrorPayload = {
  code: status;
  message: string;
  metadata: Metadata;
};

@Catch()
export class GrpcExceptionFilter implements RpcExceptionFilter<unknown> {
  constructor(private readonly logger: LoggingService) {}

  catch(exception: unknown, _host: ArgumentsHost): Observable<never> {
    const error = describeException(exception);

    if (error.errorCode === 'INTERNAL_ERROR') {
      this.logger.error(
        `Unexpected error: ${exception instanceof Error ? exception.message : String(exception)}`,
        { error: exception, ctx: GrpcExceptionFilter.name },
      );
    } else {
      this.logger.debug(`Rejected with ${error.errorCode}: ${error.message}`, {
        ctx: GrpcExceptionFilter.name,
      });
    }

    const metadata = new Metadata();
    metadata.set('error-code', error.errorCode);

    const payload: GrpcErrorPayload = {
      code: error.grpcStatus,
      message: error.message,
      metadata,
    };
    return throwError(() => payload);
  }
}
