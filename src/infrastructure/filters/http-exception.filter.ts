import { LoggingService } from '@infrastructure/observability/logging/logging.service';
import { ExceptionFilter, Catch, ArgumentsHost } from '@nestjs/common';
import { Request, Response } from 'express';
import { describeException } from './exception-mapping';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggingService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const error = describeException(exception);

    if (error.errorCode === 'INTERNAL_ERROR') {
      this.logger.error(`Unexpected error on ${request.path}`, {
        error: exception,
        ctx: HttpExceptionFilter.name,
      });
    }

    response.status(error.httpStatus).json({
      statusCode: error.httpStatus,
      errorCode: error.errorCode,
      message: error.message,
      details: error.details,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
