import { Injectable, ValidationPipe } from '@nestjs/common';

/**
 * Validates gRPC request payloads against their DTO classes. Failures surface
 * as BadRequestException, which GrpcExceptionFilter maps to INVALID_ARGUMENT.
 */
@Injectable()
export class GrpcValidationPipe extends ValidationPipe {
  constructor() {
    super({
      transform: true,
      whitelist: true,
      validateCustomDecorators: false,
    });
  }
}
