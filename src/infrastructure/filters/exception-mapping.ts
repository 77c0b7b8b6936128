import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';
import { status as GrpcStatus } from '@grpc/grpc-js';
import {
  DomainException,
  ExchangeErrorCode,
} from '@domain/exceptions/domain.exceptions';

export type ErrorDescriptor = {
  errorCode:
    | ExchangeErrorCode
    | 'VALIDATION_ERROR'
    | 'HTTP_ERROR'
    | 'INTERNAL_ERROR';
  message: string;
  details: { message: string; field?: string }[];
  grpcStatus: GrpcStatus;
  httpStatus: HttpStatus;
};

const DOMAIN_STATUS: Record<
  ExchangeErrorCode,
  { grpc: GrpcStatus; http: HttpStatus }
> = {
  INVALID_CURRENCY_CODE: {
    grpc: GrpcStatus.INVALID_ARGUMENT,
    http: HttpStatus.BAD_REQUEST,
  },
  INVALID_AMOUNT: {
    grpc: GrpcStatus.INVALID_ARGUMENT,
    http: HttpStatus.BAD_REQUEST,
  },
  UNKNOWN_CURRENCY_CODE: {
    grpc: GrpcStatus.NOT_FOUND,
    http: HttpStatus.NOT_FOUND,
  },
  PROVIDER_UNAVAILABLE: {
    grpc: GrpcStatus.UNAVAILABLE,
    http: HttpStatus.SERVICE_UNAVAILABLE,
  },
  PROVIDER_TIMEOUT: {
    grpc: GrpcStatus.DEADLINE_EXCEEDED,
    http: HttpStatus.GATEWAY_TIMEOUT,
  },
  PROVIDER_BAD_RESPONSE: {
    grpc: GrpcStatus.INTERNAL,
    http: HttpStatus.BAD_GATEWAY,
  },
};

function validationMessages(exception: BadRequestException): string[] {
  const response = exception.getResponse();
  if (typeof response === 'string') return [response];
  if (
    typeof response === 'object' &&
    response !== null &&
    'message' in response
  ) {
    const { message } = response;
    if (Array.isArray(message)) return message.map((m) => String(m));
    if (typeof message === 'string') return [message];
  }
  return [exception.message];
}

export function describeException(exception: unknown): ErrorDescriptor {
  if (exception instanceof DomainException) {
    const status = DOMAIN_STATUS[exception.errorCode];
    return {
      errorCode: exception.errorCode,
      message: exception.message,
      details: exception.serializeError(),
      grpcStatus: status.grpc,
      httpStatus: status.http,
    };
  }

  if (exception instanceof BadRequestException) {
    const messages = validationMessages(exception);
    return {
      errorCode: 'VALIDATION_ERROR',
      message: messages.join(', '),
      details: messages.map((message) => ({ message })),
      grpcStatus: GrpcStatus.INVALID_ARGUMENT,
      httpStatus: HttpStatus.BAD_REQUEST,
    };
  }

  if (exception instanceof HttpException) {
    return {
      errorCode: 'HTTP_ERROR',
      message: exception.message,
      details: [{ message: exception.message }],
      grpcStatus: GrpcStatus.UNKNOWN,
      httpStatus: exception.getStatus(),
    };
  }

  return {
    errorCode: 'INTERNAL_ERROR',
    message: 'Internal server error',
    details: [{ message: 'Internal server error' }],
    grpcStatus: GrpcStatus.INTERNAL,
    httpStatus: HttpStatus.INTERNAL_SERVER_ERROR,
  };
}
