import {
  Controller,
  UseFilters,
  UseInterceptors,
  UsePipes,
} from '@nestjs/common';
import { GrpcMethod, Payload } from '@nestjs/microservices';
import { RateService } from '@application/services/rate.service';
import { Conversion, RateQuote } from '@application/dtos/rate-result.dto';
import { GrpcExceptionFilter } from '@infrastructure/filters/grpc-exception.filter';
import { GrpcValidationPipe } from '@infrastructure/pipe/grpc-validation.pipe';
import { LoggingInterceptor } from '../../infrastructure/grpc/interceptors/logging.interceptor';
import { MetricsInterceptor } from '../../infrastructure/grpc/interceptors/metrics.interceptor';
import { TracingInterceptor } from '../../infrastructure/grpc/interceptors/tracing.interceptor';
import { GetRateDto } from './dtos/get-rate.dto';
import { ConvertDto } from './dtos/convert.dto';
import {
  ConversionReply,
  HealthCheckRequest,
  HealthCheckResponse,
  RateReply,
} from './exchange-rate.types';

@Controller()
@UseFilters(GrpcExceptionFilter)
@UsePipes(GrpcValidationPipe)
@UseInterceptors(LoggingInterceptor, MetricsInterceptor, TracingInterceptor)
export class ExchangeRateController {
  constructor(private readonly rateService: RateService) {}

  @GrpcMethod('ExchangeRateService', 'GetRate')
  async getRate(@Payload() request: GetRateDto): Promise<RateReply> {
    const quote = await this.rateService.getRate(request.base, request.target);
    return this.toRateReply(quote);
  }

  @GrpcMethod('ExchangeRateService', 'Convert')
  async convert(@Payload() request: ConvertDto): Promise<ConversionReply> {
    const conversion = await this.rateService.convert(
      request.amount,
      request.fromCurrency,
      request.toCurrency,
    );
    return this.toConversionReply(conversion);
  }

  @GrpcMethod('ExchangeRateService', 'HealthCheck')
  async healthCheck(
    @Payload() _request: HealthCheckRequest,
  ): Promise<HealthCheckResponse> {
    return {
      status: 'HEALTHY',
      cachedBases: this.rateService.cachedBaseCount,
    };
  }

  private toRateReply(quote: RateQuote): RateReply {
    return {
      base: quote.base,
      target: quote.target,
      rate: quote.rate,
      asOf: quote.asOf ?? '',
      fetchedAt: quote.fetchedAt?.toISOString() ?? '',
      provider: quote.provider,
    };
  }

  private toConversionReply(conversion: Conversion): ConversionReply {
    return {
      fromCurrency: conversion.from,
      toCurrency: conversion.to,
      amount: conversion.amount,
      converted: conversion.converted,
      rate: conversion.rate,
      asOf: conversion.asOf ?? '',
      fetchedAt: conversion.fetchedAt?.toISOString() ?? '',
      provider: conversion.provider,
    };
  }
}
