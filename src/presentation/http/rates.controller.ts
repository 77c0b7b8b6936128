import {
  Controller,
  Delete,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Param,
  Query,
  Res,
  UseFilters,
  UseInterceptors,
  ValidationPipe,
} from '@nestjs/common';
import { Response } from 'express';
import { RateService } from '@application/services/rate.service';
import { Conversion, RateQuote } from '@application/dtos/rate-result.dto';
import { HttpExceptionFilter } from '@infrastructure/filters/http-exception.filter';
import { LoggingInterceptor } from '@infrastructure/grpc/interceptors/logging.interceptor';
import { MetricsInterceptor } from '@infrastructure/grpc/interceptors/metrics.interceptor';
import { TracingInterceptor } from '@infrastructure/grpc/interceptors/tracing.interceptor';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { RateQueryDto } from './dtos/rate-query.dto';
import { ConvertQueryDto } from './dtos/convert-query.dto';

const queryPipe = new ValidationPipe({ transform: true, whitelist: true });

@Controller()
@UseFilters(HttpExceptionFilter)
export class RatesController {
  constructor(
    private readonly rateService: RateService,
    private readonly metrics: MetricsService,
  ) {}

  @Get('rates')
  @UseInterceptors(LoggingInterceptor, MetricsInterceptor, TracingInterceptor)
  @Header('Cache-Control', 'no-store')
  async getRate(@Query(queryPipe) query: RateQueryDto): Promise<RateQuote> {
    return this.rateService.getRate(query.base, query.target);
  }

  @Get('convert')
  @UseInterceptors(LoggingInterceptor, MetricsInterceptor, TracingInterceptor)
  @Header('Cache-Control', 'no-store')
  async convert(@Query(queryPipe) query: ConvertQueryDto): Promise<Conversion> {
    return this.rateService.convert(query.amount, query.from, query.to);
  }

  @Delete('rates/cache')
  @HttpCode(HttpStatus.NO_CONTENT)
  clearCache(): void {
    this.rateService.clearCache();
  }

  @Delete('rates/cache/:base')
  @HttpCode(HttpStatus.NO_CONTENT)
  invalidate(@Param('base') base: string): void {
    this.rateService.invalidate(base);
  }

  @Get('health')
  health(): { status: string; cachedBases: number } {
    return { status: 'HEALTHY', cachedBases: this.rateService.cachedBaseCount };
  }

  @Get('metrics')
  async metricsText(
    @Res() res: Pick<Response, 'setHeader' | 'send'>,
  ): Promise<void> {
    res.setHeader('Content-Type', this.metrics.contentType);
    res.send(await this.metrics.render());
  }
}
