import { Inject, Injectable, LoggerService, Optional } from '@nestjs/common';
import pino, { DestinationStream, Logger, LoggerOptions } from 'pino';
import { AppConfigService } from '@infrastructure/config/config.service';

export type LogMeta = {
  ctx?: string;
  error?: unknown;
  [key: string]: unknown;
};

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'Authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  'headers.authorization',
  'headers.Authorization',
];

/** Optional sink for log lines; stdout (or pino-pretty in development) otherwise. */
export const LOG_DESTINATION = Symbol('LOG_DESTINATION');

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger: Logger;

  constructor(
    config: AppConfigService,
    @Optional()
    @Inject(LOG_DESTINATION)
    destination?: DestinationStream,
  ) {
    const options: LoggerOptions = {
      name: config.serviceName,
      level: config.logLevel,
      redact: { paths: redactPaths, censor: '[REDACTED]' },
      serializers: { error: pino.stdSerializers.err },
    };

    if (destination) {
      this.logger = pino(options, destination);
    } else if (config.nodeEnv === 'development') {
      this.logger = pino({
        ...options,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' },
        },
      });
    } else {
      this.logger = pino(options);
    }
  }

  // Nest passes the context name as a trailing string argument
  private toMeta(meta: unknown): LogMeta {
    if (typeof meta === 'string') return { ctx: meta };
    if (meta && typeof meta === 'object') {
      return Object.fromEntries(Object.entries(meta));
    }
    return {};
  }

  log(message: string, meta?: LogMeta | string): void {
    this.logger.info(this.toMeta(meta), message);
  }

  info(message: string, meta?: LogMeta | string): void {
    this.logger.info(this.toMeta(meta), message);
  }

  debug(message: string, meta?: LogMeta | string): void {
    this.logger.debug(this.toMeta(meta), message);
  }

  verbose(message: string, meta?: LogMeta | string): void {
    this.logger.trace(this.toMeta(meta), message);
  }

  warn(message: string, meta?: LogMeta | string): void {
    this.logger.warn(this.toMeta(meta), message);
  }

  // Nest's own Logger calls error(message, stack, context)
  error(message: string, meta?: LogMeta | string, context?: string): void {
    if (typeof meta === 'string' && context !== undefined) {
      this.logger.error({ ctx: context, stack: meta }, message);
      return;
    }
    this.logger.error(this.toMeta(meta), message);
  }

  fatal(message: string, meta?: LogMeta | string): void {
    this.logger.fatal(this.toMeta(meta), message);
  }
}
