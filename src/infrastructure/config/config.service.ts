import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';

@Injectable()
export class AppConfigService {
  constructor(private readonly configService: NestConfigService) {}

  // Env values arrive as strings unless validate() already coerced them
  private getNumber(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }

  // Service config
  get nodeEnv(): string {
    return this.configService.get<string>('NODE_ENV', 'development');
  }
  get serviceName(): string {
    return this.configService.get<string>('SERVICE_NAME', 'fx-rates-srv');
  }

  get apiPort(): number {
    return this.getNumber('API_PORT', 4010);
  }

  get grpcPort(): number {
    return this.getNumber('GRPC_PORT', 50060);
  }

  // Rate cache
  get cacheTtlSeconds(): number {
    return this.getNumber('CACHE_TTL_SECONDS', 30);
  }

  // Rate provider
  get providerBaseUrl(): string {
    return this.configService
      .get<string>('FX_API_BASE', 'https://api.frankfurter.dev/v1')
      .replace(/\/+$/, '');
  }
  get providerTimeoutSeconds(): number {
    return this.getNumber('HTTP_TIMEOUT', 6);
  }
  get providerClientTag(): string {
    return this.configService.get<string>('FX_CLIENT_TAG', 'fx-rates-srv/1.0');
  }

  // Observability config
  get logLevel(): string {
    return this.configService.get<string>('LOG_LEVEL', 'info');
  }
}
