// Mirrors fx_service.proto as seen through @grpc/proto-loader (camelCase fields)

export interface GetRateRequest {
  base: string;
  target: string;
}

export interface RateReply {
  base: string;
  target: string;
  rate: number;
  asOf: string;
  fetchedAt: string;
  provider: string;
}

export interface ConvertRequest {
  amount: number;
  fromCurrency: string;
  toCurrency: string;
}

export interface ConversionReply {
  fromCurrency: string;
  toCurrency: string;
  amount: number;
  converted: number;
  rate: number;
  asOf: string;
  fetchedAt: string;
  provider: string;
}

export type HealthCheckRequest = Record<string, never>;

export interface HealthCheckResponse {
  status: string;
  cachedBases: number;
}
