// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface HttpRequestConfig {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
  skipRateLimit?: boolean;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
}

export interface HttpCoreOptions {
  timeoutMs: number;
  retry: RetryConfig;
  rateLimit?: RateLimitConfig;
  userAgent?: string;
}

export interface GetTokenOptions {
  forceRefresh?: boolean;
  /** Token the upstream just rejected; a refresh is skipped if the stored token already differs. */
  rejectedToken?: string;
}

/**
 * Anything able to hand out a bearer token for a user.
 */
export interface TokenSource {
  getValidToken(userId: string, opts?: GetTokenOptions): Promise<string>;
}
