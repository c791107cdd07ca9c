// src/core/http/HttpCore.ts

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type { HttpCoreOptions, HttpRequestConfig, HttpResponse, RateLimitConfig } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler, isTimeoutError, parseRetryAfter } from './RetryHandler';
import type { Sleep } from './RetryHandler';
import {
  ApiClientError,
  AuthenticationFailedError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
  UpstreamUnavailableError,
} from '../../utils/errors';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

/**
 * Transport for every upstream call: pacing, retries and error classification.
 * Bearer credentials are the caller's business.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiter?: PQueue;
  private retryHandler: RetryHandler;
  private metrics: MetricsCollector;
  private logger: Logger;
  private userAgent: string;

  constructor(options: HttpCoreOptions, metrics: MetricsCollector, logger: Logger, sleep?: Sleep) {
    this.metrics = metrics;
    this.logger = logger;
    this.userAgent = options.userAgent ?? 'graph-change-ingestor/0.1';
    this.retryHandler = new RetryHandler(options.retry, logger, metrics, sleep);

    this.axiosInstance = axios.create({
      timeout: options.timeoutMs,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    if (options.rateLimit) {
      this.rateLimiter = this.createRateLimiter(options.rateLimit);
    }
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const requestId = generateCorrelationId();
    const method = config.method ?? 'GET';

    this.logger.debug('HTTP request', {
      requestId,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> =>
      withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(
            () => this.send<T>(config, method, headers),
            config.url
          );

          this.metrics.incrementCounter('http_requests_total', {
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            method,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const status = axios.isAxiosError(error) ? error.response?.status : undefined;
          const statusLabel = status?.toString() ?? 'error';

          this.metrics.incrementCounter('http_requests_total', { method, status: statusLabel });
          this.metrics.incrementCounter('http_errors', { status: statusLabel });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            method,
            status: statusLabel,
          });
          throw this.transformError(error, config.url);
        }
      });

    return this.runThroughRateLimiter(config.skipRateLimit, execute);
  }

  getQueueSize(): number {
    return this.rateLimiter ? this.rateLimiter.size + this.rateLimiter.pending : 0;
  }

  private send<T>(
    config: HttpRequestConfig,
    method: string,
    headers: Record<string, string>
  ): Promise<AxiosResponse<T>> {
    return this.axiosInstance.request<T>({
      url: config.url,
      method,
      headers,
      params: config.query,
      data: config.body,
      timeout: config.timeout,
      validateStatus: (status) => status < 400,
    });
  }

  private async runThroughRateLimiter<T>(
    skip: boolean | undefined,
    task: () => Promise<T>
  ): Promise<T> {
    const queue = this.rateLimiter;

    if (!queue || skip) {
      return task();
    }

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1);

    return queue.add(
      async () => {
        try {
          return await task();
        } finally {
          this.metrics.recordGauge('rate_limit_queue_size', queue.size);
        }
      },
      { throwOnTimeout: true }
    );
  }

  private createRateLimiter(config: RateLimitConfig): PQueue {
    // Fractional qps spreads single requests over a longer interval
    const intervalCap = config.qps >= 1 ? Math.floor(config.qps) : 1;
    const interval = config.qps >= 1 ? 1000 : Math.floor(1000 / config.qps);

    this.logger.debug('Rate limiter initialized', {
      qps: config.qps,
      intervalCap,
      interval,
      concurrency: config.concurrency,
    });

    return new PQueue({ intervalCap, interval, concurrency: config.concurrency });
  }

  private toHeaderRecord(headers: AxiosResponse['headers']): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, url: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { url });
    }

    const response = error.response;
    if (response) {
      const status = response.status;

      this.logger.debug('HTTP error response', {
        url,
        status,
        statusText: response.statusText,
        data: response.data,
      });

      if (status === 401) {
        return new AuthenticationFailedError('Upstream rejected the access token', { url });
      }
      if (status === 429) {
        const retryAfterMs = parseRetryAfter(response.headers['retry-after']);
        this.metrics.incrementCounter('rate_limit_hits');
        return new RateLimitError(
          'Rate limit exceeded after retries',
          retryAfterMs === undefined ? undefined : Math.ceil(retryAfterMs / 1000),
          { url }
        );
      }
      if (status >= 500) {
        return new UpstreamUnavailableError(`Upstream unavailable: ${status}`, status, { url });
      }
      return new ApiClientError(`Client error: ${status}`, status, {
        url,
        response: response.data,
      });
    }

    if (isTimeoutError(error)) {
      return new NetworkTimeoutError('Request timeout', { url });
    }
    return new NetworkError(`Network error: ${error.message}`, { url, code: error.code });
  }
}
