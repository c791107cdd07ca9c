// src/core/http/RetryHandler.ts

import axios from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Parse a Retry-After header given either as delta-seconds or as an HTTP date.
 * Returns milliseconds, or undefined when the header is absent or unparseable.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

export function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code);
}

export class RetryHandler {
  private sleep: Sleep;

  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private metrics?: MetricsCollector,
    sleep?: Sleep
  ) {
    this.sleep = sleep ?? defaultSleep;
  }

  async execute<T>(task: () => Promise<T>, label: string): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        const reason = this.retryReason(error);

        if (!reason || attempt >= this.config.maxRetries) {
          throw error;
        }

        const delay = this.delayFor(error, attempt);
        this.metrics?.incrementCounter('http_retries', { reason });
        this.logger.warn('Retrying request', {
          target: label,
          attempt: attempt + 1,
          maxRetries: this.config.maxRetries,
          delay,
          reason,
        });

        await this.sleep(delay);
      }
    }
  }

  /**
   * 429, 5xx, timeouts and transport failures are transient. Everything else is final.
   */
  private retryReason(error: unknown): string | undefined {
    if (!axios.isAxiosError(error)) return undefined;

    const status = error.response?.status;
    if (status === undefined) {
      return isTimeoutError(error) ? 'timeout' : 'network';
    }
    if (status === 429) return 'rate_limited';
    if (status >= 500) return 'server_error';
    return undefined;
  }

  private delayFor(error: unknown, attempt: number): number {
    if (axios.isAxiosError(error)) {
      const retryAfter = parseRetryAfter(error.response?.headers?.['retry-after']);
      if (retryAfter !== undefined) {
        return Math.min(retryAfter, this.config.maxDelay);
      }
    }

    const exponential = this.config.baseDelay * Math.pow(2, attempt);
    const jitter = Math.random() * this.config.baseDelay;
    return Math.min(exponential + jitter, this.config.maxDelay);
  }
}
