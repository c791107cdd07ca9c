// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const SENSITIVE_KEYS = new Set([
  'accessToken',
  'refreshToken',
  'idToken',
  'clientSecret',
  'clientState',
  'stateSecret',
  'signature',
  'code',
  'validationToken',
  'authorization',
]);

const MAX_REDACT_DEPTH = 6;

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(value: unknown, depth = 0): unknown {
    if (!value || typeof value !== 'object') return value;
    if (value instanceof Date) return value;
    if (depth >= MAX_REDACT_DEPTH) return '[TRUNCATED]';
    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.redactSensitive(item, depth + 1));
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      redacted[key] = SENSITIVE_KEYS.has(key) ? '[REDACTED]' : this.redactSensitive(entry, depth + 1);
    }
    return redacted;
  }

  private sanitize(meta?: Record<string, unknown>): Record<string, unknown> {
    if (!meta) return {};
    const redacted = this.redactSensitive(meta);
    return redacted && typeof redacted === 'object' && !Array.isArray(redacted) ? { ...redacted } : {};
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, this.sanitize(meta));
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, this.sanitize(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, this.sanitize(meta));
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, this.sanitize(meta));
  }

  log(level: string, message: string, meta?: Record<string, unknown>): void {
    this.logger.log(level, message, this.sanitize(meta));
  }
}
