// src/config/ConfigValidator.ts

import { z } from 'zod';

const hexKey = z
  .string()
  .length(64, 'Encryption key must be exactly 64 characters')
  .regex(/^[0-9a-f]{64}$/i, 'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)');

// Session Store Configuration Schema
const SessionStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Session store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    encryption: z
      .object({
        key: hexKey,
        previousKeys: z.array(hexKey).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

const ServerConfigSchema = z.object({
  port: z.number().int().min(0).max(65535),
  webhookPath: z.string().startsWith('/'),
  publicBaseUrl: z.string().url().optional(),
});

const OAuthConfigSchema = z.object({
  tenantId: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectUri: z.string().url(),
  scopes: z.array(z.string().min(1)).min(1),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  stateSecret: z.string().min(16, 'State secret must be at least 16 characters'),
  refreshMarginSeconds: z.number().int().min(0).max(3600),
});

const GraphConfigSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive(),
  retry: RetryConfigSchema,
  rateLimit: RateLimitConfigSchema,
});

const NotificationsConfigSchema = z.object({
  clientState: z.string().min(1),
  defaultOwnerUserId: z.string().min(1).optional(),
});

const WorkerConfigSchema = z.object({
  pollIntervalMs: z.number().int().positive(),
  batchSize: z.number().int().positive().max(500),
  concurrency: z.number().int().positive(),
  maxAttempts: z.number().int().positive(),
  retryBaseDelayMs: z.number().int().min(0),
  staleLockMs: z.number().int().positive(),
  shutdownGraceMs: z.number().int().min(0),
});

const DatabaseConfigSchema = z.object({
  path: z.string().min(1),
});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  oauth: OAuthConfigSchema,
  graph: GraphConfigSchema,
  notifications: NotificationsConfigSchema,
  worker: WorkerConfigSchema,
  database: DatabaseConfigSchema,
  sessionStore: SessionStoreConfigSchema,
  redisUrl: z.string().url().optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ConfigValidationResult =
  | { success: true; data: AppConfig }
  | { success: false; errors: string[] };

/**
 * Validate service configuration
 *
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): AppConfig {
  return AppConfigSchema.parse(config);
}

/**
 * Validate configuration and return one `path: message` string per problem
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
