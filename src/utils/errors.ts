// src/utils/errors.ts

export class IngestorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// OAuth errors
export class OAuthError extends IngestorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

export class InvalidStateError extends OAuthError {
  constructor(message: string = 'Authorization state mismatch', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'INVALID_STATE';
  }
}

export class InvalidSignatureError extends OAuthError {
  constructor(message: string = 'Authorization state signature mismatch', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'INVALID_SIGNATURE';
  }
}

export class TokenExchangeError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_EXCHANGE_FAILED';
  }
}

// Token errors
export class TokenError extends IngestorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOKEN_ERROR', details);
  }
}

export class NoSessionError extends TokenError {
  constructor(userId: string, details?: Record<string, unknown>) {
    super(`No session stored for user ${userId}`, { ...details, userId });
    this.code = 'NO_SESSION';
  }
}

export class TokenRefreshError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'REFRESH_FAILED';
  }
}

// API errors
export class ApiError extends IngestorError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'CLIENT_ERROR';
  }
}

export class AuthenticationFailedError extends ApiError {
  constructor(message: string = 'Upstream rejected the access token', details?: Record<string, unknown>) {
    super(message, 401, details);
    this.code = 'AUTHENTICATION_FAILED';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMITED';
  }
}

export class UpstreamUnavailableError extends ApiError {
  constructor(message: string, status: number = 503, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'UPSTREAM_UNAVAILABLE';
  }
}

// Network errors
export class NetworkError extends IngestorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Normalization errors
export class NormalizationError extends IngestorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NORMALIZATION_ERROR', details);
  }
}

export class UnidentifiableMessageError extends NormalizationError {
  constructor(message: string = 'Payload carries no message identifier', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'UNIDENTIFIABLE_MESSAGE';
  }
}

// Pipeline errors
export class OwnerNotFoundError extends IngestorError {
  constructor(subscriptionId: string) {
    super(`No owner registered for subscription ${subscriptionId}`, 'OWNER_NOT_FOUND', {
      subscriptionId,
    });
  }
}

/**
 * Whether a failed notification row may be attempted again.
 * Client errors and payloads that fail normalization will fail identically on every attempt.
 */
export function isRetriable(error: unknown): boolean {
  if (error instanceof ApiClientError) return false;
  if (error instanceof NormalizationError) return false;
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
