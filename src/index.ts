// src/index.ts

export { IngestionService } from './service';
export { createApp } from './server/app';
export type { ServerDependencies } from './server/app';
export type { HealthReport } from './server/types';

export { loadConfigFromEnv, DEFAULT_SCOPES } from './config/env';
export { validateConfig, validateConfigSafe, AppConfigSchema } from './config/ConfigValidator';
export type { AppConfig } from './config/ConfigValidator';

export { TokenManager } from './core/token/TokenManager';
export { SessionStore } from './core/token/SessionStore';
export type { OAuthSession } from './core/token/types';
export { ResourceClient, normalizeResourcePath } from './core/http/ResourceClient';
export { Normalizer, NormalizedMessageSchema } from './core/normalizer/Normalizer';
export type { NormalizedMessage, Mention, Attachment } from './core/normalizer/types';

export { NotificationIngestor } from './pipeline/NotificationIngestor';
export { NotificationWorker } from './pipeline/NotificationWorker';
export { SubscriptionRegistry } from './pipeline/SubscriptionRegistry';
export type { OwnerResolver } from './pipeline/SubscriptionRegistry';
export { NotificationRepository } from './storage/NotificationRepository';
export { MessageRepository } from './storage/MessageRepository';
export { openDatabase } from './storage/Database';
export type { PendingNotification, StoredMessage } from './storage/types';

// Error classes for error handling
export {
  IngestorError,
  OAuthError,
  OAuthConfigError,
  InvalidStateError,
  InvalidSignatureError,
  TokenExchangeError,
  TokenError,
  NoSessionError,
  TokenRefreshError,
  ApiError,
  ApiClientError,
  AuthenticationFailedError,
  RateLimitError,
  UpstreamUnavailableError,
  NetworkError,
  NetworkTimeoutError,
  NormalizationError,
  UnidentifiableMessageError,
  OwnerNotFoundError,
  isRetriable,
} from './utils/errors';
