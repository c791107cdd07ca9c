// src/storage/types.ts

import type { NormalizedMessage } from '../core/normalizer/types';

export type NotificationStatus = 'pending' | 'processing' | 'done' | 'failed';

export type ChangeType = 'created' | 'updated' | 'deleted';

export interface NewNotification {
  subscriptionId: string;
  resourcePath: string;
  changeType: ChangeType;
  clientState?: string;
  rawPayload: string;
}

export interface PendingNotification extends NewNotification {
  id: number;
  status: NotificationStatus;
  attempts: number;
  lastError?: string;
  permanent: boolean;
  nextAttemptAt: Date;
  lockedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface FailureOptions {
  permanent?: boolean;
  retryDelayMs?: number;
}

export interface FailureOutcome {
  attempts: number;
  /** No further attempt will be made: permanent, or the attempt cap is reached. */
  poisoned: boolean;
}

export interface RecoveredLock extends FailureOutcome {
  id: number;
  subscriptionId: string;
  resourcePath: string;
}

export type QueueCounts = Record<NotificationStatus, number> & { poisoned: number };

export interface StoredMessage extends NormalizedMessage {
  ingestedAt: string;
}

export interface InsertResult {
  inserted: boolean;
}
