// src/pipeline/NotificationWorker.ts

import PQueue from 'p-queue';
import type { NotificationRepository } from '../storage/NotificationRepository';
import type { MessageRepository } from '../storage/MessageRepository';
import type { PendingNotification } from '../storage/types';
import type { ResourceClient } from '../core/http/ResourceClient';
import type { TokenSource } from '../core/http/types';
import type { Normalizer } from '../core/normalizer/Normalizer';
import { isRecord } from '../core/normalizer/FieldExtractors';
import type { OwnerResolver } from './SubscriptionRegistry';
import type { RowOutcome, WorkerOptions, WorkerStatus } from './types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { setSpanAttribute, withWorkerSpan } from '../observability/tracing';
import {
  IngestorError,
  RateLimitError,
  UnidentifiableMessageError,
  errorMessage,
  isRetriable,
} from '../utils/errors';

const MAX_RETRY_DELAY_MS = 60 * 60 * 1000;

export interface WorkerDependencies {
  notifications: NotificationRepository;
  messages: MessageRepository;
  owners: OwnerResolver;
  tokens: TokenSource;
  resources: ResourceClient;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}

function describe(error: unknown): string {
  return error instanceof IngestorError ? `${error.code}: ${error.message}` : errorMessage(error);
}

/**
 * Background consumer of the notification queue.
 *
 * Polls every `pollIntervalMs`, or immediately after `wake()`. Each poll first
 * releases rows locked longer than `staleLockMs`, then claims up to `batchSize`
 * rows and runs them through a queue bounded by `concurrency`.
 */
export class NotificationWorker {
  private queue: PQueue;
  private running = false;
  private timer?: NodeJS.Timeout;
  private polling?: Promise<void>;
  private wakeRequested = false;
  private lastPollAt?: Date;

  constructor(
    private deps: WorkerDependencies,
    private options: WorkerOptions
  ) {
    this.queue = new PQueue({ concurrency: options.concurrency });
  }

  start(): void {
    if (this.running) {
      this.deps.logger.warn('Worker already running');
      return;
    }

    this.running = true;
    this.deps.logger.info('Notification worker started', {
      pollIntervalMs: this.options.pollIntervalMs,
      batchSize: this.options.batchSize,
      concurrency: this.options.concurrency,
    });
    this.schedule(0);
  }

  /**
   * Poll now instead of waiting for the next interval.
   */
  wake(): void {
    if (!this.running) return;
    if (this.polling) {
      this.wakeRequested = true;
      return;
    }
    this.schedule(0);
  }

  /**
   * Stop claiming rows and wait up to `shutdownGraceMs` for rows in flight.
   * Rows still unfinished after that are recovered by the next start.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }

    const polling = this.polling;
    if (polling) {
      let graceTimer: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        polling.then(() => false),
        new Promise<boolean>((resolve) => {
          graceTimer = setTimeout(() => resolve(true), this.options.shutdownGraceMs);
        }),
      ]);
      clearTimeout(graceTimer);

      if (timedOut) {
        this.queue.clear();
        this.deps.logger.warn('Worker stopped with notifications still in flight', {
          inFlight: this.queue.pending,
        });
      }
    }

    this.deps.logger.info('Notification worker stopped');
  }

  getStatus(): WorkerStatus {
    return {
      running: this.running,
      inFlight: this.queue.pending + this.queue.size,
      lastPollAt: this.lastPollAt?.toISOString(),
    };
  }

  /**
   * Release stale locks, then claim one batch and process it to completion.
   * Returns the number of rows claimed.
   */
  async runOnce(): Promise<number> {
    this.lastPollAt = new Date();
    this.recoverStaleLocks();

    const rows = this.deps.notifications.claimBatch(this.options.batchSize);
    if (rows.length === 0) return 0;

    this.deps.logger.debug('Claimed notifications', { count: rows.length });
    await Promise.all(rows.map((row) => this.queue.add(() => this.processRow(row))));
    this.reportQueueDepth();
    return rows.length;
  }

  private schedule(delayMs: number): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.polling = this.poll().finally(() => {
        this.polling = undefined;
      });
    }, delayMs);
  }

  private async poll(): Promise<void> {
    let claimed = 0;
    try {
      claimed = await this.runOnce();
    } catch (error: unknown) {
      this.deps.logger.error('Worker poll failed', { error: errorMessage(error) });
    }

    if (!this.running) return;

    const again = this.wakeRequested || claimed >= this.options.batchSize;
    this.wakeRequested = false;
    this.schedule(again ? 0 : this.options.pollIntervalMs);
  }

  private recoverStaleLocks(): void {
    const recovered = this.deps.notifications.recoverStaleLocks(this.options.staleLockMs);
    if (recovered.length === 0) return;

    this.deps.logger.warn('Recovered notifications left in processing', {
      count: recovered.length,
    });
    for (const row of recovered) {
      if (!row.poisoned) continue;
      this.deps.metrics.incrementCounter('notifications_poisoned');
      this.deps.logger.error('Notification abandoned', {
        id: row.id,
        subscriptionId: row.subscriptionId,
        resourcePath: row.resourcePath,
        attempts: row.attempts,
        permanent: false,
        error: 'Processing interrupted: lock expired',
      });
    }
  }

  private async processRow(row: PendingNotification): Promise<void> {
    const startTime = Date.now();

    await withWorkerSpan(row.id, row.changeType, async () => {
      try {
        const outcome = await this.handle(row);
        setSpanAttribute('notification.outcome', outcome);
        if (!this.deps.notifications.markDone(row.id)) {
          this.deps.logger.warn('Notification finished after its lock was released', {
            id: row.id,
            outcome,
          });
          return;
        }
        this.deps.metrics.incrementCounter('notifications_processed', { outcome: 'done' });
        this.deps.metrics.recordLatency('notification_processing_duration', Date.now() - startTime, {
          outcome: 'done',
        });
        this.deps.logger.info('Notification processed', { id: row.id, outcome });
      } catch (error: unknown) {
        this.fail(row, error);
        this.deps.metrics.recordLatency('notification_processing_duration', Date.now() - startTime, {
          outcome: 'failed',
        });
      }
    });
  }

  private async handle(row: PendingNotification): Promise<RowOutcome> {
    if (row.changeType === 'deleted') {
      // Nothing left to fetch; the queue row is the audit record.
      this.deps.logger.info('Resource deleted upstream', {
        id: row.id,
        resourcePath: row.resourcePath,
      });
      return 'deleted';
    }

    const userId = await this.deps.owners.resolveOwner(row.subscriptionId);
    const token = await this.deps.tokens.getValidToken(userId);
    const response = await this.deps.resources.fetch('GET', row.resourcePath, token, userId);
    const data = response.data;

    if (isRecord(data) && Array.isArray(data.value)) {
      const items: unknown[] = [...data.value];
      const nextLink = data['@odata.nextLink'];
      if (typeof nextLink === 'string' && nextLink.length > 0) {
        items.push(...(await this.deps.resources.listAll(nextLink, token, userId)));
      }
      this.storeCollection(row, items);
      return 'collection';
    }

    return this.store(row, data) ? 'stored' : 'duplicate';
  }

  private store(row: PendingNotification, payload: unknown): boolean {
    const message = this.deps.normalizer.normalize(payload, {
      receivedAt: row.createdAt,
      resourcePath: row.resourcePath,
    });
    const { inserted } = this.deps.messages.insert(message);
    this.deps.metrics.incrementCounter('messages_stored', {
      result: inserted ? 'inserted' : 'duplicate',
    });
    if (!inserted) {
      this.deps.logger.debug('Message already stored', { messageId: message.messageId });
    }
    return inserted;
  }

  private storeCollection(row: PendingNotification, items: unknown[]): void {
    let skipped = 0;
    for (const item of items) {
      try {
        this.store(row, item);
      } catch (error: unknown) {
        if (!(error instanceof UnidentifiableMessageError)) throw error;
        skipped++;
      }
    }
    this.deps.logger.info('Collection ingested', {
      id: row.id,
      items: items.length,
      skipped,
    });
  }

  private fail(row: PendingNotification, error: unknown): void {
    const permanent = !isRetriable(error);
    const retryDelayMs = this.retryDelay(row.attempts, error);
    const outcome = this.deps.notifications.markFailed(row.id, describe(error), {
      permanent,
      retryDelayMs,
    });

    this.deps.metrics.incrementCounter('notifications_processed', { outcome: 'failed' });

    if (!outcome) {
      this.deps.logger.warn('Notification row was no longer processing', { id: row.id });
      return;
    }

    if (outcome.poisoned) {
      this.deps.metrics.incrementCounter('notifications_poisoned');
      this.deps.logger.error('Notification abandoned', {
        id: row.id,
        subscriptionId: row.subscriptionId,
        resourcePath: row.resourcePath,
        attempts: outcome.attempts,
        permanent,
        error: describe(error),
      });
      return;
    }

    this.deps.logger.warn('Notification failed, will retry', {
      id: row.id,
      attempts: outcome.attempts,
      retryDelayMs,
      error: describe(error),
    });
  }

  private retryDelay(previousAttempts: number, error: unknown): number {
    const backoff = this.options.retryBaseDelayMs * Math.pow(2, previousAttempts);
    const hinted = error instanceof RateLimitError && error.retryAfter ? error.retryAfter * 1000 : 0;
    return Math.min(Math.max(backoff, hinted), MAX_RETRY_DELAY_MS);
  }

  private reportQueueDepth(): void {
    const counts = this.deps.notifications.counts();
    for (const status of ['pending', 'processing', 'done', 'failed'] as const) {
      this.deps.metrics.recordGauge('queue_depth', counts[status], { status });
    }
  }
}
