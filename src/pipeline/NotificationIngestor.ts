// src/pipeline/NotificationIngestor.ts

import { EventEmitter } from 'events';
import type { NotificationRepository } from '../storage/NotificationRepository';
import type { NewNotification } from '../storage/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { secureEqual } from '../core/auth/StateSigner';
import { asRecord } from '../core/normalizer/FieldExtractors';
import { ChangeNotificationSchema, NotificationBatchSchema, extractResourcePath } from './schema';
import type { ReceiptResult } from './types';

/**
 * Receipt side of the pipeline: authenticates each notification by its
 * client state and persists the genuine ones as `pending` rows.
 *
 * Emits `enqueued` with the new row ids after a successful insert.
 */
export class NotificationIngestor extends EventEmitter {
  constructor(
    private repository: NotificationRepository,
    private clientState: string,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {
    super();
  }

  /**
   * Validate and persist a notification batch.
   * Only a storage failure throws; rejected items are counted and dropped.
   */
  receive(body: unknown): ReceiptResult {
    const result: ReceiptResult = { accepted: 0, forged: 0, invalid: 0, ids: [] };

    const batch = NotificationBatchSchema.safeParse(body);
    if (!batch.success) {
      this.logger.warn('Malformed notification body dropped');
      this.count('invalid');
      result.invalid++;
      return result;
    }

    const rows: NewNotification[] = [];

    for (const item of batch.data.value) {
      const received = asRecord(item)?.clientState;

      if (typeof received !== 'string' || !secureEqual(received, this.clientState)) {
        this.logger.warn('Notification with unexpected client state dropped', {
          subscriptionId: asRecord(item)?.subscriptionId,
        });
        this.count('forged');
        result.forged++;
        continue;
      }

      const parsed = ChangeNotificationSchema.safeParse(item);
      const resourcePath = parsed.success ? extractResourcePath(parsed.data) : undefined;

      if (!parsed.success || !resourcePath) {
        this.logger.warn('Malformed notification dropped', {
          issues: parsed.success
            ? ['no resource path']
            : parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
        });
        this.count('invalid');
        result.invalid++;
        continue;
      }

      rows.push({
        subscriptionId: parsed.data.subscriptionId,
        resourcePath,
        changeType: parsed.data.changeType,
        clientState: received,
        rawPayload: JSON.stringify(item),
      });
    }

    if (rows.length > 0) {
      result.ids = this.repository.enqueueMany(rows);
      result.accepted = rows.length;
      this.count('accepted', rows.length);
      this.logger.info('Notifications enqueued', { count: rows.length, ids: result.ids });
      this.emit('enqueued', result.ids);
    }

    return result;
  }

  private count(result: 'accepted' | 'forged' | 'invalid', value = 1): void {
    this.metrics.incrementCounter('notifications_received', { result }, value);
  }
}
