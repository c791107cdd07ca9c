// src/storage/NotificationRepository.ts

import type { SqliteDatabase } from './Database';
import type {
  ChangeType,
  FailureOptions,
  FailureOutcome,
  NewNotification,
  NotificationStatus,
  PendingNotification,
  QueueCounts,
  RecoveredLock,
} from './types';

interface NotificationRow {
  id: number;
  subscription_id: string;
  resource_path: string;
  change_type: string;
  client_state: string | null;
  raw_payload: string;
  status: string;
  attempts: number;
  last_error: string | null;
  permanent: number;
  next_attempt_at: number;
  locked_at: number | null;
  created_at: number;
  updated_at: number;
}

const STATUSES: readonly NotificationStatus[] = ['pending', 'processing', 'done', 'failed'];
const CHANGE_TYPES: readonly ChangeType[] = ['created', 'updated', 'deleted'];

function toStatus(value: string): NotificationStatus {
  const status = STATUSES.find((candidate) => candidate === value);
  if (!status) throw new Error(`Unknown notification status: ${value}`);
  return status;
}

function toChangeType(value: string): ChangeType {
  return CHANGE_TYPES.find((candidate) => candidate === value) ?? 'updated';
}

function fromRow(row: NotificationRow): PendingNotification {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    resourcePath: row.resource_path,
    changeType: toChangeType(row.change_type),
    clientState: row.client_state ?? undefined,
    rawPayload: row.raw_payload,
    status: toStatus(row.status),
    attempts: row.attempts,
    lastError: row.last_error ?? undefined,
    permanent: row.permanent === 1,
    nextAttemptAt: new Date(row.next_attempt_at),
    lockedAt: row.locked_at === null ? undefined : new Date(row.locked_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

// A failed row is eligible again only while it is retriable, under the cap and due.
const ELIGIBLE = `
  next_attempt_at <= @now
  AND (
    status = 'pending'
    OR (status = 'failed' AND permanent = 0 AND attempts < @maxAttempts)
  )
`;

/**
 * Durable queue of received notifications. Every status change is a
 * compare-and-set on the current status, so two workers never own one row.
 */
export class NotificationRepository {
  constructor(
    private db: SqliteDatabase,
    private maxAttempts: number
  ) {}

  enqueue(notification: NewNotification, now: number = Date.now()): number {
    const result = this.db
      .prepare(
        `INSERT INTO pending_notifications
           (subscription_id, resource_path, change_type, client_state, raw_payload,
            status, attempts, permanent, next_attempt_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 'pending', 0, 0, 0, ?, ?)`
      )
      .run(
        notification.subscriptionId,
        notification.resourcePath,
        notification.changeType,
        notification.clientState ?? null,
        notification.rawPayload,
        now,
        now
      );
    return Number(result.lastInsertRowid);
  }

  enqueueMany(notifications: NewNotification[], now: number = Date.now()): number[] {
    return this.db.transaction((items: NewNotification[]) =>
      items.map((item) => this.enqueue(item, now))
    )(notifications);
  }

  /**
   * Claim up to `limit` eligible rows, oldest first, moving them to `processing`.
   */
  claimBatch(limit: number, now: number = Date.now()): PendingNotification[] {
    const select = this.db.prepare<{ now: number; maxAttempts: number; limit: number }, { id: number }>(
      `SELECT id FROM pending_notifications WHERE ${ELIGIBLE} ORDER BY id LIMIT @limit`
    );
    const claim = this.db.prepare<{ id: number; now: number; maxAttempts: number }>(
      `UPDATE pending_notifications
          SET status = 'processing', locked_at = @now, updated_at = @now
        WHERE id = @id AND ${ELIGIBLE}`
    );

    const claimedIds = this.db.transaction(() => {
      const ids: number[] = [];
      for (const { id } of select.all({ now, maxAttempts: this.maxAttempts, limit })) {
        if (claim.run({ id, now, maxAttempts: this.maxAttempts }).changes === 1) {
          ids.push(id);
        }
      }
      return ids;
    })();

    return claimedIds.flatMap((id) => {
      const row = this.getById(id);
      return row ? [row] : [];
    });
  }

  markDone(id: number, now: number = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE pending_notifications
            SET status = 'done', locked_at = NULL, updated_at = ?
          WHERE id = ? AND status = 'processing'`
      )
      .run(now, id);
    return result.changes === 1;
  }

  markFailed(
    id: number,
    error: string,
    options: FailureOptions = {},
    now: number = Date.now()
  ): FailureOutcome | null {
    const permanent = options.permanent ? 1 : 0;
    const result = this.db
      .prepare(
        `UPDATE pending_notifications
            SET status = 'failed',
                attempts = attempts + 1,
                last_error = ?,
                permanent = ?,
                next_attempt_at = ?,
                locked_at = NULL,
                updated_at = ?
          WHERE id = ? AND status = 'processing'`
      )
      .run(error, permanent, now + (options.retryDelayMs ?? 0), now, id);

    if (result.changes !== 1) return null;

    const row = this.getById(id);
    if (!row) return null;
    return {
      attempts: row.attempts,
      poisoned: row.permanent || row.attempts >= this.maxAttempts,
    };
  }

  /**
   * Rows left in `processing` longer than `staleMs` become `failed` (one attempt
   * counted) and are retried normally. Returns every row recovered.
   */
  recoverStaleLocks(staleMs: number, now: number = Date.now()): RecoveredLock[] {
    const select = this.db.prepare<[number], { id: number }>(
      `SELECT id FROM pending_notifications
        WHERE status = 'processing' AND locked_at IS NOT NULL AND locked_at < ?
        ORDER BY id`
    );
    const release = this.db.prepare<[number, number, number]>(
      `UPDATE pending_notifications
          SET status = 'failed',
              attempts = attempts + 1,
              last_error = 'Processing interrupted: lock expired',
              next_attempt_at = ?,
              locked_at = NULL,
              updated_at = ?
        WHERE id = ? AND status = 'processing'`
    );

    const releasedIds = this.db.transaction(() =>
      select
        .all(now - staleMs)
        .filter(({ id }) => release.run(now, now, id).changes === 1)
        .map(({ id }) => id)
    )();

    return releasedIds.flatMap((id) => {
      const row = this.getById(id);
      if (!row) return [];
      return [
        {
          id,
          subscriptionId: row.subscriptionId,
          resourcePath: row.resourcePath,
          attempts: row.attempts,
          poisoned: row.permanent || row.attempts >= this.maxAttempts,
        },
      ];
    });
  }

  getById(id: number): PendingNotification | null {
    const row = this.db
      .prepare<[number], NotificationRow>('SELECT * FROM pending_notifications WHERE id = ?')
      .get(id);
    return row ? fromRow(row) : null;
  }

  counts(): QueueCounts {
    const counts: QueueCounts = { pending: 0, processing: 0, done: 0, failed: 0, poisoned: 0 };

    const rows = this.db
      .prepare<[], { status: string; total: number }>(
        'SELECT status, COUNT(*) AS total FROM pending_notifications GROUP BY status'
      )
      .all();
    for (const row of rows) {
      counts[toStatus(row.status)] = row.total;
    }

    const poisoned = this.db
      .prepare<[number], { total: number }>(
        `SELECT COUNT(*) AS total FROM pending_notifications
          WHERE status = 'failed' AND (permanent = 1 OR attempts >= ?)`
      )
      .get(this.maxAttempts);
    counts.poisoned = poisoned?.total ?? 0;

    return counts;
  }
}
