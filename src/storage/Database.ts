// src/storage/Database.ts

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';

/** A single schema migration step. */
export interface Migration {
  readonly version: number;
  readonly sql: string;
  readonly description: string;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'Notification queue and normalized message store',
    sql: `
      CREATE TABLE pending_notifications (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        subscription_id  TEXT    NOT NULL,
        resource_path    TEXT    NOT NULL,
        change_type      TEXT    NOT NULL,
        client_state     TEXT,
        raw_payload      TEXT    NOT NULL,
        status           TEXT    NOT NULL DEFAULT 'pending'
                         CHECK (status IN ('pending', 'processing', 'done', 'failed')),
        attempts         INTEGER NOT NULL DEFAULT 0,
        last_error       TEXT,
        permanent        INTEGER NOT NULL DEFAULT 0,
        next_attempt_at  INTEGER NOT NULL DEFAULT 0,
        locked_at        INTEGER,
        created_at       INTEGER NOT NULL,
        updated_at       INTEGER NOT NULL
      );
      CREATE INDEX idx_pending_notifications_claim
        ON pending_notifications (status, next_attempt_at, id);

      CREATE TABLE normalized_messages (
        message_id   TEXT PRIMARY KEY,
        created_at   TEXT NOT NULL,
        team_id      TEXT,
        channel_id   TEXT,
        chat_id      TEXT,
        sender_id    TEXT,
        sender_name  TEXT,
        body_text    TEXT NOT NULL,
        mentions     TEXT NOT NULL,
        attachments  TEXT NOT NULL,
        raw_payload  TEXT NOT NULL,
        ingested_at  TEXT NOT NULL
      );
      CREATE INDEX idx_normalized_messages_ingested
        ON normalized_messages (ingested_at DESC);
    `,
  },
];

export function getSchemaVersion(db: SqliteDatabase): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/**
 * Apply every migration newer than the recorded version, each in its own transaction.
 * Returns the number of migrations applied.
 */
export function applyMigrations(db: SqliteDatabase, migrations: readonly Migration[] = MIGRATIONS): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version     INTEGER PRIMARY KEY,
      description TEXT    NOT NULL,
      applied_at  TEXT    NOT NULL
    )
  `);

  const current = getSchemaVersion(db);
  const pending = migrations
    .filter((migration) => migration.version > current)
    .sort((a, b) => a.version - b.version);

  const record = db.prepare<[number, string, string]>(
    'INSERT INTO schema_migrations (version, description, applied_at) VALUES (?, ?, ?)'
  );

  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.description, new Date().toISOString());
    })();
  }

  return pending.length;
}

/**
 * Open (or create) the SQLite file and bring its schema up to date.
 * Pass `:memory:` for a private in-process database.
 */
export function openDatabase(path: string): SqliteDatabase {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000');
  applyMigrations(db);
  return db;
}

export type { SqliteDatabase };
