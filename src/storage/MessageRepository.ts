// src/storage/MessageRepository.ts

import type { SqliteDatabase } from './Database';
import type { InsertResult, StoredMessage } from './types';
import type { NormalizedMessage } from '../core/normalizer/types';
import { NormalizedMessageSchema } from '../core/normalizer/Normalizer';

interface MessageRow {
  message_id: string;
  created_at: string;
  team_id: string | null;
  channel_id: string | null;
  chat_id: string | null;
  sender_id: string | null;
  sender_name: string | null;
  body_text: string;
  mentions: string;
  attachments: string;
  raw_payload: string;
  ingested_at: string;
}

const MentionsSchema = NormalizedMessageSchema.shape.mentions;
const AttachmentsSchema = NormalizedMessageSchema.shape.attachments;

function fromRow(row: MessageRow): StoredMessage {
  return {
    messageId: row.message_id,
    createdAt: row.created_at,
    teamId: row.team_id ?? undefined,
    channelId: row.channel_id ?? undefined,
    chatId: row.chat_id ?? undefined,
    senderId: row.sender_id ?? undefined,
    senderName: row.sender_name ?? undefined,
    bodyText: row.body_text,
    mentions: MentionsSchema.parse(JSON.parse(row.mentions)),
    attachments: AttachmentsSchema.parse(JSON.parse(row.attachments)),
    rawPayload: JSON.parse(row.raw_payload),
    ingestedAt: row.ingested_at,
  };
}

/**
 * Append-only store of normalized messages, unique by message id.
 */
export class MessageRepository {
  constructor(private db: SqliteDatabase) {}

  /**
   * Insert unless a record with the same message id exists.
   * A duplicate is reported with `inserted: false`; the stored record is left untouched.
   */
  insert(message: NormalizedMessage, ingestedAt: Date = new Date()): InsertResult {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO normalized_messages
           (message_id, created_at, team_id, channel_id, chat_id, sender_id, sender_name,
            body_text, mentions, attachments, raw_payload, ingested_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        message.messageId,
        message.createdAt,
        message.teamId ?? null,
        message.channelId ?? null,
        message.chatId ?? null,
        message.senderId ?? null,
        message.senderName ?? null,
        message.bodyText,
        JSON.stringify(message.mentions),
        JSON.stringify(message.attachments),
        JSON.stringify(message.rawPayload ?? null),
        ingestedAt.toISOString()
      );
    return { inserted: result.changes === 1 };
  }

  exists(messageId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        'SELECT 1 AS found FROM normalized_messages WHERE message_id = ?'
      )
      .get(messageId);
    return row !== undefined;
  }

  getById(messageId: string): StoredMessage | null {
    const row = this.db
      .prepare<[string], MessageRow>('SELECT * FROM normalized_messages WHERE message_id = ?')
      .get(messageId);
    return row ? fromRow(row) : null;
  }

  /**
   * Most recently ingested first.
   */
  listRecent(limit: number): StoredMessage[] {
    return this.db
      .prepare<[number], MessageRow>(
        'SELECT * FROM normalized_messages ORDER BY ingested_at DESC, rowid DESC LIMIT ?'
      )
      .all(limit)
      .map(fromRow);
  }

  count(): number {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM normalized_messages')
      .get();
    return row?.total ?? 0;
  }
}
