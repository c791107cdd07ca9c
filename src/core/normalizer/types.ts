// src/core/normalizer/types.ts

export interface Mention {
  userId?: string;
  displayName?: string;
  mentionText?: string;
}

export interface Attachment {
  id?: string;
  contentType?: string;
  contentUrl?: string;
  name?: string;
}

export interface NormalizedMessage {
  messageId: string; // Upstream message id, unique across the store
  createdAt: string; // ISO 8601 timestamp
  teamId?: string;
  channelId?: string;
  chatId?: string;
  senderId?: string;
  senderName?: string;
  bodyText: string;
  mentions: Mention[];
  attachments: Attachment[];
  rawPayload: unknown; // As fetched, untouched
}

export interface NormalizeContext {
  /** Used as the timestamp when the payload carries none. */
  receivedAt?: Date;
  /** Resource path the payload was fetched from; a last resort for team, channel and chat ids. */
  resourcePath?: string;
}

export interface ResourceIds {
  teamId?: string;
  channelId?: string;
  chatId?: string;
  messageId?: string;
}
