// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { NormalizeContext, NormalizedMessage } from './types';
import {
  asId,
  asRecord,
  asText,
  dig,
  extractAttachments,
  extractMentions,
  extractSender,
  firstOf,
  parseResourceIds,
  parseWebUrl,
  sanitizeBody,
  trailingId,
} from './FieldExtractors';
import { NormalizationError, UnidentifiableMessageError } from '../../utils/errors';

const optionalText = z.string().min(1).optional();

// Validation schema (exported for JSON Schema generation)
export const NormalizedMessageSchema = z.object({
  messageId: z.string().min(1),
  createdAt: z.string().datetime({ offset: true }),
  teamId: optionalText,
  channelId: optionalText,
  chatId: optionalText,
  senderId: optionalText,
  senderName: optionalText,
  bodyText: z.string(),
  mentions: z.array(
    z.object({
      userId: optionalText,
      displayName: optionalText,
      mentionText: optionalText,
    })
  ),
  attachments: z.array(
    z.object({
      id: optionalText,
      contentType: optionalText,
      contentUrl: optionalText,
      name: optionalText,
    })
  ),
  rawPayload: z.unknown(),
});

const EPOCH = new Date(0);

function toIsoTimestamp(value: unknown): string | undefined {
  if (typeof value !== 'string' && !(value instanceof Date)) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

/**
 * Maps a fetched message payload of any known shape onto NormalizedMessage.
 * Pure: the same payload and context always give the same record.
 */
export class Normalizer {
  normalize(raw: unknown, context: NormalizeContext = {}): NormalizedMessage {
    const messageId = this.extractMessageId(raw);
    const fromPath = context.resourcePath ? parseResourceIds(context.resourcePath) : {};
    const webUrl = asText(dig(raw, ['webUrl']));
    const fromUrl = webUrl ? parseWebUrl(webUrl) : {};

    const chatId = firstOf<string>([
      () => asId(dig(raw, ['chatId'])),
      () => fromPath.chatId,
    ]);

    const normalized: NormalizedMessage = {
      messageId,
      createdAt: this.extractTimestamp(raw, context),
      teamId: firstOf<string>([
        () => asId(dig(raw, ['channelIdentity', 'teamId'])),
        () => fromUrl.teamId,
        () => fromPath.teamId,
      ]),
      channelId: firstOf<string>([
        () => asId(dig(raw, ['channelIdentity', 'channelId'])),
        () => (chatId ? undefined : fromUrl.channelId),
        () => fromPath.channelId,
      ]),
      chatId,
      ...extractSender(raw),
      bodyText: this.extractBody(raw),
      mentions: extractMentions(raw),
      attachments: extractAttachments(raw),
      rawPayload: raw,
    };

    const result = NormalizedMessageSchema.safeParse(normalized);
    if (!result.success) {
      throw new NormalizationError(`Schema validation failed for message ${messageId}`, {
        messageId,
        issues: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
      });
    }

    return normalized;
  }

  private extractMessageId(raw: unknown): string {
    const id = firstOf<string>([
      () => asId(dig(raw, ['id'])),
      () => asId(dig(raw, ['messageId'])),
      () => asId(dig(raw, ['message_id'])),
      () => asId(dig(raw, ['resourceData', 'id'])),
      () => {
        const reference = asText(dig(raw, ['@odata.id']));
        return reference ? trailingId(reference) : undefined;
      },
    ]);

    if (!id) {
      throw new UnidentifiableMessageError();
    }
    return id;
  }

  private extractTimestamp(raw: unknown, context: NormalizeContext): string {
    return (
      firstOf<string>([
        () => toIsoTimestamp(dig(raw, ['createdDateTime'])),
        () => toIsoTimestamp(dig(raw, ['lastModifiedDateTime'])),
        () => toIsoTimestamp(dig(raw, ['createdAt'])),
        () => toIsoTimestamp(context.receivedAt),
      ]) ?? EPOCH.toISOString()
    );
  }

  private extractBody(raw: unknown): string {
    const body = asRecord(dig(raw, ['body']));
    const content = body?.content;
    if (typeof content === 'string') {
      return sanitizeBody(content, asText(body?.contentType));
    }

    const fallback = firstOf<string>([
      () => asText(dig(raw, ['bodyPreview'])),
      () => asText(dig(raw, ['summary'])),
      () => asText(dig(raw, ['preview'])),
    ]);
    return fallback ? sanitizeBody(fallback) : '';
  }
}
