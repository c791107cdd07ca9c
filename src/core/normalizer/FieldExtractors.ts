// src/core/normalizer/FieldExtractors.ts

import { convert } from 'html-to-text';
import type { HtmlToTextOptions } from 'html-to-text';
import type { Attachment, Mention, ResourceIds } from './types';

type Json = Record<string, unknown>;

const HTML_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  selectors: [
    { selector: 'img', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'script', format: 'skip' },
    { selector: 'a', options: { ignoreHref: true } },
  ],
};

const MARKUP = /<\/?[a-z][^>]*>|&(#\d+|#x[0-9a-f]+|[a-z]+);/i;
const TAG = /<\/?[a-z!][^>]*>/gi;

export function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Json | undefined {
  return isRecord(value) ? value : undefined;
}

function decode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Non-empty string, or a finite number rendered as one.
 */
export function asId(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() === '' ? undefined : value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

export function asText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Walk a dotted path through nested objects.
 */
export function dig(value: unknown, path: string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    const record = asRecord(current);
    if (!record) return undefined;
    current = record[key];
  }
  return current;
}

export function firstOf<T>(candidates: Array<() => T | undefined>): T | undefined {
  for (const candidate of candidates) {
    const value = candidate();
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Plain text from message content. Markup goes through html-to-text; any
 * tag-shaped residue (including tags that were only entity-encoded) is removed.
 */
export function sanitizeBody(content: string, contentType?: string): string {
  const isMarkup = contentType?.toLowerCase() === 'html' || MARKUP.test(content);
  const text = isMarkup ? convert(content, HTML_OPTIONS) : content;

  return text
    .replace(TAG, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Last id of an OData entity reference, in either `messages('id')` or `/messages/id` form.
 */
export function trailingId(reference: string): string | undefined {
  const quoted = reference.match(/\('([^']+)'\)\s*$/);
  if (quoted) return quoted[1];

  const path = reference.split('?')[0].replace(/\/+$/, '');
  const segment = path.slice(path.lastIndexOf('/') + 1);
  return segment.length > 0 && !segment.includes('(') ? decode(segment) : undefined;
}

function segmentAfter(resourcePath: string, collection: string): string | undefined {
  const quoted = new RegExp(`(?:^|/)${collection}\\('([^']+)'\\)`, 'i').exec(resourcePath);
  if (quoted) return quoted[1];

  const plain = new RegExp(`(?:^|/)${collection}/([^/?(]+)`, 'i').exec(resourcePath);
  return plain ? decode(plain[1]) : undefined;
}

/**
 * Team, channel, chat and message ids named by a resource path such as
 * `/teams/{t}/channels/{c}/messages/{m}`, `/chats/{c}/messages/{m}` or
 * `teams('t')/channels('c')/messages('m')`.
 */
export function parseResourceIds(resourcePath: string): ResourceIds {
  return {
    teamId: segmentAfter(resourcePath, 'teams'),
    channelId: segmentAfter(resourcePath, 'channels'),
    chatId: segmentAfter(resourcePath, 'chats'),
    messageId: segmentAfter(resourcePath, 'messages'),
  };
}

/**
 * Ids recoverable from a message deep link:
 * `https://teams.microsoft.com/l/message/{channel}/{message}?groupId={team}`.
 */
export function parseWebUrl(webUrl: string): Pick<ResourceIds, 'teamId' | 'channelId'> {
  const ids: Pick<ResourceIds, 'teamId' | 'channelId'> = {};

  const group = /[?&]groupId=([^&#]+)/.exec(webUrl);
  if (group) ids.teamId = decode(group[1]);

  const channel = /\/l\/message\/([^/?#]+)\//.exec(webUrl);
  if (channel) ids.channelId = decode(channel[1]);

  return ids;
}

export function extractSender(raw: unknown): { senderId?: string; senderName?: string } {
  const from = dig(raw, ['from']);

  for (const kind of ['user', 'application', 'device']) {
    const identity = asRecord(dig(from, [kind]));
    if (identity) {
      return { senderId: asId(identity.id), senderName: asText(identity.displayName) };
    }
  }

  const email = asRecord(dig(from, ['emailAddress'])) ?? asRecord(dig(raw, ['sender', 'emailAddress']));
  if (email) {
    return { senderId: asText(email.address), senderName: asText(email.name) };
  }

  return {};
}

export function extractMentions(raw: unknown): Mention[] {
  const mentions = dig(raw, ['mentions']);
  if (!Array.isArray(mentions)) return [];

  return mentions.flatMap((item: unknown): Mention[] => {
    const mention = asRecord(item);
    if (!mention) return [];

    const mentioned =
      asRecord(dig(mention, ['mentioned', 'user'])) ??
      asRecord(dig(mention, ['mentioned', 'application'])) ??
      asRecord(dig(mention, ['mentioned', 'conversation']));

    return [
      {
        userId: asId(mentioned?.id),
        displayName: asText(mentioned?.displayName),
        mentionText: asText(mention.mentionText),
      },
    ];
  });
}

export function extractAttachments(raw: unknown): Attachment[] {
  const attachments = dig(raw, ['attachments']);
  if (!Array.isArray(attachments)) return [];

  return attachments.flatMap((item: unknown): Attachment[] => {
    const attachment = asRecord(item);
    if (!attachment) return [];
    return [
      {
        id: asId(attachment.id),
        contentType: asText(attachment.contentType),
        contentUrl: asText(attachment.contentUrl),
        name: asText(attachment.name),
      },
    ];
  });
}
