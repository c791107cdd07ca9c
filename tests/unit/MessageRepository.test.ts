// tests/unit/MessageRepository.test.ts

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MessageRepository } from '../../src/storage/MessageRepository';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import type { SqliteDatabase } from '../../src/storage/Database';
import { channelMessage, createTestDatabase } from '../helpers/fixtures';

describe('MessageRepository', () => {
  const normalizer = new Normalizer();
  let db: SqliteDatabase;
  let repo: MessageRepository;

  beforeEach(() => {
    db = createTestDatabase();
    repo = new MessageRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should round-trip a normalized message', () => {
    const message = normalizer.normalize(channelMessage('msg-1'));
    const ingestedAt = new Date('2024-03-01T09:16:00Z');

    expect(repo.insert(message, ingestedAt)).toEqual({ inserted: true });
    expect(repo.getById('msg-1')).toEqual({ ...message, ingestedAt: '2024-03-01T09:16:00.000Z' });
  });

  it('should keep the first record for a duplicate message id', () => {
    const first = normalizer.normalize(channelMessage('msg-1'));
    const edited = normalizer.normalize(
      channelMessage('msg-1', { body: { contentType: 'text', content: 'edited' } })
    );

    repo.insert(first);
    expect(repo.insert(edited)).toEqual({ inserted: false });

    expect(repo.count()).toBe(1);
    expect(repo.getById('msg-1')?.bodyText).toBe('Build passed');
  });

  it('should return null for unknown ids', () => {
    expect(repo.getById('missing')).toBeNull();
    expect(repo.exists('missing')).toBe(false);
  });

  it('should report stored ids as existing', () => {
    repo.insert(normalizer.normalize(channelMessage('msg-1')));

    expect(repo.exists('msg-1')).toBe(true);
  });

  it('should list the most recently ingested first', () => {
    repo.insert(normalizer.normalize(channelMessage('old')), new Date('2024-03-01T09:00:00Z'));
    repo.insert(normalizer.normalize(channelMessage('new')), new Date('2024-03-01T10:00:00Z'));
    repo.insert(normalizer.normalize(channelMessage('mid')), new Date('2024-03-01T09:30:00Z'));

    expect(repo.listRecent(10).map((message) => message.messageId)).toEqual(['new', 'mid', 'old']);
    expect(repo.listRecent(1).map((message) => message.messageId)).toEqual(['new']);
  });

  it('should store optional fields as absent', () => {
    repo.insert(normalizer.normalize({ id: 'bare' }));

    const stored = repo.getById('bare');
    expect(stored?.teamId).toBeUndefined();
    expect(stored?.senderName).toBeUndefined();
    expect(stored?.mentions).toEqual([]);
  });
});
