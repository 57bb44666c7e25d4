import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ForbiddenError, NotFoundError, ValidationError } from '@medisync/core';
import {
  WellnessIntentMatcher,
  loadWellnessIntents,
  type WellnessReplyProvider,
} from '@medisync/domain';
import { WellnessChatService } from '../use-cases/wellness/WellnessChatService.js';
import { createFakeStores, steppingClock, type FakeStores } from './helpers/in-memory-stores.js';

const firstResponseOf = (intent: string): string | undefined =>
  loadWellnessIntents().find((entry) => entry.name === intent)?.responses[0];

describe('WellnessChatService', () => {
  const matcher = new WellnessIntentMatcher({ random: () => 0 });
  let stores: FakeStores;

  const createService = (responder?: WellnessReplyProvider) =>
    new WellnessChatService({
      matcher,
      wellnessSessions: stores.wellnessSessions,
      responder,
      clock: steppingClock(),
    });

  beforeEach(() => {
    stores = createFakeStores();
  });

  describe('chat', () => {
    it('should answer from the intent table without a responder', async () => {
      const service = createService();

      const reply = await service.chat('I feel so anxious before exams', { userId: 'user-1' });

      expect(reply).toEqual({
        response: firstResponseOf('anxiety'),
        sessionId: reply.sessionId,
        timestamp: '2026-03-01T09:00:00.000Z',
        aiGenerated: false,
        intent: 'anxiety',
      });
      expect(reply.sessionId).toMatch(/^mh-[0-9a-f]{8}$/);
      expect(stores.wellnessSessions.records).toEqual([
        {
          id: reply.sessionId,
          userId: 'user-1',
          messagePreview: 'I feel so anxious before exams',
          topic: 'Wellness Chat',
          timestamp: '2026-03-01T09:00:00.000Z',
          messages: [
            {
              type: 'user',
              content: 'I feel so anxious before exams',
              timestamp: '2026-03-01T09:00:00.000Z',
            },
            {
              type: 'bot',
              content: firstResponseOf('anxiety'),
              timestamp: '2026-03-01T09:00:00.000Z',
            },
          ],
        },
      ]);
    });

    it('should prefer the responder reply', async () => {
      const responder = { reply: vi.fn().mockResolvedValue('Try a slow breathing exercise.') };
      const service = createService(responder);

      const reply = await service.chat('hello there');

      expect(responder.reply).toHaveBeenCalledWith('hello there');
      expect(reply.response).toBe('Try a slow breathing exercise.');
      expect(reply.aiGenerated).toBe(true);
      expect(reply.intent).toBeNull();
    });

    const unusableReplies: [string, () => Promise<string>][] = [
      ['fails', () => Promise.reject(new Error('provider down'))],
      ['returns nothing', () => Promise.resolve('')],
    ];

    it.each(unusableReplies)('should fall back to intents when the responder %s', async (_label, replyFn) => {
      const service = createService({ reply: replyFn });

      const reply = await service.chat('I have insomnia every night');

      expect(reply.aiGenerated).toBe(false);
      expect(reply.intent).toBe('sleep');
      expect(reply.response).toBe(firstResponseOf('sleep'));
    });

    it('should keep a 60 character preview of long messages', async () => {
      const message = 'a'.repeat(80);

      await createService().chat(message);

      expect(stores.wellnessSessions.records[0]?.messagePreview).toBe('a'.repeat(60));
    });

    it('should reject an empty message', async () => {
      await expect(createService().chat('')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('sessions', () => {
    it('should list sessions newest first and filter by user', async () => {
      const service = createService();
      const first = await service.chat('hello', { userId: 'user-1' });
      const second = await service.chat('hello', { userId: 'user-2' });
      const third = await service.chat('hello', { userId: 'user-1' });

      const all = await service.listSessions();
      const mine = await service.listSessions('user-1');

      expect(all.map((s) => s.id)).toEqual([third.sessionId, second.sessionId, first.sessionId]);
      expect(mine.map((s) => s.id)).toEqual([third.sessionId, first.sessionId]);
    });

    it('should guard sessions owned by another user', async () => {
      const service = createService();
      const { sessionId } = await service.chat('hello', { userId: 'user-1' });

      await expect(service.getSession(sessionId, 'user-1')).resolves.toMatchObject({
        id: sessionId,
      });
      await expect(service.getSession(sessionId)).resolves.toMatchObject({ id: sessionId });
      await expect(service.getSession(sessionId, 'user-2')).rejects.toBeInstanceOf(ForbiddenError);
      await expect(service.getSession('mh-missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
