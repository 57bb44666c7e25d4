/**
 * @fileoverview Wellness Chat Service
 *
 * Answers wellness chat messages with the optional AI responder, falling back
 * to the intent matcher, and keeps each exchange as a session.
 *
 * @module application/use-cases/wellness/WellnessChatService
 */

import {
  createLogger,
  ForbiddenError,
  generateRecordId,
  NotFoundError,
  preview,
} from '@medisync/core';
import type { WellnessIntentMatcher, WellnessReplyProvider } from '@medisync/domain';
import { ChatMessageSchema, type WellnessSession } from '@medisync/types';
import type { RecordCollection } from '../../ports/secondary/persistence/RecordCollection.js';
import { parseInput } from '../../shared/validation.js';
import { newestFirst, systemClock, type Clock } from '../../shared/clock.js';
import { ownerOf, type RequestContext } from '../../shared/ownership.js';

const logger = createLogger({ name: 'WellnessChatService' });

const MESSAGE_PREVIEW_LENGTH = 60;
const SESSION_TOPIC = 'Wellness Chat';

export interface WellnessChatServiceDeps {
  readonly matcher: WellnessIntentMatcher;
  readonly wellnessSessions: RecordCollection<WellnessSession>;
  /** Omitted when AI replies are disabled or unconfigured */
  readonly responder?: WellnessReplyProvider | undefined;
  readonly clock?: Clock;
}

export interface WellnessChatResponse {
  readonly response: string;
  readonly sessionId: string;
  readonly timestamp: string;
  readonly aiGenerated: boolean;
  /** Matched intent when the reply came from the intent table */
  readonly intent: string | null;
}

export class WellnessChatService {
  private readonly matcher: WellnessIntentMatcher;
  private readonly sessions: RecordCollection<WellnessSession>;
  private readonly responder: WellnessReplyProvider | undefined;
  private readonly clock: Clock;

  constructor(deps: WellnessChatServiceDeps) {
    this.matcher = deps.matcher;
    this.sessions = deps.wellnessSessions;
    this.responder = deps.responder;
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * @throws ValidationError for an empty or overlong message
   */
  async chat(message: string, context: RequestContext = {}): Promise<WellnessChatResponse> {
    const input = parseInput(ChatMessageSchema, { message }, 'chat message');
    const reply = await this.reply(input.message);
    const timestamp = this.clock();
    const sessionId = generateRecordId('mh');

    await this.sessions.append({
      id: sessionId,
      userId: ownerOf(context),
      messagePreview: preview(input.message, MESSAGE_PREVIEW_LENGTH),
      topic: SESSION_TOPIC,
      timestamp,
      messages: [
        { type: 'user', content: input.message, timestamp },
        { type: 'bot', content: reply.response, timestamp },
      ],
    });

    logger.info(
      { sessionId, aiGenerated: reply.aiGenerated, intent: reply.intent },
      'Wellness session recorded'
    );

    return { ...reply, sessionId, timestamp };
  }

  /**
   * Sessions newest first; only the user's own when a user is given
   */
  async listSessions(userId?: string | null): Promise<WellnessSession[]> {
    const all = await this.sessions.list();
    const visible = userId ? all.filter((session) => session.userId === userId) : all;
    return newestFirst(visible, (session) => session.timestamp);
  }

  /**
   * @throws NotFoundError when no session has the id
   * @throws ForbiddenError when the session belongs to another user
   */
  async getSession(id: string, userId?: string | null): Promise<WellnessSession> {
    const session = await this.sessions.findById(id);
    if (!session) {
      throw new NotFoundError('Session');
    }
    if (userId && session.userId !== userId) {
      throw new ForbiddenError();
    }
    return session;
  }

  // ===========================================================================
  // PRIVATE METHODS
  // ===========================================================================

  private async reply(
    message: string
  ): Promise<Pick<WellnessChatResponse, 'response' | 'aiGenerated' | 'intent'>> {
    if (this.responder) {
      try {
        const response = await this.responder.reply(message);
        if (response) {
          return { response, aiGenerated: true, intent: null };
        }
        logger.warn('AI wellness reply was empty, using intent fallback');
      } catch (error) {
        logger.warn({ err: error }, 'AI wellness reply failed, using intent fallback');
      }
    }

    const { intent, response } = this.matcher.respond(message);
    return { response, aiGenerated: false, intent };
  }
}
