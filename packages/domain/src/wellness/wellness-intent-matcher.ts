import { z } from 'zod';
import { deepFreeze, loadDataFile } from '../shared/data-loader.js';

/**
 * Wellness intent matching
 * Prioritized case-insensitive patterns mapping a chat message to a
 * supportive reply. Lower priority numbers win; the default intent matches
 * anything.
 */

const WellnessIntentDataSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  priority: z.number().int().positive(),
  responses: z.array(z.string().min(1)).min(1),
});

const WellnessIntentsFileSchema = z.array(WellnessIntentDataSchema).min(1);

export type WellnessIntentData = z.infer<typeof WellnessIntentDataSchema>;

export interface WellnessIntent {
  readonly name: string;
  readonly pattern: RegExp;
  readonly priority: number;
  readonly responses: readonly string[];
}

export interface WellnessReply {
  readonly intent: string;
  readonly response: string;
}

/**
 * External collaborator producing a free-text reply to a wellness message.
 * Callers fall back to intent matching when it fails.
 */
export interface WellnessReplyProvider {
  reply(message: string): Promise<string>;
}

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface WellnessIntentMatcherOptions {
  readonly intents?: readonly WellnessIntentData[];
  readonly random?: RandomSource;
}

let cachedIntents: readonly WellnessIntentData[] | undefined;

/**
 * Load the bundled intent table once
 */
export function loadWellnessIntents(): readonly WellnessIntentData[] {
  cachedIntents ??= deepFreeze(loadDataFile('wellness-intents.json', WellnessIntentsFileSchema));
  return cachedIntents;
}

export class WellnessIntentMatcher {
  private readonly intents: readonly WellnessIntent[];
  private readonly random: RandomSource;

  constructor(options: WellnessIntentMatcherOptions = {}) {
    const data = options.intents ?? loadWellnessIntents();
    this.intents = [...data]
      .sort((a, b) => a.priority - b.priority)
      .map((intent) => ({
        name: intent.name,
        pattern: new RegExp(intent.pattern, 'i'),
        priority: intent.priority,
        responses: intent.responses,
      }));
    this.random = options.random ?? Math.random;
  }

  /**
   * Highest-priority intent matching the message
   */
  match(message: string): WellnessIntent {
    const matched = this.intents.find((intent) => intent.pattern.test(message));
    const fallback = this.intents[this.intents.length - 1];
    const intent = matched ?? fallback;
    if (!intent) {
      throw new Error('Wellness intent table is empty');
    }
    return intent;
  }

  classify(message: string): string {
    return this.match(message).name;
  }

  respond(message: string): WellnessReply {
    const intent = this.match(message);
    const index = Math.min(
      Math.floor(this.random() * intent.responses.length),
      intent.responses.length - 1
    );
    return {
      intent: intent.name,
      response: intent.responses[index] ?? intent.responses[0] ?? '',
    };
  }
}
