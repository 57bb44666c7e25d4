import OpenAI from 'openai';
import { z } from 'zod';
import { withRetry, ExternalServiceError } from '@medisync/core';

/**
 * Input validation schemas for OpenAI client
 */
const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1).max(100000, 'Message content too long'),
});

const ChatCompletionOptionsSchema = z.object({
  messages: z.array(ChatMessageSchema).min(1, 'At least one message required'),
  model: z.string().optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  jsonMode: z.boolean().optional(),
});

const OpenAIClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  model: z.string().optional(),
  organization: z.string().optional(),
  maxTokens: z.number().int().min(1).max(128000).optional(),
  temperature: z.number().min(0).max(2).optional(),
  retryConfig: z
    .object({
      maxRetries: z.number().int().min(0).max(10),
      baseDelayMs: z.number().int().min(100).max(30000),
    })
    .optional(),
  timeoutMs: z.number().int().min(1000).max(300000).optional(),
});

/**
 * OpenAI Integration Client
 * Thin chat-completion wrapper with validation and retries
 */

export interface OpenAIClientConfig {
  apiKey: string;
  model?: string | undefined;
  organization?: string | undefined;
  maxTokens?: number | undefined;
  temperature?: number | undefined;
  retryConfig?:
    | {
        maxRetries: number;
        baseDelayMs: number;
      }
    | undefined;
  /** Request timeout in milliseconds (default: 60000ms, max: 300000ms) */
  timeoutMs?: number | undefined;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionOptions {
  messages: ChatMessage[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
  jsonMode?: boolean;
}

/** The part of the client the clinical adapters depend on */
export type ChatCompletionClient = Pick<OpenAIClient, 'chatCompletion'>;

/** Default timeout for OpenAI API requests (60 seconds) */
const DEFAULT_TIMEOUT_MS = 60000;

const RETRYABLE_MESSAGES = [
  'rate_limit',
  '502',
  '503',
  'timeout',
  'timed out',
  'econnreset',
  'socket hang up',
];

/**
 * Transient provider failures worth another attempt
 */
export function isRetryableOpenAIError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return RETRYABLE_MESSAGES.some((fragment) => message.includes(fragment));
}

/**
 * Strip control and zero-width characters, cap the length and wrap the text
 * in delimiters so prompts can tell patient text from instructions
 */
export function sanitizeUserInput(input: string, maxLength = 10000): string {
  let sanitized = input
    // eslint-disable-next-line no-control-regex -- control characters are removed on purpose
    .replace(/[\x00-\x1F\x7F]/g, '')
    .replace(/[\u200B-\u200D\uFEFF]/g, '')
    .trim();

  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }

  return `<<<USER_INPUT>>>\n${sanitized}\n<<</USER_INPUT>>>`;
}

export class OpenAIClient {
  private client: OpenAI;
  private config: OpenAIClientConfig;
  private timeoutMs: number;

  constructor(config: OpenAIClientConfig) {
    const validatedConfig = OpenAIClientConfigSchema.parse(config);
    this.config = validatedConfig;
    this.timeoutMs = validatedConfig.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = new OpenAI({
      apiKey: validatedConfig.apiKey,
      organization: validatedConfig.organization,
      timeout: this.timeoutMs,
    });
  }

  /**
   * Create a chat completion and return the first choice's text
   */
  async chatCompletion(options: ChatCompletionOptions): Promise<string> {
    const validated = ChatCompletionOptionsSchema.parse(options);
    const {
      messages,
      model = this.config.model ?? 'gpt-4o',
      maxTokens = this.config.maxTokens ?? 1000,
      temperature = this.config.temperature ?? 0.7,
      jsonMode = false,
    } = validated;

    const makeRequest = async () => {
      const response = await this.client.chat.completions.create({
        model,
        messages,
        max_tokens: maxTokens,
        temperature,
        ...(jsonMode && { response_format: { type: 'json_object' as const } }),
      });

      const content = response.choices[0]?.message.content;
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from API');
      }

      return content;
    };

    return withRetry(makeRequest, {
      maxRetries: this.config.retryConfig?.maxRetries ?? 3,
      baseDelayMs: this.config.retryConfig?.baseDelayMs ?? 1000,
      shouldRetry: isRetryableOpenAIError,
    });
  }
}

/**
 * Create a configured OpenAI client
 */
export function createOpenAIClient(config: OpenAIClientConfig): OpenAIClient {
  return new OpenAIClient(config);
}
