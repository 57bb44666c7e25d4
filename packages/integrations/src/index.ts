/**
 * @module packages/integrations
 * @description Third-party service integrations
 *
 * Exports:
 * - OpenAI chat-completion client
 * - Risk enrichment provider
 * - Wellness reply provider
 */

export {
  OpenAIClient,
  createOpenAIClient,
  sanitizeUserInput,
  isRetryableOpenAIError,
  type OpenAIClientConfig,
  type ChatMessage,
  type ChatCompletionOptions,
  type ChatCompletionClient,
} from './openai.js';

export { OpenAIRiskEnricher, buildRiskPrompt } from './risk-enricher.js';

export { OpenAIWellnessResponder } from './wellness-responder.js';
