import { z } from 'zod';

/**
 * Environment Variable Validation
 * Parsed once by the composition root at startup
 */

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .default('true')
  .transform((v) => v === 'true');

// Base runtime config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  SERVICE_NAME: z.string().min(1).default('medisync'),
});

// JSON file persistence
const StorageEnvSchema = z.object({
  /** Directory holding the collection files (prescriptions.json, scans.json, ...) */
  DATA_DIR: z.string().min(1).default('./data'),
});

// OpenAI config (optional: every AI path has a deterministic fallback)
const OpenAIEnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  /** Let the model override the rule-based risk assessment */
  RISK_AI_ENRICHMENT: booleanFlag,
  /** Let the model answer wellness chat messages */
  WELLNESS_AI_REPLIES: booleanFlag,
});

export const AppEnvSchema = ServerEnvSchema.merge(StorageEnvSchema).merge(OpenAIEnvSchema);

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Validate environment variables
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = AppEnvSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

const OPTIONAL_SECRETS = ['OPENAI_API_KEY'] as const;

/**
 * Check if a specific secret is configured
 */
export function hasSecret(name: string, source: NodeJS.ProcessEnv = process.env): boolean {
  const value = source[name];
  return value !== undefined && value !== '';
}

/**
 * Get list of optional secrets that are not configured
 */
export function getMissingSecrets(source: NodeJS.ProcessEnv = process.env): string[] {
  return OPTIONAL_SECRETS.filter((name) => !hasSecret(name, source));
}

/**
 * Log secrets status (without revealing values)
 */
export function logSecretsStatus(
  logger: { info: (data: object, msg: string) => void },
  source: NodeJS.ProcessEnv = process.env
): void {
  const status = OPTIONAL_SECRETS.reduce<Record<string, string>>((acc, name) => {
    acc[name] = hasSecret(name, source) ? 'configured' : 'missing';
    return acc;
  }, {});

  logger.info(status, 'Secrets status');
}
