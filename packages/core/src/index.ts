/**
 * @medisync/core
 * Logging, errors, configuration and shared utilities
 */

// Logger
export {
  createLogger,
  redactObject,
  redactString,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

// Errors
export {
  AppError,
  ValidationError,
  ForbiddenError,
  NotFoundError,
  ExternalServiceError,
  StoreOperationError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

// Environment
export {
  AppEnvSchema,
  validateEnv,
  hasSecret,
  getMissingSecrets,
  logSecretsStatus,
  type AppEnv,
} from './env.js';

// Utils
export { withRetry, sleep, generateRecordId, nowIso, preview } from './utils.js';
