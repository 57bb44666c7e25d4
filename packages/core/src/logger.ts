import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Clinical logger with PHI redaction
 * Keeps raw patient data and credentials out of log output.
 */

// Free-text patterns that can carry identifiers
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phoneE164: /\+[1-9]\d{7,14}/g,
  jwt: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  bearer: /Bearer\s+[a-zA-Z0-9._-]+/gi,
  openaiKey: /sk-[a-zA-Z0-9_-]{8,}/g,
};

// Fields to redact wherever they appear (case-insensitive, substring match)
const REDACTED_FIELDS = [
  'patient',
  'physician',
  'email',
  'symptoms',
  'medications',
  'notes',
  'message',
  'content',
  'reaction',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
];

/**
 * Recursively redact PHI from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const keyLower = key.toLowerCase();
      const shouldRedact = REDACTED_FIELDS.some((field) => keyLower.includes(field));
      redacted[key] = shouldRedact ? '[REDACTED]' : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

/**
 * Redact identifier-shaped substrings from free text
 */
export function redactString(value: string): string {
  let result = value;
  for (const pattern of Object.values(PII_PATTERNS)) {
    result = result.replace(pattern, '[REDACTED]');
  }
  return result;
}

function createRedactor() {
  return {
    paths: REDACTED_FIELDS.flatMap((field) => [field, `*.${field}`]),
    censor: '[REDACTED]',
  };
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
}

/**
 * Create a logger instance with PHI redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = defaultLevel(), correlationId } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions);
}

export type { Logger };
