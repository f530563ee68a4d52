import pino from 'pino';

const SENSITIVE_KEYS = [
  'password',
  'passwordConfirmation',
  'currentPassword',
  'passwordHash',
  'token',
  'rememberToken',
  'secret',
  'apiKey',
  'api_key',
];

/**
 * Redact sensitive data from logs
 * - Cookie and Authorization headers
 * - Passwords, password hashes and tokens, at the top level and one level down
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'res.headers["set-cookie"]',
  'headers.authorization',
  'headers.cookie',
  'authorization',
  'cookie',
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];

// Compact JWS/JWE values always start with a base64url-encoded `{"`.
const COMPACT_TOKEN_PATTERN = /eyJ[A-Za-z0-9_-]*(?:\.[A-Za-z0-9_-]*){2,4}/g;

export const REDACTED = '[REDACTED]';

export function maskTokens(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(COMPACT_TOKEN_PATTERN, REDACTED);
  }
  if (Array.isArray(value)) {
    return value.map(maskTokens);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = maskTokens(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of credentials, cookies and signed tokens
 * - Request ID correlation via child loggers
 * - Structured JSON output
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: REDACTED,
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        const masked: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(object)) {
          masked[key] = maskTokens(entry);
        }
        return masked;
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
