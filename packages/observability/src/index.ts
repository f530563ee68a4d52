/**
 * @latchkey/observability
 *
 * Structured logging with Pino, with credential and token redaction.
 */

export { createLogger, logger, maskTokens, REDACTED } from './logger.js';
export type { Logger } from './logger.js';
