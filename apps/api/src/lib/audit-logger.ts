import { authEvents, getRecipientLogId, type AuthEvent, type AuthEventEmitter } from '@latchkey/auth';
import { logger, type Logger } from '@latchkey/observability';

/**
 * Initialize audit logging for authentication events
 * One structured line per event; emails are replaced by a short recipient id.
 */
export function initializeAuditLogging(emitter: AuthEventEmitter = authEvents, log: Logger = logger) {
  emitter.on((event) => writeAuditLine(event, log));
  log.info('Audit logging initialized for authentication events');
}

export function writeAuditLine(event: AuthEvent, log: Logger = logger) {
  const { type, userId, email, ip, timestamp, metadata } = event;

  const logEntry = {
    event: type,
    userId: userId || 'unknown',
    recipient: email ? getRecipientLogId(email) : 'unknown',
    ip: ip || 'unknown',
    timestamp: timestamp.toISOString(),
    ...(metadata && { metadata }),
  };

  switch (type) {
    case 'user.registered':
      log.info(logEntry, 'User registered');
      break;

    case 'user.login.success':
      log.info(logEntry, 'User login successful');
      break;

    case 'user.login.failed':
      log.warn(logEntry, 'User login failed');
      break;

    case 'user.logout':
      log.info(logEntry, 'User logged out');
      break;

    case 'user.confirmation_requested':
      log.info(logEntry, 'Confirmation email requested');
      break;

    case 'user.confirmed':
      log.info(logEntry, 'Email address confirmed');
      break;

    case 'user.email_change_requested':
      log.info(logEntry, 'Email change requested');
      break;

    case 'user.password_reset_requested':
      log.info(logEntry, 'Password reset requested');
      break;

    case 'user.password_reset':
      log.info(logEntry, 'Password reset completed');
      break;

    case 'user.password_changed':
      log.info(logEntry, 'Password changed');
      break;

    case 'user.deleted':
      log.info(logEntry, 'Account deleted');
      break;

    case 'session.created':
      log.info(logEntry, 'Active session created');
      break;

    case 'session.revoked':
      log.info(logEntry, 'Active session revoked');
      break;

    case 'session.revoked_all':
      log.info(logEntry, 'All active sessions revoked');
      break;

    case 'token.rejected':
      log.warn(logEntry, 'Signed token rejected');
      break;

    case 'mail.delivery_failed':
      log.error(logEntry, 'Auth email delivery failed');
      break;
  }
}
