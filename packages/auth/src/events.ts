/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger } from '@latchkey/observability';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.logout'
  | 'user.confirmation_requested'
  | 'user.confirmed'
  | 'user.email_change_requested'
  | 'user.password_reset_requested'
  | 'user.password_reset'
  | 'user.password_changed'
  | 'user.deleted'
  | 'session.created'
  | 'session.revoked'
  | 'session.revoked_all'
  | 'token.rejected'
  | 'mail.delivery_failed';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  email?: string;
  ip?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

/**
 * Where services report what happened. The process-wide `authEvents`
 * emitter is the usual sink; tests pass a recorder.
 */
export interface AuthEventSink {
  emit(event: AuthEventInput): void;
}

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export class AuthEventEmitter implements AuthEventSink {
  private handlers: AuthEventHandler[] = [];

  on(handler: AuthEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: AuthEventInput): void {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    for (const handler of this.handlers) {
      Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((error: unknown) => {
          logger.error({ err: error, eventType: fullEvent.type }, 'Auth event handler error');
        });
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const authEvents = new AuthEventEmitter();
