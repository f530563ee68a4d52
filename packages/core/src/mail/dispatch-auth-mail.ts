import type { AuthEventSink, AuthMailer, AuthMailMessage } from '@latchkey/auth';

/**
 * Hand a message to the mailer. A failed delivery is reported as
 * `mail.delivery_failed` and not retried; it never fails the caller.
 */
export async function dispatchAuthMail(
  mailer: AuthMailer,
  authEvents: AuthEventSink,
  message: AuthMailMessage
): Promise<void> {
  try {
    await mailer.deliver(message);
  } catch (error) {
    authEvents.emit({
      type: 'mail.delivery_failed',
      userId: message.user.id,
      metadata: {
        purpose: message.purpose,
        error: error instanceof Error ? error.message : String(error),
      },
    });
  }
}
