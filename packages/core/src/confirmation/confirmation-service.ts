/**
 * Confirmation Service
 *
 * Moves users between unconfirmed, confirmed and reconfirming. Links carry a
 * signed `confirm_email` token; nothing about them is stored.
 */

import type { AuthEventSink, AuthMailer, SignedTokenCodec } from '@latchkey/auth';
import { dispatchAuthMail } from '../mail/dispatch-auth-mail.js';
import { rejectToken, verifyTokenOrReject } from '../tokens/token-verification.js';
import { InvalidOrExpiredTokenError } from '../tokens/token-errors.js';
import { isConfirmationActionable } from '../users/confirmation-state.js';
import type { UserRepository } from '../users/user-repository.js';
import type { RequestContext, User } from '../users/user-types.js';
import { EmailNoLongerAvailableError } from './confirmation-errors.js';

export interface ConfirmationServiceOptions {
  users: UserRepository;
  tokens: SignedTokenCodec;
  mailer: AuthMailer;
  authEvents: AuthEventSink;
  now?: () => Date;
}

export class ConfirmationService {
  private readonly users: UserRepository;
  private readonly tokens: SignedTokenCodec;
  private readonly mailer: AuthMailer;
  private readonly authEvents: AuthEventSink;
  private readonly now: () => Date;

  constructor(options: ConfirmationServiceOptions) {
    this.users = options.users;
    this.tokens = options.tokens;
    this.mailer = options.mailer;
    this.authEvents = options.authEvents;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Resend a confirmation link. Resolves the same way whether or not the
   * email belongs to anyone, or belongs to an already confirmed account.
   */
  async requestConfirmation(email: string, context: RequestContext = {}): Promise<void> {
    const user = await this.users.findByEmail(email);
    if (!user || !isConfirmationActionable(user)) {
      return;
    }
    await this.sendConfirmation(user, context);
  }

  /**
   * Mail a fresh link to the address awaiting confirmation. Earlier links
   * stay valid until they expire, but only while that address is still the
   * one awaiting confirmation.
   */
  async sendConfirmation(user: User, context: RequestContext = {}): Promise<void> {
    const recipient = user.unconfirmedEmail ?? user.email;
    const token = await this.tokens.issue(user.id, 'confirm_email', { email: recipient });

    this.authEvents.emit({
      type: 'user.confirmation_requested',
      userId: user.id,
      email: recipient,
      ip: context.ip ?? undefined,
    });

    await dispatchAuthMail(this.mailer, this.authEvents, { user, token, purpose: 'confirm_email' });
  }

  /**
   * @returns the confirmed user, with any pending email now its login email
   * @throws InvalidOrExpiredTokenError
   * @throws EmailNoLongerAvailableError
   */
  async confirm(token: string, context: RequestContext = {}): Promise<User> {
    const { subjectId: userId, email } = await verifyTokenOrReject(
      this.tokens,
      this.authEvents,
      token,
      'confirm_email'
    );

    const user = await this.users.findById(userId);
    if (!user) {
      return rejectToken(this.authEvents, 'confirm_email', 'unknown_subject', userId);
    }
    // A link mailed to an earlier pending address must not confirm a later one.
    if (!isConfirmationActionable(user) || email !== (user.unconfirmedEmail ?? user.email)) {
      return rejectToken(this.authEvents, 'confirm_email', 'not_actionable', userId);
    }

    const result = await this.users.confirm(user.id, {
      expectedUnconfirmedEmail: user.unconfirmedEmail,
      confirmedAt: this.now(),
    });

    switch (result.status) {
      case 'confirmed':
        this.authEvents.emit({
          type: 'user.confirmed',
          userId: user.id,
          email: result.user.email,
          ip: context.ip ?? undefined,
          metadata: { reconfirmation: user.confirmedAt !== null },
        });
        return result.user;
      case 'email_taken':
        throw new EmailNoLongerAvailableError();
      case 'stale':
        // Confirmed or changed by a concurrent request.
        throw new InvalidOrExpiredTokenError();
    }
  }
}
