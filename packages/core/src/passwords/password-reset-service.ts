/**
 * Password Reset Service
 *
 * Reset links carry a signed `reset_password` token. A token may be used
 * again until it expires. A reset never signs the user in.
 */

import { hashPassword, type AuthEventSink, type AuthMailer, type SignedTokenCodec } from '@latchkey/auth';
import { AccountUnconfirmedError } from '../authentication/authentication-errors.js';
import { dispatchAuthMail } from '../mail/dispatch-auth-mail.js';
import { rejectToken, verifyTokenOrReject } from '../tokens/token-verification.js';
import type { UserRepository } from '../users/user-repository.js';
import type { RequestContext, User } from '../users/user-types.js';
import { assertValidPassword, normalizeEmail } from '../users/user-validation.js';

export type PasswordResetRequestResult =
  | { status: 'sent' }
  | { status: 'skipped'; reason: 'unknown_email' | 'unconfirmed' };

export interface PasswordResetServiceOptions {
  users: UserRepository;
  tokens: SignedTokenCodec;
  mailer: AuthMailer;
  authEvents: AuthEventSink;
}

export class PasswordResetService {
  private readonly users: UserRepository;
  private readonly tokens: SignedTokenCodec;
  private readonly mailer: AuthMailer;
  private readonly authEvents: AuthEventSink;

  constructor(options: PasswordResetServiceOptions) {
    this.users = options.users;
    this.tokens = options.tokens;
    this.mailer = options.mailer;
    this.authEvents = options.authEvents;
  }

  /**
   * Mail a reset link to confirmed accounts only. Callers should answer every
   * outcome the same way.
   */
  async requestReset(email: string, context: RequestContext = {}): Promise<PasswordResetRequestResult> {
    const user = await this.users.findByEmail(email);

    if (!user || user.confirmedAt === null) {
      const reason = user ? 'unconfirmed' : 'unknown_email';
      this.authEvents.emit({
        type: 'user.password_reset_requested',
        userId: user?.id,
        email: normalizeEmail(email),
        ip: context.ip ?? undefined,
        metadata: { sent: false, reason },
      });
      return { status: 'skipped', reason };
    }

    const token = await this.tokens.issue(user.id, 'reset_password');
    this.authEvents.emit({
      type: 'user.password_reset_requested',
      userId: user.id,
      email: user.email,
      ip: context.ip ?? undefined,
      metadata: { sent: true },
    });
    await dispatchAuthMail(this.mailer, this.authEvents, { user, token, purpose: 'reset_password' });

    return { status: 'sent' };
  }

  /**
   * The user a reset token would act on right now.
   *
   * @throws InvalidOrExpiredTokenError
   * @throws AccountUnconfirmedError
   */
  async inspectResetToken(token: string): Promise<User> {
    const { subjectId: userId } = await verifyTokenOrReject(
      this.tokens,
      this.authEvents,
      token,
      'reset_password'
    );

    const user = await this.users.findById(userId);
    if (!user) {
      return rejectToken(this.authEvents, 'reset_password', 'unknown_subject', userId);
    }
    // The account may have changed since the link was sent.
    if (user.confirmedAt === null) {
      throw new AccountUnconfirmedError();
    }
    return user;
  }

  /**
   * @throws InvalidOrExpiredTokenError
   * @throws AccountUnconfirmedError
   * @throws ValidationFailedError (nothing is changed)
   */
  async consumeReset(
    token: string,
    password: string,
    passwordConfirmation: string,
    context: RequestContext = {}
  ): Promise<User> {
    const user = await this.inspectResetToken(token);

    assertValidPassword(password, passwordConfirmation);

    const updated = await this.users.updatePasswordHash(user.id, await hashPassword(password));
    if (!updated) {
      return rejectToken(this.authEvents, 'reset_password', 'unknown_subject', user.id);
    }

    this.authEvents.emit({
      type: 'user.password_reset',
      userId: updated.id,
      email: updated.email,
      ip: context.ip ?? undefined,
    });

    return updated;
  }
}
