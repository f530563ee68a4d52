/**
 * Email + password verification with the same cost whether or not the email
 * belongs to anyone.
 */

import { generateSecureToken, hashPassword, verifyPassword, type AuthEventSink } from '@latchkey/auth';
import type { UserRepository } from '../users/user-repository.js';
import type { RequestContext, User } from '../users/user-types.js';
import { normalizeEmail } from '../users/user-validation.js';
import { AccountUnconfirmedError, IncorrectCredentialsError } from './authentication-errors.js';

export class Authenticator {
  // Hash of a random secret nobody knows; compared against when the email is unknown.
  private readonly decoyHash: Promise<string>;

  constructor(
    private readonly userRepo: Pick<UserRepository, 'findByEmail'>,
    private readonly authEvents: AuthEventSink
  ) {
    // Built now so the first unknown-email sign-in costs one scrypt run, like the rest.
    this.decoyHash = hashPassword(generateSecureToken());
    this.decoyHash.catch(() => {
      // Rethrown to the caller when authenticate awaits it.
    });
  }

  /**
   * @returns the user when the password matches, otherwise null
   */
  async authenticate(email: string, password: string): Promise<User | null> {
    const user = await this.userRepo.findByEmail(email);

    if (!user) {
      await verifyPassword(password, await this.decoyHash);
      return null;
    }

    return (await verifyPassword(password, user.passwordHash)) ? user : null;
  }

  /**
   * Sign-in check. Only a caller who knows the password learns that the
   * account is unconfirmed.
   *
   * @throws IncorrectCredentialsError
   * @throws AccountUnconfirmedError
   */
  async authenticateForLogin(email: string, password: string, context: RequestContext = {}): Promise<User> {
    const user = await this.authenticate(email, password);

    if (!user) {
      this.authEvents.emit({
        type: 'user.login.failed',
        email: normalizeEmail(email),
        ip: context.ip ?? undefined,
        metadata: { reason: 'incorrect_credentials' },
      });
      throw new IncorrectCredentialsError();
    }

    if (user.confirmedAt === null) {
      this.authEvents.emit({
        type: 'user.login.failed',
        userId: user.id,
        email: user.email,
        ip: context.ip ?? undefined,
        metadata: { reason: 'account_unconfirmed' },
      });
      throw new AccountUnconfirmedError();
    }

    this.authEvents.emit({
      type: 'user.login.success',
      userId: user.id,
      email: user.email,
      ip: context.ip ?? undefined,
    });

    return user;
  }
}
