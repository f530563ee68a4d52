/**
 * User Service
 *
 * Business logic layer for account management: sign-up, account updates
 * (email change, password change) and account deletion.
 */

import { hashPassword, verifyPassword, type AuthEventSink } from '@latchkey/auth';
import type { UserRepository } from './user-repository.js';
import { DuplicateEmailError, UserNotFoundError, ValidationFailedError } from './user-errors.js';
import type {
  RegisterUserParams,
  RequestContext,
  UpdateAccountParams,
  UpdateAccountResult,
  User,
} from './user-types.js';
import {
  emailProblems,
  normalizeEmail,
  passwordProblems,
  validateNewUser,
  validateUnconfirmedEmail,
} from './user-validation.js';

export class UserService {
  constructor(
    private userRepo: UserRepository,
    private authEvents: AuthEventSink
  ) {}

  /**
   * Register a new, unconfirmed user
   *
   * Business rules:
   * - Email must be valid format and unique (case-insensitive)
   * - Password must meet minimum requirements and match its confirmation
   * - Emits user.registered event for audit logging
   */
  async register(params: RegisterUserParams, context: RequestContext = {}): Promise<User> {
    const email = validateNewUser(params);

    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new DuplicateEmailError();
    }

    const user = await this.userRepo.create({
      email,
      passwordHash: await hashPassword(params.password),
    });

    this.authEvents.emit({
      type: 'user.registered',
      userId: user.id,
      email: user.email,
      ip: context.ip ?? undefined,
    });

    return user;
  }

  /**
   * Update email and/or password. The current password is always required.
   *
   * - a new email is stored as pending; the caller sends it a confirmation
   * - submitting the login email cancels a pending change
   * - a new password replaces the hash immediately
   */
  async updateAccount(
    user: User,
    params: UpdateAccountParams,
    context: RequestContext = {}
  ): Promise<UpdateAccountResult> {
    if (!(await verifyPassword(params.currentPassword, user.passwordHash))) {
      throw new ValidationFailedError({ currentPassword: ['is incorrect'] });
    }

    const requestedEmail = params.email === undefined ? undefined : normalizeEmail(params.email);
    const details =
      params.password === undefined ? {} : passwordProblems(params.password, params.passwordConfirmation);
    if (requestedEmail !== undefined) {
      const problems = emailProblems(requestedEmail);
      if (problems.length > 0) {
        details.email = problems;
      }
    }
    if (Object.keys(details).length > 0) {
      throw new ValidationFailedError(details);
    }

    let updated = user;
    let emailChangeRequested = false;
    let passwordChanged = false;

    if (requestedEmail !== undefined) {
      if (requestedEmail === user.email) {
        if (user.unconfirmedEmail !== null) {
          updated = await this.requireUpdated(user.id, this.userRepo.setUnconfirmedEmail(user.id, null));
        }
      } else {
        const unconfirmedEmail = validateUnconfirmedEmail(user.email, requestedEmail);
        if (unconfirmedEmail !== user.unconfirmedEmail) {
          updated = await this.requireUpdated(
            user.id,
            this.userRepo.setUnconfirmedEmail(user.id, unconfirmedEmail)
          );
        }
        emailChangeRequested = true;
        this.authEvents.emit({
          type: 'user.email_change_requested',
          userId: user.id,
          email: user.email,
          ip: context.ip ?? undefined,
          metadata: { unconfirmedEmail },
        });
      }
    }

    if (params.password !== undefined) {
      updated = await this.requireUpdated(
        user.id,
        this.userRepo.updatePasswordHash(user.id, await hashPassword(params.password))
      );
      passwordChanged = true;
      this.authEvents.emit({
        type: 'user.password_changed',
        userId: user.id,
        email: updated.email,
        ip: context.ip ?? undefined,
      });
    }

    return { user: updated, emailChangeRequested, passwordChanged };
  }

  /**
   * Delete the account; its active sessions go with it.
   */
  async deleteAccount(user: User, context: RequestContext = {}): Promise<void> {
    const deleted = await this.userRepo.delete(user.id);
    if (!deleted) {
      throw new UserNotFoundError(user.id);
    }

    this.authEvents.emit({
      type: 'user.deleted',
      userId: user.id,
      email: user.email,
      ip: context.ip ?? undefined,
    });
  }

  private async requireUpdated(userId: string, pending: Promise<User | null>): Promise<User> {
    const user = await pending;
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }
}
