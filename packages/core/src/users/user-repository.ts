/**
 * User Repository
 *
 * Data access contract for the credential store. Implementations hold no
 * business rules beyond the atomic confirm write.
 */

import type { ConfirmUserParams, ConfirmUserResult, CreateUserData, User } from './user-types.js';

export interface UserRepository {
  findById(userId: string): Promise<User | null>;

  /** Normalizes before looking up. */
  findByEmail(email: string): Promise<User | null>;

  /** @throws DuplicateEmailError when the email is already registered */
  create(data: CreateUserData): Promise<User>;

  updatePasswordHash(userId: string, passwordHash: string): Promise<User | null>;

  setUnconfirmedEmail(userId: string, unconfirmedEmail: string | null): Promise<User | null>;

  /**
   * In one write: move the pending email into `email` (if any), set
   * `confirmedAt`, clear the pending email.
   *
   * - `email_taken`: another user owns the pending email; nothing changed
   * - `stale`: the user is gone, already confirmed, or the pending email is
   *   no longer `expectedUnconfirmedEmail`
   */
  confirm(userId: string, params: ConfirmUserParams): Promise<ConfirmUserResult>;

  /** Removes the user and, by cascade, every active session it owns. */
  delete(userId: string): Promise<boolean>;
}
