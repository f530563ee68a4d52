/**
 * User Domain Types
 */

export interface User {
  id: string;
  email: string;
  unconfirmedEmail: string | null;
  passwordHash: string;
  confirmedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Derived from `confirmedAt` and `unconfirmedEmail`; never stored.
 */
export type ConfirmationState = 'unconfirmed' | 'confirmed' | 'reconfirming';

export interface CreateUserData {
  email: string;
  passwordHash: string;
}

export interface ConfirmUserParams {
  /** The pending email the caller saw; the write only applies if it is still the same. */
  expectedUnconfirmedEmail: string | null;
  confirmedAt: Date;
}

export type ConfirmUserResult =
  | { status: 'confirmed'; user: User }
  | { status: 'email_taken' }
  | { status: 'stale' };

export interface RequestContext {
  ip?: string | null;
  userAgent?: string | null;
}

export interface RegisterUserParams {
  email: string;
  password: string;
  passwordConfirmation: string;
}

export interface UpdateAccountParams {
  currentPassword: string;
  email?: string;
  password?: string;
  passwordConfirmation?: string;
}

export interface UpdateAccountResult {
  user: User;
  emailChangeRequested: boolean;
  passwordChanged: boolean;
}

export interface PublicUser {
  id: string;
  email: string;
  unconfirmedEmail: string | null;
  confirmationState: ConfirmationState;
  confirmedAt: string | null;
  createdAt: string;
}
