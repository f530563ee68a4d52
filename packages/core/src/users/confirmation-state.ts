import type { ConfirmationState, PublicUser, User } from './user-types.js';

export function confirmationStateOf(user: Pick<User, 'confirmedAt' | 'unconfirmedEmail'>): ConfirmationState {
  if (user.confirmedAt === null) {
    return 'unconfirmed';
  }
  return user.unconfirmedEmail === null ? 'confirmed' : 'reconfirming';
}

/**
 * Whether a confirmation link for this user can still do anything.
 */
export function isConfirmationActionable(user: Pick<User, 'confirmedAt' | 'unconfirmedEmail'>): boolean {
  return confirmationStateOf(user) !== 'confirmed';
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    unconfirmedEmail: user.unconfirmedEmail,
    confirmationState: confirmationStateOf(user),
    confirmedAt: user.confirmedAt?.toISOString() ?? null,
    createdAt: user.createdAt.toISOString(),
  };
}
