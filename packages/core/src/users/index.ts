/**
 * Users Domain
 *
 * Exports for the credential store and account management
 */

export type { UserRepository } from './user-repository.js';
export { PgUserRepository, mapUserRow, USER_COLUMNS } from './pg-user-repository.js';
export type { UserRow } from './pg-user-repository.js';

export { UserService } from './user-service.js';
export type {
  ConfirmationState,
  ConfirmUserParams,
  ConfirmUserResult,
  CreateUserData,
  PublicUser,
  RegisterUserParams,
  RequestContext,
  UpdateAccountParams,
  UpdateAccountResult,
  User,
} from './user-types.js';

export { confirmationStateOf, isConfirmationActionable, toPublicUser } from './confirmation-state.js';
export {
  assertValidPassword,
  emailProblems,
  normalizeEmail,
  passwordProblems,
  validateNewUser,
  validateUnconfirmedEmail,
} from './user-validation.js';

export { UserError, ValidationFailedError, DuplicateEmailError, UserNotFoundError } from './user-errors.js';
export type { ValidationDetails } from './user-errors.js';
