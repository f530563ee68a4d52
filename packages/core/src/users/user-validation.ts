/**
 * Normalization and validation applied at the write boundary, when a user is
 * created or updated. Nothing here runs implicitly.
 */
import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from '@latchkey/auth';
import { ValidationFailedError, type ValidationDetails } from './user-errors.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function emailProblems(email: string): string[] {
  if (email.length === 0) {
    return ["can't be blank"];
  }
  if (!EMAIL_PATTERN.test(email)) {
    return ['is invalid'];
  }
  return [];
}

export function passwordProblems(password: string, passwordConfirmation: string | undefined): ValidationDetails {
  const details: ValidationDetails = {};
  const problems: string[] = [];

  if (password.length < PASSWORD_MIN_LENGTH) {
    problems.push(`is too short (minimum is ${PASSWORD_MIN_LENGTH} characters)`);
  } else if (password.length > PASSWORD_MAX_LENGTH) {
    problems.push(`is too long (maximum is ${PASSWORD_MAX_LENGTH} characters)`);
  }
  if (!/[a-zA-Z]/.test(password) || !/[0-9]/.test(password)) {
    problems.push('must contain at least one letter and one number');
  }
  if (problems.length > 0) {
    details.password = problems;
  }
  if (passwordConfirmation !== password) {
    details.passwordConfirmation = ["doesn't match password"];
  }

  return details;
}

function throwIfAny(details: ValidationDetails): void {
  if (Object.keys(details).length > 0) {
    throw new ValidationFailedError(details);
  }
}

/**
 * @returns the normalized email
 * @throws ValidationFailedError
 */
export function validateNewUser(params: {
  email: string;
  password: string;
  passwordConfirmation: string;
}): string {
  const email = normalizeEmail(params.email);
  const details = passwordProblems(params.password, params.passwordConfirmation);
  const problems = emailProblems(email);
  if (problems.length > 0) {
    details.email = problems;
  }
  throwIfAny(details);
  return email;
}

export function assertValidPassword(password: string, passwordConfirmation: string | undefined): void {
  throwIfAny(passwordProblems(password, passwordConfirmation));
}

/**
 * A pending email must be well formed and differ from the login email.
 * @returns the normalized pending email
 */
export function validateUnconfirmedEmail(currentEmail: string, candidate: string): string {
  const email = normalizeEmail(candidate);
  const problems = emailProblems(email);
  if (problems.length === 0 && email === currentEmail) {
    problems.push('must differ from the current email');
  }
  throwIfAny(problems.length > 0 ? { email: problems } : {});
  return email;
}
