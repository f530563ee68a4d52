import { describe, it, expect } from 'vitest';
import {
  emailProblems,
  normalizeEmail,
  passwordProblems,
  validateNewUser,
  validateUnconfirmedEmail,
} from '../user-validation.js';
import { ValidationFailedError } from '../user-errors.js';

function captureValidationError(fn: () => unknown): ValidationFailedError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationFailedError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected ValidationFailedError');
}

describe('normalizeEmail', () => {
  it('trims and lowercases', () => {
    expect(normalizeEmail('  Alice@Example.COM ')).toBe('alice@example.com');
  });
});

describe('emailProblems', () => {
  it('flags blank and malformed addresses', () => {
    expect(emailProblems('')).toEqual(["can't be blank"]);
    expect(emailProblems('alice')).toEqual(['is invalid']);
    expect(emailProblems('alice@example')).toEqual(['is invalid']);
    expect(emailProblems('al ice@example.com')).toEqual(['is invalid']);
  });

  it('accepts plausible addresses', () => {
    expect(emailProblems('alice+tag@mail.example.com')).toEqual([]);
  });
});

describe('passwordProblems', () => {
  it('requires the minimum length', () => {
    expect(passwordProblems('short1', 'short1')).toEqual({
      password: ['is too short (minimum is 8 characters)'],
    });
  });

  it('caps the length', () => {
    const password = `${'a'.repeat(72)}1`;
    expect(passwordProblems(password, password)).toEqual({
      password: ['is too long (maximum is 72 characters)'],
    });
  });

  it('requires a letter and a digit', () => {
    expect(passwordProblems('abcdefgh', 'abcdefgh')).toEqual({
      password: ['must contain at least one letter and one number'],
    });
    expect(passwordProblems('12345678', '12345678')).toEqual({
      password: ['must contain at least one letter and one number'],
    });
  });

  it('requires the confirmation to match', () => {
    expect(passwordProblems('password1', 'password2')).toEqual({
      passwordConfirmation: ["doesn't match password"],
    });
  });

  it('accepts a good password', () => {
    expect(passwordProblems('password1', 'password1')).toEqual({});
  });
});

describe('validateNewUser', () => {
  it('returns the normalized email', () => {
    expect(
      validateNewUser({
        email: ' Alice@Example.COM ',
        password: 'password1',
        passwordConfirmation: 'password1',
      })
    ).toBe('alice@example.com');
  });

  it('reports every field at once', () => {
    const error = captureValidationError(() =>
      validateNewUser({ email: 'not-an-email', password: 'short', passwordConfirmation: 'other' })
    );

    expect(error.details).toEqual({
      email: ['is invalid'],
      password: ['is too short (minimum is 8 characters)', 'must contain at least one letter and one number'],
      passwordConfirmation: ["doesn't match password"],
    });
  });
});

describe('validateUnconfirmedEmail', () => {
  it('normalizes the pending email', () => {
    expect(validateUnconfirmedEmail('alice@example.com', ' Alice2@Example.com')).toBe('alice2@example.com');
  });

  it('rejects the current email in another case', () => {
    const error = captureValidationError(() => validateUnconfirmedEmail('alice@example.com', 'ALICE@example.com'));

    expect(error.details).toEqual({ email: ['must differ from the current email'] });
  });

  it('rejects malformed addresses', () => {
    const error = captureValidationError(() => validateUnconfirmedEmail('alice@example.com', 'nope'));

    expect(error.details).toEqual({ email: ['is invalid'] });
  });
});
