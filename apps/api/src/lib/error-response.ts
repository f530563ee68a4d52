import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  AccountUnconfirmedError,
  ActiveSessionNotFoundError,
  AuthenticationRequiredError,
  EmailNoLongerAvailableError,
  IncorrectCredentialsError,
  InvalidOrExpiredTokenError,
  UserNotFoundError,
  ValidationFailedError,
  type ValidationDetails,
} from '@latchkey/core';
import { logger } from '@latchkey/observability';
import type { AppBindings } from '../types/context.js';

export interface ErrorBody {
  error: string;
  message: string;
  details?: ValidationDetails;
  requestId?: string;
}

export function validationFailedBody(details: ValidationDetails): ErrorBody {
  return { error: 'validation_failed', message: 'Validation failed.', details };
}

/**
 * Map a domain error to its response, or null when it is not one of ours.
 */
export function domainErrorResponse(c: Context, error: unknown): Response | null {
  if (error instanceof ValidationFailedError) {
    return c.json(validationFailedBody(error.details), 422);
  }
  if (error instanceof IncorrectCredentialsError) {
    return c.json({ error: 'incorrect_credentials', message: error.message }, 401);
  }
  if (error instanceof AuthenticationRequiredError) {
    return c.json({ error: 'authentication_required', message: 'You need to sign in first.' }, 401);
  }
  if (error instanceof AccountUnconfirmedError) {
    return c.json({ error: 'account_unconfirmed', message: error.message }, 403);
  }
  if (error instanceof InvalidOrExpiredTokenError) {
    return c.json({ error: 'invalid_or_expired_token', message: error.message }, 400);
  }
  if (error instanceof EmailNoLongerAvailableError) {
    return c.json({ error: 'email_no_longer_available', message: error.message }, 409);
  }
  if (error instanceof ActiveSessionNotFoundError) {
    return c.json({ error: 'not_found', message: 'Session not found.' }, 404);
  }
  if (error instanceof UserNotFoundError) {
    return c.json({ error: 'not_found', message: 'Account not found.' }, 404);
  }
  return null;
}

/**
 * App-wide onError handler.
 */
export function handleAppError(error: unknown, c: Context<AppBindings>): Response {
  const mapped = domainErrorResponse(c, error);
  if (mapped) {
    return mapped;
  }

  // Raised by Hono itself, e.g. for a body that is not JSON
  if (error instanceof HTTPException) {
    return c.json({ error: 'bad_request', message: error.message }, error.status);
  }

  const requestId = c.get('requestId');
  logger.error({ err: error, requestId, path: c.req.path, method: c.req.method }, 'Unhandled error');
  return c.json({ error: 'internal_error', message: 'Something went wrong.', requestId }, 500);
}
