import type { Context } from 'hono';
import type { ZodError } from 'zod';
import type { ValidationDetails } from '@latchkey/core';
import type { AppBindings } from '../types/context.js';
import { validationFailedBody } from './error-response.js';

export function zodErrorDetails(error: ZodError): ValidationDetails {
  const details: ValidationDetails = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    (details[field] ??= []).push(issue.message);
  }
  return details;
}

/**
 * zValidator hook: payloads that fail the schema get the same 422 shape as
 * domain validation errors.
 */
export function validationHook(
  result: { success: true } | { success: false; error: ZodError },
  c: Context<AppBindings>
): Response | undefined {
  if (!result.success) {
    return c.json(validationFailedBody(zodErrorDetails(result.error)), 422);
  }
  return undefined;
}
