import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { toRequestContext } from '../../lib/request-metadata.js';
import { validationHook } from '../../lib/validation.js';
import { anonymousOnly } from '../../middleware/guards.js';
import type { AppBindings } from '../../types/context.js';

const RequestResetSchema = z.object({
  email: z.string(),
});

const ResetQuerySchema = z.object({
  token: z.string().min(1),
});

const ResetPasswordSchema = z.object({
  token: z.string().min(1),
  password: z.string(),
  passwordConfirmation: z.string(),
});

// Same answer for unknown, unconfirmed and confirmed addresses.
const RESET_REQUESTED_MESSAGE = "If that user exists we've sent instructions to their email.";

const passwordsRoute = new Hono<AppBindings>();

passwordsRoute.use('*', anonymousOnly);

passwordsRoute.post('/', zValidator('json', RequestResetSchema, validationHook), async (c) => {
  const { passwordResets } = c.get('services');
  const { email } = c.req.valid('json');

  await passwordResets.requestReset(email, toRequestContext(c.get('requestMetadata')));

  return c.json({ message: RESET_REQUESTED_MESSAGE });
});

/**
 * Check a reset link before showing the new-password form.
 */
passwordsRoute.get('/', zValidator('query', ResetQuerySchema, validationHook), async (c) => {
  const { passwordResets } = c.get('services');
  const { token } = c.req.valid('query');

  const user = await passwordResets.inspectResetToken(token);

  return c.json({ valid: true, email: user.email });
});

/**
 * Set a new password from a reset link. Does not sign in.
 */
passwordsRoute.put('/', zValidator('json', ResetPasswordSchema, validationHook), async (c) => {
  const { passwordResets } = c.get('services');
  const { token, password, passwordConfirmation } = c.req.valid('json');

  await passwordResets.consumeReset(
    token,
    password,
    passwordConfirmation,
    toRequestContext(c.get('requestMetadata'))
  );

  return c.json({ message: 'Password updated.' });
});

export { passwordsRoute };
