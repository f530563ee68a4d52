import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { toPublicUser } from '@latchkey/core';
import { toRequestContext } from '../../lib/request-metadata.js';
import { validationHook } from '../../lib/validation.js';
import { anonymousOnly, requireAuth } from '../../middleware/guards.js';
import type { AppBindings } from '../../types/context.js';

// Shape only; field rules live in the user service so both layers report alike.
const RegisterSchema = z.object({
  email: z.string(),
  password: z.string(),
  passwordConfirmation: z.string(),
});

const UpdateAccountSchema = z.object({
  currentPassword: z.string(),
  email: z.string().optional(),
  password: z.string().optional(),
  passwordConfirmation: z.string().optional(),
});

const usersRoute = new Hono<AppBindings>();

/**
 * Sign up. The account starts unconfirmed and is not signed in.
 */
usersRoute.post('/', anonymousOnly, zValidator('json', RegisterSchema, validationHook), async (c) => {
  const { userService, confirmations } = c.get('services');
  const context = toRequestContext(c.get('requestMetadata'));

  const user = await userService.register(c.req.valid('json'), context);
  await confirmations.sendConfirmation(user, context);

  return c.json(
    {
      user: toPublicUser(user),
      message: 'Please check your email for confirmation instructions.',
    },
    201
  );
});

usersRoute.get('/me', requireAuth, async (c) => {
  const user = await c.get('session').requireAuthenticated();
  return c.json({ user: toPublicUser(user) });
});

usersRoute.patch('/me', requireAuth, zValidator('json', UpdateAccountSchema, validationHook), async (c) => {
  const { userService, confirmations } = c.get('services');
  const context = toRequestContext(c.get('requestMetadata'));
  const user = await c.get('session').requireAuthenticated();

  const result = await userService.updateAccount(user, c.req.valid('json'), context);

  if (result.emailChangeRequested) {
    await confirmations.sendConfirmation(result.user, context);
  }

  return c.json({
    user: toPublicUser(result.user),
    emailChangeRequested: result.emailChangeRequested,
    passwordChanged: result.passwordChanged,
    message: result.emailChangeRequested
      ? 'Check your email for confirmation instructions.'
      : 'Account updated.',
  });
});

usersRoute.delete('/me', requireAuth, async (c) => {
  const { userService } = c.get('services');
  const session = c.get('session');
  const user = await session.requireAuthenticated();

  await session.revokeAllActiveSessions();
  await userService.deleteAccount(user, toRequestContext(c.get('requestMetadata')));

  return c.body(null, 204);
});

export { usersRoute };
