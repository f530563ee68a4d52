import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { toPublicUser } from '@latchkey/core';
import { toRequestContext } from '../../lib/request-metadata.js';
import { validationHook } from '../../lib/validation.js';
import { anonymousOnly } from '../../middleware/guards.js';
import type { AppBindings } from '../../types/context.js';

const SignInSchema = z.object({
  email: z.string(),
  password: z.string(),
  rememberMe: z.boolean().default(false),
});

const sessionsRoute = new Hono<AppBindings>();

/**
 * Sign in on this device. Answers with the location the user was sent away
 * from, if any.
 */
sessionsRoute.post('/', anonymousOnly, zValidator('json', SignInSchema, validationHook), async (c) => {
  const { authenticator } = c.get('services');
  const session = c.get('session');
  const metadata = c.get('requestMetadata');
  const { email, password, rememberMe } = c.req.valid('json');

  const user = await authenticator.authenticateForLogin(email, password, toRequestContext(metadata));

  // login() resets request state, return-to included
  const returnTo = await session.consumeReturnTo();
  const activeSession = await session.login(user, metadata);

  if (rememberMe) {
    await session.remember(activeSession);
  } else {
    session.forgetActiveSession();
  }

  return c.json(
    {
      user: toPublicUser(user),
      activeSessionId: activeSession.id,
      returnTo,
      message: 'Signed in.',
    },
    201
  );
});

/**
 * Sign out of this device. Anonymous callers get the same answer.
 */
sessionsRoute.delete('/', async (c) => {
  const session = c.get('session');

  await session.logout();
  session.forgetActiveSession();

  return c.body(null, 204);
});

export { sessionsRoute };
