import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { toPublicUser } from '@latchkey/core';
import { toRequestContext } from '../../lib/request-metadata.js';
import { validationHook } from '../../lib/validation.js';
import { anonymousOnly } from '../../middleware/guards.js';
import type { AppBindings } from '../../types/context.js';

const RequestConfirmationSchema = z.object({
  email: z.string(),
});

const ConfirmQuerySchema = z.object({
  token: z.string().min(1),
});

const confirmationsRoute = new Hono<AppBindings>();

/**
 * Resend a confirmation link. The answer never says whether anything was sent.
 */
confirmationsRoute.post(
  '/',
  anonymousOnly,
  zValidator('json', RequestConfirmationSchema, validationHook),
  async (c) => {
    const { confirmations } = c.get('services');
    const { email } = c.req.valid('json');

    await confirmations.requestConfirmation(email, toRequestContext(c.get('requestMetadata')));

    return c.json({ message: 'Check your email for confirmation instructions.' });
  }
);

/**
 * Follow a confirmation link. Confirming signs the user in on this device
 * unless they already are.
 */
confirmationsRoute.get('/', zValidator('query', ConfirmQuerySchema, validationHook), async (c) => {
  const { confirmations } = c.get('services');
  const session = c.get('session');
  const metadata = c.get('requestMetadata');
  const { token } = c.req.valid('query');

  const user = await confirmations.confirm(token, toRequestContext(metadata));

  const current = await session.resolveCurrentUser();
  const signedIn = current?.id !== user.id;
  if (signedIn) {
    await session.login(user, metadata);
    // A remembered device of whoever was signed in before must not come back
    session.forgetActiveSession();
  }

  return c.json({
    user: toPublicUser(user),
    signedIn,
    message: 'Your account has been confirmed.',
  });
});

export { confirmationsRoute };
