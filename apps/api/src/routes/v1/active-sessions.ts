import { Hono } from 'hono';
import { requireAuth } from '../../middleware/guards.js';
import type { AppBindings } from '../../types/context.js';

const activeSessionsRoute = new Hono<AppBindings>();

activeSessionsRoute.use('*', requireAuth);

activeSessionsRoute.get('/', async (c) => {
  const activeSessions = await c.get('session').listActiveSessions();
  return c.json({ activeSessions });
});

/**
 * Revoke one device. Revoking the current one signs this client out.
 */
activeSessionsRoute.delete('/:id', async (c) => {
  const session = c.get('session');

  await session.revokeActiveSession(c.req.param('id'));
  const signedOut = !(await session.isAuthenticated());

  return c.json({ signedOut, message: signedOut ? 'Signed out.' : 'Session deleted.' });
});

/**
 * Sign out everywhere.
 */
activeSessionsRoute.delete('/', async (c) => {
  const revoked = await c.get('session').revokeAllActiveSessions();
  return c.json({ revoked, signedOut: true, message: 'Signed out.' });
});

export { activeSessionsRoute };
