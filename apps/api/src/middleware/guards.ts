import type { Context, Next } from 'hono';
import type { AppBindings } from '../types/context.js';

/**
 * Rejects anonymous callers with 401. For GET requests the requested path is
 * remembered so sign-in can send the user back there.
 */
export async function requireAuth(c: Context<AppBindings>, next: Next) {
  const session = c.get('session');

  if (!(await session.isAuthenticated())) {
    if (c.req.method === 'GET') {
      const url = new URL(c.req.url);
      await session.storeLocation(`${url.pathname}${url.search}`);
    }
    return c.json({ error: 'authentication_required', message: 'You need to sign in first.' }, 401);
  }

  await next();
}

/**
 * For sign-up, sign-in, confirmation requests and password resets.
 */
export async function anonymousOnly(c: Context<AppBindings>, next: Next) {
  if (await c.get('session').isAuthenticated()) {
    return c.json({ error: 'already_authenticated', message: 'You are already signed in.' }, 403);
  }

  await next();
}
