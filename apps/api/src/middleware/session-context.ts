import type { MiddlewareHandler } from 'hono';
import { SessionManager } from '@latchkey/core';
import type { AppServices } from '../services.js';
import { requestMetadata } from '../lib/request-metadata.js';
import { CookieSessionState, type SessionCookieSettings } from '../lib/request-session.js';
import type { AppBindings } from '../types/context.js';

export interface SessionContextOptions {
  services: AppServices;
  cookies: SessionCookieSettings;
  trustProxy: boolean;
}

/**
 * Builds this request's SessionManager over its cookies. Nothing is read
 * until a handler asks who is signed in.
 */
export function sessionContext(options: SessionContextOptions): MiddlewareHandler<AppBindings> {
  const { services, cookies, trustProxy } = options;

  return async (c, next) => {
    c.set('services', services);
    c.set('requestMetadata', requestMetadata(c, trustProxy));
    c.set(
      'session',
      new SessionManager({
        sessions: services.activeSessions,
        state: new CookieSessionState(c, cookies),
        authEvents: services.authEvents,
      })
    );
    await next();
  };
}
