import { Hono } from 'hono';
import { handleAppError } from './lib/error-response.js';
import { originCheck } from './middleware/origin-check.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { sessionContext, type SessionContextOptions } from './middleware/session-context.js';
import { activeSessionsRoute } from './routes/v1/active-sessions.js';
import { confirmationsRoute } from './routes/v1/confirmations.js';
import { healthRoute } from './routes/v1/health.js';
import { passwordsRoute } from './routes/v1/passwords.js';
import { sessionsRoute } from './routes/v1/sessions.js';
import { usersRoute } from './routes/v1/users.js';
import type { AppBindings } from './types/context.js';

export interface AppOptions extends SessionContextOptions {
  /** Origin allowed to send cookie-authenticated mutations */
  appUrl: string;
}

export function createApp(options: AppOptions) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.use('*', originCheck(options.appUrl));
  v1.use('*', sessionContext(options));

  v1.route('/users', usersRoute);
  v1.route('/sessions', sessionsRoute);
  v1.route('/active-sessions', activeSessionsRoute);
  v1.route('/confirmations', confirmationsRoute);
  v1.route('/passwords', passwordsRoute);

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'not_found', message: 'Not found.' }, 404));
  app.onError(handleAppError);

  return app;
}

export type App = ReturnType<typeof createApp>;
