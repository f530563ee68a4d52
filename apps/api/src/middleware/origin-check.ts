import type { MiddlewareHandler } from 'hono';

const MUTATION_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

/**
 * Cross-site request forgery guard for cookie-authenticated mutations.
 *
 * Browsers send Origin on cross-origin and on non-GET requests; a mutation
 * whose Origin is not the app's own is refused. Requests without Origin
 * (server-to-server, curl) pass through.
 */
export function originCheck(appUrl: string): MiddlewareHandler {
  const allowedOrigin = new URL(appUrl).origin;

  return async (c, next) => {
    if (!MUTATION_METHODS.has(c.req.method)) {
      return next();
    }

    const origin = c.req.header('origin');
    if (origin !== undefined && origin !== allowedOrigin) {
      return c.json(
        { error: 'cross_origin_request', message: 'Cross-origin requests are not allowed.' },
        403
      );
    }

    await next();
  };
}
