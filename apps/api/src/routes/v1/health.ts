import { Hono } from 'hono';

const VERSION = '0.1.0';

/**
 * Liveness only; never touches the database.
 */
const healthRoute = new Hono();

healthRoute.get('/', (c) =>
  c.json({
    status: 'ok',
    version: VERSION,
    uptimeSeconds: Math.floor(process.uptime()),
    timestamp: new Date().toISOString(),
  })
);

export { healthRoute };
