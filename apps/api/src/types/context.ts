import type { RequestMetadata, SessionManager } from '@latchkey/core';
import type { AppServices } from '../services.js';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
  services: AppServices;
  requestMetadata: RequestMetadata;
  session: SessionManager;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
