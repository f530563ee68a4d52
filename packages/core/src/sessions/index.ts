/**
 * Sessions Domain
 *
 * Exports for the session store and the per-request lifecycle manager
 */

export type { ActiveSessionRepository } from './session-repository.js';
export { PgActiveSessionRepository } from './pg-active-session-repository.js';
export { SessionManager } from './session-manager.js';
export type { SessionManagerOptions } from './session-manager.js';
export type { RequestSessionState } from './session-state.js';
export type {
  ActiveSession,
  ActiveSessionSummary,
  ActiveSessionWithUser,
  CreateActiveSessionData,
  RequestMetadata,
} from './session-types.js';
export { SessionError, AuthenticationRequiredError, ActiveSessionNotFoundError } from './session-errors.js';
