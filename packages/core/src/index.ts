/**
 * @latchkey/core - Domain logic for accounts, sessions and confirmations
 *
 * Services here are framework-free: the API layer builds them, passes in
 * repositories, the token codec and the mailer, and maps their errors onto
 * HTTP responses.
 */

export * from './users/index.js';
export * from './sessions/index.js';
export * from './authentication/index.js';
export * from './tokens/index.js';
export * from './confirmation/index.js';
export * from './passwords/index.js';
export { dispatchAuthMail } from './mail/dispatch-auth-mail.js';
