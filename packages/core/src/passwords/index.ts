export { PasswordResetService } from './password-reset-service.js';
export type { PasswordResetRequestResult, PasswordResetServiceOptions } from './password-reset-service.js';
