export { ConfirmationService } from './confirmation-service.js';
export type { ConfirmationServiceOptions } from './confirmation-service.js';
export { ConfirmationError, EmailNoLongerAvailableError } from './confirmation-errors.js';
