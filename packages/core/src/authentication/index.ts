export { Authenticator } from './authenticator.js';
export { AuthenticationError, IncorrectCredentialsError, AccountUnconfirmedError } from './authentication-errors.js';
