import {
  authEvents,
  LoggingAuthMailer,
  ResendAuthMailer,
  SignedTokenCodec,
  type AuthEventSink,
  type AuthMailer,
} from '@latchkey/auth';
import {
  Authenticator,
  ConfirmationService,
  PasswordResetService,
  PgActiveSessionRepository,
  PgUserRepository,
  UserService,
  type ActiveSessionRepository,
  type UserRepository,
} from '@latchkey/core';
import type { Pool } from '@latchkey/database';
import type { ApiConfig } from './config.js';

/**
 * Everything the routes need, wired once per process.
 */
export interface AppServices {
  users: UserRepository;
  activeSessions: ActiveSessionRepository;
  userService: UserService;
  authenticator: Authenticator;
  confirmations: ConfirmationService;
  passwordResets: PasswordResetService;
  authEvents: AuthEventSink;
}

export interface ServiceDependencies {
  users: UserRepository;
  activeSessions: ActiveSessionRepository;
  tokens: SignedTokenCodec;
  mailer: AuthMailer;
  authEvents: AuthEventSink;
  now?: () => Date;
}

export function buildServices(deps: ServiceDependencies): AppServices {
  const { users, activeSessions, tokens, mailer } = deps;
  const events = deps.authEvents;

  return {
    users,
    activeSessions,
    userService: new UserService(users, events),
    authenticator: new Authenticator(users, events),
    confirmations: new ConfirmationService({
      users,
      tokens,
      mailer,
      authEvents: events,
      ...(deps.now ? { now: deps.now } : {}),
    }),
    passwordResets: new PasswordResetService({ users, tokens, mailer, authEvents: events }),
    authEvents: events,
  };
}

export function createMailer(config: Pick<ApiConfig, 'resendApiKey' | 'appUrl' | 'emailFrom'>): AuthMailer {
  if (!config.resendApiKey) {
    return new LoggingAuthMailer();
  }
  return new ResendAuthMailer({
    apiKey: config.resendApiKey,
    appUrl: config.appUrl,
    from: config.emailFrom,
  });
}

/**
 * Production wiring: Postgres repositories, the process-wide event emitter,
 * and Resend when an API key is configured.
 */
export function createServices(config: ApiConfig, pool: Pool): AppServices {
  return buildServices({
    users: new PgUserRepository(pool),
    activeSessions: new PgActiveSessionRepository(pool),
    tokens: new SignedTokenCodec({ secret: config.authSecret }),
    mailer: createMailer(config),
    authEvents,
  });
}
