/**
 * HTTP test helpers: an app wired to in-memory stand-ins, and a client that
 * carries cookies between requests the way a browser would.
 */

import { SignedTokenCodec } from '@latchkey/auth';
import type { User } from '@latchkey/core';
import {
  InMemoryActiveSessionRepository,
  InMemoryStore,
  InMemoryUserRepository,
  RecordingEventSink,
  RecordingMailer,
} from '@latchkey/core/testing';
import { createApp, type App } from '../app.js';
import { buildServices, type AppServices } from '../services.js';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export interface TestHarness {
  app: App;
  services: AppServices;
  store: InMemoryStore;
  mailer: RecordingMailer;
  events: RecordingEventSink;
  tokens: SignedTokenCodec;
}

export interface TestHarnessOptions {
  now?: () => Date;
  trustProxy?: boolean;
}

export function createTestHarness(options: TestHarnessOptions = {}): TestHarness {
  const now = options.now ?? (() => new Date());
  const store = new InMemoryStore({ now });
  const mailer = new RecordingMailer();
  const events = new RecordingEventSink();
  const tokens = new SignedTokenCodec({ secret: TEST_SECRET, now });

  const services = buildServices({
    users: new InMemoryUserRepository(store),
    activeSessions: new InMemoryActiveSessionRepository(store),
    tokens,
    mailer,
    authEvents: events,
    now,
  });

  const app = createApp({
    services,
    cookies: { secret: TEST_SECRET, secure: false },
    trustProxy: options.trustProxy ?? false,
    appUrl: 'http://localhost:3000',
  });

  return { app, services, store, mailer, events, tokens };
}

/**
 * Applies Set-Cookie headers in order; Max-Age=0 removes a cookie.
 */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const [pair = '', ...attributes] = header.split(';');
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      const name = pair.slice(0, separator).trim();
      const value = pair.slice(separator + 1).trim();
      const expired = attributes.some((attribute) => attribute.trim().toLowerCase() === 'max-age=0');

      if (expired || value === '') {
        this.cookies.delete(name);
      } else {
        this.cookies.set(name, value);
      }
    }
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  has(name: string): boolean {
    return this.cookies.has(name);
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  delete(name: string): void {
    this.cookies.delete(name);
  }

  header(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * One browser. Use two clients for two devices.
 */
export class TestClient {
  readonly jar = new CookieJar();

  constructor(private readonly app: App) {}

  async request(method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { ...options.headers };
    const cookie = this.jar.header();
    if (cookie) {
      headers.Cookie = cookie;
    }

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const response = await this.app.request(path, init);
    this.jar.store(response);
    return response;
  }

  get(path: string, options?: RequestOptions) {
    return this.request('GET', path, options);
  }

  post(path: string, body?: unknown, options: RequestOptions = {}) {
    return this.request('POST', path, { ...options, body });
  }

  put(path: string, body?: unknown, options: RequestOptions = {}) {
    return this.request('PUT', path, { ...options, body });
  }

  patch(path: string, body?: unknown, options: RequestOptions = {}) {
    return this.request('PATCH', path, { ...options, body });
  }

  delete(path: string, options?: RequestOptions) {
    return this.request('DELETE', path, options);
  }
}

export const TEST_PASSWORD = 'password123';

/**
 * A confirmed account, created without going through the HTTP surface.
 */
export async function createConfirmedUser(
  harness: TestHarness,
  email: string,
  password: string = TEST_PASSWORD
): Promise<User> {
  const user = await harness.services.userService.register({
    email,
    password,
    passwordConfirmation: password,
  });
  const result = await harness.services.users.confirm(user.id, {
    expectedUnconfirmedEmail: null,
    confirmedAt: new Date(),
  });
  if (result.status !== 'confirmed') {
    throw new Error(`Could not confirm ${email}: ${result.status}`);
  }
  return result.user;
}

export async function signIn(
  client: TestClient,
  email: string,
  password: string = TEST_PASSWORD,
  rememberMe = false
): Promise<Response> {
  const response = await client.post('/v1/sessions', { email, password, rememberMe });
  if (response.status !== 201) {
    throw new Error(`Sign-in failed for ${email}: ${response.status}`);
  }
  return response;
}
