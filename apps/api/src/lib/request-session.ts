import type { Context } from 'hono';
import { deleteCookie, getCookie, getSignedCookie, setCookie, setSignedCookie } from 'hono/cookie';
import type { CookieOptions } from 'hono/utils/cookie';
import {
  REMEMBER_COOKIE_MAX_AGE_SECONDS,
  REMEMBER_COOKIE_NAME,
  RETURN_TO_COOKIE_NAME,
  SESSION_COOKIE_NAME,
  sealValue,
  unsealValue,
} from '@latchkey/auth';
import type { RequestSessionState } from '@latchkey/core';

export interface SessionCookieSettings {
  secret: string;
  secure: boolean;
}

// `undefined` means "not touched yet in this request, ask the cookie".
type Slot = { value: string | null } | undefined;

/**
 * RequestSessionState on cookies:
 * - session id: HMAC-signed, browser-session lifetime
 * - remember token: sealed (encrypted and authenticated), 400 days
 * - return-to location: HMAC-signed, browser-session lifetime
 *
 * Writes are mirrored locally so later reads in the same request see them.
 */
export class CookieSessionState implements RequestSessionState {
  private sessionId: Slot;
  private rememberToken: Slot;
  private returnTo: Slot;

  constructor(
    private readonly c: Context,
    private readonly settings: SessionCookieSettings
  ) {}

  async readSessionId(): Promise<string | null> {
    if (this.sessionId) {
      return this.sessionId.value;
    }
    return this.readSigned(SESSION_COOKIE_NAME);
  }

  async writeSessionId(sessionId: string): Promise<void> {
    await setSignedCookie(this.c, SESSION_COOKIE_NAME, sessionId, this.settings.secret, this.cookieOptions());
    this.sessionId = { value: sessionId };
  }

  async readRememberToken(): Promise<string | null> {
    if (this.rememberToken) {
      return this.rememberToken.value;
    }
    const sealed = getCookie(this.c, REMEMBER_COOKIE_NAME);
    return sealed ? unsealValue(sealed, this.settings.secret) : null;
  }

  async writeRememberToken(rememberToken: string): Promise<void> {
    const sealed = await sealValue(rememberToken, this.settings.secret);
    setCookie(this.c, REMEMBER_COOKIE_NAME, sealed, {
      ...this.cookieOptions(),
      maxAge: REMEMBER_COOKIE_MAX_AGE_SECONDS,
    });
    this.rememberToken = { value: rememberToken };
  }

  clearRememberToken(): void {
    deleteCookie(this.c, REMEMBER_COOKIE_NAME, this.cookieOptions());
    this.rememberToken = { value: null };
  }

  async readReturnTo(): Promise<string | null> {
    if (this.returnTo) {
      return this.returnTo.value;
    }
    return this.readSigned(RETURN_TO_COOKIE_NAME);
  }

  async writeReturnTo(location: string): Promise<void> {
    await setSignedCookie(this.c, RETURN_TO_COOKIE_NAME, location, this.settings.secret, this.cookieOptions());
    this.returnTo = { value: location };
  }

  clearReturnTo(): void {
    deleteCookie(this.c, RETURN_TO_COOKIE_NAME, this.cookieOptions());
    this.returnTo = { value: null };
  }

  reset(): void {
    deleteCookie(this.c, SESSION_COOKIE_NAME, this.cookieOptions());
    this.sessionId = { value: null };
    this.clearReturnTo();
  }

  private async readSigned(name: string): Promise<string | null> {
    // false when the signature does not match
    const value = await getSignedCookie(this.c, this.settings.secret, name);
    return typeof value === 'string' && value.length > 0 ? value : null;
  }

  private cookieOptions(): CookieOptions {
    return {
      path: '/',
      httpOnly: true,
      sameSite: 'Lax',
      secure: this.settings.secure,
    };
  }
}
