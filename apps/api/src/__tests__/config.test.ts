import { describe, it, expect } from 'vitest';
import { ConfigError, loadApiConfig } from '../config.js';

const BASE_ENV = { AUTH_SECRET: 'test-secret-test-secret-test-secret' };

describe('loadApiConfig', () => {
  it('applies defaults', () => {
    expect(loadApiConfig(BASE_ENV)).toEqual({
      nodeEnv: 'development',
      port: 3000,
      authSecret: 'test-secret-test-secret-test-secret',
      appUrl: 'http://localhost:3000',
      databaseUrl: null,
      resendApiKey: null,
      emailFrom: 'no-reply@example.com',
      trustProxy: false,
      secureCookies: false,
    });
  });

  it('reads every setting', () => {
    const config = loadApiConfig({
      ...BASE_ENV,
      NODE_ENV: 'production',
      PORT: '8080',
      APP_URL: 'https://auth.example.com/',
      DATABASE_URL: 'postgres://localhost:5432/latchkey',
      RESEND_API_KEY: 'test-resend-key',
      EMAIL_FROM: 'accounts@example.com',
      TRUST_PROXY: 'true',
    });

    expect(config).toMatchObject({
      nodeEnv: 'production',
      port: 8080,
      appUrl: 'https://auth.example.com',
      databaseUrl: 'postgres://localhost:5432/latchkey',
      resendApiKey: 'test-resend-key',
      emailFrom: 'accounts@example.com',
      trustProxy: true,
      secureCookies: true,
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadApiConfig({ ...BASE_ENV, RESEND_API_KEY: '', PORT: '' })).toMatchObject({
      resendApiKey: null,
      port: 3000,
    });
  });

  it('rejects a short secret', () => {
    expect(() => loadApiConfig({ AUTH_SECRET: 'too-short' })).toThrow(
      'AUTH_SECRET: AUTH_SECRET must be at least 32 characters'
    );
  });

  it('lists every problem at once', () => {
    try {
      loadApiConfig({ PORT: 'eighty', APP_URL: 'not a url' });
      expect.unreachable('loadApiConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError ? error.issues.map((issue) => issue.split(':')[0]) : []).toEqual([
        'PORT',
        'AUTH_SECRET',
        'APP_URL',
      ]);
    }
  });
});
