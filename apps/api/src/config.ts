import { z } from 'zod';
import { DEFAULT_MAILER_FROM } from '@latchkey/auth';

const ApiEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  AUTH_SECRET: z.string().min(32, 'AUTH_SECRET must be at least 32 characters'),
  APP_URL: z.string().url().default('http://localhost:3000'),
  DATABASE_URL: z.string().min(1).optional(),
  RESEND_API_KEY: z.string().min(1).optional(),
  EMAIL_FROM: z.string().min(1).default(DEFAULT_MAILER_FROM),
  TRUST_PROXY: z.enum(['true', 'false']).default('false'),
  // Read by the shared logger from process.env
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

export interface ApiConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  authSecret: string;
  appUrl: string;
  databaseUrl: string | null;
  resendApiKey: string | null;
  emailFrom: string;
  trustProxy: boolean;
  secureCookies: boolean;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse the API's environment. Throws ConfigError listing every problem at once.
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = ApiEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    authSecret: values.AUTH_SECRET,
    // Links are built by appending paths
    appUrl: values.APP_URL.replace(/\/+$/, ''),
    databaseUrl: values.DATABASE_URL ?? null,
    resendApiKey: values.RESEND_API_KEY ?? null,
    emailFrom: values.EMAIL_FROM,
    trustProxy: values.TRUST_PROXY === 'true',
    secureCookies: values.NODE_ENV === 'production',
  };
}
