/**
 * Signed, purpose-bound, expiring tokens for links sent by email.
 *
 * Tokens are compact JWS (HS256) over `{ sub, pur, iat, exp }`, plus `eml`
 * when the token is bound to an address. Nothing is persisted: a token stays
 * valid until its own expiry, and issuing another token for the same subject
 * and purpose does not revoke earlier ones.
 */
import { SignJWT, compactVerify } from 'jose';
import { z } from 'zod';
import { CONFIRMATION_TOKEN_TTL_SECONDS, PASSWORD_RESET_TOKEN_TTL_SECONDS } from './constants.js';
import { deriveKey } from './secure-token.js';

export const TOKEN_PURPOSES = ['confirm_email', 'reset_password'] as const;

export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];

export const TOKEN_TTL_SECONDS: Record<TokenPurpose, number> = {
  confirm_email: CONFIRMATION_TOKEN_TTL_SECONDS,
  reset_password: PASSWORD_RESET_TOKEN_TTL_SECONDS,
};

export type SignedTokenFailureReason = 'tampered_or_malformed' | 'wrong_purpose' | 'expired';

export type SignedTokenVerification =
  | {
      status: 'valid';
      subjectId: string;
      purpose: TokenPurpose;
      email: string | null;
      issuedAt: Date;
      expiresAt: Date;
    }
  | { status: 'invalid'; reason: SignedTokenFailureReason };

export interface IssueTokenOptions {
  ttlSeconds?: number;
  /** Address the link was mailed to; verifiers compare it with the current one. */
  email?: string;
}

export interface SignedTokenCodecOptions {
  secret: string;
  now?: () => Date;
}

const SIGNING_KEY_LABEL = 'latchkey/signed-token/v1';
const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

const SignedTokenClaimsSchema = z.object({
  sub: z.string().min(1),
  pur: z.enum(TOKEN_PURPOSES),
  iat: z.number().int(),
  exp: z.number().int(),
  eml: z.string().min(1).optional(),
});

export class SignedTokenCodec {
  private readonly key: Uint8Array;
  private readonly now: () => Date;

  constructor(options: SignedTokenCodecOptions) {
    this.key = deriveKey(options.secret, SIGNING_KEY_LABEL);
    this.now = options.now ?? (() => new Date());
  }

  async issue(subjectId: string, purpose: TokenPurpose, options: IssueTokenOptions = {}): Promise<string> {
    const ttlSeconds = options.ttlSeconds ?? TOKEN_TTL_SECONDS[purpose];
    if (!subjectId) {
      throw new Error('Cannot issue a signed token without a subject id');
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`Invalid token ttl: ${ttlSeconds}`);
    }

    const issuedAt = Math.floor(this.now().getTime() / 1000);

    const claims = options.email === undefined ? { pur: purpose } : { pur: purpose, eml: options.email };

    return new SignJWT(claims)
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setSubject(subjectId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(issuedAt + ttlSeconds)
      .sign(this.key);
  }

  async verify(token: string, expectedPurpose: TokenPurpose): Promise<SignedTokenVerification> {
    if (!isCanonicalCompactToken(token)) {
      return invalid('tampered_or_malformed');
    }

    let payload: Uint8Array;
    try {
      ({ payload } = await compactVerify(token, this.key, { algorithms: ['HS256'] }));
    } catch {
      return invalid('tampered_or_malformed');
    }

    const claims = SignedTokenClaimsSchema.safeParse(decodeJson(payload));
    if (!claims.success) {
      return invalid('tampered_or_malformed');
    }

    const { sub, pur, iat, exp, eml } = claims.data;
    if (pur !== expectedPurpose) {
      return invalid('wrong_purpose');
    }
    if (this.now().getTime() >= exp * 1000) {
      return invalid('expired');
    }

    return {
      status: 'valid',
      subjectId: sub,
      purpose: pur,
      email: eml ?? null,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }
}

function invalid(reason: SignedTokenFailureReason): SignedTokenVerification {
  return { status: 'invalid', reason };
}

/**
 * Three base64url segments, each in canonical form. Non-canonical encodings
 * (stray trailing bits) would otherwise decode to the same bytes.
 */
function isCanonicalCompactToken(token: string): boolean {
  if (typeof token !== 'string') {
    return false;
  }
  const segments = token.split('.');
  if (segments.length !== 3) {
    return false;
  }
  return segments.every(
    (segment) =>
      SEGMENT_PATTERN.test(segment) &&
      Buffer.from(segment, 'base64url').toString('base64url') === segment
  );
}

function decodeJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(new TextDecoder().decode(bytes));
  } catch {
    return null;
  }
}
