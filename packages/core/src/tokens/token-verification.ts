import type { AuthEventSink, SignedTokenCodec, TokenPurpose } from '@latchkey/auth';
import { InvalidOrExpiredTokenError } from './token-errors.js';

export type TokenRejectionReason =
  | 'tampered_or_malformed'
  | 'wrong_purpose'
  | 'expired'
  | 'unknown_subject'
  | 'not_actionable';

/**
 * Record why a token was refused, then fail with the generic error.
 */
export function rejectToken(
  authEvents: AuthEventSink,
  purpose: TokenPurpose,
  reason: TokenRejectionReason,
  userId?: string
): never {
  authEvents.emit({
    type: 'token.rejected',
    userId,
    metadata: { purpose, reason },
  });
  throw new InvalidOrExpiredTokenError();
}

export interface VerifiedToken {
  subjectId: string;
  email: string | null;
}

/**
 * @returns the claims of a token valid for `purpose` right now
 * @throws InvalidOrExpiredTokenError
 */
export async function verifyTokenOrReject(
  codec: SignedTokenCodec,
  authEvents: AuthEventSink,
  token: string,
  purpose: TokenPurpose
): Promise<VerifiedToken> {
  const result = await codec.verify(token, purpose);
  if (result.status === 'invalid') {
    return rejectToken(authEvents, purpose, result.reason);
  }
  return { subjectId: result.subjectId, email: result.email };
}
