import crypto from 'node:crypto';
import { REMEMBER_TOKEN_BYTES } from './constants.js';

/**
 * Random URL-safe secret, used for remember-me tokens.
 */
export function generateSecureToken(bytes: number = REMEMBER_TOKEN_BYTES): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

/**
 * Derive a purpose-specific 32-byte key from the application secret so that
 * one secret can back several independent primitives.
 */
export function deriveKey(secret: string, label: string): Uint8Array {
  if (!secret) {
    throw new Error('A non-empty secret is required to derive keys');
  }
  return new Uint8Array(crypto.createHmac('sha256', secret).update(label).digest());
}
