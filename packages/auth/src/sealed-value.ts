/**
 * Encrypted-and-authenticated cookie values (JWE, dir + A256GCM).
 * Used for the remember-me cookie, whose contents must be neither readable
 * nor forgeable by the client.
 */
import { EncryptJWT, jwtDecrypt } from 'jose';
import { deriveKey } from './secure-token.js';

const SEALING_KEY_LABEL = 'latchkey/sealed-value/v1';

export async function sealValue(value: string, secret: string): Promise<string> {
  return new EncryptJWT({ val: value })
    .setProtectedHeader({ alg: 'dir', enc: 'A256GCM' })
    .setIssuedAt()
    .encrypt(deriveKey(secret, SEALING_KEY_LABEL));
}

/**
 * @returns the sealed value, or null when the input was tampered with,
 * sealed under another secret, or is not a sealed value at all
 */
export async function unsealValue(sealed: string, secret: string): Promise<string | null> {
  if (!sealed) {
    return null;
  }

  try {
    const { payload } = await jwtDecrypt(sealed, deriveKey(secret, SEALING_KEY_LABEL), {
      keyManagementAlgorithms: ['dir'],
      contentEncryptionAlgorithms: ['A256GCM'],
    });
    return typeof payload.val === 'string' && payload.val.length > 0 ? payload.val : null;
  } catch {
    return null;
  }
}
