/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt for secure password storage (no native addons needed)
 */
import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const HASH_SCHEME = 'scrypt';

function deriveScryptKey(password: string, salt: Buffer, keyLength: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

/**
 * Hash a password using scrypt
 * @returns Promise resolving to `scrypt$<salt>$<key>` (base64 parts)
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const derivedKey = await deriveScryptKey(password, salt, KEY_LENGTH);
  return `${HASH_SCHEME}$${salt.toString('base64')}$${derivedKey.toString('base64')}`;
}

/**
 * Verify a password against a scrypt hash
 * Uses constant-time comparison to prevent timing attacks
 * @returns Promise resolving to true if password matches; false for malformed hashes
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  const [scheme, saltB64, keyB64, ...rest] = hashedPassword.split('$');
  if (scheme !== HASH_SCHEME || !saltB64 || !keyB64 || rest.length > 0) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (salt.length === 0 || storedKey.length === 0) {
    return false;
  }

  const derivedKey = await deriveScryptKey(password, salt, storedKey.length);
  return timingSafeEqual(storedKey, derivedKey);
}
