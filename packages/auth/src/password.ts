/**
 * Password hashing and verification
 * Uses Node's built-in scrypt (memory-hard) with a random salt per hash.
 * Output format: scrypt$N$r$p$salt$key (base64 salt and key)
 */
import { randomBytes, scrypt, timingSafeEqual, type ScryptOptions } from 'node:crypto';
import { IncorrectPasswordError, MalformedPasswordHashError } from './errors.js';

const KEY_LENGTH = 64;
const SALT_LENGTH = 16;

export const SCRYPT_PARAMS = { N: 16384, r: 8, p: 1 } as const;

function deriveKey(password: string, salt: Buffer, keyLength: number, options: ScryptOptions): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, options, (error, key) => {
      if (error) {
        reject(error);
      } else {
        resolve(key);
      }
    });
  });
}

/**
 * Hash a password using scrypt
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const { N, r, p } = SCRYPT_PARAMS;
  const derivedKey = await deriveKey(password, salt, KEY_LENGTH, { N, r, p });
  return `scrypt$${N}$${r}$${p}$${salt.toString('base64')}$${derivedKey.toString('base64')}`;
}

function parsePositiveInt(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

/**
 * Verify a password against a stored scrypt hash.
 *
 * Resolves on match, rejects with IncorrectPasswordError on mismatch and
 * with MalformedPasswordHashError when the stored value cannot be parsed.
 */
export async function verifyPassword(hashedPassword: string, password: string): Promise<void> {
  const [algorithm, nValue, rValue, pValue, saltB64, keyB64, ...rest] = hashedPassword.split('$');
  const N = parsePositiveInt(nValue);
  const r = parsePositiveInt(rValue);
  const p = parsePositiveInt(pValue);
  if (algorithm !== 'scrypt' || rest.length > 0 || !N || !r || !p || !saltB64 || !keyB64) {
    throw new MalformedPasswordHashError();
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (storedKey.length === 0) {
    throw new MalformedPasswordHashError();
  }

  const derivedKey = await deriveKey(password, salt, storedKey.length, { N, r, p });
  if (!timingSafeEqual(storedKey, derivedKey)) {
    throw new IncorrectPasswordError();
  }
}
