/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt (no native addons needed)
 */
import { randomBytes, scrypt as scryptCallback, timingSafeEqual } from 'node:crypto';
import { SCRYPT_COST } from './constants.js';

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
// 128 * N * r bytes, plus headroom
const MAX_MEMORY = 64 * 1024 * 1024;

function deriveKey(password: string, salt: Buffer, keyLength: number, cost: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, { N: cost, r: 8, p: 1, maxmem: MAX_MEMORY }, (error, key) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(key);
    });
  });
}

/**
 * Hash a password using scrypt
 * @returns Hash string in the form `scrypt$<N>$<salt>$<key>`
 */
export async function hashPassword(password: string, cost: number = SCRYPT_COST): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const derivedKey = await deriveKey(password, salt, KEY_LENGTH, cost);
  return `scrypt$${cost}$${salt.toString('base64')}$${derivedKey.toString('base64')}`;
}

/**
 * Verify a password against a scrypt hash
 * Uses constant-time comparison; malformed hashes never match
 */
export async function verifyPassword(password: string, hashedPassword: string): Promise<boolean> {
  const parts = hashedPassword.split('$');
  if (parts.length !== 4 || parts[0] !== 'scrypt') {
    return false;
  }

  const [, costStr, saltB64, keyB64] = parts;
  if (!costStr || !saltB64 || !keyB64) {
    return false;
  }

  const cost = Number.parseInt(costStr, 10);
  // N must be a power of two greater than one
  if (!Number.isInteger(cost) || cost < 2 || (cost & (cost - 1)) !== 0) {
    return false;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const storedKey = Buffer.from(keyB64, 'base64');
  if (storedKey.length === 0) {
    return false;
  }

  const derivedKey = await deriveKey(password, salt, storedKey.length, cost);
  return timingSafeEqual(storedKey, derivedKey);
}

let dummyHash: Promise<string> | null = null;

/**
 * A hash of a random secret, verified against when the account does not exist
 * so unknown and known emails take the same time to reject.
 */
export function getDummyPasswordHash(): Promise<string> {
  dummyHash ??= hashPassword(randomBytes(24).toString('base64url'));
  return dummyHash;
}
