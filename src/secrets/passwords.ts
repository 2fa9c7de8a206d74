/**
 * Password generation and authfile hashing
 */

import { pbkdf2Sync, randomBytes, randomInt, timingSafeEqual } from 'node:crypto';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/** Length of generated secrets */
export const PASSWORD_LENGTH = 32;

/** PBKDF2 iterations of the registry's sha512 scheme */
const HASH_ITERATIONS = 5000;
const HASH_KEY_LENGTH = 64;

/**
 * Generate an alphanumeric secret with a cryptographically secure generator
 */
export function generatePassword(length = PASSWORD_LENGTH): string {
  let password = '';
  for (let i = 0; i < length; i++) {
    password += ALPHANUMERIC[randomInt(ALPHANUMERIC.length)];
  }
  return password;
}

/**
 * Generate a random hashing salt
 */
export function generateSalt(): string {
  return randomBytes(16).toString('base64');
}

/**
 * Hash a password the way the registry's authfile expects for `sha512`
 */
export function hashPassword(password: string, salt: string): string {
  return pbkdf2Sync(
    Buffer.from(password, 'utf-8'),
    Buffer.from(salt, 'utf-8'),
    HASH_ITERATIONS,
    HASH_KEY_LENGTH,
    'sha512'
  ).toString('base64');
}

/**
 * Compare two secrets in constant time
 */
export function secretsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  return left.length === right.length && timingSafeEqual(left, right);
}
