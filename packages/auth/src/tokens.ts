/**
 * Opaque token generation and comparison
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';

/** Entropy of session identifiers and CSRF tokens */
export const DEFAULT_TOKEN_BYTES = 32;

/**
 * Generate a cryptographically secure, URL and cookie safe token
 *
 * @returns base64url string (43 characters for 32 bytes)
 */
export function generateToken(bytes: number = DEFAULT_TOKEN_BYTES): string {
  return randomBytes(bytes).toString('base64url');
}

/**
 * Compare two secrets in constant time
 *
 * Unequal lengths return false without comparing content.
 */
export function constantTimeEquals(expected: string, presented: string): boolean {
  const expectedBuffer = Buffer.from(expected, 'utf-8');
  const presentedBuffer = Buffer.from(presented, 'utf-8');

  if (expectedBuffer.length !== presentedBuffer.length) {
    return false;
  }

  return timingSafeEqual(expectedBuffer, presentedBuffer);
}
