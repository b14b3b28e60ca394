import { createHash, timingSafeEqual } from 'node:crypto';

/**
 * Compares two secrets in constant time.
 *
 * Both sides are hashed first so that inputs of different lengths still go
 * through `timingSafeEqual` and the comparison time does not leak the length.
 */
export function safeCompare(provided: string, expected: string): boolean {
  const providedDigest = createHash('sha256').update(provided, 'utf8').digest();
  const expectedDigest = createHash('sha256').update(expected, 'utf8').digest();
  return timingSafeEqual(providedDigest, expectedDigest);
}
