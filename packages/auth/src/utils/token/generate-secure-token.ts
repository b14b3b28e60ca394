import { randomBytes } from 'node:crypto';

/**
 * Generates a cryptographically secure random token.
 *
 * Output is base64url (URL-safe, unpadded), so it can travel in query strings
 * and form fields untouched.
 * @param length - Number of random bytes to draw (default: 32)
 * @example
 * ```typescript
 * generateSecureToken();   // 43 characters
 * generateSecureToken(48); // 64 characters
 * ```
 */
export function generateSecureToken(length: number = 32): string {
  return randomBytes(length).toString('base64url');
}
