import { createHash } from 'node:crypto';
import { safeCompare } from './safe-compare.js';

/**
 * Computes the S256 code challenge for a verifier: BASE64URL(SHA256(verifier)).
 */
export function computeS256Challenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier).digest('base64url');
}

/**
 * Checks a PKCE code verifier against the stored S256 challenge (RFC 7636).
 * @example
 * ```typescript
 * const verifier = 'dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk';
 * const challenge = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';
 * validatePkceChallenge(verifier, challenge); // true
 * ```
 */
export function validatePkceChallenge(codeVerifier: string, codeChallenge: string): boolean {
  return safeCompare(computeS256Challenge(codeVerifier), codeChallenge);
}
