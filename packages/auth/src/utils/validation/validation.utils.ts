/**
 * OAuth validation utilities
 */

import type { ClientRegistration } from '@courier-mcp/models';
import { safeCompare } from './safe-compare.js';
import { computeS256Challenge, validatePkceChallenge } from './validate-pkce-challenge.js';
import { TokenUtils } from '../token/token.utils.js';

export class OAuthValidationUtils {
  public static safeCompare = safeCompare;
  public static computeS256Challenge = computeS256Challenge;
  public static validatePkceChallenge = validatePkceChallenge;

  public static validateRedirectUri(client: ClientRegistration, redirectUri: string): boolean {
    return client.redirect_uris.includes(redirectUri);
  }

  /** A secret expiry of 0 or none means the secret never expires */
  public static isClientSecretExpired(client: ClientRegistration): boolean {
    const expiresAt = client.client_secret_expires_at;
    return typeof expiresAt === 'number' && expiresAt > 0 && TokenUtils.isExpired(expiresAt);
  }
}

export { safeCompare } from './safe-compare.js';
export { computeS256Challenge, validatePkceChallenge } from './validate-pkce-challenge.js';
