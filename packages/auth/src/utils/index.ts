/**
 * OAuth utilities grouped by concern.
 *
 * @example Individual imports
 * ```typescript
 * import { TokenUtils } from './token/token.utils.js';
 *
 * const code = TokenUtils.generateAuthorizationCode();
 * ```
 *
 * @example Combined object
 * ```typescript
 * import { OAuthUtils } from './index.js';
 *
 * const scopes = OAuthUtils.parseScopes('mail calendar');
 * ```
 * @public
 */

export * from './token/token.utils.js';
export * from './validation/validation.utils.js';
export * from './scope/scope.utils.js';
export * from './redirect/construct-redirect-uri.js';

import { TokenUtils } from './token/token.utils.js';
import { OAuthValidationUtils } from './validation/validation.utils.js';
import { ScopeUtils } from './scope/scope.utils.js';
import { constructRedirectUri } from './redirect/construct-redirect-uri.js';

/**
 * Combined OAuth utilities
 */
export const OAuthUtils = {
  // Token utilities
  generateSecureToken: TokenUtils.generateSecureToken,
  generateAuthorizationCode: TokenUtils.generateAuthorizationCode,
  generateAccessToken: TokenUtils.generateAccessToken,
  generateRefreshToken: TokenUtils.generateRefreshToken,
  generateTransactionId: TokenUtils.generateTransactionId,
  generateClientId: TokenUtils.generateClientId,
  generateClientSecret: TokenUtils.generateClientSecret,
  extractBearerToken: TokenUtils.extractBearerToken,
  getCurrentTimestamp: TokenUtils.getCurrentTimestamp,
  getCurrentTime: TokenUtils.getCurrentTime,
  isExpired: TokenUtils.isExpired,

  // Validation utilities
  safeCompare: OAuthValidationUtils.safeCompare,
  computeS256Challenge: OAuthValidationUtils.computeS256Challenge,
  validatePkceChallenge: OAuthValidationUtils.validatePkceChallenge,
  validateRedirectUri: OAuthValidationUtils.validateRedirectUri,
  isClientSecretExpired: OAuthValidationUtils.isClientSecretExpired,

  // Scope utilities
  parseScopes: ScopeUtils.parseScopes,
  formatScopes: ScopeUtils.formatScopes,
  isSubset: ScopeUtils.isSubset,
  missingScopes: ScopeUtils.missingScopes,

  constructRedirectUri,
};
