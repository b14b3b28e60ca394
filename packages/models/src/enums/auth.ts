/**
 * Standard OAuth 2.0 error codes
 */
export const OAuthErrorCodes = {
  INVALID_REQUEST: 'invalid_request',
  INVALID_CLIENT: 'invalid_client',
  INVALID_GRANT: 'invalid_grant',
  UNAUTHORIZED_CLIENT: 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE: 'unsupported_grant_type',
  INVALID_SCOPE: 'invalid_scope',
  ACCESS_DENIED: 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE: 'unsupported_response_type',
  SERVER_ERROR: 'server_error',
  TEMPORARILY_UNAVAILABLE: 'temporarily_unavailable',
  INVALID_CLIENT_METADATA: 'invalid_client_metadata',
  INVALID_TOKEN: 'invalid_token',
  INSUFFICIENT_SCOPE: 'insufficient_scope',
} as const;

export type OAuthErrorCode = (typeof OAuthErrorCodes)[keyof typeof OAuthErrorCodes];

/**
 * Standard OAuth 2.0 grant types
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  REFRESH_TOKEN: 'refresh_token',
} as const;

export type GrantType = (typeof GrantTypes)[keyof typeof GrantTypes];

/**
 * Standard OAuth 2.0 response types
 */
export const ResponseTypes = {
  CODE: 'code',
} as const;

/**
 * PKCE code challenge methods. Only S256 is accepted by OAuth 2.1.
 */
export const CodeChallengeMethods = {
  S256: 'S256',
} as const;

/**
 * Token endpoint client authentication methods (RFC 7591 section 2)
 */
export const TokenEndpointAuthMethods = {
  CLIENT_SECRET_POST: 'client_secret_post',
  CLIENT_SECRET_BASIC: 'client_secret_basic',
  NONE: 'none',
} as const;

export type TokenEndpointAuthMethod =
  (typeof TokenEndpointAuthMethods)[keyof typeof TokenEndpointAuthMethods];

/**
 * Decisions an operator can submit from the consent page
 */
export const ConsentActions = {
  APPROVE: 'approve',
  DENY: 'deny',
} as const;
