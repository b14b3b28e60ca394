/**
 * OAuth 2.1 authorization server types
 */
export * from './AccessToken.js';
export * from './AuthorizationCode.js';
export * from './AuthorizationParams.js';
export * from './ClientRegistration.js';
export * from './IOAuthAuthorizationProvider.js';
export * from './OAuthError.js';
export * from './OAuthProviderConfig.js';
export * from './PendingAuthorization.js';
export * from './RefreshToken.js';
export * from './TokenResponse.js';
