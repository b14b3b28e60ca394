/**
 * Discovery documents: authorization server metadata (RFC 8414) and
 * protected resource metadata (RFC 9728)
 */

import type { OAuthProviderSettings } from '@courier-mcp/models';
import {
  CodeChallengeMethods,
  GrantTypes,
  ResponseTypes,
  TokenEndpointAuthMethods,
} from '@courier-mcp/models';
import type { OAuthHandler } from './types.js';

export const PROTECTED_RESOURCE_METADATA_PATH = '/.well-known/oauth-protected-resource';

const trimTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

export function buildAuthorizationServerMetadata(settings: OAuthProviderSettings) {
  const baseUrl = trimTrailingSlash(settings.baseUrl);
  const validScopes = settings.clientRegistrationOptions.validScopes ?? [];

  return {
    issuer: settings.issuerUrl,
    authorization_endpoint: `${baseUrl}/authorize`,
    token_endpoint: `${baseUrl}/token`,
    ...(settings.clientRegistrationOptions.enabled && {
      registration_endpoint: `${baseUrl}/register`,
    }),
    ...(settings.revocationOptions.enabled && {
      revocation_endpoint: `${baseUrl}/revoke`,
    }),
    ...(validScopes.length > 0 && { scopes_supported: validScopes }),
    response_types_supported: [ResponseTypes.CODE],
    grant_types_supported: [GrantTypes.AUTHORIZATION_CODE, GrantTypes.REFRESH_TOKEN],
    token_endpoint_auth_methods_supported: [TokenEndpointAuthMethods.CLIENT_SECRET_POST],
    code_challenge_methods_supported: [CodeChallengeMethods.S256],
    ...(settings.serviceDocumentationUrl
      ? { service_documentation: settings.serviceDocumentationUrl }
      : {}),
  };
}

/** URL of the protected resource behind `mcpPath` */
export function resourceUrl(settings: OAuthProviderSettings, mcpPath: string): string {
  return `${trimTrailingSlash(settings.baseUrl)}${mcpPath}`;
}

/**
 * Where a client finds the protected resource metadata for `mcpPath`
 * (path-suffixed form, RFC 9728 section 3.1)
 */
export function protectedResourceMetadataUrl(
  settings: OAuthProviderSettings,
  mcpPath: string,
): string {
  return `${trimTrailingSlash(settings.baseUrl)}${PROTECTED_RESOURCE_METADATA_PATH}${mcpPath}`;
}

export function buildProtectedResourceMetadata(settings: OAuthProviderSettings, mcpPath: string) {
  const validScopes = settings.clientRegistrationOptions.validScopes ?? [];
  const scopes = validScopes.length > 0 ? validScopes : settings.requiredScopes;

  return {
    resource: resourceUrl(settings, mcpPath),
    authorization_servers: [settings.issuerUrl],
    ...(scopes.length > 0 && { scopes_supported: scopes }),
    bearer_methods_supported: ['header'],
    ...(settings.serviceDocumentationUrl
      ? { resource_documentation: settings.serviceDocumentationUrl }
      : {}),
  };
}

export const AuthorizationServerMetadataHandler: OAuthHandler = (c) =>
  c.json(buildAuthorizationServerMetadata(c.get('oauthProvider').settings));

export const ProtectedResourceMetadataHandler: OAuthHandler = (c) =>
  c.json(buildProtectedResourceMetadata(c.get('oauthProvider').settings, c.get('mcpPath')));
