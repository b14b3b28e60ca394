import { Hono } from 'hono';
import type { IOAuthAuthorizationProvider } from '@courier-mcp/models';
import {
  AuthorizationServerMetadataHandler,
  PROTECTED_RESOURCE_METADATA_PATH,
  ProtectedResourceMetadataHandler,
} from './oauth/metadata.js';
import { RegisterHandler } from './oauth/register.js';
import { AuthorizeHandler } from './oauth/authorize.js';
import { PostTokenHandler } from './oauth/token.js';
import { RevokeTokenHandler } from './oauth/revokeToken.js';
import type { OAuthEnv } from './oauth/types.js';

export interface OAuthRouteOptions {
  /** Path of the protected MCP endpoint */
  mcpPath: string;
}

/**
 * Builds the OAuth endpoints for a provider, plus the routes the provider
 * contributes itself (the consent page of the local provider).
 */
export function createOAuthRoute(
  provider: IOAuthAuthorizationProvider,
  options: OAuthRouteOptions,
): Hono<OAuthEnv> {
  const oauthRoute = new Hono<OAuthEnv>();
  const { clientRegistrationOptions, revocationOptions } = provider.settings;

  oauthRoute.use('*', async (c, next) => {
    c.set('oauthProvider', provider);
    c.set('mcpPath', options.mcpPath);
    await next();
  });

  /**
   * OAuth 2.0 Authorization Server Metadata (RFC 8414)
   * GET /.well-known/oauth-authorization-server
   */
  oauthRoute.get('/.well-known/oauth-authorization-server', AuthorizationServerMetadataHandler);

  /**
   * OAuth 2.0 Protected Resource Metadata (RFC 9728)
   * GET /.well-known/oauth-protected-resource[/mcp]
   */
  oauthRoute.get(PROTECTED_RESOURCE_METADATA_PATH, ProtectedResourceMetadataHandler);
  oauthRoute.get(
    `${PROTECTED_RESOURCE_METADATA_PATH}${options.mcpPath}`,
    ProtectedResourceMetadataHandler,
  );

  /**
   * Client Registration endpoint (RFC 7591)
   * POST /register
   */
  if (clientRegistrationOptions.enabled) {
    oauthRoute.post('/register', RegisterHandler);
  }

  /**
   * OAuth 2.0 Authorization endpoint (RFC 6749)
   * GET|POST /authorize
   */
  oauthRoute.on(['GET', 'POST'], '/authorize', AuthorizeHandler);

  /**
   * OAuth 2.0 Token endpoint (RFC 6749)
   * POST /token
   */
  oauthRoute.post('/token', PostTokenHandler);

  /**
   * OAuth 2.0 Token Revocation endpoint (RFC 7009)
   * POST /revoke
   */
  if (revocationOptions.enabled) {
    oauthRoute.post('/revoke', RevokeTokenHandler);
  }

  for (const route of provider.getRoutes()) {
    oauthRoute.on(route.methods, route.path, (c) => route.handler(c.req.raw));
  }

  return oauthRoute;
}
