/**
 * Hono middleware guarding the MCP endpoint with OAuth bearer tokens
 * (RFC 6750).
 *
 * Returns 401 `invalid_token` when the token is missing, unknown or expired,
 * and 403 `insufficient_scope` when it lacks a required scope. Both carry a
 * `WWW-Authenticate` challenge that points at the protected resource
 * metadata. On success the access token record is available to downstream
 * handlers as `c.get('authInfo')`.
 * @example
 * ```typescript
 * const guard = createBearerAuthMiddleware({
 *   provider,
 *   requiredScopes: ['mail'],
 *   resourceMetadataUrl: 'http://127.0.0.1:8000/.well-known/oauth-protected-resource/mcp',
 * });
 *
 * app.use('/mcp/*', guard);
 * ```
 * @public
 */

import type { Context, MiddlewareHandler } from 'hono';
import type { AccessToken, IOAuthAuthorizationProvider, OAuthErrorCode } from '@courier-mcp/models';
import { OAuthErrorCodes } from '@courier-mcp/models';
import { OAuthUtils } from '@courier-mcp/auth';
import { createLogger } from '@courier-mcp/core';

const logger = createLogger('http:bearer-auth');

export type AuthEnv = {
  Variables: {
    authInfo: AccessToken;
  };
};

export interface BearerAuthOptions {
  provider: IOAuthAuthorizationProvider;
  /** Scopes every request must carry */
  requiredScopes: string[];
  /** Advertised in the WWW-Authenticate challenge */
  resourceMetadataUrl: string;
}

function quote(value: string): string {
  return value.replace(/["\\]/g, '\\$&');
}

export function buildWwwAuthenticateHeader(
  error: OAuthErrorCode,
  description: string,
  resourceMetadataUrl: string,
): string {
  return [
    `Bearer error="${quote(error)}"`,
    `error_description="${quote(description)}"`,
    `resource_metadata="${quote(resourceMetadataUrl)}"`,
  ].join(', ');
}

export function createBearerAuthMiddleware(
  options: BearerAuthOptions,
): MiddlewareHandler<AuthEnv> {
  const reject = (
    c: Context<AuthEnv>,
    status: 401 | 403,
    error: OAuthErrorCode,
    description: string,
  ) => {
    // Log authentication failure for security monitoring
    logger.warn(
      {
        ip: c.req.header('X-Forwarded-For') || c.req.header('X-Real-IP') || 'unknown',
        userAgent: c.req.header('User-Agent') || 'unknown',
        path: c.req.path,
        method: c.req.method,
        error,
      },
      description,
    );

    return c.json({ error, error_description: description }, status, {
      'WWW-Authenticate': buildWwwAuthenticateHeader(
        error,
        description,
        options.resourceMetadataUrl,
      ),
    });
  };

  return async (c, next) => {
    const token = OAuthUtils.extractBearerToken(c.req.header('Authorization'));
    if (!token) {
      return reject(c, 401, OAuthErrorCodes.INVALID_TOKEN, 'Missing bearer token');
    }

    const accessToken = await options.provider.loadAccessToken(token);
    if (!accessToken) {
      return reject(c, 401, OAuthErrorCodes.INVALID_TOKEN, 'Invalid or expired token');
    }

    const missing = OAuthUtils.missingScopes(options.requiredScopes, accessToken.scopes);
    if (missing.length > 0) {
      return reject(
        c,
        403,
        OAuthErrorCodes.INSUFFICIENT_SCOPE,
        `Required scope: ${missing.join(' ')}`,
      );
    }

    c.set('authInfo', accessToken);
    await next();
  };
}
