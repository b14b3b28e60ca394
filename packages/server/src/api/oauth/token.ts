/**
 * Token endpoint (RFC 6749 section 3.2) for the authorization_code and
 * refresh_token grants
 */

import type {
  ClientRegistration,
  IOAuthAuthorizationProvider,
  TokenResponse,
} from '@courier-mcp/models';
import { GrantTypes, OAuthErrorCodes } from '@courier-mcp/models';
import { InvalidRequestError, OAuthProtocolError, OAuthUtils, TokenError } from '@courier-mcp/auth';
import { authenticateClient } from './client-authentication.js';
import { oauthErrorResponse, param, readFormParams, type RequestParams } from './request-utils.js';
import type { OAuthHandler } from './types.js';

const NO_STORE_HEADERS = {
  'Cache-Control': 'no-store',
  Pragma: 'no-cache',
};

const DEFAULT_CLIENT_GRANTS: string[] = [GrantTypes.AUTHORIZATION_CODE, GrantTypes.REFRESH_TOKEN];

async function authorizationCodeGrant(
  provider: IOAuthAuthorizationProvider,
  client: ClientRegistration,
  params: RequestParams,
): Promise<TokenResponse> {
  const code = param(params, 'code');
  if (!code) {
    throw new InvalidRequestError('code is required');
  }
  const codeVerifier = param(params, 'code_verifier');
  if (!codeVerifier) {
    throw new InvalidRequestError('code_verifier is required');
  }

  const authorizationCode = await provider.loadAuthorizationCode(client, code);
  if (!authorizationCode) {
    throw new TokenError(OAuthErrorCodes.INVALID_GRANT, 'Authorization code does not exist');
  }

  // RFC 6749 section 4.1.3: must match when it was part of the authorization request
  if (
    authorizationCode.redirect_uri_provided_explicitly &&
    param(params, 'redirect_uri') !== authorizationCode.redirect_uri
  ) {
    throw new InvalidRequestError('redirect_uri did not match the one used in the authorization');
  }

  if (!OAuthUtils.validatePkceChallenge(codeVerifier, authorizationCode.code_challenge)) {
    throw new TokenError(OAuthErrorCodes.INVALID_GRANT, 'Incorrect code_verifier');
  }

  return provider.exchangeAuthorizationCode(client, authorizationCode);
}

async function refreshTokenGrant(
  provider: IOAuthAuthorizationProvider,
  client: ClientRegistration,
  params: RequestParams,
): Promise<TokenResponse> {
  const token = param(params, 'refresh_token');
  if (!token) {
    throw new InvalidRequestError('refresh_token is required');
  }

  const refreshToken = await provider.loadRefreshToken(client, token);
  if (!refreshToken) {
    throw new TokenError(OAuthErrorCodes.INVALID_GRANT, 'Refresh token does not exist');
  }

  const scope = param(params, 'scope');
  const scopes = scope === undefined ? refreshToken.scopes : OAuthUtils.parseScopes(scope);
  const exceeding = OAuthUtils.missingScopes(scopes, refreshToken.scopes);
  if (exceeding.length > 0) {
    throw new TokenError(
      OAuthErrorCodes.INVALID_SCOPE,
      `Cannot request scope \`${exceeding.join(' ')}\` not provided by refresh token`,
    );
  }

  return provider.exchangeRefreshToken(client, refreshToken, scopes);
}

export const PostTokenHandler: OAuthHandler = async (c) => {
  try {
    const provider = c.get('oauthProvider');
    const params = await readFormParams(c);
    const client = await authenticateClient(provider, params, c.req.header('Authorization'));

    const grantType = param(params, 'grant_type');
    if (!grantType) {
      throw new InvalidRequestError('grant_type is required');
    }
    if (grantType !== GrantTypes.AUTHORIZATION_CODE && grantType !== GrantTypes.REFRESH_TOKEN) {
      throw new OAuthProtocolError(
        OAuthErrorCodes.UNSUPPORTED_GRANT_TYPE,
        `Unsupported grant type: ${grantType}`,
      );
    }
    if (!(client.grant_types ?? DEFAULT_CLIENT_GRANTS).includes(grantType)) {
      throw new OAuthProtocolError(
        OAuthErrorCodes.UNAUTHORIZED_CLIENT,
        `Client is not authorized to use the ${grantType} grant`,
      );
    }

    const tokens =
      grantType === GrantTypes.AUTHORIZATION_CODE
        ? await authorizationCodeGrant(provider, client, params)
        : await refreshTokenGrant(provider, client, params);

    return c.json(tokens, 200, NO_STORE_HEADERS);
  } catch (error) {
    return oauthErrorResponse(c, error, 'Token endpoint error', NO_STORE_HEADERS);
  }
};
