import { InvalidRequestError } from '@courier-mcp/auth';
import { authenticateClient } from './client-authentication.js';
import { oauthErrorResponse, param, readFormParams } from './request-utils.js';
import type { OAuthHandler } from './types.js';

/**
 * Token revocation (RFC 7009). Unknown tokens and tokens of other clients
 * are answered with 200 like revoked ones.
 */
export const RevokeTokenHandler: OAuthHandler = async (c) => {
  try {
    const provider = c.get('oauthProvider');
    const params = await readFormParams(c);
    const client = await authenticateClient(provider, params, c.req.header('Authorization'));

    const token = param(params, 'token');
    if (!token) {
      throw new InvalidRequestError('token is required');
    }

    const accessToken = await provider.loadAccessToken(token);
    if (accessToken && accessToken.client_id === client.client_id) {
      await provider.revokeToken(accessToken);
    } else {
      const refreshToken = await provider.loadRefreshToken(client, token);
      if (refreshToken) {
        await provider.revokeToken(refreshToken);
      }
    }

    return c.json({}, 200);
  } catch (error) {
    return oauthErrorResponse(c, error, 'Token revocation error');
  }
};
