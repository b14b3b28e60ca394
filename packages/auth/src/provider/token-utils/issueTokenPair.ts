import type { TokenResponse } from '@courier-mcp/models';
import { OAuthUtils } from '../../utils/index.js';
import type { MemoryTokenStore } from '../storage/memory-token-store.js';
import { generateAccessTokenRecord, generateRefreshTokenRecord } from './generateTokenRecords.js';
import type { TokenLifetimes } from './types.js';

/**
 * Stores a fresh access/refresh token pair and builds the token response
 */
export const issueTokenPair = (
  store: MemoryTokenStore,
  lifetimes: TokenLifetimes,
  clientId: string,
  scopes: string[],
  resource?: string,
): TokenResponse => {
  const accessToken = generateAccessTokenRecord(
    clientId,
    scopes,
    lifetimes.accessTokenTtlSeconds,
    resource,
  );
  const refreshToken = generateRefreshTokenRecord(
    clientId,
    scopes,
    lifetimes.refreshTokenTtlSeconds,
  );

  store.saveAccessToken(accessToken);
  store.saveRefreshToken(refreshToken);

  return {
    access_token: accessToken.token,
    token_type: 'Bearer',
    expires_in: lifetimes.accessTokenTtlSeconds,
    refresh_token: refreshToken.token,
    scope: OAuthUtils.formatScopes(scopes),
  };
};
