import {
  type ClientRegistration,
  OAuthErrorCodes,
  type RefreshToken,
  type TokenResponse,
} from '@courier-mcp/models';
import { createLogger } from '@courier-mcp/core';
import { OAuthUtils } from '../../utils/index.js';
import { TokenError } from '../../errors/oauth-errors.js';
import type { MemoryTokenStore } from '../storage/memory-token-store.js';
import { issueTokenPair } from './issueTokenPair.js';
import type { TokenLifetimes } from './types.js';

const logger = createLogger('oauth:grant');

/**
 * Rotates a refresh token: the presented token is removed and a new pair is
 * issued for the requested scopes.
 * @throws TokenError invalid_scope when a requested scope was not granted
 * @throws TokenError invalid_grant when the refresh token is already gone
 */
export const exchangeRefreshToken = (
  store: MemoryTokenStore,
  lifetimes: TokenLifetimes,
  client: ClientRegistration,
  refreshToken: RefreshToken,
  scopes: string[],
): TokenResponse => {
  if (!OAuthUtils.isSubset(scopes, refreshToken.scopes)) {
    logger.warn(
      {
        client_id: client.client_id,
        excess: OAuthUtils.missingScopes(scopes, refreshToken.scopes),
      },
      'Refresh requested scopes beyond the original grant',
    );
    throw new TokenError(
      OAuthErrorCodes.INVALID_SCOPE,
      'Requested scopes exceed the scope granted by the refresh token.',
    );
  }

  if (
    refreshToken.client_id !== client.client_id ||
    !store.deleteRefreshToken(refreshToken.token)
  ) {
    throw new TokenError(OAuthErrorCodes.INVALID_GRANT, 'Refresh token not found or already used.');
  }

  return issueTokenPair(store, lifetimes, client.client_id, scopes);
};
