import {
  type AuthorizationCode,
  type ClientRegistration,
  OAuthErrorCodes,
  type TokenResponse,
} from '@courier-mcp/models';
import { createLogger } from '@courier-mcp/core';
import { TokenError } from '../../errors/oauth-errors.js';
import type { MemoryTokenStore } from '../storage/memory-token-store.js';
import { issueTokenPair } from './issueTokenPair.js';
import type { TokenLifetimes } from './types.js';

const logger = createLogger('oauth:grant');

/**
 * Trades an authorization code for a token pair. The code is deleted before
 * anything is issued, so a second exchange of the same code fails.
 * @throws TokenError invalid_grant when the code is no longer stored
 */
export const exchangeAuthorizationCode = (
  store: MemoryTokenStore,
  lifetimes: TokenLifetimes,
  client: ClientRegistration,
  authorizationCode: AuthorizationCode,
): TokenResponse => {
  if (
    authorizationCode.client_id !== client.client_id ||
    !store.deleteAuthorizationCode(authorizationCode.code)
  ) {
    logger.warn({ client_id: client.client_id }, 'Authorization code reuse or unknown code');
    throw new TokenError(
      OAuthErrorCodes.INVALID_GRANT,
      'Authorization code not found or already used.',
    );
  }

  return issueTokenPair(
    store,
    lifetimes,
    client.client_id,
    authorizationCode.scopes,
    authorizationCode.resource,
  );
};
