import type {
  AccessToken,
  AuthorizationCode,
  ClientRegistration,
  PendingAuthorization,
  RefreshToken,
  TokenResponse,
} from '@courier-mcp/models';
import type { MemoryTokenStore } from '../storage/memory-token-store.js';
import { exchangeAuthorizationCode } from './exchangeAuthorizationCode.js';
import { exchangeRefreshToken } from './exchangeRefreshToken.js';
import { generateAuthorizationCodeRecord } from './generateTokenRecords.js';
import type { TokenLifetimes } from './types.js';

export type { TokenLifetimes } from './types.js';
export { issueTokenPair } from './issueTokenPair.js';

/**
 * Issues, looks up, exchanges and revokes codes and tokens.
 *
 * Client-bound lookups treat a record issued to another client as absent.
 */
export class GrantExchanger {
  public constructor(
    private readonly store: MemoryTokenStore,
    private readonly lifetimes: TokenLifetimes,
  ) {}

  /** Mints and stores the code for an approved authorization */
  public mintAuthorizationCode(pending: PendingAuthorization): AuthorizationCode {
    const code = generateAuthorizationCodeRecord(pending, this.lifetimes.authCodeTtlSeconds);
    this.store.saveAuthorizationCode(code);
    return code;
  }

  public loadAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: string,
  ): AuthorizationCode | null {
    const code = this.store.getAuthorizationCode(authorizationCode);
    if (!code || code.client_id !== client.client_id) {
      return null;
    }
    return code;
  }

  public exchangeAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: AuthorizationCode,
  ): TokenResponse {
    return exchangeAuthorizationCode(this.store, this.lifetimes, client, authorizationCode);
  }

  public loadRefreshToken(client: ClientRegistration, refreshToken: string): RefreshToken | null {
    const token = this.store.getRefreshToken(refreshToken);
    if (!token || token.client_id !== client.client_id) {
      return null;
    }
    return token;
  }

  public exchangeRefreshToken(
    client: ClientRegistration,
    refreshToken: RefreshToken,
    scopes: string[],
  ): TokenResponse {
    return exchangeRefreshToken(this.store, this.lifetimes, client, refreshToken, scopes);
  }

  public loadAccessToken(token: string): AccessToken | null {
    return this.store.getAccessToken(token);
  }

  /** Idempotent: revoking a token that is already gone is a no-op */
  public revokeToken(token: AccessToken | RefreshToken): void {
    if (token.kind === 'access_token') {
      this.store.deleteAccessToken(token.token);
    } else {
      this.store.deleteRefreshToken(token.token);
    }
  }
}
