import type { AccessToken } from './AccessToken.js';
import type { AuthorizationCode } from './AuthorizationCode.js';
import type { AuthorizationParams } from './AuthorizationParams.js';
import type { ClientRegistration } from './ClientRegistration.js';
import type { OAuthProviderSettings } from './OAuthProviderConfig.js';
import type { RefreshToken } from './RefreshToken.js';
import type { TokenResponse } from './TokenResponse.js';

export type HttpMethod = 'GET' | 'POST';

/**
 * Route contributed by a provider, expressed with Fetch API types so any
 * HTTP layer can mount it.
 */
export interface ProviderRoute {
  path: string;
  methods: HttpMethod[];
  handler: (request: Request) => Promise<Response>;
}

/**
 * Capabilities an authorization backend offers to the HTTP layer.
 *
 * Lookups resolve to null for unknown, expired or foreign records.
 * Exchange methods reject with a TokenError on grant failures.
 */
export interface IOAuthAuthorizationProvider {
  readonly settings: OAuthProviderSettings;

  getClient(clientId: string): Promise<ClientRegistration | null>;
  registerClient(client: ClientRegistration): Promise<void>;

  /** Starts an authorization and returns the URL the user agent is sent to */
  authorize(client: ClientRegistration, params: AuthorizationParams): Promise<string>;

  loadAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: string,
  ): Promise<AuthorizationCode | null>;
  exchangeAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: AuthorizationCode,
  ): Promise<TokenResponse>;

  loadRefreshToken(client: ClientRegistration, refreshToken: string): Promise<RefreshToken | null>;
  exchangeRefreshToken(
    client: ClientRegistration,
    refreshToken: RefreshToken,
    scopes: string[],
  ): Promise<TokenResponse>;

  loadAccessToken(token: string): Promise<AccessToken | null>;
  revokeToken(token: AccessToken | RefreshToken): Promise<void>;

  getRoutes(): ProviderRoute[];
}
