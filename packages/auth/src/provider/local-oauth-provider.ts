/**
 * Self-hosted OAuth 2.1 authorization server for a single operator.
 *
 * Clients register dynamically and are persisted to a JSON file. Every
 * authorization goes through a consent page protected by one shared password.
 * Codes, tokens and pending consents are kept in memory only.
 */

import type {
  AccessToken,
  AuthorizationCode,
  AuthorizationParams,
  ClientRegistration,
  IOAuthAuthorizationProvider,
  LocalOAuthProviderConfig,
  OAuthProviderSettings,
  ProviderRoute,
  RefreshToken,
  TokenResponse,
} from '@courier-mcp/models';
import { ConfigurationError } from '../errors/oauth-errors.js';
import { FileClientRegistry } from './storage/file-client-registry.js';
import { MemoryTokenStore } from './storage/memory-token-store.js';
import { PendingAuthorizationStore } from './storage/pending-authorization-store.js';
import { resolveScopes, type ScopePolicy } from './scope/resolve-scopes.js';
import { GrantExchanger, type TokenLifetimes } from './token-utils/index.js';
import { ConsentController } from './consent/consent-controller.js';
import { DEFAULT_SERVICE_NAME } from './ui/consent-template.js';

export const CONSENT_PATH = '/oauth/consent';

export const TokenLifetimeDefaults = {
  PENDING_TTL: 600,
  PENDING_TTL_MIN: 60,
  AUTH_CODE_TTL: 600,
  AUTH_CODE_TTL_MIN: 60,
  ACCESS_TOKEN_TTL: 3600,
  ACCESS_TOKEN_TTL_MIN: 300,
  REFRESH_TOKEN_TTL: 7 * 24 * 3600,
} as const;

const atLeast = (value: number | undefined, fallback: number, minimum: number): number =>
  Math.max(Math.floor(value ?? fallback), minimum);

/**
 * @example
 * ```typescript
 * const provider = new LocalOAuthProvider({
 *   baseUrl: 'http://127.0.0.1:8000',
 *   consentPassword: process.env.OAUTH_CONSENT_PASSWORD ?? '',
 *   clientStorePath: '.data/oauth_clients.json',
 *   requiredScopes: ['mail'],
 * });
 * ```
 * @public
 */
export class LocalOAuthProvider implements IOAuthAuthorizationProvider {
  public readonly settings: OAuthProviderSettings;

  private readonly clients: FileClientRegistry;
  private readonly pending: PendingAuthorizationStore;
  private readonly tokens = new MemoryTokenStore();
  private readonly grants: GrantExchanger;
  private readonly consent: ConsentController;
  private readonly scopePolicy: ScopePolicy;

  /**
   * @throws ConfigurationError when the consent password is missing or empty
   */
  public constructor(config: LocalOAuthProviderConfig) {
    if (!config.consentPassword) {
      throw new ConfigurationError(
        'A consent password is required to approve authorization requests',
      );
    }

    const clientRegistrationOptions = config.clientRegistrationOptions ?? { enabled: true };
    this.settings = {
      baseUrl: config.baseUrl,
      issuerUrl: config.issuerUrl ?? config.baseUrl,
      serviceDocumentationUrl: config.serviceDocumentationUrl,
      clientRegistrationOptions,
      revocationOptions: config.revocationOptions ?? { enabled: true },
      requiredScopes: config.requiredScopes ?? [],
    };
    this.scopePolicy = {
      validScopes: clientRegistrationOptions.validScopes ?? [],
      defaultScopes: clientRegistrationOptions.defaultScopes ?? [],
      requiredScopes: this.settings.requiredScopes,
    };

    const lifetimes: TokenLifetimes = {
      authCodeTtlSeconds: atLeast(
        config.authCodeTtlSeconds,
        TokenLifetimeDefaults.AUTH_CODE_TTL,
        TokenLifetimeDefaults.AUTH_CODE_TTL_MIN,
      ),
      accessTokenTtlSeconds: atLeast(
        config.accessTokenTtlSeconds,
        TokenLifetimeDefaults.ACCESS_TOKEN_TTL,
        TokenLifetimeDefaults.ACCESS_TOKEN_TTL_MIN,
      ),
      refreshTokenTtlSeconds:
        config.refreshTokenTtlSeconds === null
          ? null
          : Math.floor(config.refreshTokenTtlSeconds ?? TokenLifetimeDefaults.REFRESH_TOKEN_TTL),
    };

    this.clients = new FileClientRegistry(config.clientStorePath);
    this.pending = new PendingAuthorizationStore(
      atLeast(
        config.pendingTtlSeconds,
        TokenLifetimeDefaults.PENDING_TTL,
        TokenLifetimeDefaults.PENDING_TTL_MIN,
      ),
    );
    this.grants = new GrantExchanger(this.tokens, lifetimes);
    this.consent = new ConsentController({
      pending: this.pending,
      grants: this.grants,
      consentPassword: config.consentPassword,
      serviceName: config.serviceName ?? DEFAULT_SERVICE_NAME,
    });
  }

  public async getClient(clientId: string): Promise<ClientRegistration | null> {
    return this.clients.get(clientId);
  }

  public async registerClient(client: ClientRegistration): Promise<void> {
    await this.clients.register(client);
  }

  public async authorize(client: ClientRegistration, params: AuthorizationParams): Promise<string> {
    const scopes = resolveScopes(client, params.scopes, this.scopePolicy);
    const tx = this.pending.create(client, params, scopes);
    const consentUrl = new URL(`${this.settings.baseUrl.replace(/\/+$/, '')}${CONSENT_PATH}`);
    consentUrl.searchParams.set('tx', tx);
    return consentUrl.toString();
  }

  public async loadAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: string,
  ): Promise<AuthorizationCode | null> {
    return this.grants.loadAuthorizationCode(client, authorizationCode);
  }

  public async exchangeAuthorizationCode(
    client: ClientRegistration,
    authorizationCode: AuthorizationCode,
  ): Promise<TokenResponse> {
    return this.grants.exchangeAuthorizationCode(client, authorizationCode);
  }

  public async loadRefreshToken(
    client: ClientRegistration,
    refreshToken: string,
  ): Promise<RefreshToken | null> {
    return this.grants.loadRefreshToken(client, refreshToken);
  }

  public async exchangeRefreshToken(
    client: ClientRegistration,
    refreshToken: RefreshToken,
    scopes: string[],
  ): Promise<TokenResponse> {
    return this.grants.exchangeRefreshToken(client, refreshToken, scopes);
  }

  public async loadAccessToken(token: string): Promise<AccessToken | null> {
    return this.grants.loadAccessToken(token);
  }

  public async revokeToken(token: AccessToken | RefreshToken): Promise<void> {
    this.grants.revokeToken(token);
  }

  public getRoutes(): ProviderRoute[] {
    return [
      {
        path: CONSENT_PATH,
        methods: ['GET', 'POST'],
        handler: (request) => this.consent.handle(request),
      },
    ];
  }
}
