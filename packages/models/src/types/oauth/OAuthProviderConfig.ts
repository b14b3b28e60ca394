/**
 * Dynamic client registration policy
 */
export interface ClientRegistrationOptions {
  enabled: boolean;
  /** Lifetime of issued client secrets; omitted means they never expire */
  clientSecretExpirySeconds?: number;
  /** When non-empty, the only scopes clients may be granted */
  validScopes?: string[];
  /** Scopes used when neither the request nor the client names any */
  defaultScopes?: string[];
}

export interface RevocationOptions {
  enabled: boolean;
}

/**
 * Local OAuth provider configuration
 */
export interface LocalOAuthProviderConfig {
  /** Public base URL of the server; the consent page lives under it */
  baseUrl: string;
  /** Authorization server issuer identifier (defaults to baseUrl) */
  issuerUrl?: string;
  serviceDocumentationUrl?: string;
  clientRegistrationOptions?: ClientRegistrationOptions;
  revocationOptions?: RevocationOptions;
  /** Scopes every grant carries and every protected request needs */
  requiredScopes?: string[];
  /** Shared password the operator types to approve a request */
  consentPassword: string;
  /** JSON file registered clients are persisted to */
  clientStorePath: string;
  /** What the consent page says the client wants access to */
  serviceName?: string;
  /** Pending consent lifetime in seconds (default 600, minimum 60) */
  pendingTtlSeconds?: number;
  /** Authorization code lifetime in seconds (default 600, minimum 60) */
  authCodeTtlSeconds?: number;
  /** Access token lifetime in seconds (default 3600, minimum 300) */
  accessTokenTtlSeconds?: number;
  /** Refresh token lifetime in seconds (default 7 days, null means never) */
  refreshTokenTtlSeconds?: number | null;
}

/**
 * Provider settings the HTTP layer needs to build the standard endpoints
 */
export interface OAuthProviderSettings {
  baseUrl: string;
  issuerUrl: string;
  serviceDocumentationUrl?: string;
  clientRegistrationOptions: ClientRegistrationOptions;
  revocationOptions: RevocationOptions;
  requiredScopes: string[];
}
