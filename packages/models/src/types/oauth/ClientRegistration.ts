import type { TokenEndpointAuthMethod } from '../../enums/auth.js';

/**
 * OAuth client metadata as submitted to the registration endpoint (RFC 7591 section 2)
 */
export interface ClientMetadata {
  /** Valid redirect URIs for this client */
  redirect_uris: string[];
  /** How the client authenticates at the token endpoint */
  token_endpoint_auth_method?: TokenEndpointAuthMethod;
  /** Grant types this client is allowed to use */
  grant_types?: string[];
  /** Response types this client can request */
  response_types?: string[];
  /** Client name for display purposes */
  client_name?: string;
  client_uri?: string;
  logo_uri?: string;
  /** Space separated scopes this client may request */
  scope?: string;
  contacts?: string[];
  tos_uri?: string;
  policy_uri?: string;
  software_id?: string;
  software_version?: string;
}

/**
 * Registered OAuth client: metadata plus the credentials issued at registration
 */
export interface ClientRegistration extends ClientMetadata {
  /** Unique client identifier */
  client_id: string;
  /** Client secret (absent for public clients) */
  client_secret?: string;
  /** When the client was registered */
  client_id_issued_at?: number;
  /** When the client secret expires (absent or 0 means never) */
  client_secret_expires_at?: number;
}
