/**
 * Access token with metadata
 */
export interface AccessToken {
  kind: 'access_token';
  /** The access token value */
  token: string;
  /** Client ID that owns this token */
  client_id: string;
  /** Scopes granted to this token */
  scopes: string[];
  /** When the token expires */
  expires_at: number;
  resource?: string;
}
