/**
 * Refresh token with metadata
 */
export interface RefreshToken {
  kind: 'refresh_token';
  /** The refresh token value */
  token: string;
  /** Client ID that owns this token */
  client_id: string;
  /** Scopes this refresh token can grant */
  scopes: string[];
  /** When the token expires (null means never) */
  expires_at: number | null;
}
