/**
 * Authorization code with associated metadata
 */
export interface AuthorizationCode {
  /** The authorization code value */
  code: string;
  /** Client ID that requested this code */
  client_id: string;
  /** Scopes granted */
  scopes: string[];
  /** When the code expires */
  expires_at: number;
  /** PKCE code challenge */
  code_challenge: string;
  /** Redirect URI used in the authorization request */
  redirect_uri: string;
  redirect_uri_provided_explicitly: boolean;
  resource?: string;
}
