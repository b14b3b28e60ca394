/**
 * Token endpoint success response (RFC 6749 section 5.1)
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  /** Access token lifetime in seconds */
  expires_in: number;
  refresh_token: string;
  /** Granted scopes, space separated */
  scope: string;
}
