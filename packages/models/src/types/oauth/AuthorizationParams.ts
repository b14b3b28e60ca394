/**
 * Validated parameters of an authorization request, as handed to the provider
 */
export interface AuthorizationParams {
  /** Opaque client state echoed back on the redirect */
  state?: string;
  /** Scopes listed on the request, or null when the request listed none */
  scopes: string[] | null;
  /** PKCE S256 code challenge */
  code_challenge: string;
  /** Redirect URI the response goes to */
  redirect_uri: string;
  /** Whether the client sent redirect_uri itself rather than relying on its single registered one */
  redirect_uri_provided_explicitly: boolean;
  /** RFC 8707 resource indicator */
  resource?: string;
}
