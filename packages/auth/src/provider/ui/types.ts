/**
 * Scope information for display in consent UI
 */
export interface ScopeInfo {
  /** Scope identifier */
  scope: string;
  /** Description of what this scope grants access to */
  description: string;
}

/**
 * Data required to render the consent page
 */
export interface ConsentPageData {
  /** Transaction id posted back with the decision */
  tx: string;
  clientId: string;
  /** Registered client name, when the client gave one */
  clientName?: string;
  redirectUri: string;
  /** Resolved scopes, in grant order */
  scopes: string[];
  /** What the client is asking to access */
  serviceName: string;
  /** Inline error shown above the form */
  error?: string;
}
