import type { ClientRegistration } from './ClientRegistration.js';
import type { AuthorizationParams } from './AuthorizationParams.js';

/**
 * Authorization request awaiting the operator's consent decision
 */
export interface PendingAuthorization {
  client: ClientRegistration;
  params: AuthorizationParams;
  /** Scopes resolved for this request */
  scopes: string[];
  /** When the request was received (unix seconds, millisecond precision) */
  created_at: number;
}
