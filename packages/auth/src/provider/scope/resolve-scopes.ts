import type { ClientRegistration } from '@courier-mcp/models';
import { ScopeUtils } from '../../utils/index.js';

export interface ScopePolicy {
  /** When non-empty, scopes outside this list are dropped */
  validScopes: string[];
  defaultScopes: string[];
  /** Always granted, appended after the resolved scopes */
  requiredScopes: string[];
}

/**
 * Works out which scopes an authorization request ends up with.
 *
 * Takes the first available source: the scopes listed on the request (an
 * empty list counts), the client's registered scope, the policy defaults.
 * The result is narrowed to the valid scopes and the required scopes missing
 * from it are appended. Order is preserved throughout.
 * @example
 * ```typescript
 * resolveScopes(client, ['mail'], {
 *   validScopes: [],
 *   defaultScopes: [],
 *   requiredScopes: ['calendar'],
 * }); // => ['mail', 'calendar']
 * ```
 */
export function resolveScopes(
  client: ClientRegistration,
  requested: string[] | null,
  policy: ScopePolicy,
): string[] {
  let scopes: string[];
  if (requested !== null) {
    scopes = [...requested];
  } else if (client.scope) {
    scopes = ScopeUtils.parseScopes(client.scope);
  } else {
    scopes = [...policy.defaultScopes];
  }

  if (policy.validScopes.length > 0) {
    const valid = new Set(policy.validScopes);
    scopes = scopes.filter((scope) => valid.has(scope));
  }

  for (const required of policy.requiredScopes) {
    if (!scopes.includes(required)) {
      scopes.push(required);
    }
  }

  return scopes;
}
