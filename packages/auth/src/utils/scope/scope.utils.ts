/**
 * OAuth scope helpers: parse the wire format, format it back, compare sets.
 * @example
 * ```typescript
 * ScopeUtils.parseScopes('mail calendar');      // => ['mail', 'calendar']
 * ScopeUtils.formatScopes(['mail', 'calendar']); // => 'mail calendar'
 * ScopeUtils.isSubset(['mail'], ['mail', 'calendar']); // => true
 * ```
 * @public
 */

import { parseScopes } from './parse-scopes.js';

export class ScopeUtils {
  public static parseScopes = parseScopes;

  public static formatScopes(scopes: string[]): string {
    return scopes.join(' ');
  }

  /** Whether every requested scope is among the granted ones */
  public static isSubset(requested: string[], granted: string[]): boolean {
    const grantedSet = new Set(granted);
    return requested.every((scope) => grantedSet.has(scope));
  }

  /** The requested scopes that are not granted, in request order */
  public static missingScopes(requested: string[], granted: string[]): string[] {
    const grantedSet = new Set(granted);
    return requested.filter((scope) => !grantedSet.has(scope));
  }
}

export { parseScopes } from './parse-scopes.js';
