/**
 * Splits a space-delimited scope string (RFC 6749 section 3.3) into scopes.
 * @example
 * ```typescript
 * parseScopes('mail  calendar') // => ['mail', 'calendar']
 * parseScopes(undefined)        // => []
 * ```
 */
export function parseScopes(scope?: string | null): string[] {
  if (!scope) return [];
  return scope.split(/\s+/).filter(Boolean);
}
