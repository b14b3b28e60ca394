/**
 * Appends parameters to a client redirect URI, keeping the query it already has.
 * Parameters whose value is undefined are left out.
 * @example
 * ```typescript
 * constructRedirectUri('https://cb/?app=1', { code: 'abc', state: undefined });
 * // => 'https://cb/?app=1&code=abc'
 * ```
 */
export function constructRedirectUri(
  baseUri: string,
  params: Record<string, string | undefined>,
): string {
  const url = new URL(baseUri);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.append(key, value);
    }
  }
  return url.toString();
}
