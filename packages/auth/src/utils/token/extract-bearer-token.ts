/**
 * Extracts the token from an `Authorization: Bearer <token>` header value.
 * @returns The token, or null when the header is absent or uses another scheme
 */
export function extractBearerToken(authHeader: string | undefined | null): string | null {
  if (!authHeader) {
    return null;
  }

  const match = /^Bearer\s+(\S+)\s*$/i.exec(authHeader);
  return match ? match[1] : null;
}
