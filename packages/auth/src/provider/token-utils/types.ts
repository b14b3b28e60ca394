/**
 * Lifetimes, in seconds, of the artifacts the grant exchanger issues
 */
export interface TokenLifetimes {
  authCodeTtlSeconds: number;
  accessTokenTtlSeconds: number;
  /** null issues refresh tokens that never expire */
  refreshTokenTtlSeconds: number | null;
}
