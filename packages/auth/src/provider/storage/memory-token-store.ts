/**
 * In-memory storage for authorization codes, access tokens and refresh tokens.
 * Nothing here survives a restart.
 *
 * Reads purge expired entries and report them as absent. Records are copied
 * on save and on read, so callers never share the stored scope lists.
 */
import type { AccessToken, AuthorizationCode, RefreshToken } from '@courier-mcp/models';
import { TokenUtils } from '../../utils/index.js';

const copyRecord = <T extends { scopes: string[] }>(record: T): T => ({
  ...record,
  scopes: [...record.scopes],
});

export class MemoryTokenStore {
  private authorizationCodes = new Map<string, AuthorizationCode>();
  private accessTokens = new Map<string, AccessToken>();
  private refreshTokens = new Map<string, RefreshToken>();

  // Authorization codes
  public saveAuthorizationCode(code: AuthorizationCode): void {
    this.authorizationCodes.set(code.code, copyRecord(code));
  }

  public getAuthorizationCode(code: string): AuthorizationCode | null {
    const record = this.authorizationCodes.get(code);
    if (!record) {
      return null;
    }
    if (TokenUtils.isExpired(record.expires_at)) {
      this.authorizationCodes.delete(code);
      return null;
    }
    return copyRecord(record);
  }

  /** Returns false when the code was not stored, e.g. already exchanged */
  public deleteAuthorizationCode(code: string): boolean {
    return this.authorizationCodes.delete(code);
  }

  // Access tokens
  public saveAccessToken(token: AccessToken): void {
    this.accessTokens.set(token.token, copyRecord(token));
  }

  public getAccessToken(token: string): AccessToken | null {
    const record = this.accessTokens.get(token);
    if (!record) {
      return null;
    }
    if (TokenUtils.isExpired(record.expires_at)) {
      this.accessTokens.delete(token);
      return null;
    }
    return copyRecord(record);
  }

  public deleteAccessToken(token: string): boolean {
    return this.accessTokens.delete(token);
  }

  // Refresh tokens
  public saveRefreshToken(token: RefreshToken): void {
    this.refreshTokens.set(token.token, copyRecord(token));
  }

  public getRefreshToken(token: string): RefreshToken | null {
    const record = this.refreshTokens.get(token);
    if (!record) {
      return null;
    }
    if (TokenUtils.isExpired(record.expires_at)) {
      this.refreshTokens.delete(token);
      return null;
    }
    return copyRecord(record);
  }

  public deleteRefreshToken(token: string): boolean {
    return this.refreshTokens.delete(token);
  }
}
