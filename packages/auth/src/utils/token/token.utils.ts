/**
 * Credential generation and clock helpers
 */

import { randomBytes } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import { generateSecureToken } from './generate-secure-token.js';
import { extractBearerToken } from './extract-bearer-token.js';

export class TokenUtils {
  public static generateSecureToken = generateSecureToken;
  public static extractBearerToken = extractBearerToken;

  public static generateAuthorizationCode(): string {
    return generateSecureToken(32);
  }

  public static generateAccessToken(): string {
    return generateSecureToken(48);
  }

  public static generateRefreshToken(): string {
    return generateSecureToken(48);
  }

  /** Key of a pending consent transaction */
  public static generateTransactionId(): string {
    return generateSecureToken(32);
  }

  public static generateClientId(): string {
    return uuidv4();
  }

  public static generateClientSecret(): string {
    return randomBytes(32).toString('hex');
  }

  /** Current time in whole unix seconds, for wire fields such as `client_id_issued_at` */
  public static getCurrentTimestamp(): number {
    return Math.floor(Date.now() / 1000);
  }

  /** Current time in unix seconds with millisecond precision, for deadlines */
  public static getCurrentTime(): number {
    return Date.now() / 1000;
  }

  /**
   * Whether a deadline has passed. A deadline equal to now is still valid,
   * and `null` never expires.
   */
  public static isExpired(expiresAt: number | null): boolean {
    if (expiresAt === null) {
      return false;
    }
    return TokenUtils.getCurrentTime() > expiresAt;
  }
}

export { generateSecureToken } from './generate-secure-token.js';
export { extractBearerToken } from './extract-bearer-token.js';
