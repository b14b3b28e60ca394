import type {
  AuthorizationParams,
  ClientRegistration,
  PendingAuthorization,
} from '@courier-mcp/models';
import { TokenUtils } from '../../utils/index.js';

/**
 * Authorization requests waiting for the operator's decision, keyed by
 * transaction id. Records older than the TTL are dropped when read.
 */
export class PendingAuthorizationStore {
  private pending = new Map<string, PendingAuthorization>();

  public constructor(private readonly ttlSeconds: number) {}

  /** Stores a new request and returns its transaction id */
  public create(client: ClientRegistration, params: AuthorizationParams, scopes: string[]): string {
    const tx = TokenUtils.generateTransactionId();
    this.pending.set(tx, {
      client,
      params,
      scopes,
      created_at: TokenUtils.getCurrentTime(),
    });
    return tx;
  }

  public get(tx: string): PendingAuthorization | null {
    const record = this.pending.get(tx);
    if (!record) {
      return null;
    }

    if (TokenUtils.getCurrentTime() - record.created_at > this.ttlSeconds) {
      this.pending.delete(tx);
      return null;
    }

    return record;
  }

  /**
   * Removes and returns a live record. Of two callers racing for the same
   * transaction only one receives it.
   */
  public take(tx: string): PendingAuthorization | null {
    const record = this.get(tx);
    if (!record || !this.pending.delete(tx)) {
      return null;
    }
    return record;
  }

  public get size(): number {
    return this.pending.size;
  }
}
