/**
 * Client registry backed by a JSON file.
 *
 * Registrations live in memory for lookups and are written through to disk on
 * every change, so they survive restarts. The file holds a pretty-printed JSON
 * array with one object per client.
 */
import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ClientRegistration } from '@courier-mcp/models';
import { AsyncLock, createLogger } from '@courier-mcp/core';
import { ClientInformationSchema, formatZodIssues } from '../../schemas.js';

const logger = createLogger('oauth:client-registry');

export class FileClientRegistry {
  private readonly clients = new Map<string, ClientRegistration>();
  private readonly lock = new AsyncLock();

  public constructor(private readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
    this.load();
  }

  public get(clientId: string): ClientRegistration | null {
    const client = this.clients.get(clientId);
    return client ? { ...client } : null;
  }

  /**
   * Inserts or replaces a client and persists the whole registry.
   * Rejects with the write error if the file cannot be written, in which
   * case the in-memory registry is left unchanged.
   */
  public async register(client: ClientRegistration): Promise<void> {
    await this.lock.runExclusive(async () => {
      const next = new Map(this.clients);
      next.set(client.client_id, { ...client });

      await writeFile(this.filePath, JSON.stringify(Array.from(next.values()), null, 2), 'utf-8');

      this.clients.set(client.client_id, { ...client });
      logger.info({ client_id: client.client_id, client_name: client.client_name }, 'Client registered');
    });
  }

  public get size(): number {
    return this.clients.size;
  }

  public list(): ClientRegistration[] {
    return Array.from(this.clients.values(), (client) => ({ ...client }));
  }

  private load(): void {
    if (!existsSync(this.filePath)) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      logger.warn(
        { path: this.filePath, error: error instanceof Error ? error.message : String(error) },
        'Client store is not valid JSON; starting with no clients',
      );
      return;
    }

    if (!Array.isArray(raw)) {
      logger.warn({ path: this.filePath }, 'Client store is not a JSON array; starting with no clients');
      return;
    }

    raw.forEach((entry: unknown, index: number) => {
      const parsed = ClientInformationSchema.safeParse(entry);
      if (!parsed.success) {
        logger.warn(
          { path: this.filePath, index, issues: formatZodIssues(parsed.error) },
          'Skipping invalid client record',
        );
        return;
      }
      this.clients.set(parsed.data.client_id, parsed.data);
    });

    logger.debug({ path: this.filePath, count: this.clients.size }, 'Loaded registered clients');
  }
}
