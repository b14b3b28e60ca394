/**
 * Tests for FileClientRegistry persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { FileClientRegistry } from '../storage/file-client-registry.js';
import { OauthTestUtils } from './test-utils.js';

describe('FileClientRegistry', () => {
  let dir: string;
  let storePath: string;

  beforeEach(() => {
    dir = OauthTestUtils.createTempDir();
    storePath = join(dir, 'oauth_clients.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    const registry = new FileClientRegistry(storePath);

    expect(registry.size).toBe(0);
    expect(registry.get('client-a')).toBeNull();
    expect(existsSync(storePath)).toBe(false);
  });

  it('creates missing parent directories', () => {
    const nested = join(dir, 'state', 'oauth', 'clients.json');

    new FileClientRegistry(nested);

    expect(existsSync(join(dir, 'state', 'oauth'))).toBe(true);
  });

  it('writes registrations as a pretty-printed JSON array', async () => {
    const registry = new FileClientRegistry(storePath);
    const client = OauthTestUtils.createClient();

    await registry.register(client);

    const written = readFileSync(storePath, 'utf-8');
    expect(written).toBe(JSON.stringify([client], null, 2));
  });

  it('reloads registrations written by an earlier instance', async () => {
    const first = new FileClientRegistry(storePath);
    const client = OauthTestUtils.createClient({ scope: 'mail calendar' });
    await first.register(client);

    const second = new FileClientRegistry(storePath);

    expect(second.get('client-a')).toEqual(client);
  });

  it('overwrites an existing registration with the same client_id', async () => {
    const registry = new FileClientRegistry(storePath);
    await registry.register(OauthTestUtils.createClient());
    await registry.register(OauthTestUtils.createClient({ client_name: 'Renamed' }));

    expect(registry.size).toBe(1);
    expect(registry.get('client-a')?.client_name).toBe('Renamed');
    expect(new FileClientRegistry(storePath).get('client-a')?.client_name).toBe('Renamed');
  });

  it('returns copies so callers cannot change stored clients', async () => {
    const registry = new FileClientRegistry(storePath);
    await registry.register(OauthTestUtils.createClient());

    const fetched = registry.get('client-a');
    if (fetched) {
      fetched.client_name = 'Tampered';
    }

    expect(registry.get('client-a')?.client_name).toBe('Client A');
  });

  it('skips invalid records and loads the rest', () => {
    const valid = OauthTestUtils.createClient();
    writeFileSync(
      storePath,
      JSON.stringify([
        { client_id: 'missing-redirects', client_name: 'Broken' },
        valid,
        { client_id: 'bad-redirect', redirect_uris: ['not a url'] },
        'not-an-object',
      ]),
    );

    const registry = new FileClientRegistry(storePath);

    expect(registry.size).toBe(1);
    expect(registry.get('client-a')).toEqual(valid);
    expect(registry.get('missing-redirects')).toBeNull();
  });

  it('starts empty when the file is not valid JSON', () => {
    writeFileSync(storePath, '{ this is not json');

    expect(new FileClientRegistry(storePath).size).toBe(0);
  });

  it('starts empty when the file is not an array', () => {
    writeFileSync(storePath, JSON.stringify({ client_id: 'client-a' }));

    expect(new FileClientRegistry(storePath).size).toBe(0);
  });

  it('keeps every client when registrations run concurrently', async () => {
    const registry = new FileClientRegistry(storePath);
    const ids = ['c1', 'c2', 'c3', 'c4', 'c5'];

    await Promise.all(
      ids.map((id) => registry.register(OauthTestUtils.createClient({ client_id: id }))),
    );

    const persisted: unknown = JSON.parse(readFileSync(storePath, 'utf-8'));
    expect(Array.isArray(persisted)).toBe(true);
    expect(new FileClientRegistry(storePath).list().map((client) => client.client_id)).toEqual(ids);
  });

  it('rejects and leaves the registry unchanged when the file cannot be written', async () => {
    // A directory where the file should be makes both the read and the write fail
    mkdirSync(storePath);
    const registry = new FileClientRegistry(storePath);

    await expect(registry.register(OauthTestUtils.createClient())).rejects.toThrow();
    expect(registry.get('client-a')).toBeNull();
  });
});
