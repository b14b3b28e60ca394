import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ClientRegistration } from '@courier-mcp/models';
import { TokenError } from '../../errors/oauth-errors.js';
import { OauthTestUtils, type OAuthTestContext } from './test-utils.js';

const START = new Date('2026-03-01T09:00:00Z');
const START_SECONDS = Math.floor(START.getTime() / 1000);
const secondsAfterStart = (seconds: number) => new Date(START.getTime() + seconds * 1000);

describe('LocalOAuthProvider - Grants', () => {
  let context: OAuthTestContext;
  let client: ClientRegistration;
  let otherClient: ClientRegistration;

  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    context = OauthTestUtils.createOAuthProvider();
    client = OauthTestUtils.createClient();
    otherClient = OauthTestUtils.createClient({ client_id: 'client-b', client_name: 'Client B' });
    await context.provider.registerClient(client);
    await context.provider.registerClient(otherClient);
  });

  afterEach(() => {
    vi.useRealTimers();
    context.cleanup();
  });

  const issueTokens = async (scopes: string[] = ['mail', 'calendar']) => {
    const { provider } = context;
    const code = await OauthTestUtils.approve(
      provider,
      client,
      OauthTestUtils.createParams({ scopes }),
    );
    const stored = await provider.loadAuthorizationCode(client, code);
    if (!stored) {
      throw new Error('code not stored');
    }
    return provider.exchangeAuthorizationCode(client, stored);
  };

  describe('Authorization codes', () => {
    it('exchanges a code for a bearer token pair', async () => {
      const tokens = await issueTokens();

      expect(tokens.token_type).toBe('Bearer');
      expect(tokens.expires_in).toBe(3600);
      expect(tokens.scope).toBe('mail calendar');
      expect(tokens.access_token).toMatch(/^[A-Za-z0-9_-]{64}$/);
      expect(tokens.refresh_token).toMatch(/^[A-Za-z0-9_-]{64}$/);
      expect(tokens.access_token).not.toBe(tokens.refresh_token);
    });

    it('allows a code to be exchanged only once', async () => {
      const { provider } = context;
      const code = await OauthTestUtils.approve(provider, client);
      const stored = await provider.loadAuthorizationCode(client, code);
      if (!stored) {
        throw new Error('code not stored');
      }

      await provider.exchangeAuthorizationCode(client, stored);

      expect(await provider.loadAuthorizationCode(client, code)).toBeNull();
      const reuse = provider.exchangeAuthorizationCode(client, stored);
      await expect(reuse).rejects.toBeInstanceOf(TokenError);
      await expect(reuse).rejects.toMatchObject({
        error: 'invalid_grant',
        errorDescription: 'Authorization code not found or already used.',
      });
    });

    it('does not reveal a code to another client', async () => {
      const code = await OauthTestUtils.approve(context.provider, client);

      expect(await context.provider.loadAuthorizationCode(otherClient, code)).toBeNull();
      // Still available to its owner
      expect(await context.provider.loadAuthorizationCode(client, code)).not.toBeNull();
    });

    it('expires codes after the code TTL', async () => {
      const code = await OauthTestUtils.approve(context.provider, client);

      vi.setSystemTime(secondsAfterStart(600));
      expect(await context.provider.loadAuthorizationCode(client, code)).not.toBeNull();

      vi.setSystemTime(secondsAfterStart(601));
      expect(await context.provider.loadAuthorizationCode(client, code)).toBeNull();
    });

    it('expires codes partway through the second after the code TTL', async () => {
      const code = await OauthTestUtils.approve(context.provider, client);

      vi.setSystemTime(secondsAfterStart(600.5));

      expect(await context.provider.loadAuthorizationCode(client, code)).toBeNull();
    });

    it('carries the resource indicator into the access token', async () => {
      const { provider } = context;
      const code = await OauthTestUtils.approve(
        provider,
        client,
        OauthTestUtils.createParams({ resource: 'http://127.0.0.1:8000/mcp' }),
      );
      const stored = await provider.loadAuthorizationCode(client, code);
      if (!stored) {
        throw new Error('code not stored');
      }

      const tokens = await provider.exchangeAuthorizationCode(client, stored);

      expect(await provider.loadAccessToken(tokens.access_token)).toEqual({
        kind: 'access_token',
        token: tokens.access_token,
        client_id: 'client-a',
        scopes: ['mail'],
        expires_at: START_SECONDS + 3600,
        resource: 'http://127.0.0.1:8000/mcp',
      });
    });
  });

  describe('Refresh tokens', () => {
    it('rotates the refresh token on exchange', async () => {
      const { provider } = context;
      const tokens = await issueTokens();
      const refresh = await provider.loadRefreshToken(client, tokens.refresh_token);
      if (!refresh) {
        throw new Error('refresh token not stored');
      }

      const renewed = await provider.exchangeRefreshToken(client, refresh, ['mail']);

      expect(renewed.scope).toBe('mail');
      expect(renewed.refresh_token).not.toBe(tokens.refresh_token);
      expect(await provider.loadRefreshToken(client, tokens.refresh_token)).toBeNull();
      expect(await provider.loadRefreshToken(client, renewed.refresh_token)).toMatchObject({
        kind: 'refresh_token',
        scopes: ['mail'],
        expires_at: START_SECONDS + 7 * 24 * 3600,
      });
      // The earlier access token stays valid until it expires
      expect(await provider.loadAccessToken(tokens.access_token)).not.toBeNull();
    });

    it('rejects scopes beyond the original grant and keeps the token', async () => {
      const { provider } = context;
      const tokens = await issueTokens(['mail']);
      const refresh = await provider.loadRefreshToken(client, tokens.refresh_token);
      if (!refresh) {
        throw new Error('refresh token not stored');
      }

      await expect(
        provider.exchangeRefreshToken(client, refresh, ['mail', 'calendar']),
      ).rejects.toMatchObject({ error: 'invalid_scope' });
      expect(await provider.loadRefreshToken(client, tokens.refresh_token)).not.toBeNull();
    });

    it('rejects a refresh token that was already rotated', async () => {
      const { provider } = context;
      const tokens = await issueTokens();
      const refresh = await provider.loadRefreshToken(client, tokens.refresh_token);
      if (!refresh) {
        throw new Error('refresh token not stored');
      }

      await provider.exchangeRefreshToken(client, refresh, ['mail']);

      await expect(provider.exchangeRefreshToken(client, refresh, ['mail'])).rejects.toMatchObject({
        error: 'invalid_grant',
      });
    });

    it('does not reveal a refresh token to another client', async () => {
      const tokens = await issueTokens();

      expect(await context.provider.loadRefreshToken(otherClient, tokens.refresh_token)).toBeNull();
    });

    it('expires refresh tokens after the refresh TTL', async () => {
      const tokens = await issueTokens();

      vi.setSystemTime(secondsAfterStart(7 * 24 * 3600 + 1));

      expect(await context.provider.loadRefreshToken(client, tokens.refresh_token)).toBeNull();
    });

    it('issues refresh tokens that never expire when the TTL is null', async () => {
      context.cleanup();
      context = OauthTestUtils.createOAuthProvider({ refreshTokenTtlSeconds: null });
      await context.provider.registerClient(client);
      const tokens = await issueTokens();

      vi.setSystemTime(secondsAfterStart(10 * 365 * 24 * 3600));

      expect(await context.provider.loadRefreshToken(client, tokens.refresh_token)).toMatchObject({
        expires_at: null,
      });
    });
  });

  describe('Access tokens', () => {
    it('expires access tokens after the access TTL', async () => {
      const tokens = await issueTokens();

      vi.setSystemTime(secondsAfterStart(3600));
      expect(await context.provider.loadAccessToken(tokens.access_token)).not.toBeNull();

      vi.setSystemTime(secondsAfterStart(3601));
      expect(await context.provider.loadAccessToken(tokens.access_token)).toBeNull();
    });

    it('expires access tokens partway through the second after the access TTL', async () => {
      const tokens = await issueTokens();

      vi.setSystemTime(secondsAfterStart(3600.5));

      expect(await context.provider.loadAccessToken(tokens.access_token)).toBeNull();
    });

    it('keeps stored scopes apart from the records handed out', async () => {
      const { provider } = context;
      const tokens = await issueTokens(['mail']);
      const access = await provider.loadAccessToken(tokens.access_token);
      if (!access) {
        throw new Error('access token not stored');
      }

      access.scopes.push('calendar');

      expect((await provider.loadAccessToken(tokens.access_token))?.scopes).toEqual(['mail']);
      const refresh = await provider.loadRefreshToken(client, tokens.refresh_token);
      if (!refresh) {
        throw new Error('refresh token not stored');
      }
      expect(refresh.scopes).toEqual(['mail']);

      refresh.scopes.push('calendar');
      await expect(
        provider.exchangeRefreshToken(client, refresh, ['mail', 'calendar']),
      ).rejects.toMatchObject({ error: 'invalid_scope' });
    });

    it('returns null for unknown tokens', async () => {
      expect(await context.provider.loadAccessToken('no-such-token')).toBeNull();
    });
  });

  describe('Revocation', () => {
    it('revokes access and refresh tokens idempotently', async () => {
      const { provider } = context;
      const tokens = await issueTokens();
      const access = await provider.loadAccessToken(tokens.access_token);
      const refresh = await provider.loadRefreshToken(client, tokens.refresh_token);
      if (!access || !refresh) {
        throw new Error('tokens not stored');
      }

      await provider.revokeToken(access);
      await provider.revokeToken(access);
      await provider.revokeToken(refresh);

      expect(await provider.loadAccessToken(tokens.access_token)).toBeNull();
      expect(await provider.loadRefreshToken(client, tokens.refresh_token)).toBeNull();
    });
  });
});
