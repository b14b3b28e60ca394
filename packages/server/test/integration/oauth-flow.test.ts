import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createTestServer,
  ServerTestUtils,
  TEST_PASSWORD,
  TEST_REDIRECT_URI,
  TEST_VERIFIER,
  TokenResponseSchema,
  type TestServer,
} from '../test-utils.js';

const START = new Date('2026-03-01T09:00:00Z');
const secondsAfterStart = (seconds: number) => new Date(START.getTime() + seconds * 1000);

describe('OAuth flow over HTTP', () => {
  let server: TestServer;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
    server = createTestServer();
  });

  afterEach(() => {
    vi.useRealTimers();
    server.cleanup();
  });

  it('takes a registered client from authorization to a protected MCP call', async () => {
    const { app } = server;
    const client = await ServerTestUtils.register(app);

    const authorize = await app.request(
      ServerTestUtils.authorizeUrl(ServerTestUtils.authorizeParams(client)),
    );
    expect(authorize.status).toBe(302);
    expect(authorize.headers.get('cache-control')).toBe('no-store');
    const consentUrl = authorize.headers.get('location') ?? '';
    expect(consentUrl).toMatch(/^http:\/\/127\.0\.0\.1:8000\/oauth\/consent\?tx=[A-Za-z0-9_-]{43}$/);

    const page = await app.request(consentUrl);
    expect(page.status).toBe(200);
    const html = await page.text();
    expect(html).toContain('<h1>Authorize Mail Desk</h1>');
    expect(html).toContain('<dd>https://cb/</dd>');

    const approval = await app.request(consentUrl, {
      method: 'POST',
      body: new URLSearchParams({ password: TEST_PASSWORD, action: 'approve' }),
    });
    expect(approval.status).toBe(302);
    const location = approval.headers.get('location') ?? '';
    expect(location).toMatch(/^https:\/\/cb\/\?code=[A-Za-z0-9_-]{43}&state=xyz$/);
    const code = new URL(location).searchParams.get('code') ?? '';

    const tokenResponse = await ServerTestUtils.postToken(app, {
      grant_type: 'authorization_code',
      code,
      code_verifier: TEST_VERIFIER,
      redirect_uri: TEST_REDIRECT_URI,
      client_id: client.client_id,
      client_secret: client.client_secret ?? '',
    });
    expect(tokenResponse.status).toBe(200);
    expect(tokenResponse.headers.get('cache-control')).toBe('no-store');
    expect(tokenResponse.headers.get('pragma')).toBe('no-cache');
    const tokens = TokenResponseSchema.parse(await tokenResponse.json());
    expect(tokens).toMatchObject({ token_type: 'Bearer', expires_in: 3600, scope: 'mail' });

    const mcp = await app.request('/mcp', {
      headers: { Authorization: `Bearer ${tokens.access_token}` },
    });
    expect(mcp.status).toBe(200);
    expect(await mcp.json()).toEqual({ client_id: client.client_id, scopes: ['mail'] });
  });

  it('rejects a second exchange of the same code with invalid_grant', async () => {
    const { app } = server;
    const client = await ServerTestUtils.register(app);
    const code = await ServerTestUtils.obtainCode(app, client);

    await ServerTestUtils.exchangeCode(app, client, code);
    const replay = await ServerTestUtils.postToken(app, {
      grant_type: 'authorization_code',
      code,
      code_verifier: TEST_VERIFIER,
      redirect_uri: TEST_REDIRECT_URI,
      client_id: client.client_id,
      client_secret: client.client_secret ?? '',
    });

    expect(replay.status).toBe(400);
    expect(await ServerTestUtils.errorBody(replay)).toEqual({
      error: 'invalid_grant',
      error_description: 'Authorization code does not exist',
    });
  });

  it('rejects a code redeemed after the code TTL', async () => {
    const { app } = server;
    const client = await ServerTestUtils.register(app);
    const code = await ServerTestUtils.obtainCode(app, client);

    vi.setSystemTime(secondsAfterStart(601));
    const late = await ServerTestUtils.postToken(app, {
      grant_type: 'authorization_code',
      code,
      code_verifier: TEST_VERIFIER,
      redirect_uri: TEST_REDIRECT_URI,
      client_id: client.client_id,
      client_secret: client.client_secret ?? '',
    });

    expect(late.status).toBe(400);
    expect((await ServerTestUtils.errorBody(late)).error).toBe('invalid_grant');
  });

  it('rotates refresh tokens and narrows scopes on request', async () => {
    const { app } = server;
    const client = await ServerTestUtils.register(app);
    const code = await ServerTestUtils.obtainCode(app, client, { scope: 'mail calendar' });
    const tokens = await ServerTestUtils.exchangeCode(app, client, code);
    expect(tokens.scope).toBe('mail calendar');

    const refreshForm = (refreshToken: string, scope: string) => ({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
      scope,
      client_id: client.client_id,
      client_secret: client.client_secret ?? '',
    });

    const widened = await ServerTestUtils.postToken(
      app,
      refreshForm(tokens.refresh_token, 'mail contacts'),
    );
    expect(widened.status).toBe(400);
    expect(await ServerTestUtils.errorBody(widened)).toEqual({
      error: 'invalid_scope',
      error_description: 'Cannot request scope `contacts` not provided by refresh token',
    });

    const narrowed = await ServerTestUtils.postToken(app, refreshForm(tokens.refresh_token, 'mail'));
    expect(narrowed.status).toBe(200);
    const renewed = TokenResponseSchema.parse(await narrowed.json());
    expect(renewed.scope).toBe('mail');
    expect(renewed.refresh_token).not.toBe(tokens.refresh_token);

    const retry = await ServerTestUtils.postToken(app, refreshForm(tokens.refresh_token, 'mail'));
    expect(retry.status).toBe(400);
    expect((await ServerTestUtils.errorBody(retry)).error).toBe('invalid_grant');
  });

  it('keeps the refresh token scopes when no scope is sent', async () => {
    const { app } = server;
    const client = await ServerTestUtils.register(app);
    const code = await ServerTestUtils.obtainCode(app, client, { scope: 'mail calendar' });
    const tokens = await ServerTestUtils.exchangeCode(app, client, code);

    const response = await ServerTestUtils.postToken(app, {
      grant_type: 'refresh_token',
      refresh_token: tokens.refresh_token,
      client_id: client.client_id,
      client_secret: client.client_secret ?? '',
    });

    expect(response.status).toBe(200);
    expect(TokenResponseSchema.parse(await response.json()).scope).toBe('mail calendar');
  });

  it('serves the health check without authentication', async () => {
    const response = await server.app.request('/health');

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('OK');
  });
});
