import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createTestServer,
  ServerTestUtils,
  TEST_PASSWORD,
  type RegisteredClient,
  type TestServer,
} from '../test-utils.js';

describe('GET|POST /authorize', () => {
  let server: TestServer;
  let client: RegisteredClient;

  const authorize = (params: Record<string, string>) =>
    server.app.request(ServerTestUtils.authorizeUrl(params));

  const errorRedirect = (response: Response) => {
    const location = new URL(response.headers.get('location') ?? 'about:blank');
    return {
      target: `${location.origin}${location.pathname}`,
      error: location.searchParams.get('error'),
      description: location.searchParams.get('error_description'),
      state: location.searchParams.get('state'),
    };
  };

  beforeEach(async () => {
    server = createTestServer();
    client = await ServerTestUtils.register(server.app, { scope: 'mail calendar' });
  });

  afterEach(() => {
    server.cleanup();
  });

  it('answers JSON when client_id is missing', async () => {
    const params = ServerTestUtils.authorizeParams(client);
    const { client_id: _omitted, ...withoutClient } = params;

    const response = await authorize(withoutClient);

    expect(response.status).toBe(400);
    expect(await ServerTestUtils.errorBody(response)).toEqual({
      error: 'invalid_request',
      error_description: 'client_id is required',
    });
  });

  it('answers JSON for an unknown client', async () => {
    const response = await authorize(
      ServerTestUtils.authorizeParams(client, { client_id: 'no-such-client' }),
    );

    expect(response.status).toBe(400);
    expect(await ServerTestUtils.errorBody(response)).toEqual({
      error: 'invalid_client',
      error_description: "Client ID 'no-such-client' not found",
    });
  });

  it('does not redirect to an unregistered URI', async () => {
    const response = await authorize(
      ServerTestUtils.authorizeParams(client, { redirect_uri: 'https://evil.example/' }),
    );

    expect(response.status).toBe(400);
    expect(response.headers.get('location')).toBeNull();
    expect(await ServerTestUtils.errorBody(response)).toEqual({
      error: 'invalid_request',
      error_description: "Redirect URI 'https://evil.example/' not registered for client",
    });
  });

  it('uses the only registered redirect URI when none is sent', async () => {
    const { redirect_uri: _omitted, ...params } = ServerTestUtils.authorizeParams(client);

    const response = await authorize(params);
    expect(response.status).toBe(302);

    const approval = await server.app.request(response.headers.get('location') ?? '', {
      method: 'POST',
      body: new URLSearchParams({ password: TEST_PASSWORD }),
    });
    const code = new URL(approval.headers.get('location') ?? '').searchParams.get('code') ?? '';
    expect(await server.provider.loadAuthorizationCode(client, code)).toMatchObject({
      redirect_uri: 'https://cb/',
      redirect_uri_provided_explicitly: false,
    });
  });

  it('requires redirect_uri when several are registered', async () => {
    const multi = await ServerTestUtils.register(server.app, {
      redirect_uris: ['https://cb/', 'https://cb/other'],
    });
    const { redirect_uri: _omitted, ...params } = ServerTestUtils.authorizeParams(multi);

    const response = await authorize(params);

    expect(response.status).toBe(400);
    expect(await ServerTestUtils.errorBody(response)).toEqual({
      error: 'invalid_request',
      error_description: 'redirect_uri must be specified when client has multiple registered URIs',
    });
  });

  it('redirects unsupported response types back with the state', async () => {
    const response = await authorize(
      ServerTestUtils.authorizeParams(client, { response_type: 'token' }),
    );

    expect(response.status).toBe(302);
    expect(errorRedirect(response)).toEqual({
      target: 'https://cb/',
      error: 'unsupported_response_type',
      description: 'response_type must be code',
      state: 'xyz',
    });
  });

  it('requires a PKCE challenge', async () => {
    const { code_challenge: _omitted, ...params } = ServerTestUtils.authorizeParams(client);

    const response = await authorize(params);

    expect(errorRedirect(response)).toMatchObject({
      error: 'invalid_request',
      description: 'code_challenge is required',
    });
  });

  it('accepts only the S256 challenge method', async () => {
    const response = await authorize(
      ServerTestUtils.authorizeParams(client, { code_challenge_method: 'plain' }),
    );

    expect(errorRedirect(response)).toMatchObject({
      error: 'invalid_request',
      description: 'code_challenge_method must be S256',
      state: 'xyz',
    });
  });

  it('rejects scopes the client was not registered with', async () => {
    const response = await authorize(
      ServerTestUtils.authorizeParams(client, { scope: 'mail contacts' }),
    );

    expect(errorRedirect(response)).toMatchObject({
      error: 'invalid_scope',
      description: 'Client was not registered with scope contacts',
      state: 'xyz',
    });
  });

  it('accepts the authorization request as a form POST', async () => {
    const response = await server.app.request('/authorize', {
      method: 'POST',
      body: new URLSearchParams(ServerTestUtils.authorizeParams(client)),
    });

    expect(response.status).toBe(302);
    expect(response.headers.get('cache-control')).toBe('no-store');
    expect(response.headers.get('location')).toMatch(
      /^http:\/\/127\.0\.0\.1:8000\/oauth\/consent\?tx=/,
    );
  });
});
