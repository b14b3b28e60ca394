/**
 * Authorization endpoint (RFC 6749 section 4.1.1, PKCE per RFC 7636).
 *
 * Errors found before the redirect URI is trusted are answered as JSON.
 * Later errors go back to the client on its redirect URI.
 */

import type {
  AuthorizationParams,
  ClientRegistration,
  IOAuthAuthorizationProvider,
} from '@courier-mcp/models';
import { CodeChallengeMethods, OAuthErrorCodes, ResponseTypes } from '@courier-mcp/models';
import { InvalidRequestError, OAuthProtocolError, OAuthUtils } from '@courier-mcp/auth';
import {
  oauthErrorResponse,
  param,
  readFormParams,
  redirectResponse,
  type RequestParams,
} from './request-utils.js';
import type { OAuthHandler } from './types.js';

interface ResolvedRedirect {
  redirectUri: string;
  providedExplicitly: boolean;
}

async function lookupClient(
  provider: IOAuthAuthorizationProvider,
  clientId: string | undefined,
): Promise<ClientRegistration> {
  if (!clientId) {
    throw new InvalidRequestError('client_id is required');
  }
  const client = await provider.getClient(clientId);
  if (!client) {
    throw new OAuthProtocolError(
      OAuthErrorCodes.INVALID_CLIENT,
      `Client ID '${clientId}' not found`,
    );
  }
  return client;
}

function resolveRedirectUri(
  client: ClientRegistration,
  redirectUri: string | undefined,
): ResolvedRedirect {
  if (redirectUri !== undefined) {
    if (!OAuthUtils.validateRedirectUri(client, redirectUri)) {
      throw new InvalidRequestError(`Redirect URI '${redirectUri}' not registered for client`);
    }
    return { redirectUri, providedExplicitly: true };
  }

  if (client.redirect_uris.length === 1) {
    return { redirectUri: client.redirect_uris[0], providedExplicitly: false };
  }
  throw new InvalidRequestError(
    'redirect_uri must be specified when client has multiple registered URIs',
  );
}

function buildAuthorizationParams(
  params: RequestParams,
  client: ClientRegistration,
  redirect: ResolvedRedirect,
): AuthorizationParams {
  if (param(params, 'response_type') !== ResponseTypes.CODE) {
    throw new OAuthProtocolError(
      OAuthErrorCodes.UNSUPPORTED_RESPONSE_TYPE,
      'response_type must be code',
    );
  }

  const codeChallenge = param(params, 'code_challenge');
  if (!codeChallenge) {
    throw new InvalidRequestError('code_challenge is required');
  }
  if (param(params, 'code_challenge_method') !== CodeChallengeMethods.S256) {
    throw new InvalidRequestError('code_challenge_method must be S256');
  }

  const scope = params.scope;
  const scopes = scope === undefined ? null : OAuthUtils.parseScopes(scope);
  if (scopes && client.scope !== undefined) {
    const unregistered = OAuthUtils.missingScopes(scopes, OAuthUtils.parseScopes(client.scope));
    if (unregistered.length > 0) {
      throw new OAuthProtocolError(
        OAuthErrorCodes.INVALID_SCOPE,
        `Client was not registered with scope ${unregistered.join(' ')}`,
      );
    }
  }

  return {
    state: param(params, 'state'),
    scopes,
    code_challenge: codeChallenge,
    redirect_uri: redirect.redirectUri,
    redirect_uri_provided_explicitly: redirect.providedExplicitly,
    resource: param(params, 'resource'),
  };
}

export const AuthorizeHandler: OAuthHandler = async (c) => {
  let redirectUri: string | undefined;
  let state: string | undefined;

  try {
    const provider = c.get('oauthProvider');
    const params = c.req.method === 'POST' ? await readFormParams(c) : c.req.query();
    state = param(params, 'state');

    const client = await lookupClient(provider, param(params, 'client_id'));
    const redirect = resolveRedirectUri(client, param(params, 'redirect_uri'));
    redirectUri = redirect.redirectUri;

    const consentUrl = await provider.authorize(
      client,
      buildAuthorizationParams(params, client, redirect),
    );
    return redirectResponse(consentUrl);
  } catch (error) {
    if (redirectUri !== undefined && error instanceof OAuthProtocolError) {
      return redirectResponse(
        OAuthUtils.constructRedirectUri(redirectUri, {
          error: error.error,
          error_description: error.errorDescription,
          state,
        }),
      );
    }
    return oauthErrorResponse(c, error, 'Authorization error');
  }
};
