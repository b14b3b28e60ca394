/**
 * Token and revocation endpoint client authentication (RFC 6749 section 2.3).
 *
 * Credentials come from the form (`client_secret_post`) or an HTTP Basic
 * header (`client_secret_basic`). Secrets are compared in constant time.
 */

import type { ClientRegistration, IOAuthAuthorizationProvider } from '@courier-mcp/models';
import { InvalidClientError, InvalidRequestError, OAuthUtils } from '@courier-mcp/auth';
import { param, type RequestParams } from './request-utils.js';

interface ClientCredentials {
  clientId?: string;
  clientSecret?: string;
}

/**
 * Decodes `Basic base64(client_id:client_secret)`, both parts form-url-encoded
 */
export function parseBasicCredentials(header: string | undefined): ClientCredentials | null {
  const match = header?.match(/^Basic\s+(\S+)\s*$/i);
  if (!match) {
    return null;
  }

  const decoded = Buffer.from(match[1], 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator < 0) {
    throw new InvalidClientError('Malformed Basic authorization header');
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, separator)),
      clientSecret: decodeURIComponent(decoded.slice(separator + 1)),
    };
  } catch {
    throw new InvalidClientError('Malformed Basic authorization header');
  }
}

export async function authenticateClient(
  provider: IOAuthAuthorizationProvider,
  params: RequestParams,
  authorizationHeader: string | undefined,
): Promise<ClientRegistration> {
  const basic = parseBasicCredentials(authorizationHeader);
  const clientId = basic?.clientId || param(params, 'client_id');
  const clientSecret = basic?.clientSecret || param(params, 'client_secret');

  if (!clientId) {
    throw new InvalidRequestError('client_id is required');
  }

  const client = await provider.getClient(clientId);
  if (!client) {
    throw new InvalidClientError('Invalid client_id');
  }

  if (client.client_secret) {
    if (!clientSecret) {
      throw new InvalidClientError('Client secret is required');
    }
    if (!OAuthUtils.safeCompare(clientSecret, client.client_secret)) {
      throw new InvalidClientError('Invalid client_secret');
    }
    if (OAuthUtils.isClientSecretExpired(client)) {
      throw new InvalidClientError('Client secret has expired');
    }
  }

  return client;
}
