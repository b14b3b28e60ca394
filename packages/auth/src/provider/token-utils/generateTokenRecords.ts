import { OAuthUtils } from '../../utils/index.js';
import type {
  AccessToken,
  AuthorizationCode,
  PendingAuthorization,
  RefreshToken,
} from '@courier-mcp/models';

export const generateAuthorizationCodeRecord = (
  pending: PendingAuthorization,
  ttlSeconds: number,
): AuthorizationCode => ({
  code: OAuthUtils.generateAuthorizationCode(),
  client_id: pending.client.client_id,
  scopes: [...pending.scopes],
  expires_at: OAuthUtils.getCurrentTime() + ttlSeconds,
  code_challenge: pending.params.code_challenge,
  redirect_uri: pending.params.redirect_uri,
  redirect_uri_provided_explicitly: pending.params.redirect_uri_provided_explicitly,
  resource: pending.params.resource,
});

export const generateAccessTokenRecord = (
  clientId: string,
  scopes: string[],
  ttlSeconds: number,
  resource?: string,
): AccessToken => ({
  kind: 'access_token',
  token: OAuthUtils.generateAccessToken(),
  client_id: clientId,
  scopes: [...scopes],
  expires_at: OAuthUtils.getCurrentTime() + ttlSeconds,
  resource,
});

export const generateRefreshTokenRecord = (
  clientId: string,
  scopes: string[],
  ttlSeconds: number | null,
): RefreshToken => ({
  kind: 'refresh_token',
  token: OAuthUtils.generateRefreshToken(),
  client_id: clientId,
  scopes: [...scopes],
  expires_at: ttlSeconds === null ? null : OAuthUtils.getCurrentTime() + ttlSeconds,
});
