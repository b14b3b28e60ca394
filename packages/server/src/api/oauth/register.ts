import type { ClientRegistration } from '@courier-mcp/models';
import { GrantTypes, ResponseTypes, TokenEndpointAuthMethods } from '@courier-mcp/models';
import {
  ClientMetadataSchema,
  InvalidClientMetadataError,
  OAuthUtils,
  formatZodIssues,
} from '@courier-mcp/auth';
import { oauthErrorResponse } from './request-utils.js';
import type { OAuthHandler } from './types.js';

const SUPPORTED_GRANT_TYPES: string[] = Object.values(GrantTypes);

/**
 * Dynamic client registration (RFC 7591)
 */
export const RegisterHandler: OAuthHandler = async (c) => {
  try {
    const provider = c.get('oauthProvider');
    const { clientRegistrationOptions } = provider.settings;

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new InvalidClientMetadataError('Request body must be a JSON object');
    }

    const parsed = ClientMetadataSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidClientMetadataError(formatZodIssues(parsed.error).join('; '));
    }
    const metadata = parsed.data;

    const grantTypes: string[] = metadata.grant_types ?? [
      GrantTypes.AUTHORIZATION_CODE,
      GrantTypes.REFRESH_TOKEN,
    ];
    if (!grantTypes.includes(GrantTypes.AUTHORIZATION_CODE)) {
      throw new InvalidClientMetadataError('grant_types must include authorization_code');
    }
    const unsupportedGrants = grantTypes.filter((grant) => !SUPPORTED_GRANT_TYPES.includes(grant));
    if (unsupportedGrants.length > 0) {
      throw new InvalidClientMetadataError(
        `Unsupported grant_types: ${unsupportedGrants.join(', ')}`,
      );
    }

    const responseTypes: string[] = metadata.response_types ?? [ResponseTypes.CODE];
    if (responseTypes.some((type) => type !== ResponseTypes.CODE)) {
      throw new InvalidClientMetadataError('response_types may only contain code');
    }

    const defaultScopes = clientRegistrationOptions.defaultScopes ?? [];
    const scope =
      metadata.scope ??
      (defaultScopes.length > 0 ? OAuthUtils.formatScopes(defaultScopes) : undefined);
    const validScopes = clientRegistrationOptions.validScopes ?? [];
    if (scope !== undefined && validScopes.length > 0) {
      const invalid = OAuthUtils.missingScopes(OAuthUtils.parseScopes(scope), validScopes);
      if (invalid.length > 0) {
        throw new InvalidClientMetadataError(
          `Requested scopes are not valid: ${invalid.join(', ')}`,
        );
      }
    }

    const authMethod =
      metadata.token_endpoint_auth_method ?? TokenEndpointAuthMethods.CLIENT_SECRET_POST;
    const issuedAt = OAuthUtils.getCurrentTimestamp();
    const secretExpiry = clientRegistrationOptions.clientSecretExpirySeconds;
    const issuesSecret = authMethod !== TokenEndpointAuthMethods.NONE;

    const client: ClientRegistration = {
      ...metadata,
      grant_types: grantTypes,
      response_types: responseTypes,
      token_endpoint_auth_method: authMethod,
      ...(scope !== undefined && { scope }),
      client_id: OAuthUtils.generateClientId(),
      client_id_issued_at: issuedAt,
      ...(issuesSecret && { client_secret: OAuthUtils.generateClientSecret() }),
      ...(issuesSecret &&
        secretExpiry !== undefined && { client_secret_expires_at: issuedAt + secretExpiry }),
    };

    await provider.registerClient(client);

    return c.json(client, 201);
  } catch (error) {
    return oauthErrorResponse(c, error, 'Client registration error');
  }
};
