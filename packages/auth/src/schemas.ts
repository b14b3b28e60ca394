/**
 * Zod schemas for OAuth client records.
 *
 * `ClientMetadataSchema` validates what a client submits to the registration
 * endpoint (RFC 7591 section 2). `ClientInformationSchema` adds the issued
 * credentials and validates records read back from the client store.
 * @public
 */

import { z } from 'zod';
import { TokenEndpointAuthMethods } from '@courier-mcp/models';

export const TokenEndpointAuthMethodSchema = z.enum([
  TokenEndpointAuthMethods.CLIENT_SECRET_POST,
  TokenEndpointAuthMethods.CLIENT_SECRET_BASIC,
  TokenEndpointAuthMethods.NONE,
]);

export const ClientMetadataSchema = z.object({
  redirect_uris: z.array(z.string().url()).min(1, 'redirect_uris must list at least one URI'),
  token_endpoint_auth_method: TokenEndpointAuthMethodSchema.optional(),
  grant_types: z.array(z.string()).optional(),
  response_types: z.array(z.string()).optional(),
  client_name: z.string().optional(),
  client_uri: z.string().url().optional(),
  logo_uri: z.string().url().optional(),
  scope: z.string().optional(),
  contacts: z.array(z.string()).optional(),
  tos_uri: z.string().url().optional(),
  policy_uri: z.string().url().optional(),
  software_id: z.string().optional(),
  software_version: z.string().optional(),
});

export const ClientInformationSchema = ClientMetadataSchema.extend({
  client_id: z.string().min(1),
  client_secret: z.string().optional(),
  client_id_issued_at: z.number().int().optional(),
  client_secret_expires_at: z.number().int().optional(),
});

export type ClientMetadataInput = z.infer<typeof ClientMetadataSchema>;
export type ClientInformation = z.infer<typeof ClientInformationSchema>;

/**
 * Flattens zod issues into `path: message` strings for error descriptions
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
