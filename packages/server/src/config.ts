/**
 * Server configuration read from environment variables.
 *
 * `.env` is loaded by the entry point (see dev.ts) before this runs, so the
 * values here may come from either source.
 * @example
 * ```typescript
 * const config = loadServerConfig({
 *   OAUTH_CONSENT_PASSWORD: 'test-password',
 *   OAUTH_REQUIRED_SCOPES: 'mail,calendar',
 * });
 * config.oauth.requiredScopes; // => ['mail', 'calendar']
 * ```
 */

import { z } from 'zod';
import type { LocalOAuthProviderConfig } from '@courier-mcp/models';
import { ConfigurationError, formatZodIssues } from '@courier-mcp/auth';

export interface ServerConfig {
  host: string;
  port: number;
  mcpPath: string;
  logLevel: LogLevel;
  oauth: LocalOAuthProviderConfig;
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

/** Unset and blank variables both fall back to the default */
const blankAsUnset = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    schema,
  );

const scopeList = blankAsUnset(
  z
    .string()
    .optional()
    .transform((value) => (value ? value.split(/[\s,]+/).filter(Boolean) : undefined)),
);

const flag = (fallback: boolean) =>
  blankAsUnset(
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'], {
        errorMap: () => ({ message: 'Expected true or false' }),
      })
      .optional()
      .transform((value) =>
        value === undefined ? fallback : ['true', '1', 'yes'].includes(value),
      ),
  );

const seconds = blankAsUnset(
  z
    .string()
    .regex(/^\d+$/, 'Expected a whole number of seconds')
    .transform(Number)
    .optional(),
);

const EnvSchema = z.object({
  HOST: blankAsUnset(z.string().default('127.0.0.1')),
  PORT: blankAsUnset(z.coerce.number().int().min(1).max(65535).default(8000)),
  MCP_PATH: blankAsUnset(
    z
      .string()
      .regex(/^(\/[\w.~-]+)+$/, 'Expected a path such as /mcp')
      .default('/mcp'),
  ),
  LOG_LEVEL: blankAsUnset(z.enum(LOG_LEVELS).default('info')),

  OAUTH_BASE_URL: blankAsUnset(z.string().url().optional()),
  OAUTH_ISSUER_URL: blankAsUnset(z.string().url().optional()),
  OAUTH_SERVICE_DOC_URL: blankAsUnset(z.string().url().optional()),
  OAUTH_CONSENT_PASSWORD: blankAsUnset(
    z.string({ required_error: 'A consent password is required' }),
  ),
  OAUTH_CLIENT_STORE: blankAsUnset(z.string().default('.data/oauth_clients.json')),
  OAUTH_SERVICE_NAME: blankAsUnset(z.string().optional()),

  OAUTH_REQUIRED_SCOPES: scopeList,
  OAUTH_VALID_SCOPES: scopeList,
  OAUTH_DEFAULT_SCOPES: scopeList,
  OAUTH_ENABLE_REGISTRATION: flag(true),
  OAUTH_ENABLE_REVOCATION: flag(true),

  OAUTH_CLIENT_SECRET_EXPIRY: seconds,
  OAUTH_PENDING_TTL: seconds,
  OAUTH_AUTH_CODE_TTL: seconds,
  OAUTH_ACCESS_TOKEN_TTL: seconds,
  OAUTH_REFRESH_TOKEN_TTL: blankAsUnset(
    z
      .string()
      .regex(/^(\d+|never)$/i, "Expected a whole number of seconds or 'never'")
      .transform((value) => (value.toLowerCase() === 'never' ? null : Number(value)))
      .optional(),
  ),
});

type Env = z.infer<typeof EnvSchema>;

function toProviderConfig(env: Env): LocalOAuthProviderConfig {
  const baseUrl = env.OAUTH_BASE_URL ?? `http://${env.HOST}:${env.PORT}`;

  return {
    baseUrl,
    issuerUrl: env.OAUTH_ISSUER_URL ?? baseUrl,
    serviceDocumentationUrl: env.OAUTH_SERVICE_DOC_URL,
    consentPassword: env.OAUTH_CONSENT_PASSWORD,
    clientStorePath: env.OAUTH_CLIENT_STORE,
    serviceName: env.OAUTH_SERVICE_NAME,
    requiredScopes: env.OAUTH_REQUIRED_SCOPES ?? [],
    clientRegistrationOptions: {
      enabled: env.OAUTH_ENABLE_REGISTRATION,
      clientSecretExpirySeconds: env.OAUTH_CLIENT_SECRET_EXPIRY,
      validScopes: env.OAUTH_VALID_SCOPES,
      defaultScopes: env.OAUTH_DEFAULT_SCOPES,
    },
    revocationOptions: { enabled: env.OAUTH_ENABLE_REVOCATION },
    pendingTtlSeconds: env.OAUTH_PENDING_TTL,
    authCodeTtlSeconds: env.OAUTH_AUTH_CODE_TTL,
    accessTokenTtlSeconds: env.OAUTH_ACCESS_TOKEN_TTL,
    refreshTokenTtlSeconds: env.OAUTH_REFRESH_TOKEN_TTL,
  };
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatZodIssues(parsed.error));
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    mcpPath: parsed.data.MCP_PATH,
    logLevel: parsed.data.LOG_LEVEL,
    oauth: toProviderConfig(parsed.data),
  };
}
