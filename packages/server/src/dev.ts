/**
 * Development server entry point.
 *
 * Loads `.env`, reads the configuration from the environment and serves the
 * OAuth endpoints with a local provider. Without an MCP transport plugged in,
 * `GET <MCP_PATH>` answers with the authenticated token's client and scopes
 * so an access token can be checked by hand.
 * @public
 * @see file:./config.ts - Environment variables
 */

import 'dotenv/config';
import { Hono } from 'hono';
import { ConfigurationError, LocalOAuthProvider } from '@courier-mcp/auth';
import { createLogger, setLogLevel, setupConsoleLogging } from '@courier-mcp/core';
import { loadServerConfig } from './config.js';
import { createApp, startWebServer } from './index.js';
import type { AuthEnv } from './auth/middleware/bearer-auth-middleware.js';

const logger = createLogger('server');

function createTokenInfoRoute(): Hono<AuthEnv> {
  const route = new Hono<AuthEnv>();
  route.get('/', (c) => {
    const { client_id, scopes, expires_at } = c.get('authInfo');
    return c.json({ client_id, scopes, expires_at });
  });
  return route;
}

/**
 * Exits with code 1 on configuration or startup failures.
 * @internal
 */
async function main() {
  setupConsoleLogging();

  const config = loadServerConfig();
  setLogLevel(config.logLevel);
  const provider = new LocalOAuthProvider(config.oauth);
  const app = createApp({
    provider,
    mcpPath: config.mcpPath,
    mcpRoute: createTokenInfoRoute(),
  });

  await startWebServer(app, { port: config.port, host: config.host });
  logger.info(
    {
      baseUrl: provider.settings.baseUrl,
      mcpPath: config.mcpPath,
      requiredScopes: provider.settings.requiredScopes,
    },
    'OAuth endpoints ready',
  );
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ issues: err.issues }, err.message);
  } else {
    logger.fatal({ err }, 'Failed to start web server');
  }
  process.exit(1);
});
