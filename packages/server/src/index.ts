/**
 * HTTP front of the mail and calendar MCP server.
 *
 * Serves the OAuth 2.1 authorization endpoints of an
 * {@link IOAuthAuthorizationProvider} and guards the MCP endpoint with its
 * bearer tokens. The MCP transport itself is supplied by the caller as a
 * Hono route and mounted under the MCP path.
 * @public
 * @see file:./dev.ts - Process entry point
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';
import type { IOAuthAuthorizationProvider } from '@courier-mcp/models';
import { createLogger } from '@courier-mcp/core';
import { createOAuthRoute } from './api/oauth.js';
import { protectedResourceMetadataUrl } from './api/oauth/metadata.js';
import {
  createBearerAuthMiddleware,
  type AuthEnv,
} from './auth/middleware/bearer-auth-middleware.js';

const logger = createLogger('server');

export const DEFAULT_MCP_PATH = '/mcp';

export interface AppOptions {
  provider: IOAuthAuthorizationProvider;
  /** Path of the MCP endpoint, defaults to `/mcp` */
  mcpPath?: string;
  /** MCP transport, mounted under `mcpPath` behind the bearer guard */
  mcpRoute?: Hono<AuthEnv>;
}

/**
 * Configuration options for web server startup.
 * @public
 */
export interface ServerOptions {
  port: number;
  host: string;
}

/**
 * Creates the Hono application: health check, OAuth endpoints and the
 * guarded MCP path (`/mcp` and everything below it).
 */
export function createApp(options: AppOptions): Hono<AuthEnv> {
  const { provider, mcpRoute } = options;
  const mcpPath = options.mcpPath ?? DEFAULT_MCP_PATH;
  const app = new Hono<AuthEnv>();

  // Middleware
  app.use('*', cors({ origin: '*', exposeHeaders: ['WWW-Authenticate'] }));
  app.use('*', requestLogger((message) => logger.debug(message)));

  app.get('/health', (c) => c.text('OK'));

  app.route('/', createOAuthRoute(provider, { mcpPath }));

  const bearerAuth = createBearerAuthMiddleware({
    provider,
    requiredScopes: provider.settings.requiredScopes,
    resourceMetadataUrl: protectedResourceMetadataUrl(provider.settings, mcpPath),
  });
  app.use('*', async (c, next) => {
    const path = c.req.path;
    if (path === mcpPath || path.startsWith(`${mcpPath}/`)) {
      return bearerAuth(c, next);
    }
    await next();
  });

  if (mcpRoute) {
    app.route(mcpPath, mcpRoute);
  }

  return app;
}

/**
 * Configures graceful shutdown handlers for process signals.
 * @param server - HTTP server instance
 */
function setupGracefulShutdown(server: ServerType) {
  process.on('SIGINT', () => {
    server.close();
    process.exit(0);
  });
  process.on('SIGTERM', () => {
    server.close((err) => {
      if (err) {
        logger.error({ err }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  });
}

/**
 * Starts listening and resolves once the server accepts connections.
 * @example
 * ```typescript
 * const app = createApp({ provider, mcpRoute });
 * const server = await startWebServer(app, { host: '127.0.0.1', port: 8000 });
 * ```
 * @public
 */
export async function startWebServer(app: Hono<AuthEnv>, options: ServerOptions) {
  const { port, host } = options;

  return new Promise<ServerType>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port,
        hostname: host,
      },
      (serverInfo) => {
        logger.info(
          { host, port: serverInfo.port },
          `Server listening on http://${host}:${serverInfo.port}`,
        );
        resolve(server);
      },
    );

    // Handle server errors
    server.on('error', (error) => {
      logger.error({ err: error }, 'Server startup failed');
      reject(error);
    });

    setupGracefulShutdown(server);
  });
}

export { createOAuthRoute, type OAuthRouteOptions } from './api/oauth.js';
export type { OAuthEnv, OAuthHandler } from './api/oauth/types.js';
export {
  buildAuthorizationServerMetadata,
  buildProtectedResourceMetadata,
  protectedResourceMetadataUrl,
} from './api/oauth/metadata.js';
export {
  buildWwwAuthenticateHeader,
  createBearerAuthMiddleware,
  type AuthEnv,
  type BearerAuthOptions,
} from './auth/middleware/bearer-auth-middleware.js';
export { loadServerConfig, type ServerConfig } from './config.js';
