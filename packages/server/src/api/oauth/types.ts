import type { Handler } from 'hono';
import type { IOAuthAuthorizationProvider } from '@courier-mcp/models';

export type OAuthEnv = {
  Variables: {
    oauthProvider: IOAuthAuthorizationProvider;
    /** Path of the protected MCP endpoint, e.g. `/mcp` */
    mcpPath: string;
  };
};
export type OAuthHandler = Handler<OAuthEnv>;
