/**
 * Request parsing and response helpers shared by the OAuth API handlers
 */

import type { Context } from 'hono';
import { createLogger } from '@courier-mcp/core';
import { OAuthProtocolError } from '@courier-mcp/auth';
import { OAuthErrorCodes } from '@courier-mcp/models';

const logger = createLogger('http:oauth');

/** Parsed form or query parameters, string values only */
export type RequestParams = Record<string, string>;

/**
 * Keeps the string fields of a parsed body; file uploads are ignored
 */
export function toRequestParams(body: Record<string, unknown>): RequestParams {
  const params: RequestParams = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}

/**
 * Reads a form-encoded body. Anything that is not a form yields no parameters.
 */
export async function readFormParams(c: Context): Promise<RequestParams> {
  return toRequestParams(await c.req.parseBody());
}

/**
 * Returns the parameter, treating an empty string as absent
 */
export function param(params: RequestParams, name: string): string | undefined {
  const value = params[name];
  return value === undefined || value === '' ? undefined : value;
}

export function redirectResponse(location: string): Response {
  return new Response(null, {
    status: 302,
    headers: {
      Location: location,
      'Cache-Control': 'no-store',
    },
  });
}

/**
 * Answers an OAuthProtocolError with its status and body. Anything else is
 * logged and answered as 500 server_error.
 */
export function oauthErrorResponse(
  c: Context,
  error: unknown,
  context: string,
  headers: Record<string, string> = {},
): Response {
  if (error instanceof OAuthProtocolError) {
    logger.info({ error: error.error, description: error.errorDescription }, context);
    return c.json(error.toResponseObject(), error.status, headers);
  }

  logger.error({ err: error }, context);
  return c.json(
    {
      error: OAuthErrorCodes.SERVER_ERROR,
      error_description: 'Internal server error',
    },
    500,
    headers,
  );
}
