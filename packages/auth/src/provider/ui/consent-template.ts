/**
 * Consent page renderer.
 *
 * Rendering is a pure function of the page data. Every interpolated value
 * (client name, id, redirect URI, scopes, error text, transaction id) is
 * escaped for the context it lands in.
 * @public
 * @see file:./types.ts - ConsentPageData
 * @see file:./utils.ts - Escaping helpers
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PendingAuthorization } from '@courier-mcp/models';
import type { ConsentPageData } from './types.js';
import { ConsentTemplateUtils } from './utils.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_SERVICE_NAME = 'the mail and calendar MCP server';

/**
 * Renders the consent page HTML.
 * @throws \{Error\} When the consent.html template cannot be read
 * @example
 * ```typescript
 * const html = renderConsentPage({
 *   tx: 'tx-123',
 *   clientId: 'client-1',
 *   clientName: 'Desktop Assistant',
 *   redirectUri: 'https://app.example.com/callback',
 *   scopes: ['mail', 'calendar'],
 *   serviceName: DEFAULT_SERVICE_NAME,
 * });
 * ```
 */
export function renderConsentPage(data: ConsentPageData): string {
  const templatePath = join(__dirname, 'consent.html');
  let template: string;

  const { escapeHtml, escapeAttribute, generateScopeInfo } = ConsentTemplateUtils;

  try {
    template = readFileSync(templatePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Failed to load consent template: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
  }

  const scopeItems =
    data.scopes.length > 0
      ? generateScopeInfo(data.scopes)
          .map(
            (info) =>
              `<li><code>${escapeHtml(info.scope)}</code> <span class="scope-description">${escapeHtml(info.description)}</span></li>`,
          )
          .join('\n          ')
      : '<li>(none)</li>';

  const values: Record<string, string> = {
    displayName: escapeHtml(data.clientName || data.clientId),
    clientName: escapeHtml(data.clientName || 'OAuth Client'),
    clientId: escapeHtml(data.clientId),
    redirectUri: escapeHtml(data.redirectUri),
    serviceName: escapeHtml(data.serviceName),
    tx: escapeAttribute(data.tx),
    scopeItems,
    errorBlock: data.error ? `<div class="error" role="alert">${escapeHtml(data.error)}</div>` : '',
  };

  // Replacer functions keep `$` sequences in values literal
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
    key in values ? values[key] : placeholder,
  );
}

/**
 * Builds page data for a pending authorization
 */
export function createConsentPageData(
  tx: string,
  pending: PendingAuthorization,
  serviceName: string,
  error?: string,
): ConsentPageData {
  return {
    tx,
    clientId: pending.client.client_id,
    clientName: pending.client.client_name,
    redirectUri: pending.params.redirect_uri,
    scopes: pending.scopes,
    serviceName,
    error,
  };
}
