import type { ScopeInfo } from './types.js';

/**
 * Descriptions for the scopes this server knows about
 */
const DEFAULT_SCOPE_DESCRIPTIONS: Record<string, string> = {
  mail: 'Read, search, send and organise messages in your mail accounts',
  calendar: 'View and change events in your calendars',
  contacts: 'Look up people in your address books',
};

/**
 * HTML escapes a string for use in element content
 */
function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Escapes a string for use inside a quoted HTML attribute value
 */
function escapeAttribute(unsafe: string): string {
  return escapeHtml(unsafe).replace(/\s/g, '&#32;');
}

/**
 * Pairs each scope with a description, falling back to a generic one
 */
function generateScopeInfo(scopes: string[]): ScopeInfo[] {
  return scopes.map((scope) => ({
    scope,
    description: DEFAULT_SCOPE_DESCRIPTIONS[scope] ?? `Access permissions for ${scope}`,
  }));
}

export const ConsentTemplateUtils = {
  escapeHtml,
  escapeAttribute,
  generateScopeInfo,
};
