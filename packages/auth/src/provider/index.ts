export * from './local-oauth-provider.js';
export * from './storage/file-client-registry.js';
export * from './storage/memory-token-store.js';
export * from './storage/pending-authorization-store.js';
export * from './scope/resolve-scopes.js';
export * from './token-utils/index.js';
export * from './consent/consent-controller.js';
export * from './ui/consent-template.js';
export * from './ui/utils.js';
export type { ConsentPageData, ScopeInfo } from './ui/types.js';
