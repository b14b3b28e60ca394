// Errors
export * from './errors/oauth-errors.js';

export * from './schemas.js';
export * from './utils/index.js';

export * from './provider/index.js';
