/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (bundled with pino) for path-based redaction of sensitive fields.
 */

import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Reads the log level from LOG_LEVEL, falling back to 'info' when unset or unknown.
 * @internal
 */
function resolveLevel(): LevelWithSilent {
  const env = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return LOG_LEVELS.find((level) => level === env) ?? 'info';
}

/**
 * Paths whose values are censored before a log line is written.
 *
 * Covers the consent password, issued codes and tokens, client secrets and
 * the PKCE values that travel through the authorization flow.
 */
export const REDACTED_PATHS = [
  'password',
  '*.password',
  'consentPassword',
  '*.consentPassword',
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'token',
  '*.token',
  'authorization',
  '*.authorization',
  'code',
  '*.code',
  'code_verifier',
  '*.code_verifier',
  'code_challenge',
  '*.code_challenge',
  'state',
  '*.state',
  'tx',
  '*.tx',
];

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.info({ password: 'hunter2' }); // Logs: { password: '[REDACTED]' }
 * ```
 *
 * @public
 * @see {@link createLogger} - Named child loggers
 */
const rootLogger: Logger = pino({
  level: resolveLevel(),
  redact: {
    paths: REDACTED_PATHS,
    censor: '[REDACTED]',
    remove: false, // Keep the keys, just redact values
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

const namedLoggers = new Set<Logger>();

/**
 * Creates a child logger tagged with a module name.
 *
 * @example
 * ```typescript
 * const logger = createLogger('oauth:consent');
 * logger.info({ clientId }, 'Consent approved');
 * ```
 * @public
 */
export function createLogger(name: string): Logger {
  const logger = rootLogger.child({ module: name });
  namedLoggers.add(logger);
  return logger;
}

/**
 * Changes the level of the root logger and of every logger made by
 * {@link createLogger}. Pino children copy the level when created.
 * @public
 */
export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
  for (const logger of namedLoggers) {
    logger.level = level;
  }
}

/**
 * Routes all console.* calls through pino with automatic redaction.
 *
 * Call this function once at the process entry point before any logging occurs.
 * @public
 */
export function setupConsoleLogging(): void {
  (['debug', 'info', 'warn', 'error', 'log'] as const).forEach((name) => {
    // eslint-disable-next-line no-console
    console[name] = (...args: unknown[]) => {
      rootLogger[name === 'log' ? 'debug' : name]({ args });
    };
  });
}

export { rootLogger };
