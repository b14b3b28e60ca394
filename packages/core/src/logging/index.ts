export {
  createLogger,
  rootLogger,
  setLogLevel,
  setupConsoleLogging,
  REDACTED_PATHS,
} from './pino-setup.js';
export type { Logger, LevelWithSilent } from 'pino';
