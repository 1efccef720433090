/**
 * Logging infrastructure exports
 *
 * Structured pino logging with redaction, plus the JSON Lines event log.
 */

export {
  rootLogger,
  createPinoLogger,
  createStderrRootLogger,
  PinoLogger,
} from './pino-setup.js';

export {
  logEvent,
  logError,
  ConsoleLogger,
  NoOpLogger,
  defaultLogger,
  setDefaultLogger,
  createScopedLogger,
} from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
