/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Viewer endpoints are usually local, but configuration may carry
 * credentials for remote viewers behind a proxy; those never reach the log.
 */

import pino from 'pino';
import type { ILogger } from '../logger.js';

const ROOT_OPTIONS: pino.LoggerOptions = {
  redact: {
    paths: [
      'password',
      '*.password',
      'token',
      '*.token',
      'authorization',
      '*.authorization',
      'headers.authorization',
      '*.headers.authorization',
      '*.secret',
      '*.SECRET',
    ],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
};

/**
 * Root logger instance with path-based redaction.
 *
 * The level defaults to 'silent' so that library consumers opt in. The CLI
 * raises it for `serve` according to DISASM_SYNC_LOG_LEVEL.
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ token: 'test-secret' }); // Logs: { token: '[REDACTED]' }
 * ```
 * @public
 */
const rootLogger = pino({ ...ROOT_OPTIONS, level: 'silent' });

/**
 * Root logger with the same redaction that writes to stderr, for modes
 * where stdout carries a protocol.
 * @public
 */
export function createStderrRootLogger(level: string): pino.Logger {
  return pino({ ...ROOT_OPTIONS, level }, pino.destination(2));
}

/**
 * ILogger facade over a pino child logger bound to `scope`.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: pino.Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    const err = error instanceof Error ? error : undefined;
    const detail = error !== undefined && !err ? { error: String(error) } : {};
    this.logger.error({ ...(context ?? {}), ...detail, err }, message);
  }
}

/**
 * Creates an ILogger that writes through a child of `base` (the root logger
 * unless given).
 * @param scope - Value of the `scope` binding on every line
 * @param base - Parent logger, handy for tests that capture output
 * @public
 */
export function createPinoLogger(
  scope: string,
  base: pino.Logger = rootLogger,
): ILogger {
  return new PinoLogger(base.child({ scope }));
}

export { rootLogger };
