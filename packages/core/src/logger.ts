import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const LOG_DIR = resolve(__dirname, '../.logs');

// Ensure log directory exists
try {
  mkdirSync(LOG_DIR, { recursive: true });
} catch {
  // logEvent swallows write failures as well
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/**
 * Reads the current log level from DISASM_SYNC_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.DISASM_SYNC_LOG_LEVEL || '').toLowerCase();
  if (env && isLogLevel(env)) {
    return env;
  }
  return 'info';
}

function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Gets or generates a stable per-process run identifier for log correlation.
 * @internal
 */
function runId(): string {
  if (!process.env.DISASM_SYNC_RUN_ID) {
    process.env.DISASM_SYNC_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.DISASM_SYNC_RUN_ID;
}

function logFile(): string {
  return resolve(LOG_DIR, `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event to the JSON Lines log file.
 *
 * Respects both the DISASM_SYNC_LOG enable flag and the DISASM_SYNC_LOG_LEVEL
 * threshold. Error-level events are always written.
 * @param level - Log severity level
 * @param event - Event identifier, conventionally `<area>:<what-happened>`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.DISASM_SYNC_LOG === '1' ||
    process.env.DISASM_SYNC_LOG === 'true' ||
    level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    appendFileSync(logFile(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch {
    // Avoid throwing from logger
  }
}

/**
 * Logs an error event with process context.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: unknown,
): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    typeof rawError === 'object' && rawError !== null && 'code' in rawError
      ? rawError.code
      : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}

/**
 * Logging abstraction shared by the sync engine, the viewer server and the CLI.
 *
 * Components take an ILogger in their options so hosts can route output
 * wherever their UI expects it.
 * @public
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * Console-based logger with a fixed prefix.
 * @public
 */
export class ConsoleLogger implements ILogger {
  public constructor(private prefix: string = '[disasm-sync]') {}

  public debug(message: string, context?: Record<string, unknown>): void {
    if (context && Object.keys(context).length > 0) {
      console.debug(`${this.prefix} ${message}`, context);
    } else {
      console.debug(`${this.prefix} ${message}`);
    }
  }

  public info(message: string, context?: Record<string, unknown>): void {
    if (context && Object.keys(context).length > 0) {
      console.info(`${this.prefix} ${message}`, context);
    } else {
      console.info(`${this.prefix} ${message}`);
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (context && Object.keys(context).length > 0) {
      console.warn(`${this.prefix} ${message}`, context);
    } else {
      console.warn(`${this.prefix} ${message}`);
    }
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    const errorContext = error
      ? { error: error instanceof Error ? error.message : String(error) }
      : {};
    const allContext = { ...(context || {}), ...errorContext };

    if (Object.keys(allContext).length > 0) {
      console.error(`${this.prefix} ${message}`, allContext);
    } else {
      console.error(`${this.prefix} ${message}`);
    }

    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

/**
 * No-op logger for tests or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Logger used when a component is not handed one explicitly.
 * @public
 */
export let defaultLogger: ILogger = new ConsoleLogger();

/**
 * Replaces the default logger.
 * @param logger - The logger implementation to use
 * @public
 */
export function setDefaultLogger(logger: ILogger): void {
  defaultLogger = logger;
}

/**
 * Creates a console logger with a scoped prefix, e.g. `[disasm-sync:engine]`.
 * @param scope - The scope appended to the prefix
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new ConsoleLogger(`[disasm-sync:${scope}]`);
}
