/**
 * Logger - Lightweight leveled logging for depweave
 *
 * Levels: silent, errors, warnings, info, debug. `trace` is emitted at debug.
 * Context objects are appended as JSON (circular references are replaced).
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.debug('Analyzed unit', { unit: '<module>', imports: 3 });
 *
 *   const logger = createLogger('warnings', { logFile: '.depweave/analysis.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type LogMethod = keyof Logger;

/**
 * Minimum level priority for each method, and the tag written in front of it
 */
const METHODS: Record<LogMethod, { priority: number; tag: string }> = {
  error: { priority: LOG_LEVEL_PRIORITY.errors, tag: 'ERROR' },
  warn: { priority: LOG_LEVEL_PRIORITY.warnings, tag: 'WARN' },
  info: { priority: LOG_LEVEL_PRIORITY.info, tag: 'INFO' },
  debug: { priority: LOG_LEVEL_PRIORITY.debug, tag: 'DEBUG' },
  trace: { priority: LOG_LEVEL_PRIORITY.debug, tag: 'TRACE' },
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value instanceof Set) {
      return [...value];
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Shared level filtering. Subclasses only decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  protected readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, tag: string, message: string, context?: LogContext): void;

  private log(method: LogMethod, message: string, context?: LogContext): void {
    const { priority, tag } = METHODS[method];
    if (this.priority < priority) return;
    this.write(method, tag, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }
}

/**
 * Console-based Logger. error/warn/info go to the matching console method,
 * debug and trace to console.debug.
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: LogMethod, tag: string, message: string, context?: LogContext): void {
    const line = formatMessage(`[${tag}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

/**
 * File-based Logger.
 *
 * Lines carry ISO timestamps. The file is truncated on construction and
 * parent directories are created. Throws if the path is a directory.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;
  private failed = false;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    if (statSync(resolvedPath, { throwIfNoEntry: false })?.isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      // Report once, then stop writing
      if (!this.failed) {
        this.failed = true;
        console.error(`[ERROR] Log file ${resolvedPath} failed: ${err.message}`);
      }
    });
  }

  protected write(_method: LogMethod, tag: string, message: string, context?: LogContext): void {
    if (this.failed) return;
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${tag}] ${message}`, context) + '\n');
  }

  /** Flush and close the stream. */
  close(): Promise<void> {
    return new Promise((resolveClose) => {
      this.stream.end(() => resolveClose());
    });
  }
}

/**
 * Fans each call out to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger at the given level.
 *
 * With logFile, returns a MultiLogger writing to console and file; the file
 * always captures at 'debug' regardless of the console level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
