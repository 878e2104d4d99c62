/**
 * Logger - Leveled logging for analyzer runs
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Analyzing files', { count: 150 });
 *
 *   // Also keep a full debug log on disk:
 *   const logger = createLogger('warnings', { logFile: '.propsweep/run.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@propsweep/types';

export type { Logger, LogLevel };

type LogMethod = keyof Logger;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method
 */
const METHOD_LEVELS: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_LABELS: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * JSON stringify that tolerates circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet();
  return JSON.stringify(obj, (_key, value) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

/**
 * Format log message with optional context
 */
export function formatMessage(message: string, context?: Record<string, unknown>): string {
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
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  isEnabled(method: LogMethod): boolean {
    return this.priority >= METHOD_LEVELS[method];
  }

  private log(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(method)) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }
}

export interface ConsoleLoggerOptions {
  /**
   * Send every level to stderr. The CLI sets this so stdout carries only
   * the report (e.g. with --json).
   */
  stderrOnly?: boolean;
}

/**
 * Console-based Logger implementation
 */
export class ConsoleLogger extends LeveledLogger {
  private readonly stderrOnly: boolean;

  constructor(logLevel: LogLevel = 'info', options: ConsoleLoggerOptions = {}) {
    super(logLevel);
    this.stderrOnly = options.stderrOnly ?? false;
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${METHOD_LABELS[method]}] ${message}`, context);
    if (this.stderrOnly) {
      console.error(line);
      return;
    }
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
 * File-based Logger implementation
 *
 * Writes ISO-timestamped lines through a write stream. The file is truncated
 * on construction and parent directories are created.
 *
 * Throws on construction if the directory is not writable or the path is a
 * directory.
 */
export class FileLogger extends LeveledLogger {
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    super(logLevel);
    const resolvedPath = resolve(filePath);

    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // Missing file is the normal case
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      // A broken log file must not abort the run; surface it on stderr.
      console.error(`[ERROR] Log file ${resolvedPath} failed: ${err.message}`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_LABELS[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(resolve);
    });
  }
}

/**
 * Logger that fans out to several loggers, each filtering on its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
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

export interface CreateLoggerOptions extends ConsoleLoggerOptions {
  logFile?: string;
}

/**
 * Create a Logger instance with the specified log level.
 *
 * With logFile, returns a MultiLogger writing to console and file; the file
 * always captures at 'debug' regardless of the console level.
 */
export function createLogger(level: LogLevel, options: CreateLoggerOptions = {}): Logger {
  const consoleLogger = new ConsoleLogger(level, { stderrOnly: options.stderrOnly });

  if (options.logFile) {
    const fileLogger = new FileLogger('debug', options.logFile);
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}

/**
 * Close a logger returned by createLogger() if it holds a file stream.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
