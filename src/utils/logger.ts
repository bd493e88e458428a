import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import { hasErrorCode } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'text' | 'simple';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context: LogContext | undefined;
  error: Error | undefined;
  source: string | undefined;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  timestamp?: boolean;
  colors?: boolean;
  output?: 'console' | 'file' | 'both' | 'none';
  filePath?: string;
  maxFileSize?: number;
  maxFiles?: number;
  includeContext?: boolean;
}

export interface LogFormatter {
  format(entry: LogEntry): string;
}

/**
 * Minimal logging surface shared by the pipeline components, so that both a
 * {@link Logger} and a {@link ChildLogger} can be handed to them.
 */
export interface LoggerLike {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m', // Cyan
  info: '\x1b[32m', // Green
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

export class ConsoleFormatter implements LogFormatter {
  private colors: boolean;
  private timestamp: boolean;

  constructor(options: { colors?: boolean; timestamp?: boolean } = {}) {
    this.colors = options.colors ?? true;
    this.timestamp = options.timestamp ?? true;
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.timestamp) {
      parts.push(entry.timestamp.toISOString());
    }

    parts.push(this.formatLevel(entry.level));

    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }

    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(this.formatError(entry.error));
    }

    return parts.join(' ');
  }

  private formatLevel(level: LogLevel): string {
    const label = `[${level.toUpperCase()}]`;
    return this.colors ? `${LEVEL_COLORS[level]}${label}${RESET}` : label;
  }

  private formatError(error: Error): string {
    const text = `\n  Error: ${error.message}`;
    return this.colors ? `${LEVEL_COLORS.error}${text}${RESET}` : text;
  }
}

export class JsonFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
            name: entry.error.name,
          }
        : undefined,
    });
  }
}

export class SimpleFormatter implements LogFormatter {
  format(entry: LogEntry): string {
    const source = entry.source ? ` [${entry.source}]` : '';
    return `${entry.level.toUpperCase()}${source}: ${entry.message}`;
  }
}

export function createFormatter(
  format: LogFormat,
  options: { colors?: boolean; timestamp?: boolean } = {}
): LogFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'simple':
      return new SimpleFormatter();
    default:
      return new ConsoleFormatter(options);
  }
}

export class Logger extends EventEmitter implements LoggerLike {
  private level: LogLevel;
  private formatter: LogFormatter;
  private output: 'console' | 'file' | 'both' | 'none';
  private filePath: string;
  private maxFileSize: number;
  private maxFiles: number;
  private includeContext: boolean;
  private formatterOptions: { colors: boolean; timestamp: boolean };
  private pendingWrite: Promise<void> = Promise.resolve();

  private static readonly LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(options: LoggerOptions = {}) {
    super();

    this.level = options.level ?? 'info';
    this.output = options.output ?? 'console';
    this.filePath = options.filePath ?? '';
    this.maxFileSize = options.maxFileSize ?? 10 * 1024 * 1024; // 10MB
    this.maxFiles = options.maxFiles ?? 5;
    this.includeContext = options.includeContext ?? true;
    this.formatterOptions = {
      colors: options.colors ?? true,
      timestamp: options.timestamp ?? true,
    };
    this.formatter = createFormatter(options.format ?? 'text', this.formatterOptions);
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: LogContext, source?: string): void {
    this.log('debug', message, context, source);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: LogContext, source?: string): void {
    this.log('info', message, context, source);
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: LogContext, source?: string): void {
    this.log('warn', message, context, source);
  }

  /**
   * Log an error message
   */
  error(
    message: string,
    error?: Error,
    context?: LogContext,
    source?: string
  ): void {
    this.log('error', message, context, source, error);
  }

  /**
   * Log a message with the specified level
   */
  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    source?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      context: this.includeContext ? context : undefined,
      error,
      source,
    };

    this.emit('log', entry);

    if (this.output === 'none') {
      return;
    }

    const formatted = this.formatter.format(entry);

    if (this.output === 'console' || this.output === 'both') {
      this.writeToConsole(level, formatted);
    }

    if (this.output === 'file' || this.output === 'both') {
      // Writes are chained so that file order matches call order.
      this.pendingWrite = this.pendingWrite
        .then(() => this.writeToFile(formatted))
        .catch(writeError => {
          console.error('Failed to write to log file:', writeError);
          console.log(formatted);
        });
    }
  }

  /**
   * Write log entry to console
   */
  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.info(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
        console.error(message);
        break;
    }
  }

  /**
   * Write log entry to file
   */
  private async writeToFile(message: string): Promise<void> {
    if (!this.filePath) {
      return;
    }

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, message + '\n', 'utf-8');
    await this.rotateLogFile();
  }

  /**
   * Rotate the log file once it exceeds `maxFileSize`, keeping at most
   * `maxFiles` numbered backups.
   */
  private async rotateLogFile(): Promise<void> {
    const stats = await fs.stat(this.filePath);
    if (stats.size <= this.maxFileSize) {
      return;
    }

    for (let i = this.maxFiles - 1; i > 0; i--) {
      try {
        await fs.rename(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }
    }

    await fs.rename(this.filePath, `${this.filePath}.1`);
    await fs.writeFile(this.filePath, '', 'utf-8');
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
    this.debug(`Log level changed to ${level}`);
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Swap the formatter, keeping the color and timestamp settings
   */
  setFormat(format: LogFormat): void {
    this.formatter = createFormatter(format, this.formatterOptions);
  }

  /**
   * Check if a level should be logged
   */
  shouldLog(level: LogLevel): boolean {
    return Logger.LOG_LEVELS[level] >= Logger.LOG_LEVELS[this.level];
  }

  /**
   * Create a child logger tagged with a source and default context
   */
  child(source: string, defaultContext?: LogContext): ChildLogger {
    return new ChildLogger(this, source, defaultContext);
  }

  /**
   * Resolve once every queued file write has completed.
   */
  async flush(): Promise<void> {
    await this.pendingWrite;
    this.emit('flush');
  }

  /**
   * Flush pending writes and signal that the logger is done
   */
  async close(): Promise<void> {
    await this.flush();
    this.emit('close');
  }
}

export class ChildLogger implements LoggerLike {
  private parent: Logger;
  private source: string;
  private defaultContext: LogContext;

  constructor(parent: Logger, source: string, defaultContext: LogContext = {}) {
    this.parent = parent;
    this.source = source;
    this.defaultContext = defaultContext;
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, this.merge(context), this.source);
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, this.merge(context), this.source);
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, this.merge(context), this.source);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.parent.error(message, error, this.merge(context), this.source);
  }

  private merge(context?: LogContext): LogContext | undefined {
    if (!context && Object.keys(this.defaultContext).length === 0) {
      return undefined;
    }
    return { ...this.defaultContext, ...context };
  }
}

// Default logger instance
export const defaultLogger = new Logger({
  level: 'info',
  format: 'text',
  colors: true,
  timestamp: true,
});

export default Logger;
