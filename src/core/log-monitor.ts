import chokidar, { FSWatcher } from 'chokidar';
import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import { MonitorConfig } from '../types';
import { defaultLogger, LoggerLike } from '../utils/logger';
import { errorMessage, LogSourceError, toError } from '../utils/errors';
import { RecentLineSet } from './recent-lines';
import { defaultLogPaths, findLatestLog, isLogCandidate } from './log-locator';

export interface LogPosition {
  filePath: string;
  inode: number;
  offset: number;
  size: number;
}

export interface RawLine {
  text: string;
  filePath: string;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: string;
}

export interface LogMonitorOptions extends Partial<MonitorConfig> {
  /** User-supplied files or directories, consulted before the defaults. */
  logPaths?: string[];
  defaultPaths?: string[];
  stopTimeoutMs?: number;
  /** Upper bound on bytes read in a single poll. */
  maxReadBytes?: number;
  logger?: LoggerLike;
}

const MAX_PENDING_LINE_BYTES = 64 * 1024;
const NEWLINE = 0x0a;

/**
 * Decode UTF-8, dropping undecodable bytes instead of failing.
 */
export function decodeLossy(bytes: Buffer): string {
  return bytes.toString('utf8').replace(/\uFFFD/g, '');
}

/**
 * Polling tailer for the active chat log.
 *
 * Only bytes appended after attaching are reported. A line is reported once
 * its newline has been written; a trailing partial line is held back until
 * then. Truncation or replacement of the file moves the read position to the
 * new end without reporting anything.
 *
 * Events: `line` (RawLine), `rotated`, `switched`, `retry` (RetryEvent),
 * `started`, `stopped`, `error` (LogSourceError).
 */
export class LogMonitor extends EventEmitter {
  private readonly options: Required<Omit<LogMonitorOptions, 'logger'>>;
  private readonly logger: LoggerLike;
  private readonly recent: RecentLineSet;

  private filePath: string | null = null;
  private position: LogPosition | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private failures = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wakeSleep: (() => void) | null = null;
  private directoryWatcher: FSWatcher | null = null;

  constructor(options: LogMonitorOptions = {}) {
    super();
    this.options = {
      logPaths: options.logPaths ?? [],
      defaultPaths: options.defaultPaths ?? defaultLogPaths(),
      pollIntervalMs: options.pollIntervalMs ?? 500,
      dedupeCapacity: options.dedupeCapacity ?? 100,
      maxRetries: options.maxRetries ?? 10,
      retryBaseMs: options.retryBaseMs ?? 250,
      retryMaxMs: options.retryMaxMs ?? 5000,
      fromBeginning: options.fromBeginning ?? false,
      followNewFiles: options.followNewFiles ?? false,
      stopTimeoutMs: options.stopTimeoutMs ?? 1000,
      maxReadBytes: options.maxReadBytes ?? 1024 * 1024,
    };
    this.logger = options.logger ?? defaultLogger.child('log-monitor');
    this.recent = new RecentLineSet(this.options.dedupeCapacity);
  }

  /**
   * Locate the most recently modified candidate log and make it the active
   * file. Returns false when no candidate exists.
   */
  async findLogFile(): Promise<boolean> {
    const found = await findLatestLog(
      this.options.logPaths,
      this.options.defaultPaths
    );
    if (!found) {
      this.logger.warn('No chat log found', {
        searched: [...this.options.logPaths, ...this.options.defaultPaths],
      });
      return false;
    }

    this.setLogFile(found);
    this.logger.info('Using chat log', { filePath: found });
    return true;
  }

  setLogFile(filePath: string): void {
    this.filePath = path.resolve(filePath);
    this.position = null;
    this.pending = Buffer.alloc(0);
  }

  getLogFile(): string | null {
    return this.filePath;
  }

  getPosition(): LogPosition | null {
    return this.position ? { ...this.position } : null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Open the active file and place the read position: at the end, or at the
   * start when `fromBeginning` is set.
   */
  async attach(): Promise<LogPosition> {
    const filePath = this.requireFile();
    const stats = await fs.stat(filePath);
    this.position = {
      filePath,
      inode: stats.ino,
      offset: this.options.fromBeginning ? 0 : stats.size,
      size: stats.size,
    };
    this.pending = Buffer.alloc(0);
    return { ...this.position };
  }

  /**
   * One polling step: report every complete line appended since the last
   * step. I/O failures propagate to the caller.
   */
  async poll(): Promise<RawLine[]> {
    const filePath = this.requireFile();
    if (!this.position || this.position.filePath !== filePath) {
      await this.attach();
    }

    const stats = await fs.stat(filePath);
    const position = this.position;
    if (!position || this.filePath !== filePath) {
      // Switched to another file while waiting on the stat.
      return [];
    }

    const replaced =
      position.inode !== 0 && stats.ino !== 0 && stats.ino !== position.inode;
    if (replaced || stats.size < position.offset) {
      this.position = {
        filePath,
        inode: stats.ino,
        offset: stats.size,
        size: stats.size,
      };
      this.pending = Buffer.alloc(0);
      this.logger.info('Chat log truncated or rotated', {
        filePath,
        reason: replaced ? 'replaced' : 'truncated',
      });
      this.notify('rotated', { filePath, replaced });
      return [];
    }

    if (position.inode === 0) {
      position.inode = stats.ino;
    }

    if (stats.size === position.offset) {
      position.size = stats.size;
      return [];
    }

    const length = Math.min(
      stats.size - position.offset,
      this.options.maxReadBytes
    );
    const chunk = await this.readRange(filePath, position.offset, length);
    if (this.position !== position) {
      return [];
    }

    position.offset += chunk.length;
    position.size = stats.size;
    return this.consume(chunk, filePath);
  }

  async start(): Promise<boolean> {
    if (this.running) {
      this.logger.warn('Log monitor is already running');
      return false;
    }

    if (!this.filePath && !(await this.findLogFile())) {
      return false;
    }
    const filePath = this.requireFile();

    this.running = true;
    this.failures = 0;
    try {
      await this.attach();
    } catch (error) {
      // The polling loop retries the attach with backoff.
      this.logger.warn('Could not open chat log yet', {
        filePath,
        error: errorMessage(error),
      });
    }

    if (this.options.followNewFiles) {
      this.watchDirectory(path.dirname(filePath));
    }

    this.loop = this.runLoop();
    this.notify('started', { filePath });
    return true;
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }

    this.running = false;
    this.interruptSleep();

    await this.closeDirectoryWatcher();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      loop.then(() => false),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(true), this.options.stopTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      this.logger.warn('Log monitor did not stop in time', {
        timeoutMs: this.options.stopTimeoutMs,
      });
    }
    this.loop = null;
    this.notify('stopped', undefined);
  }

  /**
   * Last lines of the active file, read from at most `maxBytes` at its end.
   */
  async tail(maxLines = 20, maxBytes = 64 * 1024): Promise<string[]> {
    const filePath = this.requireFile();
    const stats = await fs.stat(filePath);
    const windowStart = Math.max(0, stats.size - maxBytes);
    // One byte before the window tells whether its first line is complete.
    const readStart = windowStart > 0 ? windowStart - 1 : 0;
    let bytes = await this.readRange(filePath, readStart, stats.size - readStart);

    if (windowStart > 0) {
      const firstNewline = bytes.indexOf(NEWLINE);
      bytes = bytes.subarray(firstNewline === -1 ? 1 : firstNewline + 1);
    }

    const lines = decodeLossy(bytes)
      .split('\n')
      .map(line => line.replace(/\r$/, ''));
    while (lines.length > 0 && lines[lines.length - 1] === '') {
      lines.pop();
    }
    return maxLines > 0 ? lines.slice(-maxLines) : [];
  }

  private consume(chunk: Buffer, filePath: string): RawLine[] {
    let data = Buffer.concat([this.pending, chunk]);
    const lastNewline = data.lastIndexOf(NEWLINE);

    if (lastNewline === -1) {
      if (data.length > MAX_PENDING_LINE_BYTES) {
        // An unterminated line this long is flushed as is.
        this.pending = Buffer.alloc(0);
        return this.report([decodeLossy(data)], filePath);
      }
      this.pending = data;
      return [];
    }

    this.pending = Buffer.from(data.subarray(lastNewline + 1));
    data = data.subarray(0, lastNewline);
    return this.report(
      decodeLossy(data)
        .split('\n')
        .map(line => line.replace(/\r$/, '')),
      filePath
    );
  }

  private report(texts: string[], filePath: string): RawLine[] {
    const lines: RawLine[] = [];
    for (const text of texts) {
      if (!text.trim() || !this.recent.remember(text)) {
        continue;
      }
      const line: RawLine = { text, filePath };
      lines.push(line);
      this.notify('line', line);
    }
    return lines;
  }

  private async readRange(
    filePath: string,
    offset: number,
    length: number
  ): Promise<Buffer> {
    const handle = await fs.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, offset);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      const delayMs = await this.tick();
      if (!this.running) {
        break;
      }
      await this.sleep(delayMs);
    }
  }

  /**
   * Poll once and return the delay before the next poll.
   */
  private async tick(): Promise<number> {
    try {
      await this.poll();
      if (this.failures > 0) {
        this.logger.info('Chat log reachable again', {
          afterAttempts: this.failures,
        });
      }
      this.failures = 0;
      return this.options.pollIntervalMs;
    } catch (error) {
      this.failures++;
      const message = errorMessage(error);

      if (this.failures > this.options.maxRetries) {
        this.running = false;
        this.fail(
          new LogSourceError(
            'LOG_FILE_UNREACHABLE',
            `Chat log unreachable after ${this.options.maxRetries} retries: ${message}`,
            this.filePath ?? undefined,
            error
          )
        );
        return 0;
      }

      const delayMs = Math.min(
        this.options.retryMaxMs,
        this.options.retryBaseMs * 2 ** (this.failures - 1)
      );
      this.logger.warn('Chat log read failed, retrying', {
        attempt: this.failures,
        delayMs,
        error: message,
      });
      const retry: RetryEvent = { attempt: this.failures, delayMs, error: message };
      this.notify('retry', retry);
      return delayMs;
    }
  }

  private fail(error: LogSourceError): void {
    this.logger.error('Log monitor stopped', error, { filePath: error.filePath });
    this.closeDirectoryWatcher().catch((closeError: unknown) => {
      this.logger.warn('Could not close log directory watch', {
        error: errorMessage(closeError),
      });
    });
    // An 'error' event without listeners would throw inside the loop.
    if (this.listenerCount('error') > 0) {
      this.notify('error', error);
    }
  }

  /**
   * Emit to listeners without letting one that throws break the poll loop
   * or count as a read failure.
   */
  private notify(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.logger.error(`Log monitor '${event}' listener failed`, toError(error));
    }
  }

  private async closeDirectoryWatcher(): Promise<void> {
    const watcher = this.directoryWatcher;
    this.directoryWatcher = null;
    if (watcher) {
      await watcher.close();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wakeSleep = resolve;
      this.sleepTimer = setTimeout(() => {
        this.sleepTimer = null;
        this.wakeSleep = null;
        resolve();
      }, ms);
    });
  }

  private interruptSleep(): void {
    if (this.sleepTimer) {
      clearTimeout(this.sleepTimer);
      this.sleepTimer = null;
    }
    const wake = this.wakeSleep;
    this.wakeSleep = null;
    wake?.();
  }

  private watchDirectory(directory: string): void {
    this.directoryWatcher = chokidar.watch(directory, {
      depth: 0,
      ignoreInitial: true,
      persistent: true,
    });

    this.directoryWatcher.on('add', (added: string) => {
      this.followNewFile(added);
    });
    this.directoryWatcher.on('error', (error: unknown) => {
      this.logger.warn('Log directory watch failed', {
        directory,
        error: errorMessage(error),
      });
    });
  }

  /**
   * Switch to a file the client just created. It is read from its start,
   * since everything in it is new.
   */
  followNewFile(added: string): boolean {
    const next = path.resolve(added);
    if (next === this.filePath || !isLogCandidate(next)) {
      return false;
    }

    const previous = this.filePath;
    this.filePath = next;
    this.pending = Buffer.alloc(0);
    this.position = { filePath: next, inode: 0, offset: 0, size: 0 };
    this.logger.info('Switched to new chat log', { from: previous, to: next });
    this.notify('switched', { from: previous, to: next });
    return true;
  }

  private requireFile(): string {
    if (!this.filePath) {
      throw new LogSourceError(
        'LOG_FILE_NOT_FOUND',
        'No chat log selected; call findLogFile() or setLogFile() first'
      );
    }
    return this.filePath;
  }
}

export default LogMonitor;
