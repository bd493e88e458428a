import { FSWatcher } from 'chokidar';
import { once } from 'events';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LogMonitor, RetryEvent, decodeLossy } from '../log-monitor';
import { LogSourceError } from '../../utils/errors';
import { LogEntry, Logger } from '../../utils/logger';

const silentLogger = new Logger({ output: 'none' });

describe('decodeLossy', () => {
  it('should drop bytes that are not valid UTF-8', () => {
    expect(decodeLossy(Buffer.from([0x68, 0xff, 0x69]))).toBe('hi');
    expect(decodeLossy(Buffer.from('你好', 'utf8'))).toBe('你好');
  });
});

describe('LogMonitor', () => {
  let dir: string;
  let file: string;
  let monitor: LogMonitor;

  function texts(lines: { text: string }[]): string[] {
    return lines.map(line => line.text);
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'log-monitor-'));
    file = path.join(dir, 'latest.log');
    await fs.writeFile(file, 'old line\n');
    monitor = new LogMonitor({ defaultPaths: [], logger: silentLogger });
    monitor.setLogFile(file);
  });

  afterEach(async () => {
    await monitor.stop();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('poll', () => {
    it('should report only lines appended after attaching', async () => {
      await monitor.attach();
      await fs.appendFile(file, '<Steve> hi\n<Alex> hey\n');

      const lines = await monitor.poll();

      expect(lines).toEqual([
        { text: '<Steve> hi', filePath: file },
        { text: '<Alex> hey', filePath: file },
      ]);
      expect(monitor.getPosition()?.offset).toBe(31);
    });

    it('should attach on the first poll', async () => {
      expect(await monitor.poll()).toEqual([]);
      expect(monitor.getPosition()?.offset).toBe(9);
    });

    it('should read from the start with fromBeginning', async () => {
      const fromStart = new LogMonitor({
        defaultPaths: [],
        fromBeginning: true,
        logger: silentLogger,
      });
      fromStart.setLogFile(file);

      expect(texts(await fromStart.poll())).toEqual(['old line']);
    });

    it('should hold back a partial line until its newline arrives', async () => {
      await monitor.attach();
      await fs.appendFile(file, '<Steve> par');
      expect(await monitor.poll()).toEqual([]);

      await fs.appendFile(file, 'tial\n');
      expect(texts(await monitor.poll())).toEqual(['<Steve> partial']);
    });

    it('should strip carriage returns', async () => {
      await monitor.attach();
      await fs.appendFile(file, 'one\r\ntwo\r\n');

      expect(texts(await monitor.poll())).toEqual(['one', 'two']);
    });

    it('should skip blank lines and recently seen lines', async () => {
      await monitor.attach();
      await fs.appendFile(file, 'same\n\n   \nsame\nother\n');

      expect(texts(await monitor.poll())).toEqual(['same', 'other']);
    });

    it('should drop undecodable bytes', async () => {
      await monitor.attach();
      await fs.appendFile(file, Buffer.from([0x68, 0x69, 0xff, 0x0a]));

      expect(texts(await monitor.poll())).toEqual(['hi']);
    });

    it('should emit a line event per reported line', async () => {
      const seen: string[] = [];
      monitor.on('line', (line: { text: string }) => seen.push(line.text));
      await monitor.attach();
      await fs.appendFile(file, 'a\nb\n');

      await monitor.poll();

      expect(seen).toEqual(['a', 'b']);
    });

    it('should keep reading when a line listener throws', async () => {
      const logger = new Logger({ output: 'none' });
      const logged: LogEntry[] = [];
      logger.on('log', (entry: LogEntry) => logged.push(entry));
      const reader = new LogMonitor({ defaultPaths: [], logger });
      reader.setLogFile(file);
      const seen: string[] = [];
      reader.on('line', (line: { text: string }) => {
        seen.push(line.text);
        if (line.text === 'b') {
          throw new Error('render failed');
        }
      });
      await reader.attach();
      await fs.appendFile(file, 'a\nb\nc\n');

      expect(texts(await reader.poll())).toEqual(['a', 'b', 'c']);

      await fs.appendFile(file, 'd\n');

      expect(texts(await reader.poll())).toEqual(['d']);
      expect(seen).toEqual(['a', 'b', 'c', 'd']);
      expect(logged.map(entry => [entry.level, entry.message, entry.error?.message])).toEqual([
        ['error', "Log monitor 'line' listener failed", 'render failed'],
      ]);
    });

    it('should move to the new end after truncation without reporting', async () => {
      const rotations: { replaced: boolean }[] = [];
      monitor.on('rotated', (event: { replaced: boolean }) => rotations.push(event));
      await monitor.attach();
      await fs.appendFile(file, '<Steve> hi\n');
      await monitor.poll();

      await fs.writeFile(file, 'x\n');
      expect(await monitor.poll()).toEqual([]);
      expect(monitor.getPosition()?.offset).toBe(2);
      expect(rotations).toEqual([{ filePath: file, replaced: false }]);

      await fs.appendFile(file, 'new\n');
      expect(texts(await monitor.poll())).toEqual(['new']);
    });

    it('should move to the new end when the file is replaced', async () => {
      const rotations: { replaced: boolean }[] = [];
      monitor.on('rotated', (event: { replaced: boolean }) => rotations.push(event));
      await monitor.attach();

      await fs.rename(file, path.join(dir, 'previous.log'));
      await fs.writeFile(file, 'a much longer first line in the new file\n');
      expect(await monitor.poll()).toEqual([]);
      expect(rotations).toEqual([{ filePath: file, replaced: true }]);

      await fs.appendFile(file, 'after\n');
      expect(texts(await monitor.poll())).toEqual(['after']);
    });

    it('should read a large append over several polls', async () => {
      const small = new LogMonitor({
        defaultPaths: [],
        maxReadBytes: 4,
        logger: silentLogger,
      });
      small.setLogFile(file);
      await small.attach();
      await fs.appendFile(file, 'abc\ndef\n');

      expect(texts(await small.poll())).toEqual(['abc']);
      expect(texts(await small.poll())).toEqual(['def']);
    });

    it('should reject when the file cannot be read', async () => {
      monitor.setLogFile(path.join(dir, 'missing.log'));

      await expect(monitor.poll()).rejects.toThrow('ENOENT');
    });

    it('should refuse to poll before a file is selected', async () => {
      const unset = new LogMonitor({ defaultPaths: [], logger: silentLogger });

      await expect(unset.poll()).rejects.toBeInstanceOf(LogSourceError);
    });
  });

  describe('findLogFile', () => {
    it('should pick the newest log in the configured directory', async () => {
      await fs.utimes(file, 1000, 1000);
      const newer = path.join(dir, 'client.log');
      await fs.writeFile(newer, '');
      await fs.utimes(newer, 2000, 2000);
      const finder = new LogMonitor({
        logPaths: [dir],
        defaultPaths: [],
        logger: silentLogger,
      });

      expect(await finder.findLogFile()).toBe(true);
      expect(finder.getLogFile()).toBe(newer);
    });

    it('should return false when nothing is found', async () => {
      const finder = new LogMonitor({
        logPaths: [path.join(dir, 'nope')],
        defaultPaths: [],
        logger: silentLogger,
      });

      expect(await finder.findLogFile()).toBe(false);
      expect(finder.getLogFile()).toBeNull();
    });
  });

  describe('tail', () => {
    it('should return the last lines of the file', async () => {
      await fs.writeFile(file, 'l1\nl2\nl3\n');

      expect(await monitor.tail(2)).toEqual(['l2', 'l3']);
    });

    it('should keep a line that starts exactly at the byte window', async () => {
      await fs.writeFile(file, 'aaaa\nbb\ncc\n');

      expect(await monitor.tail(10, 6)).toEqual(['bb', 'cc']);
    });

    it('should drop a line cut by the byte window', async () => {
      await fs.writeFile(file, 'aaaa\nbb\ncc\n');

      expect(await monitor.tail(10, 5)).toEqual(['cc']);
    });

    it('should return nothing for maxLines 0', async () => {
      expect(await monitor.tail(0)).toEqual([]);
    });
  });

  describe('followNewFile', () => {
    it('should switch to a new log and read it from the start', async () => {
      const switches: { from: string | null; to: string }[] = [];
      monitor.on('switched', (event: { from: string | null; to: string }) =>
        switches.push(event)
      );
      await monitor.attach();
      const next = path.join(dir, 'session.log');
      await fs.writeFile(next, '<Steve> first\n');

      expect(monitor.followNewFile(next)).toBe(true);
      expect(switches).toEqual([{ from: file, to: next }]);
      expect(texts(await monitor.poll())).toEqual(['<Steve> first']);
      expect(monitor.getLogFile()).toBe(next);
    });

    it('should ignore files that are not logs or are already active', () => {
      expect(monitor.followNewFile(path.join(dir, 'notes.txt'))).toBe(false);
      expect(monitor.followNewFile(file)).toBe(false);
    });
  });

  describe('start and stop', () => {
    it('should deliver appended lines from the polling loop', async () => {
      const live = new LogMonitor({
        defaultPaths: [],
        pollIntervalMs: 10,
        logger: silentLogger,
      });
      live.setLogFile(file);

      expect(await live.start()).toBe(true);
      expect(live.isRunning()).toBe(true);
      const received = once(live, 'line');
      await fs.appendFile(file, '<Steve> live\n');

      const [line] = await received;
      expect(line).toEqual({ text: '<Steve> live', filePath: file });

      await live.stop();
      expect(live.isRunning()).toBe(false);
    });

    it('should refuse a second start', async () => {
      expect(await monitor.start()).toBe(true);
      expect(await monitor.start()).toBe(false);
    });

    it('should not start without a log file', async () => {
      const nothing = new LogMonitor({ defaultPaths: [], logger: silentLogger });

      expect(await nothing.start()).toBe(false);
      expect(nothing.isRunning()).toBe(false);
    });

    it('should back off and give up after the retry limit', async () => {
      const flaky = new LogMonitor({
        defaultPaths: [],
        pollIntervalMs: 10,
        maxRetries: 2,
        retryBaseMs: 1,
        retryMaxMs: 2,
        logger: silentLogger,
      });
      flaky.setLogFile(path.join(dir, 'missing.log'));
      const retries: RetryEvent[] = [];
      flaky.on('retry', (event: RetryEvent) => retries.push(event));
      const failed = once(flaky, 'error');

      await flaky.start();
      const [error] = await failed;

      expect(retries.map(({ attempt, delayMs }) => ({ attempt, delayMs }))).toEqual([
        { attempt: 1, delayMs: 1 },
        { attempt: 2, delayMs: 2 },
      ]);
      expect(error).toBeInstanceOf(LogSourceError);
      expect(error).toMatchObject({ code: 'LOG_FILE_UNREACHABLE' });
      expect(flaky.isRunning()).toBe(false);

      await flaky.stop();
    });

    it('should close the directory watch when it gives up', async () => {
      const close = jest.spyOn(FSWatcher.prototype, 'close');
      const flaky = new LogMonitor({
        defaultPaths: [],
        pollIntervalMs: 10,
        maxRetries: 1,
        retryBaseMs: 1,
        retryMaxMs: 1,
        followNewFiles: true,
        logger: silentLogger,
      });
      flaky.setLogFile(path.join(dir, 'missing.log'));
      const failed = once(flaky, 'error');

      await flaky.start();
      await failed;

      expect(close).toHaveBeenCalledTimes(1);

      await flaky.stop();

      expect(close).toHaveBeenCalledTimes(1);
      close.mockRestore();
    });

    it('should emit stopped once the loop has ended', async () => {
      const events: string[] = [];
      monitor.on('started', () => events.push('started'));
      monitor.on('stopped', () => events.push('stopped'));

      await monitor.start();
      await monitor.stop();

      expect(events).toEqual(['started', 'stopped']);
    });
  });
});
