import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  collectLogCandidates,
  defaultLogPaths,
  findLatestLog,
  isLogCandidate,
  pickActiveLog,
} from '../log-locator';

describe('defaultLogPaths', () => {
  it('should list the vanilla, blclient and lunar logs on linux', () => {
    expect(defaultLogPaths('/home/steve', 'linux')).toEqual([
      '/home/steve/.minecraft/logs/latest.log',
      '/home/steve/.minecraft/logs/blclient/minecraft/latest.log',
      '/home/steve/.lunarclient/profiles/lunar/1.8/logs/latest.log',
    ]);
  });

  it('should use Application Support on macOS', () => {
    expect(defaultLogPaths('/Users/steve', 'darwin')[0]).toBe(
      '/Users/steve/Library/Application Support/minecraft/logs/latest.log'
    );
  });
});

describe('isLogCandidate', () => {
  it('should accept .log files and files without an extension', () => {
    expect(isLogCandidate('/logs/latest.log')).toBe(true);
    expect(isLogCandidate('/logs/LATEST.LOG')).toBe(true);
    expect(isLogCandidate('/logs/latest')).toBe(true);
    expect(isLogCandidate('/logs/2024-05-01-1.log.gz')).toBe(false);
    expect(isLogCandidate('/logs/notes.txt')).toBe(false);
  });
});

describe('pickActiveLog', () => {
  it('should pick the newest file', () => {
    expect(
      pickActiveLog([
        { filePath: '/a.log', mtimeMs: 100, order: 0 },
        { filePath: '/b.log', mtimeMs: 300, order: 1 },
        { filePath: '/c.log', mtimeMs: 200, order: 2 },
      ])
    ).toBe('/b.log');
  });

  it('should prefer the earlier path on equal times', () => {
    expect(
      pickActiveLog([
        { filePath: '/default.log', mtimeMs: 100, order: 1 },
        { filePath: '/override.log', mtimeMs: 100, order: 0 },
      ])
    ).toBe('/override.log');
  });

  it('should return null without candidates', () => {
    expect(pickActiveLog([])).toBeNull();
  });
});

describe('log discovery on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'log-locator-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeWithTime(name: string, seconds: number): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, 'line\n');
    await fs.utimes(filePath, seconds, seconds);
    return filePath;
  }

  it('should expand a directory into its log files', async () => {
    await writeWithTime('latest.log', 1000);
    await writeWithTime('debug', 1000);
    await writeWithTime('notes.txt', 1000);
    await fs.mkdir(path.join(dir, 'archive.log'));

    const candidates = await collectLogCandidates([dir]);

    expect(candidates.map(candidate => path.basename(candidate.filePath))).toEqual([
      'debug',
      'latest.log',
    ]);
    expect(candidates.every(candidate => candidate.order === 0)).toBe(true);
  });

  it('should skip missing paths and list each file once', async () => {
    const file = await writeWithTime('latest.log', 1000);

    const candidates = await collectLogCandidates([
      path.join(dir, 'missing.log'),
      file,
      dir,
    ]);

    expect(candidates).toEqual([{ filePath: file, mtimeMs: 1000000, order: 1 }]);
  });

  it('should find the most recently modified log', async () => {
    await writeWithTime('old.log', 1000);
    const newest = await writeWithTime('new.log', 2000);

    expect(await findLatestLog([dir], [])).toBe(newest);
  });

  it('should fall back to the defaults when overrides find nothing', async () => {
    const fallback = await writeWithTime('latest.log', 1000);

    expect(await findLatestLog([path.join(dir, 'nope')], [fallback])).toBe(fallback);
  });

  it('should return null when nothing exists', async () => {
    expect(await findLatestLog([path.join(dir, 'nope')], [])).toBeNull();
  });
});
