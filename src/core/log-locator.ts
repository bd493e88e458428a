import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export interface LogCandidate {
  filePath: string;
  mtimeMs: number;
  /** Position of the configured path that produced this candidate. */
  order: number;
}

/**
 * Conventional chat log locations of the vanilla launcher and the common
 * third-party clients, for the given home directory and platform.
 */
export function defaultLogPaths(
  home: string = os.homedir(),
  platform: NodeJS.Platform = process.platform
): string[] {
  const vanilla =
    platform === 'win32'
      ? path.join(home, 'AppData', 'Roaming', '.minecraft')
      : platform === 'darwin'
        ? path.join(home, 'Library', 'Application Support', 'minecraft')
        : path.join(home, '.minecraft');

  return [
    path.join(vanilla, 'logs', 'latest.log'),
    path.join(vanilla, 'logs', 'blclient', 'minecraft', 'latest.log'),
    path.join(home, '.lunarclient', 'profiles', 'lunar', '1.8', 'logs', 'latest.log'),
  ];
}

/**
 * Files in a log directory that may be the one a client is appending to:
 * `*.log` files and files without an extension.
 */
export function isLogCandidate(filePath: string): boolean {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.log' || extension === '';
}

async function statOrNull(filePath: string) {
  try {
    return await fs.stat(filePath);
  } catch {
    // Missing or unreadable paths are simply not candidates.
    return null;
  }
}

async function scanDirectory(
  directory: string,
  order: number
): Promise<LogCandidate[]> {
  let names: string[];
  try {
    names = await fs.readdir(directory);
  } catch {
    return [];
  }

  const candidates: LogCandidate[] = [];
  for (const name of names.sort()) {
    const filePath = path.join(directory, name);
    if (!isLogCandidate(filePath)) {
      continue;
    }
    const stats = await statOrNull(filePath);
    if (stats?.isFile()) {
      candidates.push({ filePath, mtimeMs: stats.mtimeMs, order });
    }
  }
  return candidates;
}

/**
 * Expand configured paths into candidate files. Paths are taken in the given
 * order; a directory contributes its log files.
 */
export async function collectLogCandidates(
  paths: string[]
): Promise<LogCandidate[]> {
  const candidates: LogCandidate[] = [];
  const seen = new Set<string>();

  for (const [order, configured] of paths.entries()) {
    const resolved = path.resolve(configured);
    const stats = await statOrNull(resolved);
    if (!stats) {
      continue;
    }

    const found = stats.isDirectory()
      ? await scanDirectory(resolved, order)
      : stats.isFile()
        ? [{ filePath: resolved, mtimeMs: stats.mtimeMs, order }]
        : [];

    for (const candidate of found) {
      if (!seen.has(candidate.filePath)) {
        seen.add(candidate.filePath);
        candidates.push(candidate);
      }
    }
  }

  return candidates;
}

/**
 * Pick the most recently modified candidate. Ties go to the path listed
 * first, so explicit overrides beat built-in defaults.
 */
export function pickActiveLog(candidates: LogCandidate[]): string | null {
  let best: LogCandidate | null = null;
  for (const candidate of candidates) {
    if (
      !best ||
      candidate.mtimeMs > best.mtimeMs ||
      (candidate.mtimeMs === best.mtimeMs && candidate.order < best.order)
    ) {
      best = candidate;
    }
  }
  return best?.filePath ?? null;
}

export async function findLatestLog(
  overrides: string[],
  defaults: string[] = defaultLogPaths()
): Promise<string | null> {
  const candidates = await collectLogCandidates([...overrides, ...defaults]);
  return pickActiveLog(candidates);
}
