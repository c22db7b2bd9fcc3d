import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';

/**
 * Hash used for the hash files next to every uploaded binary
 */
export function standardHash() {
  return crypto.createHash('sha256');
}

/**
 * Hex digest of the given bytes
 */
export function contentHash(bytes: Uint8Array): string {
  return standardHash().update(bytes).digest('hex');
}

export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.stat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

export async function readJson(filename: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    throw new Error(`While reading ${filename}: ${e}`);
  }
}

/**
 * Find the most specific file with the given name up from the starting directory
 */
export async function findFileUp(filename: string, startDir: string): Promise<string | undefined> {
  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath, (s) => s.isFile())) {
      return fullPath;
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { return undefined; }
    currentDir = next;
  }
}

export interface DirectoryEntry {
  readonly name: string;
  readonly path: string;
  readonly stats: Stats;
}

export interface StatEntriesOptions {
  /**
   * Only entries whose name passes are stat'ed
   */
  readonly filter?: (name: string) => boolean;

  /**
   * Receives entries that cannot be stat'ed, which are then left out.
   * Without it, the first such error is thrown.
   */
  readonly onError?: (fullPath: string, e: unknown) => void;
}

/**
 * Stat the entries of a directory (following links), sorted by name
 *
 * Failing to read the directory itself always throws.
 */
export async function statEntries(dir: string, options: StatEntriesOptions = {}): Promise<DirectoryEntry[]> {
  const names = (await fs.readdir(dir)).sort();

  const ret = new Array<DirectoryEntry>();
  for (const name of names) {
    if (options.filter && !options.filter(name)) { continue; }

    const fullPath = path.join(dir, name);
    try {
      ret.push({ name, path: fullPath, stats: await fs.stat(fullPath) });
    } catch (e) {
      if (!options.onError) { throw e; }
      options.onError(fullPath, e);
    }
  }
  return ret;
}
