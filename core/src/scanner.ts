/**
 * File system scanner: finds the files a sync directory tracks and hashes them
 */

import { readdir, lstat } from 'node:fs/promises';
import { join } from 'node:path';
import { isSafeRelativePath } from './fsutil';
import { hashFile } from './hasher';
import { getLog } from './logger';
import type { IncludeMatcher, PathMatcher } from './ignore';
import type { ScanError, ScannedFile } from './types';

const log = getLog('scanner');

export interface ScanOptions {
  /** A file is tracked only if it matches at least one include glob */
  include: IncludeMatcher;
  /** Excluded files are skipped and excluded directories pruned */
  exclude: PathMatcher;
  /** Maximum concurrent hash operations */
  concurrency?: number;
}

export interface ScanResult {
  /** Sorted by path */
  entries: ScannedFile[];
  errors: ScanError[];
  totalSize: number;
  scannedAt: Date;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Scan a directory recursively and hash every tracked file
 */
export async function scanDirectory(
  rootPath: string,
  options: ScanOptions
): Promise<ScanResult> {
  const { include, exclude, concurrency = 8 } = options;

  const errors: ScanError[] = [];
  const filesToProcess: Array<{ fullPath: string; relativePath: string }> = [];

  async function walk(currentPath: string, relativeDir: string): Promise<void> {
    // Raw names, so that names which are not valid UTF-8 can be detected
    const names = await readdir(currentPath, { encoding: 'buffer' });

    for (const rawName of names) {
      const name = decodeName(rawName);
      if (name === null) {
        const lossyPath = joinRelative(relativeDir, rawName.toString('utf8'));
        log.error({ path: lossyPath }, 'Invalid filename, skipping');
        errors.push({ path: lossyPath, reason: 'invalid-encoding' });
        continue;
      }

      const relativePath = joinRelative(relativeDir, name);
      if (!isSyncableName(name, relativePath)) {
        log.error({ path: relativePath }, 'Unsafe filename, skipping');
        errors.push({ path: relativePath, reason: 'unsafe-name' });
        continue;
      }

      const fullPath = join(currentPath, name);
      const stats = await lstat(fullPath);

      if (stats.isDirectory()) {
        if (exclude.matches(`${relativePath}/`)) {
          continue;
        }
        await walk(fullPath, relativePath);
      } else if (stats.isFile()) {
        if (exclude.matches(relativePath) || !include.matches(relativePath)) {
          continue;
        }
        filesToProcess.push({ fullPath, relativePath });
      }
    }
  }

  await walk(rootPath, '');

  const limit = pLimit(concurrency);
  const entries = await Promise.all(
    filesToProcess.map((file) =>
      limit(async (): Promise<ScannedFile> => {
        const stats = await lstat(file.fullPath);
        const hash = await hashFile(file.fullPath);
        return { path: file.relativePath, hash, size: stats.size };
      })
    )
  );

  entries.sort((a, b) => comparePaths(a.path, b.path));
  errors.sort((a, b) => comparePaths(a.path, b.path));

  return {
    entries,
    errors,
    totalSize: entries.reduce((sum, entry) => sum + entry.size, 0),
    scannedAt: new Date(),
  };
}

/**
 * Locale-independent path ordering
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function decodeName(rawName: Buffer): string | null {
  try {
    return utf8.decode(rawName);
  } catch {
    return null;
  }
}

/**
 * Names the server would refuse, or that the exclude rules cannot take
 */
function isSyncableName(name: string, relativePath: string): boolean {
  return !/^\.+$/.test(name) && isSafeRelativePath(relativePath);
}

function joinRelative(directory: string, name: string): string {
  return directory ? `${directory}/${name}` : name;
}

/**
 * Simple concurrency limiter to avoid EMFILE errors and manage load
 */
function pLimit(concurrency: number) {
  const queue: Array<() => void> = [];
  let active = 0;

  return <T>(fn: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        active++;
        try {
          resolve(await fn());
        } catch (err) {
          reject(err);
        } finally {
          active--;
          queue.shift()?.();
        }
      };

      if (active < concurrency) {
        void run();
      } else {
        queue.push(() => void run());
      }
    });
  };
}
