/**
 * Per-directory run lock.
 * Prevents two reconciliation runs from rewriting the same state files at once.
 */

import { join } from 'node:path';
import { hostname } from 'node:os';
import lockfile from 'proper-lockfile';
import { writeFile, mkdir, unlink, readFile } from 'node:fs/promises';
import { z } from 'zod';
import { RunLockedError } from './errors';
import { isNotFound } from './fsutil';
import { STATE_DIRECTORY } from './ignore';

export type RunOperation = 'upload' | 'download';

export interface LockInfo {
  machineName: string;
  pid: number;
  lockedAt: Date;
  operation: RunOperation;
}

export interface RunLockHandle {
  release: () => Promise<void>;
  info: LockInfo;
}

export interface RunLockOptions {
  /** Consider a lock stale after this many milliseconds */
  staleMs?: number;
  /** Attempts after the first one before giving up */
  retries?: number;
}

const LOCK_STALE_MS = 5 * 60 * 1000;

const LockInfoSchema = z.object({
  machineName: z.string(),
  pid: z.number(),
  lockedAt: z.string(),
  operation: z.enum(['upload', 'download']),
});

export class RunLock {
  private stateDir: string;
  private lockFilePath: string;
  private infoFilePath: string;
  private staleMs: number;
  private retries: number;

  constructor(targetDir: string, options: RunLockOptions = {}) {
    this.stateDir = join(targetDir, STATE_DIRECTORY);
    this.lockFilePath = join(this.stateDir, 'run.lock');
    this.infoFilePath = join(this.stateDir, 'run.lock.info');
    this.staleMs = options.staleMs ?? LOCK_STALE_MS;
    this.retries = options.retries ?? 0;
  }

  /**
   * Acquire the lock
   * @throws RunLockedError if another run holds it
   */
  async acquire(operation: RunOperation): Promise<RunLockHandle> {
    await mkdir(this.stateDir, { recursive: true });

    let release: () => Promise<void>;
    try {
      release = await lockfile.lock(this.stateDir, {
        stale: this.staleMs,
        lockfilePath: this.lockFilePath,
        retries: {
          retries: this.retries,
          minTimeout: 1000,
          maxTimeout: 3000,
        },
      });
    } catch (error) {
      const existingInfo = await this.getLockInfo();
      if (existingInfo) {
        throw new RunLockedError(
          `Sync in progress by ${existingInfo.machineName} ` +
            `(${existingInfo.operation} started at ${existingInfo.lockedAt.toISOString()})`
        );
      }
      throw new RunLockedError(
        `Unable to acquire run lock: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const info: LockInfo = {
      machineName: hostname(),
      pid: process.pid,
      lockedAt: new Date(),
      operation,
    };
    await writeFile(this.infoFilePath, JSON.stringify(info, null, 2));

    return {
      release: async () => {
        await unlink(this.infoFilePath).catch((error: unknown) => {
          if (!isNotFound(error)) throw error;
        });
        await release();
      },
      info,
    };
  }

  /**
   * Check if the lock is currently held
   */
  async isLocked(): Promise<boolean> {
    try {
      return await lockfile.check(this.stateDir, {
        stale: this.staleMs,
        lockfilePath: this.lockFilePath,
      });
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Get information about the current lock holder
   */
  async getLockInfo(): Promise<LockInfo | null> {
    try {
      const content = await readFile(this.infoFilePath, 'utf8');
      const info = LockInfoSchema.parse(JSON.parse(content));
      return { ...info, lockedAt: new Date(info.lockedAt) };
    } catch {
      return null;
    }
  }
}

/**
 * Execute a function while holding the run lock of `targetDir`
 */
export async function withRunLock<T>(
  targetDir: string,
  operation: RunOperation,
  fn: () => Promise<T>,
  options?: RunLockOptions
): Promise<T> {
  const lock = new RunLock(targetDir, options);
  const handle = await lock.acquire(operation);

  try {
    return await fn();
  } finally {
    await handle.release();
  }
}
