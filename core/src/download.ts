/**
 * Download-side reconciliation: applies the server's listing of a modpack
 * to a local directory.
 */

import { createHash } from 'node:crypto';
import { createWriteStream } from 'node:fs';
import { mkdir, rename, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { Transform, type Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { ModsyncApi } from './api';
import { IntegrityError, NotFoundError } from './errors';
import { fileExists, isNotFound, isSafeRelativePath, tempPathFor } from './fsutil';
import { hashFile } from './hasher';
import { withRunLock, type RunLockOptions } from './lock';
import { getLog } from './logger';
import { loadClientFiles, saveClientFiles } from './state';
import type { ClientFileInfo, FileFailure, FileRecord } from './types';

const log = getLog('download');

export interface DownloadOptions {
  modpackId: string;
  /** Rehash every present file even when nothing suggests it changed */
  forceCheck?: boolean;
}

export interface DownloadRunResult {
  downloaded: string[];
  deleted: string[];
  /** Present files that were rehashed and already matched */
  verified: number;
  /** Entries whose bookkeeping was refreshed without any I/O */
  refreshed: number;
  skipped: FileFailure[];
}

type FileAction = 'downloaded' | 'deleted' | 'verified' | 'refreshed' | 'absent';

export class DownloadReconciler {
  constructor(
    private api: ModsyncApi,
    private targetDir: string,
    private lockOptions: RunLockOptions = {}
  ) {}

  /**
   * Bring the target directory in line with the server's listing.
   * Bookkeeping is written only after every record has been handled.
   */
  async run(options: DownloadOptions): Promise<DownloadRunResult> {
    return withRunLock(
      this.targetDir,
      'download',
      async () => {
        const listing = await this.api.getModpack(options.modpackId);
        const files = await loadClientFiles(this.targetDir);
        const result: DownloadRunResult = {
          downloaded: [],
          deleted: [],
          verified: 0,
          refreshed: 0,
          skipped: [],
        };

        for (const record of listing.files) {
          if (record.state === 'Ignored') continue;

          if (!isSafeRelativePath(record.path)) {
            log.warn({ path: record.path }, 'Path escapes the target directory, skipping');
            result.skipped.push({ path: record.path, reason: 'unsafe path' });
            continue;
          }

          let info = files.get(record.path);
          if (!info) {
            info = { syncVersion: record.syncVersion, hash: null, dirty: true, disableSync: false };
            files.set(record.path, info);
          }
          if (info.disableSync) {
            log.debug({ path: record.path }, 'Sync disabled, skipping');
            continue;
          }

          let action: FileAction;
          try {
            action = await this.apply(record, info, options.forceCheck ?? false);
          } catch (error) {
            if (error instanceof NotFoundError || error instanceof IntegrityError) {
              log.warn({ path: record.path, err: error }, 'File skipped');
              result.skipped.push({ path: record.path, reason: error.message });
              continue;
            }
            throw error;
          }

          info.hash = record.hash;
          info.syncVersion = record.syncVersion;
          info.dirty = false;

          switch (action) {
            case 'downloaded':
              result.downloaded.push(record.path);
              break;
            case 'deleted':
              result.deleted.push(record.path);
              break;
            case 'verified':
              result.verified++;
              break;
            case 'refreshed':
              result.refreshed++;
              break;
            case 'absent':
              break;
          }
        }

        await saveClientFiles(this.targetDir, files);
        log.info(
          {
            modpackId: options.modpackId,
            downloaded: result.downloaded.length,
            deleted: result.deleted.length,
            skipped: result.skipped.length,
          },
          'Download complete'
        );
        return result;
      },
      this.lockOptions
    );
  }

  private async apply(record: FileRecord, info: ClientFileInfo, forceCheck: boolean): Promise<FileAction> {
    const localPath = join(this.targetDir, record.path);

    if (record.state === 'Deleted') {
      try {
        await unlink(localPath);
      } catch (error) {
        if (isNotFound(error)) return 'absent';
        throw error;
      }
      log.info({ path: record.path }, 'Deleted');
      return 'deleted';
    }

    if (!record.hash) {
      throw new NotFoundError(`Record for ${record.path} has no content hash`);
    }

    if (!(await fileExists(localPath))) {
      await this.api.download(record.hash, localPath);
      log.info({ path: record.path, hash: record.hash }, 'Downloaded');
      return 'downloaded';
    }

    if (info.dirty || record.syncVersion > info.syncVersion || forceCheck) {
      const localHash = await hashFile(localPath);
      if (localHash === record.hash) {
        return 'verified';
      }
      await this.api.download(record.hash, localPath);
      log.info({ path: record.path, hash: record.hash }, 'Replaced');
      return 'downloaded';
    }

    return 'refreshed';
  }
}

/**
 * Stream `source` to `destination`, hashing on the way. The file appears
 * only if the bytes hash to `expectedHash`.
 * @throws IntegrityError on a digest mismatch
 */
export async function writeVerifiedFile(
  source: Readable,
  expectedHash: string,
  destination: string
): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  const tempPath = tempPathFor(destination);
  const hash = createHash('sha256');

  const hashing = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      hash.update(chunk);
      callback(null, chunk);
    },
  });

  try {
    await pipeline(source, hashing, createWriteStream(tempPath));
    const actualHash = hash.digest('hex');
    if (actualHash !== expectedHash) {
      throw new IntegrityError(
        `Digest mismatch for ${destination}: expected ${expectedHash}, got ${actualHash}`,
        expectedHash,
        actualHash
      );
    }
    await rename(tempPath, destination);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}
