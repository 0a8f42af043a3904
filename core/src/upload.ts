/**
 * Upload-side reconciliation: scan, diff against the local sync history,
 * push what changed.
 */

import { join } from 'node:path';
import type { ModsyncApi } from './api';
import { createExcludeMatcher, createIncludeMatcher } from './ignore';
import { withRunLock, type RunLockOptions } from './lock';
import { getLog } from './logger';
import { scanDirectory } from './scanner';
import { diffSyncState, loadSyncState, pendingEntries, saveSyncState, seedSyncState } from './state';
import type { ScanError, SyncState } from './types';

const log = getLog('upload');

export interface UploadOptions {
  modpackId: string;
  /** Glob patterns; a file must match one to be tracked */
  include: string[];
  excludes: string[];
  /** Push every entry, clean or not */
  forceSync?: boolean;
  /** Send bytes for every pushed entry that exists */
  forceUpload?: boolean;
  /** Start from the server's listing instead of the local history */
  seedFromServer?: boolean;
  /** Concurrent hash operations during the scan */
  concurrency?: number;
}

export interface UploadRunResult {
  created: string[];
  updated: string[];
  deleted: string[];
  fileSyncs: number;
  uploads: number;
  /** Uploads the server already had the bytes for */
  deduplicated: number;
  scanErrors: ScanError[];
  uploadVersion: number;
}

export class UploadReconciler {
  constructor(
    private api: ModsyncApi,
    private targetDir: string,
    private lockOptions: RunLockOptions = {}
  ) {}

  /**
   * One reconciliation run. The state file is rewritten only when every
   * push succeeded; any failure leaves it as it was.
   */
  async run(options: UploadOptions): Promise<UploadRunResult> {
    const server = await this.api.hello();
    log.debug({ version: server.version }, 'Server reachable');

    return withRunLock(
      this.targetDir,
      'upload',
      async () => {
        const state = await this.loadState(options);

        const scan = await scanDirectory(this.targetDir, {
          include: createIncludeMatcher(options.include),
          exclude: createExcludeMatcher(options.excludes),
          concurrency: options.concurrency,
        });
        const diff = diffSyncState(state, scan.entries);
        log.info(
          {
            created: diff.created.length,
            updated: diff.updated.length,
            deleted: diff.deleted.length,
            scanned: scan.entries.length,
          },
          'Scan complete'
        );

        const result: UploadRunResult = {
          ...diff,
          fileSyncs: 0,
          uploads: 0,
          deduplicated: 0,
          scanErrors: scan.errors,
          uploadVersion: state.uploadVersion,
        };

        for (const [path, file] of pendingEntries(state, options.forceSync ?? false)) {
          await this.api.fileSync(options.modpackId, { path, state: file.state, hash: file.hash });
          result.fileSyncs++;
          log.info({ path, state: file.state, dirtyness: file.dirtyness }, 'Synced');

          const needsBytes =
            options.forceUpload || file.dirtyness === 'Created' || file.dirtyness === 'Updated';
          if (file.state === 'Exists' && needsBytes) {
            const upload = await this.api.upload(options.modpackId, path, join(this.targetDir, path));
            result.uploads++;
            if (upload.action === 'Exists') {
              result.deduplicated++;
            }
            log.info({ path, action: upload.action }, 'Uploaded');
          }

          file.dirtyness = 'Clean';
        }

        state.uploadVersion++;
        await saveSyncState(this.targetDir, state);
        result.uploadVersion = state.uploadVersion;
        return result;
      },
      this.lockOptions
    );
  }

  private async loadState(options: UploadOptions): Promise<SyncState> {
    if (options.seedFromServer) {
      const listing = await this.api.getModpack(options.modpackId);
      log.info({ files: listing.files.length }, 'Seeding sync state from server');
      return seedSyncState(listing.files);
    }
    return loadSyncState(this.targetDir);
  }
}
