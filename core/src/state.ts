/**
 * Local sync bookkeeping: the upload-side SyncState with its three-way diff,
 * and the download-side ClientFileInfo map. Both persist as JSON under
 * `<target>/.modsync/`.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { StateFileError } from './errors';
import { isNotFound, writeFileAtomic } from './fsutil';
import { STATE_DIRECTORY } from './ignore';
import { comparePaths } from './scanner';
import {
  DIRTYNESS_VALUES,
  FILE_STATES,
  type ClientFileInfo,
  type FileRecord,
  type ScannedFile,
  type SyncFile,
  type SyncState,
} from './types';

export const UPLOAD_STATE_FILE = 'upload-state.json';
export const DOWNLOAD_STATE_FILE = 'download-state.json';

const SyncFileSchema = z.object({
  hash: z.string().nullable(),
  state: z.enum(FILE_STATES),
  dirtyness: z.enum(DIRTYNESS_VALUES),
});

const UploadStateFileSchema = z.object({
  upload_version: z.number().int().nonnegative().default(0),
  files: z.record(SyncFileSchema).default({}),
});

const ClientFileInfoSchema = z.object({
  sync_version: z.number().int(),
  hash: z.string().nullable(),
  dirty: z.boolean(),
  disable_sync: z.boolean().default(false),
});

const DownloadStateFileSchema = z.object({
  files: z.record(ClientFileInfoSchema).default({}),
});

export interface SyncDiff {
  created: string[];
  updated: string[];
  deleted: string[];
}

export function createSyncState(): SyncState {
  return { uploadVersion: 0, files: new Map() };
}

/**
 * Fold a fresh scan into the sync history.
 * Mutates `state` and reports what changed, each list sorted by path.
 */
export function diffSyncState(state: SyncState, scanned: ScannedFile[]): SyncDiff {
  const diff: SyncDiff = { created: [], updated: [], deleted: [] };
  const seen = new Set<string>();

  for (const file of scanned) {
    seen.add(file.path);
    const existing = state.files.get(file.path);

    if (!existing) {
      state.files.set(file.path, { hash: file.hash, state: 'Exists', dirtyness: 'Created' });
      diff.created.push(file.path);
    } else if (existing.state === 'Deleted') {
      // A tombstoned path came back
      existing.state = 'Exists';
      existing.hash = file.hash;
      existing.dirtyness = 'Created';
      diff.created.push(file.path);
    } else if (existing.state === 'Exists' && existing.hash !== file.hash) {
      existing.hash = file.hash;
      existing.dirtyness = 'Updated';
      diff.updated.push(file.path);
    }
  }

  for (const [path, file] of state.files) {
    if (file.state === 'Exists' && !seen.has(path)) {
      file.state = 'Deleted';
      file.dirtyness = 'Deleted';
      diff.deleted.push(path);
    }
  }

  diff.created.sort(comparePaths);
  diff.updated.sort(comparePaths);
  diff.deleted.sort(comparePaths);
  return diff;
}

/**
 * Entries the push phase must send, in path order
 */
export function pendingEntries(state: SyncState, forceSync: boolean): Array<[string, SyncFile]> {
  return [...state.files.entries()]
    .filter(([, file]) => forceSync || file.dirtyness !== 'Clean')
    .sort(([a], [b]) => comparePaths(a, b));
}

/**
 * Replace local history with the server's view; every entry is re-pushed
 */
export function seedSyncState(files: FileRecord[]): SyncState {
  const state = createSyncState();
  for (const record of files) {
    state.files.set(record.path, {
      hash: record.hash,
      state: record.state,
      dirtyness: 'Updated',
    });
  }
  return state;
}

export function stateFilePath(targetDir: string, fileName: string): string {
  return join(targetDir, STATE_DIRECTORY, fileName);
}

/**
 * Load the upload-side state. A missing file is an empty state;
 * an unreadable one is an error and is left as it is.
 */
export async function loadSyncState(targetDir: string): Promise<SyncState> {
  const filePath = stateFilePath(targetDir, UPLOAD_STATE_FILE);
  const parsed = await readStateFile(filePath, UploadStateFileSchema);
  if (!parsed) {
    return createSyncState();
  }

  return {
    uploadVersion: parsed.upload_version,
    files: new Map(Object.entries(parsed.files)),
  };
}

export async function saveSyncState(targetDir: string, state: SyncState): Promise<void> {
  const files: Record<string, z.infer<typeof SyncFileSchema>> = {};
  for (const [path, file] of [...state.files].sort(([a], [b]) => comparePaths(a, b))) {
    files[path] = { hash: file.hash, state: file.state, dirtyness: file.dirtyness };
  }

  const content = { upload_version: state.uploadVersion, files };
  await writeFileAtomic(
    stateFilePath(targetDir, UPLOAD_STATE_FILE),
    JSON.stringify(content, null, 2)
  );
}

export async function loadClientFiles(targetDir: string): Promise<Map<string, ClientFileInfo>> {
  const filePath = stateFilePath(targetDir, DOWNLOAD_STATE_FILE);
  const parsed = await readStateFile(filePath, DownloadStateFileSchema);
  const files = new Map<string, ClientFileInfo>();
  if (!parsed) {
    return files;
  }

  for (const [path, info] of Object.entries(parsed.files)) {
    files.set(path, {
      syncVersion: info.sync_version,
      hash: info.hash,
      dirty: info.dirty,
      disableSync: info.disable_sync,
    });
  }
  return files;
}

export async function saveClientFiles(
  targetDir: string,
  files: Map<string, ClientFileInfo>
): Promise<void> {
  const content: Record<string, z.infer<typeof ClientFileInfoSchema>> = {};
  for (const [path, info] of [...files].sort(([a], [b]) => comparePaths(a, b))) {
    content[path] = {
      sync_version: info.syncVersion,
      hash: info.hash,
      dirty: info.dirty,
      disable_sync: info.disableSync,
    };
  }

  await writeFileAtomic(
    stateFilePath(targetDir, DOWNLOAD_STATE_FILE),
    JSON.stringify({ files: content }, null, 2)
  );
}

async function readStateFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T> | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StateFileError(`State file ${filePath} is not valid JSON`, filePath, error);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new StateFileError(
      `State file ${filePath} is malformed: ${result.error.message}`,
      filePath,
      result.error
    );
  }
  return result.data;
}
