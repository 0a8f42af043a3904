/**
 * Core types for modsync
 */

export const FILE_STATES = ['Exists', 'Deleted', 'Ignored'] as const;

/** Authoritative state of a tracked path */
export type FileState = (typeof FILE_STATES)[number];

export const DIRTYNESS_VALUES = ['Clean', 'Created', 'Updated', 'Deleted'] as const;

/** How a path has diverged locally since the last successful push */
export type Dirtyness = (typeof DIRTYNESS_VALUES)[number];

export interface Modpack {
  id: string;
  name: string;
  game: string | null;
  gameVersion: string | null;
  modloader: string | null;
  modloaderVersion: string | null;
  syncVersion: number;
}

export interface NewModpack {
  name: string;
  game: string;
  gameVersion: string;
  modloader: string;
  modloaderVersion: string;
}

export interface FileRecord {
  id: string;
  modpackId: string;
  path: string;
  state: FileState;
  hash: string | null;
  /** Bumped only when an upload completes */
  syncVersion: number;
  uploaded: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ModpackListing {
  modpack: Modpack;
  files: FileRecord[];
}

export interface FileSyncRequest {
  path: string;
  state: FileState;
  hash: string | null;
}

export type UploadAction = 'Uploaded' | 'Exists';

export interface UploadResult {
  action: UploadAction;
  fileId: string;
}

/** Upload-side bookkeeping for one path */
export interface SyncFile {
  hash: string | null;
  state: FileState;
  dirtyness: Dirtyness;
}

export interface SyncState {
  /** Number of completed upload runs */
  uploadVersion: number;
  files: Map<string, SyncFile>;
}

/** Download-side bookkeeping for one path */
export interface ClientFileInfo {
  syncVersion: number;
  hash: string | null;
  dirty: boolean;
  disableSync: boolean;
}

export interface ScannedFile {
  path: string;
  hash: string;
  size: number;
}

/**
 * `invalid-encoding`: the name is not UTF-8.
 * `unsafe-name`: the path could not be synchronized as a relative path
 * (backslashes, a drive prefix, a name made only of dots).
 */
export type ScanErrorReason = 'invalid-encoding' | 'unsafe-name';

export interface ScanError {
  path: string;
  reason: ScanErrorReason;
}

export interface FileFailure {
  path: string;
  reason: string;
}
