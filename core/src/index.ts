/**
 * @modsync/core
 * Core library for modsync - scanning, hashing, reconciliation and the
 * content-addressed store
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Logging
export { getLog, type Logger } from './logger';

// Configuration
export {
  loadServerConfig,
  loadUploadConfig,
  loadDownloadConfig,
  ServerConfigSchema,
  UPLOAD_CONFIG_FILE,
  DOWNLOAD_CONFIG_FILE,
  type ServerConfig,
  type UploadConfig,
  type DownloadConfig,
} from './config';

// File utilities
export { fileExists, isSafeRelativePath, writeFileAtomic } from './fsutil';

// Hashing utilities
export { hashFile, hashBuffer, isDigest } from './hasher';

// Include and exclude matching
export {
  createPathMatcher,
  createIncludeMatcher,
  createExcludeMatcher,
  DEFAULT_EXCLUDE_PATTERNS,
  STATE_DIRECTORY,
  type IncludeMatcher,
  type PathMatcher,
} from './ignore';

// File scanning
export { scanDirectory, comparePaths, type ScanOptions, type ScanResult } from './scanner';

// Local sync state
export {
  diffSyncState,
  pendingEntries,
  seedSyncState,
  createSyncState,
  loadSyncState,
  saveSyncState,
  loadClientFiles,
  saveClientFiles,
  type SyncDiff,
} from './state';

// Run locking
export { RunLock, withRunLock, type LockInfo, type RunLockHandle, type RunOperation } from './lock';

// Database
export { ModsyncDb, IN_MEMORY } from './db';

// Content-addressed storage
export { BlobStore, type BlobReadStream } from './storage';

// Authoritative store
export { AuthoritativeStore } from './store';

// Wire protocol
export * from './protocol';

// HTTP client
export { ModsyncClient, type ModsyncApi, type ModsyncClientOptions, type ServerInfo } from './api';

// Reconcilers
export { UploadReconciler, type UploadOptions, type UploadRunResult } from './upload';
export {
  DownloadReconciler,
  writeVerifiedFile,
  type DownloadOptions,
  type DownloadRunResult,
} from './download';
