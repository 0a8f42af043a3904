/**
 * Shared server resources. The database handle is reference counted:
 * every context retains it and releases it on close.
 */

import { AuthoritativeStore, BlobStore, ModsyncDb, type ServerConfig } from '@modsync/core';

export interface ServerContext {
  config: ServerConfig;
  db: ModsyncDb;
  blobs: BlobStore;
  store: AuthoritativeStore;
  close(): Promise<void>;
}

export async function createServerContext(config: ServerConfig, db?: ModsyncDb): Promise<ServerContext> {
  let handle: ModsyncDb;
  if (db) {
    handle = db.retain();
  } else {
    handle = new ModsyncDb(config.databasePath).retain();
    await handle.initialize();
  }

  const blobs = new BlobStore(config.uploadsDirectory);
  await blobs.initialize();

  return {
    config,
    db: handle,
    blobs,
    store: new AuthoritativeStore(handle, blobs),
    close: () => handle.release(),
  };
}
