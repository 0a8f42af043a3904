/**
 * Authoritative store: the canonical per-modpack file records and the
 * upload deduplication protocol over the blob storage.
 */

import { v4 as uuid } from 'uuid';
import { ModsyncDb } from './db';
import { AlreadyExistsError, BadRequestError, NotFoundError } from './errors';
import { isSafeRelativePath } from './fsutil';
import { hashFile, isDigest } from './hasher';
import { getLog } from './logger';
import { BlobStore, type BlobReadStream } from './storage';
import type {
  FileRecord,
  FileSyncRequest,
  Modpack,
  ModpackListing,
  NewModpack,
  UploadResult,
} from './types';

const log = getLog('store');

export class AuthoritativeStore {
  constructor(
    private db: ModsyncDb,
    private blobs: BlobStore
  ) {}

  /**
   * @throws AlreadyExistsError if a modpack with that name exists
   */
  async create(input: NewModpack): Promise<Modpack> {
    if (this.db.getModpackByName(input.name)) {
      throw new AlreadyExistsError(`Modpack ${input.name} already exists`);
    }

    const modpack: Modpack = {
      id: uuid(),
      name: input.name,
      game: input.game,
      gameVersion: input.gameVersion,
      modloader: input.modloader,
      modloaderVersion: input.modloaderVersion,
      syncVersion: 0,
    };
    await this.db.insertModpack(modpack);
    log.info({ modpackId: modpack.id, name: modpack.name }, 'Modpack created');
    return modpack;
  }

  list(): Modpack[] {
    return this.db.getAllModpacks();
  }

  get(modpackId: string): ModpackListing {
    const modpack = this.requireModpack(modpackId);
    return { modpack, files: this.db.getModpackFiles(modpackId) };
  }

  /**
   * Record the client's view of one path. Never bumps sync_version.
   */
  async fileSync(modpackId: string, request: FileSyncRequest): Promise<void> {
    this.requireModpack(modpackId);
    if (!isSafeRelativePath(request.path)) {
      throw new BadRequestError(`Invalid path: ${request.path}`);
    }

    await this.db.upsertFile(uuid(), modpackId, request, new Date());
    log.debug({ modpackId, path: request.path, state: request.state }, 'File synced');
  }

  /**
   * Delete a modpack and its records. Blobs stay in storage.
   */
  async delete(modpackId: string): Promise<void> {
    this.requireModpack(modpackId);
    await this.db.deleteModpack(modpackId);
    log.info({ modpackId }, 'Modpack deleted');
  }

  /**
   * Accept uploaded bytes for an existing record.
   * The staged file is always consumed.
   * @throws NotFoundError if no filesync created the record first
   */
  async acceptUpload(modpackId: string, path: string, stagedFile: string): Promise<UploadResult> {
    try {
      const record = this.requireFile(modpackId, path);
      const hash = await hashFile(stagedFile);

      let action: UploadResult['action'];
      if (this.db.findUploadedByHash(hash) && (await this.blobs.exists(hash))) {
        action = 'Exists';
      } else {
        await this.blobs.commit(stagedFile, hash);
        action = 'Uploaded';
      }

      await this.db.markUploaded(record.id, hash, new Date());
      log.info({ modpackId, path, hash, action }, 'Upload accepted');
      return { action, fileId: record.id };
    } finally {
      await this.blobs.discard(stagedFile);
    }
  }

  /**
   * @throws NotFoundError unless an uploaded record carries `digest` and its blob exists
   */
  async openDownload(digest: string): Promise<BlobReadStream> {
    if (!isDigest(digest) || !this.db.findUploadedByHash(digest) || !(await this.blobs.exists(digest))) {
      throw new NotFoundError(`Unknown blob ${digest}`);
    }
    return this.blobs.openRead(digest);
  }

  private requireModpack(modpackId: string): Modpack {
    const modpack = this.db.getModpack(modpackId);
    if (!modpack) {
      throw new NotFoundError(`Modpack ${modpackId} not found`);
    }
    return modpack;
  }

  private requireFile(modpackId: string, path: string): FileRecord {
    this.requireModpack(modpackId);
    const record = this.db.getFileByPath(modpackId, path);
    if (!record) {
      throw new NotFoundError(`No record for ${path} in modpack ${modpackId}`);
    }
    return record;
  }
}
