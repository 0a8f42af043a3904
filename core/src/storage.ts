/**
 * Content-addressed blob storage.
 * Blobs live in one flat directory named by their SHA-256 digest and are
 * gzip-compressed at rest.
 */

import { createReadStream, createWriteStream, type ReadStream } from 'node:fs';
import { mkdir, stat, readdir, unlink, rename, rm, open } from 'node:fs/promises';
import { join } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import { v4 as uuid } from 'uuid';
import { isDigest } from './hasher';
import { fileExists, isNotFound } from './fsutil';
import { getLog } from './logger';

const log = getLog('storage');

const TEMP_DIRECTORY = '.tmp';
const STAGING_DIRECTORY = '.staging';

export interface BlobReadStream {
  stream: ReadStream;
  /** Whether the stream yields gzip bytes */
  gzipped: boolean;
  size: number;
}

export class BlobStore {
  private blobsPath: string;
  private tempPath: string;
  private stagingPath: string;

  constructor(uploadsDirectory: string) {
    this.blobsPath = uploadsDirectory;
    this.tempPath = join(uploadsDirectory, TEMP_DIRECTORY);
    this.stagingPath = join(uploadsDirectory, STAGING_DIRECTORY);
  }

  async initialize(): Promise<void> {
    await mkdir(this.blobsPath, { recursive: true });
    await mkdir(this.tempPath, { recursive: true });
    await mkdir(this.stagingPath, { recursive: true });
  }

  /**
   * Where request bodies are spooled before they are hashed
   */
  get stagingDirectory(): string {
    return this.stagingPath;
  }

  blobPath(hash: string): string {
    if (!isDigest(hash)) {
      throw new Error(`Not a SHA-256 digest: ${hash}`);
    }
    return join(this.blobsPath, hash);
  }

  async exists(hash: string): Promise<boolean> {
    return isDigest(hash) && (await fileExists(this.blobPath(hash)));
  }

  /**
   * Compress `sourcePath` into the blob named `hash`.
   * The bytes go to a unique temporary file first and are renamed into
   * place, so concurrent commits of one digest leave one complete blob.
   */
  async commit(sourcePath: string, hash: string): Promise<void> {
    const blobPath = this.blobPath(hash);
    const tempFilePath = join(this.tempPath, `${hash}.${uuid()}.tmp`);

    try {
      await pipeline(createReadStream(sourcePath), createGzip(), createWriteStream(tempFilePath));
      await rename(tempFilePath, blobPath);
    } catch (error) {
      await unlink(tempFilePath).catch(() => undefined);
      throw error;
    }
    log.debug({ hash }, 'Blob stored');
  }

  /**
   * Remove a staged request body
   */
  async discard(stagedPath: string): Promise<void> {
    try {
      await unlink(stagedPath);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }

  /**
   * Open a blob for reading as stored.
   * Blobs written before compression was introduced have no gzip header and
   * are returned raw.
   */
  async openRead(hash: string): Promise<BlobReadStream> {
    const blobPath = this.blobPath(hash);
    const { size } = await stat(blobPath);

    const handle = await open(blobPath, 'r');
    let gzipped: boolean;
    try {
      const buffer = Buffer.alloc(2);
      const { bytesRead } = await handle.read(buffer, 0, 2, 0);
      gzipped = bytesRead === 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;
    } finally {
      await handle.close();
    }

    return { stream: createReadStream(blobPath), gzipped, size };
  }

  /**
   * Get storage statistics
   */
  async getStats(): Promise<{ blobCount: number; totalSize: number }> {
    let blobCount = 0;
    let totalSize = 0;

    for (const name of await readdir(this.blobsPath)) {
      if (!isDigest(name)) continue;
      const stats = await stat(join(this.blobsPath, name));
      if (stats.isFile()) {
        blobCount++;
        totalSize += stats.size;
      }
    }

    return { blobCount, totalSize };
  }

  /**
   * Clean up temporary and staged files left by an interrupted process
   */
  async cleanupTemp(): Promise<void> {
    await rm(this.tempPath, { recursive: true, force: true });
    await rm(this.stagingPath, { recursive: true, force: true });
    await mkdir(this.tempPath, { recursive: true });
    await mkdir(this.stagingPath, { recursive: true });
  }
}
