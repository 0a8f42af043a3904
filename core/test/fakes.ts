import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { ModsyncApi, ServerInfo } from '../src/api';
import { writeVerifiedFile } from '../src/download';
import { AuthenticationError, NetworkError, NotFoundError } from '../src/errors';
import { hashBuffer } from '../src/hasher';
import type {
  FileRecord,
  FileState,
  FileSyncRequest,
  Modpack,
  ModpackListing,
  NewModpack,
  UploadResult,
} from '../src/types';

export const MODPACK: Modpack = {
  id: 'modpack-1',
  name: 'Test',
  game: 'minecraft',
  gameVersion: '1.20.1',
  modloader: 'forge',
  modloaderVersion: '47.2.0',
  syncVersion: 0,
};

export function record(
  path: string,
  state: FileState,
  content: string | null,
  syncVersion = 1
): FileRecord {
  return {
    id: `file-${path}`,
    modpackId: MODPACK.id,
    path,
    state,
    hash: content === null ? null : hashBuffer(Buffer.from(content)),
    syncVersion,
    uploaded: content !== null,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    updatedAt: new Date('2024-01-01T00:00:00.000Z'),
  };
}

/**
 * In-memory stand-in for the server
 */
export class FakeApi implements ModsyncApi {
  files: FileRecord[] = [];
  blobs = new Map<string, Buffer>();
  fileSyncCalls: FileSyncRequest[] = [];
  uploadCalls: string[] = [];
  downloadCalls: string[] = [];

  rejectKey = false;
  failUploads = false;
  failDownloads = false;
  /** Digests served with the wrong bytes */
  corrupt = new Set<string>();

  addBlob(content: string): string {
    const bytes = Buffer.from(content);
    const hash = hashBuffer(bytes);
    this.blobs.set(hash, bytes);
    return hash;
  }

  resetCalls(): void {
    this.fileSyncCalls = [];
    this.uploadCalls = [];
    this.downloadCalls = [];
  }

  async hello(): Promise<ServerInfo> {
    if (this.rejectKey) throw new AuthenticationError();
    return { version: 'test', versionNumber: 0 };
  }

  async createModpack(_input: NewModpack): Promise<string> {
    return MODPACK.id;
  }

  async listModpacks(): Promise<Modpack[]> {
    return [MODPACK];
  }

  async getModpack(modpackId: string): Promise<ModpackListing> {
    if (modpackId !== MODPACK.id) throw new NotFoundError();
    return { modpack: MODPACK, files: [...this.files] };
  }

  async fileSync(_modpackId: string, request: FileSyncRequest): Promise<void> {
    this.fileSyncCalls.push({ ...request });
  }

  async upload(_modpackId: string, path: string, localFile: string): Promise<UploadResult> {
    if (this.failUploads) throw new NetworkError('connection reset');
    this.uploadCalls.push(path);

    const bytes = await readFile(localFile);
    const hash = hashBuffer(bytes);
    const known = this.blobs.has(hash);
    this.blobs.set(hash, bytes);
    return { action: known ? 'Exists' : 'Uploaded', fileId: `file-${path}` };
  }

  async download(hash: string, destination: string): Promise<void> {
    if (this.failDownloads) throw new NetworkError('connection reset');
    const bytes = this.blobs.get(hash);
    if (!bytes) throw new NotFoundError(`Unknown blob ${hash}`);

    this.downloadCalls.push(hash);
    const served = this.corrupt.has(hash) ? Buffer.from('tampered') : bytes;
    await writeVerifiedFile(Readable.from([served]), hash, destination);
  }

  async deleteModpack(_modpackId: string): Promise<void> {
    this.files = [];
  }
}
