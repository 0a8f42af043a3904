/**
 * HTTP wire protocol shared by the server and the API client.
 * Bodies are snake_case JSON; the mappers convert to and from domain types.
 */

import { z } from 'zod';
import { FILE_STATES, type FileRecord, type Modpack, type ModpackListing, type UploadResult } from './types';

/** Advertised by `POST /hello` */
export const PROTOCOL_VERSION = '0.3.0';
export const PROTOCOL_VERSION_NUMBER = 3;

/** Multipart field carrying upload bytes */
export const UPLOAD_FIELD = 'upload';

const digest = z.string().regex(/^[0-9a-f]{64}$/, 'Expected a lowercase hex SHA-256 digest');

export const HelloResponseSchema = z.object({
  version: z.string(),
  version_number: z.number().int(),
});

export const CreateModpackRequestSchema = z.object({
  name: z.string().min(1),
  game: z.string(),
  game_version: z.string(),
  modloader: z.string(),
  modloader_version: z.string(),
});

export const CreateModpackResponseSchema = z.object({
  modpack_id: z.string(),
});

export const FileSyncRequestSchema = z.object({
  path: z.string().min(1),
  state: z.enum(FILE_STATES),
  hash: digest.nullable(),
});

export const ModpackSchema = z.object({
  id: z.string(),
  name: z.string(),
  game: z.string().nullable(),
  game_version: z.string().nullable(),
  modloader: z.string().nullable(),
  modloader_version: z.string().nullable(),
  sync_version: z.number().int(),
});

export const FileRecordSchema = z.object({
  id: z.string(),
  modpack_id: z.string(),
  path: z.string(),
  state: z.enum(FILE_STATES),
  hash: z.string().nullable(),
  sync_version: z.number().int(),
  uploaded: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const ModpackListingSchema = z.object({
  modpack: ModpackSchema,
  files: z.array(FileRecordSchema),
});

export const ModpackListSchema = z.object({
  modpacks: z.array(ModpackSchema),
});

export const UploadQuerySchema = z.object({
  file_path: z.string().min(1),
});

export const UploadResponseSchema = z.object({
  action: z.enum(['Uploaded', 'Exists']),
  file_id: z.string(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
});

export type CreateModpackRequest = z.infer<typeof CreateModpackRequestSchema>;
export type ModpackWire = z.infer<typeof ModpackSchema>;
export type FileRecordWire = z.infer<typeof FileRecordSchema>;
export type ModpackListingWire = z.infer<typeof ModpackListingSchema>;
export type UploadResponse = z.infer<typeof UploadResponseSchema>;

// --- Mappers ---

export function modpackToWire(modpack: Modpack): ModpackWire {
  return {
    id: modpack.id,
    name: modpack.name,
    game: modpack.game,
    game_version: modpack.gameVersion,
    modloader: modpack.modloader,
    modloader_version: modpack.modloaderVersion,
    sync_version: modpack.syncVersion,
  };
}

export function modpackFromWire(wire: ModpackWire): Modpack {
  return {
    id: wire.id,
    name: wire.name,
    game: wire.game,
    gameVersion: wire.game_version,
    modloader: wire.modloader,
    modloaderVersion: wire.modloader_version,
    syncVersion: wire.sync_version,
  };
}

export function fileRecordToWire(record: FileRecord): FileRecordWire {
  return {
    id: record.id,
    modpack_id: record.modpackId,
    path: record.path,
    state: record.state,
    hash: record.hash,
    sync_version: record.syncVersion,
    uploaded: record.uploaded,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

export function fileRecordFromWire(wire: FileRecordWire): FileRecord {
  return {
    id: wire.id,
    modpackId: wire.modpack_id,
    path: wire.path,
    state: wire.state,
    hash: wire.hash,
    syncVersion: wire.sync_version,
    uploaded: wire.uploaded,
    createdAt: new Date(wire.created_at),
    updatedAt: new Date(wire.updated_at),
  };
}

export function listingToWire(listing: ModpackListing): ModpackListingWire {
  return {
    modpack: modpackToWire(listing.modpack),
    files: listing.files.map(fileRecordToWire),
  };
}

export function listingFromWire(wire: ModpackListingWire): ModpackListing {
  return {
    modpack: modpackFromWire(wire.modpack),
    files: wire.files.map(fileRecordFromWire),
  };
}

export function uploadResultToWire(result: UploadResult): UploadResponse {
  return { action: result.action, file_id: result.fileId };
}

export function uploadResultFromWire(wire: UploadResponse): UploadResult {
  return { action: wire.action, fileId: wire.file_id };
}
