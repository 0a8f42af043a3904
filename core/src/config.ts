/**
 * Configuration for the server (environment) and the sync clients (JSON files
 * in the synchronized directory). Values are passed explicitly to whatever
 * needs them.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { isNotFound } from './fsutil';

export const UPLOAD_CONFIG_FILE = 'modsync.sync.json';
export const DOWNLOAD_CONFIG_FILE = 'modsync.json';

export const ServerConfigSchema = z.object({
  databasePath: z.string().min(1),
  masterKey: z.string().min(1, 'MODSYNC_MASTER_KEY is required'),
  port: z.coerce.number().int().min(0).max(65535),
  uploadsDirectory: z.string().min(1),
  /** Largest accepted upload in bytes */
  fileSizeLimit: z.coerce.number().int().positive(),
  requestTimeoutMs: z.coerce.number().int().positive(),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

const UploadConfigFileSchema = z.object({
  modpack_id: z.string().min(1),
  server_url: z.string().url(),
  api_key: z.string().min(1),
  include_globs: z.array(z.string()).default([]),
  excludes: z.array(z.string()).default([]),
});

const DownloadConfigFileSchema = z.object({
  modpack_id: z.string().min(1),
  server_url: z.string().url(),
  api_key: z.string().min(1),
});

export interface DownloadConfig {
  modpackId: string;
  serverUrl: string;
  apiKey: string;
}

export interface UploadConfig extends DownloadConfig {
  includeGlobs: string[];
  excludes: string[];
}

/**
 * Read the server configuration from environment variables
 * @throws ConfigurationError when a value is missing or invalid
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ServerConfigSchema.safeParse({
    databasePath: env.DATABASE_PATH || 'modsync.db',
    masterKey: env.MODSYNC_MASTER_KEY ?? '',
    port: env.MODSYNC_PORT || 7040,
    uploadsDirectory: env.MODSYNC_UPLOADS_DIRECTORY || 'uploads',
    fileSizeLimit: env.MODSYNC_FILE_SIZE_LIMIT || 262144000,
    requestTimeoutMs: env.MODSYNC_REQUEST_TIMEOUT_MS || 15000,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid server configuration: ${issues.join('; ')}`, result.error);
  }
  return result.data;
}

export async function loadUploadConfig(dir: string): Promise<UploadConfig> {
  const config = await readConfigFile(join(dir, UPLOAD_CONFIG_FILE), UploadConfigFileSchema);
  return {
    modpackId: config.modpack_id,
    serverUrl: config.server_url,
    apiKey: config.api_key,
    includeGlobs: config.include_globs,
    excludes: config.excludes,
  };
}

export async function loadDownloadConfig(dir: string): Promise<DownloadConfig> {
  const config = await readConfigFile(join(dir, DOWNLOAD_CONFIG_FILE), DownloadConfigFileSchema);
  return {
    modpackId: config.modpack_id,
    serverUrl: config.server_url,
    apiKey: config.api_key,
  };
}

async function readConfigFile<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.infer<T>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new ConfigurationError(`Config file ${filePath} not found`, error);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON`, error);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Config file ${filePath} is invalid: ${result.error.message}`, result.error);
  }
  return result.data;
}
