/**
 * HTTP client for the modsync server
 */

import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import type { z } from 'zod';
import { writeVerifiedFile } from './download';
import {
  AlreadyExistsError,
  AuthenticationError,
  BadRequestError,
  NetworkError,
  NotFoundError,
  PayloadTooLargeError,
  ServerError,
} from './errors';
import { getLog } from './logger';
import {
  CreateModpackResponseSchema,
  ErrorResponseSchema,
  HelloResponseSchema,
  ModpackListSchema,
  ModpackListingSchema,
  UPLOAD_FIELD,
  UploadResponseSchema,
  listingFromWire,
  modpackFromWire,
  uploadResultFromWire,
  type CreateModpackRequest,
} from './protocol';
import type { FileSyncRequest, Modpack, ModpackListing, NewModpack, UploadResult } from './types';

const log = getLog('api');

export interface ServerInfo {
  version: string;
  versionNumber: number;
}

/**
 * Operations the reconcilers need from the server
 */
export interface ModsyncApi {
  hello(): Promise<ServerInfo>;
  createModpack(input: NewModpack): Promise<string>;
  listModpacks(): Promise<Modpack[]>;
  getModpack(modpackId: string): Promise<ModpackListing>;
  fileSync(modpackId: string, request: FileSyncRequest): Promise<void>;
  /** Send the bytes of `localFile` for the record at `path` */
  upload(modpackId: string, path: string, localFile: string): Promise<UploadResult>;
  /** Fetch a blob and write it to `destination` once its digest checks out */
  download(hash: string, destination: string): Promise<void>;
  deleteModpack(modpackId: string): Promise<void>;
}

export interface ModsyncClientOptions {
  serverUrl: string;
  apiKey: string;
  /** Per-request timeout; none when omitted */
  timeoutMs?: number;
}

export class ModsyncClient implements ModsyncApi {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number | undefined;

  constructor(options: ModsyncClientOptions) {
    this.baseUrl = options.serverUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  async hello(): Promise<ServerInfo> {
    const response = await this.request('POST', '/hello');
    const body = await parseBody(response, HelloResponseSchema);
    return { version: body.version, versionNumber: body.version_number };
  }

  async createModpack(input: NewModpack): Promise<string> {
    const payload: CreateModpackRequest = {
      name: input.name,
      game: input.game,
      game_version: input.gameVersion,
      modloader: input.modloader,
      modloader_version: input.modloaderVersion,
    };
    const response = await this.request('POST', '/modpack/create', { json: payload });
    const body = await parseBody(response, CreateModpackResponseSchema);
    return body.modpack_id;
  }

  async listModpacks(): Promise<Modpack[]> {
    const response = await this.request('GET', '/modpacks');
    const body = await parseBody(response, ModpackListSchema);
    return body.modpacks.map(modpackFromWire);
  }

  async getModpack(modpackId: string): Promise<ModpackListing> {
    const response = await this.request('GET', `/modpack/${encodeURIComponent(modpackId)}`);
    return listingFromWire(await parseBody(response, ModpackListingSchema));
  }

  async fileSync(modpackId: string, request: FileSyncRequest): Promise<void> {
    const response = await this.request(
      'POST',
      `/modpack/${encodeURIComponent(modpackId)}/filesync`,
      { json: request }
    );
    await response.arrayBuffer();
  }

  async upload(modpackId: string, path: string, localFile: string): Promise<UploadResult> {
    const form = new FormData();
    form.append(UPLOAD_FIELD, await openAsBlob(localFile), basename(localFile));

    const query = new URLSearchParams({ file_path: path });
    const response = await this.request(
      'POST',
      `/modpack/${encodeURIComponent(modpackId)}/upload?${query.toString()}`,
      { body: form }
    );
    return uploadResultFromWire(await parseBody(response, UploadResponseSchema));
  }

  async download(hash: string, destination: string): Promise<void> {
    const response = await this.request('GET', `/dl/hash/${encodeURIComponent(hash)}`, {
      headers: { 'Accept-Encoding': 'gzip' },
    });
    if (!response.body) {
      throw new ServerError(`Empty body for blob ${hash}`, response.status);
    }
    await writeVerifiedFile(Readable.fromWeb(response.body), hash, destination);
  }

  async deleteModpack(modpackId: string): Promise<void> {
    const response = await this.request('POST', `/modpack/${encodeURIComponent(modpackId)}/delete`);
    await response.arrayBuffer();
  }

  private async request(
    method: string,
    path: string,
    options: { json?: unknown; body?: FormData; headers?: Record<string, string> } = {}
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      ...options.headers,
    };
    let body: string | FormData | undefined = options.body;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers,
        body,
        signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${method} ${path} failed: ${message}`, error);
    }

    if (!response.ok) {
      throw await errorFromResponse(method, path, response);
    }
    log.debug({ method, path, status: response.status }, 'Request completed');
    return response;
  }
}

async function errorFromResponse(method: string, path: string, response: Response): Promise<Error> {
  const text = await response.text();
  const parsed = ErrorResponseSchema.safeParse(parseJson(text));
  const code = parsed.success ? parsed.data.error : undefined;
  const message = `${method} ${path} returned ${response.status}${code ? ` ${code}` : ''}`;

  switch (response.status) {
    case 401:
      return new AuthenticationError(message);
    case 404:
      return new NotFoundError(message);
    case 413:
      return new PayloadTooLargeError(message);
    case 400:
      return code === 'ALREADY_EXISTS' ? new AlreadyExistsError(message) : new BadRequestError(message);
    default:
      return new ServerError(message, response.status);
  }
}

async function parseBody<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.infer<T>> {
  const text = await response.text();
  const result = schema.safeParse(parseJson(text));
  if (!result.success) {
    throw new ServerError(
      `Unexpected response body from ${response.url}: ${result.error.message}`,
      response.status,
      result.error
    );
  }
  return result.data;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
