/**
 * HTTP surface of the authoritative server
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';
import type { z } from 'zod';
import {
  BadRequestError,
  CreateModpackRequestSchema,
  FileSyncRequestSchema,
  ModsyncError,
  PROTOCOL_VERSION,
  PROTOCOL_VERSION_NUMBER,
  PayloadTooLargeError,
  UploadQuerySchema,
  getLog,
  listingToWire,
  modpackToWire,
  uploadResultToWire,
  type ErrorCode,
} from '@modsync/core';
import { requireApiKey } from './auth';
import type { ServerContext } from './context';

const log = getLog('http');

export function createApp(context: ServerContext): express.Express {
  const { store, blobs, config } = context;
  const app = express();

  const upload = multer({
    dest: blobs.stagingDirectory,
    limits: { fileSize: config.fileSizeLimit, files: 1 },
  });

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json({ limit: '1mb' }));

  // ---- Public endpoints ----

  app.get('/', (_req, res) => {
    res.type('text/plain').send(`modsync server ${PROTOCOL_VERSION}\n`);
  });

  // Knowing the digest is the authorization: digests are only handed out in
  // authenticated listings
  app.get('/dl/hash/:digest', async (req, res) => {
    const blob = await store.openDownload(req.params.digest);
    res.setHeader('Content-Type', 'application/octet-stream');
    res.vary('Accept-Encoding');

    if (blob.gzipped && req.acceptsEncodings('gzip') === 'gzip') {
      res.setHeader('Content-Encoding', 'gzip');
      res.setHeader('Content-Length', blob.size);
      await pipeline(blob.stream, res);
    } else if (blob.gzipped) {
      await pipeline(blob.stream, createGunzip(), res);
    } else {
      res.setHeader('Content-Length', blob.size);
      await pipeline(blob.stream, res);
    }
  });

  // ---- Protected endpoints ----

  app.use(requireApiKey(config.masterKey));

  app.post('/hello', (_req, res) => {
    res.json({ version: PROTOCOL_VERSION, version_number: PROTOCOL_VERSION_NUMBER });
  });

  app.get('/modpacks', (_req, res) => {
    res.json({ modpacks: store.list().map(modpackToWire) });
  });

  app.post('/modpack/create', async (req, res) => {
    const body = parseOrBadRequest(CreateModpackRequestSchema, req.body);
    const modpack = await store.create({
      name: body.name,
      game: body.game,
      gameVersion: body.game_version,
      modloader: body.modloader,
      modloaderVersion: body.modloader_version,
    });
    res.json({ modpack_id: modpack.id });
  });

  app.get('/modpack/:id', (req, res) => {
    res.json(listingToWire(store.get(req.params.id)));
  });

  app.post('/modpack/:id/filesync', async (req, res) => {
    const body = parseOrBadRequest(FileSyncRequestSchema, req.body);
    await store.fileSync(req.params.id, body);
    res.json({});
  });

  app.post('/modpack/:id/upload', upload.any(), async (req, res) => {
    // The multer middleware widens the inferred route params
    const modpackId: unknown = req.params.id;
    const files = Array.isArray(req.files) ? req.files : [];
    const file = files[0];
    if (!file) {
      throw new BadRequestError('Missing file part');
    }

    const query = UploadQuerySchema.safeParse(req.query);
    if (!query.success || typeof modpackId !== 'string') {
      await blobs.discard(file.path);
      throw new BadRequestError(query.success ? 'Invalid modpack id' : 'Missing file_path');
    }

    const result = await store.acceptUpload(modpackId, query.data.file_path, file.path);
    res.json(uploadResultToWire(result));
  });

  app.post('/modpack/:id/delete', async (req, res) => {
    await store.delete(req.params.id);
    res.json({ success: true });
  });

  app.use(errorHandler);

  return app;
}

function parseOrBadRequest<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new BadRequestError(result.error.message);
  }
  return result.data;
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();
  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
    log.info(
      { method: req.method, url: req.originalUrl, status: res.statusCode, durationMs },
      'Request handled'
    );
  });
  next();
}

/**
 * Map errors to `{ error: CODE }` bodies
 */
function errorHandler(error: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    log.error({ err: error }, 'Error after response started');
    next(error);
    return;
  }

  const mapped = toModsyncError(error);
  if (mapped) {
    res.status(mapped.status).json({ error: mapped.code });
    return;
  }

  log.error({ err: error }, 'Unhandled error');
  const code: ErrorCode = 'INTERNAL_ERROR';
  res.status(500).json({ error: code });
}

function toModsyncError(error: unknown): ModsyncError | null {
  if (error instanceof ModsyncError) {
    return error;
  }

  if (error instanceof multer.MulterError) {
    return error.code === 'LIMIT_FILE_SIZE'
      ? new PayloadTooLargeError(error.message, error)
      : new BadRequestError(error.message, error);
  }

  // body-parser errors carry an HTTP status
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    if (error.status === 413) return new PayloadTooLargeError(error.message, error);
    if (error.status === 400) return new BadRequestError(error.message, error);
  }

  return null;
}
