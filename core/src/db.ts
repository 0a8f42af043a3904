/**
 * SQLite metadata database for the authoritative server, using sql.js
 * (no native dependencies). The database lives in memory and is persisted
 * to a single file after every write.
 */

import initSqlJs, { type Database as SqlJsDatabase, type ParamsObject, type SqlValue } from 'sql.js';
import { readFile } from 'node:fs/promises';
import { writeFileAtomic, isNotFound } from './fsutil';
import { getLog } from './logger';
import { FILE_STATES, type FileRecord, type FileState, type FileSyncRequest, type Modpack } from './types';

const log = getLog('db');

let SQL: Awaited<ReturnType<typeof initSqlJs>> | null = null;

async function getSqlJs() {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

export const IN_MEMORY = ':memory:';

export class ModsyncDb {
  private db: SqlJsDatabase | null = null;
  private dbPath: string | null;
  private refs = 0;
  private saving: Promise<void> = Promise.resolve();

  /**
   * @param dbPath database file, or `:memory:` for a database that is never persisted
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath === IN_MEMORY ? null : dbPath;
  }

  async initialize(): Promise<void> {
    const SqlJs = await getSqlJs();

    let buffer: Buffer | null = null;
    if (this.dbPath) {
      try {
        buffer = await readFile(this.dbPath);
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    this.db = buffer ? new SqlJs.Database(buffer) : new SqlJs.Database();

    this.createTables();
    await this.save();
    log.info({ path: this.dbPath ?? IN_MEMORY }, 'Database opened');
  }

  private createTables(): void {
    const db = this.handle();

    db.run(`
      CREATE TABLE IF NOT EXISTS modpacks (
        id TEXT PRIMARY KEY,
        name TEXT UNIQUE NOT NULL,
        game TEXT,
        game_version TEXT,
        modloader TEXT,
        modloader_version TEXT,
        sync_version INTEGER NOT NULL DEFAULT 0
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS files (
        id TEXT PRIMARY KEY,
        modpack_id TEXT NOT NULL REFERENCES modpacks(id) ON DELETE CASCADE,
        path TEXT NOT NULL,
        state TEXT NOT NULL,
        hash TEXT,
        sync_version INTEGER NOT NULL DEFAULT 0,
        uploaded INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE (modpack_id, path)
      )
    `);

    db.run(`CREATE INDEX IF NOT EXISTS idx_files_modpack ON files(modpack_id)`);
    db.run(`CREATE INDEX IF NOT EXISTS idx_files_hash ON files(hash)`);
  }

  /**
   * Take a reference to the shared handle
   */
  retain(): this {
    this.refs++;
    return this;
  }

  /**
   * Drop a reference; the last one closes the database
   */
  async release(): Promise<void> {
    this.refs = Math.max(0, this.refs - 1);
    if (this.refs === 0) {
      await this.close();
    }
  }

  get referenceCount(): number {
    return this.refs;
  }

  /**
   * Persist the database file. Saves run one at a time; each writes a full
   * snapshot through a temporary file and a rename.
   */
  private save(): Promise<void> {
    const next = this.saving.then(() => this.persist());
    this.saving = next.catch(() => undefined);
    return next;
  }

  private async persist(): Promise<void> {
    if (!this.db || !this.dbPath) return;
    const data = this.db.export();
    await writeFileAtomic(this.dbPath, Buffer.from(data));
  }

  // Modpack operations
  async insertModpack(modpack: Modpack): Promise<void> {
    this.handle().run(
      `INSERT INTO modpacks (id, name, game, game_version, modloader, modloader_version, sync_version)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        modpack.id,
        modpack.name,
        modpack.game,
        modpack.gameVersion,
        modpack.modloader,
        modpack.modloaderVersion,
        modpack.syncVersion,
      ]
    );
    await this.save();
  }

  getModpack(id: string): Modpack | null {
    const row = this.one('SELECT * FROM modpacks WHERE id = ?', [id]);
    return row ? mapModpack(row) : null;
  }

  getModpackByName(name: string): Modpack | null {
    const row = this.one('SELECT * FROM modpacks WHERE name = ?', [name]);
    return row ? mapModpack(row) : null;
  }

  getAllModpacks(): Modpack[] {
    return this.all('SELECT * FROM modpacks ORDER BY name', []).map(mapModpack);
  }

  /**
   * Delete a modpack and all of its file records
   */
  async deleteModpack(id: string): Promise<void> {
    const db = this.handle();
    // sql.js resets pragmas on export, so the cascade is spelled out
    db.run('BEGIN');
    try {
      db.run('DELETE FROM files WHERE modpack_id = ?', [id]);
      db.run('DELETE FROM modpacks WHERE id = ?', [id]);
      db.run('COMMIT');
    } catch (error) {
      db.run('ROLLBACK');
      throw error;
    }
    await this.save();
  }

  // File record operations

  /**
   * Insert or overwrite the record for (modpackId, path) in one statement.
   * New records start at sync_version 0 and not uploaded; existing records
   * keep both.
   */
  async upsertFile(id: string, modpackId: string, request: FileSyncRequest, now: Date): Promise<void> {
    this.handle().run(
      `INSERT INTO files (id, modpack_id, path, state, hash, sync_version, uploaded, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, 0, 0, ?, ?)
       ON CONFLICT (modpack_id, path) DO UPDATE SET
         state = excluded.state,
         hash = excluded.hash,
         updated_at = excluded.updated_at`,
      [id, modpackId, request.path, request.state, request.hash, now.toISOString(), now.toISOString()]
    );
    await this.save();
  }

  getFileByPath(modpackId: string, path: string): FileRecord | null {
    const row = this.one('SELECT * FROM files WHERE modpack_id = ? AND path = ?', [modpackId, path]);
    return row ? mapFileRecord(row) : null;
  }

  getModpackFiles(modpackId: string): FileRecord[] {
    return this.all('SELECT * FROM files WHERE modpack_id = ? ORDER BY path', [modpackId]).map(
      mapFileRecord
    );
  }

  /**
   * Any record, in any modpack, whose upload of `hash` completed
   */
  findUploadedByHash(hash: string): FileRecord | null {
    const row = this.one('SELECT * FROM files WHERE hash = ? AND uploaded = 1 LIMIT 1', [hash]);
    return row ? mapFileRecord(row) : null;
  }

  /**
   * Record a completed upload: the only place sync_version is bumped
   */
  async markUploaded(fileId: string, hash: string, now: Date): Promise<void> {
    this.handle().run(
      `UPDATE files SET uploaded = 1, hash = ?, sync_version = sync_version + 1, updated_at = ?
       WHERE id = ?`,
      [hash, now.toISOString(), fileId]
    );
    await this.save();
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.save();
      this.db.close();
      this.db = null;
      log.info('Database closed');
    }
  }

  // Helper methods
  private handle(): SqlJsDatabase {
    if (!this.db) throw new Error('Database not initialized');
    return this.db;
  }

  private all(sql: string, params: SqlValue[]): ParamsObject[] {
    const stmt = this.handle().prepare(sql);
    try {
      stmt.bind(params);
      const rows: ParamsObject[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  private one(sql: string, params: SqlValue[]): ParamsObject | null {
    return this.all(sql, params)[0] ?? null;
  }
}

function mapModpack(row: ParamsObject): Modpack {
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    game: nullableText(row, 'game'),
    gameVersion: nullableText(row, 'game_version'),
    modloader: nullableText(row, 'modloader'),
    modloaderVersion: nullableText(row, 'modloader_version'),
    syncVersion: integer(row, 'sync_version'),
  };
}

function mapFileRecord(row: ParamsObject): FileRecord {
  return {
    id: text(row, 'id'),
    modpackId: text(row, 'modpack_id'),
    path: text(row, 'path'),
    state: toFileState(text(row, 'state')),
    hash: nullableText(row, 'hash'),
    syncVersion: integer(row, 'sync_version'),
    uploaded: integer(row, 'uploaded') === 1,
    createdAt: new Date(text(row, 'created_at')),
    updatedAt: new Date(text(row, 'updated_at')),
  };
}

/** Unknown stored states read as Ignored */
function toFileState(value: string): FileState {
  return FILE_STATES.find((state) => state === value) ?? 'Ignored';
}

function text(row: ParamsObject, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function nullableText(row: ParamsObject, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : text(row, column);
}

function integer(row: ParamsObject, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Column ${column} is not a number`);
  }
  return value;
}
