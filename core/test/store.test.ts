import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { randomUUID } from 'node:crypto';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gunzipSync } from 'node:zlib';
import { ModsyncDb, IN_MEMORY } from '../src/db';
import { AlreadyExistsError, BadRequestError, NotFoundError } from '../src/errors';
import { fileExists } from '../src/fsutil';
import { hashBuffer } from '../src/hasher';
import { BlobStore } from '../src/storage';
import { AuthoritativeStore } from '../src/store';
import type { NewModpack } from '../src/types';

const TEST_MODPACK: NewModpack = {
  name: 'Test',
  game: 'minecraft',
  gameVersion: '1.20.1',
  modloader: 'forge',
  modloaderVersion: '47.2.0',
};

describe('AuthoritativeStore', () => {
  let dir: string;
  let db: ModsyncDb;
  let blobs: BlobStore;
  let store: AuthoritativeStore;

  async function stage(content: string): Promise<string> {
    const stagedPath = join(blobs.stagingDirectory, randomUUID());
    await writeFile(stagedPath, content);
    return stagedPath;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'modsync-store-'));
    db = new ModsyncDb(IN_MEMORY).retain();
    await db.initialize();
    blobs = new BlobStore(join(dir, 'uploads'));
    await blobs.initialize();
    store = new AuthoritativeStore(db, blobs);
  });

  afterEach(async () => {
    await db.release();
    await rm(dir, { recursive: true, force: true });
  });

  it('should create a modpack once per name', async () => {
    const modpack = await store.create(TEST_MODPACK);
    assert.strictEqual(modpack.name, 'Test');
    assert.strictEqual(modpack.syncVersion, 0);

    await assert.rejects(store.create(TEST_MODPACK), AlreadyExistsError);
    assert.deepStrictEqual(store.list().map((entry) => entry.id), [modpack.id]);
  });

  it('should reject filesync for an unknown modpack', async () => {
    await assert.rejects(
      store.fileSync('missing', { path: 'a.jar', state: 'Exists', hash: null }),
      NotFoundError
    );
  });

  it('should reject filesync for a path outside the modpack', async () => {
    const modpack = await store.create(TEST_MODPACK);
    await assert.rejects(
      store.fileSync(modpack.id, { path: '../a.jar', state: 'Exists', hash: null }),
      BadRequestError
    );
  });

  it('should upsert records without bumping sync_version', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const hash = hashBuffer(Buffer.from('alpha'));

    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });
    const [created] = store.get(modpack.id).files;
    assert.strictEqual(created.path, 'mods/a.jar');
    assert.strictEqual(created.state, 'Exists');
    assert.strictEqual(created.hash, hash);
    assert.strictEqual(created.syncVersion, 0);
    assert.strictEqual(created.uploaded, false);

    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Deleted', hash });
    const files = store.get(modpack.id).files;
    assert.strictEqual(files.length, 1);
    assert.strictEqual(files[0].id, created.id);
    assert.strictEqual(files[0].state, 'Deleted');
    assert.strictEqual(files[0].syncVersion, 0);
  });

  it('should list records in path order', async () => {
    const modpack = await store.create(TEST_MODPACK);
    for (const path of ['mods/b.jar', 'config/x.toml', 'mods/a.jar']) {
      await store.fileSync(modpack.id, { path, state: 'Exists', hash: null });
    }

    assert.deepStrictEqual(
      store.get(modpack.id).files.map((file) => file.path),
      ['config/x.toml', 'mods/a.jar', 'mods/b.jar']
    );
  });

  it('should refuse an upload without a prior filesync and drop the staged bytes', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const staged = await stage('alpha');

    await assert.rejects(store.acceptUpload(modpack.id, 'mods/a.jar', staged), NotFoundError);
    assert.strictEqual(await fileExists(staged), false);
  });

  it('should store identical bytes once', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const hash = hashBuffer(Buffer.from('alpha'));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });
    await store.fileSync(modpack.id, { path: 'mods/copy.jar', state: 'Exists', hash });

    const first = await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));
    const second = await store.acceptUpload(modpack.id, 'mods/copy.jar', await stage('alpha'));

    assert.strictEqual(first.action, 'Uploaded');
    assert.strictEqual(second.action, 'Exists');
    assert.strictEqual((await blobs.getStats()).blobCount, 1);
    assert.strictEqual(gunzipSync(await readFile(blobs.blobPath(hash))).toString(), 'alpha');

    const files = store.get(modpack.id).files;
    assert.deepStrictEqual(
      files.map((file) => [file.path, file.hash, file.uploaded, file.syncVersion]),
      [
        ['mods/a.jar', hash, true, 1],
        ['mods/copy.jar', hash, true, 1],
      ]
    );
    assert.deepStrictEqual(await readdir(blobs.stagingDirectory), []);
  });

  it('should trust its own digest over the client hash', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const claimed = hashBuffer(Buffer.from('something else'));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash: claimed });

    const result = await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));
    const [file] = store.get(modpack.id).files;

    assert.strictEqual(result.fileId, file.id);
    assert.strictEqual(file.hash, hashBuffer(Buffer.from('alpha')));
  });

  it('should bump sync_version on every completed upload', async () => {
    const modpack = await store.create(TEST_MODPACK);
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash: null });

    await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('v1'));
    await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('v2'));

    assert.strictEqual(store.get(modpack.id).files[0].syncVersion, 2);
  });

  it('should rewrite a blob whose file went missing', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const hash = hashBuffer(Buffer.from('alpha'));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });
    await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));
    await rm(blobs.blobPath(hash));

    const again = await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));
    assert.strictEqual(again.action, 'Uploaded');
    assert.strictEqual(await blobs.exists(hash), true);
  });

  it('should survive concurrent uploads of the same new content', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const content = 'x'.repeat(256 * 1024);
    const hash = hashBuffer(Buffer.from(content));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });
    await store.fileSync(modpack.id, { path: 'mods/b.jar', state: 'Exists', hash });

    const results = await Promise.all([
      store.acceptUpload(modpack.id, 'mods/a.jar', await stage(content)),
      store.acceptUpload(modpack.id, 'mods/b.jar', await stage(content)),
    ]);

    assert.strictEqual(results.length, 2);
    assert.strictEqual(gunzipSync(await readFile(blobs.blobPath(hash))).toString(), content);
    assert.strictEqual((await blobs.getStats()).blobCount, 1);
    assert.ok(store.get(modpack.id).files.every((file) => file.uploaded && file.hash === hash));
  });

  it('should serve downloads only for uploaded digests', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const hash = hashBuffer(Buffer.from('alpha'));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });

    await assert.rejects(store.openDownload(hash), NotFoundError);
    await assert.rejects(store.openDownload('not-a-digest'), NotFoundError);

    await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));
    const blob = await store.openDownload(hash);
    blob.stream.destroy();
    assert.strictEqual(blob.gzipped, true);
  });

  it('should delete records but keep blobs', async () => {
    const modpack = await store.create(TEST_MODPACK);
    const hash = hashBuffer(Buffer.from('alpha'));
    await store.fileSync(modpack.id, { path: 'mods/a.jar', state: 'Exists', hash });
    await store.acceptUpload(modpack.id, 'mods/a.jar', await stage('alpha'));

    await store.delete(modpack.id);

    assert.throws(() => store.get(modpack.id), NotFoundError);
    assert.strictEqual(db.getFileByPath(modpack.id, 'mods/a.jar'), null);
    assert.strictEqual(await blobs.exists(hash), true);
    await assert.rejects(store.openDownload(hash), NotFoundError);
    await assert.rejects(store.delete(modpack.id), NotFoundError);

    // The name is free again
    await store.create(TEST_MODPACK);
  });
});

describe('BlobStore', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'modsync-blobs-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should serve raw blobs as they are', async () => {
    const blobs = new BlobStore(dir);
    await blobs.initialize();
    const hash = hashBuffer(Buffer.from('raw'));
    await writeFile(blobs.blobPath(hash), 'raw');

    const blob = await blobs.openRead(hash);
    blob.stream.destroy();
    assert.strictEqual(blob.gzipped, false);
    assert.strictEqual(blob.size, 3);
  });

  it('should refuse names that are not digests', () => {
    const blobs = new BlobStore(dir);
    assert.throws(() => blobs.blobPath('../escape'), /Not a SHA-256 digest/);
  });
});

describe('ModsyncDb', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'modsync-db-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist to its file and reopen', async () => {
    const dbPath = join(dir, 'modsync.db');
    const first = new ModsyncDb(dbPath).retain();
    await first.initialize();
    await new AuthoritativeStore(first, new BlobStore(join(dir, 'uploads'))).create(TEST_MODPACK);
    await first.release();

    const second = new ModsyncDb(dbPath).retain();
    await second.initialize();
    try {
      assert.strictEqual(second.getModpackByName('Test')?.gameVersion, '1.20.1');
    } finally {
      await second.release();
    }
    assert.deepStrictEqual(await readdir(dir), ['modsync.db']);
  });

  it('should close only when the last reference is released', async () => {
    const db = new ModsyncDb(IN_MEMORY).retain();
    await db.initialize();
    db.retain();

    await db.release();
    assert.strictEqual(db.referenceCount, 1);
    assert.deepStrictEqual(db.getAllModpacks(), []);

    await db.release();
    assert.strictEqual(db.referenceCount, 0);
    assert.throws(() => db.getAllModpacks(), /Database not initialized/);
  });
});
