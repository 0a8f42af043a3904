import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { mkdir, mkdtemp, writeFile, rm, symlink, unlink } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { hashBuffer } from '../src/hasher';
import { createExcludeMatcher, createIncludeMatcher } from '../src/ignore';
import { scanDirectory, comparePaths } from '../src/scanner';

function scan(root: string, include: string[], excludes: string[] = []) {
  return scanDirectory(root, {
    include: createIncludeMatcher(include),
    exclude: createExcludeMatcher(excludes),
    concurrency: 2,
  });
}

describe('Scanner', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'modsync-scanner-'));
    await mkdir(join(dir, 'mods'), { recursive: true });
    await mkdir(join(dir, 'config'), { recursive: true });
    await mkdir(join(dir, 'logs'), { recursive: true });
    await mkdir(join(dir, '.modsync'), { recursive: true });

    await writeFile(join(dir, 'mods/a.jar'), 'alpha');
    await writeFile(join(dir, 'mods/b.jar'), 'beta');
    await writeFile(join(dir, 'config/c.toml'), 'gamma');
    await writeFile(join(dir, 'logs/latest.log'), 'log');
    await writeFile(join(dir, '.modsync/upload-state.json'), '{}');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should keep only files matching an include glob', async () => {
    const result = await scan(dir, ['mods/**', 'config/*.toml']);

    assert.deepStrictEqual(
      result.entries.map((entry) => entry.path),
      ['config/c.toml', 'mods/a.jar', 'mods/b.jar']
    );
    assert.deepStrictEqual(result.errors, []);
  });

  it('should hash and size every entry', async () => {
    const result = await scan(dir, ['mods/a.jar']);

    assert.deepStrictEqual(result.entries, [
      { path: 'mods/a.jar', hash: hashBuffer(Buffer.from('alpha')), size: 5 },
    ]);
    assert.strictEqual(result.totalSize, 5);
  });

  it('should apply excludes with negation', async () => {
    const result = await scan(dir, ['**'], ['*.jar', '!mods/b.jar', 'logs/']);

    assert.deepStrictEqual(
      result.entries.map((entry) => entry.path),
      ['config/c.toml', 'mods/b.jar']
    );
  });

  it('should never report the state directory', async () => {
    const result = await scan(dir, ['**']);

    assert.deepStrictEqual(
      result.entries.map((entry) => entry.path),
      ['config/c.toml', 'logs/latest.log', 'mods/a.jar', 'mods/b.jar']
    );
  });

  it('should expand brace alternatives and match across directories', async () => {
    const globDir = await mkdtemp(join(tmpdir(), 'modsync-scanner-glob-'));
    try {
      await mkdir(join(globDir, 'mods/nested'), { recursive: true });
      await writeFile(join(globDir, 'mods/a.jar'), 'a');
      await writeFile(join(globDir, 'mods/b.zip'), 'b');
      await writeFile(join(globDir, 'mods/c.txt'), 'c');
      await writeFile(join(globDir, 'mods/nested/d.jar'), 'd');

      const braces = await scan(globDir, ['mods/*.{jar,zip}']);
      assert.deepStrictEqual(
        braces.entries.map((entry) => entry.path),
        ['mods/a.jar', 'mods/b.zip']
      );

      const deep = await scan(globDir, ['**/*.jar']);
      assert.deepStrictEqual(
        deep.entries.map((entry) => entry.path),
        ['mods/a.jar', 'mods/nested/d.jar']
      );
    } finally {
      await rm(globDir, { recursive: true, force: true });
    }
  });

  it('should report names the server cannot take and continue', async () => {
    const oddDir = await mkdtemp(join(tmpdir(), 'modsync-scanner-odd-'));
    try {
      await mkdir(join(oddDir, 'mods'), { recursive: true });
      await writeFile(join(oddDir, 'mods/good.jar'), 'good');
      await writeFile(join(oddDir, 'mods/we\\ird.jar'), 'weird');
      await writeFile(join(oddDir, 'C:evil.jar'), 'drive');
      await writeFile(join(oddDir, '...'), 'dots');

      const result = await scan(oddDir, ['**']);
      assert.deepStrictEqual(
        result.entries.map((entry) => entry.path),
        ['mods/good.jar']
      );
      assert.deepStrictEqual(result.errors, [
        { path: '...', reason: 'unsafe-name' },
        { path: 'C:evil.jar', reason: 'unsafe-name' },
        { path: 'mods/we\\ird.jar', reason: 'unsafe-name' },
      ]);
    } finally {
      await rm(oddDir, { recursive: true, force: true });
    }
  });

  it('should find nothing with an empty include list', async () => {
    const result = await scan(dir, []);
    assert.deepStrictEqual(result.entries, []);
  });

  it('should skip symbolic links', async () => {
    const linkDir = await mkdtemp(join(tmpdir(), 'modsync-scanner-link-'));
    try {
      await writeFile(join(linkDir, 'real.jar'), 'real');
      await symlink(join(linkDir, 'real.jar'), join(linkDir, 'link.jar'));

      const result = await scan(linkDir, ['*.jar']);
      assert.deepStrictEqual(
        result.entries.map((entry) => entry.path),
        ['real.jar']
      );
    } finally {
      await rm(linkDir, { recursive: true, force: true });
    }
  });

  it('should report names that are not valid UTF-8 and continue', async () => {
    const badDir = await mkdtemp(join(tmpdir(), 'modsync-scanner-bad-'));
    const badName = Buffer.from([0x62, 0x61, 0x64, 0xff, 0x2e, 0x6a, 0x61, 0x72]);
    const badPath = Buffer.concat([Buffer.from(`${badDir}/`), badName]);
    try {
      await writeFile(join(badDir, 'good.jar'), 'good');
      await writeFile(badPath, 'bad');

      const result = await scan(badDir, ['*.jar']);
      assert.deepStrictEqual(
        result.entries.map((entry) => entry.path),
        ['good.jar']
      );
      assert.deepStrictEqual(result.errors, [{ path: 'bad\uFFFD.jar', reason: 'invalid-encoding' }]);
    } finally {
      await unlink(badPath).catch(() => undefined);
      await rm(badDir, { recursive: true, force: true });
    }
  });
});

describe('comparePaths', () => {
  it('should order by code unit, not locale', () => {
    assert.deepStrictEqual(['b', 'B', 'a', 'A'].sort(comparePaths), ['A', 'B', 'a', 'b']);
  });
});
