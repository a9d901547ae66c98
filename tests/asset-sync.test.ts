import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AssetSync, MAX_ASSET_BYTES, defaultAssetMappings } from '../src/assets/asset-sync';
import { NodeFileSystem } from '../src/builder/file-system';
import { AssetSyncError } from '../src/errors';
import { makeTempDir, removeDir } from './helpers';

class FailingCopyFileSystem extends NodeFileSystem {
  constructor(private readonly failOn: string) {
    super();
  }

  override async copyFile(from: string, to: string): Promise<void> {
    if (path.basename(from) === this.failOn) {
      throw new Error('disk full');
    }
    await super.copyFile(from, to);
  }
}

describe('AssetSync', () => {
  let root: string;
  let src: string;
  let dest: string;

  beforeEach(async () => {
    root = await makeTempDir('blog-assets-');
    src = path.join(root, 'src');
    dest = path.join(root, 'dest');
    await fs.mkdir(path.join(src, 'nested'), { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  const write = async (relative: string, contents = 'data') => {
    const file = path.join(src, relative);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, contents);
    return file;
  };

  describe('validateFile', () => {
    const sync = () => new AssetSync([], new NodeFileSystem());

    it('accepts an allowed regular file', async () => {
      expect(await sync().validateFile(await write('logo.png'))).toEqual({ valid: true });
    });

    it('rejects directories and missing files', async () => {
      expect(await sync().validateFile(path.join(src, 'nested'))).toEqual({
        valid: false,
        reason: 'not a regular file',
      });
      expect((await sync().validateFile(path.join(src, 'absent.png'))).valid).toBe(false);
    });

    it('rejects extensions outside the allow-list', async () => {
      expect(await sync().validateFile(await write('run.exe'))).toEqual({
        valid: false,
        reason: "extension '.exe' is not allowed",
      });
      expect(await sync().validateFile(await write('.htaccess'))).toEqual({
        valid: false,
        reason: "extension '(none)' is not allowed",
      });
    });

    it('rejects files over the size ceiling', async () => {
      const file = await write('huge.zip', '');
      await fs.truncate(file, MAX_ASSET_BYTES + 1);

      expect(await sync().validateFile(file)).toEqual({
        valid: false,
        reason: `file is ${MAX_ASSET_BYTES + 1} bytes (limit ${MAX_ASSET_BYTES})`,
      });
    });

    it('rejects sensitive file names with an allowed extension', async () => {
      expect(await sync().validateFile(await write('.env.json'))).toEqual({
        valid: false,
        reason: 'sensitive file name',
      });
    });
  });

  describe('needsUpdate', () => {
    it('copies when the destination is missing or older', async () => {
      const sync = new AssetSync([], new NodeFileSystem());
      const file = await write('a.css');
      const target = path.join(dest, 'a.css');
      expect(await sync.needsUpdate(file, target)).toBe(true);

      await fs.mkdir(dest, { recursive: true });
      await fs.writeFile(target, 'data');
      await fs.utimes(target, new Date('2020-01-01'), new Date('2020-01-01'));
      expect(await sync.needsUpdate(file, target)).toBe(true);
    });

    it('compares sizes when timestamps are within a second', async () => {
      const sync = new AssetSync([], new NodeFileSystem());
      const file = await write('a.css', 'abc');
      const target = path.join(dest, 'a.css');
      await fs.mkdir(dest, { recursive: true });
      await fs.writeFile(target, 'abcdef');
      const stamp = new Date('2024-01-01T00:00:00Z');
      await fs.utimes(file, stamp, stamp);
      await fs.utimes(target, stamp, new Date(stamp.getTime() + 500));

      expect(await sync.needsUpdate(file, target)).toBe(true);

      await fs.writeFile(target, 'xyz');
      await fs.utimes(target, stamp, new Date(stamp.getTime() + 500));
      expect(await sync.needsUpdate(file, target)).toBe(false);
    });

    it('skips a destination that is clearly newer', async () => {
      const sync = new AssetSync([], new NodeFileSystem());
      const file = await write('a.css', 'abc');
      const target = path.join(dest, 'a.css');
      await fs.mkdir(dest, { recursive: true });
      await fs.writeFile(target, 'different size');
      await fs.utimes(file, new Date('2024-01-01'), new Date('2024-01-01'));
      await fs.utimes(target, new Date('2024-02-01'), new Date('2024-02-01'));

      expect(await sync.needsUpdate(file, target)).toBe(false);
    });
  });

  it('copies a tree recursively, keeps timestamps and counts rejected files as failures', async () => {
    const css = await write('site.css', 'body {}');
    await write('nested/font.woff2', 'font');
    await write('nested/tool.sh', '#!/bin/sh');
    const stamp = new Date('2023-06-01T00:00:00Z');
    await fs.utimes(css, stamp, stamp);
    const sync = new AssetSync([], new NodeFileSystem());

    const counts = await sync.copyDirectoryAssets(src, dest);

    expect(counts).toEqual({ successful: 2, failed: 1 });
    expect(await fs.readFile(path.join(dest, 'nested', 'font.woff2'), 'utf-8')).toBe('font');
    expect((await fs.stat(path.join(dest, 'site.css'))).mtime.getTime()).toBe(stamp.getTime());
    await expect(fs.stat(path.join(dest, 'nested', 'tool.sh'))).rejects.toThrow();
  });

  it('returns zero counts for a missing source directory', async () => {
    const sync = new AssetSync([], new NodeFileSystem());
    expect(await sync.copyDirectoryAssets(path.join(root, 'none'), dest)).toEqual({
      successful: 0,
      failed: 0,
    });
  });

  it('attempts every mapping before raising an aggregate error', async () => {
    await write('one/bad.png');
    await write('two/good.css');
    const sync = new AssetSync(
      [
        { source: path.join(src, 'one'), destination: path.join(dest, 'one'), description: 'first' },
        { source: path.join(src, 'two'), destination: path.join(dest, 'two'), description: 'second' },
      ],
      new FailingCopyFileSystem('bad.png')
    );

    const error = await sync.copyAllAssets().then(
      () => null,
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(AssetSyncError);
    expect(error).toMatchObject({ message: 'Failed to copy 1 assets', kind: 'assets' });
    expect(await fs.readFile(path.join(dest, 'two', 'good.css'), 'utf-8')).toBe('data');
  });

  it('fails the sync when a mapping holds a disallowed file', async () => {
    await write('css/site.css');
    await write('css/payload.exe');
    const sync = new AssetSync(
      [{ source: path.join(src, 'css'), destination: path.join(dest, 'css'), description: 'CSS' }],
      new NodeFileSystem()
    );

    await expect(sync.copyAllAssets()).rejects.toMatchObject({
      message: 'Failed to copy 1 assets',
      details: {
        report: {
          totalSuccessful: 1,
          totalFailed: 1,
          mappings: [expect.objectContaining({ description: 'CSS', successful: 1, failed: 1 })],
        },
      },
    });
  });

  it('stops before the next file once the signal aborts', async () => {
    await write('one/a.css');
    await write('one/b.css');
    await write('two/c.css');
    const controller = new AbortController();
    const reason = new Error('deadline passed');
    class AbortingFileSystem extends NodeFileSystem {
      override async copyFile(from: string, to: string): Promise<void> {
        await super.copyFile(from, to);
        controller.abort(reason);
      }
    }
    const sync = new AssetSync(
      [
        { source: path.join(src, 'one'), destination: path.join(dest, 'one'), description: 'first' },
        { source: path.join(src, 'two'), destination: path.join(dest, 'two'), description: 'second' },
      ],
      new AbortingFileSystem()
    );

    await expect(sync.copyAllAssets(controller.signal)).rejects.toBe(reason);
    expect(await new NodeFileSystem().listFiles(dest)).toEqual([path.join('one', 'a.css')]);
  });

  it('summarises valid files per mapping', async () => {
    await write('img/a.png', '12345');
    await write('img/b.exe', 'xx');
    const sync = new AssetSync(
      [
        { source: path.join(src, 'img'), destination: path.join(dest, 'img'), description: 'images' },
        { source: path.join(src, 'missing'), destination: path.join(dest, 'missing'), description: 'none' },
      ],
      new NodeFileSystem()
    );

    const info = await sync.getAssetInfo();

    expect(info.totalFiles).toBe(1);
    expect(info.totalSize).toBe(5);
    expect(info.mappings.map((m) => m.exists)).toEqual([true, false]);
  });

  it('maps content images and static css, js and images into the output', () => {
    const mappings = defaultAssetMappings({
      contentDir: '/site/content',
      postsDir: '/site/content/posts',
      templatesDir: '/site/templates',
      staticDir: '/site/static',
      outputDir: '/site/build',
      backupDir: '/site/build.bak',
    });

    expect(mappings.map((m) => [m.source, m.destination])).toEqual([
      ['/site/content/images', '/site/build/images'],
      ['/site/static/css', '/site/build/css'],
      ['/site/static/js', '/site/build/js'],
      ['/site/static/images', '/site/build/images'],
    ]);
  });
});
