import fs from 'fs/promises';
import path from 'path';

export interface FileStat {
  size: number;
  mtimeMs: number;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * Filesystem operations shared by backup, rollback, page output and asset
 * copying. Tests substitute a wrapper to inject failures.
 */
export interface BuildFileSystem {
  exists(target: string): Promise<boolean>;
  /** `null` when nothing exists at `target`. */
  stat(target: string): Promise<FileStat | null>;
  ensureDir(dir: string): Promise<void>;
  /** Recursive delete; a missing target is not an error. */
  remove(target: string): Promise<void>;
  /** Rename when possible; across volumes falls back to copy then delete. */
  move(from: string, to: string): Promise<void>;
  /** Copies one file, creating parent directories and keeping timestamps. */
  copyFile(from: string, to: string): Promise<void>;
  writeFile(target: string, contents: string): Promise<void>;
  /** Regular files below `dir`, as paths relative to it, sorted. */
  listFiles(dir: string): Promise<string[]>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class NodeFileSystem implements BuildFileSystem {
  async exists(target: string): Promise<boolean> {
    return (await this.stat(target)) !== null;
  }

  async stat(target: string): Promise<FileStat | null> {
    try {
      const stats = await fs.stat(target);
      return {
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
      };
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  async remove(target: string): Promise<void> {
    await fs.rm(target, { recursive: true, force: true });
  }

  async move(from: string, to: string): Promise<void> {
    await fs.mkdir(path.dirname(to), { recursive: true });
    try {
      await fs.rename(from, to);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
      console.warn(`[fs] ${from} and ${to} are on different volumes; moving by copy (not atomic)`);
      await fs.cp(from, to, { recursive: true, preserveTimestamps: true, errorOnExist: true, force: false });
      await fs.rm(from, { recursive: true, force: true });
    }
  }

  async copyFile(from: string, to: string): Promise<void> {
    await fs.mkdir(path.dirname(to), { recursive: true });
    await fs.copyFile(from, to);
    const source = await fs.stat(from);
    await fs.utimes(to, source.atime, source.mtime);
  }

  async writeFile(target: string, contents: string): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, contents, 'utf-8');
  }

  async listFiles(dir: string): Promise<string[]> {
    const found: string[] = [];
    const walk = async (current: string): Promise<void> => {
      const entries = await fs.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          found.push(path.relative(dir, full));
        }
      }
    };
    await walk(dir);
    return found.sort();
  }
}

async function deviceOf(target: string): Promise<number> {
  let current = path.resolve(target);
  for (;;) {
    try {
      return (await fs.stat(current)).dev;
    } catch (err) {
      const parent = path.dirname(current);
      if (!isErrnoException(err) || err.code !== 'ENOENT' || parent === current) throw err;
      current = parent;
    }
  }
}

/**
 * Whether two paths (or their nearest existing ancestors) live on the same
 * device. Renames between devices are not atomic.
 */
export async function checkSameVolume(a: string, b: string): Promise<boolean> {
  const [devA, devB] = await Promise.all([deviceOf(a), deviceOf(b)]);
  return devA === devB;
}
