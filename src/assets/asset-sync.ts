import mime from 'mime-types';
import path from 'path';
import type { PathsConfig } from '../config';
import type { BuildFileSystem } from '../builder/file-system';
import { AssetSyncError, errorMessage } from '../errors';

export interface AssetMapping {
  source: string;
  destination: string;
  description: string;
}

export type AssetValidation = { valid: true } | { valid: false; reason: string };

/** Files rejected by validation count as failed. */
export interface CopyCounts {
  successful: number;
  failed: number;
}

export interface MappingReport extends CopyCounts {
  source: string;
  destination: string;
  description: string;
}

export interface AssetReport {
  totalSuccessful: number;
  totalFailed: number;
  mappings: MappingReport[];
}

export interface AssetInfo {
  totalFiles: number;
  totalSize: number;
  mappings: { source: string; description: string; exists: boolean; files: number; size: number }[];
}

export const MAX_ASSET_BYTES = 50 * 1024 * 1024;

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.gif', '.svg', '.webp', '.ico', '.bmp',
  '.pdf', '.txt', '.md',
  '.css', '.js', '.json', '.xml',
  '.woff', '.woff2', '.ttf', '.otf', '.eot',
  '.zip', '.tar', '.gz',
]);

const EXECUTABLE_MIME_TYPES = [
  'application/x-executable',
  'application/x-sharedlib',
  'application/x-msdownload',
  'application/x-msdos-program',
  'application/x-mach-binary',
];

function isBlockedName(fileName: string): boolean {
  const name = fileName.toLowerCase();
  return name === '.htaccess' || name.startsWith('.env') || name === 'config.ini' || name === 'web.config';
}

export function defaultAssetMappings(paths: PathsConfig): AssetMapping[] {
  return [
    {
      source: path.join(paths.contentDir, 'images'),
      destination: path.join(paths.outputDir, 'images'),
      description: 'User content images',
    },
    {
      source: path.join(paths.staticDir, 'css'),
      destination: path.join(paths.outputDir, 'css'),
      description: 'CSS stylesheets',
    },
    {
      source: path.join(paths.staticDir, 'js'),
      destination: path.join(paths.outputDir, 'js'),
      description: 'JavaScript files',
    },
    {
      source: path.join(paths.staticDir, 'images'),
      destination: path.join(paths.outputDir, 'images'),
      description: 'Static site images',
    },
  ];
}

/**
 * Copies validated static files into the output tree. Does no rollback of
 * its own; the orchestrator restores the whole tree on failure.
 */
export class AssetSync {
  constructor(
    readonly mappings: readonly AssetMapping[],
    private readonly fs: BuildFileSystem
  ) {}

  async validateFile(filePath: string): Promise<AssetValidation> {
    const stat = await this.fs.stat(filePath);
    if (!stat || !stat.isFile) {
      return { valid: false, reason: 'not a regular file' };
    }

    const extension = path.extname(filePath).toLowerCase();
    if (!ALLOWED_EXTENSIONS.has(extension)) {
      return { valid: false, reason: `extension '${extension || '(none)'}' is not allowed` };
    }

    if (stat.size > MAX_ASSET_BYTES) {
      return { valid: false, reason: `file is ${stat.size} bytes (limit ${MAX_ASSET_BYTES})` };
    }

    const mimeType = mime.lookup(filePath);
    if (mimeType && EXECUTABLE_MIME_TYPES.some((blocked) => mimeType.startsWith(blocked))) {
      return { valid: false, reason: `executable content type ${mimeType}` };
    }

    if (isBlockedName(path.basename(filePath))) {
      return { valid: false, reason: 'sensitive file name' };
    }

    return { valid: true };
  }

  /**
   * A destination is current when it is not older than the source and,
   * with timestamps less than a second apart, has the same size.
   */
  async needsUpdate(source: string, destination: string): Promise<boolean> {
    const dest = await this.fs.stat(destination);
    if (!dest) return true;

    const src = await this.fs.stat(source);
    if (!src) return true;

    if (src.mtimeMs > dest.mtimeMs) return true;

    if (Math.abs(src.mtimeMs - dest.mtimeMs) < 1000) {
      return src.size !== dest.size;
    }
    return false;
  }

  /** Returns false when the file was already up to date. */
  async copyFile(source: string, destination: string): Promise<boolean> {
    if (!(await this.needsUpdate(source, destination))) {
      return false;
    }
    await this.fs.copyFile(source, destination);
    return true;
  }

  /** Stops with the signal's reason before the next file once `signal` aborts. */
  async copyDirectoryAssets(sourceDir: string, destDir: string, signal?: AbortSignal): Promise<CopyCounts> {
    const counts: CopyCounts = { successful: 0, failed: 0 };

    const stat = await this.fs.stat(sourceDir);
    if (!stat || !stat.isDirectory) {
      return counts;
    }

    for (const relative of await this.fs.listFiles(sourceDir)) {
      signal?.throwIfAborted();
      const source = path.join(sourceDir, relative);
      const destination = path.join(destDir, relative);
      try {
        const validation = await this.validateFile(source);
        if (!validation.valid) {
          console.error(`[assets] Rejected ${source}: ${validation.reason}`);
          counts.failed++;
          continue;
        }
        await this.copyFile(source, destination);
        counts.successful++;
      } catch (err) {
        console.error(`[assets] Failed to copy ${source} -> ${destination}: ${errorMessage(err)}`);
        counts.failed++;
      }
    }

    return counts;
  }

  async copyAllAssets(signal?: AbortSignal): Promise<AssetReport> {
    const report: AssetReport = { totalSuccessful: 0, totalFailed: 0, mappings: [] };

    for (const mapping of this.mappings) {
      signal?.throwIfAborted();
      let counts: CopyCounts;
      try {
        counts = await this.copyDirectoryAssets(mapping.source, mapping.destination, signal);
      } catch (err) {
        if (signal?.aborted) throw err;
        console.error(`[assets] ${mapping.description}: ${errorMessage(err)}`);
        counts = { successful: 0, failed: 1 };
      }

      report.mappings.push({ ...mapping, ...counts });
      report.totalSuccessful += counts.successful;
      report.totalFailed += counts.failed;

      if (counts.failed > 0) {
        console.warn(`[assets] ${mapping.description}: ${counts.successful} copied, ${counts.failed} failed`);
      } else {
        console.log(`[assets] ${mapping.description}: ${counts.successful} files`);
      }
    }

    if (report.totalFailed > 0) {
      throw new AssetSyncError(`Failed to copy ${report.totalFailed} assets`, { report });
    }
    return report;
  }

  async getAssetInfo(): Promise<AssetInfo> {
    const info: AssetInfo = { totalFiles: 0, totalSize: 0, mappings: [] };

    for (const mapping of this.mappings) {
      const stat = await this.fs.stat(mapping.source);
      const entry = {
        source: mapping.source,
        description: mapping.description,
        exists: stat !== null && stat.isDirectory,
        files: 0,
        size: 0,
      };

      if (entry.exists) {
        for (const relative of await this.fs.listFiles(mapping.source)) {
          const file = path.join(mapping.source, relative);
          if ((await this.validateFile(file)).valid) {
            entry.files++;
            entry.size += (await this.fs.stat(file))?.size ?? 0;
          }
        }
      }

      info.mappings.push(entry);
      info.totalFiles += entry.files;
      info.totalSize += entry.size;
    }

    return info;
  }
}
