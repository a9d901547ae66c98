import type { Pool } from 'pg';
import { AssetSync, defaultAssetMappings } from './assets/asset-sync';
import { BuildOrchestrator } from './builder/orchestrator';
import { type BuildFileSystem, NodeFileSystem, checkSameVolume } from './builder/file-system';
import { TemplateCache } from './cache/template-cache';
import type { AppConfig } from './config';
import { MarkdownConverter } from './content/markdown';
import { FileDocumentProvider } from './content/posts';
import { PageRenderer } from './content/renderer';
import { type CompiledTemplate, TemplateSource } from './content/templates';
import { createPool } from './db/client';
import { type BuildHistoryStore, PgBuildHistory } from './db/history';
import { BuildQueue } from './queue/build-queue';
import { errorMessage } from './errors';
import type { DocumentProvider } from './types';

export interface BuildSystem {
  orchestrator: BuildOrchestrator;
  queue: BuildQueue;
  renderer: PageRenderer;
  assets: AssetSync;
  history: BuildHistoryStore | null;
  pool: Pool | null;
}

export interface BuildSystemOverrides {
  fs?: BuildFileSystem;
  documents?: DocumentProvider;
  history?: BuildHistoryStore | null;
}

/** Wires the build pipeline from configuration. Nothing here is process-global. */
export function createBuildSystem(config: AppConfig, overrides: BuildSystemOverrides = {}): BuildSystem {
  const fs = overrides.fs ?? new NodeFileSystem();
  const templates = new TemplateSource(config.paths.templatesDir);
  const cache = new TemplateCache<CompiledTemplate>({
    compiledCapacity: config.cache.templateCacheSize,
    renderedCapacity: config.cache.renderedCacheSize,
    renderedEnabled: config.cache.renderedCacheEnabled,
  });
  const renderer = new PageRenderer(config.site, templates, cache);
  const assets = new AssetSync(defaultAssetMappings(config.paths), fs);

  const orchestrator = new BuildOrchestrator({
    documents: overrides.documents ?? new FileDocumentProvider(config.paths.postsDir),
    markdown: new MarkdownConverter(),
    renderer,
    assets,
    templates,
    fs,
    settings: {
      outputDir: config.paths.outputDir,
      backupDir: config.paths.backupDir,
      timeoutMs: config.build.timeoutMs,
    },
  });

  let pool: Pool | null = null;
  let history: BuildHistoryStore | null = null;
  if (overrides.history !== undefined) {
    history = overrides.history;
  } else if (config.databaseUrl) {
    pool = createPool(config.databaseUrl);
    history = new PgBuildHistory(pool);
  }

  const queue = new BuildQueue(orchestrator, {
    maxQueued: config.queue.maxQueued,
    retentionMs: config.queue.retentionMs,
    sweepIntervalMs: config.queue.sweepIntervalMs,
    history,
  });

  return { orchestrator, queue, renderer, assets, history, pool };
}

/** Logs a warning when output and backup sit on different volumes. */
export async function warnOnCrossVolume(config: AppConfig): Promise<boolean> {
  try {
    const same = await checkSameVolume(config.paths.outputDir, config.paths.backupDir);
    if (!same) {
      console.warn(
        `[config] OUTPUT_DIR and BACKUP_DIR are on different volumes; backup and rollback will copy instead of rename and are not atomic`
      );
    }
    return same;
  } catch (err) {
    console.warn(`[config] Could not compare volumes of output and backup: ${errorMessage(err)}`);
    return false;
  }
}
