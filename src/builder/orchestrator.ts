import path from 'path';
import type { AssetSync } from '../assets/asset-sync';
import { fingerprint } from '../cache/fingerprint';
import type { MarkdownConverter } from '../content/markdown';
import {
  type PageRenderer,
  REQUIRED_TEMPLATES,
  TEMPLATE_NAMES,
  collectTags,
} from '../content/renderer';
import type { TemplateSource } from '../content/templates';
import { postPath, tagPath } from '../content/urls';
import {
  BackupError,
  BuildError,
  type BuildErrorKind,
  BuildTimeoutError,
  ContentTransformError,
  PreconditionError,
  RollbackError,
  TemplateRenderingError,
  VerificationError,
  errorMessage,
} from '../errors';
import type {
  BuildPhase,
  BuildResult,
  BuildRunner,
  BuildStats,
  Document,
  DocumentProvider,
  ProgressListener,
  RollbackOutcome,
} from '../types';
import type { BuildFileSystem } from './file-system';
import { ProgressReporter } from './progress';

export const REQUIRED_ARTIFACTS: readonly string[] = ['index.html', 'archive.html', 'rss.xml'];

/** Artifacts smaller than this are treated as empty. */
export const MIN_ARTIFACT_BYTES = 10;

const TIMEOUT_GRACE_MS = 5000;

export type PhaseOutcome<T> = { ok: true; value: T } | { ok: false; error: BuildError };

export interface BuildSettings {
  outputDir: string;
  backupDir: string;
  /** 0 disables the timeout. */
  timeoutMs: number;
  /**
   * How long a timed-out phase may keep running before the rollback gives
   * up on it and leaves the backup in place. Defaults to 5000.
   */
  abandonGraceMs?: number;
}

export interface OrchestratorDeps {
  documents: DocumentProvider;
  markdown: Pick<MarkdownConverter, 'convert'>;
  renderer: PageRenderer;
  assets: Pick<AssetSync, 'copyAllAssets'>;
  templates: TemplateSource;
  fs: BuildFileSystem;
  settings: BuildSettings;
}

interface ProcessedDocument {
  doc: Document;
  html: string;
}

interface PageJob {
  path: string;
  render: () => Promise<string>;
}

/** Mutable state of a single run. */
interface RunState {
  reporter: ProgressReporter;
  deadline: BuildDeadline;
  stats: BuildStats;
  backupTaken: boolean;
  outputCreated: boolean;
  pending: Promise<unknown> | null;
}

class BuildDeadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout | null;

  constructor(readonly timeoutMs: number) {
    this.timer =
      timeoutMs > 0
        ? setTimeout(() => this.controller.abort(new BuildTimeoutError(timeoutMs)), timeoutMs)
        : null;
    this.timer?.unref();
  }

  /** Aborts with the timeout error; long-running phases check it between files. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Throws the timeout error once the deadline has passed. */
  check(): void {
    this.controller.signal.throwIfAborted();
  }

  /** Settles with `work`, or rejects with the timeout error if that comes first. */
  race<T>(work: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        }
      );
    });
  }

  dispose(): void {
    if (this.timer) clearTimeout(this.timer);
  }
}

function toBuildError(err: unknown, kind: BuildErrorKind): BuildError {
  if (err instanceof BuildError) return err;
  return new BuildError(kind, errorMessage(err), {}, { cause: err });
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms).unref());
}

/**
 * Runs one full site build: backup, content, rendering, assets,
 * verification, then commit or rollback. Knows nothing about jobs; the
 * queue and the CLI both call {@link runBuildOnce}.
 */
export class BuildOrchestrator implements BuildRunner {
  private running = false;
  private lastDocumentSet: string | null = null;

  constructor(private readonly deps: OrchestratorDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  async runBuildOnce(onProgress?: ProgressListener): Promise<BuildResult> {
    const startedAt = Date.now();
    const state: RunState = {
      reporter: new ProgressReporter(onProgress),
      deadline: new BuildDeadline(this.deps.settings.timeoutMs),
      stats: { documentsProcessed: 0, pagesRendered: 0, assetsCopied: 0 },
      backupTaken: false,
      outputCreated: false,
      pending: null,
    };

    if (this.running) {
      const error = new PreconditionError('Another build is already running');
      state.reporter.emit('failed', error.message, { error: error.message });
      state.deadline.dispose();
      return this.result(state, startedAt, { success: false, message: error.message, error });
    }

    this.running = true;
    try {
      return await this.drive(state, startedAt);
    } finally {
      this.running = false;
      state.deadline.dispose();
    }
  }

  private async drive(state: RunState, startedAt: number): Promise<BuildResult> {
    const { reporter } = state;
    const { outputDir, backupDir } = this.deps.settings;

    reporter.emit('initializing', 'Validating build preconditions');
    const preconditions = await this.runPhase(state, 'precondition', () => this.checkPreconditions());
    if (!preconditions.ok) {
      const message = `Build preconditions not met: ${preconditions.error.message}`;
      reporter.emit('failed', message, { error: preconditions.error.message, kind: preconditions.error.kind });
      return this.result(state, startedAt, { success: false, message, error: preconditions.error });
    }

    reporter.emit('backup_creation', 'Backing up current output');
    const backup = await this.runPhase(state, 'backup', () => this.createBackup(state));
    if (!backup.ok) return this.fail(state, startedAt, 'backup_creation', backup.error);

    reporter.emit('content_processing', 'Converting documents to HTML');
    const content = await this.runPhase(state, 'content', () => this.processContent(state));
    if (!content.ok) return this.fail(state, startedAt, 'content_processing', content.error);

    reporter.emit('template_rendering', 'Rendering pages', { documents: content.value.length });
    const rendering = await this.runPhase(state, 'rendering', () => this.renderPages(state, content.value));
    if (!rendering.ok) return this.fail(state, startedAt, 'template_rendering', rendering.error);

    reporter.emit('asset_copying', 'Copying static assets', { pages: state.stats.pagesRendered });
    const assets = await this.runPhase(state, 'assets', async () => {
      const report = await this.deps.assets.copyAllAssets(state.deadline.signal);
      state.stats.assetsCopied = report.totalSuccessful;
      return report;
    });
    if (!assets.ok) return this.fail(state, startedAt, 'asset_copying', assets.error);

    reporter.emit('verification', 'Verifying build output', { assets: state.stats.assetsCopied });
    const verification = await this.runPhase(state, 'verification', async () => {
      const problems = await this.verifyOutput();
      if (problems.length > 0) {
        throw new VerificationError(`Build verification failed: ${problems.join('; ')}`, { problems });
      }
    });
    if (!verification.ok) return this.fail(state, startedAt, 'verification', verification.error);

    reporter.emit('cleanup', 'Removing backup');
    try {
      await this.deps.fs.remove(backupDir);
    } catch (err) {
      console.warn(`[build] Could not remove backup ${backupDir}: ${errorMessage(err)}`);
    }

    this.logCacheStats();
    const message = 'Build completed successfully';
    reporter.emit('completed', message, { ...state.stats, durationMs: Date.now() - startedAt });
    return this.result(state, startedAt, { success: true, message, outputDir });
  }

  private async runPhase<T>(
    state: RunState,
    kind: BuildErrorKind,
    work: () => Promise<T>
  ): Promise<PhaseOutcome<T>> {
    try {
      state.deadline.check();
      const pending = work();
      state.pending = pending;
      return { ok: true, value: await state.deadline.race(pending) };
    } catch (err) {
      return { ok: false, error: toBuildError(err, kind) };
    }
  }

  private async checkPreconditions(): Promise<void> {
    const { fs, templates, documents, settings } = this.deps;

    try {
      await fs.ensureDir(path.dirname(settings.outputDir));
    } catch (err) {
      throw new PreconditionError(`Cannot create output parent directory: ${errorMessage(err)}`, {
        outputDir: settings.outputDir,
      });
    }

    if (!(await fs.exists(documents.postsRootPath))) {
      throw new PreconditionError(`Posts directory not found: ${documents.postsRootPath}`);
    }

    if (!(await templates.directoryExists())) {
      throw new PreconditionError(`Template directory not found: ${templates.directory}`);
    }

    const invalid: string[] = [];
    for (const name of REQUIRED_TEMPLATES) {
      const validation = await templates.validateTemplate(name);
      if (!validation.ok) {
        invalid.push(`${name} (${validation.error})`);
      }
    }
    if (invalid.length > 0) {
      throw new PreconditionError(`Invalid templates: ${invalid.join(', ')}`, { templates: invalid });
    }
  }

  private async createBackup(state: RunState): Promise<void> {
    const { fs, settings } = this.deps;
    try {
      if (await fs.exists(settings.backupDir)) {
        await fs.remove(settings.backupDir);
      }
      if (await fs.exists(settings.outputDir)) {
        await fs.move(settings.outputDir, settings.backupDir);
        state.backupTaken = true;
        console.log(`[build] Moved ${settings.outputDir} to ${settings.backupDir}`);
      }
      await fs.ensureDir(settings.outputDir);
      state.outputCreated = true;
    } catch (err) {
      throw new BackupError(`Backup creation failed: ${errorMessage(err)}`, err);
    }
  }

  private async processContent(state: RunState): Promise<ProcessedDocument[]> {
    let docs: Document[];
    try {
      docs = await this.deps.documents.listPublishedDocuments();
    } catch (err) {
      throw new ContentTransformError(`Could not load documents: ${errorMessage(err)}`, {}, err);
    }

    const documentSet = fingerprint(
      docs.map((doc) => ({
        slug: doc.slug,
        title: doc.title,
        date: doc.date,
        tags: [...doc.tags].sort(),
        description: doc.description,
        body: doc.body,
      }))
    );
    if (documentSet !== this.lastDocumentSet) {
      const dropped = this.deps.renderer.invalidateRendered();
      if (this.lastDocumentSet !== null) {
        console.log(`[cache] Document set changed; dropped ${dropped} rendered pages`);
      }
      this.lastDocumentSet = documentSet;
    }

    const processed: ProcessedDocument[] = [];
    const failures: { slug: string; error: string }[] = [];
    for (const [index, doc] of docs.entries()) {
      state.deadline.check();
      try {
        processed.push({ doc, html: this.deps.markdown.convert(doc) });
        state.reporter.step('content_processing', (index + 1) / docs.length, `Processed ${doc.slug}`, {
          slug: doc.slug,
        });
      } catch (err) {
        console.error(`[build] Failed to process ${doc.slug}: ${errorMessage(err)}`);
        failures.push({ slug: doc.slug, error: errorMessage(err) });
      }
    }

    if (failures.length > 0) {
      throw new ContentTransformError(`${failures.length} of ${docs.length} documents failed to process`, {
        failures,
      });
    }

    state.stats.documentsProcessed = processed.length;
    return processed;
  }

  private async renderPages(state: RunState, processed: ProcessedDocument[]): Promise<void> {
    const { renderer, fs, templates, settings } = this.deps;
    const docs = processed.map((item) => item.doc);

    const pages: PageJob[] = [{ path: 'index.html', render: () => renderer.renderHomepage(docs) }];
    for (const { doc, html } of processed) {
      pages.push({ path: postPath(doc.slug), render: () => renderer.renderPost(doc, html) });
    }
    pages.push({ path: 'archive.html', render: () => renderer.renderArchive(docs) });

    const tags = collectTags(docs);
    if (await fs.exists(templates.pathOf(TEMPLATE_NAMES.tag))) {
      const owners = new Map<string, string>();
      for (const tag of tags) {
        const target = tagPath(tag);
        const owner = owners.get(target);
        if (owner !== undefined) {
          throw new TemplateRenderingError(`Tags "${owner}" and "${tag}" both map to ${target}`, {
            path: target,
            tags: [owner, tag],
          });
        }
        owners.set(target, tag);
        pages.push({ path: target, render: () => renderer.renderTagPage(tag, docs) });
      }
    } else if (tags.length > 0) {
      console.warn(`[build] ${TEMPLATE_NAMES.tag} not found; skipping ${tags.length} tag pages`);
    }
    pages.push({ path: 'rss.xml', render: () => renderer.renderFeed(docs) });

    const failures: { path: string; error: string }[] = [];
    for (const [index, page] of pages.entries()) {
      state.deadline.check();
      try {
        const output = await page.render();
        await fs.writeFile(path.join(settings.outputDir, page.path), output);
        state.stats.pagesRendered++;
        state.reporter.step('template_rendering', (index + 1) / pages.length, `Rendered ${page.path}`, {
          path: page.path,
        });
      } catch (err) {
        console.error(`[build] Failed to render ${page.path}: ${errorMessage(err)}`);
        failures.push({ path: page.path, error: errorMessage(err) });
      }
    }

    if (failures.length > 0) {
      throw new TemplateRenderingError(`${failures.length} of ${pages.length} pages failed to render`, {
        failures,
      });
    }
  }

  /** Returns the list of problems found; empty means the output is sound. */
  async verifyOutput(): Promise<string[]> {
    const { fs, settings } = this.deps;
    const output = await fs.stat(settings.outputDir);
    if (!output || !output.isDirectory) {
      return [`output directory ${settings.outputDir} does not exist`];
    }

    const problems: string[] = [];
    for (const artifact of REQUIRED_ARTIFACTS) {
      const stat = await fs.stat(path.join(settings.outputDir, artifact));
      if (!stat || !stat.isFile) {
        problems.push(`missing ${artifact}`);
      } else if (stat.size < MIN_ARTIFACT_BYTES) {
        problems.push(`${artifact} is only ${stat.size} bytes`);
      }
    }

    const postsDir = path.join(settings.outputDir, 'posts');
    const posts = await fs.stat(postsDir);
    if (!posts || !posts.isDirectory) {
      console.warn('[build] Output has no posts directory');
    } else if ((await fs.listFiles(postsDir)).length === 0) {
      console.warn('[build] Output posts directory is empty');
    }

    return problems;
  }

  private async fail(
    state: RunState,
    startedAt: number,
    phase: BuildPhase,
    error: BuildError
  ): Promise<BuildResult> {
    const { reporter } = state;
    const { outputDir, backupDir } = this.deps.settings;

    let settled = true;
    if (error instanceof BuildTimeoutError && state.pending) {
      const grace = this.deps.settings.abandonGraceMs ?? TIMEOUT_GRACE_MS;
      settled = await Promise.race([
        state.pending.then(
          () => true,
          () => true
        ),
        delay(grace).then(() => false),
      ]);
    }

    reporter.emit('rollback', `Rolling back after ${phase} failure: ${error.message}`, {
      failedPhase: phase,
      error: error.message,
    });
    let rollback: RollbackOutcome;
    if (settled) {
      rollback = await this.rollback(state);
    } else {
      // The abandoned phase may still write into the output directory.
      console.error(`[build] Timed-out ${phase} phase is still running; leaving ${outputDir} as it is`);
      rollback = state.backupTaken ? 'failed' : 'no-backup';
    }

    let message: string;
    if (rollback === 'restored') {
      message = 'Build failed but rollback successful';
    } else if (rollback === 'no-backup') {
      message = 'Build failed; no backup to restore';
    } else {
      message = `Build failed and rollback failed; previous output preserved at ${backupDir}`;
    }

    reporter.emit('failed', message, { failedPhase: phase, error: error.message, kind: error.kind, rollback });
    return this.result(state, startedAt, {
      success: false,
      message,
      error,
      rollback,
      outputDir: rollback === 'restored' ? outputDir : null,
      backupDir: rollback === 'failed' ? backupDir : null,
    });
  }

  private async rollback(state: RunState): Promise<RollbackOutcome> {
    const { fs, settings } = this.deps;
    try {
      if (state.backupTaken) {
        await fs.remove(settings.outputDir);
        await fs.move(settings.backupDir, settings.outputDir);
        console.log(`[build] Restored ${settings.outputDir} from backup`);
        return 'restored';
      }
      if (state.outputCreated) {
        await fs.remove(settings.outputDir);
      }
      return 'no-backup';
    } catch (err) {
      const failure = new RollbackError(`Rollback failed: ${errorMessage(err)}`, err);
      console.error(`[build] ${failure.message}`);
      return 'failed';
    }
  }

  private logCacheStats(): void {
    const { compiled, rendered } = this.deps.renderer.cacheStats();
    const pct = (rate: number) => `${Math.round(rate * 100)}%`;
    console.log(
      `[cache] compiled ${compiled.size}/${compiled.capacity} (hit rate ${pct(compiled.hitRate)}), ` +
        `rendered ${rendered.enabled ? `${rendered.size}/${rendered.capacity} (hit rate ${pct(rendered.hitRate)})` : 'disabled'}`
    );
  }

  private result(
    state: RunState,
    startedAt: number,
    outcome: {
      success: boolean;
      message: string;
      error?: Error;
      rollback?: RollbackOutcome;
      outputDir?: string | null;
      backupDir?: string | null;
    }
  ): BuildResult {
    return Object.freeze({
      success: outcome.success,
      message: outcome.message,
      durationMs: Date.now() - startedAt,
      outputDir: outcome.outputDir ?? null,
      backupDir: outcome.backupDir ?? null,
      stats: { ...state.stats },
      error: outcome.error ?? null,
      rollback: outcome.rollback ?? null,
      progress: [...state.reporter.events],
    });
  }
}
