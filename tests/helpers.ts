import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AssetSync } from '../src/assets/asset-sync';
import { type BuildFileSystem, NodeFileSystem } from '../src/builder/file-system';
import { BuildOrchestrator } from '../src/builder/orchestrator';
import { TemplateCache } from '../src/cache/template-cache';
import type { SiteConfig } from '../src/config';
import { MarkdownConverter } from '../src/content/markdown';
import { PageRenderer } from '../src/content/renderer';
import { type CompiledTemplate, TemplateSource } from '../src/content/templates';
import type { Document, DocumentProvider } from '../src/types';

export const DEFAULT_TEMPLATES_DIR = path.resolve(process.cwd(), 'templates');

export const SITE: SiteConfig = {
  title: 'Field Notes',
  url: 'https://notes.example.test',
  author: 'Test Author',
  description: 'Short posts for tests',
  postsPerPage: 2,
  feedMaxItems: 2,
};

export async function makeTempDir(prefix = 'blog-build-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeDoc(slug: string, overrides: Partial<Document> = {}): Document {
  return {
    slug,
    title: `Post ${slug}`,
    date: new Date('2024-03-01T12:00:00Z'),
    draft: false,
    tags: [],
    body: `# ${slug}\n\nBody of ${slug}.`,
    ...overrides,
  };
}

export class InMemoryDocuments implements DocumentProvider {
  /** Simulates a slow store. */
  delayMs = 0;

  constructor(
    readonly postsRootPath: string,
    public docs: Document[]
  ) {}

  async listPublishedDocuments(): Promise<Document[]> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    return this.docs.filter((doc) => !doc.draft);
  }
}

/** Reads every file below `dir` into a map keyed by relative path. */
export async function snapshotTree(dir: string): Promise<Record<string, string>> {
  const files = await new NodeFileSystem().listFiles(dir);
  const tree: Record<string, string> = {};
  for (const file of files) {
    tree[file] = await fs.readFile(path.join(dir, file), 'utf-8');
  }
  return tree;
}

export interface TestSite {
  root: string;
  outputDir: string;
  backupDir: string;
  templatesDir: string;
  staticDir: string;
  documents: InMemoryDocuments;
  templates: TemplateSource;
  cache: TemplateCache<CompiledTemplate>;
  renderer: PageRenderer;
  assets: AssetSync;
  orchestrator: BuildOrchestrator;
}

export interface TestSiteOptions {
  docs?: Document[];
  fs?: BuildFileSystem;
  timeoutMs?: number;
  abandonGraceMs?: number;
  markdown?: Pick<MarkdownConverter, 'convert'>;
}

/**
 * A throwaway site under the OS temp directory, built with the shipped
 * templates and a stylesheet under static/css.
 */
export async function createTestSite(options: TestSiteOptions = {}): Promise<TestSite> {
  const root = await makeTempDir();
  const templatesDir = path.join(root, 'templates');
  const postsDir = path.join(root, 'content', 'posts');
  const staticDir = path.join(root, 'static');
  const outputDir = path.join(root, 'build');
  const backupDir = path.join(root, 'build.bak');

  await fs.cp(DEFAULT_TEMPLATES_DIR, templatesDir, { recursive: true });
  await fs.mkdir(postsDir, { recursive: true });
  await fs.mkdir(path.join(staticDir, 'css'), { recursive: true });
  await fs.writeFile(path.join(staticDir, 'css', 'style.css'), 'body { margin: 0; }\n');

  const fileSystem = options.fs ?? new NodeFileSystem();
  const documents = new InMemoryDocuments(postsDir, options.docs ?? []);
  const templates = new TemplateSource(templatesDir);
  const cache = new TemplateCache<CompiledTemplate>({ compiledCapacity: 10, renderedCapacity: 100 });
  const renderer = new PageRenderer(SITE, templates, cache);
  const assets = new AssetSync(
    [
      { source: path.join(staticDir, 'css'), destination: path.join(outputDir, 'css'), description: 'CSS' },
      { source: path.join(root, 'content', 'images'), destination: path.join(outputDir, 'images'), description: 'Images' },
    ],
    fileSystem
  );

  const orchestrator = new BuildOrchestrator({
    documents,
    markdown: options.markdown ?? new MarkdownConverter(),
    renderer,
    assets,
    templates,
    fs: fileSystem,
    settings: {
      outputDir,
      backupDir,
      timeoutMs: options.timeoutMs ?? 0,
      abandonGraceMs: options.abandonGraceMs,
    },
  });

  return {
    root,
    outputDir,
    backupDir,
    templatesDir,
    staticDir,
    documents,
    templates,
    cache,
    renderer,
    assets,
    orchestrator,
  };
}
