import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
dotenv.config();

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  API_TOKEN: z.string().min(1).optional(),
  DATABASE_URL: z.string().url().optional(),

  SITE_TITLE: z.string().min(1).max(200),
  SITE_URL: z.string().regex(/^https?:\/\/.+/, 'must be an http(s) URL'),
  SITE_AUTHOR: z.string().min(1).max(200),
  SITE_DESCRIPTION: z.string().max(500).default(''),
  POSTS_PER_PAGE: z.coerce.number().int().min(1).max(100).default(10),
  FEED_MAX_ITEMS: z.coerce.number().int().min(1).max(500).default(20),

  CONTENT_DIR: z.string().default('content'),
  POSTS_DIR: z.string().optional(),
  TEMPLATES_DIR: z.string().default('templates'),
  STATIC_DIR: z.string().default('static'),
  OUTPUT_DIR: z.string().default('build'),
  BACKUP_DIR: z.string().default('build.bak'),

  TEMPLATE_CACHE_SIZE: z.coerce.number().int().min(1).default(50),
  RENDERED_CACHE_SIZE: z.coerce.number().int().min(1).default(200),
  RENDERED_CACHE_ENABLED: flag.default('true'),

  BUILD_TIMEOUT_MS: z.coerce.number().int().min(0).default(10 * 60 * 1000),
  MAX_QUEUED_BUILDS: z.coerce.number().int().min(1).default(5),
  JOB_RETENTION_HOURS: z.coerce.number().positive().default(24),
  JOB_SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60 * 60 * 1000),
});

export interface SiteConfig {
  title: string;
  url: string;
  author: string;
  description: string;
  postsPerPage: number;
  feedMaxItems: number;
}

export interface PathsConfig {
  contentDir: string;
  postsDir: string;
  templatesDir: string;
  staticDir: string;
  outputDir: string;
  backupDir: string;
}

export interface AppConfig {
  port: number;
  /** Required by the HTTP service, not by one-off CLI builds. */
  apiToken: string | null;
  databaseUrl: string | null;
  site: SiteConfig;
  paths: PathsConfig;
  cache: {
    templateCacheSize: number;
    renderedCacheSize: number;
    renderedCacheEnabled: boolean;
  };
  build: {
    timeoutMs: number;
  };
  queue: {
    maxQueued: number;
    retentionMs: number;
    sweepIntervalMs: number;
  };
}

/**
 * Reads the service configuration from environment variables.
 * Relative directories resolve against `cwd`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  const resolve = (dir: string) => path.resolve(cwd, dir);
  const contentDir = resolve(e.CONTENT_DIR);

  return {
    port: e.PORT,
    apiToken: e.API_TOKEN ?? null,
    databaseUrl: e.DATABASE_URL ?? null,
    site: {
      title: e.SITE_TITLE,
      url: e.SITE_URL,
      author: e.SITE_AUTHOR,
      description: e.SITE_DESCRIPTION,
      postsPerPage: e.POSTS_PER_PAGE,
      feedMaxItems: e.FEED_MAX_ITEMS,
    },
    paths: {
      contentDir,
      postsDir: e.POSTS_DIR ? resolve(e.POSTS_DIR) : path.join(contentDir, 'posts'),
      templatesDir: resolve(e.TEMPLATES_DIR),
      staticDir: resolve(e.STATIC_DIR),
      outputDir: resolve(e.OUTPUT_DIR),
      backupDir: resolve(e.BACKUP_DIR),
    },
    cache: {
      templateCacheSize: e.TEMPLATE_CACHE_SIZE,
      renderedCacheSize: e.RENDERED_CACHE_SIZE,
      renderedCacheEnabled: e.RENDERED_CACHE_ENABLED,
    },
    build: {
      timeoutMs: e.BUILD_TIMEOUT_MS,
    },
    queue: {
      maxQueued: e.MAX_QUEUED_BUILDS,
      retentionMs: e.JOB_RETENTION_HOURS * 60 * 60 * 1000,
      sweepIntervalMs: e.JOB_SWEEP_INTERVAL_MS,
    },
  };
}
