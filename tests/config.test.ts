import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

const base = {
  SITE_TITLE: 'Field Notes',
  SITE_URL: 'https://notes.example.test',
  SITE_AUTHOR: 'Test Author',
};

describe('loadConfig', () => {
  it('applies defaults and resolves directories against cwd', () => {
    const config = loadConfig({ ...base }, '/srv/blog');

    expect(config.port).toBe(8080);
    expect(config.apiToken).toBeNull();
    expect(config.databaseUrl).toBeNull();
    expect(config.site).toEqual({
      title: 'Field Notes',
      url: 'https://notes.example.test',
      author: 'Test Author',
      description: '',
      postsPerPage: 10,
      feedMaxItems: 20,
    });
    expect(config.paths).toEqual({
      contentDir: path.resolve('/srv/blog', 'content'),
      postsDir: path.resolve('/srv/blog', 'content', 'posts'),
      templatesDir: path.resolve('/srv/blog', 'templates'),
      staticDir: path.resolve('/srv/blog', 'static'),
      outputDir: path.resolve('/srv/blog', 'build'),
      backupDir: path.resolve('/srv/blog', 'build.bak'),
    });
    expect(config.cache).toEqual({ templateCacheSize: 50, renderedCacheSize: 200, renderedCacheEnabled: true });
    expect(config.build.timeoutMs).toBe(600000);
    expect(config.queue).toEqual({ maxQueued: 5, retentionMs: 86400000, sweepIntervalMs: 3600000 });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig(
      {
        ...base,
        PORT: '3000',
        API_TOKEN: 'test-secret',
        POSTS_DIR: '/data/posts',
        OUTPUT_DIR: 'public',
        RENDERED_CACHE_ENABLED: '0',
        BUILD_TIMEOUT_MS: '0',
        JOB_RETENTION_HOURS: '0.5',
      },
      '/srv/blog'
    );

    expect(config.port).toBe(3000);
    expect(config.apiToken).toBe('test-secret');
    expect(config.paths.postsDir).toBe('/data/posts');
    expect(config.paths.outputDir).toBe(path.resolve('/srv/blog', 'public'));
    expect(config.cache.renderedCacheEnabled).toBe(false);
    expect(config.build.timeoutMs).toBe(0);
    expect(config.queue.retentionMs).toBe(1800000);
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ SITE_URL: 'notes.example.test', PORT: '0' }, '/srv/blog')).toThrow(
      'Invalid configuration: PORT: Number must be greater than or equal to 1; SITE_TITLE: Required; SITE_URL: must be an http(s) URL; SITE_AUTHOR: Required'
    );
  });

  it('rejects an unknown flag value', () => {
    expect(() => loadConfig({ ...base, RENDERED_CACHE_ENABLED: 'yes' }, '/srv/blog')).toThrow(
      /^Invalid configuration: RENDERED_CACHE_ENABLED:/
    );
  });
});
