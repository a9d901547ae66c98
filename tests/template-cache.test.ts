import { describe, expect, it, vi } from 'vitest';
import { TemplateCache } from '../src/cache/template-cache';

type Fn = (context: Record<string, unknown>) => string;

describe('TemplateCache', () => {
  it('compiles once while the source mtime is unchanged', async () => {
    const cache = new TemplateCache<Fn>();
    const compile = vi.fn(async () => () => 'out');

    await cache.getCompiledTemplate('post.hbs', 1000, compile);
    await cache.getCompiledTemplate('post.hbs', 1000, compile);

    expect(compile).toHaveBeenCalledTimes(1);
    expect(cache.getStats().compiled).toMatchObject({ hits: 1, misses: 1, size: 1 });
  });

  it('recompiles and counts a miss when the source is newer', async () => {
    const cache = new TemplateCache<Fn>();
    const first = await cache.getCompiledTemplate('post.hbs', 1000, async () => () => 'v1');
    const second = await cache.getCompiledTemplate('post.hbs', 2000, async () => () => 'v2');

    expect(first({})).toBe('v1');
    expect(second({})).toBe('v2');
    expect(cache.getStats().compiled).toMatchObject({ hits: 0, misses: 2, size: 1 });
  });

  it('drops rendered output of a template that changed on disk', async () => {
    const cache = new TemplateCache<Fn>();
    await cache.getCompiledTemplate('post.hbs', 1000, async () => () => 'v1');
    const postKey = cache.renderedKey('post.hbs', 1000, { slug: 'a' });
    const homeKey = cache.renderedKey('index.hbs', 1000, {});
    cache.putRenderedOutput(postKey, '<p>a</p>');
    cache.putRenderedOutput(homeKey, '<p>home</p>');

    await cache.getCompiledTemplate('post.hbs', 5000, async () => () => 'v2');

    expect(cache.getRenderedOutput(postKey)).toBeUndefined();
    expect(cache.getRenderedOutput(homeKey)).toBe('<p>home</p>');
  });

  it('keys rendered output by template version and context content', () => {
    const cache = new TemplateCache<Fn>();
    const key = cache.renderedKey('index.hbs', 1, { a: 1, b: [1, 2] });

    expect(cache.renderedKey('index.hbs', 1, { b: [1, 2], a: 1 })).toBe(key);
    expect(cache.renderedKey('index.hbs', 2, { a: 1, b: [1, 2] })).not.toBe(key);
    expect(cache.renderedKey('archive.hbs', 1, { a: 1, b: [1, 2] })).not.toBe(key);
    expect(key.startsWith('index.hbs:')).toBe(true);
  });

  it('invalidates one template or everything', async () => {
    const cache = new TemplateCache<Fn>();
    await cache.getCompiledTemplate('a.hbs', 1, async () => () => 'a');
    await cache.getCompiledTemplate('b.hbs', 1, async () => () => 'b');
    cache.putRenderedOutput(cache.renderedKey('a.hbs', 1, {}), 'A');
    cache.putRenderedOutput(cache.renderedKey('b.hbs', 1, {}), 'B');

    cache.invalidateTemplate('a.hbs');
    expect(cache.getStats().compiled.size).toBe(1);
    expect(cache.getStats().rendered.size).toBe(1);

    expect(cache.invalidateRendered()).toBe(1);
    cache.clearAll();
    expect(cache.getStats().compiled.size).toBe(0);
  });

  it('reports the rendered cache as disabled when configured off', () => {
    const cache = new TemplateCache<Fn>({ renderedEnabled: false });
    const key = cache.renderedKey('index.hbs', 1, {});
    cache.putRenderedOutput(key, 'x');

    expect(cache.getRenderedOutput(key)).toBeUndefined();
    expect(cache.getStats().rendered).toMatchObject({ enabled: false, size: 0, misses: 1 });
  });
});
