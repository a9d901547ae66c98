import { BoundedCache, type CacheStats } from './bounded-cache';
import { fingerprint } from './fingerprint';

interface CompiledEntry<T> {
  template: T;
  mtimeMs: number;
}

export interface TemplateCacheOptions {
  compiledCapacity?: number;
  renderedCapacity?: number;
  renderedEnabled?: boolean;
}

export interface TemplateCacheStats {
  compiled: CacheStats;
  rendered: CacheStats & { enabled: boolean };
}

/**
 * Compiled-template and rendered-output caches.
 *
 * Compiled entries carry the source mtime they were built from and are
 * replaced once the file on disk is newer. Rendered entries never expire on
 * their own; callers invalidate them by template name.
 */
export class TemplateCache<T extends {}> {
  private readonly compiled: BoundedCache<CompiledEntry<T>>;
  private readonly rendered: BoundedCache<string>;

  constructor(options: TemplateCacheOptions = {}) {
    this.compiled = new BoundedCache({ capacity: options.compiledCapacity ?? 50 });
    this.rendered = new BoundedCache({
      capacity: options.renderedCapacity ?? 200,
      enabled: options.renderedEnabled ?? true,
    });
    console.log(
      `[cache] Template cache ready (compiled: ${this.compiled.capacity}, rendered: ${
        this.rendered.enabled ? this.rendered.capacity : 'disabled'
      })`
    );
  }

  async getCompiledTemplate(
    name: string,
    mtimeMs: number,
    compile: () => Promise<T>
  ): Promise<T> {
    const stale = this.compiled.peek(name);
    if (stale && stale.mtimeMs < mtimeMs) {
      this.compiled.delete(name);
      const dropped = this.rendered.invalidate(`${name}:`);
      console.log(`[cache] Template ${name} changed on disk; recompiling (${dropped} rendered entries dropped)`);
    }

    const cached = this.compiled.get(name);
    if (cached) {
      return cached.template;
    }

    const template = await compile();
    this.compiled.put(name, { template, mtimeMs });
    return template;
  }

  renderedKey(name: string, templateVersion: number, context: Record<string, unknown>): string {
    return `${name}:${fingerprint({ templateVersion, context })}`;
  }

  getRenderedOutput(key: string): string | undefined {
    return this.rendered.get(key);
  }

  putRenderedOutput(key: string, output: string): void {
    this.rendered.put(key, output);
  }

  /** Drops the compiled template and every rendered output for `name`. */
  invalidateTemplate(name: string): void {
    this.compiled.delete(name);
    this.rendered.invalidate(`${name}:`);
  }

  invalidateRendered(): number {
    const count = this.rendered.size;
    this.rendered.clear();
    return count;
  }

  clearAll(): void {
    this.compiled.clear();
    this.rendered.clear();
    console.log('[cache] Cleared all template caches');
  }

  getStats(): TemplateCacheStats {
    return {
      compiled: this.compiled.stats(),
      rendered: { ...this.rendered.stats(), enabled: this.rendered.enabled },
    };
  }
}
