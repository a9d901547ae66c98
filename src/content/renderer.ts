import type { SiteConfig } from '../config';
import type { TemplateCache, TemplateCacheStats } from '../cache/template-cache';
import { TemplateRenderingError, errorMessage } from '../errors';
import type { Document } from '../types';
import type { CompiledTemplate, TemplateSource } from './templates';
import { absoluteUrl, postPath } from './urls';

export const TEMPLATE_NAMES = {
  home: 'index.hbs',
  post: 'post.hbs',
  archive: 'archive.hbs',
  tag: 'tag.hbs',
  feed: 'feed.hbs',
} as const;

/** Templates that must load before a build touches the output tree. */
export const REQUIRED_TEMPLATES: readonly string[] = [
  TEMPLATE_NAMES.home,
  TEMPLATE_NAMES.post,
  TEMPLATE_NAMES.archive,
  TEMPLATE_NAMES.feed,
];

export interface PostView {
  slug: string;
  title: string;
  date: string;
  tags: string[];
  description: string;
  url: string;
  permalink: string;
}

export interface YearGroup {
  year: number;
  posts: PostView[];
}

function newestFirst(a: Document, b: Document): number {
  return b.date.getTime() - a.date.getTime();
}

/** Distinct lower-cased tags across the given documents, sorted. */
export function collectTags(docs: readonly Document[]): string[] {
  const tags = new Set<string>();
  for (const doc of docs) {
    for (const tag of doc.tags) {
      const normalized = tag.trim().toLowerCase();
      if (normalized) tags.add(normalized);
    }
  }
  return [...tags].sort();
}

/**
 * Renders the site's pages from in-memory documents. Output for an
 * identical (template, context) pair comes from the rendered cache.
 */
export class PageRenderer {
  constructor(
    private readonly site: SiteConfig,
    private readonly templates: TemplateSource,
    private readonly cache: TemplateCache<CompiledTemplate>
  ) {}

  toView(doc: Document): PostView {
    const url = postPath(doc.slug);
    return {
      slug: doc.slug,
      title: doc.title,
      date: doc.date.toISOString(),
      tags: collectTags([doc]),
      description: doc.description ?? '',
      url,
      permalink: absoluteUrl(this.site.url, url),
    };
  }

  groupByYear(docs: readonly Document[]): YearGroup[] {
    const byYear = new Map<number, Document[]>();
    for (const doc of docs) {
      const year = doc.date.getUTCFullYear();
      const bucket = byYear.get(year) ?? [];
      bucket.push(doc);
      byYear.set(year, bucket);
    }
    return [...byYear.entries()]
      .sort(([a], [b]) => b - a)
      .map(([year, bucket]) => ({
        year,
        posts: [...bucket].sort(newestFirst).map((doc) => this.toView(doc)),
      }));
  }

  async renderHomepage(docs: readonly Document[]): Promise<string> {
    const sorted = [...docs].sort(newestFirst);
    return this.render(TEMPLATE_NAMES.home, {
      page_type: 'homepage',
      rootPath: '',
      posts: sorted.slice(0, this.site.postsPerPage).map((doc) => this.toView(doc)),
      totalPosts: sorted.length,
      hasMore: sorted.length > this.site.postsPerPage,
    });
  }

  async renderPost(doc: Document, html: string): Promise<string> {
    return this.render(TEMPLATE_NAMES.post, {
      page_type: 'post',
      rootPath: '../',
      post: this.toView(doc),
      content: html,
    });
  }

  async renderArchive(docs: readonly Document[]): Promise<string> {
    return this.render(TEMPLATE_NAMES.archive, {
      page_type: 'archive',
      rootPath: '',
      years: this.groupByYear(docs),
      totalPosts: docs.length,
    });
  }

  async renderTagPage(tag: string, docs: readonly Document[]): Promise<string> {
    const normalized = tag.toLowerCase();
    const tagged = docs
      .filter((doc) => doc.tags.some((t) => t.trim().toLowerCase() === normalized))
      .sort(newestFirst);
    return this.render(TEMPLATE_NAMES.tag, {
      page_type: 'tag',
      rootPath: '../',
      tag: normalized,
      posts: tagged.map((doc) => this.toView(doc)),
    });
  }

  async renderFeed(docs: readonly Document[]): Promise<string> {
    const items = [...docs].sort(newestFirst).slice(0, this.site.feedMaxItems);
    return this.render(TEMPLATE_NAMES.feed, {
      page_type: 'rss',
      feedUrl: absoluteUrl(this.site.url, 'rss.xml'),
      homeUrl: absoluteUrl(this.site.url, ''),
      lastBuildDate: items.length > 0 ? items[0].date.toISOString() : null,
      posts: items.map((doc) => this.toView(doc)),
    });
  }

  /** Drops every cached page so the next render recomputes it. */
  invalidateRendered(): number {
    return this.cache.invalidateRendered();
  }

  cacheStats(): TemplateCacheStats {
    return this.cache.getStats();
  }

  private siteContext(): Record<string, unknown> {
    return {
      site: {
        title: this.site.title,
        url: this.site.url,
        author: this.site.author,
        description: this.site.description,
      },
      build: {
        postsPerPage: this.site.postsPerPage,
      },
    };
  }

  private async render(name: string, page: Record<string, unknown>): Promise<string> {
    try {
      const version = await this.templates.modifiedAt(name);
      const context = { ...this.siteContext(), ...page };
      const key = this.cache.renderedKey(name, version, context);

      const cached = this.cache.getRenderedOutput(key);
      if (cached !== undefined) {
        return cached;
      }

      const template = await this.cache.getCompiledTemplate(name, version, () =>
        this.templates.compile(name)
      );
      const output = template(context);
      this.cache.putRenderedOutput(key, output);
      return output;
    } catch (err) {
      throw new TemplateRenderingError(
        `Failed to render template '${name}': ${errorMessage(err)}`,
        { template: name },
        err
      );
    }
  }
}
