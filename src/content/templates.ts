import Handlebars from 'handlebars';
import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../errors';
import { tagPath } from './urls';

export type CompiledTemplate = (context: Record<string, unknown>) => string;

export type TemplateValidation = { ok: true } | { ok: false; error: string };

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * Handlebars templates loaded from a single directory, addressed by file
 * name (`post.hbs`).
 */
export class TemplateSource {
  private readonly hbs = Handlebars.create();

  constructor(readonly directory: string) {
    this.hbs.registerHelper('formatDate', (value: unknown) => {
      const date = toDate(value);
      return date
        ? date.toLocaleDateString('en-US', { year: 'numeric', month: 'long', day: 'numeric', timeZone: 'UTC' })
        : '';
    });
    this.hbs.registerHelper('rfc822', (value: unknown) => toDate(value)?.toUTCString() ?? '');
    this.hbs.registerHelper('year', (value: unknown) => toDate(value)?.getUTCFullYear() ?? '');
    this.hbs.registerHelper('tagPath', (value: unknown) => (typeof value === 'string' ? tagPath(value) : ''));
    this.hbs.registerHelper('join', (value: unknown, separator: unknown) =>
      Array.isArray(value) ? value.join(typeof separator === 'string' ? separator : ', ') : ''
    );
  }

  pathOf(name: string): string {
    return path.join(this.directory, name);
  }

  async directoryExists(): Promise<boolean> {
    try {
      return (await fs.stat(this.directory)).isDirectory();
    } catch {
      return false;
    }
  }

  async validateTemplate(name: string): Promise<TemplateValidation> {
    try {
      const source = await fs.readFile(this.pathOf(name), 'utf-8');
      this.hbs.parse(source);
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  async modifiedAt(name: string): Promise<number> {
    return (await fs.stat(this.pathOf(name))).mtimeMs;
  }

  /** Parses eagerly so syntax errors surface here rather than at first render. */
  async compile(name: string): Promise<CompiledTemplate> {
    const source = await fs.readFile(this.pathOf(name), 'utf-8');
    const ast = this.hbs.parse(source);
    return this.hbs.compile<Record<string, unknown>>(ast, { strict: false });
  }
}
