import { Marked } from 'marked';
import { ContentTransformError, errorMessage } from '../errors';
import type { Document } from '../types';

/**
 * Converts document bodies from markdown to HTML. Holds no per-document
 * state, so one instance serves a whole build.
 */
export class MarkdownConverter {
  private readonly marked = new Marked({ gfm: true, breaks: false, async: false, silent: false });

  convert(doc: Pick<Document, 'slug' | 'body'>): string {
    if (typeof doc.body !== 'string') {
      throw new ContentTransformError(`Document ${doc.slug} has no markdown body`, { slug: doc.slug });
    }
    if (doc.body.includes('\u0000')) {
      throw new ContentTransformError(`Document ${doc.slug} contains binary data`, { slug: doc.slug });
    }

    let html: string | Promise<string>;
    try {
      html = this.marked.parse(doc.body);
    } catch (err) {
      throw new ContentTransformError(
        `Failed to parse markdown for ${doc.slug}: ${errorMessage(err)}`,
        { slug: doc.slug },
        err
      );
    }

    if (typeof html !== 'string') {
      throw new ContentTransformError(`Markdown parser returned asynchronously for ${doc.slug}`, {
        slug: doc.slug,
      });
    }
    return html;
  }
}
