import matter from 'gray-matter';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from '../errors';
import type { Document, DocumentProvider } from '../types';

const frontMatter = z.object({
  title: z.string().min(1),
  date: z.coerce.date(),
  slug: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lower-case letters, digits and dashes')
    .optional(),
  draft: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  description: z.string().optional(),
});

function slugFromFileName(file: string): string {
  return path
    .basename(file, path.extname(file))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Reads markdown posts with YAML front-matter from a directory. Files whose
 * front-matter does not validate are skipped with a warning.
 */
export class FileDocumentProvider implements DocumentProvider {
  constructor(readonly postsRootPath: string) {}

  async listPublishedDocuments(): Promise<Document[]> {
    const entries = await fs.readdir(this.postsRootPath, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.md'))
      .map((entry) => entry.name)
      .sort();

    const docs: Document[] = [];
    for (const file of files) {
      const doc = await this.readDocument(file);
      if (doc && !doc.draft) {
        docs.push(doc);
      }
    }

    return docs.sort((a, b) => b.date.getTime() - a.date.getTime());
  }

  private async readDocument(file: string): Promise<Document | null> {
    const fullPath = path.join(this.postsRootPath, file);
    let parsed: matter.GrayMatterFile<string>;
    try {
      parsed = matter(await fs.readFile(fullPath, 'utf-8'));
    } catch (err) {
      console.warn(`[posts] Skipping ${file}: ${errorMessage(err)}`);
      return null;
    }

    const meta = frontMatter.safeParse(parsed.data);
    if (!meta.success) {
      const problems = meta.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      console.warn(`[posts] Skipping ${file}: invalid front-matter (${problems.join('; ')})`);
      return null;
    }

    const slug = meta.data.slug ?? slugFromFileName(file);
    if (!slug) {
      console.warn(`[posts] Skipping ${file}: cannot derive a slug`);
      return null;
    }

    return {
      slug,
      title: meta.data.title,
      date: meta.data.date,
      draft: meta.data.draft,
      tags: meta.data.tags,
      body: parsed.content,
      description: meta.data.description,
    };
  }
}
