import { fingerprint } from '../cache/fingerprint';

/** Output-relative locations of generated pages. */
export function postPath(slug: string): string {
  return `posts/${slug}.html`;
}

/**
 * File-name slug for a tag. Tags are compared lower-cased; when slugifying
 * loses characters a hash of the tag is appended, so distinct tags never
 * share a file.
 */
export function tagSlug(tag: string): string {
  const normalized = tag.toLowerCase();
  const slug = normalized.replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  if (slug === normalized) {
    return slug;
  }
  const suffix = fingerprint(normalized).slice(0, 8);
  return slug ? `${slug}-${suffix}` : `tag-${suffix}`;
}

export function tagPath(tag: string): string {
  return `tags/${tagSlug(tag)}.html`;
}

export function absoluteUrl(baseUrl: string, relative: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return new URL(relative, base).toString();
}
