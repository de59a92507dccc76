/**
 * Slug derivation for documents and wikilink targets
 */

import * as path from 'path';

/** Letters (any script) and numbers survive slugification */
const ALPHANUMERIC = /[\p{Alphabetic}\p{N}]/u;

/**
 * Convert arbitrary text to a URL-safe slug.
 *
 * Lowercases, keeps alphanumerics (including non-ASCII letters), turns
 * every other character into a dash, collapses dash runs and trims
 * leading/trailing dashes. Idempotent.
 */
export function slugify(text: string): string {
  let slug = '';
  for (const char of text.toLowerCase()) {
    slug += ALPHANUMERIC.test(char) ? char : '-';
  }
  return slug.replace(/-+/g, '-').replace(/^-|-$/g, '');
}

/**
 * Slug of a document file: slugified base name without its extension
 *
 * slugFromPath('notes/Hello World.md') === 'hello-world'
 */
export function slugFromPath(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return slugify(ext ? base.slice(0, -ext.length) : base);
}
