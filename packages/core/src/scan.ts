/**
 * Document scanner - finds every markdown file under a docs root
 */

import * as fs from 'fs';
import * as path from 'path';
import { DocumentIoError } from './errors.js';

/** Extension of document files */
export const DOCUMENT_EXTENSION = '.md';

/** Directories never descended into, besides any hidden one */
export const EXCLUDED_DIRS: ReadonlySet<string> = new Set([
  '.git',
  '.quire',
  '.trash',
  'node_modules',
]);

/**
 * Whether a directory name is skipped: excluded by name, or hidden
 */
export function isExcludedDirectory(name: string): boolean {
  return EXCLUDED_DIRS.has(name) || name.startsWith('.');
}

/**
 * Whether a path relative to the docs root (forward slashes) names a
 * document. The scanner and the watcher both decide by this rule.
 */
export function isDocumentPath(relativePath: string): boolean {
  const segments = relativePath.split('/').filter((s) => s.length > 0);
  if (segments.length === 0 || segments[0] === '..') {
    return false;
  }

  if (segments.slice(0, -1).some(isExcludedDirectory)) {
    return false;
  }

  const filename = segments[segments.length - 1];
  return !filename.startsWith('.') && filename.toLowerCase().endsWith(DOCUMENT_EXTENSION);
}

/** File info returned by the scanner */
export interface DocumentFile {
  path: string;         // Relative path from docs root, forward slashes
  absolutePath: string; // Full filesystem path
}

/**
 * Recursively scan a docs root for document files.
 *
 * Results are sorted by relative path so walks are reproducible.
 * Unreadable directories are an error, not a skip: a build must not
 * silently publish a partial tree.
 */
export async function scanDocuments(docsRoot: string): Promise<DocumentFile[]> {
  const files: DocumentFile[] = [];

  async function scan(dir: string, relativePath: string = '') {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new DocumentIoError(dir, 'read', { cause: err });
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (isExcludedDirectory(entry.name)) {
          continue;
        }
        await scan(fullPath, relPath);
      } else if (entry.isFile() && isDocumentPath(relPath)) {
        files.push({
          path: relPath,
          absolutePath: fullPath,
        });
      }
    }
  }

  await scan(docsRoot);
  return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
