/**
 * Path filtering for the site watcher
 *
 * A path is relevant exactly when the scanner would load it as a
 * document, so a change the watcher ignores can never alter a build.
 */

import path from 'path';
import { DOCUMENT_EXTENSION, isDocumentPath, isExcludedDirectory } from '@quire/core';

/**
 * Normalize a path for consistent handling across platforms
 */
export function normalizePath(filePath: string): string {
  let normalized = filePath.replace(/\\/g, '/');

  if (process.platform === 'win32') {
    normalized = normalized.toLowerCase();
  }

  return normalized;
}

/**
 * Get relative path from the watched root
 */
export function getRelativePath(rootPath: string, filePath: string): string {
  return normalizePath(path.relative(rootPath, filePath));
}

/**
 * Check if a file event is relevant to the site
 *
 * @param filePath - Absolute or relative path to check
 * @param rootPath - Optional root for relative path calculation
 */
export function shouldWatch(filePath: string, rootPath?: string): boolean {
  return isDocumentPath(rootPath ? getRelativePath(rootPath, filePath) : normalizePath(filePath));
}

/**
 * Create a chokidar-compatible ignore function
 *
 * Chokidar calls this for both files and directories; a directory that
 * is ignored is never descended into, so only excluded and hidden
 * directories (and extra paths such as an output dir inside the root)
 * are rejected outright.
 */
export function createIgnoreFunction(rootPath: string, extraIgnored: readonly string[] = []): (filePath: string) => boolean {
  const extra = extraIgnored.map((p) => getRelativePath(rootPath, p)).filter((p) => p && !p.startsWith('..'));

  return (filePath: string): boolean => {
    const relativePath = getRelativePath(rootPath, filePath);
    const segments = relativePath.split('/').filter((s) => s.length > 0);

    if (segments.length === 0) {
      return false;
    }

    if (extra.some((p) => relativePath === p || relativePath.startsWith(`${p}/`))) {
      return true;
    }

    if (segments.slice(0, -1).some(isExcludedDirectory)) {
      return true;
    }

    const lastSegment = segments[segments.length - 1];

    // Directories (anything without the document extension) pass so
    // chokidar descends into them
    if (!lastSegment.toLowerCase().endsWith(DOCUMENT_EXTENSION)) {
      return isExcludedDirectory(lastSegment);
    }

    return !isDocumentPath(relativePath);
  };
}
