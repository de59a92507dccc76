/**
 * Build pipeline - docs root -> static site
 *
 * Every document is loaded before anything is written. Any load failure
 * aborts the build (no partial sites), and so does a slug collision.
 * The link registry is built from the complete set, Drafts included,
 * and only then are Public documents rendered. Pages left over from an
 * earlier build (deleted or unpublished documents) are removed, so the
 * output tree holds exactly one page per Public document plus the index.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DocumentIoError,
  DuplicateSlugError,
  WikilinkRegistry,
  documentSlug,
  findBrokenLinks,
  loadDocument,
  scanDocuments,
  serverLog,
  type Document,
  type DocumentFile,
} from '@quire/core';
import { escapeHtml, formatDate, renderPage } from './render.js';
import { fillTemplate, loadTemplate } from './templates.js';

export const INDEX_PAGE = 'index.html';

const OUTPUT_EXTENSION = '.html';

export interface BuildOptions {
  /** Site name for the index page and page titles */
  siteTitle?: string;
}

/** A Public document written to the output tree */
export interface PublishedPage {
  slug: string;
  title: string;
  created?: string;
  sourcePath: string;  // Relative to the docs root
  outputPath: string;  // Relative to the output root, forward slashes
}

/** Wikilink target with no registered title or alias */
export interface BrokenLink {
  sourcePath: string;
  target: string;
}

export interface BuildReport {
  /** Every loaded document, Draft and Public, in walk order */
  documents: Document[];
  published: PublishedPage[];
  brokenLinks: BrokenLink[];
  /** Stale pages deleted from the output tree, relative paths */
  removed: string[];
}

interface LoadedDocument {
  file: DocumentFile;
  doc: Document;
}

/**
 * Output path for a source path: same relative location, .html extension
 */
export function outputPathFor(relativePath: string): string {
  const ext = path.posix.extname(relativePath);
  return `${relativePath.slice(0, relativePath.length - ext.length)}${OUTPUT_EXTENSION}`;
}

/**
 * Relative href from a page at outputPath back to the site index
 */
export function indexHrefFor(outputPath: string): string {
  const depth = outputPath.split('/').length - 1;
  return `${'../'.repeat(depth)}${INDEX_PAGE}`;
}

function assertUniqueSlugs(loaded: readonly LoadedDocument[]): void {
  const seen = new Map<string, string>();
  for (const { file, doc } of loaded) {
    const slug = documentSlug(doc);
    const first = seen.get(slug);
    if (first !== undefined) {
      throw new DuplicateSlugError(slug, first, file.path);
    }
    seen.set(slug, file.path);
  }
}

async function writeOutput(filePath: string, html: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, html, 'utf-8');
  } catch (err) {
    throw new DocumentIoError(filePath, 'write', { cause: err });
  }
}

/**
 * Delete .html files under outputRoot that this build did not write,
 * then any directory left empty. Other files are left alone.
 */
async function removeStaleOutput(outputRoot: string, written: ReadonlySet<string>): Promise<string[]> {
  const removed: string[] = [];

  async function sweep(dir: string, relativePath: string): Promise<boolean> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      throw new DocumentIoError(dir, 'read', { cause: err });
    }

    let remaining = entries.length;
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (await sweep(fullPath, relPath)) {
          await fs.promises.rmdir(fullPath);
          remaining--;
        }
      } else if (entry.isFile() && entry.name.endsWith(OUTPUT_EXTENSION) && !written.has(relPath)) {
        try {
          await fs.promises.unlink(fullPath);
        } catch (err) {
          throw new DocumentIoError(fullPath, 'write', { cause: err });
        }
        serverLog('build', `Removed stale page ${relPath}`);
        removed.push(relPath);
        remaining--;
      }
    }

    return remaining === 0;
  }

  await sweep(outputRoot, '');
  return removed.sort();
}

/**
 * Index page listing every published page: title link and creation date
 */
export function renderIndex(pages: readonly PublishedPage[], siteTitle: string): string {
  const items = pages.map((page) => [
    `            <li class="doc-item" data-title="${escapeHtml(page.title.toLowerCase())}">`,
    `                <a href="${escapeHtml(encodeURI(page.outputPath))}" class="doc-title">${escapeHtml(page.title)}</a>`,
    `                <div class="doc-meta">${page.created ? formatDate(page.created) : ''}</div>`,
    '            </li>',
  ].join('\n'));

  return fillTemplate(loadTemplate('index'), {
    siteTitle: escapeHtml(siteTitle),
    items: items.join('\n'),
  });
}

/**
 * Load every document under docsRoot, render the Public ones into
 * outputRoot and write the index page.
 *
 * @throws DocumentParseError / DocumentIoError from any single document
 * @throws DuplicateSlugError when two files share a slug
 */
export async function buildSite(docsRoot: string, outputRoot: string, options: BuildOptions = {}): Promise<BuildReport> {
  const { siteTitle = 'Quire' } = options;
  const start = Date.now();

  const files = await scanDocuments(docsRoot);
  const loaded: LoadedDocument[] = [];
  for (const file of files) {
    loaded.push({ file, doc: await loadDocument(file.absolutePath) });
  }

  assertUniqueSlugs(loaded);

  const registry = WikilinkRegistry.fromDocuments(loaded.map(({ doc }) => doc));
  for (const conflict of registry.conflicts) {
    serverLog('build', `Link key "${conflict.key}" claimed by ${conflict.kept} and ${conflict.ignored}; keeping ${conflict.kept}`, 'warn');
  }

  const published: PublishedPage[] = [];
  const brokenLinks: BrokenLink[] = [];

  for (const { file, doc } of loaded) {
    if (doc.status !== 'public') {
      continue;
    }

    const outputPath = outputPathFor(file.path);
    if (outputPath === INDEX_PAGE) {
      serverLog('build', `Skipping ${file.path}: ${INDEX_PAGE} is reserved for the site index`, 'warn');
      continue;
    }

    const html = await renderPage(doc, { registry, indexHref: indexHrefFor(outputPath), siteTitle });
    await writeOutput(path.join(outputRoot, ...outputPath.split('/')), html);
    serverLog('build', `Built ${file.path} -> ${outputPath}`);

    for (const target of findBrokenLinks(doc.content, registry)) {
      serverLog('build', `Broken link [[${target}]] in ${file.path}`, 'warn');
      brokenLinks.push({ sourcePath: file.path, target });
    }

    published.push({
      slug: documentSlug(doc),
      title: doc.title,
      created: doc.created,
      sourcePath: file.path,
      outputPath,
    });
  }

  await writeOutput(path.join(outputRoot, INDEX_PAGE), renderIndex(published, siteTitle));

  const written = new Set([INDEX_PAGE, ...published.map((page) => page.outputPath)]);
  const removed = await removeStaleOutput(outputRoot, written);

  serverLog('build', `Built ${published.length} of ${loaded.length} documents in ${Date.now() - start}ms`);

  return {
    documents: loaded.map(({ doc }) => doc),
    published,
    brokenLinks,
    removed,
  };
}
