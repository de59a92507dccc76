/**
 * Markdown render pipeline
 *
 * wikilinks -> marked (GFM + footnotes) -> page template.
 * Pure given a document and a populated registry: no disk or network I/O
 * beyond the one-time template read.
 */

import { Marked } from 'marked';
import markedFootnote from 'marked-footnote';
import { transformWikilinks, type Document, type WikilinkRegistry } from '@quire/core';
import { fillTemplate, loadTemplate } from './templates.js';

const DEFAULT_SITE_TITLE = 'Quire';

// GFM covers tables, strikethrough and task lists
const markdown = new Marked({ gfm: true }).use(markedFootnote());

export interface RenderOptions {
  /** Title/alias -> slug registry built from the full document set */
  registry: WikilinkRegistry;
  /** Breadcrumb target; relative to the page (default: "index.html") */
  indexHref?: string;
  /** Site name shown in <title> and the breadcrumb */
  siteTitle?: string;
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * YYYY-MM-DD -> DD.MM.YYYY
 */
export function formatDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  return `${day}.${month}.${year}`;
}

/**
 * Wikilinks resolved, then markdown converted to an HTML fragment
 */
export async function renderContent(source: string, registry: WikilinkRegistry): Promise<string> {
  return await markdown.parse(transformWikilinks(source, registry));
}

/**
 * Metadata line: creation date and tag chips, either may be absent
 */
export function renderMeta(doc: Pick<Document, 'created' | 'tags'>): string {
  const parts: string[] = [];

  if (doc.created) {
    parts.push(`<span class="date">${formatDate(doc.created)}</span>`);
  }

  if (doc.tags.length > 0) {
    const chips = doc.tags.map((tag) => `<span class="tag">${escapeHtml(tag)}</span>`).join('');
    parts.push(`<div class="tags">${chips}</div>`);
  }

  return parts.join(' ');
}

/**
 * Render a document into a complete HTML page
 */
export async function renderPage(doc: Document, options: RenderOptions): Promise<string> {
  const { registry, indexHref = 'index.html', siteTitle = DEFAULT_SITE_TITLE } = options;
  const content = await renderContent(doc.content, registry);

  return fillTemplate(loadTemplate('page'), {
    title: escapeHtml(doc.title),
    siteTitle: escapeHtml(siteTitle),
    indexHref: escapeHtml(indexHref),
    meta: renderMeta(doc),
    content,
  });
}
