/**
 * Document model - one markdown file with YAML frontmatter
 *
 * A document is materialized from disk on every load; nothing caches it.
 * Writing back goes through saveDocument(), which re-serializes the
 * frontmatter and overwrites the file in place.
 */

import * as fs from 'fs';
import matter from 'gray-matter';
import yaml from 'js-yaml';
import { z } from 'zod';
import { DocumentIoError, DocumentParseError } from './errors.js';
import { slugFromPath } from './slug.js';

/** Frontmatter delimiter line */
export const FRONTMATTER_DELIMITER = '---';

/** Title given to files without a frontmatter block */
export const UNTITLED = 'Untitled';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar date in `YYYY-MM-DD` form. Frontmatter is read with the YAML
 * core schema, so bare and quoted dates both arrive as their source text.
 */
const CalendarDateSchema = z
  .string()
  .regex(ISO_DATE, 'expected an ISO calendar date (YYYY-MM-DD)')
  .refine((s) => !Number.isNaN(Date.parse(s)) && new Date(s).toISOString().slice(0, 10) === s, 'not a calendar date');

/**
 * YAML engine without the timestamp type: js-yaml's default schema
 * rolls impossible dates over (2026-02-30 becomes March 2)
 */
function parseFrontmatterYaml(input: string): object {
  const data: unknown = yaml.safeLoad(input, { schema: yaml.CORE_SCHEMA });
  return typeof data === 'object' && data !== null ? data : {};
}

export const DocumentStatusSchema = z.enum(['draft', 'public']);

export type DocumentStatus = z.infer<typeof DocumentStatusSchema>;

export const FrontmatterSchema = z.object({
  title: z.string({ required_error: 'title is required' }),
  status: DocumentStatusSchema.default('draft'),
  tags: z.array(z.string()).default([]),
  created: CalendarDateSchema.nullish().transform((v) => v ?? undefined),
  updated: CalendarDateSchema.nullish().transform((v) => v ?? undefined),
  aliases: z.array(z.string()).default([]),
});

export type Frontmatter = z.infer<typeof FrontmatterSchema>;

/** A document in the knowledge base */
export interface Document {
  path: string;                 // Source file path, as given to loadDocument
  title: string;
  status: DocumentStatus;
  tags: string[];
  created?: string;             // YYYY-MM-DD
  updated?: string;             // YYYY-MM-DD
  aliases: string[];
  content: string;              // Body after the frontmatter block
  rawContent: string;           // Full file text
}

const EMPTY_FRONTMATTER: Frontmatter = {
  title: UNTITLED,
  status: 'draft',
  tags: [],
  created: undefined,
  updated: undefined,
  aliases: [],
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'frontmatter'}: ${issue.message}`)
    .join('; ');
}

/**
 * Split raw file text into validated frontmatter and body.
 *
 * - No leading delimiter: Untitled draft, whole text is the body
 * - Leading delimiter without a closing one: DocumentParseError
 * - Invalid YAML or schema violation (e.g. no title): DocumentParseError
 */
export function parseDocumentSource(raw: string, filePath: string): { frontmatter: Frontmatter; body: string } {
  const lines = raw.split('\n');

  if (lines[0].trimEnd() !== FRONTMATTER_DELIMITER) {
    return { frontmatter: { ...EMPTY_FRONTMATTER, tags: [], aliases: [] }, body: raw };
  }

  let closing = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trimEnd() === FRONTMATTER_DELIMITER) {
      closing = i;
      break;
    }
  }

  if (closing === -1) {
    throw new DocumentParseError(filePath, `missing closing ${FRONTMATTER_DELIMITER}`);
  }

  const block = lines.slice(1, closing).join('\n');
  const body = lines.slice(closing + 1).join('\n').trimStart();

  let data: unknown;
  try {
    // Passing options disables gray-matter's content cache
    data = matter(`${FRONTMATTER_DELIMITER}\n${block}\n${FRONTMATTER_DELIMITER}\n`, {
      language: 'yaml',
      engines: { yaml: parseFrontmatterYaml },
    }).data;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DocumentParseError(filePath, `invalid frontmatter YAML: ${reason}`, { cause: err });
  }

  const parsed = FrontmatterSchema.safeParse(data);
  if (!parsed.success) {
    throw new DocumentParseError(filePath, describeIssues(parsed.error), { cause: parsed.error });
  }

  return { frontmatter: parsed.data, body };
}

/**
 * Load a document from disk
 */
export async function loadDocument(filePath: string): Promise<Document> {
  let rawContent: string;
  try {
    rawContent = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new DocumentIoError(filePath, 'read', { cause: err });
  }

  const { frontmatter, body } = parseDocumentSource(rawContent, filePath);

  return {
    path: filePath,
    title: frontmatter.title,
    status: frontmatter.status,
    tags: frontmatter.tags,
    created: frontmatter.created,
    updated: frontmatter.updated,
    aliases: frontmatter.aliases,
    content: body,
    rawContent,
  };
}

/**
 * Serialize a document: frontmatter block, blank line, body.
 * Absent dates are omitted rather than written as null.
 */
export function serializeDocument(doc: Document): string {
  const data: Record<string, unknown> = {
    title: doc.title,
    status: doc.status,
    tags: doc.tags,
  };
  if (doc.created) data.created = doc.created;
  if (doc.updated) data.updated = doc.updated;
  data.aliases = doc.aliases;

  return matter.stringify(`\n${doc.content}`, data, { language: 'yaml' });
}

/**
 * Write a document back to its source path, overwriting the file
 */
export async function saveDocument(doc: Document): Promise<void> {
  const text = serializeDocument(doc);
  try {
    await fs.promises.writeFile(doc.path, text, 'utf-8');
  } catch (err) {
    throw new DocumentIoError(doc.path, 'write', { cause: err });
  }
}

/**
 * Slug of a document, derived from its file name
 */
export function documentSlug(doc: Pick<Document, 'path'>): string {
  return slugFromPath(doc.path);
}

/**
 * Case-insensitive substring match against title, body or any tag
 */
export function documentMatches(doc: Document, query: string): boolean {
  const q = query.toLowerCase();
  return doc.title.toLowerCase().includes(q)
    || doc.content.toLowerCase().includes(q)
    || doc.tags.some((tag) => tag.toLowerCase().includes(q));
}
