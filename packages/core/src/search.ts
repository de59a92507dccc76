/**
 * Search index - persistent inverted index over document content
 *
 * Stored in SQLite as two key-value namespaces:
 * - term_postings: lowercased token -> JSON array of slugs (insertion order, no duplicates)
 * - doc_metadata:  slug -> JSON { title, excerpt, terms }
 *
 * The store is opened in EXCLUSIVE locking mode, so a second process
 * (or connection) opening the same file is rejected once the busy
 * timeout expires. Within the process, every write is a single
 * transaction committed with synchronous=FULL, so each indexed document
 * is durable and independently visible when the call returns.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SearchIndexError } from './errors.js';

/** Directory (relative to the knowledge root) holding Quire state */
export const STATE_DIR = '.quire';

/** Search store file name inside STATE_DIR */
export const SEARCH_DB_FILE = 'search.db';

/** Tokens of this many code points or fewer are not indexed */
const MIN_TOKEN_LENGTH = 2;

/** Excerpt length limit, in characters */
const EXCERPT_LENGTH = 150;

/** Lines collected into an excerpt */
const EXCERPT_LINES = 3;

const TOKEN_SEPARATOR = /[^\p{Alphabetic}\p{N}]+/u;

/** A search hit */
export interface SearchResult {
  slug: string;
  title: string;
  excerpt: string;
  score: number;
}

/** Input for (re)indexing one document */
export interface IndexEntry {
  slug: string;
  title: string;
  content: string;
}

export interface SearchIndexStats {
  documents: number;
  terms: number;
}

export interface SearchIndexOptions {
  /** How long to wait for a lock held elsewhere before failing (default: 1000) */
  timeoutMs?: number;
}

const DocMetadataSchema = z.object({
  title: z.string(),
  excerpt: z.string(),
  terms: z.array(z.string()),
});

type DocMetadata = z.infer<typeof DocMetadataSchema>;

const PostingListSchema = z.array(z.string());

/**
 * Split text on non-alphanumeric boundaries, drop short tokens, lowercase
 */
export function tokenize(text: string): string[] {
  return text
    .split(TOKEN_SEPARATOR)
    .filter((word) => [...word].length > MIN_TOKEN_LENGTH)
    .map((word) => word.toLowerCase());
}

/**
 * First three lines not starting with a heading marker, joined with
 * spaces, cut to 150 characters with a trailing "..." when longer.
 * Lines are taken as written; blank lines count.
 */
export function createExcerpt(content: string): string {
  const text = content
    .split('\n')
    .filter((line) => !line.startsWith('#'))
    .slice(0, EXCERPT_LINES)
    .join(' ');

  const chars = [...text];
  if (chars.length > EXCERPT_LENGTH) {
    return `${chars.slice(0, EXCERPT_LENGTH).join('')}...`;
  }
  return text;
}

/**
 * Default store location for a knowledge root
 */
export function searchStorePath(root: string): string {
  return path.join(root, STATE_DIR, SEARCH_DB_FILE);
}

/**
 * Persistent full-text search index
 */
export class SearchIndex {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly statements: {
    getPosting: Database.Statement<[string]>;
    putPosting: Database.Statement<[string, string]>;
    deletePosting: Database.Statement<[string]>;
    getMeta: Database.Statement<[string]>;
    putMeta: Database.Statement<[string, string]>;
    deleteMeta: Database.Statement<[string]>;
    countDocs: Database.Statement<[]>;
    countTerms: Database.Statement<[]>;
  };

  private constructor(dbPath: string, db: Database.Database) {
    this.path = dbPath;
    this.db = db;
    this.statements = {
      getPosting: db.prepare<[string]>('SELECT slugs FROM term_postings WHERE term = ?'),
      putPosting: db.prepare<[string, string]>('INSERT OR REPLACE INTO term_postings (term, slugs) VALUES (?, ?)'),
      deletePosting: db.prepare<[string]>('DELETE FROM term_postings WHERE term = ?'),
      getMeta: db.prepare<[string]>('SELECT data FROM doc_metadata WHERE slug = ?'),
      putMeta: db.prepare<[string, string]>('INSERT OR REPLACE INTO doc_metadata (slug, data) VALUES (?, ?)'),
      deleteMeta: db.prepare<[string]>('DELETE FROM doc_metadata WHERE slug = ?'),
      countDocs: db.prepare<[]>('SELECT COUNT(*) AS count FROM doc_metadata'),
      countTerms: db.prepare<[]>('SELECT COUNT(*) AS count FROM term_postings'),
    };
  }

  /**
   * Open (or create) the store at dbPath
   *
   * @throws SearchIndexError if the file cannot be opened or is held by another connection
   */
  static open(dbPath: string, options: SearchIndexOptions = {}): SearchIndex {
    const { timeoutMs = 1000 } = options;
    let db: Database.Database | null = null;

    try {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      db = new Database(dbPath, { timeout: timeoutMs });
      db.pragma('locking_mode = EXCLUSIVE');
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.exec(`
        CREATE TABLE IF NOT EXISTS term_postings (
          term TEXT PRIMARY KEY,
          slugs TEXT NOT NULL
        ) WITHOUT ROWID;
        CREATE TABLE IF NOT EXISTS doc_metadata (
          slug TEXT PRIMARY KEY,
          data TEXT NOT NULL
        ) WITHOUT ROWID;
      `);
      // Take the exclusive lock now; EXCLUSIVE mode keeps it after commit
      db.exec('BEGIN EXCLUSIVE; COMMIT;');
      return new SearchIndex(dbPath, db);
    } catch (err) {
      db?.close();
      const reason = err instanceof Error ? err.message : String(err);
      throw new SearchIndexError(`Cannot open search index at ${dbPath}: ${reason}`, { cause: err });
    }
  }

  /**
   * Index (or re-index) one document.
   *
   * The slug is dropped from posting lists of terms the content no
   * longer contains, then appended to the list of every current term.
   */
  indexDocument(slug: string, title: string, content: string): void {
    const terms = [...new Set(tokenize(content))];
    const metadata: DocMetadata = { title, excerpt: createExcerpt(content), terms };

    this.write(`index ${slug}`, () => {
      this.upsert(slug, metadata);
    });
  }

  /**
   * Remove a document and all its postings. Returns false if it was not indexed.
   */
  removeDocument(slug: string): boolean {
    return this.write(`remove ${slug}`, () => {
      const previous = this.readMeta(slug);
      if (!previous) return false;
      for (const term of previous.terms) {
        this.removePosting(term, slug);
      }
      this.statements.deleteMeta.run(slug);
      return true;
    });
  }

  /**
   * Replace the whole index with the given documents in one transaction.
   * Returns the number of documents indexed.
   */
  rebuild(entries: Iterable<IndexEntry>): number {
    return this.write('rebuild', () => {
      this.db.exec('DELETE FROM term_postings; DELETE FROM doc_metadata;');
      let count = 0;
      for (const entry of entries) {
        const terms = [...new Set(tokenize(entry.content))];
        this.upsert(entry.slug, { title: entry.title, excerpt: createExcerpt(entry.content), terms });
        count++;
      }
      return count;
    });
  }

  /**
   * Search for documents matching the query.
   *
   * Score = matched distinct query tokens / distinct query tokens.
   * Sorted by score descending, then slug ascending.
   */
  search(query: string): SearchResult[] {
    const tokens = [...new Set(tokenize(query))];
    if (tokens.length === 0) {
      return [];
    }

    return this.read('search', () => {
      const matches = new Map<string, number>();
      for (const token of tokens) {
        for (const slug of this.readPosting(token)) {
          matches.set(slug, (matches.get(slug) ?? 0) + 1);
        }
      }

      const results: SearchResult[] = [];
      for (const [slug, count] of matches) {
        const meta = this.readMeta(slug);
        if (!meta) continue;
        results.push({
          slug,
          title: meta.title,
          excerpt: meta.excerpt,
          score: count / tokens.length,
        });
      }

      return results.sort((a, b) => b.score - a.score || (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0));
    });
  }

  /**
   * Empty both namespaces
   */
  clear(): void {
    this.write('clear', () => {
      this.db.exec('DELETE FROM term_postings; DELETE FROM doc_metadata;');
    });
  }

  stats(): SearchIndexStats {
    return this.read('stats', () => ({
      documents: this.count(this.statements.countDocs),
      terms: this.count(this.statements.countTerms),
    }));
  }

  /**
   * Close the store and release its lock
   */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private upsert(slug: string, metadata: DocMetadata): void {
    const previous = this.readMeta(slug);
    if (previous) {
      const current = new Set(metadata.terms);
      for (const term of previous.terms) {
        if (!current.has(term)) {
          this.removePosting(term, slug);
        }
      }
    }

    this.statements.putMeta.run(slug, JSON.stringify(metadata));

    for (const term of metadata.terms) {
      const slugs = this.readPosting(term);
      if (!slugs.includes(slug)) {
        slugs.push(slug);
        this.statements.putPosting.run(term, JSON.stringify(slugs));
      }
    }
  }

  private removePosting(term: string, slug: string): void {
    const slugs = this.readPosting(term).filter((s) => s !== slug);
    if (slugs.length === 0) {
      this.statements.deletePosting.run(term);
    } else {
      this.statements.putPosting.run(term, JSON.stringify(slugs));
    }
  }

  private readPosting(term: string): string[] {
    const row: unknown = this.statements.getPosting.get(term);
    const value = this.column(row, 'slugs');
    if (value === undefined) return [];
    return this.decode(PostingListSchema, value, `posting list for "${term}"`);
  }

  private readMeta(slug: string): DocMetadata | undefined {
    const row: unknown = this.statements.getMeta.get(slug);
    const value = this.column(row, 'data');
    if (value === undefined) return undefined;
    return this.decode(DocMetadataSchema, value, `metadata for "${slug}"`);
  }

  private count(statement: Database.Statement<[]>): number {
    const row: unknown = statement.get();
    if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    return 0;
  }

  private column(row: unknown, name: string): string | undefined {
    if (typeof row !== 'object' || row === null) return undefined;
    const value: unknown = Reflect.get(row, name);
    return typeof value === 'string' ? value : undefined;
  }

  private decode<T>(schema: z.ZodType<T>, raw: string, what: string): T {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SearchIndexError(`Corrupt ${what}: not valid JSON`, { cause: err });
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new SearchIndexError(`Corrupt ${what}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
  }

  private write<T>(operation: string, fn: () => T): T {
    return this.guard(operation, () => this.db.transaction(fn).immediate());
  }

  private read<T>(operation: string, fn: () => T): T {
    return this.guard(operation, () => this.db.transaction(fn)());
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof SearchIndexError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new SearchIndexError(`Search index ${operation} failed: ${reason}`, { cause: err });
    }
  }
}
