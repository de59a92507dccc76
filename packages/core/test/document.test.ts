/**
 * Tests for the document model: frontmatter parsing, save/load, matching
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  parseDocumentSource,
  loadDocument,
  saveDocument,
  serializeDocument,
  documentSlug,
  documentMatches,
  type Document,
} from '../src/document.js';
import { DocumentIoError, DocumentParseError } from '../src/errors.js';

function makeDocument(overrides: Partial<Document> = {}): Document {
  return {
    path: '/kb/Sample Note.md',
    title: 'Sample Note',
    status: 'draft',
    tags: [],
    aliases: [],
    content: 'Body text',
    rawContent: '',
    ...overrides,
  };
}

describe('parseDocumentSource', () => {
  it('parses frontmatter fields and body', () => {
    const raw = `---
title: Test Document
status: public
tags:
  - kb
  - test
---

# Hello World

This is content.`;

    const { frontmatter, body } = parseDocumentSource(raw, 'test.md');

    expect(frontmatter.title).toBe('Test Document');
    expect(frontmatter.status).toBe('public');
    expect(frontmatter.tags).toEqual(['kb', 'test']);
    expect(frontmatter.aliases).toEqual([]);
    expect(frontmatter.created).toBeUndefined();
    expect(body).toBe('# Hello World\n\nThis is content.');
  });

  it('synthesizes an Untitled draft when there is no frontmatter', () => {
    const raw = '# Just content\n\nNo frontmatter here.';
    const { frontmatter, body } = parseDocumentSource(raw, 'plain.md');

    expect(frontmatter.title).toBe('Untitled');
    expect(frontmatter.status).toBe('draft');
    expect(frontmatter.tags).toEqual([]);
    expect(body).toBe(raw);
  });

  it('defaults status to draft', () => {
    const { frontmatter } = parseDocumentSource('---\ntitle: Only Title\n---\nBody', 'a.md');
    expect(frontmatter.status).toBe('draft');
  });

  it('normalizes bare and quoted dates to YYYY-MM-DD', () => {
    const raw = `---
title: Dated
created: 2026-01-28
updated: '2026-02-01'
---
Body`;
    const { frontmatter } = parseDocumentSource(raw, 'dated.md');
    expect(frontmatter.created).toBe('2026-01-28');
    expect(frontmatter.updated).toBe('2026-02-01');
  });

  it('reads aliases', () => {
    const raw = '---\ntitle: FAQ\naliases:\n  - Questions\n  - Help\n---\n';
    const { frontmatter } = parseDocumentSource(raw, 'faq.md');
    expect(frontmatter.aliases).toEqual(['Questions', 'Help']);
  });

  it('fails when the closing delimiter is missing', () => {
    const raw = '---\ntitle: Broken\n\nNo closing marker';
    expect(() => parseDocumentSource(raw, 'broken.md')).toThrow(DocumentParseError);
    expect(() => parseDocumentSource(raw, 'broken.md')).toThrow('Failed to parse broken.md: missing closing ---');
  });

  it('fails when title is absent', () => {
    const raw = '---\nstatus: public\ntags: [a]\n---\nBody';
    expect(() => parseDocumentSource(raw, 'untitled.md')).toThrow(DocumentParseError);
    expect(() => parseDocumentSource(raw, 'untitled.md')).toThrow(/title/);
  });

  it('fails on an empty frontmatter block', () => {
    expect(() => parseDocumentSource('---\n---\nBody', 'empty.md')).toThrow(DocumentParseError);
  });

  it('fails on invalid YAML', () => {
    const raw = '---\ntitle: [unclosed\n---\nBody';
    expect(() => parseDocumentSource(raw, 'yaml.md')).toThrow(/invalid frontmatter YAML/);
  });

  it('fails on an unknown status', () => {
    const raw = '---\ntitle: Archived\nstatus: archived\n---\nBody';
    expect(() => parseDocumentSource(raw, 'status.md')).toThrow(DocumentParseError);
  });

  it('fails on a malformed date', () => {
    const raw = '---\ntitle: When\ncreated: yesterday\n---\nBody';
    expect(() => parseDocumentSource(raw, 'date.md')).toThrow(/created/);
  });

  it('fails on an impossible bare date', () => {
    const raw = '---\ntitle: When\ncreated: 2026-02-30\n---\nBody';
    expect(() => parseDocumentSource(raw, 'date.md')).toThrow(/created: not a calendar date/);
  });

  it('fails on an impossible quoted date', () => {
    const raw = "---\ntitle: When\nupdated: '2026-13-01'\n---\nBody";
    expect(() => parseDocumentSource(raw, 'date.md')).toThrow(/updated: not a calendar date/);
  });

  it('accepts a leap day', () => {
    const raw = '---\ntitle: Leap\ncreated: 2028-02-29\n---\nBody';
    expect(parseDocumentSource(raw, 'leap.md').frontmatter.created).toBe('2028-02-29');
  });

  it('exposes the offending path on the error', () => {
    try {
      parseDocumentSource('---\nstatus: public\n---\n', 'notes/x.md');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DocumentParseError);
      if (err instanceof DocumentParseError) {
        expect(err.path).toBe('notes/x.md');
        expect(err.code).toBe('DOCUMENT_PARSE_ERROR');
      }
    }
  });
});

describe('serializeDocument', () => {
  it('writes frontmatter, a blank line, then the body', () => {
    const text = serializeDocument(makeDocument({ title: 'Hello', status: 'public', tags: ['a'] }));
    expect(text.startsWith('---\ntitle: Hello\nstatus: public\n')).toBe(true);
    expect(text.endsWith('\n---\n\nBody text\n')).toBe(true);
  });

  it('omits absent dates', () => {
    const text = serializeDocument(makeDocument());
    expect(text).not.toContain('created');
    expect(text).not.toContain('updated');
  });

  it('round-trips every frontmatter field', () => {
    const pad = (n: number, width: number) => String(n).padStart(width, '0');
    const dateArb = fc
      .tuple(fc.integer({ min: 1000, max: 9999 }), fc.integer({ min: 1, max: 12 }), fc.integer({ min: 1, max: 28 }))
      .map(([y, m, d]) => `${pad(y, 4)}-${pad(m, 2)}-${pad(d, 2)}`);

    fc.assert(
      fc.property(
        fc.record({
          title: fc.string(),
          status: fc.constantFrom('draft' as const, 'public' as const),
          tags: fc.array(fc.string(), { maxLength: 5 }),
          aliases: fc.array(fc.string(), { maxLength: 5 }),
          created: fc.option(dateArb, { nil: undefined }),
          updated: fc.option(dateArb, { nil: undefined }),
        }),
        (fields) => {
          const doc = makeDocument(fields);
          const { frontmatter } = parseDocumentSource(serializeDocument(doc), doc.path);
          expect(frontmatter).toEqual({
            title: fields.title,
            status: fields.status,
            tags: fields.tags,
            aliases: fields.aliases,
            created: fields.created,
            updated: fields.updated,
          });
        },
      ),
    );
  });
});

describe('loadDocument / saveDocument', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quire-doc-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads a document from disk', async () => {
    const filePath = path.join(tmpDir, 'Release Notes.md');
    const raw = '---\ntitle: Release Notes\nstatus: public\ncreated: 2026-03-01\n---\n\nShipped.';
    fs.writeFileSync(filePath, raw, 'utf-8');

    const doc = await loadDocument(filePath);

    expect(doc.path).toBe(filePath);
    expect(doc.title).toBe('Release Notes');
    expect(doc.status).toBe('public');
    expect(doc.created).toBe('2026-03-01');
    expect(doc.content).toBe('Shipped.');
    expect(doc.rawContent).toBe(raw);
    expect(documentSlug(doc)).toBe('release-notes');
  });

  it('fails with an I/O error for a missing file', async () => {
    await expect(loadDocument(path.join(tmpDir, 'nope.md'))).rejects.toBeInstanceOf(DocumentIoError);
  });

  it('saves changes back in place', async () => {
    const filePath = path.join(tmpDir, 'note.md');
    fs.writeFileSync(filePath, '---\ntitle: Note\n---\nOriginal body', 'utf-8');

    const doc = await loadDocument(filePath);
    await saveDocument({
      ...doc,
      status: 'public',
      tags: ['kb'],
      updated: '2026-04-02',
      aliases: ['Memo'],
      content: 'New body',
    });

    const reloaded = await loadDocument(filePath);
    expect(reloaded.title).toBe('Note');
    expect(reloaded.status).toBe('public');
    expect(reloaded.tags).toEqual(['kb']);
    expect(reloaded.updated).toBe('2026-04-02');
    expect(reloaded.aliases).toEqual(['Memo']);
    expect(reloaded.content).toBe('New body\n');
  });

  it('fails with an I/O error when the target directory is missing', async () => {
    const doc = makeDocument({ path: path.join(tmpDir, 'missing-dir', 'x.md') });
    await expect(saveDocument(doc)).rejects.toBeInstanceOf(DocumentIoError);
  });
});

describe('documentMatches', () => {
  const doc = makeDocument({
    title: 'Deploy Guide',
    tags: ['Operations'],
    content: 'Run the rollout script.',
  });

  it('matches title case-insensitively', () => {
    expect(documentMatches(doc, 'deploy')).toBe(true);
  });

  it('matches body text', () => {
    expect(documentMatches(doc, 'ROLLOUT')).toBe(true);
  });

  it('matches tags', () => {
    expect(documentMatches(doc, 'operat')).toBe(true);
  });

  it('rejects unrelated queries', () => {
    expect(documentMatches(doc, 'billing')).toBe(false);
  });
});
