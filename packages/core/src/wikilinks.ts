/**
 * Wikilinks - [[Title]] and [[Title|Display]] resolution
 *
 * Resolution is two-pass: a registry is built from the complete document
 * set first, then handed (read-only) to every render. Links therefore
 * resolve the same way regardless of walk order, forward references
 * included.
 */

import type { Document } from './document.js';
import { documentSlug } from './document.js';
import { slugify } from './slug.js';

/**
 * [[target]] or [[target|display]], with code spans and fenced blocks
 * matched first so their contents pass through untouched
 * (shell `[[ -f x ]]` is not a link).
 */
const CODE_OR_WIKILINK_REGEX = /(```[\s\S]*?```|`[^`\n]+`)|\[\[([^\]|]+)(?:\|([^\]]+))?\]\]/g;

/** A title or alias claimed by more than one document */
export interface RegistryConflict {
  key: string;
  kept: string;     // slug that keeps the key
  ignored: string;  // slug whose claim was dropped
}

/**
 * Immutable map of lowercased title/alias -> slug
 */
export class WikilinkRegistry {
  private readonly entries: ReadonlyMap<string, string>;
  readonly conflicts: readonly RegistryConflict[];

  private constructor(entries: Map<string, string>, conflicts: RegistryConflict[]) {
    this.entries = entries;
    this.conflicts = conflicts;
  }

  /** Registry with no entries: every link takes the fallback path */
  static empty(): WikilinkRegistry {
    return new WikilinkRegistry(new Map(), []);
  }

  /**
   * Build a registry from explicit title -> slug registrations.
   * The first registration of a key wins.
   */
  static fromEntries(registrations: Iterable<{ title: string; aliases?: readonly string[]; slug: string }>): WikilinkRegistry {
    const entries = new Map<string, string>();
    const conflicts: RegistryConflict[] = [];

    const claim = (name: string, slug: string) => {
      const key = name.trim().toLowerCase();
      if (!key) return;
      const existing = entries.get(key);
      if (existing === undefined) {
        entries.set(key, slug);
      } else if (existing !== slug) {
        conflicts.push({ key, kept: existing, ignored: slug });
      }
    };

    for (const { title, aliases = [], slug } of registrations) {
      claim(title, slug);
      for (const alias of aliases) {
        claim(alias, slug);
      }
    }

    return new WikilinkRegistry(entries, conflicts);
  }

  /**
   * Build a registry from every document's title and aliases.
   * Drafts belong here too: they are link targets even though unpublished.
   */
  static fromDocuments(documents: Iterable<Pick<Document, 'path' | 'title' | 'aliases'>>): WikilinkRegistry {
    const registrations: Array<{ title: string; aliases: readonly string[]; slug: string }> = [];
    for (const doc of documents) {
      registrations.push({ title: doc.title, aliases: doc.aliases, slug: documentSlug(doc) });
    }
    return WikilinkRegistry.fromEntries(registrations);
  }

  /** Slug registered for a title or alias (case-insensitive) */
  resolve(target: string): string | undefined {
    return this.entries.get(target.trim().toLowerCase());
  }

  has(target: string): boolean {
    return this.resolve(target) !== undefined;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Link target for a wikilink: the registered slug, or a slug derived
 * from the literal target text when nothing is registered.
 */
export function resolveLinkSlug(registry: WikilinkRegistry, target: string): string {
  return registry.resolve(target) ?? slugify(target);
}

/**
 * Replace every wikilink outside code with a markdown link to ./{slug}.html
 */
export function transformWikilinks(content: string, registry: WikilinkRegistry): string {
  return content.replace(
    CODE_OR_WIKILINK_REGEX,
    (match: string, code: string | undefined, target: string | undefined, display: string | undefined) => {
      if (code !== undefined || target === undefined) {
        return match;
      }
      const title = target.trim();
      const text = display?.trim() || title;
      return `[${text}](./${resolveLinkSlug(registry, title)}.html)`;
    },
  );
}

/**
 * Every wikilink target in the content (outside code), in order, unresolved
 */
export function extractLinks(content: string): string[] {
  const links: string[] = [];
  for (const match of content.matchAll(CODE_OR_WIKILINK_REGEX)) {
    const target = match[2];
    if (match[1] === undefined && target !== undefined) {
      links.push(target.trim());
    }
  }
  return links;
}

/**
 * Link targets absent from the registry
 */
export function findBrokenLinks(content: string, registry: WikilinkRegistry): string[] {
  return extractLinks(content).filter((target) => !registry.has(target));
}
