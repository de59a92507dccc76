/**
 * Error taxonomy for Quire
 *
 * Every failure surfaced by the core carries a stable `code` so callers
 * (the build command, the watcher, an HTTP layer) can branch on kind
 * without matching message text.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for all Quire errors
 */
export class QuireError extends Error {
  code: string;
  details?: ErrorDetails;

  /**
   * @param message Error message
   * @param code Error code
   * @param details Additional error details
   */
  constructor(message: string, code: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * Structural or schema failure while loading a document
 * (missing closing delimiter, invalid YAML, missing title).
 */
export class DocumentParseError extends QuireError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to parse ${path}: ${reason}`, 'DOCUMENT_PARSE_ERROR', { path, reason }, options);
    this.path = path;
  }
}

/**
 * A document file could not be read or written
 */
export class DocumentIoError extends QuireError {
  readonly path: string;

  constructor(path: string, operation: 'read' | 'write', options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Failed to ${operation} ${path}: ${reason}`, 'DOCUMENT_IO_ERROR', { path, operation }, options);
    this.path = path;
  }
}

/**
 * Two documents produced the same slug
 */
export class DuplicateSlugError extends QuireError {
  constructor(slug: string, firstPath: string, secondPath: string) {
    super(
      `Duplicate slug "${slug}": ${firstPath} and ${secondPath}`,
      'DUPLICATE_SLUG',
      { slug, paths: [firstPath, secondPath] },
    );
  }
}

/**
 * Search index store could not be opened, read or written
 */
export class SearchIndexError extends QuireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SEARCH_INDEX_ERROR', undefined, options);
  }
}

/**
 * Invalid site configuration
 */
export class ConfigError extends QuireError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'CONFIG_ERROR', details);
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
