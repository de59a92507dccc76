/**
 * @quire/core - document model, wikilinks and search index
 */

export {
  FRONTMATTER_DELIMITER,
  UNTITLED,
  FrontmatterSchema,
  DocumentStatusSchema,
  parseDocumentSource,
  loadDocument,
  saveDocument,
  serializeDocument,
  documentSlug,
  documentMatches,
  type Document,
  type DocumentStatus,
  type Frontmatter,
} from './document.js';

export { slugify, slugFromPath } from './slug.js';

export {
  WikilinkRegistry,
  resolveLinkSlug,
  transformWikilinks,
  extractLinks,
  findBrokenLinks,
  type RegistryConflict,
} from './wikilinks.js';

export {
  SearchIndex,
  tokenize,
  createExcerpt,
  searchStorePath,
  STATE_DIR,
  SEARCH_DB_FILE,
  type SearchResult,
  type IndexEntry,
  type SearchIndexStats,
  type SearchIndexOptions,
} from './search.js';

export {
  scanDocuments,
  isDocumentPath,
  isExcludedDirectory,
  DOCUMENT_EXTENSION,
  EXCLUDED_DIRS,
  type DocumentFile,
} from './scan.js';

export {
  QuireError,
  DocumentParseError,
  DocumentIoError,
  DuplicateSlugError,
  SearchIndexError,
  ConfigError,
  toError,
  type ErrorDetails,
} from './errors.js';

export {
  serverLog,
  getServerLog,
  clearServerLog,
  type LogEntry,
  type LogLevel,
  type LogComponent,
} from './serverLog.js';
