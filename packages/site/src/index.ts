/**
 * @quire/site - render, build, watch and the KnowledgeBase facade
 */

export { KnowledgeBase, SAMPLE_DOCUMENT, type KnowledgeBaseOptions, type RebuildSummary, type WatchOptions } from './knowledgeBase.js';

export {
  buildSite,
  renderIndex,
  outputPathFor,
  indexHrefFor,
  INDEX_PAGE,
  type BuildOptions,
  type BuildReport,
  type BrokenLink,
  type PublishedPage,
} from './build.js';

export { renderPage, renderContent, renderMeta, escapeHtml, formatDate, type RenderOptions } from './render.js';

export {
  CONFIG_FILE,
  DEFAULT_SITE_CONFIG,
  SiteConfigSchema,
  loadSiteConfig,
  saveSiteConfig,
  parseSiteConfig,
  resolveSitePaths,
  type SiteConfig,
  type SitePaths,
} from './config.js';

export {
  createSiteWatcher,
  RebuildCoordinator,
  shouldWatch,
  createIgnoreFunction,
  parseWatcherConfig,
  DEFAULT_WATCHER_CONFIG,
  type SiteWatcher,
  type CreateWatcherOptions,
  type CoordinatorOptions,
  type CoordinatorState,
  type CoordinatorStatus,
  type WatcherConfig,
  type WatchEvent,
  type WatchEventType,
} from './watch/index.js';
