/**
 * KnowledgeBase - the surface external collaborators drive
 *
 * An HTTP layer serves `paths.outputDir` and calls search(); a CLI calls
 * init/build/rebuild/watch. The search store is opened lazily and owned
 * by this instance for its lifetime.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  DocumentIoError,
  SearchIndex,
  documentMatches,
  documentSlug,
  loadDocument,
  scanDocuments,
  serverLog,
  type Document,
  type SearchResult,
} from '@quire/core';
import { buildSite, type BuildReport } from './build.js';
import {
  loadSiteConfig,
  parseSiteConfig,
  resolveSitePaths,
  saveSiteConfig,
  type SiteConfig,
  type SitePaths,
} from './config.js';
import { loadTemplate } from './templates.js';
import { createSiteWatcher, type SiteWatcher, type WatchEvent, type WatcherConfig, type CoordinatorStatus } from './watch/index.js';

/** Name of the sample document written by init() */
export const SAMPLE_DOCUMENT = 'welcome.md';

export interface KnowledgeBaseOptions {
  /** Overrides applied on top of quire.json */
  config?: Partial<SiteConfig>;
  /** Search store location (default: <root>/.quire/search.db) */
  searchStore?: string;
}

/** Result of a build followed by a reindex */
export interface RebuildSummary extends BuildReport {
  indexed: number;
}

export interface WatchOptions {
  config?: Partial<WatcherConfig>;
  onRebuild?: (summary: RebuildSummary, events: WatchEvent[]) => void;
  onStateChange?: (status: CoordinatorStatus) => void;
  onError?: (error: Error) => void;
}

export class KnowledgeBase {
  readonly config: SiteConfig;
  readonly paths: SitePaths;
  private index: SearchIndex | null = null;
  private watchers = new Set<SiteWatcher>();

  private constructor(config: SiteConfig, paths: SitePaths) {
    this.config = config;
    this.paths = paths;
  }

  /**
   * Open a knowledge base rooted at `root`, reading quire.json if present
   */
  static async open(root: string, options: KnowledgeBaseOptions = {}): Promise<KnowledgeBase> {
    const fileConfig = await loadSiteConfig(root);
    const config = parseSiteConfig({ ...fileConfig, ...options.config });
    const paths = resolveSitePaths(root, config);
    if (options.searchStore) {
      paths.searchStore = path.resolve(options.searchStore);
    }
    return new KnowledgeBase(config, paths);
  }

  /**
   * Create the docs and output directories, a sample document (unless
   * one exists) and the config file
   */
  async init(): Promise<void> {
    const { docsRoot, outputDir, root } = this.paths;

    try {
      await fs.promises.mkdir(docsRoot, { recursive: true });
      await fs.promises.mkdir(outputDir, { recursive: true });
    } catch (err) {
      throw new DocumentIoError(root, 'write', { cause: err });
    }

    const samplePath = path.join(docsRoot, SAMPLE_DOCUMENT);
    try {
      await fs.promises.writeFile(samplePath, loadTemplate('sample'), { encoding: 'utf-8', flag: 'wx' });
      serverLog('site', `Created sample document ${samplePath}`);
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
        throw new DocumentIoError(samplePath, 'write', { cause: err });
      }
    }

    await saveSiteConfig(root, this.config);
    serverLog('site', `Initialized knowledge base at ${docsRoot}`);
  }

  /**
   * Load every document under the docs root; any failure aborts the walk
   */
  async listDocuments(): Promise<Document[]> {
    const files = await scanDocuments(this.paths.docsRoot);
    const documents: Document[] = [];
    for (const file of files) {
      documents.push(await loadDocument(file.absolutePath));
    }
    return documents;
  }

  /**
   * Documents whose title, body or tags contain the query
   */
  async filter(query: string): Promise<Document[]> {
    const documents = await this.listDocuments();
    return documents.filter((doc) => documentMatches(doc, query));
  }

  /**
   * Render the site into the output directory
   */
  build(): Promise<BuildReport> {
    return buildSite(this.paths.docsRoot, this.paths.outputDir, { siteTitle: this.config.title });
  }

  /**
   * Replace the search index contents with the given documents.
   * Drafts are skipped when indexDrafts is off. Returns the count indexed.
   */
  reindex(documents: readonly Document[]): number {
    const entries = documents
      .filter((doc) => this.config.indexDrafts || doc.status === 'public')
      .map((doc) => ({ slug: documentSlug(doc), title: doc.title, content: doc.content }));

    const count = this.searchIndex().rebuild(entries);
    serverLog('index', `Indexed ${count} of ${documents.length} documents`);
    return count;
  }

  /**
   * Build followed by reindex over the built document list
   */
  async rebuild(): Promise<RebuildSummary> {
    const report = await this.build();
    const indexed = this.reindex(report.documents);
    return { ...report, indexed };
  }

  search(query: string): SearchResult[] {
    return this.searchIndex().search(query);
  }

  /**
   * Watch the docs root and rebuild on change. The returned handle's
   * stop() ends watching; close() stops every handle too.
   */
  watch(options: WatchOptions = {}): SiteWatcher {
    const watcher = createSiteWatcher<RebuildSummary>({
      docsRoot: this.paths.docsRoot,
      ignorePaths: [this.paths.outputDir, path.dirname(this.paths.searchStore)],
      config: options.config,
      rebuild: () => this.rebuild(),
      onRebuild: options.onRebuild,
      onStateChange: options.onStateChange,
      onError: options.onError,
    });

    const handle: SiteWatcher = {
      get status() {
        return watcher.status;
      },
      start: () => watcher.start(),
      stop: async () => {
        this.watchers.delete(handle);
        await watcher.stop();
      },
      flush: () => watcher.flush(),
      whenIdle: () => watcher.whenIdle(),
    };

    this.watchers.add(handle);
    handle.start();
    return handle;
  }

  /**
   * Stop watchers and release the search store
   */
  async close(): Promise<void> {
    await Promise.all([...this.watchers].map((watcher) => watcher.stop()));
    this.index?.close();
    this.index = null;
  }

  private searchIndex(): SearchIndex {
    if (!this.index) {
      this.index = SearchIndex.open(this.paths.searchStore);
    }
    return this.index;
  }
}
