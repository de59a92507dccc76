/**
 * Site watcher
 *
 * Chokidar feeds add/change/unlink events for markdown sources into a
 * RebuildCoordinator, which debounces them into full rebuild cycles.
 */

import chokidar, { type FSWatcher } from 'chokidar';
import { serverLog, toError } from '@quire/core';
import { RebuildCoordinator, type RebuildHandler } from './coordinator.js';
import { createIgnoreFunction, shouldWatch } from './pathFilter.js';
import {
  DEFAULT_WATCHER_CONFIG,
  parseWatcherConfig,
  type CoordinatorStatus,
  type WatchEvent,
  type WatchEventType,
  type WatcherConfig,
} from './types.js';

export { RebuildCoordinator, type CoordinatorOptions, type RebuildHandler } from './coordinator.js';
export { shouldWatch, createIgnoreFunction, normalizePath, getRelativePath } from './pathFilter.js';
export {
  DEFAULT_WATCHER_CONFIG,
  parseWatcherConfig,
  type WatcherConfig,
  type WatchEvent,
  type WatchEventType,
  type CoordinatorState,
  type CoordinatorStatus,
} from './types.js';

const WATCHED_EVENTS: readonly WatchEventType[] = ['add', 'change', 'unlink'];

/**
 * Options for creating a site watcher
 */
export interface CreateWatcherOptions<T> {
  /** Directory holding the markdown sources */
  docsRoot: string;

  /** Paths under docsRoot never to watch (e.g. an output dir inside it) */
  ignorePaths?: string[];

  /** Watcher configuration (environment, then defaults, fill the rest) */
  config?: Partial<WatcherConfig>;

  /** One full build + reindex cycle */
  rebuild: RebuildHandler<T>;

  onRebuild?: (result: T, events: WatchEvent[]) => void;

  onStateChange?: (status: CoordinatorStatus) => void;

  onError?: (error: Error) => void;
}

/**
 * Site watcher instance
 */
export interface SiteWatcher {
  /** Current coordinator status */
  readonly status: CoordinatorStatus;

  /** Start watching */
  start(): void;

  /** Stop watching; waits for an in-flight rebuild */
  stop(): Promise<void>;

  /** Rebuild now instead of waiting out the debounce window */
  flush(): Promise<void>;

  /** Resolves when no rebuild is pending or running */
  whenIdle(): Promise<void>;
}

/**
 * Create a site watcher
 */
export function createSiteWatcher<T>(options: CreateWatcherOptions<T>): SiteWatcher {
  const { docsRoot, ignorePaths = [], onError } = options;

  const config: WatcherConfig = {
    ...DEFAULT_WATCHER_CONFIG,
    ...parseWatcherConfig(),
    ...options.config,
  };

  const coordinator = new RebuildCoordinator<T>({
    debounceMs: config.debounceMs,
    rebuild: options.rebuild,
    onRebuild: options.onRebuild,
    onStateChange: options.onStateChange,
    onError,
  });

  let watcher: FSWatcher | null = null;

  return {
    get status() {
      return coordinator.status;
    },

    start() {
      if (watcher) {
        serverLog('watcher', 'Watcher already started', 'warn');
        return;
      }

      serverLog('watcher', `Watching ${docsRoot} (debounce: ${config.debounceMs}ms, polling: ${config.usePolling})`);

      watcher = chokidar.watch(docsRoot, {
        ignored: createIgnoreFunction(docsRoot, ignorePaths),
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 50,
          pollInterval: 10,
        },
        usePolling: config.usePolling,
        interval: config.usePolling ? config.pollInterval : undefined,
      });

      for (const type of WATCHED_EVENTS) {
        watcher.on(type, (filePath: string) => {
          if (shouldWatch(filePath, docsRoot)) {
            coordinator.notify(type, filePath);
          }
        });
      }

      watcher.on('ready', () => {
        serverLog('watcher', 'File watcher ready');
      });

      watcher.on('error', (err: unknown) => {
        const error = toError(err);
        serverLog('watcher', `Watcher error: ${error.message}`, 'error');
        onError?.(error);
      });
    },

    async stop() {
      if (!watcher) {
        return;
      }

      serverLog('watcher', 'Stopping file watcher');
      const closing = watcher.close();
      watcher = null;
      await Promise.all([closing, coordinator.dispose()]);
    },

    flush() {
      return coordinator.flush();
    },

    whenIdle() {
      return coordinator.whenIdle();
    },
  };
}
