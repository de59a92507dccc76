/**
 * Types for the watch/rebuild module
 */

/**
 * Configuration for the site watcher
 */
export interface WatcherConfig {
  /** Delay after the first event before a rebuild starts (default: 100) */
  debounceMs: number;

  /** Force polling mode instead of native watchers (default: false) */
  usePolling: boolean;

  /** Polling interval when in polling mode (default: 1000) */
  pollInterval: number;
}

/**
 * Default watcher configuration
 */
export const DEFAULT_WATCHER_CONFIG: WatcherConfig = {
  debounceMs: 100,
  usePolling: false,
  pollInterval: 1000,
};

/**
 * Parse watcher config from environment variables
 */
export function parseWatcherConfig(env: NodeJS.ProcessEnv = process.env): WatcherConfig {
  const debounceMs = parseInt(env.QUIRE_DEBOUNCE_MS || '');
  const usePolling = env.QUIRE_WATCH_POLL === 'true';
  const pollInterval = parseInt(env.QUIRE_POLL_INTERVAL || '');

  return {
    debounceMs: Number.isFinite(debounceMs) && debounceMs > 0
      ? debounceMs
      : DEFAULT_WATCHER_CONFIG.debounceMs,
    usePolling,
    pollInterval: Number.isFinite(pollInterval) && pollInterval > 0
      ? pollInterval
      : DEFAULT_WATCHER_CONFIG.pollInterval,
  };
}

/**
 * Type of file event
 */
export type WatchEventType = 'add' | 'change' | 'unlink';

/**
 * Raw file watch event
 */
export interface WatchEvent {
  type: WatchEventType;
  path: string;
  timestamp: number;
}

/**
 * Coordinator state
 *
 * idle -> debouncing (first relevant event) -> rebuilding (window elapsed)
 * rebuilding -> idle, or -> debouncing when events arrived meanwhile
 */
export type CoordinatorState = 'idle' | 'debouncing' | 'rebuilding';

/**
 * Coordinator status info
 */
export interface CoordinatorStatus {
  state: CoordinatorState;
  pendingEvents: number;
  rebuilds: number;
  lastRebuild: number | null;
  error: Error | null;
}
