/**
 * Site watcher tests
 *
 * chokidar is mocked; tests fire its events by hand.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

type Handler = (...args: unknown[]) => void;

const { handlers, mockWatcher } = vi.hoisted(() => {
  const handlers = new Map<string, Handler>();
  const mockWatcher: { on: (event: string, handler: Handler) => unknown; close: () => Promise<void> } = {
    on: vi.fn((event: string, handler: Handler) => {
      handlers.set(event, handler);
      return mockWatcher;
    }),
    close: vi.fn(async () => undefined),
  };
  return { handlers, mockWatcher };
});

vi.mock('chokidar', () => ({
  default: {
    watch: vi.fn(() => mockWatcher),
  },
}));

import chokidar from 'chokidar';
import { createSiteWatcher, parseWatcherConfig, DEFAULT_WATCHER_CONFIG } from '../src/watch/index.js';

function emit(event: string, ...args: unknown[]): void {
  const handler = handlers.get(event);
  if (!handler) {
    throw new Error(`No handler registered for ${event}`);
  }
  handler(...args);
}

describe('parseWatcherConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(parseWatcherConfig({})).toEqual(DEFAULT_WATCHER_CONFIG);
    expect(DEFAULT_WATCHER_CONFIG.debounceMs).toBe(100);
  });

  it('reads QUIRE_* variables', () => {
    expect(parseWatcherConfig({
      QUIRE_DEBOUNCE_MS: '300',
      QUIRE_WATCH_POLL: 'true',
      QUIRE_POLL_INTERVAL: '2500',
    })).toEqual({ debounceMs: 300, usePolling: true, pollInterval: 2500 });
  });

  it('falls back on invalid numbers', () => {
    expect(parseWatcherConfig({ QUIRE_DEBOUNCE_MS: '-5', QUIRE_POLL_INTERVAL: 'soon' })).toEqual(DEFAULT_WATCHER_CONFIG);
  });
});

describe('createSiteWatcher', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    handlers.clear();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    delete process.env.QUIRE_DEBOUNCE_MS;
    delete process.env.QUIRE_WATCH_POLL;
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  it('watches the docs root with initial events suppressed', () => {
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild: vi.fn() });
    watcher.start();

    expect(chokidar.watch).toHaveBeenCalledTimes(1);
    expect(chokidar.watch).toHaveBeenCalledWith('/kb', expect.objectContaining({
      ignoreInitial: true,
      persistent: true,
      usePolling: false,
    }));
    expect([...handlers.keys()].sort()).toEqual(['add', 'change', 'error', 'ready', 'unlink']);
  });

  it('does not start twice', () => {
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild: vi.fn() });
    watcher.start();
    watcher.start();

    expect(chokidar.watch).toHaveBeenCalledTimes(1);
  });

  it('turns three rapid changes into one rebuild', async () => {
    const rebuild = vi.fn(async () => 'done');
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild, config: { debounceMs: 100 } });
    watcher.start();

    emit('change', '/kb/a.md');
    emit('change', '/kb/a.md');
    emit('add', '/kb/b.md');

    await vi.advanceTimersByTimeAsync(100);
    await watcher.whenIdle();

    expect(rebuild).toHaveBeenCalledTimes(1);
    expect(watcher.status.rebuilds).toBe(1);
  });

  it('ignores irrelevant events', async () => {
    const rebuild = vi.fn(async () => 'done');
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild, config: { debounceMs: 100 } });
    watcher.start();

    emit('add', '/kb/image.png');
    emit('change', '/kb/.quire/search.md');
    emit('change', '/kb/.hidden.md');
    await vi.advanceTimersByTimeAsync(500);

    expect(rebuild).not.toHaveBeenCalled();
    expect(watcher.status.state).toBe('idle');
  });

  it('takes the debounce delay from the environment', async () => {
    process.env.QUIRE_DEBOUNCE_MS = '250';
    const rebuild = vi.fn(async () => 'done');
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild });
    watcher.start();

    emit('unlink', '/kb/a.md');
    await vi.advanceTimersByTimeAsync(249);
    expect(rebuild).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(rebuild).toHaveBeenCalledTimes(1);
  });

  it('forwards watcher errors', () => {
    const onError = vi.fn();
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild: vi.fn(), onError });
    watcher.start();

    emit('error', new Error('EMFILE: too many open files'));

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0][0].message).toBe('EMFILE: too many open files');
  });

  it('stops watching and drops pending events', async () => {
    const rebuild = vi.fn(async () => 'done');
    const watcher = createSiteWatcher({ docsRoot: '/kb', rebuild, config: { debounceMs: 100 } });
    watcher.start();

    emit('change', '/kb/a.md');
    await watcher.stop();
    emit('change', '/kb/b.md');
    await vi.advanceTimersByTimeAsync(1000);

    expect(mockWatcher.close).toHaveBeenCalledTimes(1);
    expect(rebuild).not.toHaveBeenCalled();
  });
});
