/**
 * Rebuild coordinator
 *
 * Single owner of the rebuild cycle. Change notifications come in through
 * notify(); results and failures go out through callbacks. Because it
 * lives on the event loop and only one cycle promise exists at a time,
 * rebuilds never overlap.
 *
 * Debounce is "fixed delay after the first event": the window is not
 * extended by later events, which are simply queued. When the window
 * elapses, every queued event is drained into one rebuild. Events that
 * arrive during a rebuild open a new window once it finishes.
 */

import { serverLog, toError } from '@quire/core';
import type { CoordinatorState, CoordinatorStatus, WatchEvent, WatchEventType } from './types.js';

/**
 * Performs one full rebuild for the drained events
 */
export type RebuildHandler<T> = (events: WatchEvent[]) => Promise<T>;

export interface CoordinatorOptions<T> {
  /** Delay between the first event and the rebuild */
  debounceMs: number;

  rebuild: RebuildHandler<T>;

  /** Called after each successful rebuild */
  onRebuild?: (result: T, events: WatchEvent[]) => void;

  /** Callback for state changes */
  onStateChange?: (status: CoordinatorStatus) => void;

  /** Called after each failed rebuild; the coordinator keeps running */
  onError?: (error: Error) => void;
}

export class RebuildCoordinator<T> {
  private readonly options: CoordinatorOptions<T>;
  private state: CoordinatorState = 'idle';
  private pending: WatchEvent[] = [];
  private timer: NodeJS.Timeout | null = null;
  private cycle: Promise<void> | null = null;
  private idleWaiters: Array<() => void> = [];
  private rebuilds = 0;
  private lastRebuild: number | null = null;
  private lastError: Error | null = null;
  private disposed = false;

  constructor(options: CoordinatorOptions<T>) {
    this.options = options;
  }

  get status(): CoordinatorStatus {
    return {
      state: this.state,
      pendingEvents: this.pending.length,
      rebuilds: this.rebuilds,
      lastRebuild: this.lastRebuild,
      error: this.lastError,
    };
  }

  /**
   * Record a relevant file event
   */
  notify(type: WatchEventType, path: string): void {
    if (this.disposed) {
      return;
    }

    this.pending.push({ type, path, timestamp: Date.now() });

    if (this.state === 'idle') {
      this.startWindow();
    }
  }

  /**
   * Skip the remaining debounce delay and rebuild now.
   * Resolves when the coordinator is idle again.
   */
  async flush(): Promise<void> {
    if (this.state === 'debouncing' && this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.cycle = this.runCycle();
    }
    await this.whenIdle();
  }

  /**
   * Resolves once no rebuild is pending or running
   */
  whenIdle(): Promise<void> {
    if (this.state === 'idle') {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting events and drop queued ones. An in-flight rebuild
   * runs to completion; the returned promise waits for it.
   */
  async dispose(): Promise<void> {
    this.disposed = true;
    this.pending = [];

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.cycle) {
      await this.cycle;
    } else if (this.state !== 'idle') {
      this.setState('idle');
    }
  }

  private startWindow(): void {
    this.setState('debouncing');
    this.timer = setTimeout(() => {
      this.timer = null;
      this.cycle = this.runCycle();
    }, this.options.debounceMs);
  }

  private async runCycle(): Promise<void> {
    const events = this.pending;
    this.pending = [];
    this.setState('rebuilding');
    serverLog('watcher', `Rebuilding after ${events.length} event(s)`);

    try {
      const result = await this.options.rebuild(events);
      this.rebuilds++;
      this.lastRebuild = Date.now();
      this.lastError = null;
      serverLog('watcher', 'Rebuild complete');
      const { onRebuild } = this.options;
      if (onRebuild) {
        this.runCallback('onRebuild', () => onRebuild(result, events));
      }
    } catch (err) {
      const error = toError(err);
      this.lastError = error;
      serverLog('watcher', `Rebuild failed: ${error.message}`, 'error');
      const { onError } = this.options;
      if (onError) {
        this.runCallback('onError', () => onError(error));
      }
    }

    this.cycle = null;

    if (this.pending.length > 0 && !this.disposed) {
      this.startWindow();
    } else {
      this.setState('idle');
    }
  }

  /**
   * Run a caller's callback; a throw is logged and goes no further
   */
  private runCallback(name: string, callback: () => void): void {
    try {
      callback();
    } catch (err) {
      serverLog('watcher', `${name} callback failed: ${toError(err).message}`, 'error');
    }
  }

  private setState(state: CoordinatorState): void {
    this.state = state;
    const { onStateChange } = this.options;
    if (onStateChange) {
      const status = this.status;
      this.runCallback('onStateChange', () => onStateChange(status));
    }

    if (state === 'idle') {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
