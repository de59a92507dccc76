/**
 * Activity log - in-memory ring buffer for build/index/watch diagnostics
 *
 * Appends to buffer AND writes to console.error so stderr stays the
 * primary sink. Collaborators (a status endpoint, a CLI) can query the
 * buffer with getServerLog().
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent =
  | 'site' | 'build' | 'index' | 'watcher'
  | 'document' | 'config';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const startTs = Date.now();

/**
 * Log a message to the ring buffer and stderr.
 */
export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const prefix = level === 'error' ? '[Quire] ERROR' : level === 'warn' ? '[Quire] WARN' : '[Quire]';
  console.error(`${prefix} [${component}] ${message}`);
}

/**
 * Query the log buffer with optional filters.
 */
export function getServerLog(options: {
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): { entries: LogEntry[]; uptime_ms: number } {
  const { since, component, level, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (level) {
    entries = entries.filter(e => e.level === level);
  }

  // Most recent entries (tail of buffer)
  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return {
    entries,
    uptime_ms: Date.now() - startTs,
  };
}

/**
 * Drop all buffered entries
 */
export function clearServerLog(): void {
  buffer.length = 0;
}
