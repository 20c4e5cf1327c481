// ============================================================================
// @probekit/core — Logging & Observability
// ============================================================================

import process from 'node:process';

/**
 * Log levels for Probekit.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events (used by the CLI and tests to observe table activity).
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Current log level (controlled by PROBEKIT_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

/**
 * Console output can be switched off while callbacks keep receiving entries.
 */
let consoleEnabled = true;

function initLevel(): void {
  const debugEnv = process.env.PROBEKIT_DEBUG;
  if (debugEnv === '1' || debugEnv === 'true') {
    currentLevel = 'debug';
  } else if (debugEnv === 'warn') {
    currentLevel = 'warn';
  } else if (debugEnv === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

// Initialize on module load
initLevel();

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  if (consoleEnabled) {
    const dataStr = data ? ` ${JSON.stringify(data)}` : '';
    const msg = `[Probekit] ${message}${dataStr}`;

    switch (level) {
      case 'debug':
        console.debug(msg);
        break;
      case 'info':
        console.info(msg);
        break;
      case 'warn':
        console.warn(msg);
        break;
      case 'error':
        console.error(msg);
        break;
    }
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[Probekit] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging (most verbose).
 * Only logs when PROBEKIT_DEBUG=1 is set or the level is lowered in code.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }

  /**
   * End with custom data merged into the log entry.
   */
  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log an insertion that found no slot.
 */
export function logOutOfMemory(key: string, tableSize: number, count: number): void {
  error(`insert failed for "${key}": table of size ${tableSize} has no free slot`, {
    key,
    tableSize,
    count,
  });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}

/**
 * Enable or disable console output. Callbacks registered with onLog() still fire.
 */
export function setConsoleOutput(enabled: boolean): void {
  consoleEnabled = enabled;
}
