/**
 * Module Logger
 *
 * Leveled, per-module logging for the track, its cache and its parsers.
 * Output goes to the console unless a handler is installed, in which case
 * every entry that passes the level and module filters goes to the handler.
 *
 * ```ts
 * const log = createLogger('RenderCache');
 * log.debug('Rendering cue', { start: 1, end: 2 });
 * log.error('Renderer failed', error);
 * ```
 *
 * The starting level is read from `SUBTITLE_TRACK_LOG_LEVEL`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, detail?: Error | Record<string, unknown>): void;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.SUBTITLE_TRACK_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'warn';
}

export const loggerConfig: {
  minLevel: LogLevel;
  timestamps: boolean;
  enabledModules: Set<string>;
  disabledModules: Set<string>;
  handler?: LogHandler;
} = {
  minLevel: initialLevel(),
  timestamps: false,
  enabledModules: new Set(),
  disabledModules: new Set(),
};

// ============================================================================
// Formatting
// ============================================================================

const MAX_STRING = 200;
const MAX_ITEMS = 8;

/**
 * Shrink a logged value: frames and masks become their byte size, errors
 * their name and message, long strings and arrays are cut.
 */
function summarize(value: unknown, depth: number): unknown {
  if (ArrayBuffer.isView(value)) {
    return `<${value.constructor.name} ${value.byteLength}B>`;
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (typeof value === 'string') {
    return value.length > MAX_STRING ? `${value.slice(0, MAX_STRING)}…` : value;
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (depth >= 2) {
    return Array.isArray(value) ? `<array ${value.length}>` : '<object>';
  }
  if (Array.isArray(value)) {
    return value.slice(0, MAX_ITEMS).map((item) => summarize(item, depth + 1));
  }
  return summarizeRecord(Object.entries(value), depth + 1);
}

function summarizeRecord(entries: Array<[string, unknown]>, depth: number): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, item] of entries) {
    result[key] = summarize(item, depth);
  }
  return result;
}

export function formatLogEntry(entry: LogEntry): string {
  const head = `${entry.level.toUpperCase()} ${entry.module}: ${entry.message}`;
  return loggerConfig.timestamps ? `${entry.timestamp} ${head}` : head;
}

function accepts(module: string, level: LogLevel): boolean {
  if (LOG_LEVELS[level] < LOG_LEVELS[loggerConfig.minLevel]) return false;
  if (loggerConfig.disabledModules.has(module)) return false;
  return loggerConfig.enabledModules.size === 0 || loggerConfig.enabledModules.has(module);
}

function write(entry: LogEntry): void {
  if (loggerConfig.handler) {
    loggerConfig.handler(entry);
    return;
  }

  const line = formatLogEntry(entry);
  const method = entry.level === 'none' ? 'log' : entry.level;
  if (entry.data) {
    console[method](line, entry.data);
  } else {
    console[method](line);
  }
}

// ============================================================================
// Public API
// ============================================================================

export function createLogger(module: string): Logger {
  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (!accepts(module, level)) return;

    write({
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data: data ? summarizeRecord(Object.entries(data), 0) : undefined,
    });
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, detail) => emit('error', message, detail instanceof Error ? { error: detail } : detail),
  };
}

export function setLogLevel(level: LogLevel): void {
  loggerConfig.minLevel = level;
}

/** Log only these modules (cumulative) */
export function enableModules(...modules: string[]): void {
  for (const module of modules) loggerConfig.enabledModules.add(module);
}

export function disableModules(...modules: string[]): void {
  for (const module of modules) loggerConfig.disabledModules.add(module);
}

export function resetModuleFilters(): void {
  loggerConfig.enabledModules.clear();
  loggerConfig.disabledModules.clear();
}

export function setLogHandler(handler: LogHandler): void {
  loggerConfig.handler = handler;
}

export function clearLogHandler(): void {
  loggerConfig.handler = undefined;
}

/**
 * Start timing `operation`; the returned function logs the elapsed time at debug level
 */
export function createTimer(module: string, operation: string): () => void {
  const logger = createLogger(module);
  const startedAt = performance.now();

  return () => {
    logger.debug(`${operation} completed`, { durationMs: Math.round(performance.now() - startedAt) });
  };
}
