import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import {
  LogLevel,
  LogCategory,
  LogConfig,
  buildDefaultLogConfig,
  logLevelName,
  parseLogLevel,
} from './log-levels';

/**
 * Correlation context attached to every log entry within a single request.
 */
export interface CorrelationContext {
  /** Unique request ID (UUID). Propagated from X-Request-Id header or auto-generated. */
  requestId: string;
  method?: string;
  path?: string;
  /** Dataset the request targets (if any) */
  datasetId?: string;
  /** Start timestamp for duration tracking */
  startTime?: number;
}

/**
 * A single structured log entry.
 * In JSON format mode these are emitted as one JSON line per entry.
 */
export interface StructuredLogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  level: string;
  category: string;
  message: string;
  requestId?: string;
  datasetId?: string;
  method?: string;
  path?: string;
  durationMs?: number;
  error?: {
    message: string;
    name?: string;
    stack?: string;
  };
  /** Additional structured data (query parameters, counts, payload excerpts) */
  data?: Record<string, unknown>;
}

export interface RecentLogQuery {
  limit?: number;
  level?: LogLevel;
  category?: LogCategory;
  requestId?: string;
  datasetId?: string;
}

const SECRET_KEY = /secret|password|token|authorization|bearer|jwt/i;

const ANSI_COLORS: Partial<Record<LogLevel, string>> = {
  [LogLevel.TRACE]: '90',
  [LogLevel.DEBUG]: '36',
  [LogLevel.INFO]: '32',
  [LogLevel.WARN]: '33',
  [LogLevel.ERROR]: '31',
  [LogLevel.FATAL]: '35',
};

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

function consoleMethodFor(level: LogLevel): ConsoleMethod {
  if (level <= LogLevel.DEBUG) return 'debug';
  if (level === LogLevel.INFO) return 'log';
  if (level === LogLevel.WARN) return 'warn';
  return 'error';
}

function toLevel(level: LogLevel | string): LogLevel {
  return typeof level === 'string' ? parseLogLevel(level) : level;
}

function describeError(error: unknown): StructuredLogEntry['error'] | undefined {
  if (!error) return undefined;
  if (error instanceof Error) {
    const { message, name, stack } = error;
    return { message, name, stack };
  }
  return { message: String(error) };
}

const MAX_RECENT_ENTRIES = 500;
const PRETTY_INLINE_DATA_MAX = 200;

// One store per process; every AnalyzerLogger instance reads the same context
const correlationStorage = new AsyncLocalStorage<CorrelationContext>();

/**
 * AnalyzerLogger: structured, leveled, correlation-aware logger.
 *
 * - Per-category, per-dataset and global level configuration
 * - Request correlation IDs propagated across async boundaries
 * - JSON output for production, pretty output for development
 * - Runtime-configurable via the log admin API
 * - In-memory ring buffer of recent entries
 *
 * Usage:
 *   this.logger.info(LogCategory.DATASET, 'Dataset loaded', { datasetId, groupCount });
 *   this.logger.debug(LogCategory.ANALYSIS, 'Pair query', { threshold });
 */
@Injectable()
export class AnalyzerLogger {
  private config: LogConfig;

  private readonly ringBuffer: StructuredLogEntry[] = [];

  constructor() {
    this.config = buildDefaultLogConfig();
  }

  // ─── Correlation Context ──────────────────────────────────────────

  /** Run a function within a correlation context (typically per-request). */
  runWithContext<T>(ctx: CorrelationContext, fn: () => T): T {
    return correlationStorage.run(ctx, fn);
  }

  getContext(): CorrelationContext | undefined {
    return correlationStorage.getStore();
  }

  // ─── Configuration ────────────────────────────────────────────────

  getConfig(): LogConfig {
    return {
      ...this.config,
      categoryLevels: { ...this.config.categoryLevels },
      datasetLevels: { ...this.config.datasetLevels },
    };
  }

  /** Update specific configuration fields at runtime. */
  updateConfig(partial: Partial<LogConfig>): void {
    Object.assign(this.config, partial);
  }

  setGlobalLevel(level: LogLevel | string): void {
    this.config.globalLevel = toLevel(level);
  }

  setCategoryLevel(category: LogCategory, level: LogLevel | string): void {
    this.config.categoryLevels[category] = toLevel(level);
  }

  /** Applies to every entry logged while a request for this dataset is in flight. */
  setDatasetLevel(datasetId: string, level: LogLevel | string): void {
    this.config.datasetLevels[datasetId] = toLevel(level);
  }

  clearDatasetLevel(datasetId: string): void {
    delete this.config.datasetLevels[datasetId];
  }

  // ─── Level-specific methods ───────────────────────────────────────

  trace(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.TRACE, category, message, data);
  }

  debug(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, category, message, data);
  }

  info(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, category, message, data);
  }

  warn(category: LogCategory, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, category, message, data);
  }

  error(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, category, message, data, error);
  }

  fatal(category: LogCategory, message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, category, message, data, error);
  }

  // ─── Recent entries (admin API) ───────────────────────────────────

  /** Newest matching entries, oldest first; at most `limit` (default 100). */
  getRecentLogs(options: RecentLogQuery = {}): StructuredLogEntry[] {
    const { limit = 100, level, category, requestId, datasetId } = options;
    if (limit <= 0) return [];
    const matches = this.ringBuffer.filter(
      entry =>
        (level === undefined || parseLogLevel(entry.level) >= level) &&
        (!category || entry.category === category) &&
        (!requestId || entry.requestId === requestId) &&
        (!datasetId || entry.datasetId === datasetId),
    );
    return matches.slice(-limit);
  }

  clearRecentLogs(): void {
    this.ringBuffer.length = 0;
  }

  /**
   * Minimum level in force for a category right now: the override for the
   * dataset of the current request, else the category override, else the
   * global level.
   */
  resolveLevel(category?: LogCategory): LogLevel {
    const datasetId = correlationStorage.getStore()?.datasetId;
    const datasetLevel = datasetId !== undefined ? this.config.datasetLevels[datasetId] : undefined;
    if (datasetLevel !== undefined) return datasetLevel;
    const categoryLevel = category !== undefined ? this.config.categoryLevels[category] : undefined;
    return categoryLevel ?? this.config.globalLevel;
  }

  isEnabled(level: LogLevel, category?: LogCategory): boolean {
    return level >= this.resolveLevel(category);
  }

  // ─── Entry construction and output ────────────────────────────────

  private log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
  ): void {
    if (!this.isEnabled(level, category)) return;

    const entry = this.buildEntry(level, category, message);
    const failure = describeError(error);
    if (failure) {
      entry.error = this.config.includeStackTraces ? failure : { message: failure.message, name: failure.name };
    }
    if (data) {
      entry.data = this.sanitizeData(data);
    }

    this.ringBuffer.push(entry);
    if (this.ringBuffer.length > MAX_RECENT_ENTRIES) {
      this.ringBuffer.shift();
    }

    if (this.config.format === 'json') {
      const stream = level >= LogLevel.WARN ? process.stderr : process.stdout;
      stream.write(`${JSON.stringify(entry)}\n`);
    } else {
      // eslint-disable-next-line no-console
      console[consoleMethodFor(level)](this.formatPretty(level, entry));
    }
  }

  private buildEntry(level: LogLevel, category: LogCategory, message: string): StructuredLogEntry {
    const ctx = correlationStorage.getStore();
    return {
      timestamp: new Date().toISOString(),
      level: logLevelName(level),
      category,
      message,
      requestId: ctx?.requestId,
      datasetId: ctx?.datasetId,
      method: ctx?.method,
      path: ctx?.path,
      durationMs: ctx?.startTime ? Date.now() - ctx.startTime : undefined,
    };
  }

  /** Redacts secrets, drops bodies unless payload logging is on, truncates large values. */
  private sanitizeData(data: Record<string, unknown>): Record<string, unknown> {
    const { includePayloads, maxPayloadSizeBytes: max } = this.config;
    return Object.fromEntries(
      Object.entries(data).map(([key, value]): [string, unknown] => {
        if (SECRET_KEY.test(key)) return [key, '[REDACTED]'];
        if (key === 'body' && !includePayloads) return [key, '[OMITTED]'];
        if (typeof value === 'string') {
          return [key, value.length > max ? `${value.slice(0, max)}...[truncated ${value.length - max}B]` : value];
        }
        if (typeof value === 'object' && value !== null) {
          const json = JSON.stringify(value);
          return [key, json.length > max ? `${json.slice(0, max)}...[truncated]` : value];
        }
        return [key, value];
      }),
    );
  }

  /**
   * One line per entry: time, level, category, then request id prefix,
   * dataset and elapsed time when known. DEBUG and below print data
   * indented; higher levels append it inline when short.
   */
  private formatPretty(level: LogLevel, entry: StructuredLogEntry): string {
    const tags = [
      entry.requestId ? ` [${entry.requestId.slice(0, 8)}]` : '',
      entry.datasetId ? ` ds:${entry.datasetId}` : '',
      entry.durationMs !== undefined ? ` +${entry.durationMs}ms` : '',
    ].join('');
    const time = entry.timestamp.slice(11, 23);
    let line = `${time} ${this.colorize(level, entry.level.padEnd(5))} ${entry.category.padEnd(10)}${tags} ${entry.message}`;

    if (entry.error) {
      line += ` | ERROR: ${entry.error.message}`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      if (level <= LogLevel.DEBUG) {
        line += `\n  ${JSON.stringify(entry.data, null, 2).replace(/\n/g, '\n  ')}`;
      } else {
        const inline = JSON.stringify(entry.data);
        if (inline.length <= PRETTY_INLINE_DATA_MAX) line += ` | ${inline}`;
      }
    }
    return line;
  }

  private colorize(level: LogLevel, text: string): string {
    const color = ANSI_COLORS[level];
    if (!process.stdout.isTTY || color === undefined) return text;
    return `\x1b[${color}m${text}\x1b[0m`;
  }
}
