/**
 * Structured Log Levels: follows RFC 5424 / OpenTelemetry severity conventions.
 *
 * Levels (ascending severity):
 *   TRACE  → DEBUG → INFO → WARN → ERROR → FATAL → OFF
 *
 * Use cases:
 *   TRACE  Full request/response bodies, per-record ingestion detail.
 *   DEBUG  Query parameters, intersection sizes, ingestor selection.
 *   INFO   Dataset loaded, dataset deleted, request completed.
 *   WARN   Skipped records, invalid settings, slow requests.
 *   ERROR  Failed loads, unexpected handler errors.
 *   FATAL  Unrecoverable startup failures.
 *   OFF    Suppress all log output.
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  FATAL = 5,
  OFF = 6,
}

const LOG_LEVEL_BY_NAME = new Map<string, LogLevel>([
  ['TRACE', LogLevel.TRACE],
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
  ['WARN', LogLevel.WARN],
  ['ERROR', LogLevel.ERROR],
  ['FATAL', LogLevel.FATAL],
  ['OFF', LogLevel.OFF],
]);

/** String → enum mapping (case-insensitive). */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return LogLevel.INFO;
  const upper = value.toUpperCase().trim();
  const named = LOG_LEVEL_BY_NAME.get(upper);
  if (named !== undefined) return named;
  // Numeric fallback
  const num = Number(upper);
  if (upper !== '' && Number.isInteger(num) && num >= LogLevel.TRACE && num <= LogLevel.OFF) return num;
  return LogLevel.INFO;
}

export function logLevelName(level: LogLevel): string {
  return LogLevel[level] ?? 'UNKNOWN';
}

/** Names of all levels, in ascending severity. */
export const LOG_LEVEL_NAMES = Array.from(LOG_LEVEL_BY_NAME.keys());

/**
 * Log categories allow filtering by subsystem.
 */
export enum LogCategory {
  /** HTTP request/response lifecycle */
  HTTP = 'http',
  /** Dataset registry: load, swap, delete */
  DATASET = 'dataset',
  /** Source parsing (JSON export, SQLite tables) */
  INGESTION = 'ingestion',
  /** Pair, group and member queries */
  ANALYSIS = 'analysis',
  /** Runtime configuration */
  CONFIG = 'config',
  /** General / uncategorized */
  GENERAL = 'general',
}

export function isLogCategory(value: string): value is LogCategory {
  return Object.values(LogCategory).some(category => category === value);
}

/**
 * Runtime-configurable log configuration.
 * Supports global level + per-category and per-dataset overrides.
 */
export interface LogConfig {
  /** Global minimum log level (default: INFO, can be overridden by LOG_LEVEL env var). */
  globalLevel: LogLevel;

  /**
   * Per-category level overrides.
   * Example: { 'ingestion': LogLevel.TRACE, 'http': LogLevel.WARN }
   */
  categoryLevels: Partial<Record<LogCategory, LogLevel>>;

  /**
   * Per-dataset level overrides. Key = datasetId.
   * When set, all logs for requests hitting that dataset use this level.
   */
  datasetLevels: Record<string, LogLevel>;

  /** Include full request/response bodies in TRACE output (default: true outside production). */
  includePayloads: boolean;

  /** Include stack traces in ERROR/FATAL output (default: true). */
  includeStackTraces: boolean;

  /** Maximum payload size to log in bytes (default: 8KB). Bodies larger are truncated. */
  maxPayloadSizeBytes: number;

  /** Output format: 'json' for structured (production), 'pretty' for human-readable (dev). */
  format: 'json' | 'pretty';
}

/** Build default log configuration from environment variables. */
export function buildDefaultLogConfig(): LogConfig {
  const isProd = process.env.NODE_ENV === 'production';
  const requestedFormat = process.env.LOG_FORMAT;
  const format = requestedFormat === 'json' || requestedFormat === 'pretty' ? requestedFormat : 'pretty';
  return {
    globalLevel: parseLogLevel(process.env.LOG_LEVEL),
    categoryLevels: parseCategoryLevels(process.env.LOG_CATEGORY_LEVELS),
    datasetLevels: {},
    includePayloads: process.env.LOG_INCLUDE_PAYLOADS === 'true' || (!isProd && process.env.LOG_INCLUDE_PAYLOADS !== 'false'),
    includeStackTraces: process.env.LOG_INCLUDE_STACKS !== 'false',
    maxPayloadSizeBytes: Number(process.env.LOG_MAX_PAYLOAD_SIZE) || 8192,
    format: isProd ? 'json' : format,
  };
}

/**
 * Parse LOG_CATEGORY_LEVELS env var.
 * Format: "ingestion=TRACE,http=WARN"
 */
export function parseCategoryLevels(raw: string | undefined): Partial<Record<LogCategory, LogLevel>> {
  if (!raw) return {};
  const result: Partial<Record<LogCategory, LogLevel>> = {};
  for (const pair of raw.split(',')) {
    const [cat, level] = pair.trim().split('=');
    if (cat && level) {
      const category = cat.trim();
      if (isLogCategory(category)) {
        result[category] = parseLogLevel(level.trim());
      }
    }
  }
  return result;
}
