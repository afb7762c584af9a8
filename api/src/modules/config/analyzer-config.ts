/**
 * Analyzer Configuration Keys
 *
 * Central location for the environment variables the API reads.
 * Use these constants instead of raw strings when calling ConfigService.
 */
export const ANALYZER_CONFIG_KEYS = {
  /** HTTP listen port. */
  PORT: 'PORT',

  /** Global route prefix (default "api"). */
  API_PREFIX: 'API_PREFIX',

  /**
   * Root directory for SQLite ingestion. Import requests name a database
   * relative to this directory; paths escaping it are rejected.
   */
  DATA_DIR: 'DATA_DIR',

  /** Minimum shared-group count used when a pair query gives none. */
  DEFAULT_PAIR_THRESHOLD: 'DEFAULT_PAIR_THRESHOLD',

  /** Default number of results returned by group search. */
  GROUP_SEARCH_LIMIT: 'GROUP_SEARCH_LIMIT',

  /** Body parser limit for JSON exports posted to the import route. */
  JSON_BODY_LIMIT: 'JSON_BODY_LIMIT',
} as const;

export type AnalyzerConfigKey = typeof ANALYZER_CONFIG_KEYS[keyof typeof ANALYZER_CONFIG_KEYS];

export interface AnalyzerConfig {
  port: number;
  apiPrefix: string;
  dataDir: string;
  defaultPairThreshold: number;
  groupSearchLimit: number;
  jsonBodyLimit: string;
}

export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = {
  port: 3000,
  apiPrefix: 'api',
  dataDir: './data',
  defaultPairThreshold: 2,
  groupSearchLimit: 20,
  jsonBodyLimit: '50mb',
};

/**
 * Parse a positive integer setting.
 * @returns the parsed value, or undefined when the raw value is not a positive integer
 */
export function parsePositiveInt(raw: string | number | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = typeof raw === 'number' ? raw : Number(String(raw).trim());
  return Number.isInteger(value) && value > 0 ? value : undefined;
}
