import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'node:path';

import { AnalyzerLogger } from '../logging/analyzer-logger.service';
import { LogCategory } from '../logging/log-levels';
import {
  ANALYZER_CONFIG_KEYS,
  DEFAULT_ANALYZER_CONFIG,
  parsePositiveInt,
  type AnalyzerConfig,
  type AnalyzerConfigKey,
} from './analyzer-config';

/**
 * Typed view over ConfigService. Values are read once, on first access;
 * an invalid numeric setting falls back to its default with a warning.
 */
@Injectable()
export class AnalyzerConfigService {
  private cached: AnalyzerConfig | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly logger: AnalyzerLogger,
  ) {}

  get config(): AnalyzerConfig {
    if (!this.cached) {
      this.cached = this.read();
    }
    return this.cached;
  }

  /** Absolute path of the SQLite ingestion root. */
  get dataDir(): string {
    return resolve(this.config.dataDir);
  }

  get defaultPairThreshold(): number {
    return this.config.defaultPairThreshold;
  }

  get groupSearchLimit(): number {
    return this.config.groupSearchLimit;
  }

  private read(): AnalyzerConfig {
    const defaults = DEFAULT_ANALYZER_CONFIG;
    return {
      port: this.positiveInt(ANALYZER_CONFIG_KEYS.PORT, defaults.port),
      apiPrefix: this.text(ANALYZER_CONFIG_KEYS.API_PREFIX) ?? defaults.apiPrefix,
      dataDir: this.text(ANALYZER_CONFIG_KEYS.DATA_DIR) ?? defaults.dataDir,
      defaultPairThreshold: this.positiveInt(ANALYZER_CONFIG_KEYS.DEFAULT_PAIR_THRESHOLD, defaults.defaultPairThreshold),
      groupSearchLimit: this.positiveInt(ANALYZER_CONFIG_KEYS.GROUP_SEARCH_LIMIT, defaults.groupSearchLimit),
      jsonBodyLimit: this.text(ANALYZER_CONFIG_KEYS.JSON_BODY_LIMIT) ?? defaults.jsonBodyLimit,
    };
  }

  private text(key: AnalyzerConfigKey): string | undefined {
    const raw = this.configService.get<string>(key);
    if (raw === undefined || raw === null) return undefined;
    const value = String(raw).trim();
    return value.length > 0 ? value : undefined;
  }

  private positiveInt(key: AnalyzerConfigKey, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') return fallback;
    const parsed = parsePositiveInt(raw);
    if (parsed === undefined) {
      this.logger.warn(LogCategory.CONFIG, `Ignoring invalid ${key}; using default`, { value: raw, default: fallback });
      return fallback;
    }
    return parsed;
  }
}
