import {
  BadRequestException,
  Controller,
  Get,
  Put,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
} from '@nestjs/common';
import { AnalyzerLogger, type StructuredLogEntry } from './analyzer-logger.service';
import {
  LOG_LEVEL_NAMES,
  LogCategory,
  isLogCategory,
  logLevelName,
  parseLogLevel,
  type LogConfig,
  type LogLevel,
} from './log-levels';

export interface LogConfigView {
  globalLevel: string;
  categoryLevels: Record<string, string>;
  datasetLevels: Record<string, string>;
  includePayloads: boolean;
  includeStackTraces: boolean;
  maxPayloadSizeBytes: number;
  format: 'json' | 'pretty';
  availableLevels: string[];
  availableCategories: string[];
}

function levelNames(levels: Partial<Record<string, LogLevel>>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, level] of Object.entries(levels)) {
    if (level !== undefined) result[key] = logLevelName(level);
  }
  return result;
}

/**
 * Admin Log Configuration Controller
 *
 * Runtime log management without restart: global, per-category and
 * per-dataset levels, plus access to the recent-entries ring buffer.
 *
 * Routes: /{prefix}/admin/log-config/*
 */
@Controller('admin/log-config')
export class LogConfigController {
  constructor(private readonly logger: AnalyzerLogger) {}

  /**
   * GET /admin/log-config
   */
  @Get()
  getConfig(): LogConfigView {
    const config = this.logger.getConfig();
    return {
      globalLevel: logLevelName(config.globalLevel),
      categoryLevels: levelNames(config.categoryLevels),
      datasetLevels: levelNames(config.datasetLevels),
      includePayloads: config.includePayloads,
      includeStackTraces: config.includeStackTraces,
      maxPayloadSizeBytes: config.maxPayloadSizeBytes,
      format: config.format,
      availableLevels: LOG_LEVEL_NAMES,
      availableCategories: Object.values(LogCategory),
    };
  }

  /**
   * PUT /admin/log-config
   * Partial update; unknown or mistyped fields are ignored.
   */
  @Put()
  updateConfig(@Body() body: Record<string, unknown>): { message: string; config: LogConfigView } {
    const updates: Partial<LogConfig> = {};

    if (typeof body.globalLevel === 'string') {
      updates.globalLevel = parseLogLevel(body.globalLevel);
    }
    if (typeof body.includePayloads === 'boolean') {
      updates.includePayloads = body.includePayloads;
    }
    if (typeof body.includeStackTraces === 'boolean') {
      updates.includeStackTraces = body.includeStackTraces;
    }
    if (typeof body.maxPayloadSizeBytes === 'number' && body.maxPayloadSizeBytes > 0) {
      updates.maxPayloadSizeBytes = body.maxPayloadSizeBytes;
    }
    if (body.format === 'json' || body.format === 'pretty') {
      updates.format = body.format;
    }
    if (typeof body.categoryLevels === 'object' && body.categoryLevels !== null) {
      const catLevels: Partial<Record<LogCategory, LogLevel>> = {};
      for (const [cat, level] of Object.entries(body.categoryLevels)) {
        if (isLogCategory(cat) && typeof level === 'string') {
          catLevels[cat] = parseLogLevel(level);
        }
      }
      updates.categoryLevels = catLevels;
    }

    this.logger.updateConfig(updates);

    return {
      message: 'Log configuration updated',
      config: this.getConfig(),
    };
  }

  /**
   * PUT /admin/log-config/level/:level
   */
  @Put('level/:level')
  setGlobalLevel(@Param('level') level: string): { message: string; globalLevel: string } {
    this.logger.setGlobalLevel(level);
    const globalLevel = logLevelName(this.logger.getConfig().globalLevel);
    return {
      message: `Global log level set to ${globalLevel}`,
      globalLevel,
    };
  }

  /**
   * PUT /admin/log-config/category/:category/:level
   */
  @Put('category/:category/:level')
  setCategoryLevel(
    @Param('category') category: string,
    @Param('level') level: string,
  ): { message: string } {
    if (!isLogCategory(category)) {
      throw new BadRequestException(
        `Unknown category '${category}'. Available: ${Object.values(LogCategory).join(', ')}`,
      );
    }
    this.logger.setCategoryLevel(category, level);
    return {
      message: `Category '${category}' log level set to ${logLevelName(parseLogLevel(level))}`,
    };
  }

  /**
   * PUT /admin/log-config/dataset/:datasetId/:level
   * Override the level for requests hitting one dataset.
   */
  @Put('dataset/:datasetId/:level')
  setDatasetLevel(
    @Param('datasetId') datasetId: string,
    @Param('level') level: string,
  ): { message: string } {
    this.logger.setDatasetLevel(datasetId, level);
    return {
      message: `Dataset '${datasetId}' log level set to ${logLevelName(parseLogLevel(level))}`,
    };
  }

  /**
   * DELETE /admin/log-config/dataset/:datasetId
   */
  @Delete('dataset/:datasetId')
  @HttpCode(204)
  clearDatasetLevel(@Param('datasetId') datasetId: string): void {
    this.logger.clearDatasetLevel(datasetId);
  }

  /**
   * GET /admin/log-config/recent?limit=&level=&category=&requestId=&datasetId=
   */
  @Get('recent')
  getRecentLogs(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('requestId') requestId?: string,
    @Query('datasetId') datasetId?: string,
  ): { count: number; entries: StructuredLogEntry[] } {
    const parsedLimit = limit ? parseInt(limit, 10) : NaN;
    const entries = this.logger.getRecentLogs({
      limit: Number.isNaN(parsedLimit) ? undefined : parsedLimit,
      level: level ? parseLogLevel(level) : undefined,
      category: category && isLogCategory(category) ? category : undefined,
      requestId: requestId || undefined,
      datasetId: datasetId || undefined,
    });
    return {
      count: entries.length,
      entries,
    };
  }

  /**
   * DELETE /admin/log-config/recent
   */
  @Delete('recent')
  @HttpCode(204)
  clearRecentLogs(): void {
    this.logger.clearRecentLogs();
  }
}
