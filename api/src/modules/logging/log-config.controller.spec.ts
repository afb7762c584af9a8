import { BadRequestException } from '@nestjs/common';

import { LogConfigController } from './log-config.controller';
import { AnalyzerLogger } from './analyzer-logger.service';
import { LogCategory, LogLevel } from './log-levels';

describe('LogConfigController', () => {
  let controller: LogConfigController;
  let logger: AnalyzerLogger;

  beforeEach(() => {
    process.env.NODE_ENV = 'test';
    process.env.LOG_LEVEL = 'INFO';
    process.env.LOG_FORMAT = 'json';
    delete process.env.LOG_CATEGORY_LEVELS;
    delete process.env.LOG_INCLUDE_PAYLOADS;
    delete process.env.LOG_MAX_PAYLOAD_SIZE;

    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

    logger = new AnalyzerLogger();
    controller = new LogConfigController(logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // ─── GET /admin/log-config ────────────────────────────────────────

  describe('getConfig', () => {
    it('should offer the analyzer subsystems as categories', () => {
      expect(controller.getConfig().availableCategories).toEqual([
        'http',
        'dataset',
        'ingestion',
        'analysis',
        'config',
        'general',
      ]);
    });

    it('should show dataset and category overrides by level name', () => {
      logger.setDatasetLevel('10001', LogLevel.TRACE);
      logger.setCategoryLevel(LogCategory.INGESTION, LogLevel.DEBUG);

      const view = controller.getConfig();
      expect(view.datasetLevels).toEqual({ '10001': 'TRACE' });
      expect(view.categoryLevels).toEqual({ ingestion: 'DEBUG' });
      expect(view.globalLevel).toBe('INFO');
    });
  });

  // ─── PUT /admin/log-config ────────────────────────────────────────

  describe('updateConfig', () => {
    it('should replace category levels, keeping only known subsystems', () => {
      logger.setCategoryLevel(LogCategory.HTTP, LogLevel.ERROR);

      const result = controller.updateConfig({
        categoryLevels: { ingestion: 'TRACE', analysis: 'warn', storage: 'DEBUG', dataset: 3 },
      });

      expect(result.config.categoryLevels).toEqual({ ingestion: 'TRACE', analysis: 'WARN' });
    });

    it('should leave dataset overrides alone', () => {
      logger.setDatasetLevel('10001', LogLevel.DEBUG);

      const result = controller.updateConfig({ globalLevel: 'ERROR', datasetLevels: { '10001': 'OFF' } });

      expect(result.config.globalLevel).toBe('ERROR');
      expect(result.config.datasetLevels).toEqual({ '10001': 'DEBUG' });
    });

    it('should ignore mistyped fields', () => {
      const result = controller.updateConfig({ includePayloads: 'yes', maxPayloadSizeBytes: -1, format: 'xml' });

      expect(result.config).toMatchObject({ includePayloads: true, maxPayloadSizeBytes: 8192, format: 'json' });
    });
  });

  // ─── Level routes ─────────────────────────────────────────────────

  describe('setCategoryLevel', () => {
    it('should change what the ingestion subsystem emits', () => {
      expect(controller.setCategoryLevel('ingestion', 'trace')).toEqual({
        message: "Category 'ingestion' log level set to TRACE",
      });

      logger.trace(LogCategory.INGESTION, 'Row read');
      logger.trace(LogCategory.ANALYSIS, 'Pair query');
      expect(logger.getRecentLogs().map(e => e.category)).toEqual(['ingestion']);
    });

    it('should reject an unknown category with 400', () => {
      expect(() => controller.setCategoryLevel('storage', 'DEBUG')).toThrow(BadRequestException);
      expect(() => controller.setCategoryLevel('INGESTION', 'DEBUG')).toThrow(
        "Unknown category 'INGESTION'. Available: http, dataset, ingestion, analysis, config, general",
      );
    });
  });

  describe('setDatasetLevel / clearDatasetLevel', () => {
    it('should scope the level to requests for that dataset', () => {
      expect(controller.setDatasetLevel('10001', 'DEBUG')).toEqual({
        message: "Dataset '10001' log level set to DEBUG",
      });

      logger.runWithContext({ requestId: 'r1', datasetId: '10001' }, () => {
        logger.debug(LogCategory.ANALYSIS, 'Intersection sizes');
      });
      logger.runWithContext({ requestId: 'r2', datasetId: '20002' }, () => {
        logger.debug(LogCategory.ANALYSIS, 'Intersection sizes');
      });

      expect(logger.getRecentLogs().map(e => e.requestId)).toEqual(['r1']);
    });

    it('should restore the global level for the dataset once cleared', () => {
      controller.setDatasetLevel('10001', 'DEBUG');
      controller.clearDatasetLevel('10001');

      logger.runWithContext({ requestId: 'r1', datasetId: '10001' }, () => {
        logger.debug(LogCategory.ANALYSIS, 'Intersection sizes');
      });

      expect(logger.getRecentLogs()).toEqual([]);
      expect(controller.getConfig().datasetLevels).toEqual({});
    });
  });

  // ─── GET /admin/log-config/recent ─────────────────────────────────

  describe('getRecentLogs', () => {
    beforeEach(() => {
      logger.runWithContext({ requestId: 'load-1', datasetId: '10001' }, () => {
        logger.info(LogCategory.INGESTION, 'Ingesting dataset source');
        logger.warn(LogCategory.INGESTION, 'Skipped 1 malformed record(s)');
      });
      logger.runWithContext({ requestId: 'query-1', datasetId: '20002' }, () => {
        logger.info(LogCategory.ANALYSIS, 'Pair query');
      });
    });

    it('should combine dataset, category and level filters', () => {
      const result = controller.getRecentLogs(undefined, 'WARN', 'ingestion', undefined, '10001');

      expect(result.count).toBe(1);
      expect(result.entries[0]).toMatchObject({
        message: 'Skipped 1 malformed record(s)',
        requestId: 'load-1',
        datasetId: '10001',
      });
    });

    it('should ignore an unknown category filter', () => {
      expect(controller.getRecentLogs(undefined, undefined, 'storage').count).toBe(3);
    });

    it('should apply the limit after filtering', () => {
      const result = controller.getRecentLogs('1', undefined, undefined, undefined, '10001');
      expect(result.entries.map(e => e.message)).toEqual(['Skipped 1 malformed record(s)']);
    });

    it('should be emptied by clearRecentLogs', () => {
      controller.clearRecentLogs();
      expect(controller.getRecentLogs()).toEqual({ count: 0, entries: [] });
    });
  });
});
