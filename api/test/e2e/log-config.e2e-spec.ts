import type { INestApplication } from '@nestjs/common';

import { createTestApp } from './helpers/app.helper';
import { apiDelete, apiGet, apiPost, apiPut } from './helpers/request.helper';
import { OWNER_ID, membershipExport } from './helpers/fixtures';

interface LogEntryBody {
  level: string;
  category: string;
  message: string;
  datasetId?: string;
}

/**
 * E2E tests for the Admin Log Configuration API.
 *
 * Endpoints under test:
 *   GET    /api/admin/log-config
 *   PUT    /api/admin/log-config
 *   PUT    /api/admin/log-config/level/:level
 *   PUT    /api/admin/log-config/category/:category/:level
 *   PUT    /api/admin/log-config/dataset/:datasetId/:level
 *   DELETE /api/admin/log-config/dataset/:datasetId
 *   GET    /api/admin/log-config/recent
 *   DELETE /api/admin/log-config/recent
 */
describe('Log Configuration API (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  // ─── GET /api/admin/log-config ────────────────────────────────────

  describe('GET /api/admin/log-config', () => {
    it('should return 200 with current log configuration', async () => {
      const res = await apiGet(app, '/admin/log-config').expect(200);

      expect(res.body).toHaveProperty('globalLevel');
      expect(res.body).toHaveProperty('categoryLevels');
      expect(res.body).toHaveProperty('datasetLevels');
      expect(res.body).toHaveProperty('includePayloads');
      expect(res.body).toHaveProperty('includeStackTraces');
      expect(res.body).toHaveProperty('maxPayloadSizeBytes');
      expect(res.body).toHaveProperty('format');
    });

    it('should reflect LOG_LEVEL from the environment', async () => {
      const res = await apiGet(app, '/admin/log-config').expect(200);
      expect(res.body.globalLevel).toBe('OFF');
    });

    it('should include all available levels and categories', async () => {
      const res = await apiGet(app, '/admin/log-config').expect(200);

      expect(res.body.availableLevels).toEqual(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'OFF']);
      expect(res.body.availableCategories).toEqual(['http', 'dataset', 'ingestion', 'analysis', 'config', 'general']);
    });
  });

  // ─── PUT /api/admin/log-config ────────────────────────────────────

  describe('PUT /api/admin/log-config', () => {
    it('should update multiple fields at once', async () => {
      const res = await apiPut(app, '/admin/log-config', {
        globalLevel: 'WARN',
        includePayloads: false,
        format: 'json',
        categoryLevels: { analysis: 'TRACE', unknown: 'DEBUG' },
      }).expect(200);

      expect(res.body.message).toBe('Log configuration updated');
      expect(res.body.config.globalLevel).toBe('WARN');
      expect(res.body.config.includePayloads).toBe(false);
      expect(res.body.config.format).toBe('json');
      expect(res.body.config.categoryLevels).toEqual({ analysis: 'TRACE' });
    });

    it('should persist changes across GET calls', async () => {
      await apiPut(app, '/admin/log-config', { globalLevel: 'ERROR' }).expect(200);

      const res = await apiGet(app, '/admin/log-config').expect(200);
      expect(res.body.globalLevel).toBe('ERROR');
    });
  });

  // ─── Level shortcuts ──────────────────────────────────────────────

  describe('PUT /api/admin/log-config/level/:level', () => {
    it('should accept case-insensitive level names', async () => {
      const res = await apiPut(app, '/admin/log-config/level/debug').expect(200);

      expect(res.body).toEqual({ message: 'Global log level set to DEBUG', globalLevel: 'DEBUG' });
    });
  });

  describe('PUT /api/admin/log-config/category/:category/:level', () => {
    it('should set a category log level', async () => {
      const res = await apiPut(app, '/admin/log-config/category/ingestion/WARN').expect(200);
      expect(res.body.message).toBe("Category 'ingestion' log level set to WARN");

      const config = await apiGet(app, '/admin/log-config').expect(200);
      expect(config.body.categoryLevels.ingestion).toBe('WARN');
    });

    it('should return 400 for an unknown category', async () => {
      const res = await apiPut(app, '/admin/log-config/category/storage/DEBUG').expect(400);

      expect(res.body).toEqual({
        status: '400',
        error: 'invalidRequest',
        detail: "Unknown category 'storage'. Available: http, dataset, ingestion, analysis, config, general",
      });
    });
  });

  // ─── Recent entries and dataset overrides ─────────────────────────

  describe('recent entries', () => {
    beforeAll(async () => {
      await apiPut(app, '/admin/log-config', { globalLevel: 'INFO', categoryLevels: {} }).expect(200);
      await apiDelete(app, '/admin/log-config/recent').expect(204);
    });

    it('should record entries under the request id', async () => {
      await apiPost(app, `/admin/datasets/${OWNER_ID}/import/json`, membershipExport())
        .set('X-Request-Id', 'e2e-load')
        .expect(201);

      const res = await apiGet(app, '/admin/log-config/recent?requestId=e2e-load&category=dataset').expect(200);
      const entries: LogEntryBody[] = res.body.entries;

      expect(res.body.count).toBe(1);
      expect(entries[0]).toMatchObject({
        level: 'INFO',
        category: 'dataset',
        message: `Dataset ${OWNER_ID} loaded`,
        datasetId: OWNER_ID,
      });
    });

    it('should honour a dataset level override until it is cleared', async () => {
      await apiPut(app, `/admin/log-config/dataset/${OWNER_ID}/OFF`).expect(200);
      await apiGet(app, `/datasets/${OWNER_ID}/pairs`).set('X-Request-Id', 'e2e-quiet').expect(200);

      const quiet = await apiGet(app, '/admin/log-config/recent?requestId=e2e-quiet').expect(200);
      expect(quiet.body.count).toBe(0);

      await apiDelete(app, `/admin/log-config/dataset/${OWNER_ID}`).expect(204);
      await apiGet(app, `/datasets/${OWNER_ID}/pairs`).set('X-Request-Id', 'e2e-loud').expect(200);

      const loud = await apiGet(app, '/admin/log-config/recent?requestId=e2e-loud').expect(200);
      const messages: string[] = loud.body.entries.map((e: LogEntryBody) => e.message);
      expect(messages).toEqual([`→ GET /api/datasets/${OWNER_ID}/pairs`, `← 200 GET /api/datasets/${OWNER_ID}/pairs`]);
    });

    it('should clear the buffer', async () => {
      await apiDelete(app, '/admin/log-config/recent').expect(204);

      const res = await apiGet(app, '/admin/log-config/recent?category=dataset').expect(200);
      expect(res.body.count).toBe(0);
    });
  });
});
