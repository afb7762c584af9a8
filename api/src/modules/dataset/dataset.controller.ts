import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  Param,
  Post,
  Query,
} from '@nestjs/common';

import {
  DatasetRegistryService,
  type DatasetLoadResult,
  type DatasetSummary,
} from './dataset-registry.service';
import { ImportSqliteDto } from './dto/import-sqlite.dto';
import { IngestionError } from '../../domain/errors/membership-errors';

function isJsonContentType(contentType: string | undefined): boolean {
  const mediaType = contentType?.split(';')[0].trim().toLowerCase();
  return mediaType === 'application/json';
}

function isEmptyBody(body: unknown): boolean {
  if (body === undefined || body === null) return true;
  return typeof body === 'object' && !Array.isArray(body) && Object.keys(body).length === 0;
}

/**
 * Dataset Management API Controller
 * Loads, inspects and removes datasets. Each loaded dataset is queried at
 * /{prefix}/datasets/{datasetId}/...
 */
@Controller('admin/datasets')
export class DatasetController {
  constructor(private readonly registry: DatasetRegistryService) {}

  /**
   * List loaded datasets
   * GET /admin/datasets
   */
  @Get()
  listDatasets(): DatasetSummary[] {
    return this.registry.list();
  }

  /**
   * GET /admin/datasets/{datasetId}
   */
  @Get(':datasetId')
  getDataset(@Param('datasetId') datasetId: string): DatasetSummary {
    return this.registry.describe(datasetId);
  }

  /**
   * Load (or replace) a dataset from an exported JSON document
   * POST /admin/datasets/{datasetId}/import/json?excludeOwner=false
   * Body: { [groupId]: { group_name, members: { [memberId]: {...} } } }
   *
   * A body that was not sent as application/json, or holds no groups, is
   * rejected so it cannot replace a loaded dataset with an empty one.
   */
  @Post(':datasetId/import/json')
  async importJson(
    @Param('datasetId') datasetId: string,
    @Body() document: unknown,
    @Headers('content-type') contentType: string | undefined,
    @Query('excludeOwner') excludeOwner?: string,
  ): Promise<DatasetLoadResult> {
    if (!isJsonContentType(contentType)) {
      throw new IngestionError('JSON export must be sent with Content-Type application/json.', 'json');
    }
    if (isEmptyBody(document)) {
      throw new IngestionError('JSON export contains no groups.', 'json');
    }
    return this.registry.load(
      datasetId,
      { kind: 'json', document },
      { excludeOwner: excludeOwner !== 'false' },
    );
  }

  /**
   * Load (or replace) a dataset from a decrypted SQLite database
   * POST /admin/datasets/{datasetId}/import/sqlite
   * Body: { path, excludeOwner? }
   */
  @Post(':datasetId/import/sqlite')
  async importSqlite(
    @Param('datasetId') datasetId: string,
    @Body() dto: ImportSqliteDto,
  ): Promise<DatasetLoadResult> {
    return this.registry.load(
      datasetId,
      { kind: 'sqlite', path: dto.path },
      { excludeOwner: dto.excludeOwner },
    );
  }

  /**
   * DELETE /admin/datasets/{datasetId}
   */
  @Delete(':datasetId')
  @HttpCode(204)
  deleteDataset(@Param('datasetId') datasetId: string): void {
    this.registry.delete(datasetId);
  }
}
