import { HttpStatus, Inject, Injectable } from '@nestjs/common';

import { MembershipIndex } from '../../domain/index/membership-index';
import { normalizeId } from '../../domain/index/id-order';
import { DatasetNotFoundError, IngestionError } from '../../domain/errors/membership-errors';
import {
  MEMBERSHIP_INGESTORS,
  type IMembershipIngestor,
  type IngestionSource,
  type IngestionSourceKind,
} from '../../domain/ingestion/membership-ingestor.interface';
import type { IndexStats, IngestionBatch } from '../../domain/models/membership.model';
import { AnalyzerLogger } from '../logging/analyzer-logger.service';
import { LogCategory } from '../logging/log-levels';
import { API_ERROR_TYPE, createApiError } from '../analysis/common/api-errors';

export type DatasetId = string;

const DATASET_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface DatasetSourceInfo {
  kind: IngestionSourceKind;
  /** Database path for sqlite sources. */
  path?: string;
}

/** One immutable, fully built dataset. Replaced as a whole on reload. */
export interface DatasetSnapshot {
  datasetId: DatasetId;
  index: MembershipIndex;
  skippedCount: number;
  excludedCount: number;
  source: DatasetSourceInfo;
  loadedAt: Date;
}

export interface DatasetSummary extends IndexStats {
  datasetId: DatasetId;
  skippedCount: number;
  excludedCount: number;
  source: DatasetSourceInfo;
  loadedAt: string;
}

export interface DatasetLoadResult extends DatasetSummary {
  /** False when a newer load for the same dataset started before this one finished. */
  applied: boolean;
}

export interface LoadOptions {
  /** Drop the owner's own memberships (the dataset id is the owner account id). Default true. */
  excludeOwner?: boolean;
}

/**
 * DatasetRegistryService: holds one MembershipIndex per dataset.
 *
 * Loads build a complete index off to the side and then replace the map
 * entry in one assignment, so a query sees either the old snapshot or the
 * new one. Each load takes a generation number; a load that completes after
 * a newer one has started is discarded.
 */
@Injectable()
export class DatasetRegistryService {
  private readonly snapshots = new Map<DatasetId, DatasetSnapshot>();
  private readonly generations = new Map<DatasetId, number>();

  constructor(
    @Inject(MEMBERSHIP_INGESTORS) private readonly ingestors: IMembershipIngestor[],
    private readonly logger: AnalyzerLogger,
  ) {}

  async load(datasetId: DatasetId, source: IngestionSource, options: LoadOptions = {}): Promise<DatasetLoadResult> {
    this.assertValidId(datasetId);
    const excludeOwner = options.excludeOwner ?? true;
    const generation = (this.generations.get(datasetId) ?? 0) + 1;
    this.generations.set(datasetId, generation);

    const ingestor = this.ingestors.find(candidate => candidate.kind === source.kind);
    if (!ingestor) {
      throw new IngestionError(`No ingestor registered for source kind '${source.kind}'.`, source.kind);
    }

    this.logger.info(LogCategory.INGESTION, 'Ingesting dataset source', {
      datasetId,
      kind: source.kind,
      generation,
    });

    let batch: IngestionBatch;
    try {
      batch = await ingestor.ingest(source);
    } catch (error) {
      this.logger.error(LogCategory.INGESTION, `Ingestion failed for dataset ${datasetId}`, error, {
        kind: source.kind,
      });
      throw error;
    }

    const { groups, tuples } = batch;
    const kept = excludeOwner ? tuples.filter(tuple => normalizeId(tuple.memberId) !== datasetId) : tuples;
    const excludedCount = tuples.length - kept.length;
    const { index, skippedCount } = MembershipIndex.build(kept, groups);

    if (skippedCount > 0) {
      this.logger.warn(LogCategory.INGESTION, `Skipped ${skippedCount} malformed record(s)`, {
        datasetId,
        skippedCount,
      });
    }

    const snapshot: DatasetSnapshot = {
      datasetId,
      index,
      skippedCount,
      excludedCount,
      source: source.kind === 'sqlite' ? { kind: source.kind, path: source.path } : { kind: source.kind },
      loadedAt: new Date(),
    };

    if (this.generations.get(datasetId) !== generation) {
      this.logger.warn(LogCategory.DATASET, 'Discarding superseded load', { datasetId, generation });
      return { ...this.summarize(snapshot), applied: false };
    }

    this.snapshots.set(datasetId, snapshot);
    this.logger.info(LogCategory.DATASET, `Dataset ${datasetId} loaded`, {
      ...snapshot.index.stats(),
      skippedCount,
      excludedCount,
    });
    return { ...this.summarize(snapshot), applied: true };
  }

  /**
   * @throws DatasetNotFoundError when nothing has been loaded under the id
   */
  get(datasetId: DatasetId): DatasetSnapshot {
    const snapshot = this.snapshots.get(datasetId);
    if (!snapshot) {
      throw new DatasetNotFoundError(datasetId);
    }
    return snapshot;
  }

  describe(datasetId: DatasetId): DatasetSummary {
    return this.summarize(this.get(datasetId));
  }

  list(): DatasetSummary[] {
    return Array.from(this.snapshots.values())
      .sort((a, b) => (a.datasetId < b.datasetId ? -1 : a.datasetId > b.datasetId ? 1 : 0))
      .map(snapshot => this.summarize(snapshot));
  }

  delete(datasetId: DatasetId): void {
    if (!this.snapshots.has(datasetId)) {
      throw new DatasetNotFoundError(datasetId);
    }
    // In-flight loads must not bring the dataset back.
    this.generations.set(datasetId, (this.generations.get(datasetId) ?? 0) + 1);
    this.snapshots.delete(datasetId);
    this.logger.info(LogCategory.DATASET, `Dataset ${datasetId} deleted`);
  }

  private summarize(snapshot: DatasetSnapshot): DatasetSummary {
    return {
      datasetId: snapshot.datasetId,
      ...snapshot.index.stats(),
      skippedCount: snapshot.skippedCount,
      excludedCount: snapshot.excludedCount,
      source: snapshot.source,
      loadedAt: snapshot.loadedAt.toISOString(),
    };
  }

  private assertValidId(datasetId: DatasetId): void {
    if (!DATASET_ID_PATTERN.test(datasetId)) {
      throw createApiError({
        status: HttpStatus.BAD_REQUEST,
        error: API_ERROR_TYPE.INVALID_REQUEST,
        detail: 'Dataset id must contain only alphanumeric characters, hyphens, and underscores',
      });
    }
  }
}
