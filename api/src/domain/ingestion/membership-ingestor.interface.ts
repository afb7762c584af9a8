/**
 * IMembershipIngestor: port for anything that turns a raw data source into
 * group declarations and membership tuples.
 *
 * Implementations:
 *   - JsonExportIngestor   (exported JSON document)
 *   - SqliteTablesIngestor (decrypted group_info database)
 *
 * The dataset registry picks the implementation matching `source.kind` at
 * load time.
 */
import type { IngestionBatch } from '../models/membership.model';

export interface JsonExportSource {
  kind: 'json';
  document: unknown;
}

export interface SqliteTablesSource {
  kind: 'sqlite';
  /** Path of the decrypted database, relative to DATA_DIR. */
  path: string;
}

export type IngestionSource = JsonExportSource | SqliteTablesSource;
export type IngestionSourceKind = IngestionSource['kind'];

export interface IMembershipIngestor<TSource extends IngestionSource = IngestionSource> {
  readonly kind: TSource['kind'];

  /**
   * Produce every group and membership record found in the source. Records
   * with a missing id are passed through; the index counts and skips them.
   *
   * @throws IngestionError when the source as a whole cannot be read
   */
  ingest(source: TSource): Promise<IngestionBatch>;
}

/**
 * NestJS injection token for the list of registered ingestors.
 *
 * Usage:
 *   @Inject(MEMBERSHIP_INGESTORS) private readonly ingestors: IMembershipIngestor[]
 */
export const MEMBERSHIP_INGESTORS = 'MEMBERSHIP_INGESTORS';
