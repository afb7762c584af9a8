import { Module } from '@nestjs/common';

import { MEMBERSHIP_INGESTORS } from '../../domain/ingestion/membership-ingestor.interface';
import { JsonExportIngestor } from '../../infrastructure/ingestion/json-export.ingestor';
import { SqliteTablesIngestor } from '../../infrastructure/ingestion/sqlite-tables.ingestor';
import { DatasetController } from './dataset.controller';
import { DatasetRegistryService } from './dataset-registry.service';

@Module({
  controllers: [DatasetController],
  providers: [
    JsonExportIngestor,
    SqliteTablesIngestor,
    {
      provide: MEMBERSHIP_INGESTORS,
      useFactory: (json: JsonExportIngestor, sqlite: SqliteTablesIngestor) => [json, sqlite],
      inject: [JsonExportIngestor, SqliteTablesIngestor],
    },
    DatasetRegistryService,
  ],
  exports: [DatasetRegistryService],
})
export class DatasetModule {}
