import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AnalyzerConfigModule } from '../config/analyzer-config.module';
import { LoggingModule } from '../logging/logging.module';
import { DatasetModule } from '../dataset/dataset.module';
import { AnalysisModule } from '../analysis/analysis.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    AnalyzerConfigModule,
    DatasetModule,
    AnalysisModule
  ]
})
export class AppModule {}
