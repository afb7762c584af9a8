import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { DatasetModule } from '../dataset/dataset.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { AnalysisExceptionFilter } from './filters/analysis-exception.filter';

@Module({
  imports: [DatasetModule],
  controllers: [AnalysisController],
  providers: [
    AnalysisService,
    {
      provide: APP_FILTER,
      useClass: AnalysisExceptionFilter
    }
  ],
})
export class AnalysisModule {}
