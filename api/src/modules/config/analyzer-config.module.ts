import { Global, Module } from '@nestjs/common';

import { AnalyzerConfigService } from './analyzer-config.service';

@Global()
@Module({
  providers: [AnalyzerConfigService],
  exports: [AnalyzerConfigService]
})
export class AnalyzerConfigModule {}
