import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { AnalyzerLogger } from './analyzer-logger.service';
import { LogConfigController } from './log-config.controller';
import { RequestLoggingInterceptor } from './request-logging.interceptor';

@Global()
@Module({
  controllers: [LogConfigController],
  providers: [
    AnalyzerLogger,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor
    }
  ],
  exports: [AnalyzerLogger]
})
export class LoggingModule {}
