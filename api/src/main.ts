import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import type { Request, Response, NextFunction } from 'express';
import { NestFactory } from '@nestjs/core';
import { json } from 'express';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';
import { AnalyzerConfigService } from './modules/config/analyzer-config.service';
import { AnalyzerLogger } from './modules/logging/analyzer-logger.service';
import { LogCategory } from './modules/logging/log-levels';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });
  const analyzerConfig = app.get(AnalyzerConfigService);
  const { config } = analyzerConfig;

  app.enableShutdownHooks();

  app.use((req: Request, _res: Response, next: NextFunction) => {
    // Normalize double slashes
    if (req.url.startsWith('//')) {
      req.url = req.url.replace(/\/\/+/, '/');
    }
    next();
  });

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Request-Id'],
    credentials: false
  });

  app.setGlobalPrefix(config.apiPrefix);

  app.useLogger(new Logger('MembershipAnalyzer'));
  // Exported datasets are posted whole, hence the raised limit
  app.use(json({ limit: config.jsonBodyLimit }));
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: false,
      transform: true,
      transformOptions: { enableImplicitConversion: true }
    })
  );

  try {
    await app.listen(config.port);
  } catch (error) {
    app.get(AnalyzerLogger).fatal(LogCategory.GENERAL, 'HTTP listener failed to start', error, { port: config.port });
    throw error;
  }
  Logger.log(`🚀 Membership Analyzer API is running on http://localhost:${config.port}/${config.apiPrefix}`);
  Logger.log(`📂 SQLite imports resolve under ${analyzerConfig.dataDir}`);
  Logger.log(`🔎 Log API quick access: http://localhost:${config.port}/${config.apiPrefix}/admin/log-config/recent?limit=25`);
}

void bootstrap();
