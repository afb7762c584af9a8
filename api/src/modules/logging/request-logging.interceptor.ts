import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { randomUUID } from 'node:crypto';

import { AnalyzerLogger } from './analyzer-logger.service';
import { LogCategory } from './log-levels';
import { toApiError } from '../analysis/common/api-errors';

const SLOW_REQUEST_MS = 2000;

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: AnalyzerLogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();
    const startedAt = Date.now();
    const url = request.originalUrl ?? request.url;

    // Generate or propagate correlation request ID
    const incomingId = request.headers['x-request-id'];
    const requestId = typeof incomingId === 'string' && incomingId.length > 0 ? incomingId : randomUUID();
    response.setHeader('X-Request-Id', requestId);

    const datasetId = url.match(/\/datasets\/([^/?]+)/)?.[1];

    // Run the entire request pipeline within a correlation context
    return new Observable(subscriber => {
      this.logger.runWithContext(
        {
          requestId,
          method: request.method,
          path: url,
          datasetId,
          startTime: startedAt,
        },
        () => {
          this.logger.info(LogCategory.HTTP, `→ ${request.method} ${url}`, {
            userAgent: request.headers['user-agent'],
            ip: request.ip,
          });

          const body: unknown = request.body;
          if (typeof body === 'object' && body !== null && Object.keys(body).length > 0) {
            this.logger.trace(LogCategory.HTTP, 'Request body', { body });
          }

          next.handle().pipe(
            tap((responseBody: unknown) => {
              const durationMs = Date.now() - startedAt;

              this.logger.info(LogCategory.HTTP, `← ${response.statusCode} ${request.method} ${url}`, {
                status: response.statusCode,
                durationMs,
              });

              if (responseBody !== undefined) {
                this.logger.trace(LogCategory.HTTP, 'Response body', { body: responseBody });
              }

              if (durationMs > SLOW_REQUEST_MS) {
                this.logger.warn(LogCategory.HTTP, `Slow request: ${durationMs}ms`, {
                  status: response.statusCode,
                  durationMs,
                });
              }
            }),
            catchError((error: unknown) => {
              const durationMs = Date.now() - startedAt;
              const { status } = toApiError(error);
              const message = `← ${status} ${request.method} ${url}`;

              // 4xx: WARN without stack
              if (status >= 500) {
                this.logger.error(LogCategory.HTTP, message, error, { status, durationMs });
              } else {
                this.logger.warn(LogCategory.HTTP, message, { status, durationMs, detail: this.describe(error) });
              }
              throw error;
            })
          ).subscribe(subscriber);
        }
      );
    });
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
