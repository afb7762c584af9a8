import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
} from '@nestjs/common';
import type { Response } from 'express';

import { toApiError } from '../common/api-errors';

/**
 * Global exception filter.
 *
 * Every error response has the same shape:
 *   { "status": "<code as text>", "error": "<keyword>", "detail": "...", "missingIds"?: [...] }
 *
 * Domain errors (unknown group, member or dataset; unreadable source) are
 * mapped to their HTTP status here, so services and controllers throw them
 * without knowing about HTTP. Anything unrecognized becomes a 500 whose
 * detail does not leak the original message.
 */
@Catch()
export class AnalysisExceptionFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, body } = toApiError(exception);

    response
      .status(status)
      .setHeader('Content-Type', 'application/json; charset=utf-8')
      .json(body);
  }
}
