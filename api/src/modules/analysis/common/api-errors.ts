import { HttpException, HttpStatus } from '@nestjs/common';

import {
  DatasetNotFoundError,
  IngestionError,
  NotFoundError,
} from '../../../domain/errors/membership-errors';

/**
 * Error keywords carried in the `error` field of every error response.
 */
export const API_ERROR_TYPE = {
  /** A referenced group or member is not in the dataset (404) */
  NOT_FOUND: 'notFound',
  /** The dataset has not been loaded (404) */
  DATASET_NOT_FOUND: 'datasetNotFound',
  /** The import source could not be read (400) */
  INVALID_SOURCE: 'invalidSource',
  /** Request parameters or body failed validation (400) */
  INVALID_REQUEST: 'invalidRequest',
  /** Any other failure (500) */
  INTERNAL: 'internal',
} as const;

export type ApiErrorType = typeof API_ERROR_TYPE[keyof typeof API_ERROR_TYPE];

export interface ApiErrorBody {
  /** HTTP status code as text */
  status: string;
  error: ApiErrorType;
  detail: string;
  missingIds?: string[];
}

export interface ApiErrorInput {
  status: number;
  error: ApiErrorType;
  detail: string;
  missingIds?: string[];
}

export function createApiError({ status, error, detail, missingIds }: ApiErrorInput): HttpException {
  const body: ApiErrorBody = { status: String(status), error, detail };
  if (missingIds) body.missingIds = missingIds;
  return new HttpException(body, status);
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    'detail' in value &&
    typeof value.detail === 'string' &&
    Object.values(API_ERROR_TYPE).some(type => type === value.error)
  );
}

function errorTypeForStatus(status: number): ApiErrorType {
  if (status === HttpStatus.NOT_FOUND) return API_ERROR_TYPE.NOT_FOUND;
  if (status >= 400 && status < 500) return API_ERROR_TYPE.INVALID_REQUEST;
  return API_ERROR_TYPE.INTERNAL;
}

function detailOf(response: string | object, fallback: string): string {
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const message = response.message;
    if (typeof message === 'string') return message;
    if (Array.isArray(message)) return message.map(String).join('; ');
  }
  return fallback;
}

/**
 * Map any thrown value to an HTTP status and error body.
 * Domain errors get their fixed mapping; HttpExceptions keep their status.
 */
export function toApiError(exception: unknown): { status: number; body: ApiErrorBody } {
  if (exception instanceof NotFoundError) {
    const status = HttpStatus.NOT_FOUND;
    return {
      status,
      body: {
        status: String(status),
        error: exception instanceof DatasetNotFoundError ? API_ERROR_TYPE.DATASET_NOT_FOUND : API_ERROR_TYPE.NOT_FOUND,
        detail: exception.message,
        missingIds: exception.missingIds,
      },
    };
  }

  if (exception instanceof IngestionError) {
    const status = HttpStatus.BAD_REQUEST;
    return {
      status,
      body: { status: String(status), error: API_ERROR_TYPE.INVALID_SOURCE, detail: exception.message },
    };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const response = exception.getResponse();
    if (isApiErrorBody(response)) {
      return { status, body: { ...response, status: String(status) } };
    }
    return {
      status,
      body: {
        status: String(status),
        error: errorTypeForStatus(status),
        detail: detailOf(response, exception.message),
      },
    };
  }

  const status = HttpStatus.INTERNAL_SERVER_ERROR;
  return {
    status,
    body: { status: String(status), error: API_ERROR_TYPE.INTERNAL, detail: 'Internal server error.' },
  };
}
