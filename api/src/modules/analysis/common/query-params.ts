import { HttpStatus } from '@nestjs/common';

import { API_ERROR_TYPE, createApiError } from './api-errors';

function invalid(name: string, expectation: string): never {
  throw createApiError({
    status: HttpStatus.BAD_REQUEST,
    error: API_ERROR_TYPE.INVALID_REQUEST,
    detail: `Query parameter '${name}' must be ${expectation}.`,
  });
}

/**
 * Parse an optional numeric query parameter. Absent or blank → undefined.
 * @throws HttpException (400 invalidRequest) for non-numeric text
 */
export function parseNumberParam(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) invalid(name, 'a number');
  return value;
}

/**
 * Parse an optional integer query parameter no smaller than `min`.
 * @throws HttpException (400 invalidRequest) otherwise
 */
export function parseIntegerParam(name: string, raw: string | undefined, min: number): number | undefined {
  const value = parseNumberParam(name, raw);
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value < min) invalid(name, `an integer >= ${min}`);
  return value;
}
