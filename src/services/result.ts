/**
 * Builders for service operation results
 *
 * @module services/result
 */

import { isInvalidIdentifier, isInvalidInput } from '../db/errors.js';
import { ServiceErrorCode, SERVICE_ERROR_MESSAGES, type ServiceOperationResult } from '../types/index.js';

export function succeed<T>(data: T, startTime: number): ServiceOperationResult<T> {
  return {
    success: true,
    data,
    executionTimeMs: Date.now() - startTime,
  };
}

/**
 * Failed result; the message defaults to the code's standard message
 */
export function fail<T>(errorCode: ServiceErrorCode, startTime: number, error?: string): ServiceOperationResult<T> {
  return {
    success: false,
    error: error ?? SERVICE_ERROR_MESSAGES[errorCode],
    errorCode,
    executionTimeMs: Date.now() - startTime,
  };
}

export function validationFailure<T>(errors: readonly string[], startTime: number): ServiceOperationResult<T> {
  return fail<T>(ServiceErrorCode.ValidationError, startTime, errors.join(', '));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Result for an error caught around a query
 *
 * A malformed id answers `notFoundCode` when given, other values the column
 * cannot hold answer a validation error; everything else is a persistence failure.
 */
export function failFromError<T>(
  error: unknown,
  startTime: number,
  notFoundCode?: ServiceErrorCode
): ServiceOperationResult<T> {
  if (notFoundCode && isInvalidIdentifier(error)) {
    return fail<T>(notFoundCode, startTime);
  }
  if (isInvalidInput(error)) {
    return fail<T>(ServiceErrorCode.ValidationError, startTime);
  }
  return fail<T>(ServiceErrorCode.PersistenceError, startTime);
}
