/**
 * Shared HTTP helpers for controllers
 *
 * @module utils/response
 */

import type { Request, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import {
  SERVICE_ERROR_MESSAGES,
  ServiceErrorCode,
  isPlainObject,
  isUuid,
  type Actor,
  type ServiceOperationResult,
} from '../types/index.js';

/**
 * HTTP status codes
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * Service error code to HTTP status mapping
 */
const ERROR_CODE_TO_STATUS: Record<ServiceErrorCode, number> = {
  [ServiceErrorCode.ValidationError]: HTTP_STATUS.BAD_REQUEST,
  [ServiceErrorCode.Forbidden]: HTTP_STATUS.FORBIDDEN,
  [ServiceErrorCode.EvaluationsDisabled]: HTTP_STATUS.CONFLICT,
  [ServiceErrorCode.NoQuestionsConfigured]: HTTP_STATUS.CONFLICT,
  [ServiceErrorCode.PersistenceError]: HTTP_STATUS.INTERNAL_SERVER_ERROR,
  [ServiceErrorCode.QuestionNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.AnswerNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.EmployeeNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.SupervisorNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.EvaluationNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.PeriodNotFound]: HTTP_STATUS.NOT_FOUND,
  [ServiceErrorCode.EmailAlreadyExists]: HTTP_STATUS.CONFLICT,
  [ServiceErrorCode.EmployeeCodeExists]: HTTP_STATUS.CONFLICT,
  [ServiceErrorCode.CannotDeleteSelf]: HTTP_STATUS.BAD_REQUEST,
  [ServiceErrorCode.InvalidCsv]: HTTP_STATUS.BAD_REQUEST,
};

export function getStatusFromErrorCode(errorCode: ServiceErrorCode | undefined): number {
  return errorCode ? ERROR_CODE_TO_STATUS[errorCode] : HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

/**
 * Reuse the id set by `authenticate`, or an `x-correlation-id` header, or make one
 */
export function generateCorrelationId(req: AuthenticatedRequest, prefix: string): string {
  if (req.correlationId) {
    return req.correlationId;
  }

  const existingId = req.get('x-correlation-id');
  if (existingId) {
    return existingId;
  }

  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

export function getClientIp(req: Request): string {
  const forwarded = req.get('x-forwarded-for');
  if (forwarded) {
    return forwarded.split(',')[0]?.trim() || req.ip || 'unknown';
  }
  return req.ip || 'unknown';
}

export function sendSuccess<T>(res: Response, statusCode: number, message: string, data: T): void {
  res.status(statusCode).json({
    success: true,
    message,
    data,
    timestamp: new Date().toISOString(),
  });
}

export function sendError(
  res: Response,
  statusCode: number,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  res.status(statusCode).json({
    success: false,
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Answer a failed service result with its mapped status and the service message
 */
export function sendServiceFailure<T>(res: Response, result: ServiceOperationResult<T>): void {
  const code = result.errorCode ?? ServiceErrorCode.PersistenceError;
  sendError(res, getStatusFromErrorCode(code), code, result.error ?? 'Request failed');
}

export function sendValidationError(res: Response, errors: readonly string[]): void {
  sendError(res, HTTP_STATUS.BAD_REQUEST, ServiceErrorCode.ValidationError, 'Validation failed', {
    errors: [...errors],
  });
}

/**
 * The authenticated caller, or a 401 response when there is none
 */
export function requireActor(req: AuthenticatedRequest, res: Response): Actor | null {
  if (!req.user || !req.user.userId) {
    sendError(res, HTTP_STATUS.UNAUTHORIZED, 'UNAUTHORIZED', 'Authentication required');
    return null;
  }

  return { userId: req.user.userId, role: req.user.role };
}

/**
 * Route parameter that must be a uuid; answers 404 with `notFoundCode` otherwise,
 * since no row can have that id
 */
export function readIdParam(req: Request, res: Response, name: string, notFoundCode: ServiceErrorCode): string | null {
  const value = req.params[name];
  if (!isUuid(value)) {
    sendError(res, HTTP_STATUS.NOT_FOUND, notFoundCode, SERVICE_ERROR_MESSAGES[notFoundCode]);
    return null;
  }
  return value;
}

/**
 * Request body as a record, or an empty one when the body is not an object
 */
export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isPlainObject(body) ? body : {};
}

export function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Numeric field from JSON or form input; blank means absent, garbage becomes NaN
 */
export function readOptionalNumber(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    return Number(value.trim());
  }
  return Number.NaN;
}

/**
 * Boolean field from JSON or form input; undefined when absent, null when it is
 * neither a boolean nor one of the form spellings
 */
export function readOptionalBoolean(value: unknown): boolean | undefined | null {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === 'on' || value === '1') {
    return true;
  }
  if (value === 'false' || value === 'off' || value === '0') {
    return false;
  }
  return null;
}

/**
 * Integer query parameter; undefined when absent, null when malformed
 */
export function readIntegerQuery(value: unknown): number | undefined | null {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return parseInt(value.trim(), 10);
}
