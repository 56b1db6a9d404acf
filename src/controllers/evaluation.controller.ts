/**
 * Evaluation Controller Module
 *
 * HTTP adapter for the submission workflow, evaluation listings and the
 * dashboard.
 *
 * @module controllers/evaluation
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { evaluationService } from '../services/evaluation.service.js';
import { reportService } from '../services/report.service.js';
import { ServiceErrorCode, isPlainObject, isUuid, type ServiceOperationResult } from '../types/index.js';
import {
  validateNotes,
  validateSelections,
  type AnswerSelections,
  type EvaluationFilters,
} from '../types/evaluation.js';
import { YEAR_MAX, YEAR_MIN, isValidMonth, isValidYear } from '../utils/date.js';
import {
  HTTP_STATUS,
  generateCorrelationId,
  getClientIp,
  readBody,
  readIdParam,
  readIntegerQuery,
  requireActor,
  sendServiceFailure,
  sendSuccess,
  sendValidationError,
} from '../utils/response.js';

function toSelections(value: unknown): AnswerSelections {
  const selections: Record<string, string> = {};
  if (isPlainObject(value)) {
    for (const [questionId, answerId] of Object.entries(value)) {
      if (typeof answerId === 'string') {
        selections[questionId] = answerId;
      }
    }
  }
  return selections;
}

function readStringQuery(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Filters must fit their columns: uuid ids, a four-digit year, a calendar month
 */
function validateEvaluationFilters(filters: EvaluationFilters): string[] {
  const errors: string[] = [];

  if (filters.employeeId !== undefined && !isUuid(filters.employeeId)) {
    errors.push('Employee ID must be a valid id');
  }
  if (filters.supervisorId !== undefined && !isUuid(filters.supervisorId)) {
    errors.push('Supervisor ID must be a valid id');
  }
  if (filters.year !== undefined && !isValidYear(filters.year)) {
    errors.push(`Year must be between ${YEAR_MIN} and ${YEAR_MAX}`);
  }
  if (filters.month !== undefined && !isValidMonth(filters.month)) {
    errors.push('Month must be between 1 and 12');
  }

  return errors;
}

export class EvaluationController {
  /**
   * GET /api/evaluations?employeeId=&supervisorId=&year=&month=
   *
   * Supervisors only ever receive their own evaluations.
   */
  async listEvaluations(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'evaluations');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const year = readIntegerQuery(req.query.year);
    const month = readIntegerQuery(req.query.month);
    const filters: EvaluationFilters = {
      employeeId: readStringQuery(req.query.employeeId),
      supervisorId: readStringQuery(req.query.supervisorId),
      year: year ?? undefined,
      month: month ?? undefined,
    };

    const errors = validateEvaluationFilters(filters);
    if (year === null) {
      errors.unshift('Year must be a whole number');
    }
    if (month === null) {
      errors.push('Month must be between 1 and 12');
    }

    if (errors.length > 0) {
      sendValidationError(res, errors);
      return;
    }

    const result = await evaluationService.listEvaluations(actor, filters, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Evaluations retrieved successfully', 'List evaluations', correlationId);
  }

  /**
   * GET /api/evaluations/form/:employeeId
   */
  async getForm(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'evaluation_form');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const employeeId = readIdParam(req, res, 'employeeId', ServiceErrorCode.EmployeeNotFound);
    if (!employeeId) {
      return;
    }

    const result = await evaluationService.getForm(actor, employeeId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Evaluation form retrieved successfully', 'Get form', correlationId);
  }

  /**
   * POST /api/evaluations
   *
   * Request body:
   * {
   *   employeeId: string,
   *   selections: { [questionId]: answerId },
   *   notes?: string
   * }
   */
  async submit(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'evaluation');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const body = readBody(req);
    const selections = body.selections ?? {};
    const errors = [...validateSelections(selections).errors, ...validateNotes(body.notes).errors];

    if (typeof body.employeeId !== 'string' || body.employeeId.trim().length === 0) {
      errors.push('Employee ID is required');
    } else if (!isUuid(body.employeeId.trim())) {
      errors.push('Employee ID must be a valid id');
    }

    if (errors.length > 0) {
      console.warn('[EVALUATION_CONTROLLER] Submission validation failed:', {
        errors,
        correlationId,
        clientIp: getClientIp(req),
        timestamp: new Date().toISOString(),
      });

      sendValidationError(res, errors);
      return;
    }

    const result = await evaluationService.submit(
      actor,
      {
        employeeId: typeof body.employeeId === 'string' ? body.employeeId.trim() : '',
        selections: toSelections(selections),
        notes: typeof body.notes === 'string' ? body.notes : undefined,
      },
      { correlationId }
    );

    this.respond(res, result, HTTP_STATUS.CREATED, 'Evaluation submitted successfully', 'Submit', correlationId);
  }

  /**
   * GET /api/evaluations/:id
   */
  async getEvaluation(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'evaluation');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const evaluationId = readIdParam(req, res, 'id', ServiceErrorCode.EvaluationNotFound);
    if (!evaluationId) {
      return;
    }

    const result = await evaluationService.getEvaluation(actor, evaluationId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Evaluation retrieved successfully', 'Get evaluation', correlationId);
  }

  /**
   * GET /api/dashboard
   */
  async getDashboard(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'dashboard');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const result = await reportService.getDashboard(actor, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Dashboard retrieved successfully', 'Dashboard', correlationId);
  }

  private respond<T>(
    res: Response,
    result: ServiceOperationResult<T>,
    successStatus: number,
    message: string,
    operation: string,
    correlationId: string
  ): void {
    if (result.success) {
      sendSuccess(res, successStatus, message, result.data);
      return;
    }

    console.warn(`[EVALUATION_CONTROLLER] ${operation} failed:`, {
      errorCode: result.errorCode,
      error: result.error,
      executionTimeMs: result.executionTimeMs,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendServiceFailure(res, result);
  }
}

export const evaluationController = new EvaluationController();

export default evaluationController;
