/**
 * Employee Controller Module
 *
 * @module controllers/employee
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { rosterService } from '../services/roster.service.js';
import { ServiceErrorCode, SERVICE_ERROR_MESSAGES, type ServiceOperationResult } from '../types/index.js';
import type { EmployeeInput } from '../types/roster.js';
import {
  HTTP_STATUS,
  generateCorrelationId,
  readBody,
  readIdParam,
  readString,
  requireActor,
  sendError,
  sendServiceFailure,
  sendSuccess,
} from '../utils/response.js';

function parseEmployeeInput(req: AuthenticatedRequest): EmployeeInput {
  const body = readBody(req);
  return {
    name: readString(body.name),
    employeeCode: readString(body.employeeCode),
    supervisorId: readString(body.supervisorId),
  };
}

export class EmployeeController {
  /**
   * GET /api/employees
   */
  async listEmployees(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employees');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const result = await rosterService.listEmployees(actor, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Employees retrieved successfully', 'List employees', correlationId);
  }

  /**
   * POST /api/employees
   *
   * Request body: { name: string, employeeCode: string, supervisorId: string }
   */
  async createEmployee(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee');
    const result = await rosterService.createEmployee(parseEmployeeInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.CREATED, 'Employee created successfully', 'Create employee', correlationId);
  }

  /**
   * PUT /api/employees/:id
   */
  async updateEmployee(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee');
    const employeeId = readIdParam(req, res, 'id', ServiceErrorCode.EmployeeNotFound);
    if (!employeeId) {
      return;
    }

    const result = await rosterService.updateEmployee(employeeId, parseEmployeeInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Employee updated successfully', 'Update employee', correlationId);
  }

  /**
   * DELETE /api/employees/:id
   */
  async deleteEmployee(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee');
    const employeeId = readIdParam(req, res, 'id', ServiceErrorCode.EmployeeNotFound);
    if (!employeeId) {
      return;
    }

    const result = await rosterService.deleteEmployee(employeeId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Employee deleted successfully', 'Delete employee', correlationId);
  }

  /**
   * POST /api/employees/import
   *
   * Multipart upload, field `file`, rows of (name, code, supervisor email).
   */
  async importEmployees(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee_import');

    if (!req.file) {
      sendError(
        res,
        HTTP_STATUS.BAD_REQUEST,
        ServiceErrorCode.InvalidCsv,
        SERVICE_ERROR_MESSAGES[ServiceErrorCode.InvalidCsv]
      );
      return;
    }

    console.log('[EMPLOYEE_CONTROLLER] Import received:', {
      filename: req.file.originalname,
      size: req.file.size,
      userId: req.user?.userId,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    const result = await rosterService.importEmployees(req.file.buffer.toString('utf8'), correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Import finished', 'Import employees', correlationId);
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

    console.warn(`[EMPLOYEE_CONTROLLER] ${operation} failed:`, {
      errorCode: result.errorCode,
      error: result.error,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendServiceFailure(res, result);
  }
}

export const employeeController = new EmployeeController();

export default employeeController;
