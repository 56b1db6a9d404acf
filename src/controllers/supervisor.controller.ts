/**
 * Supervisor Controller Module
 *
 * Manager-only administration of supervisor accounts.
 *
 * @module controllers/supervisor
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { rosterService } from '../services/roster.service.js';
import { ServiceErrorCode, type ServiceOperationResult } from '../types/index.js';
import {
  HTTP_STATUS,
  generateCorrelationId,
  readBody,
  readIdParam,
  readString,
  requireActor,
  sendServiceFailure,
  sendSuccess,
} from '../utils/response.js';

export class SupervisorController {
  /**
   * GET /api/supervisors
   */
  async listSupervisors(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'supervisors');
    const result = await rosterService.listSupervisors(correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Supervisors retrieved successfully', 'List supervisors', correlationId);
  }

  /**
   * POST /api/supervisors
   *
   * Request body: { name: string, email: string, password?: string }
   *
   * When no password is given the generated one is returned once as
   * `temporaryPassword`.
   */
  async createSupervisor(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'supervisor');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const body = readBody(req);
    const password = typeof body.password === 'string' && body.password.length > 0 ? body.password : undefined;

    const result = await rosterService.createSupervisor(
      actor,
      { name: readString(body.name), email: readString(body.email), password },
      correlationId
    );
    this.respond(res, result, HTTP_STATUS.CREATED, 'Supervisor created successfully', 'Create supervisor', correlationId);
  }

  /**
   * PUT /api/supervisors/:id
   */
  async updateSupervisor(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'supervisor');
    const supervisorId = readIdParam(req, res, 'id', ServiceErrorCode.SupervisorNotFound);
    if (!supervisorId) {
      return;
    }

    const body = readBody(req);
    const result = await rosterService.updateSupervisor(
      supervisorId,
      { name: readString(body.name), email: readString(body.email) },
      correlationId
    );
    this.respond(res, result, HTTP_STATUS.OK, 'Supervisor updated successfully', 'Update supervisor', correlationId);
  }

  /**
   * PUT /api/supervisors/:id/password
   *
   * Request body: { newPassword: string, confirmPassword: string }
   */
  async setPassword(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'supervisor_password');
    const supervisorId = readIdParam(req, res, 'id', ServiceErrorCode.SupervisorNotFound);
    if (!supervisorId) {
      return;
    }

    const body = readBody(req);
    const result = await rosterService.setSupervisorPassword(
      supervisorId,
      { newPassword: readString(body.newPassword), confirmPassword: readString(body.confirmPassword) },
      correlationId
    );
    this.respond(res, result, HTTP_STATUS.OK, 'Password updated successfully', 'Set password', correlationId);
  }

  /**
   * DELETE /api/supervisors/:id
   *
   * Removes the supervisor's employees and all related evaluations.
   */
  async deleteSupervisor(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'supervisor');
    const actor = requireActor(req, res);
    if (!actor) {
      return;
    }

    const supervisorId = readIdParam(req, res, 'id', ServiceErrorCode.SupervisorNotFound);
    if (!supervisorId) {
      return;
    }

    const result = await rosterService.deleteSupervisor(actor, supervisorId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Supervisor deleted successfully', 'Delete supervisor', correlationId);
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

    console.warn(`[SUPERVISOR_CONTROLLER] ${operation} failed:`, {
      errorCode: result.errorCode,
      error: result.error,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendServiceFailure(res, result);
  }
}

export const supervisorController = new SupervisorController();

export default supervisorController;
