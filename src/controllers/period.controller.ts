/**
 * Period Controller Module
 *
 * Period listing, the current period and the per-period CSV export.
 *
 * @module controllers/period
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { periodService } from '../services/period.service.js';
import { reportService } from '../services/report.service.js';
import { ServiceErrorCode, SERVICE_ERROR_MESSAGES } from '../types/index.js';
import {
  HTTP_STATUS,
  generateCorrelationId,
  readIdParam,
  sendError,
  sendServiceFailure,
  sendSuccess,
} from '../utils/response.js';

export class PeriodController {
  /**
   * GET /api/periods
   */
  async listPeriods(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'periods');
    const result = await periodService.listPeriods(correlationId);

    if (!result.success) {
      sendServiceFailure(res, result);
      return;
    }

    sendSuccess(res, HTTP_STATUS.OK, 'Periods retrieved successfully', result.data);
  }

  /**
   * GET /api/periods/current
   */
  async getCurrentPeriod(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'period');

    try {
      const period = await periodService.getOrCreateCurrent(new Date(), correlationId);
      sendSuccess(res, HTTP_STATUS.OK, 'Current period retrieved successfully', period);
    } catch (error) {
      console.error('[PERIOD_CONTROLLER] Current period lookup failed:', {
        error: error instanceof Error ? error.message : String(error),
        correlationId,
        timestamp: new Date().toISOString(),
      });

      sendError(
        res,
        HTTP_STATUS.INTERNAL_SERVER_ERROR,
        ServiceErrorCode.PersistenceError,
        SERVICE_ERROR_MESSAGES[ServiceErrorCode.PersistenceError]
      );
    }
  }

  /**
   * GET /api/periods/:id/export
   *
   * Responds with the CSV file as an attachment.
   */
  async exportPeriod(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'export');
    const periodId = readIdParam(req, res, 'id', ServiceErrorCode.PeriodNotFound);
    if (!periodId) {
      return;
    }

    const result = await reportService.exportCsv(periodId, correlationId);

    if (!result.success || !result.data) {
      console.warn('[PERIOD_CONTROLLER] Export failed:', {
        periodId,
        errorCode: result.errorCode,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      sendServiceFailure(res, result);
      return;
    }

    const { filename, content } = result.data;

    res.status(HTTP_STATUS.OK);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.send(content);
  }
}

export const periodController = new PeriodController();

export default periodController;
