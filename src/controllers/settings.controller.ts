/**
 * Settings Controller Module
 *
 * @module controllers/settings
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { settingsService } from '../services/settings.service.js';
import { ServiceErrorCode, SERVICE_ERROR_MESSAGES } from '../types/index.js';
import { HTTP_STATUS, generateCorrelationId, sendError, sendSuccess } from '../utils/response.js';

function sendPersistenceError(res: Response, operation: string, error: unknown, correlationId: string): void {
  console.error(`[SETTINGS_CONTROLLER] ${operation} failed:`, {
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

export class SettingsController {
  /**
   * GET /api/settings
   */
  async getSettings(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'settings');

    try {
      const settings = await settingsService.getSettings(correlationId);
      sendSuccess(res, HTTP_STATUS.OK, 'Settings retrieved successfully', settings);
    } catch (error) {
      sendPersistenceError(res, 'Get settings', error, correlationId);
    }
  }

  /**
   * POST /api/settings/toggle-evaluations
   */
  async toggleEvaluations(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'settings');

    try {
      const settings = await settingsService.toggle(correlationId);

      console.log('[SETTINGS_CONTROLLER] Evaluations toggled:', {
        evaluationsEnabled: settings.evaluationsEnabled,
        userId: req.user?.userId,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      sendSuccess(
        res,
        HTTP_STATUS.OK,
        settings.evaluationsEnabled ? 'Evaluations enabled' : 'Evaluations disabled',
        settings
      );
    } catch (error) {
      sendPersistenceError(res, 'Toggle evaluations', error, correlationId);
    }
  }
}

export const settingsController = new SettingsController();

export default settingsController;
