/**
 * Settings Routes Module
 *
 * @module routes/settings
 */

import { Router } from 'express';

import { settingsController } from '../controllers/settings.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireManager } from '../middleware/authorize.js';

export function createSettingsRouter(): Router {
  const router = Router();

  router.use(authenticate);

  router.get('/', settingsController.getSettings.bind(settingsController));

  /**
   * POST /api/settings/toggle-evaluations
   *
   * Opens or closes evaluation submission for everyone.
   *
   * Authorization: Manager
   */
  router.post('/toggle-evaluations', requireManager, settingsController.toggleEvaluations.bind(settingsController));

  return router;
}

export const settingsRouter = createSettingsRouter();

export default settingsRouter;
