/**
 * Period Routes Module
 *
 * @module routes/period
 */

import { Router } from 'express';

import { periodController } from '../controllers/period.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireManager } from '../middleware/authorize.js';

export function createPeriodRouter(): Router {
  const router = Router();

  router.use(authenticate);

  router.get('/', requireManager, periodController.listPeriods.bind(periodController));
  router.get('/current', periodController.getCurrentPeriod.bind(periodController));

  /**
   * GET /api/periods/:id/export
   *
   * Response: text/csv attachment named evaluations_<year>_<MM>.csv
   *
   * Authorization: Manager
   */
  router.get('/:id/export', requireManager, periodController.exportPeriod.bind(periodController));

  return router;
}

export const periodRouter = createPeriodRouter();

export default periodRouter;
