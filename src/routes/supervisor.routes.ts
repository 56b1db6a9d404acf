/**
 * Supervisor Routes Module
 *
 * @module routes/supervisor
 */

import { Router } from 'express';

import { supervisorController } from '../controllers/supervisor.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireManager } from '../middleware/authorize.js';

export function createSupervisorRouter(): Router {
  const router = Router();

  router.use(authenticate, requireManager);

  router.get('/', supervisorController.listSupervisors.bind(supervisorController));
  router.post('/', supervisorController.createSupervisor.bind(supervisorController));
  router.put('/:id', supervisorController.updateSupervisor.bind(supervisorController));
  router.put('/:id/password', supervisorController.setPassword.bind(supervisorController));

  /**
   * DELETE /api/supervisors/:id
   *
   * Response data: { supervisorId, deletedEmployees, deletedEvaluations, deletedResponses }
   */
  router.delete('/:id', supervisorController.deleteSupervisor.bind(supervisorController));

  return router;
}

export const supervisorRouter = createSupervisorRouter();

export default supervisorRouter;
