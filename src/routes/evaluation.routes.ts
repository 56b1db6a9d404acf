/**
 * Evaluation Routes Module
 *
 * Every route is open to both roles; ownership is checked by the service.
 *
 * @module routes/evaluation
 */

import { Router } from 'express';

import { evaluationController } from '../controllers/evaluation.controller.js';
import { authenticate } from '../middleware/authenticate.js';

/**
 * @example
 * app.use('/api/evaluations', createEvaluationRouter());
 */
export function createEvaluationRouter(): Router {
  const router = Router();

  console.log('[EVALUATION_ROUTES] Initializing evaluation routes');

  router.use(authenticate);

  router.get('/', evaluationController.listEvaluations.bind(evaluationController));

  /**
   * GET /api/evaluations/form/:employeeId
   *
   * Response data: { employee, questions, period, evaluationsEnabled }
   * 404 for an unknown or malformed employee id
   */
  router.get('/form/:employeeId', evaluationController.getForm.bind(evaluationController));

  /**
   * POST /api/evaluations
   *
   * Response: 201 with the stored evaluation, 409 when evaluations are disabled
   * or no questions exist, 403 for another supervisor's employee
   */
  router.post('/', evaluationController.submit.bind(evaluationController));

  router.get('/:id', evaluationController.getEvaluation.bind(evaluationController));

  return router;
}

/**
 * @example
 * app.use('/api/dashboard', createDashboardRouter());
 */
export function createDashboardRouter(): Router {
  const router = Router();

  router.use(authenticate);
  router.get('/', evaluationController.getDashboard.bind(evaluationController));

  return router;
}

export const evaluationRouter = createEvaluationRouter();

export const dashboardRouter = createDashboardRouter();

export default evaluationRouter;
