/**
 * Question Bank Routes Module
 *
 * @module routes/question
 */

import { Router } from 'express';

import { questionController } from '../controllers/question.controller.js';
import { authenticate } from '../middleware/authenticate.js';
import { requireManager } from '../middleware/authorize.js';

/**
 * Questions and their answers
 *
 * @example
 * app.use('/api/questions', createQuestionRouter());
 */
export function createQuestionRouter(): Router {
  const router = Router();

  console.log('[QUESTION_ROUTES] Initializing question routes');

  router.use(authenticate);

  /**
   * GET /api/questions/active
   *
   * Active questions with answers, as shown on the evaluation form.
   *
   * Authorization: any authenticated user
   */
  router.get('/active', questionController.listActive.bind(questionController));

  router.get('/', requireManager, questionController.listAll.bind(questionController));
  router.post('/', requireManager, questionController.create.bind(questionController));
  router.get('/:id', requireManager, questionController.getQuestion.bind(questionController));
  router.put('/:id', requireManager, questionController.update.bind(questionController));

  /**
   * DELETE /api/questions/:id
   *
   * Response data: { questionId, deletedAnswers, deletedResponses }
   */
  router.delete('/:id', requireManager, questionController.delete.bind(questionController));

  router.post('/:id/answers', requireManager, questionController.addAnswer.bind(questionController));

  return router;
}

/**
 * Individual answers, addressed by their own id
 *
 * @example
 * app.use('/api/answers', createAnswerRouter());
 */
export function createAnswerRouter(): Router {
  const router = Router();

  router.use(authenticate, requireManager);

  router.put('/:id', questionController.updateAnswer.bind(questionController));
  router.delete('/:id', questionController.deleteAnswer.bind(questionController));

  return router;
}

export const questionRouter = createQuestionRouter();

export const answerRouter = createAnswerRouter();

export default questionRouter;
