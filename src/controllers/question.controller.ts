/**
 * Question Controller Module
 *
 * HTTP adapter for the question bank: questions, their answers and the active
 * set shown on the evaluation form.
 *
 * @module controllers/question
 */

import type { NextFunction, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { questionService } from '../services/question.service.js';
import { ServiceErrorCode, type ServiceOperationResult } from '../types/index.js';
import type { AnswerInput, QuestionInput } from '../types/question.js';
import {
  HTTP_STATUS,
  generateCorrelationId,
  readBody,
  readIdParam,
  readOptionalBoolean,
  readOptionalNumber,
  readString,
  sendServiceFailure,
  sendSuccess,
} from '../utils/response.js';

function parseQuestionInput(req: AuthenticatedRequest): QuestionInput {
  const body = readBody(req);
  return {
    questionText: readString(body.questionText),
    isActive: readOptionalBoolean(body.isActive),
    orderIndex: readOptionalNumber(body.orderIndex),
  };
}

function parseAnswerInput(req: AuthenticatedRequest): AnswerInput {
  const body = readBody(req);
  return {
    answerText: readString(body.answerText),
    score: readOptionalNumber(body.score) ?? null,
    orderIndex: readOptionalNumber(body.orderIndex),
  };
}

export class QuestionController {
  /**
   * GET /api/questions
   */
  async listAll(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'questions');
    const result = await questionService.listAll(correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Questions retrieved successfully', 'List questions', correlationId);
  }

  /**
   * GET /api/questions/active
   */
  async listActive(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'questions');
    const result = await questionService.listActive(correlationId);
    this.respond(
      res,
      result,
      HTTP_STATUS.OK,
      'Active questions retrieved successfully',
      'List active questions',
      correlationId
    );
  }

  /**
   * GET /api/questions/:id
   */
  async getQuestion(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'question');
    const questionId = readIdParam(req, res, 'id', ServiceErrorCode.QuestionNotFound);
    if (!questionId) {
      return;
    }

    const result = await questionService.getQuestion(questionId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Question retrieved successfully', 'Get question', correlationId);
  }

  /**
   * POST /api/questions
   *
   * Request body: { questionText: string, isActive?: boolean, orderIndex?: number }
   */
  async create(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'question');
    const result = await questionService.create(parseQuestionInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.CREATED, 'Question created successfully', 'Create question', correlationId);
  }

  /**
   * PUT /api/questions/:id
   */
  async update(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'question');
    const questionId = readIdParam(req, res, 'id', ServiceErrorCode.QuestionNotFound);
    if (!questionId) {
      return;
    }

    const result = await questionService.update(questionId, parseQuestionInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Question updated successfully', 'Update question', correlationId);
  }

  /**
   * DELETE /api/questions/:id
   *
   * Also removes the question's answers and every response that used it.
   */
  async delete(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'question');
    const questionId = readIdParam(req, res, 'id', ServiceErrorCode.QuestionNotFound);
    if (!questionId) {
      return;
    }

    const result = await questionService.delete(questionId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Question deleted successfully', 'Delete question', correlationId);
  }

  /**
   * POST /api/questions/:id/answers
   *
   * Request body: { answerText: string, score?: number | null, orderIndex?: number }
   */
  async addAnswer(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'answer');
    const questionId = readIdParam(req, res, 'id', ServiceErrorCode.QuestionNotFound);
    if (!questionId) {
      return;
    }

    const result = await questionService.addAnswer(questionId, parseAnswerInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.CREATED, 'Answer added successfully', 'Add answer', correlationId);
  }

  /**
   * PUT /api/answers/:id
   */
  async updateAnswer(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'answer');
    const answerId = readIdParam(req, res, 'id', ServiceErrorCode.AnswerNotFound);
    if (!answerId) {
      return;
    }

    const result = await questionService.updateAnswer(answerId, parseAnswerInput(req), correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Answer updated successfully', 'Update answer', correlationId);
  }

  /**
   * DELETE /api/answers/:id
   */
  async deleteAnswer(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'answer');
    const answerId = readIdParam(req, res, 'id', ServiceErrorCode.AnswerNotFound);
    if (!answerId) {
      return;
    }

    const result = await questionService.deleteAnswer(answerId, correlationId);
    this.respond(res, result, HTTP_STATUS.OK, 'Answer deleted successfully', 'Delete answer', correlationId);
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

    console.warn(`[QUESTION_CONTROLLER] ${operation} failed:`, {
      errorCode: result.errorCode,
      error: result.error,
      executionTimeMs: result.executionTimeMs,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendServiceFailure(res, result);
  }
}

export const questionController = new QuestionController();

export default questionController;
