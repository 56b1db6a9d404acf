/**
 * Question Service Module
 *
 * Manager-maintained bank of evaluation questions and their scored answers.
 * Reads always hit the database so the evaluation form reflects the bank at
 * request time.
 *
 * @module services/question
 */

import crypto from 'crypto';

import { executeTransaction, queryMany, queryOne } from '../db/index.js';
import { ServiceErrorCode, type ServiceOperationResult } from '../types/index.js';
import {
  validateAnswerInput,
  validateQuestionInput,
  type Answer,
  type AnswerDeletionResult,
  type AnswerInput,
  type Question,
  type QuestionDeletionResult,
  type QuestionInput,
} from '../types/question.js';
import { errorMessage, fail, failFromError, succeed, validationFailure } from './result.js';

interface QuestionRecord {
  readonly id: string;
  readonly question_text: string;
  readonly is_active: boolean;
  readonly order_index: number;
  readonly created_at: Date;
  readonly updated_at: Date;
}

interface AnswerRecord {
  readonly id: string;
  readonly question_id: string;
  readonly answer_text: string;
  readonly score: number | null;
  readonly order_index: number;
}

const QUESTION_COLUMNS = 'id, question_text, is_active, order_index, created_at, updated_at';
const ANSWER_COLUMNS = 'id, question_id, answer_text, score, order_index';

function mapAnswerRecord(record: AnswerRecord): Answer {
  return {
    id: record.id,
    questionId: record.question_id,
    answerText: record.answer_text,
    score: record.score,
    orderIndex: record.order_index,
  };
}

function mapQuestionRecord(record: QuestionRecord, answers: Answer[]): Question {
  return {
    id: record.id,
    questionText: record.question_text,
    isActive: record.is_active,
    orderIndex: record.order_index,
    answers,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

export class QuestionService {
  /**
   * Load questions with their answers
   *
   * Questions are ordered by order_index, then created_at, then id; answers by
   * order_index, then id.
   *
   * @throws DatabaseError on query failure
   */
  async fetchQuestions(options: { readonly activeOnly: boolean; readonly correlationId?: string }): Promise<Question[]> {
    const queryOptions = { correlationId: options.correlationId, operation: 'fetch_questions' };

    const questionRecords = await queryMany<QuestionRecord>(
      `SELECT ${QUESTION_COLUMNS}
       FROM evaluation_questions
       ${options.activeOnly ? 'WHERE is_active = TRUE' : ''}
       ORDER BY order_index ASC, created_at ASC, id ASC`,
      [],
      queryOptions
    );

    if (questionRecords.length === 0) {
      return [];
    }

    const answerRecords = await queryMany<AnswerRecord>(
      `SELECT ${ANSWER_COLUMNS}
       FROM question_answers
       WHERE question_id = ANY($1)
       ORDER BY order_index ASC, id ASC`,
      [questionRecords.map((record) => record.id)],
      { ...queryOptions, operation: 'fetch_answers' }
    );

    const answersByQuestion = new Map<string, Answer[]>();
    for (const record of answerRecords) {
      const answers = answersByQuestion.get(record.question_id) ?? [];
      answers.push(mapAnswerRecord(record));
      answersByQuestion.set(record.question_id, answers);
    }

    return questionRecords.map((record) => mapQuestionRecord(record, answersByQuestion.get(record.id) ?? []));
  }

  /**
   * Active questions as shown on the evaluation form
   */
  async listActive(correlationId?: string): Promise<ServiceOperationResult<Question[]>> {
    return this.list(true, correlationId);
  }

  /**
   * Every question, active or not, for the management screen
   */
  async listAll(correlationId?: string): Promise<ServiceOperationResult<Question[]>> {
    return this.list(false, correlationId);
  }

  async getQuestion(questionId: string, correlationId?: string): Promise<ServiceOperationResult<Question>> {
    const startTime = Date.now();
    const cid = correlationId || `get_question_${Date.now()}`;

    try {
      const record = await queryOne<QuestionRecord>(
        `SELECT ${QUESTION_COLUMNS} FROM evaluation_questions WHERE id = $1`,
        [questionId],
        { correlationId: cid, operation: 'fetch_question' }
      );

      if (!record) {
        return fail(ServiceErrorCode.QuestionNotFound, startTime);
      }

      const answers = await this.fetchAnswers(questionId, cid);
      return succeed(mapQuestionRecord(record, answers), startTime);
    } catch (error) {
      return this.queryFailure(
        'Failed to fetch question',
        error,
        startTime,
        cid,
        { questionId },
        ServiceErrorCode.QuestionNotFound
      );
    }
  }

  async create(input: QuestionInput, correlationId?: string): Promise<ServiceOperationResult<Question>> {
    const startTime = Date.now();
    const cid = correlationId || `create_question_${Date.now()}`;

    const validation = validateQuestionInput(input);
    if (!validation.isValid) {
      console.warn('[QUESTION_SERVICE] Question validation failed:', {
        errors: validation.errors,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });
      return validationFailure(validation.errors, startTime);
    }

    try {
      const now = new Date();
      const record = await queryOne<QuestionRecord>(
        `INSERT INTO evaluation_questions (id, question_text, is_active, order_index, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${QUESTION_COLUMNS}`,
        [crypto.randomUUID(), input.questionText.trim(), input.isActive ?? true, input.orderIndex ?? 0, now, now],
        { correlationId: cid, operation: 'create_question' }
      );

      if (!record) {
        return fail(ServiceErrorCode.PersistenceError, startTime);
      }

      console.log('[QUESTION_SERVICE] Question created:', {
        questionId: record.id,
        isActive: record.is_active,
        orderIndex: record.order_index,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapQuestionRecord(record, []), startTime);
    } catch (error) {
      return this.queryFailure('Question creation failed', error, startTime, cid);
    }
  }

  /**
   * Replace the text; the active flag and order keep their values when omitted
   */
  async update(
    questionId: string,
    input: QuestionInput,
    correlationId?: string
  ): Promise<ServiceOperationResult<Question>> {
    const startTime = Date.now();
    const cid = correlationId || `update_question_${Date.now()}`;

    const validation = validateQuestionInput(input);
    if (!validation.isValid) {
      return validationFailure(validation.errors, startTime);
    }

    try {
      const record = await queryOne<QuestionRecord>(
        `UPDATE evaluation_questions
         SET question_text = $2,
             is_active = COALESCE($3, is_active),
             order_index = COALESCE($4, order_index),
             updated_at = $5
         WHERE id = $1
         RETURNING ${QUESTION_COLUMNS}`,
        [questionId, input.questionText.trim(), input.isActive ?? null, input.orderIndex ?? null, new Date()],
        { correlationId: cid, operation: 'update_question' }
      );

      if (!record) {
        return fail(ServiceErrorCode.QuestionNotFound, startTime);
      }

      const answers = await this.fetchAnswers(questionId, cid);

      console.log('[QUESTION_SERVICE] Question updated:', {
        questionId,
        isActive: record.is_active,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapQuestionRecord(record, answers), startTime);
    } catch (error) {
      return this.queryFailure(
        'Question update failed',
        error,
        startTime,
        cid,
        { questionId },
        ServiceErrorCode.QuestionNotFound
      );
    }
  }

  /**
   * Delete a question with its answers and every response that used it
   */
  async delete(questionId: string, correlationId?: string): Promise<ServiceOperationResult<QuestionDeletionResult>> {
    const startTime = Date.now();
    const cid = correlationId || `delete_question_${Date.now()}`;

    try {
      const result = await executeTransaction<QuestionDeletionResult | null>(
        async (client) => {
          const existing = await client.query('SELECT id FROM evaluation_questions WHERE id = $1 FOR UPDATE', [
            questionId,
          ]);

          if (existing.rows.length === 0) {
            return null;
          }

          const responses = await client.query('DELETE FROM evaluation_responses WHERE question_id = $1', [
            questionId,
          ]);
          const answers = await client.query('DELETE FROM question_answers WHERE question_id = $1', [questionId]);
          await client.query('DELETE FROM evaluation_questions WHERE id = $1', [questionId]);

          return {
            questionId,
            deletedAnswers: answers.rowCount ?? 0,
            deletedResponses: responses.rowCount ?? 0,
          };
        },
        { correlationId: cid, operation: 'delete_question' }
      );

      if (!result) {
        return fail(ServiceErrorCode.QuestionNotFound, startTime);
      }

      console.log('[QUESTION_SERVICE] Question deleted:', {
        ...result,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(result, startTime);
    } catch (error) {
      return this.queryFailure(
        'Question deletion failed',
        error,
        startTime,
        cid,
        { questionId },
        ServiceErrorCode.QuestionNotFound
      );
    }
  }

  async addAnswer(
    questionId: string,
    input: AnswerInput,
    correlationId?: string
  ): Promise<ServiceOperationResult<Answer>> {
    const startTime = Date.now();
    const cid = correlationId || `add_answer_${Date.now()}`;

    const validation = validateAnswerInput(input);
    if (!validation.isValid) {
      return validationFailure(validation.errors, startTime);
    }

    try {
      const question = await queryOne<{ id: string }>('SELECT id FROM evaluation_questions WHERE id = $1', [questionId], {
        correlationId: cid,
        operation: 'fetch_question',
      });

      if (!question) {
        return fail(ServiceErrorCode.QuestionNotFound, startTime);
      }

      const record = await queryOne<AnswerRecord>(
        `INSERT INTO question_answers (id, question_id, answer_text, score, order_index)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${ANSWER_COLUMNS}`,
        [crypto.randomUUID(), questionId, input.answerText.trim(), input.score ?? null, input.orderIndex ?? 0],
        { correlationId: cid, operation: 'create_answer' }
      );

      if (!record) {
        return fail(ServiceErrorCode.PersistenceError, startTime);
      }

      console.log('[QUESTION_SERVICE] Answer added:', {
        questionId,
        answerId: record.id,
        score: record.score,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapAnswerRecord(record), startTime);
    } catch (error) {
      return this.queryFailure(
        'Answer creation failed',
        error,
        startTime,
        cid,
        { questionId },
        ServiceErrorCode.QuestionNotFound
      );
    }
  }

  /**
   * Replace an answer's text and score. Responses already submitted keep the
   * score they copied.
   */
  async updateAnswer(answerId: string, input: AnswerInput, correlationId?: string): Promise<ServiceOperationResult<Answer>> {
    const startTime = Date.now();
    const cid = correlationId || `update_answer_${Date.now()}`;

    const validation = validateAnswerInput(input);
    if (!validation.isValid) {
      return validationFailure(validation.errors, startTime);
    }

    try {
      const record = await queryOne<AnswerRecord>(
        `UPDATE question_answers
         SET answer_text = $2, score = $3, order_index = COALESCE($4, order_index)
         WHERE id = $1
         RETURNING ${ANSWER_COLUMNS}`,
        [answerId, input.answerText.trim(), input.score ?? null, input.orderIndex ?? null],
        { correlationId: cid, operation: 'update_answer' }
      );

      if (!record) {
        return fail(ServiceErrorCode.AnswerNotFound, startTime);
      }

      console.log('[QUESTION_SERVICE] Answer updated:', {
        answerId,
        score: record.score,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapAnswerRecord(record), startTime);
    } catch (error) {
      return this.queryFailure(
        'Answer update failed',
        error,
        startTime,
        cid,
        { answerId },
        ServiceErrorCode.AnswerNotFound
      );
    }
  }

  async deleteAnswer(answerId: string, correlationId?: string): Promise<ServiceOperationResult<AnswerDeletionResult>> {
    const startTime = Date.now();
    const cid = correlationId || `delete_answer_${Date.now()}`;

    try {
      const result = await executeTransaction<AnswerDeletionResult | null>(
        async (client) => {
          const existing = await client.query('SELECT id FROM question_answers WHERE id = $1 FOR UPDATE', [answerId]);

          if (existing.rows.length === 0) {
            return null;
          }

          const responses = await client.query('DELETE FROM evaluation_responses WHERE answer_id = $1', [answerId]);
          await client.query('DELETE FROM question_answers WHERE id = $1', [answerId]);

          return { answerId, deletedResponses: responses.rowCount ?? 0 };
        },
        { correlationId: cid, operation: 'delete_answer' }
      );

      if (!result) {
        return fail(ServiceErrorCode.AnswerNotFound, startTime);
      }

      console.log('[QUESTION_SERVICE] Answer deleted:', {
        ...result,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(result, startTime);
    } catch (error) {
      return this.queryFailure(
        'Answer deletion failed',
        error,
        startTime,
        cid,
        { answerId },
        ServiceErrorCode.AnswerNotFound
      );
    }
  }

  private async list(activeOnly: boolean, correlationId?: string): Promise<ServiceOperationResult<Question[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_questions_${Date.now()}`;

    try {
      const questions = await this.fetchQuestions({ activeOnly, correlationId: cid });
      return succeed(questions, startTime);
    } catch (error) {
      return this.queryFailure('Failed to list questions', error, startTime, cid, { activeOnly });
    }
  }

  private async fetchAnswers(questionId: string, correlationId: string): Promise<Answer[]> {
    const records = await queryMany<AnswerRecord>(
      `SELECT ${ANSWER_COLUMNS}
       FROM question_answers
       WHERE question_id = $1
       ORDER BY order_index ASC, id ASC`,
      [questionId],
      { correlationId, operation: 'fetch_answers' }
    );

    return records.map(mapAnswerRecord);
  }

  /**
   * Log a caught query error and turn it into a result; a malformed id answers
   * `notFoundCode` when one is given
   */
  private queryFailure<T>(
    message: string,
    error: unknown,
    startTime: number,
    correlationId: string,
    context?: Record<string, unknown>,
    notFoundCode?: ServiceErrorCode
  ): ServiceOperationResult<T> {
    console.error(`[QUESTION_SERVICE] ${message}:`, {
      ...context,
      error: errorMessage(error),
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return failFromError(error, startTime, notFoundCode);
  }
}

export const questionService = new QuestionService();

export default questionService;
