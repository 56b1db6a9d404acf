/**
 * Evaluation Service Module
 *
 * Submission workflow for supervisor evaluations and the read side used by
 * listings and the detail view.
 *
 * A submission goes FORM_REQUESTED -> VALIDATED -> PERSISTED, or ends REJECTED
 * with the first failing check: employee lookup, access, gate, question set.
 * Evaluations are write-once.
 *
 * @module services/evaluation
 */

import crypto from 'crypto';

import { executeTransaction, queryMany, queryOne } from '../db/index.js';
import { ServiceErrorCode, UserRole, type Actor, type ServiceOperationResult } from '../types/index.js';
import {
  SubmissionState,
  validateNotes,
  validateSelections,
  type AnswerSelections,
  type BoundSelection,
  type Evaluation,
  type EvaluationDetail,
  type EvaluationFilters,
  type EvaluationForm,
  type EvaluationResponse,
  type EvaluationResponseDetail,
  type EvaluationSummary,
  type SubmitEvaluationRequest,
} from '../types/evaluation.js';
import type { Question } from '../types/question.js';
import { resolveYearMonth } from '../utils/date.js';
import { periodService } from './period.service.js';
import { questionService } from './question.service.js';
import { errorMessage, fail, failFromError, succeed, validationFailure } from './result.js';
import { evaluationScore } from './score.js';
import { settingsService } from './settings.service.js';

interface EmployeeRecord {
  readonly id: string;
  readonly name: string;
  readonly employee_code: string;
  readonly supervisor_id: string;
}

interface EvaluationRecord {
  readonly id: string;
  readonly supervisor_id: string;
  readonly employee_id: string;
  readonly period_id: string | null;
  readonly notes: string | null;
  readonly year: number;
  readonly month: number;
  readonly created_at: Date;
}

interface EvaluationSummaryRecord extends EvaluationRecord {
  readonly employee_name: string;
  readonly employee_code: string;
  readonly supervisor_name: string;
  readonly supervisor_email: string;
}

interface EvaluationResponseRecord {
  readonly id: string;
  readonly evaluation_id: string;
  readonly question_id: string;
  readonly answer_id: string;
  readonly score: number | null;
  readonly created_at: Date;
}

interface EvaluationResponseDetailRecord extends EvaluationResponseRecord {
  readonly question_text: string;
  readonly answer_text: string;
}

export interface SubmitOptions {
  readonly correlationId?: string;

  /**
   * Clock used for the evaluation's year and month
   */
  readonly now?: Date;
}

export interface FetchEvaluationsOptions {
  readonly limit?: number;
  readonly correlationId?: string;
}

const SUMMARY_SELECT = `
  SELECT e.id, e.supervisor_id, e.employee_id, e.period_id, e.notes, e.year, e.month, e.created_at,
         emp.name AS employee_name, emp.employee_code,
         s.name AS supervisor_name, s.email AS supervisor_email
  FROM evaluations e
  JOIN employees emp ON emp.id = e.employee_id
  JOIN supervisors s ON s.id = e.supervisor_id`;

const RESPONSE_COLUMNS = 'id, evaluation_id, question_id, answer_id, score, created_at';

function mapResponseRecord(record: EvaluationResponseRecord): EvaluationResponse {
  return {
    id: record.id,
    evaluationId: record.evaluation_id,
    questionId: record.question_id,
    answerId: record.answer_id,
    score: record.score,
    createdAt: record.created_at,
  };
}

function mapEvaluationRecord(record: EvaluationRecord, responses: EvaluationResponse[]): Evaluation {
  return {
    id: record.id,
    supervisorId: record.supervisor_id,
    employeeId: record.employee_id,
    periodId: record.period_id,
    notes: record.notes,
    year: record.year,
    month: record.month,
    createdAt: record.created_at,
    responses,
    score: evaluationScore(responses),
  };
}

function mapSummaryRecord(record: EvaluationSummaryRecord, responses: EvaluationResponse[]): EvaluationSummary {
  return {
    ...mapEvaluationRecord(record, responses),
    employeeName: record.employee_name,
    employeeCode: record.employee_code,
    supervisorName: record.supervisor_name,
    supervisorEmail: record.supervisor_email,
  };
}

/**
 * Managers may evaluate anyone; supervisors only their own employees
 */
export function canEvaluate(actor: Actor, employee: { readonly supervisorId: string }): boolean {
  return actor.role === UserRole.Manager || employee.supervisorId === actor.userId;
}

/**
 * Keep, for each active question, the selected answer only if it belongs to
 * that question. Unknown questions, foreign answers and unanswered questions
 * produce no binding.
 */
export function bindSelections(questions: readonly Question[], selections: AnswerSelections): BoundSelection[] {
  const bound: BoundSelection[] = [];

  for (const question of questions) {
    const answerId = selections[question.id];
    if (answerId === undefined) {
      continue;
    }

    if (question.answers.some((answer) => answer.id === answerId)) {
      bound.push({ questionId: question.id, answerId });
    }
  }

  return bound;
}

/**
 * Supervisors are always restricted to their own evaluations
 */
export function scopeFilters(actor: Actor, filters: EvaluationFilters): EvaluationFilters {
  return actor.role === UserRole.Manager ? filters : { ...filters, supervisorId: actor.userId };
}

export class EvaluationService {
  /**
   * Validate and persist one evaluation with its responses
   *
   * The evaluation row and every response are written in one transaction. Each
   * response copies its answer's score inside the insert itself, so the stored
   * score is the one current at commit.
   */
  async submit(
    actor: Actor,
    request: SubmitEvaluationRequest,
    options?: SubmitOptions
  ): Promise<ServiceOperationResult<Evaluation>> {
    const startTime = Date.now();
    const cid = options?.correlationId || `submit_evaluation_${Date.now()}`;
    const now = options?.now ?? new Date();

    console.log('[EVALUATION_SERVICE] Submission received:', {
      state: SubmissionState.FormRequested,
      employeeId: request.employeeId,
      evaluatorId: actor.userId,
      evaluatorRole: actor.role,
      selectionCount: Object.keys(request.selections).length,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    const validationErrors = [...validateSelections(request.selections).errors, ...validateNotes(request.notes).errors];
    if (!request.employeeId || request.employeeId.trim().length === 0) {
      validationErrors.push('Employee ID is required');
    }

    if (validationErrors.length > 0) {
      this.logRejection(ServiceErrorCode.ValidationError, request.employeeId, cid, { errors: validationErrors });
      return validationFailure(validationErrors, startTime);
    }

    try {
      const employee = await this.fetchEmployee(request.employeeId, cid);
      if (!employee) {
        this.logRejection(ServiceErrorCode.EmployeeNotFound, request.employeeId, cid);
        return fail(ServiceErrorCode.EmployeeNotFound, startTime);
      }

      if (!canEvaluate(actor, { supervisorId: employee.supervisor_id })) {
        this.logRejection(ServiceErrorCode.Forbidden, request.employeeId, cid, { evaluatorId: actor.userId });
        return fail(ServiceErrorCode.Forbidden, startTime);
      }

      const enabled = await settingsService.isEvaluationsEnabled(cid);
      if (!enabled) {
        this.logRejection(ServiceErrorCode.EvaluationsDisabled, request.employeeId, cid);
        return fail(ServiceErrorCode.EvaluationsDisabled, startTime);
      }

      const questions = await questionService.fetchQuestions({ activeOnly: true, correlationId: cid });
      if (questions.length === 0) {
        this.logRejection(ServiceErrorCode.NoQuestionsConfigured, request.employeeId, cid);
        return fail(ServiceErrorCode.NoQuestionsConfigured, startTime);
      }

      const bound = bindSelections(questions, request.selections);
      const { year, month } = resolveYearMonth(now);
      const period = await periodService.getOrCreateCurrent(now, cid);

      console.log('[EVALUATION_SERVICE] Submission validated:', {
        state: SubmissionState.Validated,
        employeeId: employee.id,
        activeQuestions: questions.length,
        boundSelections: bound.length,
        periodId: period.id,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      const trimmedNotes = request.notes?.trim() ?? '';
      const notes = trimmedNotes.length > 0 ? trimmedNotes : null;

      const evaluation = await executeTransaction<Evaluation>(
        async (client) => {
          const inserted = await client.query<EvaluationRecord>(
            `INSERT INTO evaluations (id, supervisor_id, employee_id, period_id, notes, year, month, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             RETURNING id, supervisor_id, employee_id, period_id, notes, year, month, created_at`,
            [crypto.randomUUID(), actor.userId, employee.id, period.id, notes, year, month, now]
          );

          const record = inserted.rows[0];
          if (!record) {
            throw new Error('Failed to create evaluation record');
          }

          const responses: EvaluationResponse[] = [];
          for (const selection of bound) {
            const response = await client.query<EvaluationResponseRecord>(
              `INSERT INTO evaluation_responses (id, evaluation_id, question_id, answer_id, score, created_at)
               SELECT $1, $2, qa.question_id, qa.id, qa.score, $5
               FROM question_answers qa
               WHERE qa.id = $3 AND qa.question_id = $4
               RETURNING ${RESPONSE_COLUMNS}`,
              [crypto.randomUUID(), record.id, selection.answerId, selection.questionId, now]
            );

            const responseRecord = response.rows[0];
            if (responseRecord) {
              responses.push(mapResponseRecord(responseRecord));
            }
          }

          return mapEvaluationRecord(record, responses);
        },
        { correlationId: cid, operation: 'submit_evaluation' }
      );

      console.log('[EVALUATION_SERVICE] Evaluation persisted:', {
        state: SubmissionState.Persisted,
        evaluationId: evaluation.id,
        employeeId: evaluation.employeeId,
        responseCount: evaluation.responses.length,
        total: evaluation.score.total,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(evaluation, startTime);
    } catch (error) {
      console.error('[EVALUATION_SERVICE] Submission failed:', {
        state: SubmissionState.Rejected,
        employeeId: request.employeeId,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime, ServiceErrorCode.EmployeeNotFound);
    }
  }

  /**
   * Everything needed to render the form for one employee
   */
  async getForm(actor: Actor, employeeId: string, correlationId?: string): Promise<ServiceOperationResult<EvaluationForm>> {
    const startTime = Date.now();
    const cid = correlationId || `evaluation_form_${Date.now()}`;

    try {
      const employee = await this.fetchEmployee(employeeId, cid);
      if (!employee) {
        return fail(ServiceErrorCode.EmployeeNotFound, startTime);
      }

      if (!canEvaluate(actor, { supervisorId: employee.supervisor_id })) {
        return fail(ServiceErrorCode.Forbidden, startTime);
      }

      const questions = await questionService.fetchQuestions({ activeOnly: true, correlationId: cid });
      const period = await periodService.getOrCreateCurrent(new Date(), cid);
      const evaluationsEnabled = await settingsService.isEvaluationsEnabled(cid);

      return succeed(
        {
          employee: {
            id: employee.id,
            name: employee.name,
            employeeCode: employee.employee_code,
            supervisorId: employee.supervisor_id,
          },
          questions,
          period,
          evaluationsEnabled,
        },
        startTime
      );
    } catch (error) {
      console.error('[EVALUATION_SERVICE] Failed to build evaluation form:', {
        employeeId,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime, ServiceErrorCode.EmployeeNotFound);
    }
  }

  /**
   * Load evaluation summaries, newest first, with their responses
   *
   * @throws DatabaseError on query failure
   */
  async fetchEvaluations(filters: EvaluationFilters, options?: FetchEvaluationsOptions): Promise<EvaluationSummary[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.employeeId) {
      params.push(filters.employeeId);
      conditions.push(`e.employee_id = $${params.length}`);
    }
    if (filters.supervisorId) {
      params.push(filters.supervisorId);
      conditions.push(`e.supervisor_id = $${params.length}`);
    }
    if (filters.year !== undefined) {
      params.push(filters.year);
      conditions.push(`e.year = $${params.length}`);
    }
    if (filters.month !== undefined) {
      params.push(filters.month);
      conditions.push(`e.month = $${params.length}`);
    }

    let query = SUMMARY_SELECT;
    if (conditions.length > 0) {
      query += ` WHERE ${conditions.join(' AND ')}`;
    }
    query += ' ORDER BY e.created_at DESC, e.id DESC';
    if (options?.limit !== undefined) {
      params.push(options.limit);
      query += ` LIMIT $${params.length}`;
    }

    const records = await queryMany<EvaluationSummaryRecord>(query, params, {
      correlationId: options?.correlationId,
      operation: 'list_evaluations',
    });

    if (records.length === 0) {
      return [];
    }

    const responseRecords = await queryMany<EvaluationResponseRecord>(
      `SELECT ${RESPONSE_COLUMNS}
       FROM evaluation_responses
       WHERE evaluation_id = ANY($1)
       ORDER BY created_at ASC, id ASC`,
      [records.map((record) => record.id)],
      { correlationId: options?.correlationId, operation: 'list_evaluation_responses' }
    );

    const responsesByEvaluation = new Map<string, EvaluationResponse[]>();
    for (const record of responseRecords) {
      const responses = responsesByEvaluation.get(record.evaluation_id) ?? [];
      responses.push(mapResponseRecord(record));
      responsesByEvaluation.set(record.evaluation_id, responses);
    }

    return records.map((record) => mapSummaryRecord(record, responsesByEvaluation.get(record.id) ?? []));
  }

  async listEvaluations(
    actor: Actor,
    filters: EvaluationFilters,
    correlationId?: string
  ): Promise<ServiceOperationResult<EvaluationSummary[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_evaluations_${Date.now()}`;

    try {
      const evaluations = await this.fetchEvaluations(scopeFilters(actor, filters), { correlationId: cid });
      return succeed(evaluations, startTime);
    } catch (error) {
      console.error('[EVALUATION_SERVICE] Failed to list evaluations:', {
        filters,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime);
    }
  }

  /**
   * One evaluation with question and answer texts; supervisors see only their own
   */
  async getEvaluation(
    actor: Actor,
    evaluationId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<EvaluationDetail>> {
    const startTime = Date.now();
    const cid = correlationId || `get_evaluation_${Date.now()}`;

    try {
      const record = await queryOne<EvaluationSummaryRecord>(`${SUMMARY_SELECT} WHERE e.id = $1`, [evaluationId], {
        correlationId: cid,
        operation: 'fetch_evaluation',
      });

      if (!record) {
        return fail(ServiceErrorCode.EvaluationNotFound, startTime);
      }

      if (actor.role !== UserRole.Manager && record.supervisor_id !== actor.userId) {
        console.warn('[EVALUATION_SERVICE] Evaluation access denied:', {
          evaluationId,
          userId: actor.userId,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        return fail(ServiceErrorCode.Forbidden, startTime);
      }

      const responseRecords = await queryMany<EvaluationResponseDetailRecord>(
        `SELECT r.id, r.evaluation_id, r.question_id, r.answer_id, r.score, r.created_at,
                q.question_text, qa.answer_text
         FROM evaluation_responses r
         JOIN evaluation_questions q ON q.id = r.question_id
         JOIN question_answers qa ON qa.id = r.answer_id
         WHERE r.evaluation_id = $1
         ORDER BY q.order_index ASC, q.created_at ASC, q.id ASC`,
        [evaluationId],
        { correlationId: cid, operation: 'fetch_evaluation_responses' }
      );

      const responses: EvaluationResponseDetail[] = responseRecords.map((responseRecord) => ({
        ...mapResponseRecord(responseRecord),
        questionText: responseRecord.question_text,
        answerText: responseRecord.answer_text,
      }));

      return succeed({ ...mapSummaryRecord(record, []), responses, score: evaluationScore(responses) }, startTime);
    } catch (error) {
      console.error('[EVALUATION_SERVICE] Failed to fetch evaluation:', {
        evaluationId,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime, ServiceErrorCode.EvaluationNotFound);
    }
  }

  private async fetchEmployee(employeeId: string, correlationId: string): Promise<EmployeeRecord | null> {
    return queryOne<EmployeeRecord>(
      'SELECT id, name, employee_code, supervisor_id FROM employees WHERE id = $1',
      [employeeId],
      { correlationId, operation: 'fetch_employee' }
    );
  }

  private logRejection(
    errorCode: ServiceErrorCode,
    employeeId: string,
    correlationId: string,
    context?: Record<string, unknown>
  ): void {
    console.warn('[EVALUATION_SERVICE] Submission rejected:', {
      state: SubmissionState.Rejected,
      errorCode,
      employeeId,
      ...context,
      correlationId,
      timestamp: new Date().toISOString(),
    });
  }
}

export const evaluationService = new EvaluationService();

export default evaluationService;
