/**
 * Evaluation, period and settings type definitions
 *
 * @module types/evaluation
 */

import type { UserRole, ValidationResult } from './index.js';
import type { Question } from './question.js';

export const NOTES_MAX_LENGTH = 1000;

/**
 * Lifecycle of a single submission attempt
 */
export enum SubmissionState {
  FormRequested = 'FORM_REQUESTED',
  Validated = 'VALIDATED',
  Persisted = 'PERSISTED',
  Rejected = 'REJECTED',
}

/**
 * Global evaluation gate (exactly one row)
 */
export interface SystemSettings {
  readonly id: string;
  readonly evaluationsEnabled: boolean;
  readonly updatedAt: Date;
}

/**
 * Calendar month used to group evaluations for reporting
 */
export interface EvaluationPeriod {
  readonly id: string;
  readonly year: number;
  readonly month: number;

  /**
   * Display name such as "March 2024"
   */
  readonly name: string;

  readonly createdAt: Date;
}

export interface EvaluationPeriodSummary extends EvaluationPeriod {
  readonly evaluationCount: number;
}

/**
 * Chosen answer for one question, with the score copied at submission time
 */
export interface EvaluationResponse {
  readonly id: string;
  readonly evaluationId: string;
  readonly questionId: string;
  readonly answerId: string;
  readonly score: number | null;
  readonly createdAt: Date;
}

export interface EvaluationScore {
  /**
   * Sum of non-null response scores
   */
  readonly total: number;

  /**
   * total divided by the number of scored responses, 0 when none are scored
   */
  readonly average: number;

  readonly scoredCount: number;
}

/**
 * Persisted evaluation (write-once)
 */
export interface Evaluation {
  readonly id: string;
  readonly supervisorId: string;
  readonly employeeId: string;
  readonly periodId: string | null;
  readonly notes: string | null;
  readonly year: number;
  readonly month: number;
  readonly createdAt: Date;
  readonly responses: EvaluationResponse[];
  readonly score: EvaluationScore;
}

/**
 * Evaluation row as shown in listings
 */
export interface EvaluationSummary extends Evaluation {
  readonly employeeName: string;
  readonly employeeCode: string;
  readonly supervisorName: string;
  readonly supervisorEmail: string;
}

export interface EvaluationResponseDetail extends EvaluationResponse {
  readonly questionText: string;
  readonly answerText: string;
}

export interface EvaluationDetail extends Omit<EvaluationSummary, 'responses'> {
  readonly responses: EvaluationResponseDetail[];
}

/**
 * Question id to answer id, as posted by the evaluation form
 */
export type AnswerSelections = Readonly<Record<string, string>>;

export interface SubmitEvaluationRequest {
  readonly employeeId: string;
  readonly selections: AnswerSelections;
  readonly notes?: string;
}

/**
 * Question/answer pair accepted for persistence
 */
export interface BoundSelection {
  readonly questionId: string;
  readonly answerId: string;
}

/**
 * Everything the evaluation form needs for one employee
 */
export interface EvaluationForm {
  readonly employee: {
    readonly id: string;
    readonly name: string;
    readonly employeeCode: string;
    readonly supervisorId: string;
  };
  readonly questions: Question[];
  readonly period: EvaluationPeriod;
  readonly evaluationsEnabled: boolean;
}

export interface EvaluationFilters {
  readonly employeeId?: string;
  readonly supervisorId?: string;
  readonly year?: number;
  readonly month?: number;
}

export interface CsvExport {
  readonly filename: string;
  readonly content: Buffer;
  readonly rowCount: number;
}

export interface ManagerDashboard {
  readonly role: UserRole.Manager;
  readonly totalSupervisors: number;
  readonly totalEmployees: number;
  readonly totalActiveQuestions: number;

  /**
   * Mean of per-evaluation averages over evaluations with at least one response
   */
  readonly averageScore: number;

  readonly periods: EvaluationPeriodSummary[];
  readonly evaluationsEnabled: boolean;
}

export interface SupervisorDashboard {
  readonly role: UserRole.Supervisor;
  readonly myEmployees: number;
  readonly myEvaluations: number;
  readonly recentEvaluations: EvaluationSummary[];
}

export type Dashboard = ManagerDashboard | SupervisorDashboard;

export function validateNotes(notes: unknown): ValidationResult {
  if (notes === undefined || notes === null) {
    return { isValid: true, errors: [] };
  }

  if (typeof notes !== 'string') {
    return { isValid: false, errors: ['Notes must be text'] };
  }

  if (notes.length > NOTES_MAX_LENGTH) {
    return { isValid: false, errors: [`Notes must be at most ${NOTES_MAX_LENGTH} characters`] };
  }

  return { isValid: true, errors: [] };
}

/**
 * Validate the posted selection map: every value must be an answer id string
 */
export function validateSelections(selections: unknown): ValidationResult {
  if (typeof selections !== 'object' || selections === null || Array.isArray(selections)) {
    return { isValid: false, errors: ['Selections must be an object of question id to answer id'] };
  }

  const errors = Object.entries(selections)
    .filter(([, answerId]) => typeof answerId !== 'string')
    .map(([questionId]) => `Selection for question ${questionId} must be an answer id`);

  return { isValid: errors.length === 0, errors };
}
