/**
 * Domain objects shared by the unit and integration tests
 */

import { SERVICE_ERROR_MESSAGES, type ServiceErrorCode, type ServiceOperationResult } from '../../src/types/index.js';
import type { EvaluationPeriod } from '../../src/types/evaluation.js';
import type { Answer, Question } from '../../src/types/question.js';

export const FIXED_DATE = new Date('2024-03-15T10:00:00Z');

export const EMPLOYEE_ID = '3a4b5c6d-7e8f-4a9b-8c0d-1e2f3a4b5c6d';
export const PERIOD_ID = '9d8c7b6a-5f4e-4d3c-9b2a-1f0e9d8c7b6a';

export function buildAnswer(id: string, questionId: string, answerText: string, score: number | null): Answer {
  return { id, questionId, answerText, score, orderIndex: 0 };
}

export function buildQuestion(id: string, questionText: string, answers: Answer[]): Question {
  return {
    id,
    questionText,
    isActive: true,
    orderIndex: 0,
    answers,
    createdAt: FIXED_DATE,
    updatedAt: FIXED_DATE,
  };
}

/**
 * Three active questions: q1 and q2 scored, q3 unscored
 */
export function buildQuestionBank(): Question[] {
  return [
    buildQuestion('q1', 'Meets deadlines?', [
      buildAnswer('a1-always', 'q1', 'Always', 100),
      buildAnswer('a1-rarely', 'q1', 'Rarely', 40),
    ]),
    buildQuestion('q2', 'Quality of work?', [
      buildAnswer('a2-good', 'q2', 'Good', 80),
      buildAnswer('a2-poor', 'q2', 'Poor', 20),
    ]),
    buildQuestion('q3', 'Took on extra work?', [
      buildAnswer('a3-yes', 'q3', 'Yes', null),
      buildAnswer('a3-no', 'q3', 'No', null),
    ]),
  ];
}

export const MARCH_2024: EvaluationPeriod = {
  id: 'period-2024-03',
  year: 2024,
  month: 3,
  name: 'March 2024',
  createdAt: FIXED_DATE,
};

/**
 * Failed service result with the code's standard message
 */
export function serviceFailure<T>(errorCode: ServiceErrorCode): ServiceOperationResult<T> {
  return {
    success: false,
    error: SERVICE_ERROR_MESSAGES[errorCode],
    errorCode,
    executionTimeMs: 1,
  };
}
