/**
 * Question bank type definitions and field validators
 *
 * @module types/question
 */

import type { ValidationResult } from './index.js';

export const QUESTION_TEXT_MIN_LENGTH = 5;
export const QUESTION_TEXT_MAX_LENGTH = 500;
export const ANSWER_TEXT_MIN_LENGTH = 1;
export const ANSWER_TEXT_MAX_LENGTH = 200;
export const SCORE_MIN = 0;
export const SCORE_MAX = 100;
export const ORDER_INDEX_MIN = -2147483648;
export const ORDER_INDEX_MAX = 2147483647;

/**
 * Selectable option of a question
 */
export interface Answer {
  readonly id: string;
  readonly questionId: string;
  readonly answerText: string;

  /**
   * Points awarded for this option; null means the option is not scored
   */
  readonly score: number | null;

  readonly orderIndex: number;
}

/**
 * Evaluation question with its ordered answers
 */
export interface Question {
  readonly id: string;
  readonly questionText: string;
  readonly isActive: boolean;
  readonly orderIndex: number;
  readonly answers: Answer[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface QuestionInput {
  readonly questionText: string;

  /**
   * Null when the submitted value could not be read as a boolean
   */
  readonly isActive?: boolean | null;
  readonly orderIndex?: number;
}

export interface AnswerInput {
  readonly answerText: string;
  readonly score?: number | null;
  readonly orderIndex?: number;
}

/**
 * Counts removed by a cascading delete
 */
export interface QuestionDeletionResult {
  readonly questionId: string;
  readonly deletedAnswers: number;
  readonly deletedResponses: number;
}

export interface AnswerDeletionResult {
  readonly answerId: string;
  readonly deletedResponses: number;
}

export function validateQuestionText(text: unknown): ValidationResult {
  const errors: string[] = [];

  if (typeof text !== 'string') {
    errors.push('Question text is required');
    return { isValid: false, errors };
  }

  const length = text.trim().length;
  if (length < QUESTION_TEXT_MIN_LENGTH || length > QUESTION_TEXT_MAX_LENGTH) {
    errors.push(
      `Question text must be between ${QUESTION_TEXT_MIN_LENGTH} and ${QUESTION_TEXT_MAX_LENGTH} characters`
    );
  }

  return { isValid: errors.length === 0, errors };
}

export function validateAnswerText(text: unknown): ValidationResult {
  const errors: string[] = [];

  if (typeof text !== 'string') {
    errors.push('Answer text is required');
    return { isValid: false, errors };
  }

  const length = text.trim().length;
  if (length < ANSWER_TEXT_MIN_LENGTH || length > ANSWER_TEXT_MAX_LENGTH) {
    errors.push(
      `Answer text must be between ${ANSWER_TEXT_MIN_LENGTH} and ${ANSWER_TEXT_MAX_LENGTH} characters`
    );
  }

  return { isValid: errors.length === 0, errors };
}

/**
 * Scores are optional; when present they must be whole numbers from 0 to 100
 */
export function validateScore(score: unknown): ValidationResult {
  if (score === undefined || score === null) {
    return { isValid: true, errors: [] };
  }

  if (typeof score !== 'number' || !Number.isInteger(score) || score < SCORE_MIN || score > SCORE_MAX) {
    return { isValid: false, errors: [`Score must be an integer between ${SCORE_MIN} and ${SCORE_MAX}`] };
  }

  return { isValid: true, errors: [] };
}

/**
 * Order positions are stored as INT4
 */
export function validateOrderIndex(orderIndex: unknown): ValidationResult {
  if (orderIndex === undefined) {
    return { isValid: true, errors: [] };
  }

  if (
    typeof orderIndex !== 'number' ||
    !Number.isInteger(orderIndex) ||
    orderIndex < ORDER_INDEX_MIN ||
    orderIndex > ORDER_INDEX_MAX
  ) {
    return { isValid: false, errors: [`Order must be an integer between ${ORDER_INDEX_MIN} and ${ORDER_INDEX_MAX}`] };
  }

  return { isValid: true, errors: [] };
}

export function validateQuestionInput(input: QuestionInput): ValidationResult {
  const errors = [
    ...validateQuestionText(input.questionText).errors,
    ...validateOrderIndex(input.orderIndex).errors,
  ];

  if (input.isActive !== undefined && typeof input.isActive !== 'boolean') {
    errors.push('Active flag must be a boolean');
  }

  return { isValid: errors.length === 0, errors };
}

export function validateAnswerInput(input: AnswerInput): ValidationResult {
  const errors = [
    ...validateAnswerText(input.answerText).errors,
    ...validateScore(input.score).errors,
    ...validateOrderIndex(input.orderIndex).errors,
  ];

  return { isValid: errors.length === 0, errors };
}
