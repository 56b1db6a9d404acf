/**
 * Roster (supervisors and employees) request and result types
 *
 * @module types/roster
 */

import type { Supervisor, ValidationResult } from './index.js';

export const PERSON_NAME_MIN_LENGTH = 2;
export const PERSON_NAME_MAX_LENGTH = 100;
export const EMPLOYEE_CODE_MIN_LENGTH = 3;
export const EMPLOYEE_CODE_MAX_LENGTH = 20;
export const EMAIL_MAX_LENGTH = 120;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface CreateSupervisorRequest {
  readonly name: string;
  readonly email: string;

  /**
   * Generated when omitted
   */
  readonly password?: string;
}

export interface UpdateSupervisorRequest {
  readonly name: string;
  readonly email: string;
}

export interface SetPasswordRequest {
  readonly newPassword: string;
  readonly confirmPassword: string;
}

export interface CreatedSupervisor {
  readonly supervisor: Supervisor;

  /**
   * Present only when the password was generated
   */
  readonly temporaryPassword?: string;
}

export interface EmployeeInput {
  readonly name: string;
  readonly employeeCode: string;
  readonly supervisorId: string;
}

export interface SupervisorDeletionResult {
  readonly supervisorId: string;
  readonly deletedEmployees: number;
  readonly deletedEvaluations: number;
  readonly deletedResponses: number;
}

export interface EmployeeDeletionResult {
  readonly employeeId: string;
  readonly deletedEvaluations: number;
  readonly deletedResponses: number;
}

export interface ImportRowError {
  /**
   * 1-based row number in the uploaded file
   */
  readonly row: number;

  readonly message: string;
}

export interface ImportResult {
  readonly created: number;
  readonly errors: ImportRowError[];
}

export function validatePersonName(name: unknown): ValidationResult {
  if (typeof name !== 'string') {
    return { isValid: false, errors: ['Name is required'] };
  }

  const length = name.trim().length;
  if (length < PERSON_NAME_MIN_LENGTH || length > PERSON_NAME_MAX_LENGTH) {
    return {
      isValid: false,
      errors: [`Name must be between ${PERSON_NAME_MIN_LENGTH} and ${PERSON_NAME_MAX_LENGTH} characters`],
    };
  }

  return { isValid: true, errors: [] };
}

export function validateEmail(email: unknown): ValidationResult {
  if (typeof email !== 'string' || email.trim().length === 0) {
    return { isValid: false, errors: ['Email is required'] };
  }

  const trimmed = email.trim();
  if (trimmed.length > EMAIL_MAX_LENGTH || !EMAIL_PATTERN.test(trimmed)) {
    return { isValid: false, errors: ['Invalid email address'] };
  }

  return { isValid: true, errors: [] };
}

export function validateEmployeeCode(code: unknown): ValidationResult {
  if (typeof code !== 'string') {
    return { isValid: false, errors: ['Employee code is required'] };
  }

  const length = code.trim().length;
  if (length < EMPLOYEE_CODE_MIN_LENGTH || length > EMPLOYEE_CODE_MAX_LENGTH) {
    return {
      isValid: false,
      errors: [
        `Employee code must be between ${EMPLOYEE_CODE_MIN_LENGTH} and ${EMPLOYEE_CODE_MAX_LENGTH} characters`,
      ],
    };
  }

  return { isValid: true, errors: [] };
}
