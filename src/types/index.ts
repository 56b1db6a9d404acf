/**
 * Central type definitions for the evaluation service
 *
 * Core interfaces, enums and result shapes shared by services, controllers and
 * middleware.
 *
 * @module types
 */

/**
 * User role enumeration
 *
 * Both roles sign in with the same account table. Managers administer the
 * question bank, roster and settings; supervisors evaluate their own employees.
 */
export enum UserRole {
  Manager = 'MANAGER',
  Supervisor = 'SUPERVISOR',
}

/**
 * Base entity interface with common fields
 */
export interface BaseEntity {
  readonly id: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Supervisor or manager account (password hash never leaves the service layer)
 */
export interface Supervisor extends BaseEntity {
  readonly name: string;
  readonly email: string;
  readonly role: UserRole;

  /**
   * Manager who created or owns this account
   */
  readonly managerId: string | null;
}

/**
 * Supervisor with the number of employees assigned to them
 */
export interface SupervisorSummary extends Supervisor {
  readonly employeeCount: number;
}

/**
 * Evaluated worker; always assigned to exactly one supervisor
 */
export interface Employee extends BaseEntity {
  readonly employeeCode: string;
  readonly name: string;
  readonly supervisorId: string;
  readonly supervisorName?: string;
  readonly supervisorEmail?: string;
}

/**
 * Error codes returned by the service layer
 */
export enum ServiceErrorCode {
  ValidationError = 'VALIDATION_ERROR',
  Forbidden = 'FORBIDDEN',
  EvaluationsDisabled = 'EVALUATIONS_DISABLED',
  NoQuestionsConfigured = 'NO_QUESTIONS_CONFIGURED',
  PersistenceError = 'PERSISTENCE_ERROR',
  QuestionNotFound = 'QUESTION_NOT_FOUND',
  AnswerNotFound = 'ANSWER_NOT_FOUND',
  EmployeeNotFound = 'EMPLOYEE_NOT_FOUND',
  SupervisorNotFound = 'SUPERVISOR_NOT_FOUND',
  EvaluationNotFound = 'EVALUATION_NOT_FOUND',
  PeriodNotFound = 'PERIOD_NOT_FOUND',
  EmailAlreadyExists = 'EMAIL_ALREADY_EXISTS',
  EmployeeCodeExists = 'EMPLOYEE_CODE_EXISTS',
  CannotDeleteSelf = 'CANNOT_DELETE_SELF',
  InvalidCsv = 'INVALID_CSV',
}

/**
 * Human-readable message for each service error code
 */
export const SERVICE_ERROR_MESSAGES: Record<ServiceErrorCode, string> = {
  [ServiceErrorCode.ValidationError]: 'The request contains invalid data.',
  [ServiceErrorCode.Forbidden]: 'You are not allowed to perform this action.',
  [ServiceErrorCode.EvaluationsDisabled]: 'Evaluations are currently disabled by the manager.',
  [ServiceErrorCode.NoQuestionsConfigured]:
    'No evaluation questions have been created yet. Please ask the manager to create questions.',
  [ServiceErrorCode.PersistenceError]: 'The changes could not be saved. Nothing was written.',
  [ServiceErrorCode.QuestionNotFound]: 'Question not found.',
  [ServiceErrorCode.AnswerNotFound]: 'Answer not found.',
  [ServiceErrorCode.EmployeeNotFound]: 'Employee not found.',
  [ServiceErrorCode.SupervisorNotFound]: 'Supervisor not found.',
  [ServiceErrorCode.EvaluationNotFound]: 'Evaluation not found.',
  [ServiceErrorCode.PeriodNotFound]: 'Evaluation period not found.',
  [ServiceErrorCode.EmailAlreadyExists]: 'An account with this email already exists.',
  [ServiceErrorCode.EmployeeCodeExists]: 'An employee with this code already exists.',
  [ServiceErrorCode.CannotDeleteSelf]: 'You cannot delete your own account.',
  [ServiceErrorCode.InvalidCsv]: 'Please upload a CSV file.',
};

/**
 * Service operation result
 */
export interface ServiceOperationResult<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: string;
  readonly errorCode?: ServiceErrorCode;
  readonly executionTimeMs: number;
}

/**
 * Field validation result
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: string[];
}

/**
 * Identity of the caller as resolved by the authenticate middleware
 */
export interface Actor {
  readonly userId: string;
  readonly role: UserRole;
}

/**
 * Type guard for UserRole
 */
export function isUserRole(value: unknown): value is UserRole {
  return Object.values(UserRole).some((role) => role === value);
}

/**
 * Narrow a role column read from the database
 */
export function toUserRole(value: string): UserRole {
  return value === UserRole.Manager ? UserRole.Manager : UserRole.Supervisor;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Every primary key is a uuid column
 */
export function isUuid(value: unknown): value is string {
  return typeof value === 'string' && UUID_PATTERN.test(value);
}

/**
 * Check that a value is a plain object (not an array or null)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
