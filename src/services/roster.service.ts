/**
 * Roster Service Module
 *
 * Manager-side administration of supervisor accounts and employees, including
 * the ownership-scoped cascading deletes and the bulk CSV import.
 *
 * @module services/roster
 */

import crypto from 'crypto';

import { isEmailDomainAllowed } from '../config/auth.js';
import { isUniqueViolation } from '../db/errors.js';
import { executeTransaction, queryMany, queryOne } from '../db/index.js';
import {
  ServiceErrorCode,
  UserRole,
  toUserRole,
  type Actor,
  type Employee,
  type ServiceOperationResult,
  type Supervisor,
  type SupervisorSummary,
} from '../types/index.js';
import {
  validateEmail,
  validateEmployeeCode,
  validatePersonName,
  type CreateSupervisorRequest,
  type CreatedSupervisor,
  type EmployeeDeletionResult,
  type EmployeeInput,
  type ImportResult,
  type ImportRowError,
  type SetPasswordRequest,
  type SupervisorDeletionResult,
  type UpdateSupervisorRequest,
} from '../types/roster.js';
import { parseCsv } from '../utils/csv.js';
import { generateSecurePassword, hashPassword, validatePassword } from '../utils/password.js';
import { errorMessage, fail, failFromError, succeed, validationFailure } from './result.js';

interface SupervisorRecord {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly role: string;
  readonly manager_id: string | null;
  readonly created_at: Date;
  readonly updated_at: Date;
}

interface SupervisorSummaryRecord extends SupervisorRecord {
  readonly employee_count: number;
}

interface EmployeeRecord {
  readonly id: string;
  readonly employee_code: string;
  readonly name: string;
  readonly supervisor_id: string;
  readonly supervisor_name?: string;
  readonly supervisor_email?: string;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/**
 * Import row accepted for insertion
 */
interface ImportCandidate {
  readonly name: string;
  readonly employeeCode: string;
  readonly supervisorId: string;
}

const SUPERVISOR_COLUMNS = 'id, name, email, role, manager_id, created_at, updated_at';
const EMPLOYEE_COLUMNS = 'id, employee_code, name, supervisor_id, created_at, updated_at';
const IMPORT_MIN_COLUMNS = 3;

function mapSupervisorRecord(record: SupervisorRecord): Supervisor {
  return {
    id: record.id,
    name: record.name,
    email: record.email,
    role: toUserRole(record.role),
    managerId: record.manager_id,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

function mapEmployeeRecord(record: EmployeeRecord): Employee {
  return {
    id: record.id,
    employeeCode: record.employee_code,
    name: record.name,
    supervisorId: record.supervisor_id,
    supervisorName: record.supervisor_name,
    supervisorEmail: record.supervisor_email,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

function validateEmployeeInput(input: EmployeeInput): string[] {
  const errors = [...validatePersonName(input.name).errors, ...validateEmployeeCode(input.employeeCode).errors];
  if (!input.supervisorId || input.supervisorId.trim().length === 0) {
    errors.push('Supervisor is required');
  }
  return errors;
}

/**
 * A first row whose first cell mentions "Name" is a header
 */
export function isImportHeaderRow(row: readonly string[]): boolean {
  return (row[0] ?? '').includes('Name');
}

export class RosterService {
  async listSupervisors(correlationId?: string): Promise<ServiceOperationResult<SupervisorSummary[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_supervisors_${Date.now()}`;

    try {
      const records = await queryMany<SupervisorSummaryRecord>(
        `SELECT s.id, s.name, s.email, s.role, s.manager_id, s.created_at, s.updated_at,
                COUNT(e.id)::int AS employee_count
         FROM supervisors s
         LEFT JOIN employees e ON e.supervisor_id = s.id
         WHERE s.role = $1
         GROUP BY s.id
         ORDER BY s.name ASC, s.id ASC`,
        [UserRole.Supervisor],
        { correlationId: cid, operation: 'list_supervisors' }
      );

      return succeed(
        records.map((record) => ({ ...mapSupervisorRecord(record), employeeCount: record.employee_count })),
        startTime
      );
    } catch (error) {
      return this.queryFailure('Failed to list supervisors', error, startTime, cid);
    }
  }

  /**
   * Create a supervisor account owned by the calling manager
   *
   * When no password is supplied one is generated and returned once as
   * `temporaryPassword`.
   */
  async createSupervisor(
    actor: Actor,
    request: CreateSupervisorRequest,
    correlationId?: string
  ): Promise<ServiceOperationResult<CreatedSupervisor>> {
    const startTime = Date.now();
    const cid = correlationId || `create_supervisor_${Date.now()}`;

    const errors = [...validatePersonName(request.name).errors, ...validateEmail(request.email).errors];
    if (request.password !== undefined) {
      errors.push(...validatePassword(request.password).errors);
    }

    const email = typeof request.email === 'string' ? request.email.trim().toLowerCase() : '';
    if (errors.length === 0 && !isEmailDomainAllowed(email)) {
      errors.push('Email domain is not allowed');
    }

    if (errors.length > 0) {
      return validationFailure(errors, startTime);
    }

    try {
      if (await this.emailTaken(email, null, cid)) {
        return fail(ServiceErrorCode.EmailAlreadyExists, startTime);
      }

      const password = request.password ?? generateSecurePassword();
      const temporaryPassword = request.password === undefined ? password : undefined;
      const { hash } = await hashPassword(password);
      const now = new Date();

      const record = await queryOne<SupervisorRecord>(
        `INSERT INTO supervisors (id, name, email, password_hash, role, manager_id, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${SUPERVISOR_COLUMNS}`,
        [crypto.randomUUID(), request.name.trim(), email, hash, UserRole.Supervisor, actor.userId, now, now],
        { correlationId: cid, operation: 'create_supervisor' }
      );

      if (!record) {
        return fail(ServiceErrorCode.PersistenceError, startTime);
      }

      console.log('[ROSTER_SERVICE] Supervisor created:', {
        supervisorId: record.id,
        managerId: actor.userId,
        passwordGenerated: temporaryPassword !== undefined,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed({ supervisor: mapSupervisorRecord(record), temporaryPassword }, startTime);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return fail(ServiceErrorCode.EmailAlreadyExists, startTime);
      }
      return this.queryFailure('Supervisor creation failed', error, startTime, cid);
    }
  }

  async updateSupervisor(
    supervisorId: string,
    request: UpdateSupervisorRequest,
    correlationId?: string
  ): Promise<ServiceOperationResult<Supervisor>> {
    const startTime = Date.now();
    const cid = correlationId || `update_supervisor_${Date.now()}`;

    const errors = [...validatePersonName(request.name).errors, ...validateEmail(request.email).errors];
    const email = typeof request.email === 'string' ? request.email.trim().toLowerCase() : '';
    if (errors.length === 0 && !isEmailDomainAllowed(email)) {
      errors.push('Email domain is not allowed');
    }

    if (errors.length > 0) {
      return validationFailure(errors, startTime);
    }

    try {
      if (!(await this.findSupervisor(supervisorId, cid))) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      if (await this.emailTaken(email, supervisorId, cid)) {
        return fail(ServiceErrorCode.EmailAlreadyExists, startTime);
      }

      const record = await queryOne<SupervisorRecord>(
        `UPDATE supervisors SET name = $2, email = $3, updated_at = $4
         WHERE id = $1
         RETURNING ${SUPERVISOR_COLUMNS}`,
        [supervisorId, request.name.trim(), email, new Date()],
        { correlationId: cid, operation: 'update_supervisor' }
      );

      if (!record) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      return succeed(mapSupervisorRecord(record), startTime);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return fail(ServiceErrorCode.EmailAlreadyExists, startTime);
      }
      return this.queryFailure(
        'Supervisor update failed',
        error,
        startTime,
        cid,
        { supervisorId },
        ServiceErrorCode.SupervisorNotFound
      );
    }
  }

  async setSupervisorPassword(
    supervisorId: string,
    request: SetPasswordRequest,
    correlationId?: string
  ): Promise<ServiceOperationResult<Supervisor>> {
    const startTime = Date.now();
    const cid = correlationId || `set_password_${Date.now()}`;

    const validation = validatePassword(request.newPassword, request.confirmPassword);
    if (!validation.isValid) {
      return validationFailure(validation.errors, startTime);
    }

    try {
      if (!(await this.findSupervisor(supervisorId, cid))) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      const { hash } = await hashPassword(request.newPassword);
      const record = await queryOne<SupervisorRecord>(
        `UPDATE supervisors SET password_hash = $2, updated_at = $3
         WHERE id = $1
         RETURNING ${SUPERVISOR_COLUMNS}`,
        [supervisorId, hash, new Date()],
        { correlationId: cid, operation: 'set_supervisor_password' }
      );

      if (!record) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      console.log('[ROSTER_SERVICE] Supervisor password changed:', {
        supervisorId,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapSupervisorRecord(record), startTime);
    } catch (error) {
      return this.queryFailure(
        'Password change failed',
        error,
        startTime,
        cid,
        { supervisorId },
        ServiceErrorCode.SupervisorNotFound
      );
    }
  }

  /**
   * Delete a supervisor with their employees and every evaluation either wrote
   * or received, in one transaction
   */
  async deleteSupervisor(
    actor: Actor,
    supervisorId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<SupervisorDeletionResult>> {
    const startTime = Date.now();
    const cid = correlationId || `delete_supervisor_${Date.now()}`;

    if (supervisorId === actor.userId) {
      return fail(ServiceErrorCode.CannotDeleteSelf, startTime);
    }

    try {
      const result = await executeTransaction<SupervisorDeletionResult | null>(
        async (client) => {
          const existing = await client.query('SELECT id FROM supervisors WHERE id = $1 AND role = $2 FOR UPDATE', [
            supervisorId,
            UserRole.Supervisor,
          ]);

          if (existing.rows.length === 0) {
            return null;
          }

          const ownedEvaluations = `SELECT id FROM evaluations
            WHERE supervisor_id = $1
               OR employee_id IN (SELECT id FROM employees WHERE supervisor_id = $1)`;

          const responses = await client.query(
            `DELETE FROM evaluation_responses WHERE evaluation_id IN (${ownedEvaluations})`,
            [supervisorId]
          );
          const evaluations = await client.query(`DELETE FROM evaluations WHERE id IN (${ownedEvaluations})`, [
            supervisorId,
          ]);
          const employees = await client.query('DELETE FROM employees WHERE supervisor_id = $1', [supervisorId]);
          await client.query('UPDATE supervisors SET manager_id = NULL WHERE manager_id = $1', [supervisorId]);
          await client.query('DELETE FROM supervisors WHERE id = $1', [supervisorId]);

          return {
            supervisorId,
            deletedEmployees: employees.rowCount ?? 0,
            deletedEvaluations: evaluations.rowCount ?? 0,
            deletedResponses: responses.rowCount ?? 0,
          };
        },
        { correlationId: cid, operation: 'delete_supervisor' }
      );

      if (!result) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      console.log('[ROSTER_SERVICE] Supervisor deleted:', {
        ...result,
        deletedBy: actor.userId,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(result, startTime);
    } catch (error) {
      return this.queryFailure(
        'Supervisor deletion failed',
        error,
        startTime,
        cid,
        { supervisorId },
        ServiceErrorCode.SupervisorNotFound
      );
    }
  }

  /**
   * Managers see every employee, supervisors only their own
   */
  async listEmployees(actor: Actor, correlationId?: string): Promise<ServiceOperationResult<Employee[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_employees_${Date.now()}`;

    const scoped = actor.role !== UserRole.Manager;

    try {
      const records = await queryMany<EmployeeRecord>(
        `SELECT e.id, e.employee_code, e.name, e.supervisor_id, e.created_at, e.updated_at,
                s.name AS supervisor_name, s.email AS supervisor_email
         FROM employees e
         JOIN supervisors s ON s.id = e.supervisor_id
         ${scoped ? 'WHERE e.supervisor_id = $1' : ''}
         ORDER BY e.name ASC, e.employee_code ASC`,
        scoped ? [actor.userId] : [],
        { correlationId: cid, operation: 'list_employees' }
      );

      return succeed(records.map(mapEmployeeRecord), startTime);
    } catch (error) {
      return this.queryFailure('Failed to list employees', error, startTime, cid);
    }
  }

  async createEmployee(input: EmployeeInput, correlationId?: string): Promise<ServiceOperationResult<Employee>> {
    const startTime = Date.now();
    const cid = correlationId || `create_employee_${Date.now()}`;

    const errors = validateEmployeeInput(input);
    if (errors.length > 0) {
      return validationFailure(errors, startTime);
    }

    const employeeCode = input.employeeCode.trim();

    try {
      if (!(await this.accountExists(input.supervisorId, cid))) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      if (await this.codeTaken(employeeCode, null, cid)) {
        return fail(ServiceErrorCode.EmployeeCodeExists, startTime);
      }

      const now = new Date();
      const record = await queryOne<EmployeeRecord>(
        `INSERT INTO employees (id, employee_code, name, supervisor_id, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${EMPLOYEE_COLUMNS}`,
        [crypto.randomUUID(), employeeCode, input.name.trim(), input.supervisorId, now, now],
        { correlationId: cid, operation: 'create_employee' }
      );

      if (!record) {
        return fail(ServiceErrorCode.PersistenceError, startTime);
      }

      console.log('[ROSTER_SERVICE] Employee created:', {
        employeeId: record.id,
        supervisorId: record.supervisor_id,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(mapEmployeeRecord(record), startTime);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return fail(ServiceErrorCode.EmployeeCodeExists, startTime);
      }
      return this.queryFailure(
        'Employee creation failed',
        error,
        startTime,
        cid,
        {},
        ServiceErrorCode.SupervisorNotFound
      );
    }
  }

  async updateEmployee(
    employeeId: string,
    input: EmployeeInput,
    correlationId?: string
  ): Promise<ServiceOperationResult<Employee>> {
    const startTime = Date.now();
    const cid = correlationId || `update_employee_${Date.now()}`;

    const errors = validateEmployeeInput(input);
    if (errors.length > 0) {
      return validationFailure(errors, startTime);
    }

    const employeeCode = input.employeeCode.trim();

    try {
      const existing = await queryOne<{ id: string }>('SELECT id FROM employees WHERE id = $1', [employeeId], {
        correlationId: cid,
        operation: 'fetch_employee',
      });

      if (!existing) {
        return fail(ServiceErrorCode.EmployeeNotFound, startTime);
      }

      if (!(await this.accountExists(input.supervisorId, cid))) {
        return fail(ServiceErrorCode.SupervisorNotFound, startTime);
      }

      if (await this.codeTaken(employeeCode, employeeId, cid)) {
        return fail(ServiceErrorCode.EmployeeCodeExists, startTime);
      }

      const record = await queryOne<EmployeeRecord>(
        `UPDATE employees SET employee_code = $2, name = $3, supervisor_id = $4, updated_at = $5
         WHERE id = $1
         RETURNING ${EMPLOYEE_COLUMNS}`,
        [employeeId, employeeCode, input.name.trim(), input.supervisorId, new Date()],
        { correlationId: cid, operation: 'update_employee' }
      );

      if (!record) {
        return fail(ServiceErrorCode.EmployeeNotFound, startTime);
      }

      return succeed(mapEmployeeRecord(record), startTime);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return fail(ServiceErrorCode.EmployeeCodeExists, startTime);
      }
      return this.queryFailure('Employee update failed', error, startTime, cid, { employeeId });
    }
  }

  async deleteEmployee(
    employeeId: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<EmployeeDeletionResult>> {
    const startTime = Date.now();
    const cid = correlationId || `delete_employee_${Date.now()}`;

    try {
      const result = await executeTransaction<EmployeeDeletionResult | null>(
        async (client) => {
          const existing = await client.query('SELECT id FROM employees WHERE id = $1 FOR UPDATE', [employeeId]);

          if (existing.rows.length === 0) {
            return null;
          }

          const responses = await client.query(
            'DELETE FROM evaluation_responses WHERE evaluation_id IN (SELECT id FROM evaluations WHERE employee_id = $1)',
            [employeeId]
          );
          const evaluations = await client.query('DELETE FROM evaluations WHERE employee_id = $1', [employeeId]);
          await client.query('DELETE FROM employees WHERE id = $1', [employeeId]);

          return {
            employeeId,
            deletedEvaluations: evaluations.rowCount ?? 0,
            deletedResponses: responses.rowCount ?? 0,
          };
        },
        { correlationId: cid, operation: 'delete_employee' }
      );

      if (!result) {
        return fail(ServiceErrorCode.EmployeeNotFound, startTime);
      }

      console.log('[ROSTER_SERVICE] Employee deleted:', {
        ...result,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed(result, startTime);
    } catch (error) {
      return this.queryFailure(
        'Employee deletion failed',
        error,
        startTime,
        cid,
        { employeeId },
        ServiceErrorCode.EmployeeNotFound
      );
    }
  }

  /**
   * Import employees from CSV rows of (name, code, supervisor email)
   *
   * Rejected rows are reported with their 1-based row number; accepted rows are
   * inserted together in one transaction.
   */
  async importEmployees(content: string, correlationId?: string): Promise<ServiceOperationResult<ImportResult>> {
    const startTime = Date.now();
    const cid = correlationId || `import_employees_${Date.now()}`;

    const rows = parseCsv(content);
    const firstRow = rows[0];
    const startIndex = firstRow && isImportHeaderRow(firstRow) ? 1 : 0;
    const dataRows = rows.slice(startIndex).map((cells, index) => ({
      rowNumber: startIndex + index + 1,
      cells: cells.map((cell) => cell.trim()),
    }));

    try {
      const emails = dataRows.map((row) => (row.cells[2] ?? '').toLowerCase()).filter((email) => email.length > 0);
      const codes = dataRows.map((row) => row.cells[1] ?? '').filter((code) => code.length > 0);

      const supervisors =
        emails.length === 0
          ? []
          : await queryMany<{ id: string; email: string }>(
              'SELECT id, LOWER(email) AS email FROM supervisors WHERE LOWER(email) = ANY($1)',
              [emails],
              { correlationId: cid, operation: 'import_fetch_supervisors' }
            );
      const existingCodes =
        codes.length === 0
          ? []
          : await queryMany<{ employee_code: string }>(
              'SELECT employee_code FROM employees WHERE employee_code = ANY($1)',
              [codes],
              { correlationId: cid, operation: 'import_fetch_codes' }
            );

      const supervisorIds = new Map(supervisors.map((supervisor) => [supervisor.email, supervisor.id]));
      const seenCodes = new Set(existingCodes.map((record) => record.employee_code));

      const errors: ImportRowError[] = [];
      const candidates: ImportCandidate[] = [];

      for (const { rowNumber, cells } of dataRows) {
        const [name = '', employeeCode = '', supervisorEmail = ''] = cells;

        if (cells.length < IMPORT_MIN_COLUMNS) {
          errors.push({ row: rowNumber, message: `Row ${rowNumber}: Not enough columns.` });
          continue;
        }

        const fieldErrors = [...validatePersonName(name).errors, ...validateEmployeeCode(employeeCode).errors];
        if (fieldErrors.length > 0) {
          errors.push({ row: rowNumber, message: `Row ${rowNumber}: ${fieldErrors.join(', ')}.` });
          continue;
        }

        const supervisorId = supervisorIds.get(supervisorEmail.toLowerCase());
        if (!supervisorId) {
          errors.push({ row: rowNumber, message: `Row ${rowNumber}: Supervisor ${supervisorEmail} not found.` });
          continue;
        }

        if (seenCodes.has(employeeCode)) {
          errors.push({ row: rowNumber, message: `Row ${rowNumber}: Code ${employeeCode} already exists.` });
          continue;
        }

        seenCodes.add(employeeCode);
        candidates.push({ name, employeeCode, supervisorId });
      }

      if (candidates.length > 0) {
        await executeTransaction<void>(
          async (client) => {
            const now = new Date();
            for (const candidate of candidates) {
              await client.query(
                `INSERT INTO employees (id, employee_code, name, supervisor_id, created_at, updated_at)
                 VALUES ($1, $2, $3, $4, $5, $6)`,
                [crypto.randomUUID(), candidate.employeeCode, candidate.name, candidate.supervisorId, now, now]
              );
            }
          },
          { correlationId: cid, operation: 'import_employees' }
        );
      }

      console.log('[ROSTER_SERVICE] Employee import finished:', {
        rows: dataRows.length,
        created: candidates.length,
        rejected: errors.length,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed({ created: candidates.length, errors }, startTime);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return fail(ServiceErrorCode.EmployeeCodeExists, startTime);
      }
      return this.queryFailure('Employee import failed', error, startTime, cid);
    }
  }

  private async findSupervisor(supervisorId: string, correlationId: string): Promise<SupervisorRecord | null> {
    return queryOne<SupervisorRecord>(
      `SELECT ${SUPERVISOR_COLUMNS} FROM supervisors WHERE id = $1 AND role = $2`,
      [supervisorId, UserRole.Supervisor],
      { correlationId, operation: 'fetch_supervisor' }
    );
  }

  private async accountExists(accountId: string, correlationId: string): Promise<boolean> {
    const record = await queryOne<{ id: string }>('SELECT id FROM supervisors WHERE id = $1', [accountId], {
      correlationId,
      operation: 'fetch_account',
    });
    return record !== null;
  }

  private async emailTaken(email: string, excludeId: string | null, correlationId: string): Promise<boolean> {
    const record = await queryOne<{ id: string }>(
      'SELECT id FROM supervisors WHERE LOWER(email) = $1 AND ($2::uuid IS NULL OR id <> $2::uuid)',
      [email, excludeId],
      { correlationId, operation: 'check_email' }
    );
    return record !== null;
  }

  private async codeTaken(employeeCode: string, excludeId: string | null, correlationId: string): Promise<boolean> {
    const record = await queryOne<{ id: string }>(
      'SELECT id FROM employees WHERE employee_code = $1 AND ($2::uuid IS NULL OR id <> $2::uuid)',
      [employeeCode, excludeId],
      { correlationId, operation: 'check_employee_code' }
    );
    return record !== null;
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
    console.error(`[ROSTER_SERVICE] ${message}:`, {
      ...context,
      error: errorMessage(error),
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return failFromError(error, startTime, notFoundCode);
  }
}

export const rosterService = new RosterService();

export default rosterService;
