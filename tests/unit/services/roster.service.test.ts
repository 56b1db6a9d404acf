import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { resetAuthConfig } from '../../../src/config/auth.js';
import { DatabaseError, UNIQUE_VIOLATION } from '../../../src/db/errors.js';
import * as db from '../../../src/db/index.js';
import { RosterService, isImportHeaderRow } from '../../../src/services/roster.service.js';
import { ServiceErrorCode, UserRole, type Actor } from '../../../src/types/index.js';
import { createFakeClient, rows, useFakeTransaction, type FakeClient } from '../../helpers/db.js';

vi.mock('../../../src/db/index.js', () => ({
  executeQuery: vi.fn(),
  executeTransaction: vi.fn(),
  queryOne: vi.fn(),
  queryMany: vi.fn(),
}));

const manager: Actor = { userId: 'manager-1', role: UserRole.Manager };
const lead: Actor = { userId: 'sup-1', role: UserRole.Supervisor };
const createdAt = new Date('2024-03-01T00:00:00Z');

function supervisorRecord(id: string, email: string) {
  return {
    id,
    name: 'Lena Lead',
    email,
    role: 'SUPERVISOR',
    manager_id: 'manager-1',
    created_at: createdAt,
    updated_at: createdAt,
  };
}

function employeeRecord(id: string, code: string, name: string) {
  return {
    id,
    employee_code: code,
    name,
    supervisor_id: 'sup-1',
    created_at: createdAt,
    updated_at: createdAt,
  };
}

describe('RosterService', () => {
  const service = new RosterService();
  let fake: FakeClient;

  beforeEach(() => {
    fake = createFakeClient();
    useFakeTransaction(fake);
  });

  describe('isImportHeaderRow', () => {
    it('should treat a first cell mentioning Name as a header', () => {
      expect(isImportHeaderRow(['Employee Name', 'Code', 'Supervisor'])).toBe(true);
      expect(isImportHeaderRow(['Jane Doe', 'EMP001', 'lead@example.com'])).toBe(false);
      expect(isImportHeaderRow([])).toBe(false);
    });
  });

  describe('listSupervisors', () => {
    it('should map records with their employee counts', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([
        { ...supervisorRecord('sup-1', 'lead@example.com'), employee_count: 3 },
      ]);

      const result = await service.listSupervisors();

      expect(result.success).toBe(true);
      expect(result.data).toEqual([
        {
          id: 'sup-1',
          name: 'Lena Lead',
          email: 'lead@example.com',
          role: UserRole.Supervisor,
          managerId: 'manager-1',
          createdAt,
          updatedAt: createdAt,
          employeeCount: 3,
        },
      ]);
      expect(vi.mocked(db.queryMany).mock.calls[0]?.[1]).toEqual([UserRole.Supervisor]);
    });

    it('should report a persistence error when the query fails', async () => {
      vi.mocked(db.queryMany).mockRejectedValueOnce(new Error('connection lost'));

      const result = await service.listSupervisors();

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ServiceErrorCode.PersistenceError);
    });
  });

  describe('createSupervisor', () => {
    afterEach(() => {
      delete process.env.ALLOWED_EMAIL_DOMAIN;
      resetAuthConfig();
    });

    it('should reject an invalid name and email together', async () => {
      const result = await service.createSupervisor(manager, { name: 'A', email: 'not-an-email' });

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Name must be between 2 and 100 characters, Invalid email address');
      expect(db.queryOne).not.toHaveBeenCalled();
    });

    it('should reject a supplied password that is too short', async () => {
      const result = await service.createSupervisor(manager, {
        name: 'Lena Lead',
        email: 'lead@example.com',
        password: 'abc',
      });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Password must be at least 6 characters long');
    });

    it('should reject an email outside the allowed domain', async () => {
      process.env.ALLOWED_EMAIL_DOMAIN = 'example.com';
      resetAuthConfig();

      const result = await service.createSupervisor(manager, { name: 'Lena Lead', email: 'lead@elsewhere.org' });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Email domain is not allowed');
    });

    it('should refuse an email that is already registered', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce({ id: 'sup-9' });

      const result = await service.createSupervisor(manager, { name: 'Lena Lead', email: 'Lead@Example.com' });

      expect(result.errorCode).toBe(ServiceErrorCode.EmailAlreadyExists);
      expect(vi.mocked(db.queryOne).mock.calls[0]?.[1]).toEqual(['lead@example.com', null]);
    });

    it('should generate and return a temporary password when none is given', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(supervisorRecord('sup-2', 'lead@example.com'));

      const result = await service.createSupervisor(manager, { name: ' Lena Lead ', email: ' Lead@Example.com ' });

      expect(result.success).toBe(true);
      expect(result.data?.supervisor.id).toBe('sup-2');
      expect(result.data?.temporaryPassword).toHaveLength(12);

      const params = vi.mocked(db.queryOne).mock.calls[1]?.[1];
      expect(params?.[1]).toBe('Lena Lead');
      expect(params?.[2]).toBe('lead@example.com');
      expect(params?.[3]).not.toBe(result.data?.temporaryPassword);
      expect(params?.[4]).toBe(UserRole.Supervisor);
      expect(params?.[5]).toBe('manager-1');
    });

    it('should not echo a password the manager chose', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(supervisorRecord('sup-2', 'lead@example.com'));

      const result = await service.createSupervisor(manager, {
        name: 'Lena Lead',
        email: 'lead@example.com',
        password: 'chosen-pass',
      });

      expect(result.success).toBe(true);
      expect(result.data?.temporaryPassword).toBeUndefined();
    });

    it('should map a unique violation on insert to an email conflict', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(null)
        .mockRejectedValueOnce(new DatabaseError('duplicate key', UNIQUE_VIOLATION));

      const result = await service.createSupervisor(manager, {
        name: 'Lena Lead',
        email: 'lead@example.com',
        password: 'chosen-pass',
      });

      expect(result.errorCode).toBe(ServiceErrorCode.EmailAlreadyExists);
    });
  });

  describe('updateSupervisor', () => {
    it('should fail when the supervisor does not exist', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.updateSupervisor('sup-404', { name: 'Lena Lead', email: 'lead@example.com' });

      expect(result.errorCode).toBe(ServiceErrorCode.SupervisorNotFound);
    });

    it('should refuse an email held by another account', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(supervisorRecord('sup-1', 'lead@example.com'))
        .mockResolvedValueOnce({ id: 'sup-2' });

      const result = await service.updateSupervisor('sup-1', { name: 'Lena Lead', email: 'other@example.com' });

      expect(result.errorCode).toBe(ServiceErrorCode.EmailAlreadyExists);
      expect(vi.mocked(db.queryOne).mock.calls[1]?.[1]).toEqual(['other@example.com', 'sup-1']);
    });

    it('should return the updated supervisor', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(supervisorRecord('sup-1', 'lead@example.com'))
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(supervisorRecord('sup-1', 'renamed@example.com'));

      const result = await service.updateSupervisor('sup-1', { name: 'Lena Lead', email: 'Renamed@Example.com' });

      expect(result.success).toBe(true);
      expect(result.data?.email).toBe('renamed@example.com');
      expect(vi.mocked(db.queryOne).mock.calls[2]?.[1]?.slice(0, 3)).toEqual(['sup-1', 'Lena Lead', 'renamed@example.com']);
    });
  });

  describe('setSupervisorPassword', () => {
    it('should require matching passwords', async () => {
      const result = await service.setSupervisorPassword('sup-1', {
        newPassword: 'new-pass-1',
        confirmPassword: 'new-pass-2',
      });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Passwords must match');
    });

    it('should store a hash of the new password', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce(supervisorRecord('sup-1', 'lead@example.com'))
        .mockResolvedValueOnce(supervisorRecord('sup-1', 'lead@example.com'));

      const result = await service.setSupervisorPassword('sup-1', {
        newPassword: 'new-pass-1',
        confirmPassword: 'new-pass-1',
      });

      expect(result.success).toBe(true);
      const hash = vi.mocked(db.queryOne).mock.calls[1]?.[1]?.[1];
      expect(typeof hash).toBe('string');
      expect(hash).not.toBe('new-pass-1');
    });
  });

  describe('deleteSupervisor', () => {
    it('should refuse to delete the calling account', async () => {
      const result = await service.deleteSupervisor(manager, 'manager-1');

      expect(result.errorCode).toBe(ServiceErrorCode.CannotDeleteSelf);
      expect(db.executeTransaction).not.toHaveBeenCalled();
    });

    it('should fail when no supervisor has the id', async () => {
      fake.query.mockResolvedValueOnce(rows([]));

      const result = await service.deleteSupervisor(manager, 'sup-404');

      expect(result.errorCode).toBe(ServiceErrorCode.SupervisorNotFound);
      expect(fake.query).toHaveBeenCalledTimes(1);
    });

    it('should delete responses, evaluations and employees and report the counts', async () => {
      fake.query
        .mockResolvedValueOnce(rows([{ id: 'sup-1' }]))
        .mockResolvedValueOnce(rows([], 4))
        .mockResolvedValueOnce(rows([], 2))
        .mockResolvedValueOnce(rows([], 3))
        .mockResolvedValueOnce(rows([], 0))
        .mockResolvedValueOnce(rows([], 1));

      const result = await service.deleteSupervisor(manager, 'sup-1');

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        supervisorId: 'sup-1',
        deletedEmployees: 3,
        deletedEvaluations: 2,
        deletedResponses: 4,
      });
      expect(fake.query).toHaveBeenCalledTimes(6);
      expect(fake.query.mock.calls[0]?.[1]).toEqual(['sup-1', UserRole.Supervisor]);
      expect(fake.query.mock.calls[5]?.[0]).toBe('DELETE FROM supervisors WHERE id = $1');
    });

    it('should report a persistence error when the transaction fails', async () => {
      fake.query.mockRejectedValueOnce(new Error('deadlock detected'));

      const result = await service.deleteSupervisor(manager, 'sup-1');

      expect(result.errorCode).toBe(ServiceErrorCode.PersistenceError);
    });
  });

  describe('listEmployees', () => {
    it('should scope a supervisor to their own employees', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([]);

      await service.listEmployees(lead);

      expect(vi.mocked(db.queryMany).mock.calls[0]?.[0]).toContain('WHERE e.supervisor_id = $1');
      expect(vi.mocked(db.queryMany).mock.calls[0]?.[1]).toEqual(['sup-1']);
    });

    it('should list every employee for a manager', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([
        { ...employeeRecord('emp-1', 'EMP001', 'Jane Doe'), supervisor_name: 'Lena Lead', supervisor_email: 'lead@example.com' },
      ]);

      const result = await service.listEmployees(manager);

      expect(vi.mocked(db.queryMany).mock.calls[0]?.[0]).not.toContain('WHERE');
      expect(vi.mocked(db.queryMany).mock.calls[0]?.[1]).toEqual([]);
      expect(result.data).toEqual([
        {
          id: 'emp-1',
          employeeCode: 'EMP001',
          name: 'Jane Doe',
          supervisorId: 'sup-1',
          supervisorName: 'Lena Lead',
          supervisorEmail: 'lead@example.com',
          createdAt,
          updatedAt: createdAt,
        },
      ]);
    });
  });

  describe('createEmployee', () => {
    it('should require a supervisor', async () => {
      const result = await service.createEmployee({ name: 'Jane Doe', employeeCode: 'EMP001', supervisorId: ' ' });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Supervisor is required');
    });

    it('should reject a code that is too short', async () => {
      const result = await service.createEmployee({ name: 'Jane Doe', employeeCode: 'E1', supervisorId: 'sup-1' });

      expect(result.error).toBe('Employee code must be between 3 and 20 characters');
    });

    it('should fail when the supervisor does not exist', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.createEmployee({ name: 'Jane Doe', employeeCode: 'EMP001', supervisorId: 'sup-404' });

      expect(result.errorCode).toBe(ServiceErrorCode.SupervisorNotFound);
    });

    it('should refuse a code that is already used', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce({ id: 'sup-1' }).mockResolvedValueOnce({ id: 'emp-9' });

      const result = await service.createEmployee({ name: 'Jane Doe', employeeCode: 'EMP001', supervisorId: 'sup-1' });

      expect(result.errorCode).toBe(ServiceErrorCode.EmployeeCodeExists);
    });

    it('should insert the trimmed employee', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce({ id: 'sup-1' })
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(employeeRecord('emp-1', 'EMP001', 'Jane Doe'));

      const result = await service.createEmployee({ name: ' Jane Doe ', employeeCode: ' EMP001 ', supervisorId: 'sup-1' });

      expect(result.success).toBe(true);
      expect(result.data?.employeeCode).toBe('EMP001');
      expect(vi.mocked(db.queryOne).mock.calls[2]?.[1]?.slice(1, 4)).toEqual(['EMP001', 'Jane Doe', 'sup-1']);
    });
  });

  describe('updateEmployee', () => {
    it('should fail when the employee does not exist', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.updateEmployee('emp-404', {
        name: 'Jane Doe',
        employeeCode: 'EMP001',
        supervisorId: 'sup-1',
      });

      expect(result.errorCode).toBe(ServiceErrorCode.EmployeeNotFound);
    });

    it('should allow keeping the same code', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce({ id: 'emp-1' })
        .mockResolvedValueOnce({ id: 'sup-1' })
        .mockResolvedValueOnce(null)
        .mockResolvedValueOnce(employeeRecord('emp-1', 'EMP001', 'Jane Smith'));

      const result = await service.updateEmployee('emp-1', {
        name: 'Jane Smith',
        employeeCode: 'EMP001',
        supervisorId: 'sup-1',
      });

      expect(result.success).toBe(true);
      expect(result.data?.name).toBe('Jane Smith');
      expect(vi.mocked(db.queryOne).mock.calls[2]?.[1]).toEqual(['EMP001', 'emp-1']);
    });
  });

  describe('deleteEmployee', () => {
    it('should fail when the employee does not exist', async () => {
      fake.query.mockResolvedValueOnce(rows([]));

      const result = await service.deleteEmployee('emp-404');

      expect(result.errorCode).toBe(ServiceErrorCode.EmployeeNotFound);
    });

    it('should delete the employee with their evaluations', async () => {
      fake.query
        .mockResolvedValueOnce(rows([{ id: 'emp-1' }]))
        .mockResolvedValueOnce(rows([], 5))
        .mockResolvedValueOnce(rows([], 2))
        .mockResolvedValueOnce(rows([], 1));

      const result = await service.deleteEmployee('emp-1');

      expect(result.data).toEqual({ employeeId: 'emp-1', deletedEvaluations: 2, deletedResponses: 5 });
      expect(fake.query.mock.calls[3]?.[0]).toBe('DELETE FROM employees WHERE id = $1');
    });
  });

  describe('importEmployees', () => {
    it('should insert valid rows and report each rejected one', async () => {
      vi.mocked(db.queryMany)
        .mockResolvedValueOnce([{ id: 'sup-1', email: 'lead@example.com' }])
        .mockResolvedValueOnce([{ employee_code: 'EMP005' }]);
      fake.query.mockResolvedValue(rows([], 1));

      const csv = [
        'Name,Code,Supervisor Email',
        'Jane Doe,EMP001,Lead@Example.com',
        'Bob,EMP002',
        'X,EMP003,lead@example.com',
        'Ann Lee,EMP004,ghost@example.com',
        'Tom Ray,EMP005,lead@example.com',
        'Sam Poe,EMP001,lead@example.com',
      ].join('\r\n');

      const result = await service.importEmployees(csv);

      expect(result.success).toBe(true);
      expect(result.data).toEqual({
        created: 1,
        errors: [
          { row: 3, message: 'Row 3: Not enough columns.' },
          { row: 4, message: 'Row 4: Name must be between 2 and 100 characters.' },
          { row: 5, message: 'Row 5: Supervisor ghost@example.com not found.' },
          { row: 6, message: 'Row 6: Code EMP005 already exists.' },
          { row: 7, message: 'Row 7: Code EMP001 already exists.' },
        ],
      });
      expect(db.executeTransaction).toHaveBeenCalledTimes(1);
      expect(fake.query).toHaveBeenCalledTimes(1);
      expect(fake.query.mock.calls[0]?.[1]?.slice(1, 4)).toEqual(['EMP001', 'Jane Doe', 'sup-1']);
    });

    it('should number rows from one when there is no header', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([]);

      const result = await service.importEmployees('Jane Doe,EMP001\n');

      expect(result.data).toEqual({ created: 0, errors: [{ row: 1, message: 'Row 1: Not enough columns.' }] });
      expect(db.queryMany).toHaveBeenCalledTimes(1);
      expect(db.executeTransaction).not.toHaveBeenCalled();
    });

    it('should accept quoted names with commas', async () => {
      vi.mocked(db.queryMany)
        .mockResolvedValueOnce([{ id: 'sup-1', email: 'lead@example.com' }])
        .mockResolvedValueOnce([]);
      fake.query.mockResolvedValue(rows([], 1));

      const result = await service.importEmployees('"Doe, John",EMP002,lead@example.com\n');

      expect(result.data).toEqual({ created: 1, errors: [] });
      expect(fake.query.mock.calls[0]?.[1]?.[2]).toBe('Doe, John');
    });

    it('should report a persistence error when a lookup fails', async () => {
      vi.mocked(db.queryMany).mockRejectedValueOnce(new Error('connection lost'));

      const result = await service.importEmployees('Jane Doe,EMP001,lead@example.com');

      expect(result.errorCode).toBe(ServiceErrorCode.PersistenceError);
    });
  });
});
