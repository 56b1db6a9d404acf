/**
 * Evaluation API Integration Tests
 *
 * @module tests/integration/evaluation.api
 */

import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';

import { createApp } from '../../src/app.js';
import { evaluationService } from '../../src/services/evaluation.service.js';
import { reportService } from '../../src/services/report.service.js';
import { ServiceErrorCode, UserRole } from '../../src/types/index.js';
import type { Evaluation } from '../../src/types/evaluation.js';
import { managerAuth, supervisorAuth, SUPERVISOR_ID } from '../helpers/auth.js';
import { EMPLOYEE_ID, FIXED_DATE, MARCH_2024, PERIOD_ID, buildQuestionBank, serviceFailure } from '../helpers/fixtures.js';

vi.mock('../../src/db/index.js', () => ({
  executeQuery: vi.fn(),
  executeTransaction: vi.fn(),
  queryOne: vi.fn(),
  queryMany: vi.fn(),
}));

function buildEvaluation(): Evaluation {
  return {
    id: 'eval-1',
    supervisorId: SUPERVISOR_ID,
    employeeId: EMPLOYEE_ID,
    periodId: PERIOD_ID,
    notes: 'Steady month',
    year: 2024,
    month: 3,
    createdAt: FIXED_DATE,
    responses: [
      {
        id: 'resp-1',
        evaluationId: 'eval-1',
        questionId: 'q1',
        answerId: 'a1-always',
        score: 100,
        createdAt: FIXED_DATE,
      },
    ],
    score: { total: 100, average: 100, scoredCount: 1 },
  };
}

describe('Evaluation API', () => {
  const app = createApp();

  describe('POST /api/evaluations', () => {
    it('should create the evaluation for the signed-in supervisor', async () => {
      const submit = vi.spyOn(evaluationService, 'submit').mockResolvedValue({
        success: true,
        data: buildEvaluation(),
        executionTimeMs: 3,
      });

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ employeeId: ` ${EMPLOYEE_ID} `, selections: { q1: 'a1-always' }, notes: 'Steady month' });

      expect(response.status).toBe(201);
      expect(response.body.message).toBe('Evaluation submitted successfully');
      expect(response.body.data.score).toEqual({ total: 100, average: 100, scoredCount: 1 });
      expect(submit.mock.calls[0]?.[0]).toEqual({ userId: SUPERVISOR_ID, role: UserRole.Supervisor });
      expect(submit.mock.calls[0]?.[1]).toEqual({
        employeeId: EMPLOYEE_ID,
        selections: { q1: 'a1-always' },
        notes: 'Steady month',
      });
    });

    it('should reject selections that are not answer ids', async () => {
      const submit = vi.spyOn(evaluationService, 'submit');

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ selections: { q1: 5 } });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.errors).toEqual([
        'Selection for question q1 must be an answer id',
        'Employee ID is required',
      ]);
      expect(submit).not.toHaveBeenCalled();
    });

    it('should reject an employee id that is not a uuid', async () => {
      const submit = vi.spyOn(evaluationService, 'submit');

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ employeeId: 'abc', selections: {} });

      expect(response.status).toBe(400);
      expect(response.body.details.errors).toEqual(['Employee ID must be a valid id']);
      expect(submit).not.toHaveBeenCalled();
    });

    it('should answer 409 while evaluations are disabled', async () => {
      vi.spyOn(evaluationService, 'submit').mockResolvedValue(serviceFailure(ServiceErrorCode.EvaluationsDisabled));

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ employeeId: EMPLOYEE_ID, selections: {} });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('EVALUATIONS_DISABLED');
      expect(response.body.message).toBe('Evaluations are currently disabled by the manager.');
    });

    it('should answer 403 for another supervisor\'s employee', async () => {
      vi.spyOn(evaluationService, 'submit').mockResolvedValue(serviceFailure(ServiceErrorCode.Forbidden));

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ employeeId: EMPLOYEE_ID, selections: { q1: 'a1-always' } });

      expect(response.status).toBe(403);
      expect(response.body.code).toBe('FORBIDDEN');
    });

    it('should answer 500 when nothing could be saved', async () => {
      vi.spyOn(evaluationService, 'submit').mockResolvedValue(serviceFailure(ServiceErrorCode.PersistenceError));

      const response = await request(app)
        .post('/api/evaluations')
        .set('Authorization', supervisorAuth())
        .send({ employeeId: EMPLOYEE_ID, selections: { q1: 'a1-always' } });

      expect(response.status).toBe(500);
      expect(response.body.message).toBe('The changes could not be saved. Nothing was written.');
    });
  });

  describe('GET /api/evaluations', () => {
    it('should pass the period filters to the service', async () => {
      const list = vi.spyOn(evaluationService, 'listEvaluations').mockResolvedValue({
        success: true,
        data: [],
        executionTimeMs: 1,
      });

      const response = await request(app)
        .get(`/api/evaluations?year=2024&month=3&employeeId=${EMPLOYEE_ID}`)
        .set('Authorization', managerAuth());

      expect(response.status).toBe(200);
      expect(list.mock.calls[0]?.[1]).toEqual({
        employeeId: EMPLOYEE_ID,
        supervisorId: undefined,
        year: 2024,
        month: 3,
      });
    });

    it('should reject a month outside the calendar', async () => {
      const response = await request(app).get('/api/evaluations?month=13').set('Authorization', managerAuth());

      expect(response.status).toBe(400);
      expect(response.body.details.errors).toEqual(['Month must be between 1 and 12']);
    });

    it('should reject a year the column cannot hold', async () => {
      const list = vi.spyOn(evaluationService, 'listEvaluations');

      const response = await request(app)
        .get('/api/evaluations?year=99999999999')
        .set('Authorization', managerAuth());

      expect(response.status).toBe(400);
      expect(response.body.details.errors).toEqual(['Year must be between 1900 and 9999']);
      expect(list).not.toHaveBeenCalled();
    });

    it('should reject id filters that are not uuids', async () => {
      const response = await request(app)
        .get('/api/evaluations?employeeId=emp-1&supervisorId=sup-1&year=abc')
        .set('Authorization', managerAuth());

      expect(response.status).toBe(400);
      expect(response.body.details.errors).toEqual([
        'Year must be a whole number',
        'Employee ID must be a valid id',
        'Supervisor ID must be a valid id',
      ]);
    });
  });

  describe('GET /api/evaluations/:id', () => {
    it('should answer 404 for a malformed id without asking the service', async () => {
      const getEvaluation = vi.spyOn(evaluationService, 'getEvaluation');

      const response = await request(app).get('/api/evaluations/not-an-id').set('Authorization', managerAuth());

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('EVALUATION_NOT_FOUND');
      expect(response.body.message).toBe('Evaluation not found.');
      expect(getEvaluation).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/evaluations/form/:employeeId', () => {
    it('should return the form even when the question bank is empty', async () => {
      const getForm = vi.spyOn(evaluationService, 'getForm').mockResolvedValue({
        success: true,
        data: {
          employee: { id: EMPLOYEE_ID, name: 'Jane Doe', employeeCode: 'EMP001', supervisorId: SUPERVISOR_ID },
          questions: [],
          period: MARCH_2024,
          evaluationsEnabled: true,
        },
        executionTimeMs: 2,
      });

      const response = await request(app)
        .get(`/api/evaluations/form/${EMPLOYEE_ID}`)
        .set('Authorization', supervisorAuth());

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Evaluation form retrieved successfully');
      expect(response.body.data.questions).toEqual([]);
      expect(response.body.data.employee.employeeCode).toBe('EMP001');
      expect(getForm.mock.calls[0]?.[1]).toBe(EMPLOYEE_ID);
    });

    it('should list the active questions with their answers', async () => {
      vi.spyOn(evaluationService, 'getForm').mockResolvedValue({
        success: true,
        data: {
          employee: { id: EMPLOYEE_ID, name: 'Jane Doe', employeeCode: 'EMP001', supervisorId: SUPERVISOR_ID },
          questions: buildQuestionBank(),
          period: MARCH_2024,
          evaluationsEnabled: false,
        },
        executionTimeMs: 2,
      });

      const response = await request(app)
        .get(`/api/evaluations/form/${EMPLOYEE_ID}`)
        .set('Authorization', supervisorAuth());

      expect(response.status).toBe(200);
      expect(response.body.data.questions.map((question: { id: string }) => question.id)).toEqual(['q1', 'q2', 'q3']);
      expect(response.body.data.evaluationsEnabled).toBe(false);
      expect(response.body.data.period.name).toBe('March 2024');
    });

    it('should answer 404 for a malformed employee id', async () => {
      const getForm = vi.spyOn(evaluationService, 'getForm');

      const response = await request(app).get('/api/evaluations/form/emp-1').set('Authorization', supervisorAuth());

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('EMPLOYEE_NOT_FOUND');
      expect(getForm).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/periods/:id/export', () => {
    it('should send the CSV as an attachment', async () => {
      const exportCsv = vi.spyOn(reportService, 'exportCsv').mockResolvedValue({
        success: true,
        data: {
          filename: 'evaluations_2024_03.csv',
          content: Buffer.from('\ufeffEmployee Name,Employee Code,Supervisor Email\r\n', 'utf8'),
          rowCount: 0,
        },
        executionTimeMs: 2,
      });

      const response = await request(app)
        .get(`/api/periods/${PERIOD_ID}/export`)
        .set('Authorization', managerAuth());

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="evaluations_2024_03.csv"');
      expect(response.text.endsWith('Employee Name,Employee Code,Supervisor Email\r\n')).toBe(true);
      expect(exportCsv.mock.calls[0]?.[0]).toBe(PERIOD_ID);
    });

    it('should answer 404 for an unknown period', async () => {
      vi.spyOn(reportService, 'exportCsv').mockResolvedValue(serviceFailure(ServiceErrorCode.PeriodNotFound));

      const response = await request(app)
        .get(`/api/periods/${PERIOD_ID}/export`)
        .set('Authorization', managerAuth());

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('PERIOD_NOT_FOUND');
    });

    it('should answer 404 for a malformed period id without querying', async () => {
      const exportCsv = vi.spyOn(reportService, 'exportCsv');

      const response = await request(app).get('/api/periods/missing/export').set('Authorization', managerAuth());

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('PERIOD_NOT_FOUND');
      expect(response.body.message).toBe('Evaluation period not found.');
      expect(exportCsv).not.toHaveBeenCalled();
    });
  });
});
