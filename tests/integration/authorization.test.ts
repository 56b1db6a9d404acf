/**
 * Authorization Integration Tests
 *
 * Managers reach every route; supervisors only the evaluation side. Services
 * are stubbed so only the middleware chain is under test.
 *
 * @module tests/integration/authorization
 */

import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';

import { createApp } from '../../src/app.js';
import { questionService } from '../../src/services/question.service.js';
import { rosterService } from '../../src/services/roster.service.js';
import { settingsService } from '../../src/services/settings.service.js';
import { UserRole } from '../../src/types/index.js';
import { bearer, managerAuth, supervisorAuth } from '../helpers/auth.js';
import { FIXED_DATE, buildQuestionBank } from '../helpers/fixtures.js';

vi.mock('../../src/db/index.js', () => ({
  executeQuery: vi.fn(),
  executeTransaction: vi.fn(),
  queryOne: vi.fn(),
  queryMany: vi.fn(),
}));

describe('Authorization', () => {
  const app = createApp();

  describe('manager-only routes', () => {
    const managerRoutes: Array<['get' | 'post' | 'put' | 'delete', string]> = [
      ['get', '/api/questions'],
      ['post', '/api/questions'],
      ['put', '/api/questions/q1'],
      ['delete', '/api/questions/q1'],
      ['post', '/api/questions/q1/answers'],
      ['put', '/api/answers/a1'],
      ['delete', '/api/answers/a1'],
      ['post', '/api/settings/toggle-evaluations'],
      ['get', '/api/periods'],
      ['get', '/api/periods/period-2024-03/export'],
      ['get', '/api/supervisors'],
      ['post', '/api/supervisors'],
      ['delete', '/api/supervisors/sup-2'],
      ['post', '/api/employees'],
      ['post', '/api/employees/import'],
      ['delete', '/api/employees/emp-1'],
    ];

    it.each(managerRoutes)('should forbid a supervisor from %s %s', async (method, path) => {
      const response = await request(app)[method](path).set('Authorization', supervisorAuth());

      expect(response.status).toBe(403);
      expect(response.body.code).toBe('INSUFFICIENT_PERMISSIONS');
      expect(response.body.details).toEqual({ requiredRoles: ['MANAGER'] });
    });

    it.each(managerRoutes)('should require a token for %s %s', async (method, path) => {
      const response = await request(app)[method](path);

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('MISSING_TOKEN');
    });

    it('should let a manager list supervisors', async () => {
      vi.spyOn(rosterService, 'listSupervisors').mockResolvedValue({
        success: true,
        data: [],
        executionTimeMs: 1,
      });

      const response = await request(app).get('/api/supervisors').set('Authorization', managerAuth());

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual([]);
    });

    it('should let a manager toggle evaluations', async () => {
      vi.spyOn(settingsService, 'toggle').mockResolvedValue({
        id: 'settings-1',
        evaluationsEnabled: false,
        updatedAt: FIXED_DATE,
      });

      const response = await request(app)
        .post('/api/settings/toggle-evaluations')
        .set('Authorization', managerAuth());

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Evaluations disabled');
      expect(response.body.data.evaluationsEnabled).toBe(false);
    });
  });

  describe('routes open to every role', () => {
    it('should give a supervisor the active questions', async () => {
      vi.spyOn(questionService, 'listActive').mockResolvedValue({
        success: true,
        data: buildQuestionBank(),
        executionTimeMs: 1,
      });

      const response = await request(app).get('/api/questions/active').set('Authorization', supervisorAuth());

      expect(response.status).toBe(200);
      expect(response.body.data.map((question: { id: string }) => question.id)).toEqual(['q1', 'q2', 'q3']);
    });

    it('should give a supervisor the evaluation setting', async () => {
      vi.spyOn(settingsService, 'getSettings').mockResolvedValue({
        id: 'settings-1',
        evaluationsEnabled: true,
        updatedAt: FIXED_DATE,
      });

      const response = await request(app)
        .get('/api/settings')
        .set('Authorization', bearer('sup-2', UserRole.Supervisor));

      expect(response.status).toBe(200);
      expect(response.body.data.evaluationsEnabled).toBe(true);
    });
  });

  describe('application fallbacks', () => {
    it('should report health without authentication', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
    });

    it('should answer unknown routes with 404', async () => {
      const response = await request(app).get('/api/unknown');

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
      expect(response.body.message).toBe('Route GET /api/unknown not found');
    });

    it('should answer malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('BAD_REQUEST');
    });
  });
});
