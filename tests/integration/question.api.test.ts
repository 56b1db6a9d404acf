/**
 * Question API Integration Tests
 *
 * @module tests/integration/question.api
 */

import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';

import { createApp } from '../../src/app.js';
import { queryOne } from '../../src/db/index.js';
import { questionService } from '../../src/services/question.service.js';
import { managerAuth } from '../helpers/auth.js';

vi.mock('../../src/db/index.js', () => ({
  executeQuery: vi.fn(),
  executeTransaction: vi.fn(),
  queryOne: vi.fn(),
  queryMany: vi.fn(),
}));

describe('Question API', () => {
  const app = createApp();

  describe('POST /api/questions', () => {
    it('should reject an active flag that is not a boolean', async () => {
      const response = await request(app)
        .post('/api/questions')
        .set('Authorization', managerAuth())
        .send({ questionText: 'Meets deadlines?', isActive: 'yes' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.message).toBe('Active flag must be a boolean');
      expect(vi.mocked(queryOne)).not.toHaveBeenCalled();
    });
  });

  describe('PUT /api/questions/:id', () => {
    it('should answer 404 for an id that is not a uuid', async () => {
      const update = vi.spyOn(questionService, 'update');

      const response = await request(app)
        .put('/api/questions/q1')
        .set('Authorization', managerAuth())
        .send({ questionText: 'Meets deadlines?' });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('QUESTION_NOT_FOUND');
      expect(response.body.message).toBe('Question not found.');
      expect(update).not.toHaveBeenCalled();
    });
  });

  describe('DELETE /api/answers/:id', () => {
    it('should answer 404 for an id that is not a uuid', async () => {
      const remove = vi.spyOn(questionService, 'deleteAnswer');

      const response = await request(app).delete('/api/answers/a1').set('Authorization', managerAuth());

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('ANSWER_NOT_FOUND');
      expect(remove).not.toHaveBeenCalled();
    });
  });
});
