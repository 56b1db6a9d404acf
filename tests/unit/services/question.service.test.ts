import { describe, it, expect, vi, beforeEach } from 'vitest';

import * as db from '../../../src/db/index.js';
import { QuestionService } from '../../../src/services/question.service.js';
import { ServiceErrorCode } from '../../../src/types/index.js';
import { createFakeClient, rows, useFakeTransaction, type FakeClient } from '../../helpers/db.js';

vi.mock('../../../src/db/index.js', () => ({
  executeQuery: vi.fn(),
  executeTransaction: vi.fn(),
  queryOne: vi.fn(),
  queryMany: vi.fn(),
}));

const createdAt = new Date('2024-03-01T00:00:00Z');

function questionRecord(id: string, text: string, orderIndex = 0, isActive = true) {
  return {
    id,
    question_text: text,
    is_active: isActive,
    order_index: orderIndex,
    created_at: createdAt,
    updated_at: createdAt,
  };
}

function answerRecord(id: string, questionId: string, text: string, score: number | null, orderIndex = 0) {
  return { id, question_id: questionId, answer_text: text, score, order_index: orderIndex };
}

describe('QuestionService', () => {
  const service = new QuestionService();
  let fake: FakeClient;

  beforeEach(() => {
    fake = createFakeClient();
    useFakeTransaction(fake);
  });

  describe('fetchQuestions', () => {
    it('should attach answers to their questions in query order', async () => {
      vi.mocked(db.queryMany)
        .mockResolvedValueOnce([questionRecord('q1', 'Meets deadlines?', 1), questionRecord('q2', 'Quality of work?', 2)])
        .mockResolvedValueOnce([
          answerRecord('a1', 'q1', 'Always', 100, 1),
          answerRecord('a3', 'q2', 'Good', 80, 1),
          answerRecord('a2', 'q1', 'Never', 20, 2),
        ]);

      const questions = await service.fetchQuestions({ activeOnly: true });

      expect(questions.map((q) => q.id)).toEqual(['q1', 'q2']);
      expect(questions[0]?.answers.map((a) => a.id)).toEqual(['a1', 'a2']);
      expect(questions[1]?.answers).toEqual([
        { id: 'a3', questionId: 'q2', answerText: 'Good', score: 80, orderIndex: 1 },
      ]);
      expect(vi.mocked(db.queryMany).mock.calls[0]?.[0]).toContain('WHERE is_active = TRUE');
      expect(vi.mocked(db.queryMany).mock.calls[1]?.[1]).toEqual([['q1', 'q2']]);
    });

    it('should include inactive questions when asked for all', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([questionRecord('q1', 'Retired question', 0, false)]).mockResolvedValueOnce([]);

      const questions = await service.fetchQuestions({ activeOnly: false });

      expect(vi.mocked(db.queryMany).mock.calls[0]?.[0]).not.toContain('WHERE is_active');
      expect(questions[0]?.isActive).toBe(false);
      expect(questions[0]?.answers).toEqual([]);
    });

    it('should skip the answer query when there are no questions', async () => {
      vi.mocked(db.queryMany).mockResolvedValueOnce([]);

      await expect(service.fetchQuestions({ activeOnly: true })).resolves.toEqual([]);
      expect(db.queryMany).toHaveBeenCalledTimes(1);
    });
  });

  describe('listActive', () => {
    it('should wrap query failures as PERSISTENCE_ERROR', async () => {
      vi.mocked(db.queryMany).mockRejectedValueOnce(new Error('connection lost'));

      const result = await service.listActive('cid');

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ServiceErrorCode.PersistenceError);
    });
  });

  describe('create', () => {
    it('should trim the text and default to active at order 0', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(questionRecord('q-new', 'How reliable is the employee?'));

      const result = await service.create({ questionText: '  How reliable is the employee?  ' });

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ id: 'q-new', questionText: 'How reliable is the employee?', answers: [] });
      const params = vi.mocked(db.queryOne).mock.calls[0]?.[1];
      expect(params?.slice(1, 4)).toEqual(['How reliable is the employee?', true, 0]);
    });

    it('should reject text shorter than five characters', async () => {
      const result = await service.create({ questionText: ' Why ' });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Question text must be between 5 and 500 characters');
      expect(db.queryOne).not.toHaveBeenCalled();
    });

    it('should reject a fractional order', async () => {
      const result = await service.create({ questionText: 'Valid question', orderIndex: 1.5 });

      expect(result.error).toBe('Order must be an integer between -2147483648 and 2147483647');
    });

    it('should reject an order beyond the INT4 column', async () => {
      const result = await service.create({ questionText: 'Valid question', orderIndex: 2 ** 31 });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Order must be an integer between -2147483648 and 2147483647');
      expect(db.queryOne).not.toHaveBeenCalled();
    });

    it('should accept the largest INT4 order', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(questionRecord('q-new', 'Valid question', 2147483647));

      const result = await service.create({ questionText: 'Valid question', orderIndex: 2147483647 });

      expect(result.success).toBe(true);
      expect(result.data?.orderIndex).toBe(2147483647);
    });

    it('should reject an active flag that was not a boolean', async () => {
      const result = await service.create({ questionText: 'Valid question', isActive: null });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Active flag must be a boolean');
      expect(db.queryOne).not.toHaveBeenCalled();
    });
  });

  describe('update', () => {
    it('should keep omitted fields through COALESCE and return the answers', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(questionRecord('q1', 'Updated question', 3, false));
      vi.mocked(db.queryMany).mockResolvedValueOnce([answerRecord('a1', 'q1', 'Yes', null)]);

      const result = await service.update('q1', { questionText: 'Updated question' });

      expect(result.success).toBe(true);
      expect(result.data?.answers).toHaveLength(1);
      expect(vi.mocked(db.queryOne).mock.calls[0]?.[1]?.slice(0, 4)).toEqual(['q1', 'Updated question', null, null]);
    });

    it('should answer QUESTION_NOT_FOUND when nothing was updated', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.update('missing', { questionText: 'Updated question' });

      expect(result.errorCode).toBe(ServiceErrorCode.QuestionNotFound);
    });
  });

  describe('delete', () => {
    it('should remove responses, answers and the question and report the counts', async () => {
      fake.query
        .mockResolvedValueOnce(rows([{ id: 'q1' }]))
        .mockResolvedValueOnce(rows([], 7))
        .mockResolvedValueOnce(rows([], 4))
        .mockResolvedValueOnce(rows([], 1));

      const result = await service.delete('q1', 'cid');

      expect(result.data).toEqual({ questionId: 'q1', deletedAnswers: 4, deletedResponses: 7 });
      expect(fake.query.mock.calls.map((call) => call[0])).toEqual([
        'SELECT id FROM evaluation_questions WHERE id = $1 FOR UPDATE',
        'DELETE FROM evaluation_responses WHERE question_id = $1',
        'DELETE FROM question_answers WHERE question_id = $1',
        'DELETE FROM evaluation_questions WHERE id = $1',
      ]);
    });

    it('should answer QUESTION_NOT_FOUND without deleting anything', async () => {
      fake.query.mockResolvedValueOnce(rows([]));

      const result = await service.delete('missing');

      expect(result.errorCode).toBe(ServiceErrorCode.QuestionNotFound);
      expect(fake.query).toHaveBeenCalledTimes(1);
    });

    it('should report a failed transaction as PERSISTENCE_ERROR', async () => {
      fake.query.mockResolvedValueOnce(rows([{ id: 'q1' }])).mockRejectedValueOnce(new Error('deadlock detected'));

      const result = await service.delete('q1');

      expect(result.errorCode).toBe(ServiceErrorCode.PersistenceError);
      expect(result.error).toBe('The changes could not be saved. Nothing was written.');
    });
  });

  describe('addAnswer', () => {
    it('should store a null score when none is given', async () => {
      vi.mocked(db.queryOne)
        .mockResolvedValueOnce({ id: 'q1' })
        .mockResolvedValueOnce(answerRecord('a-new', 'q1', 'Not applicable', null, 6));

      const result = await service.addAnswer('q1', { answerText: ' Not applicable ', orderIndex: 6 });

      expect(result.data).toEqual({ id: 'a-new', questionId: 'q1', answerText: 'Not applicable', score: null, orderIndex: 6 });
      expect(vi.mocked(db.queryOne).mock.calls[1]?.[1]?.slice(1)).toEqual(['q1', 'Not applicable', null, 6]);
    });

    it('should reject a score outside 0 to 100', async () => {
      const result = await service.addAnswer('q1', { answerText: 'Too much', score: 101 });

      expect(result.errorCode).toBe(ServiceErrorCode.ValidationError);
      expect(result.error).toBe('Score must be an integer between 0 and 100');
    });

    it('should answer QUESTION_NOT_FOUND for an unknown question', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.addAnswer('missing', { answerText: 'Yes', score: 100 });

      expect(result.errorCode).toBe(ServiceErrorCode.QuestionNotFound);
    });
  });

  describe('updateAnswer', () => {
    it('should answer ANSWER_NOT_FOUND for an unknown answer', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(null);

      const result = await service.updateAnswer('missing', { answerText: 'Yes', score: 50 });

      expect(result.errorCode).toBe(ServiceErrorCode.AnswerNotFound);
    });

    it('should return the updated answer', async () => {
      vi.mocked(db.queryOne).mockResolvedValueOnce(answerRecord('a1', 'q1', 'Mostly', 70, 2));

      const result = await service.updateAnswer('a1', { answerText: 'Mostly', score: 70 });

      expect(result.data?.score).toBe(70);
    });
  });

  describe('deleteAnswer', () => {
    it('should remove the responses that chose the answer', async () => {
      fake.query
        .mockResolvedValueOnce(rows([{ id: 'a1' }]))
        .mockResolvedValueOnce(rows([], 3))
        .mockResolvedValueOnce(rows([], 1));

      const result = await service.deleteAnswer('a1');

      expect(result.data).toEqual({ answerId: 'a1', deletedResponses: 3 });
      expect(fake.query.mock.calls[1]?.[0]).toBe('DELETE FROM evaluation_responses WHERE answer_id = $1');
    });

    it('should answer ANSWER_NOT_FOUND for an unknown answer', async () => {
      fake.query.mockResolvedValueOnce(rows([]));

      const result = await service.deleteAnswer('missing');

      expect(result.errorCode).toBe(ServiceErrorCode.AnswerNotFound);
    });
  });
});
