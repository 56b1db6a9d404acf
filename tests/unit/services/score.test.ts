import { describe, it, expect } from 'vitest';

import { evaluationScore } from '../../../src/services/score.js';

describe('evaluationScore', () => {
  it('should sum and average the scored responses', () => {
    expect(evaluationScore([{ score: 80 }, { score: 60 }, { score: 100 }])).toEqual({
      total: 240,
      average: 80,
      scoredCount: 3,
    });
  });

  it('should leave unscored responses out of the total and the average', () => {
    expect(evaluationScore([{ score: 80 }, { score: null }, { score: 60 }])).toEqual({
      total: 140,
      average: 70,
      scoredCount: 2,
    });
  });

  it('should count a zero score', () => {
    expect(evaluationScore([{ score: 0 }, { score: 100 }])).toEqual({ total: 100, average: 50, scoredCount: 2 });
  });

  it('should average to 0 when nothing is scored', () => {
    expect(evaluationScore([{ score: null }])).toEqual({ total: 0, average: 0, scoredCount: 0 });
    expect(evaluationScore([])).toEqual({ total: 0, average: 0, scoredCount: 0 });
  });
});
