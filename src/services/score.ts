import type { EvaluationScore } from '../types/evaluation.js';

/**
 * Summarise an evaluation from the scores its responses copied at submission
 *
 * Unscored responses (null) count toward neither the total nor the average.
 *
 * @example
 * evaluationScore([{ score: 80 }, { score: null }, { score: 60 }]);
 * // { total: 140, average: 70, scoredCount: 2 }
 */
export function evaluationScore(responses: ReadonlyArray<{ readonly score: number | null }>): EvaluationScore {
  let total = 0;
  let scoredCount = 0;

  for (const response of responses) {
    if (response.score !== null) {
      total += response.score;
      scoredCount++;
    }
  }

  return {
    total,
    average: scoredCount === 0 ? 0 : total / scoredCount,
    scoredCount,
  };
}
