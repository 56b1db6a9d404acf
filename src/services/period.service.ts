/**
 * Period Service Module
 *
 * Resolves the calendar month an evaluation belongs to. Periods are created
 * lazily, one per (year, month), and never modified.
 *
 * @module services/period
 */

import crypto from 'crypto';

import { DatabaseError, isUniqueViolation } from '../db/errors.js';
import { queryMany, queryOne } from '../db/index.js';
import { ServiceErrorCode, type ServiceOperationResult } from '../types/index.js';
import type { EvaluationPeriod, EvaluationPeriodSummary } from '../types/evaluation.js';
import { formatPeriodName, resolveYearMonth } from '../utils/date.js';
import { errorMessage, fail, failFromError, succeed } from './result.js';

interface EvaluationPeriodRecord {
  readonly id: string;
  readonly year: number;
  readonly month: number;
  readonly created_at: Date;
}

interface EvaluationPeriodSummaryRecord extends EvaluationPeriodRecord {
  readonly evaluation_count: number;
}

const SELECT_PERIOD_BY_MONTH =
  'SELECT id, year, month, created_at FROM evaluation_periods WHERE year = $1 AND month = $2';

function mapPeriodRecord(record: EvaluationPeriodRecord): EvaluationPeriod {
  return {
    id: record.id,
    year: record.year,
    month: record.month,
    name: formatPeriodName(record.year, record.month),
    createdAt: record.created_at,
  };
}

export class PeriodService {
  /**
   * Return the period for the UTC month of `now`, creating it if needed
   *
   * Concurrent creators converge through the (year, month) unique constraint.
   *
   * @throws DatabaseError if the period cannot be read or created
   */
  async getOrCreateCurrent(now: Date = new Date(), correlationId?: string): Promise<EvaluationPeriod> {
    const cid = correlationId || `current_period_${Date.now()}`;
    const { year, month } = resolveYearMonth(now);

    const existing = await queryOne<EvaluationPeriodRecord>(SELECT_PERIOD_BY_MONTH, [year, month], {
      correlationId: cid,
      operation: 'fetch_period',
    });

    if (existing) {
      return mapPeriodRecord(existing);
    }

    try {
      const inserted = await queryOne<EvaluationPeriodRecord>(
        `INSERT INTO evaluation_periods (id, year, month, created_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (year, month) DO NOTHING
         RETURNING id, year, month, created_at`,
        [crypto.randomUUID(), year, month, new Date()],
        { correlationId: cid, operation: 'create_period' }
      );

      if (inserted) {
        console.log('[PERIOD_SERVICE] Period created:', {
          periodId: inserted.id,
          year,
          month,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });

        return mapPeriodRecord(inserted);
      }
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    const winner = await queryOne<EvaluationPeriodRecord>(SELECT_PERIOD_BY_MONTH, [year, month], {
      correlationId: cid,
      operation: 'refetch_period',
    });

    if (!winner) {
      throw new DatabaseError(`[PERIOD_SERVICE] Period ${year}-${month} missing after concurrent creation`);
    }

    return mapPeriodRecord(winner);
  }

  /**
   * All periods, newest first, with their evaluation counts
   */
  async listPeriods(correlationId?: string): Promise<ServiceOperationResult<EvaluationPeriodSummary[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_periods_${Date.now()}`;

    try {
      const records = await queryMany<EvaluationPeriodSummaryRecord>(
        `SELECT p.id, p.year, p.month, p.created_at, COUNT(e.id)::int AS evaluation_count
         FROM evaluation_periods p
         LEFT JOIN evaluations e ON e.period_id = p.id
         GROUP BY p.id, p.year, p.month, p.created_at
         ORDER BY p.year DESC, p.month DESC`,
        [],
        { correlationId: cid, operation: 'list_periods' }
      );

      return succeed(
        records.map((record) => ({
          ...mapPeriodRecord(record),
          evaluationCount: record.evaluation_count,
        })),
        startTime
      );
    } catch (error) {
      console.error('[PERIOD_SERVICE] Failed to list periods:', {
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime);
    }
  }

  async getPeriod(periodId: string, correlationId?: string): Promise<ServiceOperationResult<EvaluationPeriod>> {
    const startTime = Date.now();
    const cid = correlationId || `get_period_${Date.now()}`;

    try {
      const record = await queryOne<EvaluationPeriodRecord>(
        'SELECT id, year, month, created_at FROM evaluation_periods WHERE id = $1',
        [periodId],
        { correlationId: cid, operation: 'fetch_period_by_id' }
      );

      if (!record) {
        return fail(ServiceErrorCode.PeriodNotFound, startTime);
      }

      return succeed(mapPeriodRecord(record), startTime);
    } catch (error) {
      console.error('[PERIOD_SERVICE] Failed to fetch period:', {
        periodId,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime, ServiceErrorCode.PeriodNotFound);
    }
  }
}

export const periodService = new PeriodService();

export default periodService;
