/**
 * Report Service Module
 *
 * Read-only aggregation over persisted evaluations: the per-period CSV export
 * and the role-specific dashboard.
 *
 * @module services/report
 */

import { queryMany, queryOne } from '../db/index.js';
import { ServiceErrorCode, UserRole, type Actor, type ServiceOperationResult } from '../types/index.js';
import type { CsvExport, Dashboard, ManagerDashboard, SupervisorDashboard } from '../types/evaluation.js';
import { buildCsv, type CsvCell } from '../utils/csv.js';
import { buildExportFilename } from '../utils/date.js';
import { evaluationService } from './evaluation.service.js';
import { periodService } from './period.service.js';
import { errorMessage, fail, failFromError, succeed } from './result.js';
import { settingsService } from './settings.service.js';

interface ExportPeriodRecord {
  readonly id: string;
  readonly year: number;
  readonly month: number;
}

interface ExportQuestionRecord {
  readonly id: string;
  readonly question_text: string;
}

interface ExportEvaluationRecord {
  readonly id: string;
  readonly employee_name: string;
  readonly employee_code: string;
  readonly supervisor_email: string;
}

interface ExportResponseRecord {
  readonly evaluation_id: string;
  readonly question_id: string;
  readonly answer_text: string;
}

interface CountRecord {
  readonly count: number;
}

interface AverageRecord {
  readonly average: number;
}

const FIXED_EXPORT_COLUMNS = ['Employee Name', 'Employee Code', 'Supervisor Email'] as const;

const RECENT_EVALUATIONS_LIMIT = 5;

export class ReportService {
  /**
   * Export every evaluation of a period as CSV
   *
   * One row per evaluation ordered by creation time then id; one column per
   * question in the bank, holding the selected answer text or an empty cell.
   */
  async exportCsv(periodId: string, correlationId?: string): Promise<ServiceOperationResult<CsvExport>> {
    const startTime = Date.now();
    const cid = correlationId || `export_csv_${Date.now()}`;

    try {
      const period = await queryOne<ExportPeriodRecord>(
        'SELECT id, year, month FROM evaluation_periods WHERE id = $1',
        [periodId],
        { correlationId: cid, operation: 'export_fetch_period' }
      );

      if (!period) {
        return fail(ServiceErrorCode.PeriodNotFound, startTime);
      }

      const questions = await queryMany<ExportQuestionRecord>(
        `SELECT id, question_text
         FROM evaluation_questions
         ORDER BY order_index ASC, created_at ASC, id ASC`,
        [],
        { correlationId: cid, operation: 'export_fetch_questions' }
      );

      const evaluations = await queryMany<ExportEvaluationRecord>(
        `SELECT e.id, emp.name AS employee_name, emp.employee_code, s.email AS supervisor_email
         FROM evaluations e
         JOIN employees emp ON emp.id = e.employee_id
         JOIN supervisors s ON s.id = e.supervisor_id
         WHERE e.period_id = $1
         ORDER BY e.created_at ASC, e.id ASC`,
        [periodId],
        { correlationId: cid, operation: 'export_fetch_evaluations' }
      );

      const answersByEvaluation = new Map<string, Map<string, string>>();

      if (evaluations.length > 0) {
        const responses = await queryMany<ExportResponseRecord>(
          `SELECT r.evaluation_id, r.question_id, qa.answer_text
           FROM evaluation_responses r
           JOIN question_answers qa ON qa.id = r.answer_id
           WHERE r.evaluation_id = ANY($1)`,
          [evaluations.map((evaluation) => evaluation.id)],
          { correlationId: cid, operation: 'export_fetch_responses' }
        );

        for (const response of responses) {
          const answers = answersByEvaluation.get(response.evaluation_id) ?? new Map<string, string>();
          answers.set(response.question_id, response.answer_text);
          answersByEvaluation.set(response.evaluation_id, answers);
        }
      }

      const rows: CsvCell[][] = [[...FIXED_EXPORT_COLUMNS, ...questions.map((question) => question.question_text)]];

      for (const evaluation of evaluations) {
        const answers = answersByEvaluation.get(evaluation.id);
        rows.push([
          evaluation.employee_name,
          evaluation.employee_code,
          evaluation.supervisor_email,
          ...questions.map((question) => answers?.get(question.id) ?? ''),
        ]);
      }

      const filename = buildExportFilename(period.year, period.month);
      const content = Buffer.from(buildCsv(rows, { bom: true }), 'utf8');

      console.log('[REPORT_SERVICE] Period exported:', {
        periodId,
        filename,
        rowCount: evaluations.length,
        columnCount: FIXED_EXPORT_COLUMNS.length + questions.length,
        executionTimeMs: Date.now() - startTime,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return succeed({ filename, content, rowCount: evaluations.length }, startTime);
    } catch (error) {
      console.error('[REPORT_SERVICE] Export failed:', {
        periodId,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime, ServiceErrorCode.PeriodNotFound);
    }
  }

  async getDashboard(actor: Actor, correlationId?: string): Promise<ServiceOperationResult<Dashboard>> {
    const startTime = Date.now();
    const cid = correlationId || `dashboard_${Date.now()}`;

    try {
      const dashboard =
        actor.role === UserRole.Manager
          ? await this.buildManagerDashboard(cid)
          : await this.buildSupervisorDashboard(actor.userId, cid);

      return succeed(dashboard, startTime);
    } catch (error) {
      console.error('[REPORT_SERVICE] Dashboard failed:', {
        userId: actor.userId,
        role: actor.role,
        error: errorMessage(error),
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return failFromError(error, startTime);
    }
  }

  private async buildManagerDashboard(correlationId: string): Promise<ManagerDashboard> {
    const totalSupervisors = await this.count(
      `SELECT COUNT(*)::int AS count FROM supervisors WHERE role = '${UserRole.Supervisor}'`,
      [],
      correlationId
    );
    const totalEmployees = await this.count('SELECT COUNT(*)::int AS count FROM employees', [], correlationId);
    const totalActiveQuestions = await this.count(
      'SELECT COUNT(*)::int AS count FROM evaluation_questions WHERE is_active = TRUE',
      [],
      correlationId
    );

    // Evaluations without responses have no row here and are left out of the mean
    const average = await queryOne<AverageRecord>(
      `SELECT COALESCE(AVG(per_evaluation.average), 0)::float8 AS average
       FROM (
         SELECT COALESCE(AVG(score), 0) AS average
         FROM evaluation_responses
         GROUP BY evaluation_id
       ) per_evaluation`,
      [],
      { correlationId, operation: 'dashboard_average_score' }
    );

    const periods = await periodService.listPeriods(correlationId);
    if (!periods.success || !periods.data) {
      throw new Error(periods.error ?? 'Failed to list periods');
    }

    const settings = await settingsService.getSettings(correlationId);

    return {
      role: UserRole.Manager,
      totalSupervisors,
      totalEmployees,
      totalActiveQuestions,
      averageScore: average?.average ?? 0,
      periods: periods.data,
      evaluationsEnabled: settings.evaluationsEnabled,
    };
  }

  private async buildSupervisorDashboard(supervisorId: string, correlationId: string): Promise<SupervisorDashboard> {
    const myEmployees = await this.count(
      'SELECT COUNT(*)::int AS count FROM employees WHERE supervisor_id = $1',
      [supervisorId],
      correlationId
    );
    const myEvaluations = await this.count(
      'SELECT COUNT(*)::int AS count FROM evaluations WHERE supervisor_id = $1',
      [supervisorId],
      correlationId
    );
    const recentEvaluations = await evaluationService.fetchEvaluations(
      { supervisorId },
      { limit: RECENT_EVALUATIONS_LIMIT, correlationId }
    );

    return {
      role: UserRole.Supervisor,
      myEmployees,
      myEvaluations,
      recentEvaluations,
    };
  }

  private async count(query: string, params: unknown[], correlationId: string): Promise<number> {
    const record = await queryOne<CountRecord>(query, params, { correlationId, operation: 'dashboard_count' });
    return record?.count ?? 0;
  }
}

export const reportService = new ReportService();

export default reportService;
