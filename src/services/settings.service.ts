/**
 * Settings Service Module
 *
 * Owns the single `system_settings` row that gates evaluation submission.
 *
 * @module services/settings
 */

import crypto from 'crypto';

import { DatabaseError, isUniqueViolation } from '../db/errors.js';
import { queryOne } from '../db/index.js';
import type { SystemSettings } from '../types/evaluation.js';

interface SystemSettingsRecord {
  readonly id: string;
  readonly evaluations_enabled: boolean;
  readonly updated_at: Date;
}

const SELECT_SETTINGS = 'SELECT id, evaluations_enabled, updated_at FROM system_settings LIMIT 1';

function mapSettingsRecord(record: SystemSettingsRecord): SystemSettings {
  return {
    id: record.id,
    evaluationsEnabled: record.evaluations_enabled,
    updatedAt: record.updated_at,
  };
}

export class SettingsService {
  /**
   * Return the settings row, creating it (enabled) on first access
   *
   * Concurrent first callers race on the `singleton_key` unique constraint; the
   * loser re-reads the winner's row.
   *
   * @throws DatabaseError if the row cannot be read or created
   */
  async getSettings(correlationId?: string): Promise<SystemSettings> {
    const cid = correlationId || `get_settings_${Date.now()}`;

    const existing = await queryOne<SystemSettingsRecord>(SELECT_SETTINGS, [], {
      correlationId: cid,
      operation: 'fetch_settings',
    });

    if (existing) {
      return mapSettingsRecord(existing);
    }

    try {
      const inserted = await queryOne<SystemSettingsRecord>(
        `INSERT INTO system_settings (id, evaluations_enabled, updated_at)
         VALUES ($1, TRUE, $2)
         ON CONFLICT (singleton_key) DO NOTHING
         RETURNING id, evaluations_enabled, updated_at`,
        [crypto.randomUUID(), new Date()],
        { correlationId: cid, operation: 'create_settings' }
      );

      if (inserted) {
        console.log('[SETTINGS_SERVICE] Settings row created:', {
          settingsId: inserted.id,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });

        return mapSettingsRecord(inserted);
      }
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    console.log('[SETTINGS_SERVICE] Settings row created concurrently, re-reading:', {
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    const winner = await queryOne<SystemSettingsRecord>(SELECT_SETTINGS, [], {
      correlationId: cid,
      operation: 'refetch_settings',
    });

    if (!winner) {
      throw new DatabaseError('[SETTINGS_SERVICE] Settings row missing after concurrent creation');
    }

    return mapSettingsRecord(winner);
  }

  async isEvaluationsEnabled(correlationId?: string): Promise<boolean> {
    const settings = await this.getSettings(correlationId);
    return settings.evaluationsEnabled;
  }

  /**
   * Flip the evaluation gate in a single statement and return the new state
   *
   * @throws DatabaseError if the update fails
   */
  async toggle(correlationId?: string): Promise<SystemSettings> {
    const cid = correlationId || `toggle_settings_${Date.now()}`;

    await this.getSettings(cid);

    const updated = await queryOne<SystemSettingsRecord>(
      `UPDATE system_settings
       SET evaluations_enabled = NOT evaluations_enabled, updated_at = $1
       RETURNING id, evaluations_enabled, updated_at`,
      [new Date()],
      { correlationId: cid, operation: 'toggle_settings' }
    );

    if (!updated) {
      throw new DatabaseError('[SETTINGS_SERVICE] Settings row missing during toggle');
    }

    console.log('[SETTINGS_SERVICE] Evaluation gate toggled:', {
      evaluationsEnabled: updated.evaluations_enabled,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    return mapSettingsRecord(updated);
  }
}

export const settingsService = new SettingsService();

export default settingsService;
