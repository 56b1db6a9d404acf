/**
 * Database Seeding Module
 *
 * Idempotent seed for development: one manager account and the sample
 * question bank from `seeds/questions.json`. Runs inside a single transaction.
 *
 * @module db/seed
 */

import crypto from 'crypto';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { PoolClient } from 'pg';

import { isPlainObject } from '../types/index.js';
import { hashPassword } from '../utils/password.js';
import { executeTransaction, shutdown } from './index.js';

/**
 * Seed operation result
 */
interface SeedResult {
  readonly name: string;
  readonly recordsCreated: number;
  readonly recordsSkipped: number;
  readonly executionTimeMs: number;
}

interface SeedAnswer {
  readonly answerText: string;
  readonly score: number | null;
}

interface SeedQuestion {
  readonly questionText: string;
  readonly answers: SeedAnswer[];
}

const QUESTIONS_FILE = new URL('../../seeds/questions.json', import.meta.url);

const MANAGER = {
  name: process.env.SEED_MANAGER_NAME || 'Evaluation Manager',
  email: (process.env.SEED_MANAGER_EMAIL || 'manager@example.com').toLowerCase(),
  password: process.env.SEED_MANAGER_PASSWORD || 'ChangeMe123!',
} as const;

function toSeedAnswer(value: unknown): SeedAnswer | null {
  if (!isPlainObject(value) || typeof value.answerText !== 'string') {
    return null;
  }
  const score = typeof value.score === 'number' ? value.score : null;
  return { answerText: value.answerText, score };
}

function toSeedQuestion(value: unknown): SeedQuestion | null {
  if (!isPlainObject(value) || typeof value.questionText !== 'string' || !Array.isArray(value.answers)) {
    return null;
  }

  const answers = value.answers.map(toSeedAnswer).filter((answer): answer is SeedAnswer => answer !== null);
  return { questionText: value.questionText, answers };
}

/**
 * Load sample questions
 *
 * Entries that do not have the expected shape are skipped.
 */
export async function loadSeedQuestions(): Promise<SeedQuestion[]> {
  const parsed: unknown = JSON.parse(await readFile(QUESTIONS_FILE, 'utf8'));

  if (!isPlainObject(parsed) || !Array.isArray(parsed.questions)) {
    throw new Error('[SEED] seeds/questions.json must contain a "questions" array');
  }

  return parsed.questions.map(toSeedQuestion).filter((question): question is SeedQuestion => question !== null);
}

async function seedManager(client: PoolClient): Promise<SeedResult> {
  const startTime = Date.now();

  const existing = await client.query('SELECT id FROM supervisors WHERE LOWER(email) = $1', [MANAGER.email]);
  if (existing.rows.length > 0) {
    console.log('[SEED_MANAGER] Manager account already exists, skipping:', { email: MANAGER.email });
    return { name: 'manager', recordsCreated: 0, recordsSkipped: 1, executionTimeMs: Date.now() - startTime };
  }

  const { hash } = await hashPassword(MANAGER.password);
  await client.query(
    `INSERT INTO supervisors (id, name, email, password_hash, role, manager_id, created_at, updated_at)
     VALUES ($1, $2, $3, $4, 'MANAGER', NULL, NOW(), NOW())`,
    [crypto.randomUUID(), MANAGER.name, MANAGER.email, hash]
  );

  console.log('[SEED_MANAGER] Manager account created:', { email: MANAGER.email });

  return { name: 'manager', recordsCreated: 1, recordsSkipped: 0, executionTimeMs: Date.now() - startTime };
}

async function seedQuestions(client: PoolClient, questions: SeedQuestion[]): Promise<SeedResult> {
  const startTime = Date.now();
  let created = 0;
  let skipped = 0;

  for (const [index, question] of questions.entries()) {
    const existing = await client.query('SELECT id FROM evaluation_questions WHERE question_text = $1', [
      question.questionText,
    ]);
    if (existing.rows.length > 0) {
      skipped++;
      continue;
    }

    const questionId = crypto.randomUUID();
    await client.query(
      `INSERT INTO evaluation_questions (id, question_text, is_active, order_index, created_at, updated_at)
       VALUES ($1, $2, TRUE, $3, NOW(), NOW())`,
      [questionId, question.questionText, index + 1]
    );

    for (const [answerIndex, answer] of question.answers.entries()) {
      await client.query(
        `INSERT INTO question_answers (id, question_id, answer_text, score, order_index)
         VALUES ($1, $2, $3, $4, $5)`,
        [crypto.randomUUID(), questionId, answer.answerText, answer.score, answerIndex + 1]
      );
    }

    created++;
  }

  console.log('[SEED_QUESTIONS] Questions seeded:', { created, skipped });

  return { name: 'questions', recordsCreated: created, recordsSkipped: skipped, executionTimeMs: Date.now() - startTime };
}

/**
 * Seed the database
 */
export async function seed(options?: { readonly correlationId?: string }): Promise<SeedResult[]> {
  const correlationId = options?.correlationId || `seed_${Date.now()}`;

  console.log('[SEED] Starting database seeding...', {
    correlationId,
    timestamp: new Date().toISOString(),
  });

  const questions = await loadSeedQuestions();

  const results = await executeTransaction(
    async (client) => [await seedManager(client), await seedQuestions(client, questions)],
    { correlationId, operation: 'seed_database' }
  );

  console.log('[SEED] Database seeding completed successfully:', {
    correlationId,
    results,
    timestamp: new Date().toISOString(),
  });

  return results;
}

const isMainModule = process.argv[1]
  ? resolve(fileURLToPath(import.meta.url)) === resolve(process.argv[1])
  : false;

if (isMainModule) {
  void seed()
    .then(() => shutdown())
    .catch(async (error: unknown) => {
      console.error('[SEED] Database seeding failed:', {
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      });
      await shutdown({ force: true });
      process.exitCode = 1;
    });
}

export default seed;
