/**
 * In-process stand-ins for the database layer
 *
 * Unit tests mock `src/db/index.js`; these helpers give `executeTransaction`
 * a client whose `query` is a Vitest mock.
 */

import pg from 'pg';
import { vi } from 'vitest';

import * as db from '../../src/db/index.js';

export interface FakeClient {
  readonly client: pg.PoolClient;
  readonly query: ReturnType<typeof vi.fn>;
}

/**
 * A pg client that never connects; every `query` call goes to the mock
 */
export function createFakeClient(): FakeClient {
  const query = vi.fn();
  const client = Object.assign(new pg.Client(), { query, release: vi.fn() });
  return { client, query };
}

/**
 * Route `executeTransaction` callbacks to the fake client
 */
export function useFakeTransaction(fake: FakeClient): void {
  vi.mocked(db.executeTransaction).mockImplementation(async (callback) => callback(fake.client));
}

/**
 * Result shape returned by `client.query`
 */
export function rows<T>(list: T[], rowCount: number = list.length): { rows: T[]; rowCount: number } {
  return { rows: list, rowCount };
}
