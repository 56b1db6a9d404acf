/**
 * Database Connection Module
 *
 * Provides centralized database connection management with connection pooling,
 * query helpers with TypeScript generics, transaction support, and graceful shutdown.
 *
 * @module db
 */

import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

import { getDatabaseConfig, toPgPoolConfig, type DatabaseConfig } from '../config/database.js';

import { DatabaseError } from './errors.js';

/**
 * Query execution context for logging and tracing
 */
export interface QueryContext {
  readonly queryId: string;

  /**
   * SQL query text (parameterized)
   */
  readonly query: string;

  readonly params?: unknown[];
  readonly startTime: number;
  readonly correlationId?: string;
  readonly operation?: string;
}

/**
 * Query execution result with metadata
 */
export interface QueryExecutionResult<T extends QueryResultRow = QueryResultRow> {
  readonly rows: T[];
  readonly rowCount: number;
  readonly executionTimeMs: number;
  readonly context: QueryContext;
}

/**
 * Options accepted by the query helpers
 */
export interface QueryOptions {
  readonly correlationId?: string;
  readonly operation?: string;
}

export type TransactionCallback<T> = (client: PoolClient) => Promise<T>;

/**
 * Transaction options
 */
export interface TransactionOptions extends QueryOptions {
  readonly isolationLevel?: 'READ UNCOMMITTED' | 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

  /**
   * Statement timeout applied to the transaction, in milliseconds
   */
  readonly timeout?: number;
}

/**
 * Database pool statistics
 */
export interface PoolStats {
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  readonly timestamp: Date;
}

/**
 * Database health check result
 */
export interface DatabaseHealthCheck {
  readonly healthy: boolean;
  readonly latencyMs?: number;
  readonly poolStats?: PoolStats;
  readonly error?: string;
  readonly timestamp: Date;
}

let poolInstance: Pool | null = null;
let configInstance: DatabaseConfig | null = null;

/**
 * Shutdown flag to prevent new operations during shutdown
 */
let isShuttingDown = false;

/**
 * Active query counter for graceful shutdown
 */
let activeQueryCount = 0;

function generateQueryId(): string {
  return `query_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

function readStringProperty(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const property: unknown = Reflect.get(value, key);
  return typeof property === 'string' ? property : undefined;
}

/**
 * Wrap a driver error, keeping its SQLSTATE and detail
 */
function toDatabaseError(error: unknown, prefix: string): DatabaseError {
  if (error instanceof DatabaseError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readStringProperty(error, 'code');

  return new DatabaseError(
    `[DATABASE] ${prefix}: ${message}${code ? ` (${code})` : ''}`,
    code,
    readStringProperty(error, 'detail'),
    readStringProperty(error, 'constraint')
  );
}

function logQueryExecution(context: QueryContext, result?: QueryResult, error?: DatabaseError): void {
  if (!configInstance?.enableLogging) {
    return;
  }

  const logData = {
    queryId: context.queryId,
    operation: context.operation,
    correlationId: context.correlationId,
    executionTimeMs: Date.now() - context.startTime,
    rowCount: result?.rowCount ?? 0,
    success: !error,
    error: error
      ? {
          message: error.message,
          code: error.code,
          detail: error.detail,
        }
      : undefined,
    timestamp: new Date().toISOString(),
  };

  if (error) {
    console.error('[DATABASE] Query execution failed:', logData);
  } else {
    console.log('[DATABASE] Query executed:', logData);
  }
}

/**
 * Initialize database connection pool
 *
 * Idempotent: calling it multiple times returns the same pool.
 *
 * @throws Error if pool initialization fails
 */
export function initializePool(): Pool {
  if (poolInstance) {
    return poolInstance;
  }

  if (isShuttingDown) {
    throw new Error('[DATABASE] Cannot initialize pool during shutdown');
  }

  try {
    console.log('[DATABASE] Initializing database connection pool...');

    const config = getDatabaseConfig();
    const pool = new pg.Pool(toPgPoolConfig(config));

    pool.on('connect', () => {
      console.log('[DATABASE] New client connected to pool', {
        totalCount: pool.totalCount,
        idleCount: pool.idleCount,
        waitingCount: pool.waitingCount,
      });
    });

    pool.on('remove', () => {
      console.log('[DATABASE] Client removed from pool', {
        totalCount: pool.totalCount,
        idleCount: pool.idleCount,
        waitingCount: pool.waitingCount,
      });
    });

    pool.on('error', (error) => {
      console.error('[DATABASE] Unexpected pool error:', {
        error: error.message,
        code: readStringProperty(error, 'code'),
        timestamp: new Date().toISOString(),
      });
    });

    configInstance = config;
    poolInstance = pool;

    console.log('[DATABASE] Database connection pool initialized successfully', {
      host: config.host,
      port: config.port,
      database: config.database,
      poolMin: config.pool.min,
      poolMax: config.pool.max,
    });

    return pool;
  } catch (error) {
    console.error('[DATABASE] Failed to initialize pool:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    throw new Error(
      `[DATABASE] Pool initialization failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Get database connection pool, initializing it on first use
 */
export function getPool(): Pool {
  return poolInstance ?? initializePool();
}

/**
 * Execute a SQL query with type-safe results
 *
 * @template T - Expected row type
 * @throws DatabaseError if query execution fails
 */
export async function executeQuery<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<QueryExecutionResult<T>> {
  if (isShuttingDown) {
    throw new DatabaseError('[DATABASE] Cannot execute query during shutdown');
  }

  const pool = getPool();
  const context: QueryContext = {
    queryId: generateQueryId(),
    query,
    params,
    startTime: Date.now(),
    correlationId: options?.correlationId,
    operation: options?.operation,
  };

  activeQueryCount++;

  try {
    const result = await pool.query<T>(query, params);
    const executionTimeMs = Date.now() - context.startTime;

    logQueryExecution(context, result);

    return {
      rows: result.rows,
      rowCount: result.rowCount ?? 0,
      executionTimeMs,
      context,
    };
  } catch (error) {
    const dbError = toDatabaseError(error, 'Query execution failed');
    logQueryExecution(context, undefined, dbError);

    console.error('[DATABASE] Query execution error:', {
      queryId: context.queryId,
      operation: context.operation,
      correlationId: context.correlationId,
      error: dbError.message,
      code: dbError.code,
      detail: dbError.detail,
      executionTimeMs: Date.now() - context.startTime,
    });

    throw dbError;
  } finally {
    activeQueryCount--;
  }
}

/**
 * Execute a query and return a single row
 *
 * @returns Single row or null if not found
 * @throws DatabaseError if query returns multiple rows
 */
export async function queryOne<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<T | null> {
  const result = await executeQuery<T>(query, params, options);

  if (result.rowCount > 1) {
    throw new DatabaseError(
      `[DATABASE] Expected single row but got ${result.rowCount} rows (queryId: ${result.context.queryId})`
    );
  }

  return result.rows[0] ?? null;
}

/**
 * Execute a query and return multiple rows
 */
export async function queryMany<T extends QueryResultRow = QueryResultRow>(
  query: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<T[]> {
  const result = await executeQuery<T>(query, params, options);
  return result.rows;
}

/**
 * Execute a transaction with automatic rollback on error
 *
 * @throws DatabaseError if the transaction fails; the callback's writes are rolled back
 */
export async function executeTransaction<T>(
  callback: TransactionCallback<T>,
  options?: TransactionOptions
): Promise<T> {
  if (isShuttingDown) {
    throw new DatabaseError('[DATABASE] Cannot execute transaction during shutdown');
  }

  const pool = getPool();
  const transactionId = generateQueryId();
  const startTime = Date.now();

  activeQueryCount++;

  let client: PoolClient | null = null;

  try {
    console.log('[DATABASE] Starting transaction:', {
      transactionId,
      isolationLevel: options?.isolationLevel,
      correlationId: options?.correlationId,
      operation: options?.operation,
    });

    client = await pool.connect();

    const isolationLevel = options?.isolationLevel ?? 'READ COMMITTED';
    await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);

    if (options?.timeout) {
      await client.query(`SET LOCAL statement_timeout = ${Math.floor(options.timeout)}`);
    }

    const result = await callback(client);

    await client.query('COMMIT');

    console.log('[DATABASE] Transaction committed:', {
      transactionId,
      executionTimeMs: Date.now() - startTime,
      correlationId: options?.correlationId,
      operation: options?.operation,
    });

    return result;
  } catch (error) {
    if (client) {
      try {
        await client.query('ROLLBACK');
        console.log('[DATABASE] Transaction rolled back:', {
          transactionId,
          error: error instanceof Error ? error.message : String(error),
          executionTimeMs: Date.now() - startTime,
        });
      } catch (rollbackError) {
        console.error('[DATABASE] Rollback failed:', {
          transactionId,
          rollbackError: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
    }

    const dbError = toDatabaseError(error, 'Transaction failed');

    console.error('[DATABASE] Transaction failed:', {
      transactionId,
      error: dbError.message,
      code: dbError.code,
      correlationId: options?.correlationId,
      operation: options?.operation,
      executionTimeMs: Date.now() - startTime,
    });

    throw dbError;
  } finally {
    if (client) {
      client.release();
    }
    activeQueryCount--;
  }
}

/**
 * Test database connection
 */
export async function testConnection(): Promise<DatabaseHealthCheck> {
  const timestamp = new Date();
  const startTime = Date.now();

  try {
    const pool = getPool();
    await pool.query('SELECT 1 as test');
    const latencyMs = Date.now() - startTime;

    const poolStats: PoolStats = {
      totalCount: pool.totalCount,
      idleCount: pool.idleCount,
      waitingCount: pool.waitingCount,
      timestamp,
    };

    console.log('[DATABASE] Connection test successful:', {
      latencyMs,
      poolStats,
      timestamp: timestamp.toISOString(),
    });

    return { healthy: true, latencyMs, poolStats, timestamp };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[DATABASE] Connection test failed:', {
      error: errorMessage,
      timestamp: timestamp.toISOString(),
    });

    return { healthy: false, error: errorMessage, timestamp };
  }
}

/**
 * Gracefully shutdown database connection pool
 *
 * Waits for active queries to complete before closing the pool.
 */
export async function shutdown(options?: {
  readonly timeout?: number;
  readonly force?: boolean;
}): Promise<void> {
  if (isShuttingDown) {
    console.warn('[DATABASE] Shutdown already in progress');
    return;
  }

  if (!poolInstance) {
    console.log('[DATABASE] No pool to shutdown');
    return;
  }

  isShuttingDown = true;
  const timeout = options?.timeout ?? 30000;
  const startTime = Date.now();

  console.log('[DATABASE] Starting graceful shutdown...', {
    activeQueryCount,
    timeout,
    force: options?.force ?? false,
  });

  try {
    if (!options?.force && activeQueryCount > 0) {
      console.log('[DATABASE] Waiting for active queries to complete...', { activeQueryCount });

      while (activeQueryCount > 0 && Date.now() - startTime < timeout) {
        await new Promise((resolve) => setTimeout(resolve, 100));
      }

      if (activeQueryCount > 0) {
        console.warn('[DATABASE] Shutdown timeout reached with active queries:', {
          activeQueryCount,
          elapsedMs: Date.now() - startTime,
        });
      }
    }

    await poolInstance.end();
    poolInstance = null;
    configInstance = null;

    console.log('[DATABASE] Database connection pool closed successfully', {
      elapsedMs: Date.now() - startTime,
    });
  } catch (error) {
    console.error('[DATABASE] Error during shutdown:', {
      error: error instanceof Error ? error.message : String(error),
      elapsedMs: Date.now() - startTime,
    });
    throw new Error(`[DATABASE] Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    isShuttingDown = false;
  }
}
