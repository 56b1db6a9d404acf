/**
 * Database Configuration Module
 *
 * Provides centralized database configuration with environment-based settings,
 * connection pooling and SSL support.
 *
 * @module config/database
 */

import type { PoolConfig } from 'pg';

/**
 * Supported database SSL modes
 *
 * - disable: No SSL connection
 * - allow: Try SSL, fallback to non-SSL
 * - prefer: Prefer SSL, fallback to non-SSL
 * - require: Require SSL, fail if unavailable
 * - verify-ca: Require SSL and verify CA certificate
 * - verify-full: Require SSL, verify CA and hostname
 */
export type DatabaseSSLMode =
  | 'disable'
  | 'allow'
  | 'prefer'
  | 'require'
  | 'verify-ca'
  | 'verify-full';

/**
 * Application environment types
 */
export type Environment = 'development' | 'staging' | 'production' | 'test';

const SSL_MODES: readonly DatabaseSSLMode[] = [
  'disable',
  'allow',
  'prefer',
  'require',
  'verify-ca',
  'verify-full',
];

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];

/**
 * Database connection configuration interface
 */
export interface DatabaseConfig {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string;

  /**
   * Full connection string when DATABASE_URL is set (used by migrations)
   */
  readonly connectionString?: string;

  readonly ssl: DatabaseSSLMode;

  /**
   * Connection pool configuration
   */
  readonly pool: {
    readonly min: number;
    readonly max: number;

    /**
     * Maximum time (ms) a connection can be idle before being closed
     */
    readonly idleTimeoutMillis: number;

    /**
     * Maximum time (ms) to wait for a connection from the pool
     */
    readonly connectionTimeoutMillis: number;
  };

  /**
   * Query timeout in milliseconds
   */
  readonly queryTimeout: number;

  /**
   * Statement timeout in milliseconds
   */
  readonly statementTimeout: number;

  /**
   * Application name for database connection tracking
   */
  readonly applicationName: string;

  readonly environment: Environment;

  /**
   * Enable SQL query logging
   */
  readonly enableLogging: boolean;
}

/**
 * Parse and validate database SSL mode from environment variable
 */
function parseDatabaseSSLMode(sslMode: string | undefined): DatabaseSSLMode {
  const requested = sslMode?.toLowerCase() ?? 'prefer';
  const mode = SSL_MODES.find((candidate) => candidate === requested);

  if (!mode) {
    console.warn(
      `[DATABASE_CONFIG] Invalid SSL mode "${sslMode}", defaulting to "prefer". Valid modes: ${SSL_MODES.join(', ')}`
    );
    return 'prefer';
  }

  return mode;
}

/**
 * Parse and validate environment from NODE_ENV
 */
export function parseEnvironment(env: string | undefined): Environment {
  const requested = env?.toLowerCase() ?? 'development';
  const environment = ENVIRONMENTS.find((candidate) => candidate === requested);

  if (!environment) {
    console.warn(
      `[DATABASE_CONFIG] Invalid environment "${env}", defaulting to "development". Valid environments: ${ENVIRONMENTS.join(', ')}`
    );
    return 'development';
  }

  return environment;
}

/**
 * Parse integer from environment variable with range validation
 *
 * @param value - String value from environment
 * @param defaultValue - Default value if parsing fails
 * @param min - Minimum allowed value
 * @param max - Maximum allowed value
 * @param name - Variable name for logging
 */
function parseInteger(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  name: string
): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    console.warn(`[DATABASE_CONFIG] Invalid ${name} "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  if (parsed < min || parsed > max) {
    console.warn(
      `[DATABASE_CONFIG] ${name} ${parsed} out of range [${min}, ${max}], using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  console.warn(`[DATABASE_CONFIG] Invalid boolean value "${value}", using default: ${defaultValue}`);
  return defaultValue;
}

/**
 * Parse DATABASE_URL connection string
 *
 * Format: postgresql://[user]:[password]@[host]:[port]/[database]?[options]
 *
 * @returns Parsed connection parameters or null if invalid
 */
function parseDatabaseURL(url: string | undefined): {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
} | null {
  if (!url) {
    return null;
  }

  try {
    const parsed = new URL(url);

    if (parsed.protocol !== 'postgresql:' && parsed.protocol !== 'postgres:') {
      console.warn(`[DATABASE_CONFIG] Invalid DATABASE_URL protocol: ${parsed.protocol}`);
      return null;
    }

    const host = parsed.hostname;
    const port = parsed.port ? parseInt(parsed.port, 10) : 5432;
    const database = parsed.pathname.slice(1);
    const user = decodeURIComponent(parsed.username);
    const password = decodeURIComponent(parsed.password);

    if (!host || !database || !user) {
      console.warn('[DATABASE_CONFIG] DATABASE_URL missing required components');
      return null;
    }

    return { host, port, database, user, password };
  } catch (error) {
    console.error(
      '[DATABASE_CONFIG] Failed to parse DATABASE_URL:',
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}

function getPoolConfigForEnvironment(environment: Environment): DatabaseConfig['pool'] {
  switch (environment) {
    case 'production':
      return { min: 5, max: 30, idleTimeoutMillis: 30000, connectionTimeoutMillis: 10000 };
    case 'test':
      return { min: 1, max: 5, idleTimeoutMillis: 10000, connectionTimeoutMillis: 5000 };
    case 'staging':
    case 'development':
    default:
      return { min: 2, max: 10, idleTimeoutMillis: 30000, connectionTimeoutMillis: 10000 };
  }
}

/**
 * Load database configuration from environment variables
 *
 * DATABASE_URL takes precedence over the individual DB_* variables.
 *
 * @throws Error if required configuration is missing
 */
function loadDatabaseConfig(): DatabaseConfig {
  const environment = parseEnvironment(process.env.NODE_ENV);
  const urlConfig = parseDatabaseURL(process.env.DATABASE_URL);

  const host = urlConfig?.host ?? process.env.DB_HOST ?? 'localhost';
  const port = urlConfig?.port ?? parseInteger(process.env.DB_PORT, 5432, 1024, 65535, 'DB_PORT');
  const database = urlConfig?.database ?? process.env.DB_NAME ?? 'evaluations_db';
  const user = urlConfig?.user ?? process.env.DB_USER ?? 'evaluations_user';
  const password = urlConfig?.password ?? process.env.DB_PASSWORD ?? '';

  if (!password && environment === 'production') {
    throw new Error(
      '[DATABASE_CONFIG] FATAL: Database password is required in production environment. Set DATABASE_URL or DB_PASSWORD environment variable.'
    );
  }

  if (!password) {
    console.warn('[DATABASE_CONFIG] WARNING: Database password is not set.');
  }

  const defaults = getPoolConfigForEnvironment(environment);
  const poolMax = parseInteger(process.env.DB_POOL_MAX, defaults.max, 1, 200, 'DB_POOL_MAX');
  let poolMin = parseInteger(process.env.DB_POOL_MIN, defaults.min, 1, 100, 'DB_POOL_MIN');

  if (poolMin > poolMax) {
    console.warn(
      `[DATABASE_CONFIG] Pool min (${poolMin}) is greater than max (${poolMax}), adjusting min to ${poolMax}`
    );
    poolMin = poolMax;
  }

  const config: DatabaseConfig = {
    host,
    port,
    database,
    user,
    password,
    connectionString: urlConfig ? process.env.DATABASE_URL : undefined,
    ssl: parseDatabaseSSLMode(process.env.DB_SSL),
    pool: {
      min: poolMin,
      max: poolMax,
      idleTimeoutMillis: parseInteger(
        process.env.DB_POOL_IDLE_TIMEOUT,
        defaults.idleTimeoutMillis,
        1000,
        3600000,
        'DB_POOL_IDLE_TIMEOUT'
      ),
      connectionTimeoutMillis: parseInteger(
        process.env.DB_POOL_CONNECTION_TIMEOUT,
        defaults.connectionTimeoutMillis,
        1000,
        60000,
        'DB_POOL_CONNECTION_TIMEOUT'
      ),
    },
    queryTimeout: parseInteger(process.env.DB_QUERY_TIMEOUT, 30000, 1000, 300000, 'DB_QUERY_TIMEOUT'),
    statementTimeout: parseInteger(
      process.env.DB_STATEMENT_TIMEOUT,
      60000,
      1000,
      600000,
      'DB_STATEMENT_TIMEOUT'
    ),
    applicationName: 'supervisor-evaluations',
    environment,
    enableLogging: parseBoolean(process.env.SQL_LOGGING, environment === 'development'),
  };

  console.log('[DATABASE_CONFIG] Database configuration loaded:', {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    ssl: config.ssl,
    pool: config.pool,
    environment: config.environment,
    enableLogging: config.enableLogging,
    passwordSet: config.password.length > 0,
  });

  return config;
}

/**
 * Convert DatabaseConfig to pg PoolConfig
 */
export function toPgPoolConfig(config: DatabaseConfig): PoolConfig {
  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    min: config.pool.min,
    max: config.pool.max,
    idleTimeoutMillis: config.pool.idleTimeoutMillis,
    connectionTimeoutMillis: config.pool.connectionTimeoutMillis,
    application_name: config.applicationName,
    query_timeout: config.queryTimeout,
    statement_timeout: config.statementTimeout,
  };

  if (config.ssl !== 'disable') {
    if (config.ssl === 'require' || config.ssl === 'verify-ca' || config.ssl === 'verify-full') {
      poolConfig.ssl = {
        rejectUnauthorized: config.ssl !== 'require',
      };
    } else {
      poolConfig.ssl = config.ssl === 'prefer';
    }
  }

  return poolConfig;
}

/**
 * Validate database configuration
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validateConfig(config: DatabaseConfig): string[] {
  const errors: string[] = [];

  if (!config.host || config.host.trim().length === 0) {
    errors.push('Database host is required');
  }

  if (config.port < 1024 || config.port > 65535) {
    errors.push('Database port must be between 1024 and 65535');
  }

  if (!config.database || config.database.trim().length === 0) {
    errors.push('Database name is required');
  }

  if (!config.user || config.user.trim().length === 0) {
    errors.push('Database user is required');
  }

  if (config.environment === 'production' && !config.password) {
    errors.push('Database password is required in production');
  }

  if (config.pool.max < config.pool.min) {
    errors.push('Pool maximum must be greater than or equal to minimum');
  }

  return errors;
}

let databaseConfigInstance: DatabaseConfig | null = null;

/**
 * Get database configuration singleton
 *
 * Loads configuration on first call and caches it for subsequent calls.
 *
 * @throws Error if configuration is invalid
 */
export function getDatabaseConfig(): DatabaseConfig {
  if (!databaseConfigInstance) {
    const loaded = loadDatabaseConfig();

    const errors = validateConfig(loaded);
    if (errors.length > 0) {
      throw new Error(`[DATABASE_CONFIG] Invalid database configuration:\n${errors.join('\n')}`);
    }

    databaseConfigInstance = loaded;
  }

  return databaseConfigInstance;
}
