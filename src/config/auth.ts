/**
 * Authentication Configuration Module
 *
 * Centralized configuration for JWT access tokens, password hashing, login rate
 * limiting and account email rules. Loads configuration from environment variables
 * with validation.
 *
 * @module config/auth
 */

import { parseEnvironment, type Environment } from './database.js';

/**
 * JWT token configuration interface
 */
export interface JWTConfig {
  /**
   * Secret key for signing access tokens
   * Must be at least 32 characters
   */
  readonly secret: string;

  /**
   * Access token expiration time
   * Format: '15m', '1h', '24h'
   */
  readonly expiresIn: string;

  readonly algorithm: 'HS256';
  readonly issuer: string;
  readonly audience: string;
}

/**
 * Password hashing configuration interface
 */
export interface PasswordConfig {
  /**
   * Bcrypt salt rounds, valid range 10-15
   */
  readonly saltRounds: number;

  readonly minLength: number;
}

/**
 * Login rate limiting configuration interface
 */
export interface RateLimitConfig {
  readonly maxRequests: number;
  readonly windowMs: number;
  readonly message: string;
}

/**
 * Complete authentication configuration interface
 */
export interface AuthConfig {
  readonly jwt: JWTConfig;
  readonly password: PasswordConfig;
  readonly rateLimit: RateLimitConfig;

  /**
   * When set, supervisor emails must end with `@<allowedEmailDomain>`
   */
  readonly allowedEmailDomain?: string;

  readonly environment: Environment;
}

/**
 * Configuration validation error interface
 */
export interface ConfigValidationError {
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
}

const DURATION_PATTERN = /^(\d+)(s|m|h|d)$/;

const DURATION_UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

let authConfigInstance: AuthConfig | null = null;

function getEnvString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value !== undefined && value.trim().length > 0 ? value.trim() : defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`[AUTH_CONFIG] Invalid number for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Convert a duration such as '15m' or '24h' into seconds
 *
 * @returns Seconds, or null when the format is not recognised
 */
export function durationToSeconds(duration: string): number | null {
  const match = DURATION_PATTERN.exec(duration);
  if (!match) {
    return null;
  }

  const [, amount, unit] = match;
  const multiplier = unit ? DURATION_UNIT_SECONDS[unit] : undefined;
  if (amount === undefined || multiplier === undefined) {
    return null;
  }

  return parseInt(amount, 10) * multiplier;
}

function validateAuthConfig(config: AuthConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (config.jwt.secret.length < 32) {
    errors.push({
      field: 'jwt.secret',
      message: 'jwt.secret must be at least 32 characters',
      value: `${config.jwt.secret.substring(0, 8)}...`,
    });
  }

  const expiresInSeconds = durationToSeconds(config.jwt.expiresIn);
  if (expiresInSeconds === null || expiresInSeconds <= 0) {
    errors.push({
      field: 'jwt.expiresIn',
      message: "jwt.expiresIn must look like '15m', '1h' or '24h'",
      value: config.jwt.expiresIn,
    });
  }

  if (config.password.saltRounds < 10 || config.password.saltRounds > 15) {
    errors.push({
      field: 'password.saltRounds',
      message: 'Bcrypt salt rounds must be between 10 and 15',
      value: config.password.saltRounds,
    });
  }

  if (config.password.minLength < 6) {
    errors.push({
      field: 'password.minLength',
      message: 'Minimum password length must be at least 6 characters',
      value: config.password.minLength,
    });
  }

  if (config.rateLimit.maxRequests < 1) {
    errors.push({
      field: 'rateLimit.maxRequests',
      message: 'Maximum requests must be at least 1',
      value: config.rateLimit.maxRequests,
    });
  }

  if (config.rateLimit.windowMs < 1000) {
    errors.push({
      field: 'rateLimit.windowMs',
      message: 'Rate limit window must be at least 1000ms',
      value: config.rateLimit.windowMs,
    });
  }

  if (config.environment === 'production' && config.jwt.secret.includes('change-me')) {
    errors.push({
      field: 'jwt.secret',
      message: 'JWT secret must be changed from default value in production',
    });
  }

  return errors;
}

function loadAuthConfig(): AuthConfig {
  const allowedEmailDomain = process.env.ALLOWED_EMAIL_DOMAIN?.trim().toLowerCase();

  const config: AuthConfig = {
    jwt: {
      secret: getEnvString('JWT_SECRET', 'change-me-jwt-secret-at-least-32-characters'),
      expiresIn: getEnvString('JWT_EXPIRES_IN', '24h'),
      algorithm: 'HS256',
      issuer: getEnvString('JWT_ISSUER', 'supervisor-evaluations'),
      audience: getEnvString('JWT_AUDIENCE', 'supervisor-evaluations-users'),
    },

    password: {
      saltRounds: getEnvNumber('BCRYPT_SALT_ROUNDS', 10),
      minLength: getEnvNumber('PASSWORD_MIN_LENGTH', 6),
    },

    rateLimit: {
      maxRequests: getEnvNumber('LOGIN_RATE_LIMIT_MAX', 20),
      windowMs: getEnvNumber('LOGIN_RATE_LIMIT_WINDOW_MS', 900000),
      message: getEnvString('LOGIN_RATE_LIMIT_MESSAGE', 'Too many login attempts, please try again later'),
    },

    allowedEmailDomain: allowedEmailDomain && allowedEmailDomain.length > 0 ? allowedEmailDomain : undefined,

    environment: parseEnvironment(process.env.NODE_ENV),
  };

  console.log('[AUTH_CONFIG] Configuration loaded:', {
    environment: config.environment,
    jwtAlgorithm: config.jwt.algorithm,
    jwtExpiresIn: config.jwt.expiresIn,
    saltRounds: config.password.saltRounds,
    passwordMinLength: config.password.minLength,
    allowedEmailDomain: config.allowedEmailDomain ?? null,
    loginRateLimitMax: config.rateLimit.maxRequests,
    timestamp: new Date().toISOString(),
  });

  return config;
}

/**
 * Get authentication configuration singleton
 *
 * @throws {Error} If configuration validation fails
 */
export function getAuthConfig(): AuthConfig {
  if (!authConfigInstance) {
    const loaded = loadAuthConfig();

    const errors = validateAuthConfig(loaded);
    if (errors.length > 0) {
      const errorMessages = errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
      console.error('[AUTH_CONFIG] Configuration validation failed:', {
        errors,
        timestamp: new Date().toISOString(),
      });
      throw new Error(`[AUTH_CONFIG] Invalid authentication configuration:\n${errorMessages}`);
    }

    authConfigInstance = loaded;
  }

  return authConfigInstance;
}

/**
 * Access token lifetime in seconds
 */
export function getAccessTokenTtlSeconds(): number {
  return durationToSeconds(getAuthConfig().jwt.expiresIn) ?? 0;
}

/**
 * Check an email against the configured domain restriction
 */
export function isEmailDomainAllowed(email: string): boolean {
  const domain = getAuthConfig().allowedEmailDomain;
  if (!domain) {
    return true;
  }
  return email.trim().toLowerCase().endsWith(`@${domain}`);
}

/**
 * Reset authentication configuration singleton (for testing)
 */
export function resetAuthConfig(): void {
  authConfigInstance = null;
}
