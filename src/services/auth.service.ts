/**
 * Authentication Service
 *
 * Login for managers and supervisors, who share the `supervisors` account
 * table, and lookup of the signed-in account.
 *
 * @module services/auth
 */

import { randomBytes } from 'crypto';

import { getAccessTokenTtlSeconds, isEmailDomainAllowed } from '../config/auth.js';
import { queryOne } from '../db/index.js';
import { toUserRole, type Supervisor, type UserRole } from '../types/index.js';
import type { LoginCredentials, LoginResponse } from '../types/auth.js';
import { generateAccessToken } from '../utils/jwt.js';
import { comparePassword } from '../utils/password.js';

interface AccountRecord {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly password_hash: string;
  readonly role: string;
  readonly manager_id: string | null;
  readonly created_at: Date;
  readonly updated_at: Date;
}

/**
 * Authentication service error codes
 */
export enum AuthErrorCode {
  INVALID_CREDENTIALS = 'INVALID_CREDENTIALS',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  AUTHENTICATION_FAILED = 'AUTHENTICATION_FAILED',
}

/**
 * Authentication service error
 */
export class AuthServiceError extends Error {
  constructor(
    message: string,
    public readonly code: AuthErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AuthServiceError';
  }
}

function generateCorrelationId(): string {
  return `auth_${Date.now()}_${randomBytes(8).toString('hex')}`;
}

function mapAccountRecord(record: AccountRecord): Supervisor {
  return {
    id: record.id,
    name: record.name,
    email: record.email,
    role: toUserRole(record.role),
    managerId: record.manager_id,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

export class AuthService {
  /**
   * Authenticate with email and password
   *
   * An unknown email, a disallowed domain and a wrong password all fail with
   * INVALID_CREDENTIALS.
   *
   * @throws AuthServiceError
   */
  async login(
    credentials: LoginCredentials,
    options?: {
      readonly correlationId?: string;
      readonly ipAddress?: string;
    }
  ): Promise<LoginResponse> {
    const correlationId = options?.correlationId ?? generateCorrelationId();
    const startTime = Date.now();

    try {
      console.log('[AUTH_SERVICE] Starting login attempt:', {
        email: credentials.email,
        ipAddress: options?.ipAddress,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      if (!credentials.email || !credentials.password) {
        throw new AuthServiceError('Email and password are required', AuthErrorCode.VALIDATION_ERROR, {
          correlationId,
        });
      }

      const email = credentials.email.trim().toLowerCase();

      if (!isEmailDomainAllowed(email)) {
        console.warn('[AUTH_SERVICE] Login failed: email domain not allowed', {
          email,
          correlationId,
          timestamp: new Date().toISOString(),
        });

        throw new AuthServiceError('Invalid email or password', AuthErrorCode.INVALID_CREDENTIALS, { correlationId });
      }

      const account = await queryOne<AccountRecord>(
        `SELECT id, name, email, password_hash, role, manager_id, created_at, updated_at
         FROM supervisors
         WHERE LOWER(email) = $1`,
        [email],
        { correlationId, operation: 'find_account_by_email' }
      );

      if (!account) {
        console.warn('[AUTH_SERVICE] Login failed: account not found', {
          email,
          correlationId,
          timestamp: new Date().toISOString(),
        });

        throw new AuthServiceError('Invalid email or password', AuthErrorCode.INVALID_CREDENTIALS, { correlationId });
      }

      const passwordComparison = await comparePassword(credentials.password, account.password_hash);

      if (!passwordComparison.match) {
        console.warn('[AUTH_SERVICE] Login failed: invalid password', {
          userId: account.id,
          correlationId,
          timestamp: new Date().toISOString(),
        });

        throw new AuthServiceError('Invalid email or password', AuthErrorCode.INVALID_CREDENTIALS, { correlationId });
      }

      const role: UserRole = toUserRole(account.role);
      const accessToken = generateAccessToken(account.id, account.email, role, { correlationId });

      console.log('[AUTH_SERVICE] Login successful:', {
        userId: account.id,
        role,
        executionTimeMs: Date.now() - startTime,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      return {
        accessToken,
        tokenType: 'Bearer',
        expiresIn: getAccessTokenTtlSeconds(),
        user: {
          id: account.id,
          name: account.name,
          email: account.email,
          role,
        },
      };
    } catch (error) {
      const executionTimeMs = Date.now() - startTime;

      if (error instanceof AuthServiceError) {
        console.error('[AUTH_SERVICE] Login failed:', {
          error: error.message,
          code: error.code,
          executionTimeMs,
          correlationId,
          timestamp: new Date().toISOString(),
        });
        throw error;
      }

      const errorMessage = error instanceof Error ? error.message : String(error);

      console.error('[AUTH_SERVICE] Unexpected login error:', {
        error: errorMessage,
        executionTimeMs,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      throw new AuthServiceError(`Login failed: ${errorMessage}`, AuthErrorCode.AUTHENTICATION_FAILED, {
        correlationId,
      });
    }
  }

  /**
   * @throws AuthServiceError with USER_NOT_FOUND when the account was removed
   */
  async getCurrentUser(userId: string, options?: { readonly correlationId?: string }): Promise<Supervisor> {
    const correlationId = options?.correlationId ?? generateCorrelationId();

    const account = await queryOne<AccountRecord>(
      `SELECT id, name, email, password_hash, role, manager_id, created_at, updated_at
       FROM supervisors
       WHERE id = $1`,
      [userId],
      { correlationId, operation: 'find_account_by_id' }
    );

    if (!account) {
      console.warn('[AUTH_SERVICE] Current user not found:', {
        userId,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      throw new AuthServiceError('User not found', AuthErrorCode.USER_NOT_FOUND, { correlationId });
    }

    return mapAccountRecord(account);
  }
}

export const authService = new AuthService();

export default authService;
