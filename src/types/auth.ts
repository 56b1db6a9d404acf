/**
 * Authentication Type Definitions
 *
 * JWT payloads, authenticated request user, login credentials and responses.
 *
 * @module types/auth
 */

import { isUserRole, type UserRole } from './index.js';

/**
 * JWT Token Payload
 *
 * Decoded payload of an access token.
 */
export interface JWTPayload {
  readonly userId: string;
  readonly email: string;
  readonly role: UserRole;

  /**
   * Token issued at timestamp (Unix epoch in seconds)
   */
  readonly iat: number;

  /**
   * Token expiration timestamp (Unix epoch in seconds)
   */
  readonly exp: number;

  readonly type: 'access';
  readonly jti?: string;
}

/**
 * Authenticated user attached to requests after JWT validation
 */
export interface AuthenticatedUser {
  readonly userId: string;
  readonly email: string;
  readonly role: UserRole;
  readonly iat: number;
  readonly exp: number;
  readonly jti?: string;
}

/**
 * Login Credentials
 */
export interface LoginCredentials {
  readonly email: string;
  readonly password: string;
}

/**
 * Response returned after a successful login
 */
export interface LoginResponse {
  readonly accessToken: string;
  readonly tokenType: 'Bearer';

  /**
   * Access token lifetime in seconds
   */
  readonly expiresIn: number;

  readonly user: {
    readonly id: string;
    readonly name: string;
    readonly email: string;
    readonly role: UserRole;
  };
}

/**
 * Token Validation Result
 */
export interface TokenValidationResult {
  readonly valid: boolean;
  readonly payload?: JWTPayload;
  readonly error?: string;
  readonly errorCode?: 'EXPIRED' | 'INVALID' | 'MALFORMED';
  readonly expired?: boolean;
  readonly timestamp: Date;
}

/**
 * Type guard for JWTPayload
 */
export function isJWTPayload(value: unknown): value is JWTPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'userId' in value &&
    typeof value.userId === 'string' &&
    'email' in value &&
    typeof value.email === 'string' &&
    'role' in value &&
    isUserRole(value.role) &&
    'iat' in value &&
    typeof value.iat === 'number' &&
    'exp' in value &&
    typeof value.exp === 'number' &&
    'type' in value &&
    value.type === 'access'
  );
}

/**
 * Type guard for LoginCredentials
 */
export function isLoginCredentials(value: unknown): value is LoginCredentials {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  return (
    'email' in value &&
    typeof value.email === 'string' &&
    'password' in value &&
    typeof value.password === 'string'
  );
}
