/**
 * Password Utility Functions
 *
 * Password hashing, comparison, validation and generation using bcrypt.
 *
 * @module utils/password
 */

import { randomInt } from 'crypto';

import bcrypt from 'bcrypt';

import { getAuthConfig } from '../config/auth.js';
import type { ValidationResult } from '../types/index.js';

/**
 * Password hashing result
 */
export interface PasswordHashResult {
  readonly hash: string;
  readonly saltRounds: number;
  readonly executionTimeMs: number;
}

/**
 * Password comparison result
 */
export interface PasswordComparisonResult {
  readonly match: boolean;
  readonly executionTimeMs: number;
}

const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$/;

const GENERATED_PASSWORD_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz23456789';

/**
 * Hash a password using bcrypt with the configured salt rounds
 *
 * @throws Error if password is empty or hashing fails
 */
export async function hashPassword(password: string): Promise<PasswordHashResult> {
  const startTime = Date.now();

  if (typeof password !== 'string' || password.length === 0) {
    console.error('[PASSWORD_UTILS] Hash failed: Invalid password input', {
      timestamp: new Date().toISOString(),
    });
    throw new Error('[PASSWORD_UTILS] Password must be a non-empty string');
  }

  try {
    const { saltRounds } = getAuthConfig().password;
    const hash = await bcrypt.hash(password, saltRounds);
    const executionTimeMs = Date.now() - startTime;

    console.log('[PASSWORD_UTILS] Password hashed successfully', {
      saltRounds,
      executionTimeMs,
      timestamp: new Date().toISOString(),
    });

    return { hash, saltRounds, executionTimeMs };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[PASSWORD_UTILS] Password hashing failed', {
      error: errorMessage,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    throw new Error(`[PASSWORD_UTILS] Failed to hash password: ${errorMessage}`);
  }
}

/**
 * Compare a password with a bcrypt hash
 *
 * @throws Error if inputs are invalid or comparison fails
 */
export async function comparePassword(password: string, hash: string): Promise<PasswordComparisonResult> {
  const startTime = Date.now();

  if (typeof password !== 'string' || password.length === 0) {
    throw new Error('[PASSWORD_UTILS] Password must be a non-empty string');
  }

  if (typeof hash !== 'string' || !BCRYPT_HASH_PATTERN.test(hash)) {
    console.error('[PASSWORD_UTILS] Compare failed: Invalid hash format', {
      timestamp: new Date().toISOString(),
    });
    throw new Error('[PASSWORD_UTILS] Invalid bcrypt hash format');
  }

  try {
    const match = await bcrypt.compare(password, hash);
    return { match, executionTimeMs: Date.now() - startTime };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[PASSWORD_UTILS] Password comparison failed', {
      error: errorMessage,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    throw new Error(`[PASSWORD_UTILS] Failed to compare password: ${errorMessage}`);
  }
}

/**
 * Validate a new password against the configured minimum length
 *
 * @param confirmation - When given, must equal the password
 */
export function validatePassword(password: unknown, confirmation?: unknown): ValidationResult {
  const errors: string[] = [];
  const { minLength } = getAuthConfig().password;

  if (typeof password !== 'string' || password.length === 0) {
    return { isValid: false, errors: ['Password is required'] };
  }

  if (password.length < minLength) {
    errors.push(`Password must be at least ${minLength} characters long`);
  }

  if (confirmation !== undefined && confirmation !== password) {
    errors.push('Passwords must match');
  }

  return { isValid: errors.length === 0, errors };
}

/**
 * Generate a random password from an unambiguous alphabet
 *
 * @param length - Defaults to the configured minimum length + 6
 */
export function generateSecurePassword(length?: number): string {
  const { minLength } = getAuthConfig().password;
  const targetLength = length ?? minLength + 6;

  if (targetLength < minLength) {
    throw new Error(`Password length must be at least ${minLength}`);
  }

  let password = '';
  for (let i = 0; i < targetLength; i++) {
    password += GENERATED_PASSWORD_ALPHABET.charAt(randomInt(GENERATED_PASSWORD_ALPHABET.length));
  }

  return password;
}
