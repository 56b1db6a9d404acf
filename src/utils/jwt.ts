/**
 * JWT Token Utilities Module
 *
 * Access token generation, verification and header extraction.
 *
 * @module utils/jwt
 */

import crypto from 'crypto';

import jwt, { type SignOptions, type VerifyOptions } from 'jsonwebtoken';

import { getAccessTokenTtlSeconds, getAuthConfig } from '../config/auth.js';
import { isJWTPayload, type JWTPayload, type TokenValidationResult } from '../types/auth.js';
import type { UserRole } from '../types/index.js';

interface TokenGenerationOptions {
  /**
   * Optional JWT ID for token tracking
   */
  readonly jti?: string;

  readonly correlationId?: string;
}

interface TokenVerificationOptions {
  readonly correlationId?: string;
}

function generateJwtId(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Generate JWT access token
 *
 * @example
 * const token = generateAccessToken('user-123', 'lead@example.com', UserRole.Supervisor);
 *
 * @throws {Error} If token generation fails
 */
export function generateAccessToken(
  userId: string,
  email: string,
  role: UserRole,
  options?: TokenGenerationOptions
): string {
  const correlationId = options?.correlationId || `token_gen_${Date.now()}`;

  try {
    const config = getAuthConfig();
    const jti = options?.jti || generateJwtId();

    const payload: Omit<JWTPayload, 'exp' | 'iat'> = {
      userId,
      email,
      role,
      type: 'access',
      jti,
    };

    const signOptions: SignOptions = {
      algorithm: config.jwt.algorithm,
      expiresIn: getAccessTokenTtlSeconds(),
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const token = jwt.sign(payload, config.jwt.secret, signOptions);

    console.log('[JWT] Access token generated successfully:', {
      userId,
      role,
      jti,
      expiresIn: config.jwt.expiresIn,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return token;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[JWT] Failed to generate access token:', {
      userId,
      role,
      error: errorMessage,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    throw new Error(`[JWT] Access token generation failed: ${errorMessage}`);
  }
}

/**
 * Verify and decode JWT access token
 *
 * @example
 * const result = await verifyAccessToken(token);
 * if (result.valid && result.payload) {
 *   console.log('User ID:', result.payload.userId);
 * }
 */
export async function verifyAccessToken(
  token: string,
  options?: TokenVerificationOptions
): Promise<TokenValidationResult> {
  const correlationId = options?.correlationId || `token_verify_${Date.now()}`;
  const timestamp = new Date();

  try {
    const config = getAuthConfig();

    const verifyOptions: VerifyOptions = {
      algorithms: [config.jwt.algorithm],
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const decoded = jwt.verify(token, config.jwt.secret, verifyOptions);

    if (!isJWTPayload(decoded)) {
      console.error('[JWT] Invalid access token payload structure:', {
        correlationId,
        timestamp: timestamp.toISOString(),
      });

      return {
        valid: false,
        error: 'Invalid token payload structure',
        errorCode: 'MALFORMED',
        timestamp,
      };
    }

    return {
      valid: true,
      payload: decoded,
      timestamp,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    let errorCode: TokenValidationResult['errorCode'] = 'INVALID';
    let expired = false;

    if (error instanceof jwt.TokenExpiredError) {
      errorCode = 'EXPIRED';
      expired = true;
    } else if (error instanceof jwt.JsonWebTokenError) {
      errorCode = 'MALFORMED';
    }

    console.warn('[JWT] Access token verification failed:', {
      error: errorMessage,
      errorCode,
      expired,
      correlationId,
      timestamp: timestamp.toISOString(),
    });

    return {
      valid: false,
      error: errorMessage,
      errorCode,
      expired,
      timestamp,
    };
  }
}

/**
 * Extract token from a `Bearer <token>` Authorization header
 *
 * @returns Extracted token or null if the header is missing or malformed
 */
export function extractTokenFromHeader(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2) {
    console.warn('[JWT] Invalid authorization header format:', {
      format: 'Expected "Bearer <token>"',
    });
    return null;
  }

  const [scheme, token] = parts;

  if (scheme !== 'Bearer') {
    console.warn('[JWT] Invalid authorization scheme:', {
      expected: 'Bearer',
      received: scheme,
    });
    return null;
  }

  if (!token || token.trim().length === 0) {
    return null;
  }

  return token.trim();
}
