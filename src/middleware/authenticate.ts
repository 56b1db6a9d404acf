/**
 * Authentication Middleware
 *
 * Validates the Bearer access token, attaches the authenticated user and a
 * correlation ID to the request.
 *
 * @module middleware/authenticate
 */

import type { NextFunction, Request, Response } from 'express';

import type { AuthenticatedUser, JWTPayload } from '../types/auth.js';
import { extractTokenFromHeader, verifyAccessToken } from '../utils/jwt.js';

/**
 * Request with authentication data attached
 */
export interface AuthenticatedRequest extends Request {
  /**
   * Populated by `authenticate`; undefined on public routes
   */
  user?: AuthenticatedUser;

  correlationId?: string;
}

interface AuthErrorResponse {
  readonly success: false;
  readonly code: string;
  readonly message: string;
  readonly timestamp: string;
  readonly path: string;
}

export function generateCorrelationId(prefix = 'req'): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

function sendAuthError(res: Response, statusCode: number, code: string, message: string, path: string): void {
  const errorResponse: AuthErrorResponse = {
    success: false,
    code,
    message,
    timestamp: new Date().toISOString(),
    path,
  };

  res.status(statusCode).json(errorResponse);
}

function jwtPayloadToAuthenticatedUser(payload: JWTPayload): AuthenticatedUser {
  return {
    userId: payload.userId,
    email: payload.email,
    role: payload.role,
    iat: payload.iat,
    exp: payload.exp,
    jti: payload.jti,
  };
}

/**
 * Require a valid access token
 *
 * Responds 401 with MISSING_TOKEN, INVALID_TOKEN_FORMAT, TOKEN_EXPIRED,
 * MALFORMED_TOKEN or INVALID_TOKEN when the token is absent or rejected.
 */
export async function authenticate(req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> {
  const startTime = Date.now();
  const correlationId = generateCorrelationId('auth');
  const requestPath = req.path;

  req.correlationId = correlationId;

  try {
    const authHeader = req.get('authorization');

    if (!authHeader) {
      console.warn('[AUTH_MIDDLEWARE] Missing authorization header:', {
        correlationId,
        path: requestPath,
        timestamp: new Date().toISOString(),
      });

      sendAuthError(res, 401, 'MISSING_TOKEN', 'Authorization header is required', requestPath);
      return;
    }

    const token = extractTokenFromHeader(authHeader);

    if (!token) {
      sendAuthError(res, 401, 'INVALID_TOKEN_FORMAT', 'Authorization header must use Bearer scheme', requestPath);
      return;
    }

    const validationResult = await verifyAccessToken(token, { correlationId });

    if (!validationResult.valid || !validationResult.payload) {
      let errorCode = 'INVALID_TOKEN';
      let errorMessage = 'Invalid authentication token';

      if (validationResult.errorCode === 'EXPIRED') {
        errorCode = 'TOKEN_EXPIRED';
        errorMessage = 'Authentication token has expired';
      } else if (validationResult.errorCode === 'MALFORMED') {
        errorCode = 'MALFORMED_TOKEN';
        errorMessage = 'Authentication token is malformed';
      }

      console.warn('[AUTH_MIDDLEWARE] Token validation failed:', {
        correlationId,
        path: requestPath,
        errorCode: validationResult.errorCode,
        executionTimeMs: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });

      sendAuthError(res, 401, errorCode, errorMessage, requestPath);
      return;
    }

    const authenticatedUser = jwtPayloadToAuthenticatedUser(validationResult.payload);
    req.user = authenticatedUser;

    console.log('[AUTH_MIDDLEWARE] Authentication successful:', {
      correlationId,
      path: requestPath,
      userId: authenticatedUser.userId,
      role: authenticatedUser.role,
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    next();
  } catch (error) {
    console.error('[AUTH_MIDDLEWARE] Authentication error:', {
      correlationId,
      path: requestPath,
      error: error instanceof Error ? error.message : String(error),
      executionTimeMs: Date.now() - startTime,
      timestamp: new Date().toISOString(),
    });

    sendAuthError(res, 500, 'AUTHENTICATION_ERROR', 'An error occurred during authentication', requestPath);
  }
}
