/**
 * Role-based Authorization Middleware
 *
 * Must run after `authenticate`.
 *
 * @module middleware/authorize
 */

import type { NextFunction, Response } from 'express';

import { UserRole } from '../types/index.js';
import { generateCorrelationId, type AuthenticatedRequest } from './authenticate.js';

/**
 * Authorization failure with its HTTP status
 */
export class AuthorizationError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      readonly statusCode?: number;
      readonly details?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'AuthorizationError';
    this.code = code;
    this.statusCode = options?.statusCode ?? 403;
    this.details = options?.details;
  }
}

function sendAuthorizationError(req: AuthenticatedRequest, res: Response, error: AuthorizationError): void {
  res.status(error.statusCode).json({
    success: false,
    code: error.code,
    message: error.message,
    details: error.details,
    timestamp: new Date().toISOString(),
    path: req.path,
  });
}

/**
 * Allow the request through only for the given roles
 *
 * @example
 * router.post('/questions', authorize([UserRole.Manager]), handler);
 *
 * @throws Error at setup time if no role or an unknown role is given
 */
export function authorize(
  allowedRoles: readonly UserRole[]
): (req: AuthenticatedRequest, res: Response, next: NextFunction) => void {
  if (allowedRoles.length === 0) {
    throw new Error('[AUTHZ] authorize() requires at least one allowed role');
  }

  const validRoles = Object.values(UserRole);
  for (const role of allowedRoles) {
    if (!validRoles.includes(role)) {
      throw new Error(`[AUTHZ] Invalid role provided: ${role}. Must be one of: ${validRoles.join(', ')}`);
    }
  }

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const correlationId = req.correlationId || generateCorrelationId('authz');
    req.correlationId = correlationId;

    const user = req.user;

    if (!user) {
      console.error('[AUTHZ] Authorization failed: no authenticated user', {
        correlationId,
        method: req.method,
        path: req.path,
        timestamp: new Date().toISOString(),
      });

      sendAuthorizationError(
        req,
        res,
        new AuthorizationError('Authentication required', 'AUTHENTICATION_REQUIRED', { statusCode: 401 })
      );
      return;
    }

    if (!allowedRoles.includes(user.role)) {
      console.warn('[AUTHZ] Authorization failed: insufficient role', {
        correlationId,
        method: req.method,
        path: req.path,
        userId: user.userId,
        userRole: user.role,
        allowedRoles,
        timestamp: new Date().toISOString(),
      });

      sendAuthorizationError(
        req,
        res,
        new AuthorizationError('You do not have permission to access this resource', 'INSUFFICIENT_PERMISSIONS', {
          details: { requiredRoles: allowedRoles },
        })
      );
      return;
    }

    next();
  };
}

/**
 * Shorthand for manager-only routes
 */
export const requireManager = authorize([UserRole.Manager]);
