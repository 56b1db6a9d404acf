/**
 * Authentication Controller Module
 *
 * HTTP adapter for login and the current-user lookup.
 *
 * @module controllers/auth
 */

import type { NextFunction, Request, Response } from 'express';

import type { AuthenticatedRequest } from '../middleware/authenticate.js';
import { AuthErrorCode, AuthServiceError, authService } from '../services/auth.service.js';
import { isLoginCredentials } from '../types/auth.js';
import { HTTP_STATUS, generateCorrelationId, getClientIp, readBody, sendError, sendSuccess } from '../utils/response.js';

/**
 * Auth error code to HTTP status mapping
 */
const AUTH_ERROR_TO_STATUS: Record<AuthErrorCode, number> = {
  [AuthErrorCode.INVALID_CREDENTIALS]: HTTP_STATUS.UNAUTHORIZED,
  [AuthErrorCode.USER_NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [AuthErrorCode.VALIDATION_ERROR]: HTTP_STATUS.BAD_REQUEST,
  [AuthErrorCode.AUTHENTICATION_FAILED]: HTTP_STATUS.INTERNAL_SERVER_ERROR,
};

export class AuthController {
  /**
   * POST /api/auth/login
   *
   * Request body: { email: string, password: string }
   */
  async login(req: Request, res: Response, _next: NextFunction): Promise<void> {
    const startTime = Date.now();
    const correlationId = generateCorrelationId(req, 'login');
    const clientIp = getClientIp(req);

    console.log('[AUTH_CONTROLLER] Login request received:', {
      correlationId,
      clientIp,
      userAgent: req.get('user-agent'),
      timestamp: new Date().toISOString(),
    });

    const body = readBody(req);
    const credentials = { email: body.email, password: body.password };

    if (!isLoginCredentials(credentials)) {
      console.warn('[AUTH_CONTROLLER] Login failed - invalid credentials format:', {
        correlationId,
        clientIp,
        timestamp: new Date().toISOString(),
      });

      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Email and password are required');
      return;
    }

    try {
      const loginResponse = await authService.login(credentials, { correlationId, ipAddress: clientIp });

      console.log('[AUTH_CONTROLLER] Login successful:', {
        userId: loginResponse.user.id,
        role: loginResponse.user.role,
        correlationId,
        executionTimeMs: Date.now() - startTime,
        timestamp: new Date().toISOString(),
      });

      sendSuccess(res, HTTP_STATUS.OK, 'Login successful', loginResponse);
    } catch (error) {
      this.handleAuthError(res, error, 'Login', correlationId);
    }
  }

  /**
   * GET /api/auth/me
   */
  async me(req: AuthenticatedRequest, res: Response, _next: NextFunction): Promise<void> {
    const correlationId = generateCorrelationId(req, 'me');

    if (!req.user) {
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'UNAUTHORIZED', 'Authentication required');
      return;
    }

    try {
      const user = await authService.getCurrentUser(req.user.userId, { correlationId });
      sendSuccess(res, HTTP_STATUS.OK, 'Current user retrieved successfully', user);
    } catch (error) {
      this.handleAuthError(res, error, 'Current user lookup', correlationId);
    }
  }

  private handleAuthError(res: Response, error: unknown, operation: string, correlationId: string): void {
    if (error instanceof AuthServiceError) {
      const statusCode = AUTH_ERROR_TO_STATUS[error.code];

      console.warn(`[AUTH_CONTROLLER] ${operation} failed:`, {
        code: error.code,
        statusCode,
        correlationId,
        timestamp: new Date().toISOString(),
      });

      sendError(res, statusCode, error.code, error.message);
      return;
    }

    console.error(`[AUTH_CONTROLLER] ${operation} error:`, {
      error: error instanceof Error ? error.message : String(error),
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendError(res, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'INTERNAL_ERROR', 'An unexpected error occurred');
  }
}

export const authController = new AuthController();

export default authController;
