/**
 * Authentication Routes Module
 *
 * @module routes/auth
 */

import { Router } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

import { getAuthConfig } from '../config/auth.js';
import { authController } from '../controllers/auth.controller.js';
import { authenticate } from '../middleware/authenticate.js';

/**
 * Rate limiter for login attempts, per client IP
 */
function createLoginRateLimiter(): RateLimitRequestHandler {
  const { rateLimit: config } = getAuthConfig();

  return rateLimit({
    windowMs: config.windowMs,
    limit: config.maxRequests,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      console.warn('[AUTH_ROUTES] Login rate limit exceeded:', {
        ip: req.ip,
        path: req.path,
        timestamp: new Date().toISOString(),
      });

      res.status(429).json({
        success: false,
        code: 'RATE_LIMIT_EXCEEDED',
        message: config.message,
        timestamp: new Date().toISOString(),
      });
    },
  });
}

/**
 * @example
 * app.use('/api/auth', createAuthRouter());
 */
export function createAuthRouter(): Router {
  const router = Router();

  console.log('[AUTH_ROUTES] Initializing authentication routes');

  /**
   * POST /api/auth/login
   *
   * Authorization: public, rate limited
   */
  router.post('/login', createLoginRateLimiter(), authController.login.bind(authController));

  /**
   * GET /api/auth/me
   *
   * Authorization: any authenticated user
   */
  router.get('/me', authenticate, authController.me.bind(authController));

  return router;
}

export const authRouter = createAuthRouter();

export default authRouter;
