import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';

import { authRouter } from './routes/auth.routes.js';
import { employeeRouter } from './routes/employee.routes.js';
import { dashboardRouter, evaluationRouter } from './routes/evaluation.routes.js';
import { periodRouter } from './routes/period.routes.js';
import { answerRouter, questionRouter } from './routes/question.routes.js';
import { settingsRouter } from './routes/settings.routes.js';
import { supervisorRouter } from './routes/supervisor.routes.js';

/**
 * Create and configure Express application
 *
 * Sets up middleware, routes, and error handling for the supervisor
 * evaluation service.
 */
export function createApp(): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      console.log(
        `[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} ${duration}ms`
      );
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // API Routes
  app.use('/api/auth', authRouter);
  app.use('/api/questions', questionRouter);
  app.use('/api/answers', answerRouter);
  app.use('/api/settings', settingsRouter);
  app.use('/api/periods', periodRouter);
  app.use('/api/evaluations', evaluationRouter);
  app.use('/api/dashboard', dashboardRouter);
  app.use('/api/supervisors', supervisorRouter);
  app.use('/api/employees', employeeRouter);

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[ERROR]', {
      error: err.message,
      stack: err.stack,
      timestamp: new Date().toISOString(),
    });

    // Malformed JSON bodies surface here from express.json()
    const statusCode = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;

    res.status(statusCode).json({
      success: false,
      code: statusCode === 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST',
      message: statusCode === 500 ? 'An unexpected error occurred' : err.message,
      timestamp: new Date().toISOString(),
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    });
  });

  return app;
}

export const app = createApp();

export default app;
