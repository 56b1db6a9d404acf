/**
 * HTTP Server Entry Point Module
 *
 * Starts the Express application once the database pool answers, and closes
 * both again on SIGTERM or SIGINT.
 *
 * @module server
 */

import { type Server } from 'http';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { app } from './app.js';
import { initializePool, testConnection, shutdown as shutdownDatabase } from './db/index.js';

/**
 * Environment Configuration
 */
const ENV = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  PORT: parseInt(process.env.PORT || '3000', 10),
  HOST: process.env.HOST || '0.0.0.0',

  /**
   * Graceful shutdown timeout in milliseconds
   */
  SHUTDOWN_TIMEOUT: parseInt(process.env.SHUTDOWN_TIMEOUT || '30000', 10),
  DB_CONNECTION_TIMEOUT: parseInt(process.env.DB_CONNECTION_TIMEOUT || '10000', 10),
  ENABLE_DATABASE: process.env.ENABLE_DATABASE !== 'false',
} as const;

let serverInstance: Server | null = null;
let isShuttingDown = false;

/**
 * Initialize Database Connection
 *
 * Retries with exponential backoff before giving up.
 */
async function initializeDatabase(): Promise<boolean> {
  if (!ENV.ENABLE_DATABASE) {
    console.log('[SERVER] Database connection disabled (ENABLE_DATABASE=false)');
    return true;
  }

  const maxRetries = 3;
  const baseDelay = 1000;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      initializePool();

      const timeoutPromise = new Promise<never>((_, reject) => {
        setTimeout(() => reject(new Error('Database connection timeout')), ENV.DB_CONNECTION_TIMEOUT);
      });

      const healthCheck = await Promise.race([testConnection(), timeoutPromise]);

      if (!healthCheck.healthy) {
        throw new Error(`Database health check failed: ${healthCheck.error}`);
      }

      console.log('[SERVER] Database connection established successfully:', {
        latencyMs: healthCheck.latencyMs,
        poolStats: healthCheck.poolStats,
        timestamp: new Date().toISOString(),
      });

      return true;
    } catch (error) {
      console.error(`[SERVER] Database connection attempt ${attempt}/${maxRetries} failed:`, {
        error: error instanceof Error ? error.message : String(error),
        attempt,
        timestamp: new Date().toISOString(),
      });

      if (attempt < maxRetries) {
        const delay = baseDelay * Math.pow(2, attempt - 1);
        console.log(`[SERVER] Retrying database connection in ${delay}ms...`);
        await new Promise((resolveDelay) => setTimeout(resolveDelay, delay));
      }
    }
  }

  console.error('[SERVER] FATAL: Failed to establish database connection after all retries');
  return false;
}

/**
 * Start HTTP Server
 */
async function startServer(): Promise<Server> {
  return new Promise((resolveServer, reject) => {
    const server = app.listen(ENV.PORT, ENV.HOST, () => {
      console.log('[SERVER] HTTP server started successfully:', {
        host: ENV.HOST,
        port: ENV.PORT,
        environment: ENV.NODE_ENV,
        processId: process.pid,
        timestamp: new Date().toISOString(),
      });

      resolveServer(server);
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      console.error('[SERVER] FATAL: Server error:', {
        error: error.message,
        code: error.code,
        port: ENV.PORT,
        timestamp: new Date().toISOString(),
      });

      if (error.code === 'EADDRINUSE') {
        reject(new Error(`Port ${ENV.PORT} is already in use`));
        return;
      }

      reject(error);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolveClose, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolveClose();
    });
  });
}

/**
 * Graceful Shutdown Handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.warn('[SERVER] Shutdown already in progress, ignoring signal:', signal);
    return;
  }

  isShuttingDown = true;

  console.log('[SERVER] Received shutdown signal:', {
    signal,
    timestamp: new Date().toISOString(),
  });

  const shutdownTimeout = setTimeout(() => {
    console.error('[SERVER] FATAL: Shutdown timeout exceeded, forcing exit');
    process.exit(1);
  }, ENV.SHUTDOWN_TIMEOUT);

  try {
    if (serverInstance) {
      await closeServer(serverInstance);
      console.log('[SERVER] HTTP server closed successfully');
    }

    if (ENV.ENABLE_DATABASE) {
      await shutdownDatabase({ timeout: ENV.SHUTDOWN_TIMEOUT - 5000, force: false });
    }

    clearTimeout(shutdownTimeout);
    console.log('[SERVER] Graceful shutdown completed successfully');
    process.exit(0);
  } catch (error) {
    console.error('[SERVER] FATAL: Error during graceful shutdown:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });

    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

function setupSignalHandlers(): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    console.error('[SERVER] FATAL: Unhandled promise rejection:', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    void gracefulShutdown('unhandledRejection');
  });
}

/**
 * Main Server Initialization
 *
 * 1. Setup signal handlers
 * 2. Initialize database connection
 * 3. Start HTTP server
 */
async function main(): Promise<void> {
  console.log('[SERVER] Starting supervisor evaluation server:', {
    nodeEnv: ENV.NODE_ENV,
    nodeVersion: process.version,
    timestamp: new Date().toISOString(),
  });

  try {
    setupSignalHandlers();

    const dbInitialized = await initializeDatabase();
    if (!dbInitialized) {
      throw new Error('Failed to initialize database connection');
    }

    serverInstance = await startServer();
  } catch (error) {
    console.error('[SERVER] FATAL: Server initialization failed:', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString(),
    });

    if (ENV.ENABLE_DATABASE) {
      await shutdownDatabase({ timeout: 5000, force: true }).catch((cleanupError: unknown) => {
        console.error('[SERVER] Error during cleanup:', {
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
    }

    process.exit(1);
  }
}

const isMainModule = process.argv[1]
  ? resolve(fileURLToPath(import.meta.url)) === resolve(process.argv[1])
  : false;

if (isMainModule) {
  void main();
}

export { gracefulShutdown, initializeDatabase, startServer };

export default main;
