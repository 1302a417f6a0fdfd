import express, { NextFunction, Request, Response } from 'express';
import { ADMIN_PREFIX, createAdminRouter } from './admin/admin-router';
import { ProxyRuntime } from './proxy/bootstrap';
import { logger } from './utils/logger';
import { sanitizeError } from './utils/security';

export interface AppOptions {
  adminApiKey?: string;
  isProduction?: boolean;
}

/**
 * Express application serving the admin API under /_proxy and handing
 * every other request to the proxy engine. No body parser runs before the
 * engine: request bodies are streamed to the backend untouched.
 */
export function createApp(runtime: ProxyRuntime, options: AppOptions = {}): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(ADMIN_PREFIX, createAdminRouter(runtime, { apiKey: options.adminApiKey }));
  app.use(runtime.engine.handler());

  // Error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled error', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method
    });

    if (res.headersSent) {
      next(err);
      return;
    }

    res.status(500).json({
      error: 'Internal Server Error',
      ...sanitizeError(err, options.isProduction ?? false)
    });
  });

  return app;
}
