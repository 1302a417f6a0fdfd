import express, { NextFunction, Request, Response, Router } from 'express';
import helmet from 'helmet';
import { ProxyRuntime } from '../proxy/bootstrap';
import { headerValue } from '../router/router';
import { logger } from '../utils/logger';
import { register } from '../utils/prometheus';
import { constantTimeCompare } from '../utils/security';

export const ADMIN_PREFIX = '/_proxy';

export interface AdminRouterOptions {
  apiKey?: string;
}

function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = headerValue(req.headers, 'authorization');
    const provided = authHeader.startsWith('Bearer ')
      ? authHeader.substring(7)
      : headerValue(req.headers, 'x-api-key');

    if (!provided) {
      res.status(401).json({ error: 'Unauthorized', message: 'Admin API key required' });
      return;
    }
    if (!constantTimeCompare(provided, apiKey)) {
      logger.warn('Admin request rejected - invalid API key', { ip: req.ip, path: req.path });
      res.status(403).json({ error: 'Forbidden', message: 'Invalid admin API key' });
      return;
    }
    next();
  };
}

/**
 * Operational endpoints for the proxy itself. Mounted ahead of the proxy
 * handler so these paths are never forwarded.
 */
export function createAdminRouter(runtime: ProxyRuntime, options: AdminRouterOptions = {}): Router {
  const { engine, pools } = runtime;
  const router = express.Router();

  router.use(helmet());
  if (options.apiKey) {
    router.use(requireApiKey(options.apiKey));
  }

  router.get('/health', (req: Request, res: Response) => {
    const backends = Array.from(pools.values(), pool => ({
      id: pool.id,
      healthyServers: pool.getHealthyServers().length,
      servers: pool.getServers().map(server => ({
        url: server.href,
        healthy: server.isHealthy(),
        lastHealthCheck: server.getMetadata('lastHealthCheck') ?? null,
        lastHealthStatus: server.getMetadata('lastHealthStatus') ?? null
      }))
    }));
    const degraded = backends.some(backend => backend.servers.length > 0 && backend.healthyServers === 0);

    res.json({
      status: degraded ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      backends
    });
  });

  router.get('/stats', (req: Request, res: Response) => {
    res.json({
      ...engine.getStats(),
      forwarding: engine.metrics.getOverallStats(),
      servers: engine.metrics.getAllMetrics()
    });
  });

  router.get('/routes', (req: Request, res: Response) => {
    res.json({
      routes: engine.router.listRoutes().map(route => ({
        name: route.name,
        priority: route.priority,
        backend: route.backend.id,
        pathPrefix: route.pathPrefix ?? null,
        pattern: route.pattern ?? null,
        subdomain: route.subdomain ?? null,
        headers: route.headers ?? null,
        methods: route.methods ?? null
      }))
    });
  });

  router.delete('/cache', (req: Request, res: Response) => {
    const cleared = engine.getStats().cacheSize;
    engine.clearCache();
    res.json({ message: 'Cache cleared', cleared });
  });

  router.get('/metrics', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.set('Content-Type', register.contentType);
      res.end(await register.metrics());
    } catch (error) {
      next(error);
    }
  });

  router.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not Found', message: `Unknown admin endpoint ${req.method} ${req.path}` });
  });

  return router;
}
