import { BackendPool } from '../backend/pool';
import { HealthChecker } from '../health/health-checker';
import { createAuthMiddleware } from '../middleware/auth';
import { createCorsMiddleware } from '../middleware/cors';
import { requestIdMiddleware } from '../middleware/request-id';
import { createRequestLogger } from '../middleware/request-logger';
import { ProxyConfig, ProxyEventType } from '../types';
import { errorMessage } from '../utils/errors';
import { LogSink, defaultLogSink, logger } from '../utils/logger';
import { ProxyEngine } from './proxy-engine';

export interface ProxyRuntime {
  engine: ProxyEngine;
  pools: Map<string, BackendPool>;
  healthCheckers: HealthChecker[];
  start(): void;
  stop(): void;
}

const LOGGED_EVENTS: ProxyEventType[] = [
  'rate_limit_exceeded',
  'middleware_error',
  'no_route_found',
  'no_backend_available',
  'proxy_error',
  'circuit_open',
  'server_health_changed'
];

function buildPools(config: ProxyConfig): Map<string, BackendPool> {
  const pools = new Map<string, BackendPool>();
  for (const backend of config.backends) {
    const pool = new BackendPool(backend.id);
    for (const serverUrl of backend.servers) {
      try {
        pool.addServer(serverUrl, backend.weights?.[serverUrl] ?? 1);
      } catch (error) {
        logger.error('Skipping backend server', { backend: backend.id, server: serverUrl, error: errorMessage(error) });
      }
    }
    pools.set(backend.id, pool);
    logger.info('Backend pool created', { backend: backend.id, servers: pool.size });
  }
  return pools;
}

/**
 * Wires a ProxyEngine, its pools and health checkers from a validated
 * configuration. Items that fail setup (bad server URL, bad route pattern,
 * unknown backend) are logged and skipped; the rest still load.
 */
export function buildProxy(config: ProxyConfig, logSink: LogSink = defaultLogSink): ProxyRuntime {
  const { policies } = config;

  const engine = new ProxyEngine({
    rateLimit: policies.rateLimit.enabled
      ? { maxRequests: policies.rateLimit.maxRequests, windowMs: policies.rateLimit.windowMs }
      : null,
    cache: {
      enabled: policies.cache.enabled,
      ttlMs: policies.cache.ttl,
      methods: policies.cache.methods
    },
    circuitBreaker: policies.circuitBreaker.enabled
      ? {
          failureThreshold: policies.circuitBreaker.failureThreshold,
          successThreshold: policies.circuitBreaker.successThreshold,
          timeout: policies.circuitBreaker.timeout
        }
      : undefined,
    forwardTimeoutMs: config.server.forwardTimeout
  });

  const pools = buildPools(config);

  const healthCheckers: HealthChecker[] = [];
  for (const backend of config.backends) {
    const pool = pools.get(backend.id);
    if (!pool || !backend.healthCheck.enabled) {
      continue;
    }
    healthCheckers.push(
      new HealthChecker(
        pool,
        {
          interval: backend.healthCheck.interval,
          timeout: backend.healthCheck.timeout,
          path: backend.healthCheck.path
        },
        (server, healthy) => {
          engine.emitEvent({
            type: 'server_health_changed',
            serverUrl: server.href,
            statusCode: healthy ? 200 : 503
          });
        }
      )
    );
  }

  for (const route of config.routes) {
    const pool = pools.get(route.backendId);
    if (!pool) {
      logger.error('Skipping route with unknown backend', { route: route.name, backend: route.backendId });
      continue;
    }
    try {
      engine.addRoute({
        name: route.name,
        pattern: route.pattern,
        pathPrefix: route.pathPrefix,
        subdomain: route.subdomain,
        headers: route.headers,
        methods: route.methods,
        backend: pool,
        priority: route.priority
      });
    } catch (error) {
      logger.error('Skipping route', { route: route.name, error: errorMessage(error) });
    }
  }

  engine.use(requestIdMiddleware);
  if (policies.cors.enabled) {
    engine.use(createCorsMiddleware(policies.cors.allowedOrigins));
  }
  if (policies.auth.enabled) {
    engine.use(createAuthMiddleware({ type: policies.auth.type, secret: policies.auth.secret }));
  }
  engine.use(createRequestLogger(logSink));

  for (const type of LOGGED_EVENTS) {
    engine.on(type, event => {
      const target = event.request ? `${event.request.method} ${event.request.path}` : event.serverUrl ?? '';
      const detail = event.error ? `: ${event.error.message}` : '';
      logSink(`[${event.type}] ${target}${detail}`);
    });
  }

  let metricsCleanup: NodeJS.Timeout | null = null;

  return {
    engine,
    pools,
    healthCheckers,
    start() {
      for (const checker of healthCheckers) {
        checker.start();
      }
      if (!metricsCleanup) {
        metricsCleanup = setInterval(() => {
          engine.metrics.cleanupStaleRequests();
        }, 300000);
        metricsCleanup.unref();
      }
      logger.info('Reverse proxy initialized', {
        backends: pools.size,
        routes: engine.router.size,
        healthCheckers: healthCheckers.length
      });
    },
    stop() {
      for (const checker of healthCheckers) {
        checker.stop();
      }
      if (metricsCleanup) {
        clearInterval(metricsCleanup);
        metricsCleanup = null;
      }
      engine.close();
    }
  };
}
