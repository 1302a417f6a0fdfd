import http from 'http';
import { createApp } from './app';
import { buildProxy } from './proxy/bootstrap';
import { loadConfig } from './utils/config-loader';
import { logger } from './utils/logger';

const config = loadConfig();
const isProduction = process.env.NODE_ENV === 'production';
const adminApiKey = process.env.ADMIN_API_KEY;

if (!adminApiKey) {
  logger.warn('ADMIN_API_KEY is not set - admin endpoints are unauthenticated');
}

const runtime = buildProxy(config);
const app = createApp(runtime, { adminApiKey, isProduction });

const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : config.server.port;
const HOST = config.server.host;

let server: http.Server | null = null;

function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received, shutting down gracefully`, { signal });
  runtime.stop();

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed, exiting');
    process.exit(0);
  });

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined
  });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', { error: error.message, stack: error.stack });
  gracefulShutdown('uncaughtException');
});

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

runtime.start();
server = app.listen(PORT, HOST, () => {
  logger.info(`Reverse proxy started on HTTP port ${PORT}`, {
    host: HOST,
    port: PORT,
    backends: config.backends.length,
    routes: runtime.engine.router.size,
    rateLimitEnabled: config.policies.rateLimit.enabled,
    cacheEnabled: config.policies.cache.enabled,
    adminAuth: Boolean(adminApiKey),
    nodeEnv: process.env.NODE_ENV || 'development'
  });
});
