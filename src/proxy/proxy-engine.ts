import type { Request, RequestHandler, Response } from 'express';
import type { IncomingHttpHeaders } from 'http';
import type { Readable } from 'stream';
import { isAxiosError } from 'axios';
import type { AxiosResponse } from 'axios';
import { BackendServer } from '../backend/pool';
import { HeaderMultimap, ResponseCache } from '../cache/response-cache';
import { EventBus, ProxyEventHandler } from '../events/event-bus';
import { MetricsCollector } from '../metrics/metrics-collector';
import { MiddlewareChain, ProxyMiddleware } from '../middleware/chain';
import { CircuitBreaker, CircuitBreakerConfig, CircuitState } from '../middleware/circuit-breaker';
import { RateLimiter } from '../middleware/rate-limiter';
import { getRequestId } from '../middleware/request-id';
import { Route, RouteDefinition, Router, headerValue } from '../router/router';
import { ProxyEvent, ProxyEventType, ProxyStats, RequestSummary } from '../types';
import { ConnectionPool } from '../utils/connection-pool';
import { CircuitOpenError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  cacheEntries,
  circuitBreakerState,
  proxyRequestsTotal,
  rateLimitHits,
  upstreamRequestsTotal,
  upstreamResponseTime
} from '../utils/prometheus';
import { joinUrl } from '../utils/url';

export interface ProxyEngineOptions {
  /** null turns rate limiting off; omitted means 1000 requests per minute. */
  rateLimit?: { maxRequests: number; windowMs: number } | null;
  cache?: { enabled: boolean; ttlMs: number; methods?: string[] };
  circuitBreaker?: CircuitBreakerConfig;
  forwardTimeoutMs?: number;
}

type Outcome =
  | 'forwarded'
  | 'cache_hit'
  | 'rate_limited'
  | 'middleware_rejected'
  | 'no_route'
  | 'no_backend'
  | 'circuit_open'
  | 'proxy_error';

// Connection-scoped headers that are never relayed in either direction
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade'
]);

const DEFAULT_RATE_LIMIT = { maxRequests: 1000, windowMs: 60000 };
const DEFAULT_FORWARD_TIMEOUT_MS = 30000;

/**
 * Client address as seen by the proxy: first entry of X-Forwarded-For,
 * then X-Real-IP, then the socket's remote address.
 */
export function getClientIp(req: { headers: IncomingHttpHeaders; socket: { remoteAddress?: string } }): string {
  const forwardedFor = headerValue(req.headers, 'x-forwarded-for');
  if (forwardedFor) {
    const first = forwardedFor.split(',')[0].trim();
    if (first) {
      return first;
    }
  }
  const realIp = headerValue(req.headers, 'x-real-ip');
  if (realIp) {
    return realIp;
  }
  return req.socket.remoteAddress ?? '';
}

function headerValues(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  if (typeof value === 'string') {
    return [value];
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return [String(value)];
  }
  return [];
}

function outboundHeaders(req: Request, clientIp: string): Record<string, string | string[]> {
  const headers: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined || name === 'host' || HOP_BY_HOP_HEADERS.has(name)) {
      continue;
    }
    headers[name] = value;
  }
  headers['x-forwarded-for'] = clientIp;
  headers['x-forwarded-proto'] = headerValue(req.headers, 'x-forwarded-proto') || req.protocol;
  headers['x-real-ip'] = req.socket.remoteAddress ?? '';
  return headers;
}

function hasRequestBody(req: Request): boolean {
  return req.headers['content-length'] !== undefined || req.headers['transfer-encoding'] !== undefined;
}

function circuitStateValue(state: CircuitState): number {
  switch (state) {
    case CircuitState.CLOSED:
      return 0;
    case CircuitState.OPEN:
      return 1;
    case CircuitState.HALF_OPEN:
      return 2;
  }
}

/**
 * The per-request pipeline: rate limit, middleware chain, route match,
 * server selection, cache, forward. Each stage either passes the request
 * on or answers it with a status and an event; nothing is retried.
 */
export class ProxyEngine {
  private readonly routerTable = new Router();
  private readonly cache = new ResponseCache();
  private readonly events = new EventBus();
  private readonly chain = new MiddlewareChain();
  private readonly metricsCollector = new MetricsCollector();
  private readonly connectionPool: ConnectionPool;
  private readonly circuitBreakers: Map<string, CircuitBreaker> = new Map();
  private rateLimiter: RateLimiter | null;
  private cacheEnabled: boolean;
  private cacheTtlMs: number;
  private cacheMethods: Set<string>;
  private requestCount = 0;
  private errorCount = 0;
  private forwardSequence = 0;

  constructor(private readonly options: ProxyEngineOptions = {}) {
    const rateLimit = options.rateLimit === undefined ? DEFAULT_RATE_LIMIT : options.rateLimit;
    this.rateLimiter = rateLimit ? new RateLimiter(rateLimit.maxRequests, rateLimit.windowMs) : null;
    this.cacheEnabled = options.cache?.enabled ?? false;
    this.cacheTtlMs = options.cache?.ttlMs ?? 60000;
    this.cacheMethods = new Set((options.cache?.methods ?? ['GET']).map(method => method.toUpperCase()));
    this.connectionPool = new ConnectionPool({
      timeout: options.forwardTimeoutMs ?? DEFAULT_FORWARD_TIMEOUT_MS
    });
  }

  get router(): Router {
    return this.routerTable;
  }

  get metrics(): MetricsCollector {
    return this.metricsCollector;
  }

  addRoute(definition: RouteDefinition): Route {
    const route = this.routerTable.addRoute(definition);
    logger.info('Route added', {
      route: route.name,
      backend: route.backend.id,
      priority: route.priority
    });
    return route;
  }

  removeRoute(name: string): boolean {
    const removed = this.routerTable.removeRoute(name);
    if (removed) {
      logger.info('Route removed', { route: name });
    }
    return removed;
  }

  use(middleware: ProxyMiddleware): this {
    this.chain.add(middleware);
    return this;
  }

  on(type: ProxyEventType, handler: ProxyEventHandler): () => void {
    return this.events.on(type, handler);
  }

  /** Replaces the limiter; every identifier starts again with a full bucket. */
  setRateLimit(maxRequests: number, windowMs: number): void {
    this.rateLimiter = new RateLimiter(maxRequests, windowMs);
    logger.info('Rate limit updated', { maxRequests, windowMs });
  }

  setCachePolicy(enabled: boolean, ttlMs: number, methods: string[] = ['GET']): void {
    this.cacheEnabled = enabled;
    this.cacheTtlMs = ttlMs;
    this.cacheMethods = new Set(methods.map(method => method.toUpperCase()));
  }

  cacheResponse(
    method: string,
    path: string,
    serverUrl: string,
    status: number,
    headers: HeaderMultimap,
    body: Buffer,
    ttlMs: number = this.cacheTtlMs
  ): void {
    this.cache.set(method, path, serverUrl, status, headers, body, ttlMs);
    cacheEntries.set(this.cache.size);
  }

  clearCache(): void {
    this.cache.clear();
    cacheEntries.set(0);
    logger.info('Response cache cleared');
  }

  getStats(): ProxyStats {
    return {
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      cacheSize: this.cache.size
    };
  }

  /** Publishes an event that originates outside the request pipeline. */
  emitEvent(event: Omit<ProxyEvent, 'timestamp'>): void {
    this.emit(event);
  }

  getCircuitBreaker(serverUrl: string): CircuitBreaker | undefined {
    return this.circuitBreakers.get(serverUrl);
  }

  handler(): RequestHandler {
    return (req, res, next) => {
      this.handle(req, res).catch(next);
    };
  }

  async handle(req: Request, res: Response): Promise<void> {
    this.requestCount++;
    const summary: RequestSummary = {
      method: req.method,
      path: req.path,
      clientIp: getClientIp(req)
    };

    if (this.rateLimiter && !this.rateLimiter.allow(req.socket.remoteAddress ?? '')) {
      rateLimitHits.inc();
      this.reject(res, 429, 'Too Many Requests', 'Rate limit exceeded', 'rate_limited');
      this.emit({ type: 'rate_limit_exceeded', request: summary, statusCode: 429 });
      return;
    }

    try {
      if ((await this.chain.execute(req, res)) === 'handled') {
        return;
      }
    } catch (error) {
      const err = error instanceof Error ? error : new Error(errorMessage(error));
      logger.warn('Middleware rejected request', { method: req.method, path: req.path, error: err.message });
      if (res.headersSent) {
        this.countError('middleware_rejected');
      } else {
        this.reject(res, 403, 'Forbidden', err.message, 'middleware_rejected');
      }
      this.emit({ type: 'middleware_error', request: summary, statusCode: res.statusCode, error: err });
      return;
    }
    summary.requestId = getRequestId(req);

    const route = this.routerTable.match(req);
    if (!route) {
      this.reject(res, 404, 'Not Found', `No route for ${req.method} ${req.path}`, 'no_route');
      this.emit({ type: 'no_route_found', request: summary, statusCode: 404 });
      return;
    }

    const server = route.backend.getServer();
    if (!server) {
      logger.error('No healthy servers available for request', { route: route.name, backend: route.backend.id });
      this.reject(res, 503, 'Service Unavailable', `No healthy servers for backend ${route.backend.id}`, 'no_backend');
      this.emit({ type: 'no_backend_available', request: summary, route: route.name, statusCode: 503 });
      return;
    }

    const method = req.method.toUpperCase();
    const cacheable = this.cacheEnabled && this.cacheMethods.has(method);
    if (cacheable) {
      const entry = this.cache.get(method, req.path, server.href);
      if (entry) {
        res.status(entry.status);
        for (const [name, values] of Object.entries(entry.headers)) {
          res.setHeader(name, values.length === 1 ? values[0] : values);
        }
        res.setHeader('X-Cache', 'HIT');
        res.end(entry.body);
        proxyRequestsTotal.inc({ outcome: 'cache_hit' });
        this.emit({ type: 'cache_hit', request: summary, route: route.name, serverUrl: server.href, statusCode: entry.status });
        return;
      }
    }

    await this.forward(req, res, route, server, summary, cacheable);
  }

  /** Stops forwarding clients and releases idle keep-alive sockets. */
  close(): void {
    this.connectionPool.destroy();
    this.events.removeAllListeners();
  }

  private async forward(
    req: Request,
    res: Response,
    route: Route,
    server: BackendServer,
    summary: RequestSummary,
    cacheable: boolean
  ): Promise<void> {
    const target = joinUrl(server.url, req.originalUrl);
    const client = this.connectionPool.getClient(server.url.origin);
    const requestToken = `${server.href}#${++this.forwardSequence}`;
    const breaker = this.breakerFor(server);
    const endTimer = upstreamResponseTime.startTimer({ server: server.href });

    this.metricsCollector.recordRequestStart(server.href, requestToken);
    this.emit({ type: 'request_forwarded', request: summary, route: route.name, serverUrl: server.href });

    const send = () =>
      client.request<Readable>({
        method: req.method,
        url: target,
        headers: outboundHeaders(req, summary.clientIp),
        data: hasRequestBody(req) ? req : undefined,
        responseType: 'stream'
      });

    // The client may hang up while the backend is still answering
    let clientGone = false;
    const onClientGone = () => {
      clientGone = true;
    };
    res.once('close', onClientGone);

    let response: AxiosResponse<Readable>;
    try {
      response = breaker ? await breaker.execute(send) : await send();
    } catch (error) {
      res.off('close', onClientGone);
      this.metricsCollector.recordRequestEnd(server.href, requestToken, false);
      if (breaker) {
        circuitBreakerState.set({ server: server.href }, circuitStateValue(breaker.getState()));
      }

      const err = error instanceof Error ? error : new Error(errorMessage(error));
      if (error instanceof CircuitOpenError) {
        this.reject(res, 503, 'Service Unavailable', err.message, 'circuit_open');
        this.emit({ type: 'circuit_open', request: summary, route: route.name, serverUrl: server.href, statusCode: 503, error: err });
        return;
      }

      upstreamRequestsTotal.inc({ server: server.href, status: 'error' });
      logger.error('Request forwarding failed', {
        server: server.href,
        method: req.method,
        path: req.path,
        error: err.message,
        errorCode: isAxiosError(error) ? error.code : undefined,
        requestId: summary.requestId
      });
      this.reject(res, 502, 'Bad Gateway', 'Failed to forward request to server', 'proxy_error');
      this.emit({ type: 'proxy_error', request: summary, route: route.name, serverUrl: server.href, statusCode: 502, error: err });
      return;
    }

    res.off('close', onClientGone);
    const { status } = response;
    endTimer();
    if (clientGone || res.destroyed) {
      response.data.destroy();
      this.metricsCollector.recordRequestEnd(server.href, requestToken, false);
      logger.debug('Client disconnected before the backend answered', {
        server: server.href,
        path: req.path,
        requestId: summary.requestId
      });
      return;
    }
    if (breaker) {
      circuitBreakerState.set({ server: server.href }, circuitStateValue(breaker.getState()));
    }
    upstreamRequestsTotal.inc({ server: server.href, status: String(status) });
    proxyRequestsTotal.inc({ outcome: 'forwarded' });

    const headers: HeaderMultimap = {};
    for (const [name, value] of Object.entries(response.headers)) {
      const lowerName = name.toLowerCase();
      const values = headerValues(value);
      if (HOP_BY_HOP_HEADERS.has(lowerName) || values.length === 0) {
        continue;
      }
      headers[lowerName] = values;
    }

    const storeInCache = cacheable && status === 200;
    res.status(status);
    for (const [name, values] of Object.entries(headers)) {
      res.setHeader(name, values.length === 1 ? values[0] : values);
    }
    if (storeInCache) {
      res.setHeader('X-Cache', 'MISS');
    }

    const upstream = response.data;
    const chunks: Buffer[] = [];
    if (storeInCache) {
      upstream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
    }

    await new Promise<void>(resolve => {
      let settled = false;
      const finish = (success: boolean) => {
        if (settled) {
          return;
        }
        settled = true;
        this.metricsCollector.recordRequestEnd(server.href, requestToken, success);
        resolve();
      };

      upstream.on('error', (error: Error) => {
        logger.error('Backend response stream failed', { server: server.href, path: req.path, error: error.message });
        res.destroy(error);
        finish(false);
      });
      upstream.on('end', () => {
        if (storeInCache) {
          this.cacheResponse(req.method.toUpperCase(), req.path, server.href, status, headers, Buffer.concat(chunks));
          this.emit({ type: 'response_cached', request: summary, route: route.name, serverUrl: server.href, statusCode: status });
        }
      });
      res.on('finish', () => finish(status < 500));
      res.on('close', () => {
        if (!res.writableFinished) {
          upstream.destroy();
          finish(false);
        }
      });

      upstream.pipe(res);
    });

    logger.debug('Request forwarded', {
      server: server.href,
      method: req.method,
      path: req.path,
      status,
      requestId: summary.requestId
    });
  }

  private breakerFor(server: BackendServer): CircuitBreaker | null {
    const config = this.options.circuitBreaker;
    if (!config) {
      return null;
    }
    let breaker = this.circuitBreakers.get(server.href);
    if (!breaker) {
      breaker = new CircuitBreaker(server.href, config);
      this.circuitBreakers.set(server.href, breaker);
    }
    return breaker;
  }

  private reject(res: Response, status: number, error: string, message: string, outcome: Outcome): void {
    this.countError(outcome);
    if (!res.headersSent) {
      res.status(status).json({ error, message });
    }
  }

  private countError(outcome: Outcome): void {
    this.errorCount++;
    proxyRequestsTotal.inc({ outcome });
  }

  private emit(event: Omit<ProxyEvent, 'timestamp'>): void {
    this.events.emit({ ...event, timestamp: new Date() });
  }
}
