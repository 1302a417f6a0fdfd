import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export const register = new Registry();

register.setDefaultLabels({
  app: 'reverse-proxy'
});

// Pipeline outcomes: forwarded, cache_hit, rate_limited, middleware_rejected,
// no_route, no_backend, circuit_open, proxy_error
export const proxyRequestsTotal = new Counter({
  name: 'proxy_requests_total',
  help: 'Total number of requests handled by the proxy pipeline',
  labelNames: ['outcome'],
  registers: [register]
});

export const upstreamRequestsTotal = new Counter({
  name: 'upstream_requests_total',
  help: 'Total number of requests forwarded to backend servers',
  labelNames: ['server', 'status'],
  registers: [register]
});

export const upstreamResponseTime = new Histogram({
  name: 'upstream_response_time_seconds',
  help: 'Time until response headers from backend servers in seconds',
  labelNames: ['server'],
  buckets: [0.01, 0.05, 0.1, 0.3, 0.5, 1, 3, 5, 10],
  registers: [register]
});

export const serverHealthStatus = new Gauge({
  name: 'server_health_status',
  help: 'Health status of backend servers (1 = healthy, 0 = unhealthy)',
  labelNames: ['pool', 'server'],
  registers: [register]
});

export const rateLimitHits = new Counter({
  name: 'rate_limit_hits_total',
  help: 'Total number of requests denied by the rate limiter',
  registers: [register]
});

export const circuitBreakerState = new Gauge({
  name: 'circuit_breaker_state',
  help: 'Circuit breaker state (0 = closed, 1 = open, 2 = half-open)',
  labelNames: ['server'],
  registers: [register]
});

export const cacheEntries = new Gauge({
  name: 'response_cache_entries',
  help: 'Number of entries held by the response cache',
  registers: [register]
});
