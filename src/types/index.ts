export interface HealthCheckConfig {
  enabled: boolean;
  interval: number; // milliseconds
  timeout: number; // milliseconds
  path: string;
}

export interface BackendConfig {
  id: string;
  servers: string[];
  weights?: Record<string, number>; // server URL -> weight, reserved
  healthCheck: HealthCheckConfig;
}

export interface RouteConfig {
  name: string;
  pathPrefix?: string;
  pattern?: string;
  subdomain?: string;
  headers?: Record<string, string>;
  methods?: string[];
  backendId: string;
  priority: number;
}

export interface RateLimitPolicy {
  enabled: boolean;
  maxRequests: number;
  windowMs: number;
}

export interface CorsPolicy {
  enabled: boolean;
  allowedOrigins: string[];
}

export type AuthType = 'token' | 'api-key' | 'jwt';

export interface AuthPolicy {
  enabled: boolean;
  type: AuthType;
  secret?: string;
}

export interface CachePolicy {
  enabled: boolean;
  ttl: number; // milliseconds
  methods: string[];
}

export interface CircuitBreakerPolicy {
  enabled: boolean;
  failureThreshold: number;
  successThreshold: number;
  timeout: number; // milliseconds
}

export interface PoliciesConfig {
  rateLimit: RateLimitPolicy;
  cors: CorsPolicy;
  auth: AuthPolicy;
  cache: CachePolicy;
  circuitBreaker: CircuitBreakerPolicy;
}

export interface ProxyConfig {
  server: {
    host: string;
    port: number;
    forwardTimeout: number; // milliseconds
  };
  backends: BackendConfig[];
  routes: RouteConfig[];
  policies: PoliciesConfig;
}

export interface ServerMetrics {
  serverUrl: string;
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseTime: number;
  currentConnections: number;
  lastResponseTime?: number;
}

export type ProxyEventType =
  | 'rate_limit_exceeded'
  | 'middleware_error'
  | 'no_route_found'
  | 'no_backend_available'
  | 'cache_hit'
  | 'response_cached'
  | 'request_forwarded'
  | 'proxy_error'
  | 'circuit_open'
  | 'server_health_changed';

export interface RequestSummary {
  method: string;
  path: string;
  clientIp: string;
  requestId?: string;
}

export interface ProxyEvent {
  type: ProxyEventType;
  timestamp: Date;
  request?: RequestSummary;
  route?: string;
  serverUrl?: string;
  statusCode?: number;
  error?: Error;
}

export interface ProxyStats {
  requestCount: number;
  errorCount: number;
  cacheSize: number;
}
