import { z } from 'zod';

const healthCheckSchema = z.object({
  enabled: z.boolean().default(true),
  interval: z.number().int().min(100, 'Health check interval must be at least 100ms').default(30000),
  timeout: z.number().int().min(1, 'Health check timeout must be positive').default(5000),
  path: z.string().startsWith('/', 'Health check path must start with "/"').default('/health')
});

const backendSchema = z.object({
  id: z.string().min(1, 'Backend ID is required'),
  // URLs are checked when servers are added, so one bad entry only drops that server
  servers: z.array(z.string().min(1)).default([]),
  weights: z.record(z.number().int().min(0)).optional(),
  healthCheck: healthCheckSchema.default({})
});

const routeSchema = z
  .object({
    name: z.string().min(1, 'Route name is required'),
    pathPrefix: z.string().optional(),
    pattern: z.string().optional(),
    subdomain: z.string().optional(),
    headers: z.record(z.string()).optional(),
    methods: z.array(z.string().min(1)).optional(),
    backendId: z.string().min(1, 'Route backendId is required'),
    priority: z.number().int().default(0)
  });

const rateLimitPolicySchema = z.object({
  enabled: z.boolean().default(true),
  maxRequests: z.number().int().min(1, 'Max requests must be at least 1').default(1000),
  windowMs: z.number().int().min(1, 'Window must be positive').default(60000)
});

const corsPolicySchema = z.object({
  enabled: z.boolean().default(false),
  allowedOrigins: z.array(z.string()).default(['*'])
});

const authPolicySchema = z
  .object({
    enabled: z.boolean().default(false),
    type: z.enum(['token', 'api-key', 'jwt'], {
      errorMap: () => ({ message: 'Auth type must be one of: token, api-key, jwt' })
    }).default('token'),
    secret: z.string().min(1).optional()
  })
  .refine(
    (data: { enabled: boolean; type: string; secret?: string }) => !data.enabled || data.type === 'token' || !!data.secret,
    { message: 'secret is required for api-key and jwt authentication' }
  );

const cachePolicySchema = z.object({
  enabled: z.boolean().default(false),
  ttl: z.number().int().min(1, 'Cache TTL must be positive').default(60000),
  methods: z.array(z.string().min(1)).default(['GET'])
});

const circuitBreakerPolicySchema = z.object({
  enabled: z.boolean().default(false),
  failureThreshold: z.number().int().min(1).default(5),
  successThreshold: z.number().int().min(1).default(2),
  timeout: z.number().int().min(1).default(60000)
});

export const proxyConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(8080),
      forwardTimeout: z.number().int().min(1).default(30000)
    })
    .default({}),
  backends: z.array(backendSchema).default([]),
  routes: z.array(routeSchema).default([]),
  policies: z
    .object({
      rateLimit: rateLimitPolicySchema.default({}),
      cors: corsPolicySchema.default({}),
      auth: authPolicySchema.default({}),
      cache: cachePolicySchema.default({}),
      circuitBreaker: circuitBreakerPolicySchema.default({})
    })
    .default({})
});
