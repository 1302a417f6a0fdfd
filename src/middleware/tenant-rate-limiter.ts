import { RateLimiter } from './rate-limiter';

/**
 * Separate token buckets per tenant. Tenants without a configured limit
 * are never throttled.
 */
export class TenantRateLimiter {
  private limiters: Map<string, RateLimiter> = new Map();

  setTenantLimit(tenantId: string, maxRequests: number, windowMs: number): void {
    this.limiters.set(tenantId, new RateLimiter(maxRequests, windowMs));
  }

  removeTenantLimit(tenantId: string): boolean {
    return this.limiters.delete(tenantId);
  }

  check(tenantId: string, identifier: string): boolean {
    const limiter = this.limiters.get(tenantId);
    if (!limiter) {
      return true;
    }
    return limiter.allow(identifier);
  }

  getLimiter(tenantId: string): RateLimiter | undefined {
    return this.limiters.get(tenantId);
  }
}
