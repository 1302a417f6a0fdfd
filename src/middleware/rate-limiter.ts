import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

interface TokenBucket {
  tokens: number;
  lastTouch: number;
}

export interface RateLimiterStats {
  trackedIdentifiers: number;
  allowed: number;
  denied: number;
  maxRequests: number;
  windowMs: number;
}

/**
 * Token bucket per identifier with continuous refill of
 * maxRequests per windowMs. Buckets are created and refilled on access;
 * there is no background timer.
 */
export class RateLimiter {
  private buckets: Map<string, TokenBucket> = new Map();
  private allowedCount = 0;
  private deniedCount = 0;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number
  ) {
    if (!(maxRequests > 0) || !(windowMs > 0)) {
      throw new ConfigurationError(
        `Rate limit needs a positive capacity and window (got ${maxRequests} per ${windowMs}ms)`
      );
    }
  }

  allow(identifier: string): boolean {
    const now = Date.now();
    let bucket = this.buckets.get(identifier);

    if (!bucket) {
      bucket = { tokens: this.maxRequests, lastTouch: now };
      this.buckets.set(identifier, bucket);
    } else {
      const elapsedSeconds = (now - bucket.lastTouch) / 1000;
      const refillPerSecond = this.maxRequests / (this.windowMs / 1000);
      bucket.tokens = Math.min(this.maxRequests, bucket.tokens + elapsedSeconds * refillPerSecond);
      bucket.lastTouch = now;
    }

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      this.allowedCount++;
      return true;
    }

    this.deniedCount++;
    logger.debug('Rate limit bucket empty', { identifier, tokens: bucket.tokens });
    return false;
  }

  /** Tokens currently available to an identifier, without refilling. */
  peekTokens(identifier: string): number | undefined {
    return this.buckets.get(identifier)?.tokens;
  }

  getStats(): RateLimiterStats {
    return {
      trackedIdentifiers: this.buckets.size,
      allowed: this.allowedCount,
      denied: this.deniedCount,
      maxRequests: this.maxRequests,
      windowMs: this.windowMs
    };
  }

  reset(): void {
    this.buckets.clear();
    this.allowedCount = 0;
    this.deniedCount = 0;
  }
}
