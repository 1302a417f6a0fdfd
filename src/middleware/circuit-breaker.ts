import { logger } from '../utils/logger';
import { CircuitOpenError } from '../utils/errors';

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open'
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // failures before opening
  successThreshold: number; // half-open successes before closing
  timeout: number; // ms since last failure before a trial call is let through
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
}

/**
 * Fail-fast wrapper around an async call. The open -> half-open move happens
 * on the next call attempt, not on a timer. While half-open only one trial
 * call is in flight at a time; concurrent callers are rejected as if open.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime = 0;
  private trialInFlight = false;

  constructor(
    private readonly name: string,
    private readonly config: CircuitBreakerConfig
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();

    const isTrial = this.state === CircuitState.HALF_OPEN;
    if (isTrial) {
      this.trialInFlight = true;
    }

    try {
      const result = await fn();
      this.onSuccess(isTrial);
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    } finally {
      if (isTrial) {
        this.trialInFlight = false;
      }
    }
  }

  private admit(): void {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastFailureTime > this.config.timeout) {
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
        logger.info(`Circuit breaker entering HALF_OPEN state for ${this.name}`);
      } else {
        throw new CircuitOpenError(this.name);
      }
    }

    if (this.state === CircuitState.HALF_OPEN && this.trialInFlight) {
      throw new CircuitOpenError(this.name);
    }
  }

  private onSuccess(isTrial: boolean): void {
    if (this.state !== CircuitState.HALF_OPEN || !isTrial) {
      return;
    }

    this.successCount++;
    if (this.successCount >= this.config.successThreshold) {
      this.state = CircuitState.CLOSED;
      this.failureCount = 0;
      this.successCount = 0;
      logger.info(`Circuit breaker CLOSED for ${this.name} after successful recovery`);
    }
  }

  private onFailure(): void {
    this.lastFailureTime = Date.now();
    this.failureCount++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.state = CircuitState.OPEN;
      logger.warn(`Circuit breaker OPENED for ${this.name} - recovery failed`);
    } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.config.failureThreshold) {
      this.state = CircuitState.OPEN;
      logger.warn(`Circuit breaker OPENED for ${this.name} after ${this.failureCount} failures`);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = 0;
    this.trialInFlight = false;
  }
}
