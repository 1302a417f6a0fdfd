import type { IncomingHttpHeaders } from 'http';
import { BackendPool } from '../backend/pool';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { routingBucket, routingIdentifier } from './routing-hash';

export type Variant = 'A' | 'B';

export interface ABTestDefinition {
  name: string;
  variantA: BackendPool;
  variantB: BackendPool;
  splitPercent: number; // share of traffic sent to variant B, 0-100
}

export interface VariantSelection {
  variant: Variant;
  pool: BackendPool;
}

export interface VariantStats {
  requests: number;
  successes: number;
  errors: number;
  successRate: number;
  errorRate: number;
}

export interface ABTestStats {
  name: string;
  splitPercent: number;
  A: VariantStats;
  B: VariantStats;
}

interface VariantCounters {
  requests: number;
  successes: number;
  errors: number;
}

interface ABTest extends ABTestDefinition {
  counters: Record<Variant, VariantCounters>;
}

function toVariantStats(counters: VariantCounters): VariantStats {
  return {
    ...counters,
    successRate: counters.requests > 0 ? counters.successes / counters.requests : 0,
    errorRate: counters.requests > 0 ? counters.errors / counters.requests : 0
  };
}

/**
 * Sticky A/B split: the same routing identifier always lands on the same
 * variant for as long as the test exists.
 */
export class ABTestManager {
  private tests: Map<string, ABTest> = new Map();

  addTest(definition: ABTestDefinition): void {
    const { splitPercent } = definition;
    if (!Number.isFinite(splitPercent) || splitPercent < 0 || splitPercent > 100) {
      throw new ConfigurationError(
        `A/B test "${definition.name}" split must be between 0 and 100, got ${splitPercent}`
      );
    }

    this.tests.set(definition.name, {
      ...definition,
      counters: {
        A: { requests: 0, successes: 0, errors: 0 },
        B: { requests: 0, successes: 0, errors: 0 }
      }
    });
    logger.info('A/B test registered', {
      test: definition.name,
      variantA: definition.variantA.id,
      variantB: definition.variantB.id,
      splitPercent
    });
  }

  removeTest(name: string): boolean {
    return this.tests.delete(name);
  }

  listTests(): string[] {
    return [...this.tests.keys()];
  }

  selectVariant(name: string, req: { headers: IncomingHttpHeaders }): VariantSelection | null {
    const test = this.tests.get(name);
    if (!test) {
      return null;
    }

    const bucket = routingBucket(routingIdentifier(req));
    const variant: Variant = bucket < Math.floor(test.splitPercent) ? 'B' : 'A';
    test.counters[variant].requests++;
    return { variant, pool: variant === 'B' ? test.variantB : test.variantA };
  }

  recordSuccess(name: string, variant: Variant): void {
    const test = this.tests.get(name);
    if (test) {
      test.counters[variant].successes++;
    }
  }

  recordError(name: string, variant: Variant): void {
    const test = this.tests.get(name);
    if (test) {
      test.counters[variant].errors++;
    }
  }

  getStats(name: string): ABTestStats | null {
    const test = this.tests.get(name);
    if (!test) {
      return null;
    }
    return {
      name: test.name,
      splitPercent: test.splitPercent,
      A: toVariantStats(test.counters.A),
      B: toVariantStats(test.counters.B)
    };
  }
}
