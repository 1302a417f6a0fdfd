import { ServerMetrics } from '../types';
import { logger } from '../utils/logger';

/**
 * Per-server forwarding metrics, keyed by server URL. Each forward is
 * bracketed by recordRequestStart/recordRequestEnd under a request token
 * so that in-flight counts and response times stay paired.
 */
export class MetricsCollector {
  private metrics: Map<string, ServerMetrics> = new Map();
  private requestStartTimes: Map<string, number> = new Map();

  recordRequestStart(serverUrl: string, requestToken: string): void {
    this.requestStartTimes.set(requestToken, Date.now());
    this.getOrCreate(serverUrl).currentConnections++;
  }

  recordRequestEnd(serverUrl: string, requestToken: string, success: boolean): void {
    const startTime = this.requestStartTimes.get(requestToken);
    this.requestStartTimes.delete(requestToken);

    const metric = this.getOrCreate(serverUrl);
    metric.currentConnections = Math.max(0, metric.currentConnections - 1);
    metric.totalRequests++;
    if (success) {
      metric.successfulRequests++;
    } else {
      metric.failedRequests++;
    }

    if (startTime !== undefined) {
      const responseTime = Date.now() - startTime;
      // Running mean over every completed request
      metric.averageResponseTime =
        (metric.averageResponseTime * (metric.totalRequests - 1) + responseTime) / metric.totalRequests;
      metric.lastResponseTime = responseTime;
    }
  }

  /**
   * Drops start times older than maxAgeMs, left behind by requests whose
   * end was never recorded.
   */
  cleanupStaleRequests(maxAgeMs: number = 300000): number {
    const cutoff = Date.now() - maxAgeMs;
    let cleaned = 0;

    for (const [requestToken, startTime] of this.requestStartTimes.entries()) {
      if (startTime < cutoff) {
        this.requestStartTimes.delete(requestToken);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cleaned up ${cleaned} stale request start times`);
    }
    return cleaned;
  }

  getMetrics(serverUrl: string): ServerMetrics {
    return { ...(this.metrics.get(serverUrl) ?? this.createDefaultMetric(serverUrl)) };
  }

  getAllMetrics(): ServerMetrics[] {
    return Array.from(this.metrics.values(), metric => ({ ...metric }));
  }

  resetMetrics(serverUrl?: string): void {
    if (serverUrl) {
      this.metrics.delete(serverUrl);
    } else {
      this.metrics.clear();
      this.requestStartTimes.clear();
    }
  }

  getOverallStats(): {
    totalRequests: number;
    totalSuccessful: number;
    totalFailed: number;
    averageResponseTime: number;
    inFlight: number;
  } {
    const allMetrics = Array.from(this.metrics.values());
    const totalRequests = allMetrics.reduce((sum, m) => sum + m.totalRequests, 0);
    const totalSuccessful = allMetrics.reduce((sum, m) => sum + m.successfulRequests, 0);
    const totalFailed = allMetrics.reduce((sum, m) => sum + m.failedRequests, 0);
    const totalResponseTime = allMetrics.reduce((sum, m) => sum + m.averageResponseTime * m.totalRequests, 0);
    const inFlight = allMetrics.reduce((sum, m) => sum + m.currentConnections, 0);

    return {
      totalRequests,
      totalSuccessful,
      totalFailed,
      averageResponseTime: totalRequests > 0 ? totalResponseTime / totalRequests : 0,
      inFlight
    };
  }

  private getOrCreate(serverUrl: string): ServerMetrics {
    let metric = this.metrics.get(serverUrl);
    if (!metric) {
      metric = this.createDefaultMetric(serverUrl);
      this.metrics.set(serverUrl, metric);
    }
    return metric;
  }

  private createDefaultMetric(serverUrl: string): ServerMetrics {
    return {
      serverUrl,
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      averageResponseTime: 0,
      currentConnections: 0
    };
  }
}
