import axios, { AxiosInstance } from 'axios';
import { BackendPool, BackendServer } from '../backend/pool';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { joinUrl } from '../utils/url';
import { serverHealthStatus } from '../utils/prometheus';

export interface HealthCheckOptions {
  interval: number; // milliseconds
  timeout: number; // milliseconds
  path?: string;
}

export type HealthTransitionListener = (server: BackendServer, healthy: boolean) => void;

/**
 * Periodically probes every server of one pool. Each tick fires one GET per
 * server without waiting for the previous round; whichever probe finishes
 * last decides the flag.
 */
export class HealthChecker {
  private timer: NodeJS.Timeout | null = null;
  private httpClient: AxiosInstance;
  private config: Required<HealthCheckOptions>;

  constructor(
    private readonly pool: BackendPool,
    options: HealthCheckOptions,
    private readonly onTransition?: HealthTransitionListener
  ) {
    this.config = {
      interval: options.interval,
      timeout: options.timeout,
      path: options.path || '/health'
    };
    this.httpClient = axios.create({
      timeout: this.config.timeout,
      maxRedirects: 0,
      validateStatus: () => true // status is judged below
    });
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.checkHealth();
    }, this.config.interval);

    logger.info('Health checks started', {
      pool: this.pool.id,
      interval: this.config.interval,
      timeout: this.config.timeout,
      path: this.config.path
    });
  }

  /** Stops future ticks; probes already in flight still complete. */
  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Health checks stopped', { pool: this.pool.id });
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Runs one probe round and resolves when every probe has settled. */
  async checkHealth(): Promise<void> {
    const servers = this.pool.getServers();
    await Promise.all(servers.map(server => this.checkServer(server)));
  }

  private async checkServer(server: BackendServer): Promise<void> {
    const healthUrl = joinUrl(server.url, this.config.path);
    const startTime = Date.now();
    let healthy = false;
    let detail: string;

    try {
      const response = await this.httpClient.get(healthUrl, {
        responseType: 'text',
        signal: AbortSignal.timeout(this.config.timeout)
      });
      healthy = response.status === 200;
      detail = `HTTP ${response.status}`;
    } catch (error) {
      detail = errorMessage(error);
    }

    this.record(server, healthy, detail, Date.now() - startTime);
  }

  private record(server: BackendServer, healthy: boolean, detail: string, responseTime: number): void {
    const wasHealthy = this.pool.getServerHealth(server);
    this.pool.setServerHealth(server, healthy);
    server.setMetadata('lastHealthCheck', new Date());
    server.setMetadata('lastHealthStatus', detail);
    serverHealthStatus.set({ pool: this.pool.id, server: server.href }, healthy ? 1 : 0);

    if (wasHealthy === healthy) {
      logger.debug('Health check completed', {
        pool: this.pool.id,
        server: server.href,
        healthy,
        detail,
        responseTime
      });
      return;
    }

    if (healthy) {
      logger.info('Server recovered - marked as healthy', {
        pool: this.pool.id,
        server: server.href,
        detail,
        responseTime,
        event: 'server_recovered'
      });
    } else {
      logger.warn('Server marked as unhealthy - removed from rotation', {
        pool: this.pool.id,
        server: server.href,
        detail,
        responseTime,
        event: 'server_unhealthy'
      });
    }

    this.onTransition?.(server, healthy);
  }
}
