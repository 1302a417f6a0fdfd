import { InvalidUrlError } from '../utils/errors';

/**
 * A single upstream server. Health is a plain flag written by the health
 * checker and read by selection; it is never guarded by the pool's list.
 */
export class BackendServer {
  readonly url: URL;
  readonly weight: number;
  private healthy = true;
  private metadata: Map<string, unknown> = new Map();

  constructor(url: URL, weight: number) {
    this.url = url;
    this.weight = weight;
  }

  /** Identity used in cache keys, metrics labels and breaker lookup. */
  get href(): string {
    return this.url.href;
  }

  isHealthy(): boolean {
    return this.healthy;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  getMetadata(key: string): unknown {
    return this.metadata.get(key);
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata.set(key, value);
  }
}

/**
 * Group of interchangeable servers fronting one logical backend.
 * Selection is round robin over the servers that are healthy right now.
 */
export class BackendPool {
  readonly id: string;
  private servers: BackendServer[] = [];
  private rotation = 0;

  constructor(id: string) {
    this.id = id;
  }

  addServer(rawUrl: string, weight: number = 1): BackendServer {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch {
      throw new InvalidUrlError(rawUrl, 'malformed URL');
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new InvalidUrlError(rawUrl, `unsupported protocol ${url.protocol}`);
    }

    const server = new BackendServer(url, weight);
    // Copy-on-write so snapshots handed out earlier stay stable
    this.servers = [...this.servers, server];
    return server;
  }

  /**
   * Returns the next healthy server, or null when none is healthy.
   * Fairness holds only between health changes: a toggle shifts which
   * server the rotation counter lands on.
   */
  getServer(): BackendServer | null {
    const healthy = this.getHealthyServers();
    if (healthy.length === 0) {
      return null;
    }

    this.rotation++;
    return healthy[this.rotation % healthy.length];
  }

  getServerByIndex(index: number): BackendServer | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.servers.length) {
      return null;
    }
    return this.servers[index];
  }

  getServers(): readonly BackendServer[] {
    return this.servers;
  }

  getHealthyServers(): BackendServer[] {
    return this.servers.filter(server => server.isHealthy());
  }

  setServerHealth(server: BackendServer, healthy: boolean): void {
    server.setHealthy(healthy);
  }

  getServerHealth(server: BackendServer): boolean {
    return server.isHealthy();
  }

  get size(): number {
    return this.servers.length;
  }
}
