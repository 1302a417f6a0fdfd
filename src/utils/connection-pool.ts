import axios, { AxiosInstance } from 'axios';
import { Agent } from 'http';
import { Agent as HttpsAgent } from 'https';

export interface ConnectionPoolOptions {
  timeout: number; // per-request timeout, milliseconds
  maxSockets?: number;
  maxFreeSockets?: number;
}

/**
 * Keep-alive agents shared by every forwarded request, with one axios
 * client per backend origin. Clients never follow redirects and never
 * reject on status: the backend's answer is relayed as is.
 */
export class ConnectionPool {
  private httpAgent: Agent;
  private httpsAgent: HttpsAgent;
  private clients: Map<string, AxiosInstance> = new Map();
  private readonly timeout: number;

  constructor(options: ConnectionPoolOptions) {
    const { timeout, maxSockets = 50, maxFreeSockets = 10 } = options;
    this.timeout = timeout;

    this.httpAgent = new Agent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets
    });

    this.httpsAgent = new HttpsAgent({
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets,
      maxFreeSockets
    });
  }

  /**
   * Get or create an Axios instance for a backend origin
   */
  getClient(origin: string): AxiosInstance {
    const existing = this.clients.get(origin);
    if (existing) {
      return existing;
    }

    const isHttps = origin.startsWith('https://');
    const client = axios.create({
      baseURL: origin,
      timeout: this.timeout,
      httpAgent: isHttps ? undefined : this.httpAgent,
      httpsAgent: isHttps ? this.httpsAgent : undefined,
      validateStatus: () => true,
      maxRedirects: 0,
      decompress: false
    });

    this.clients.set(origin, client);
    return client;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * Closes idle sockets and forgets every client
   */
  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.clients.clear();
  }
}
