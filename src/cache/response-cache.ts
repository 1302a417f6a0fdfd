export type HeaderMultimap = Record<string, string[]>;

export interface CacheEntry {
  status: number;
  headers: HeaderMultimap;
  body: Buffer;
  expiresAt: number; // epoch milliseconds
}

/**
 * Responses keyed by method, path and the backend server that produced
 * them. Expired entries stay in the map until overwritten or flushed.
 */
export class ResponseCache {
  private entries: Map<string, CacheEntry> = new Map();

  static key(method: string, path: string, serverUrl: string): string {
    return `${method}:${path}:${serverUrl}`;
  }

  get(method: string, path: string, serverUrl: string): CacheEntry | null {
    const entry = this.entries.get(ResponseCache.key(method, path, serverUrl));
    if (!entry || entry.expiresAt <= Date.now()) {
      return null;
    }
    return entry;
  }

  set(
    method: string,
    path: string,
    serverUrl: string,
    status: number,
    headers: HeaderMultimap,
    body: Buffer,
    ttlMs: number
  ): CacheEntry {
    const entry: CacheEntry = {
      status,
      headers,
      body,
      expiresAt: Date.now() + ttlMs
    };
    this.entries.set(ResponseCache.key(method, path, serverUrl), entry);
    return entry;
  }

  clear(): void {
    this.entries = new Map();
  }

  get size(): number {
    return this.entries.size;
  }
}
