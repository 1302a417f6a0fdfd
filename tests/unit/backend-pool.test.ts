import { describe, it, expect, beforeEach } from 'vitest';
import { BackendPool } from '../../src/backend/pool';
import { InvalidUrlError } from '../../src/utils/errors';

describe('BackendPool', () => {
  let pool: BackendPool;

  beforeEach(() => {
    pool = new BackendPool('api');
  });

  describe('addServer', () => {
    it('should add a server with a default weight of 1', () => {
      const server = pool.addServer('http://a.internal:3001');

      expect(server.href).toBe('http://a.internal:3001/');
      expect(server.weight).toBe(1);
      expect(server.isHealthy()).toBe(true);
      expect(pool.size).toBe(1);
    });

    it('should reject malformed URLs', () => {
      expect(() => pool.addServer('not a url')).toThrow(InvalidUrlError);
      expect(pool.size).toBe(0);
    });

    it('should reject non-http protocols', () => {
      expect(() => pool.addServer('ftp://files.internal')).toThrow('unsupported protocol ftp:');
    });

    it('should keep earlier server snapshots unchanged', () => {
      pool.addServer('http://a.internal');
      const snapshot = pool.getServers();
      pool.addServer('http://b.internal');

      expect(snapshot).toHaveLength(1);
      expect(pool.getServers()).toHaveLength(2);
    });
  });

  describe('getServer', () => {
    it('should visit every server exactly once in N calls', () => {
      pool.addServer('http://a.internal');
      pool.addServer('http://b.internal');
      pool.addServer('http://c.internal');

      const visited = [pool.getServer(), pool.getServer(), pool.getServer()].map(server => server?.href);

      expect(new Set(visited).size).toBe(3);
    });

    it('should rotate in insertion order starting after the first server', () => {
      pool.addServer('http://a.internal');
      pool.addServer('http://b.internal');
      pool.addServer('http://c.internal');

      const visited = [1, 2, 3, 4].map(() => pool.getServer()?.url.hostname);

      expect(visited).toEqual(['b.internal', 'c.internal', 'a.internal', 'b.internal']);
    });

    it('should skip unhealthy servers', () => {
      pool.addServer('http://a.internal');
      const b = pool.addServer('http://b.internal');
      pool.addServer('http://c.internal');
      pool.setServerHealth(b, false);

      const visited = [1, 2, 3].map(() => pool.getServer()?.url.hostname);

      expect(visited).toEqual(['c.internal', 'a.internal', 'c.internal']);
    });

    it('should return null while no server is healthy', () => {
      const only = pool.addServer('http://a.internal');
      pool.setServerHealth(only, false);

      expect(pool.getServer()).toBeNull();
      expect(pool.getServer()).toBeNull();

      pool.setServerHealth(only, true);
      expect(pool.getServer()).toBe(only);
    });

    it('should return null for an empty pool', () => {
      expect(pool.getServer()).toBeNull();
    });
  });

  describe('health and metadata', () => {
    it('should report health through the pool', () => {
      const server = pool.addServer('http://a.internal');

      pool.setServerHealth(server, false);
      expect(pool.getServerHealth(server)).toBe(false);
      expect(pool.getHealthyServers()).toEqual([]);
    });

    it('should store arbitrary metadata per server', () => {
      const server = pool.addServer('http://a.internal');
      server.setMetadata('zone', 'eu-west');

      expect(server.getMetadata('zone')).toBe('eu-west');
      expect(server.getMetadata('missing')).toBeUndefined();
    });

    it('should look servers up by index', () => {
      const a = pool.addServer('http://a.internal');

      expect(pool.getServerByIndex(0)).toBe(a);
      expect(pool.getServerByIndex(1)).toBeNull();
      expect(pool.getServerByIndex(-1)).toBeNull();
    });
  });
});
