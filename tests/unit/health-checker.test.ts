import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import express from 'express';
import { BackendPool } from '../../src/backend/pool';
import { HealthChecker } from '../../src/health/health-checker';
import { RunningServer, listen, unusedUrl } from '../utils/test-server';

describe('HealthChecker', () => {
  let healthy: RunningServer;
  let failing: RunningServer;
  let slow: RunningServer;
  let nested: RunningServer;

  beforeAll(async () => {
    healthy = await listen(express().get('/health', (req, res) => res.send('ok')));
    failing = await listen(express().get('/health', (req, res) => res.status(500).send('down')));
    slow = await listen(
      express().get('/health', (req, res) => {
        setTimeout(() => res.send('late'), 500);
      })
    );
    nested = await listen(express().get('/base/status', (req, res) => res.send('ok')));
  });

  afterAll(async () => {
    await Promise.all([healthy.close(), failing.close(), slow.close(), nested.close()]);
  });

  it('should mark servers by the status of their probe', async () => {
    const pool = new BackendPool('api');
    const up = pool.addServer(healthy.url);
    const down = pool.addServer(failing.url);
    const onTransition = vi.fn();

    await new HealthChecker(pool, { interval: 60000, timeout: 1000 }, onTransition).checkHealth();

    expect(up.isHealthy()).toBe(true);
    expect(down.isHealthy()).toBe(false);
    expect(down.getMetadata('lastHealthStatus')).toBe('HTTP 500');
    expect(down.getMetadata('lastHealthCheck')).toBeInstanceOf(Date);
    expect(onTransition).toHaveBeenCalledTimes(1);
    expect(onTransition).toHaveBeenCalledWith(down, false);
  });

  it('should mark unreachable servers unhealthy', async () => {
    const pool = new BackendPool('api');
    const server = pool.addServer(await unusedUrl());

    await new HealthChecker(pool, { interval: 60000, timeout: 1000 }).checkHealth();

    expect(server.isHealthy()).toBe(false);
  });

  it('should treat a probe slower than the timeout as unhealthy', async () => {
    const pool = new BackendPool('api');
    const server = pool.addServer(slow.url);

    await new HealthChecker(pool, { interval: 60000, timeout: 50 }).checkHealth();

    expect(server.isHealthy()).toBe(false);
  });

  it('should probe the health path under the server base path', async () => {
    const pool = new BackendPool('api');
    const server = pool.addServer(`${nested.url}/base`);
    server.setHealthy(false);
    const onTransition = vi.fn();

    await new HealthChecker(pool, { interval: 60000, timeout: 1000, path: '/status' }, onTransition).checkHealth();

    expect(server.isHealthy()).toBe(true);
    expect(onTransition).toHaveBeenCalledWith(server, true);
  });

  it('should start once and stop', () => {
    const checker = new HealthChecker(new BackendPool('api'), { interval: 60000, timeout: 1000 });

    checker.start();
    checker.start();
    expect(checker.isRunning()).toBe(true);

    checker.stop();
    expect(checker.isRunning()).toBe(false);
  });

  it('should probe on every interval tick', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const pool = new BackendPool('api');
    pool.addServer(healthy.url);
    const checker = new HealthChecker(pool, { interval: 1000, timeout: 1000 });
    const probe = vi.spyOn(checker, 'checkHealth').mockResolvedValue(undefined);

    checker.start();
    vi.advanceTimersByTime(3000);
    checker.stop();

    expect(probe).toHaveBeenCalledTimes(3);
  });
});
