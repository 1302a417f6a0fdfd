import { describe, it, expect, beforeEach, vi } from 'vitest';
import { randomUUID } from 'crypto';
import { BackendPool } from '../../src/backend/pool';
import { ABTestManager } from '../../src/traffic/ab-test-manager';
import { BlueGreenManager } from '../../src/traffic/blue-green-manager';
import { hashString, routingBucket, routingIdentifier } from '../../src/traffic/routing-hash';
import { ConfigurationError } from '../../src/utils/errors';

const user = (id: string) => ({ headers: { 'x-user-id': id } });

describe('routing hash', () => {
  it('should compute the base-31 hash', () => {
    expect(hashString('')).toBe(0n);
    expect(hashString('a')).toBe(97n);
    expect(hashString('ab')).toBe(3105n);
    expect(routingBucket('ab')).toBe(5);
    expect(routingBucket('a')).toBe(97);
  });

  it('should keep 64-bit precision for long identifiers', () => {
    expect(hashString('user-1234')).toBe(103045146666244n);
    expect(hashString('session-42')).toBe(3129967668698389n);
    expect(hashString('alice@example.com')).toBe(8882212650556450109n);
  });

  it('should bucket long identifiers from the 64-bit hash', () => {
    expect(routingBucket('user-1234')).toBe(44);
    expect(routingBucket('alice@example.com')).toBe(9);
    expect(routingBucket('session-42')).toBe(89);
    expect(routingBucket('u-998877')).toBe(8);
  });

  it('should prefer the user id header over the cookie', () => {
    expect(routingIdentifier({ headers: { 'x-user-id': 'u-1', cookie: 'user_id=u-2' } })).toBe('u-1');
    expect(routingIdentifier({ headers: { cookie: 'theme=dark; user_id="u-42"' } })).toBe('u-42');
    expect(routingIdentifier({ headers: { cookie: 'theme=dark' } })).toBe('');
    expect(routingIdentifier({ headers: {} })).toBe('');
  });
});

describe('ABTestManager', () => {
  let manager: ABTestManager;
  const control = new BackendPool('control');
  const candidate = new BackendPool('candidate');

  beforeEach(() => {
    manager = new ABTestManager();
    manager.addTest({ name: 'checkout', variantA: control, variantB: candidate, splitPercent: 30 });
  });

  it('should assign the same variant to the same identifier', () => {
    const first = manager.selectVariant('checkout', user('user-1234'));
    for (let i = 0; i < 20; i++) {
      expect(manager.selectVariant('checkout', user('user-1234'))?.variant).toBe(first?.variant);
    }
  });

  it('should pick B when the bucket is below the split', () => {
    expect(manager.selectVariant('checkout', user('ab'))).toEqual({ variant: 'B', pool: candidate });
    expect(manager.selectVariant('checkout', user('a'))).toEqual({ variant: 'A', pool: control });
  });

  it('should converge to the split across many identifiers', () => {
    const samples = 10000;
    let assignedToB = 0;
    for (let i = 0; i < samples; i++) {
      if (manager.selectVariant('checkout', user(randomUUID()))?.variant === 'B') {
        assignedToB++;
      }
    }

    expect(assignedToB / samples).toBeGreaterThan(0.27);
    expect(assignedToB / samples).toBeLessThan(0.33);
  });

  it('should send everything to A at 0 and to B at 100', () => {
    manager.addTest({ name: 'off', variantA: control, variantB: candidate, splitPercent: 0 });
    manager.addTest({ name: 'full', variantA: control, variantB: candidate, splitPercent: 100 });

    expect(manager.selectVariant('off', user('ab'))?.variant).toBe('A');
    expect(manager.selectVariant('full', user('a'))?.variant).toBe('B');
  });

  it('should return null for an unknown test', () => {
    expect(manager.selectVariant('missing', user('a'))).toBeNull();
    expect(manager.getStats('missing')).toBeNull();
  });

  it('should compute rates from the counters', () => {
    manager.selectVariant('checkout', user('ab'));
    manager.selectVariant('checkout', user('ab'));
    manager.selectVariant('checkout', user('ab'));
    manager.selectVariant('checkout', user('ab'));
    manager.recordSuccess('checkout', 'B');
    manager.recordSuccess('checkout', 'B');
    manager.recordSuccess('checkout', 'B');
    manager.recordError('checkout', 'B');
    manager.recordError('missing', 'A');

    expect(manager.getStats('checkout')).toEqual({
      name: 'checkout',
      splitPercent: 30,
      A: { requests: 0, successes: 0, errors: 0, successRate: 0, errorRate: 0 },
      B: { requests: 4, successes: 3, errors: 1, successRate: 0.75, errorRate: 0.25 }
    });
  });

  it('should reject splits outside 0-100', () => {
    expect(() =>
      manager.addTest({ name: 'bad', variantA: control, variantB: candidate, splitPercent: 101 })
    ).toThrow(ConfigurationError);
    expect(() =>
      manager.addTest({ name: 'bad', variantA: control, variantB: candidate, splitPercent: -1 })
    ).toThrow(ConfigurationError);
  });

  it('should list and remove tests', () => {
    expect(manager.listTests()).toEqual(['checkout']);
    expect(manager.removeTest('checkout')).toBe(true);
    expect(manager.listTests()).toEqual([]);
  });
});

describe('BlueGreenManager', () => {
  let blue: BackendPool;
  let green: BackendPool;
  let manager: BlueGreenManager;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    blue = new BackendPool('blue');
    green = new BackendPool('green');
    manager = new BlueGreenManager(blue, green, 100);
  });

  it('should send everything to blue before any shift', () => {
    expect(manager.getActiveVersion()).toBe('blue');
    expect(manager.selectBackend(user('ab'))).toBe(blue);
    expect(manager.selectBackend(user('a'))).toBe(blue);
  });

  it('should shift traffic progressively on its own timer', () => {
    manager.startGradualShift('green', 1000);

    vi.advanceTimersByTime(500);
    expect(manager.getTrafficShift()).toBe(50);
    // bucket 5 is under the dial, bucket 97 is not
    expect(manager.selectBackend(user('ab'))).toBe(green);
    expect(manager.selectBackend(user('a'))).toBe(blue);
    expect(manager.getStatus()).toEqual({
      activeVersion: 'blue',
      shiftTarget: 'green',
      trafficShift: 50,
      shifting: true,
      shiftDurationMs: 1000,
      elapsedMs: 500
    });

    vi.advanceTimersByTime(500);
    expect(manager.getTrafficShift()).toBe(100);
    expect(manager.getActiveVersion()).toBe('green');
    expect(manager.getStatus().shifting).toBe(false);
    expect(manager.selectBackend(user('a'))).toBe(green);
  });

  it('should complete immediately with a zero duration', () => {
    manager.startGradualShift('green', 0);

    expect(manager.getActiveVersion()).toBe('green');
    expect(manager.getTrafficShift()).toBe(100);
  });

  it('should restart the dial for a shift back', () => {
    manager.startGradualShift('green', 0);
    manager.startGradualShift('blue', 1000);

    expect(manager.getTrafficShift()).toBe(0);
    expect(manager.selectBackend(user('ab'))).toBe(green);

    vi.advanceTimersByTime(100);
    expect(manager.selectBackend(user('ab'))).toBe(blue);
  });

  it('should freeze the dial when stopped', () => {
    manager.startGradualShift('green', 1000);
    vi.advanceTimersByTime(300);
    manager.stop();
    vi.advanceTimersByTime(2000);

    expect(manager.getTrafficShift()).toBe(30);
    expect(manager.getActiveVersion()).toBe('blue');
  });
});
