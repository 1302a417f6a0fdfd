import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigValidationError, defaultConfigPath, loadConfig, parseConfig } from '../../src/utils/config-loader';

describe('parseConfig', () => {
  it('should fill in defaults', () => {
    const config = parseConfig({
      backends: [{ id: 'api', servers: ['http://localhost:3001'] }],
      routes: [{ name: 'api', pathPrefix: '/api', backendId: 'api' }]
    });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 8080, forwardTimeout: 30000 });
    expect(config.backends[0].healthCheck).toEqual({ enabled: true, interval: 30000, timeout: 5000, path: '/health' });
    expect(config.routes[0].priority).toBe(0);
    expect(config.policies.rateLimit).toEqual({ enabled: true, maxRequests: 1000, windowMs: 60000 });
    expect(config.policies.cache).toEqual({ enabled: false, ttl: 60000, methods: ['GET'] });
    expect(config.policies.auth).toEqual({ enabled: false, type: 'token' });
    expect(config.policies.cors).toEqual({ enabled: false, allowedOrigins: ['*'] });
  });

  it('should accept an empty object', () => {
    const config = parseConfig({});

    expect(config.backends).toEqual([]);
    expect(config.routes).toEqual([]);
  });

  it('should list every schema violation', () => {
    let caught: unknown;
    try {
      parseConfig({
        backends: [{ id: '', servers: [] }],
        policies: { rateLimit: { maxRequests: 0 } }
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    const issues = caught instanceof ConfigValidationError ? caught.issues : [];
    expect(issues).toEqual([
      'backends.0.id: Backend ID is required',
      'policies.rateLimit.maxRequests: Max requests must be at least 1'
    ]);
  });

  it('should require a secret for api-key and jwt auth', () => {
    expect(() => parseConfig({ policies: { auth: { enabled: true, type: 'jwt' } } })).toThrow(
      'Invalid configuration: policies.auth: secret is required for api-key and jwt authentication'
    );
    expect(parseConfig({ policies: { auth: { enabled: true, type: 'token' } } }).policies.auth.enabled).toBe(true);
  });

  it('should reject unknown auth types', () => {
    expect(() => parseConfig({ policies: { auth: { type: 'basic' } } })).toThrow(
      'policies.auth.type: Auth type must be one of: token, api-key, jwt'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'proxy-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    delete process.env.PROXY_CONFIG_PATH;
  });

  it('should load and validate a JSON file', () => {
    const file = path.join(dir, 'proxy.json');
    fs.writeFileSync(file, JSON.stringify({ server: { port: 9090 } }));

    expect(loadConfig(file).server.port).toBe(9090);
  });

  it('should report a missing file', () => {
    const file = path.join(dir, 'missing.json');

    expect(() => loadConfig(file)).toThrow(`Configuration file not found: ${file}`);
  });

  it('should report invalid JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "server": ');

    expect(() => loadConfig(file)).toThrow(ConfigValidationError);
  });

  it('should honor PROXY_CONFIG_PATH', () => {
    process.env.PROXY_CONFIG_PATH = path.join(dir, 'custom.json');

    expect(defaultConfigPath()).toBe(path.join(dir, 'custom.json'));
  });

  it('should load the bundled configuration', () => {
    const config = loadConfig(path.join(process.cwd(), 'config', 'proxy.json'));

    expect(config.backends.map(backend => backend.id)).toEqual(['api', 'web']);
    expect(config.routes.map(route => route.name)).toEqual(['api', 'default']);
  });
});
