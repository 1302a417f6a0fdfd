import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { proxyConfigSchema } from '../config/schema';
import { ProxyConfig } from '../types';

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export function defaultConfigPath(): string {
  return process.env.PROXY_CONFIG_PATH || path.join(process.cwd(), 'config', 'proxy.json');
}

/**
 * Validates a parsed configuration object and fills in defaults.
 */
export function parseConfig(raw: unknown): ProxyConfig {
  try {
    return proxyConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.errors.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigValidationError('Invalid configuration', issues);
    }
    throw error;
  }
}

export function loadConfig(configPath: string = defaultConfigPath()): ProxyConfig {
  let configData: string;
  try {
    configData = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigValidationError(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(configData);
  } catch (error) {
    throw new ConfigValidationError(
      `Configuration file is not valid JSON: ${configPath}`,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  return parseConfig(raw);
}
