import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { z } from 'zod';
import { ConfigFileSchema } from '@runtime/core/schemas';
import type { IConfig, ILogger } from '@runtime/core/interfaces';

export const CONFIG_DEFAULTS: Readonly<Record<string, unknown>> = {
  // Identity announced during the initialize handshake
  'client.name': 'mcpipe',
  'client.version': '0.1.0',
  'protocol.version': '2024-11-05',

  // Session
  'request.timeoutMs': 0,
  'session.shutdownGraceMs': 0,

  // Process supervision
  'process.killSignal': 'SIGKILL',
  'stderr.errorPatterns': ['error:', 'fatal:'],

  // Diagnostics
  'codec.trace': false,
  'log.level': 'info',
};

/**
 * Read a key and check it against a schema. A value of the wrong shape is
 * logged and replaced by the fallback.
 */
export function readSetting<T>(
  config: IConfig,
  logger: ILogger,
  key: string,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const value = config.get<unknown>(key);
  if (value === undefined) {
    return fallback;
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  logger.warn('Ignoring invalid configuration value', { key, value });
  return fallback;
}

export function defaultConfigPath(): string {
  return process.env.MCPIPE_CONFIG || path.join(os.homedir(), '.mcpipe', 'config.json');
}

/**
 * Configuration service.
 * Dot-notation keys over a JSON file, with defaults for every key the runtime reads.
 */
export class ConfigService implements IConfig {
  private config: Record<string, unknown> = {};

  constructor(readonly configPath: string = defaultConfigPath()) {
    this.loadConfig();
    this.applyDefaults();
  }

  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  get<T>(key: string, defaultValue?: T): T | undefined {
    const value = this.getNestedValue(this.config, key);

    if (value === undefined) {
      return defaultValue;
    }

    return value as T;
  }

  set<T>(key: string, value: T): void {
    this.setNestedValue(this.config, key, value);
    this.saveConfig();
  }

  has(key: string): boolean {
    return this.getNestedValue(this.config, key) !== undefined;
  }

  private loadConfig(): void {
    if (!fs.existsSync(this.configPath)) {
      return;
    }

    const content = fs.readFileSync(this.configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(
        `Config file ${this.configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Config file ${this.configPath} must contain a JSON object`);
    }
    this.config = result.data;
  }

  private saveConfig(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), { mode: 0o600 });
  }

  private applyDefaults(): void {
    for (const [key, value] of Object.entries(CONFIG_DEFAULTS)) {
      if (!this.has(key)) {
        this.setNestedValue(this.config, key, value);
      }
    }
  }

  private getNestedValue(obj: Record<string, unknown>, key: string): unknown {
    let current: unknown = obj;

    for (const k of key.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[k];
    }

    return current;
  }

  private setNestedValue(obj: Record<string, unknown>, key: string, value: unknown): void {
    const keys = key.split('.');
    const lastKey = keys.pop();
    if (lastKey === undefined) {
      return;
    }

    let current = obj;
    for (const k of keys) {
      const next = current[k];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[k] = created;
        current = created;
      }
    }

    current[lastKey] = value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
