import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigService, CONFIG_DEFAULTS, defaultConfigPath, readSetting } from '../config.service';
import { createMockConfig, createMockLogger } from '@tests/utils';

describe('ConfigService', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mcpipe-config-'));
    configPath = path.join(dir, 'nested', 'config.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
  });

  it('should provide a default for every runtime key when no file exists', () => {
    const config = new ConfigService(configPath);

    for (const [key, value] of Object.entries(CONFIG_DEFAULTS)) {
      expect(config.get(key)).toEqual(value);
    }
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('should not time requests out unless configured to', () => {
    expect(new ConfigService(configPath).get<number>('request.timeoutMs')).toBe(0);
  });

  it('should read nested values from the file and keep defaults for the rest', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify({ request: { timeoutMs: 500 }, log: { level: 'debug' } }));

    const config = new ConfigService(configPath);

    expect(config.get<number>('request.timeoutMs')).toBe(500);
    expect(config.get<string>('log.level')).toBe('debug');
    expect(config.get<boolean>('codec.trace')).toBe(false);
  });

  it('should fall back to the given default for unknown keys', () => {
    const config = new ConfigService(configPath);

    expect(config.get('missing.key', 7)).toBe(7);
    expect(config.get('missing.key')).toBeUndefined();
    expect(config.has('missing')).toBe(false);
    expect(config.has('client.name')).toBe(true);
  });

  it('should persist set values with owner-only permissions', () => {
    const config = new ConfigService(configPath);

    config.set('client.name', 'custom-client');

    expect(new ConfigService(configPath).get('client.name')).toBe('custom-client');
    if (process.platform !== 'win32') {
      expect(fs.statSync(configPath).mode & 0o777).toBe(0o600);
    }
  });

  it('should replace a scalar on the way to a nested key', () => {
    const config = new ConfigService(configPath);

    config.set('codec', 'flat');
    config.set('codec.trace', true);

    expect(config.get('codec.trace')).toBe(true);
  });

  it('should reject a file that is not valid JSON', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '{ "request": ');

    expect(() => new ConfigService(configPath)).toThrow(`Config file ${configPath} is not valid JSON`);
  });

  it('should reject a file that is not a JSON object', () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, '[1, 2, 3]');

    expect(() => new ConfigService(configPath)).toThrow(
      `Config file ${configPath} must contain a JSON object`
    );
  });
});

describe('defaultConfigPath', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should honour MCPIPE_CONFIG', () => {
    vi.stubEnv('MCPIPE_CONFIG', '/etc/mcpipe/config.json');

    expect(defaultConfigPath()).toBe('/etc/mcpipe/config.json');
  });

  it('should live under the home directory otherwise', () => {
    vi.stubEnv('MCPIPE_CONFIG', '');

    expect(defaultConfigPath()).toBe(path.join(os.homedir(), '.mcpipe', 'config.json'));
  });
});

describe('readSetting', () => {
  const Duration = z.number().int().nonnegative();

  it('should return a value that matches the schema', () => {
    const logger = createMockLogger();

    expect(readSetting(createMockConfig({ 'request.timeoutMs': 250 }), logger, 'request.timeoutMs', Duration, 0)).toBe(
      250
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should use the fallback for a missing key without warning', () => {
    const logger = createMockLogger();

    expect(readSetting(createMockConfig(), logger, 'session.idleMs', Duration, 9)).toBe(9);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should warn and use the fallback for a value of the wrong shape', () => {
    const logger = createMockLogger();
    const config = createMockConfig({ 'session.shutdownGraceMs': -1 });

    expect(readSetting(config, logger, 'session.shutdownGraceMs', Duration, 0)).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring invalid configuration value', {
      key: 'session.shutdownGraceMs',
      value: -1,
    });
  });
});
