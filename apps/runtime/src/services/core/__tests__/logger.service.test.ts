import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { Logger, isLogLevel } from '../logger.service';

const EntrySchema = z.record(z.unknown());

describe('Logger', () => {
  let lines: string[];
  const sink = (line: string): void => {
    lines.push(line);
  };

  function entries(): Array<Record<string, unknown>> {
    return lines.map((line) => EntrySchema.parse(JSON.parse(line)));
  }

  beforeEach(() => {
    lines = [];
    vi.stubEnv('LOG_LEVEL', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should write one JSON object per entry with context and metadata', () => {
    const logger = new Logger({ level: 'debug', context: { component: 'session' }, sink });

    logger.info('Peer initialized', { serverName: 'stub' });

    expect(lines).toHaveLength(1);
    const [entry] = entries();
    expect(entry).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      message: 'Peer initialized',
      component: 'session',
      serverName: 'stub',
    });
  });

  it('should drop entries below the configured level', () => {
    const logger = new Logger({ level: 'warn', sink });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(entries().map((e) => e.level)).toEqual(['warn', 'error']);
  });

  it('should default to info', () => {
    const logger = new Logger({ sink });

    logger.debug('hidden');
    logger.info('shown');

    expect(entries().map((e) => e.message)).toEqual(['shown']);
  });

  it('should let LOG_LEVEL override the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'error');
    const logger = new Logger({ level: 'debug', sink });

    logger.warn('hidden');
    logger.error('shown');

    expect(entries().map((e) => e.message)).toEqual(['shown']);
  });

  it('should redact credential-like keys at any depth', () => {
    const logger = new Logger({ sink });

    logger.info('Spawning peer process', {
      token: 'test-token',
      env: { API_KEY: 'test-key', HOME: '/home/test' },
      headers: [{ Authorization: 'Bearer test' }, 'plain'],
    });

    expect(entries()[0]).toMatchObject({
      token: '[REDACTED]',
      env: { API_KEY: '[REDACTED]', HOME: '/home/test' },
      headers: [{ Authorization: '[REDACTED]' }, 'plain'],
    });
  });

  it('should merge context into child loggers and keep the level', () => {
    const parent = new Logger({ level: 'warn', context: { command: 'node' }, sink });
    const child = parent.child({ sessionId: 's-1' });

    child.info('hidden');
    child.warn('Request timed out', { method: 'tools/call' });

    expect(entries()).toEqual([
      {
        timestamp: expect.any(String),
        level: 'warn',
        message: 'Request timed out',
        command: 'node',
        sessionId: 's-1',
        method: 'tools/call',
      },
    ]);
  });
});

describe('isLogLevel', () => {
  it.each([
    ['debug', true],
    ['error', true],
    ['verbose', false],
    ['toString', false],
    [3, false],
  ])('should classify %j as %s', (value, expected) => {
    expect(isLogLevel(value)).toBe(expected);
  });
});
