import { describe, it, expect } from 'vitest';
import { parseConfigValue, parseToolArgs, toPeerCommand } from '../args.js';

describe('parseToolArgs', () => {
  it('should parse a JSON object', () => {
    expect(parseToolArgs('{"query":"hello","limit":5}')).toEqual({ query: 'hello', limit: 5 });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseToolArgs('{query}')).toThrow('Arguments must be valid JSON, got: {query}');
  });

  it.each(['[1,2]', '"text"', '42', 'null'])('should reject the non-object %s', (json) => {
    expect(() => parseToolArgs(json)).toThrow('Arguments must be a JSON object');
  });
});

describe('toPeerCommand', () => {
  it('should split the command from its arguments', () => {
    expect(toPeerCommand(['node', 'server.js', '--stdio'])).toEqual({
      command: 'node',
      args: ['server.js', '--stdio'],
    });
  });

  it('should require a command', () => {
    expect(() => toPeerCommand([])).toThrow('Missing peer command');
  });
});

describe('parseConfigValue', () => {
  it.each([
    ['5000', 5000],
    ['true', true],
    ['["error:","panic"]', ['error:', 'panic']],
    ['SIGTERM', 'SIGTERM'],
  ])('should parse %s', (raw, expected) => {
    expect(parseConfigValue(raw)).toEqual(expected);
  });
});
