/**
 * Parsing for the operands and JSON options the commands accept.
 */

import { z } from 'zod';
import type { PeerCommand } from '@mcpipe/runtime';

const ToolArgsSchema = z.record(z.unknown());

/**
 * Parse the `--args` JSON of `call` into a tool arguments object.
 */
export function parseToolArgs(json: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new Error(`Arguments must be valid JSON, got: ${json}`);
  }

  const result = ToolArgsSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error('Arguments must be a JSON object, e.g. --args \'{"query": "hello"}\'');
  }
  return result.data;
}

/**
 * Turn the operands after `--` into the peer to spawn.
 */
export function toPeerCommand(operands: string[]): PeerCommand {
  const [command, ...args] = operands;
  if (!command) {
    throw new Error('Missing peer command: pass it after --, e.g. mcpipe inspect -- node server.js');
  }
  return { command, args };
}

/**
 * Config values are stored as JSON when they parse as JSON, otherwise as strings.
 */
export function parseConfigValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
