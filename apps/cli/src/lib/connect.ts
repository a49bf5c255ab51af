/**
 * Shared plumbing for commands that talk to a peer.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { z } from 'zod';
import {
  TYPES,
  createContainer,
  type CallOptions,
  type IMcpClient,
  type IMcpClientFactory,
  type StderrListener,
} from '@mcpipe/runtime';
import { toPeerCommand } from './args.js';

const RunOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  verbose: z.boolean().default(false),
  showStderr: z.boolean().default(false),
  timeout: z.coerce.number().int().nonnegative().optional(),
  format: z.enum(['pretty', 'json']).default('pretty'),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Validate the merged global and command options of `command`.
 */
export function runOptions(command: Command): RunOptions {
  const result = RunOptionsSchema.safeParse(command.optsWithGlobals());
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid option --${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}

const echoStderr: StderrListener = (line, elevated) => {
  console.error(elevated ? chalk.red(`[peer] ${line}`) : chalk.gray(`[peer] ${line}`));
};

/**
 * Spawn the peer, run the handshake, hand the ready client to `run`, and
 * always tear the peer down afterwards. Ctrl-C cancels whatever is in flight.
 */
export async function withClient<T>(
  operands: string[],
  options: RunOptions,
  run: (client: IMcpClient, callOptions: CallOptions) => Promise<T>
): Promise<T> {
  const peer = toPeerCommand(operands);
  const container = createContainer({
    configPath: options.config,
    logLevel: options.verbose ? 'debug' : options.logLevel,
  });
  const factory = container.get<IMcpClientFactory>(TYPES.McpClientFactory);

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const client = await factory.connect(peer, {
      signal: controller.signal,
      onStderr: options.showStderr ? echoStderr : undefined,
    });
    try {
      const callOptions: CallOptions = { signal: controller.signal, timeoutMs: options.timeout };
      await client.initialize(callOptions);
      return await run(client, callOptions);
    } finally {
      await client.close();
    }
  } finally {
    process.off('SIGINT', onSigint);
  }
}
