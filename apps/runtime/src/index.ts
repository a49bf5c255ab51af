import { createContainer, type ContainerOptions } from './core/container';
import { TYPES } from './core/types';
import type { ConnectOptions, IMcpClient, IMcpClientFactory, SpawnOptions } from './core/interfaces';

export * from './core';
export * from './services/mcp';
export { Logger } from './services/core/logger.service';
export { ConfigService, CONFIG_DEFAULTS, defaultConfigPath } from './services/core/config.service';
export type { LoggerOptions } from './services/core/logger.service';

export interface CreateClientOptions extends ConnectOptions, ContainerOptions {
  cwd?: SpawnOptions['cwd'];
  env?: SpawnOptions['env'];
}

/**
 * Spawn a peer and return a client for it, wired from a fresh container.
 * The client still needs initialize() before any other operation.
 */
export function createClient(
  command: string,
  args: string[] = [],
  options: CreateClientOptions = {}
): Promise<IMcpClient> {
  const container = createContainer({ configPath: options.configPath, logLevel: options.logLevel });
  const factory = container.get<IMcpClientFactory>(TYPES.McpClientFactory);
  return factory.connect(
    { command, args, cwd: options.cwd, env: options.env },
    { signal: options.signal, onStderr: options.onStderr }
  );
}
