import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import type { IConfig, ILogger, IMcpClientFactory, IProcessTransport, LogLevel } from './interfaces';

import { ConfigService } from '@runtime/services/core/config.service';
import { Logger, isLogLevel } from '@runtime/services/core/logger.service';
import { ProcessTransport } from '@runtime/services/mcp/process-transport';
import { McpClientFactory } from '@runtime/services/mcp/mcp-client-factory';

export interface ContainerOptions {
  /** Overrides MCPIPE_CONFIG and the default config location */
  configPath?: string;
  /** Overrides `log.level` from the config file */
  logLevel?: LogLevel;
}

/**
 * Creates and configures the InversifyJS dependency injection container.
 * All services are bound as singletons by default.
 */
export function createContainer(options: ContainerOptions = {}): Container {
  const container = new Container({
    defaultScope: 'Singleton',
    autoBindInjectable: false,
  });

  // ============================================================================
  // Core Infrastructure (bind first, as other services depend on these)
  // ============================================================================
  container.bind<IConfig>(TYPES.Config).toDynamicValue(() => new ConfigService(options.configPath));
  container.bind<ILogger>(TYPES.Logger).toDynamicValue((context) => {
    const level = options.logLevel ?? context.container.get<IConfig>(TYPES.Config).get<unknown>('log.level');
    return new Logger({ level: isLogLevel(level) ? level : 'info' });
  });

  // ============================================================================
  // MCP Protocol Layer (Transport, Client)
  // ============================================================================
  container.bind<IProcessTransport>(TYPES.ProcessTransport).to(ProcessTransport);
  container.bind<IMcpClientFactory>(TYPES.McpClientFactory).to(McpClientFactory);

  return container;
}
