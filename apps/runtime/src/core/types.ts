/**
 * InversifyJS dependency injection symbols.
 * All injectable services are identified by these symbols.
 */
export const TYPES = {
  // Core Infrastructure
  Config: Symbol.for('Config'),
  Logger: Symbol.for('Logger'),

  // MCP Transport & Client
  ProcessTransport: Symbol.for('ProcessTransport'),
  McpClientFactory: Symbol.for('McpClientFactory'),
} as const;
