import type { z } from 'zod';
import { ProtocolError } from '@runtime/core/errors';
import {
  CallToolResultSchema,
  InitializeResultSchema,
  ListResourcesResultSchema,
  ListToolsResultSchema,
  ReadResourceResultSchema,
} from '@runtime/core/schemas';
import type {
  CallOptions,
  CallToolResult,
  ClientIdentity,
  GateState,
  ILogger,
  IMcpClient,
  ISession,
  InitializeResult,
  Page,
  Resource,
  ResourceContents,
  Tool,
} from '@runtime/core/interfaces';
import { HandshakeGate } from './handshake-gate';
import { fetchAll } from './pagination';

export const DEFAULT_CLIENT_IDENTITY: ClientIdentity = {
  clientInfo: { name: 'mcpipe', version: '0.1.0' },
  protocolVersion: '2024-11-05',
  capabilities: {},
};

function parseResult<S extends z.ZodTypeAny>(schema: S, method: string, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ProtocolError(
      method,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function cursorParams(cursor: string | undefined): Record<string, unknown> {
  return cursor === undefined ? {} : { cursor };
}

/**
 * MCP client over a single session.
 * Every operation except initialize() is gated on a completed handshake.
 */
export class McpClient implements IMcpClient {
  private readonly gate = new HandshakeGate();
  private _serverInfo: InitializeResult | null = null;

  constructor(
    readonly session: ISession,
    private readonly logger: ILogger,
    private readonly identity: ClientIdentity = DEFAULT_CLIENT_IDENTITY
  ) {
    // Either side may ping at any time
    this.session.onRequest('ping', () => ({}));
  }

  get gateState(): GateState {
    return this.gate.state;
  }

  /** The peer's initialize result, once the handshake has completed */
  get serverInfo(): InitializeResult | null {
    return this._serverInfo;
  }

  /**
   * Run the initialize handshake. The `notifications/initialized`
   * notification is sent only after the response has been accepted.
   */
  async initialize(options?: CallOptions): Promise<InitializeResult> {
    this.gate.begin();
    this.logger.debug('Sending initialize request', {
      protocolVersion: this.identity.protocolVersion,
    });

    let result: InitializeResult;
    try {
      const raw = await this.session.call(
        'initialize',
        {
          protocolVersion: this.identity.protocolVersion,
          capabilities: this.identity.capabilities,
          clientInfo: this.identity.clientInfo,
        },
        options
      );
      result = parseResult(InitializeResultSchema, 'initialize', raw);
    } catch (error) {
      this.gate.fail();
      throw error;
    }

    this._serverInfo = result;
    this.gate.complete();

    this.logger.info('Peer initialized', {
      serverName: result.serverInfo.name,
      serverVersion: result.serverInfo.version,
      protocolVersion: result.protocolVersion,
    });
    if (result.protocolVersion !== this.identity.protocolVersion) {
      this.logger.warn('Peer negotiated a different protocol version', {
        requested: this.identity.protocolVersion,
        negotiated: result.protocolVersion,
      });
    }
    if (result.instructions !== undefined) {
      this.logger.debug('Peer instructions', { instructions: result.instructions });
    }

    await this.session.notify('notifications/initialized');
    return result;
  }

  async ping(options?: CallOptions): Promise<void> {
    this.gate.assertReady('ping');
    await this.session.call('ping', undefined, options);
  }

  async listTools(cursor?: string, options?: CallOptions): Promise<Page<Tool>> {
    this.gate.assertReady('tools/list');

    const raw = await this.session.call('tools/list', cursorParams(cursor), options);
    const result = parseResult(ListToolsResultSchema, 'tools/list', raw);

    this.logger.debug('Listed tools', { count: result.tools.length, hasMore: result.nextCursor != null });
    return { items: result.tools, nextCursor: result.nextCursor ?? undefined };
  }

  listAllTools(options?: CallOptions): Promise<Tool[]> {
    return fetchAll((cursor) => this.listTools(cursor, options), { signal: options?.signal });
  }

  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options?: CallOptions
  ): Promise<CallToolResult> {
    this.gate.assertReady('tools/call');
    this.logger.info('Calling tool', { name });

    const raw = await this.session.call('tools/call', { name, arguments: args }, options);
    const result = parseResult(CallToolResultSchema, 'tools/call', raw);

    this.logger.debug('Tool call result', {
      name,
      isError: result.isError,
      contentTypes: result.content.map((c) => c.type),
    });
    return result;
  }

  async listResources(cursor?: string, options?: CallOptions): Promise<Page<Resource>> {
    this.gate.assertReady('resources/list');

    const raw = await this.session.call('resources/list', cursorParams(cursor), options);
    const result = parseResult(ListResourcesResultSchema, 'resources/list', raw);

    this.logger.debug('Listed resources', {
      count: result.resources.length,
      hasMore: result.nextCursor != null,
    });
    return { items: result.resources, nextCursor: result.nextCursor ?? undefined };
  }

  listAllResources(options?: CallOptions): Promise<Resource[]> {
    return fetchAll((cursor) => this.listResources(cursor, options), { signal: options?.signal });
  }

  async readResource(uri: string, options?: CallOptions): Promise<ResourceContents[]> {
    this.gate.assertReady('resources/read');
    this.logger.info('Reading resource', { uri });

    const raw = await this.session.call('resources/read', { uri }, options);
    return parseResult(ReadResourceResultSchema, 'resources/read', raw).contents;
  }

  /**
   * Close the underlying session. Safe before initialize and when called repeatedly.
   */
  async close(): Promise<void> {
    this.gate.reset();
    await this.session.close();
  }
}
