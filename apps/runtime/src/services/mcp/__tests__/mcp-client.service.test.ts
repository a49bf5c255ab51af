import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ILogger } from '@runtime/core/interfaces';
import {
  CallError,
  NotInitializedError,
  ProtocolError,
  TransportClosedError,
} from '@runtime/core/errors';
import { FramingCodec } from '../framing-codec';
import { Session } from '../session';
import { McpClient, DEFAULT_CLIENT_IDENTITY } from '../mcp-client.service';
import { FakePeer, createMockLogger, isRecord } from '@tests/utils';

const INITIALIZE_RESULT = {
  protocolVersion: '2024-11-05',
  capabilities: { tools: {}, resources: {} },
  serverInfo: { name: 'stub-server', version: '1.2.3' },
};

function cursorOf(params: unknown): unknown {
  return isRecord(params) ? params.cursor : undefined;
}

describe('McpClient', () => {
  let peer: FakePeer;
  let logger: ILogger;
  let client: McpClient;

  beforeEach(() => {
    peer = new FakePeer();
    logger = createMockLogger();
    const { stdin, stdout } = peer.endpoints;
    const session = new Session(peer, new FramingCodec(stdout, stdin, logger), logger);
    client = new McpClient(session, logger);
  });

  afterEach(async () => {
    await client.close();
  });

  async function initialized(): Promise<void> {
    peer.handle('initialize', () => INITIALIZE_RESULT);
    await client.initialize();
  }

  describe('initialize', () => {
    it('should send the client identity and store the server info', async () => {
      peer.handle('initialize', () => INITIALIZE_RESULT);

      const result = await client.initialize();

      expect(peer.requests('initialize')[0]?.params).toEqual({
        protocolVersion: DEFAULT_CLIENT_IDENTITY.protocolVersion,
        capabilities: {},
        clientInfo: { name: 'mcpipe', version: '0.1.0' },
      });
      expect(result.serverInfo).toEqual({ name: 'stub-server', version: '1.2.3' });
      expect(client.serverInfo).toEqual(result);
      expect(client.gateState).toBe('ready');
    });

    it('should send exactly one initialized notification, after the response', async () => {
      const pending = client.initialize();
      await peer.waitForSent(1);
      expect(peer.methods()).toEqual(['initialize']);

      peer.reply(1, INITIALIZE_RESULT);
      await pending;
      await peer.waitForMethod('notifications/initialized');

      expect(peer.methods()).toEqual(['initialize', 'notifications/initialized']);
      expect(peer.sent[1]).toEqual({ jsonrpc: '2.0', method: 'notifications/initialized' });
    });

    it('should keep the gate closed while the handshake is in flight', async () => {
      const pending = client.initialize();
      await peer.waitForSent(1);

      expect(client.gateState).toBe('initializing');
      await expect(client.listTools()).rejects.toBeInstanceOf(NotInitializedError);

      peer.reply(1, INITIALIZE_RESULT);
      await pending;
      expect(client.gateState).toBe('ready');
    });

    it('should leave the gate closed when the peer rejects initialize', async () => {
      const pending = client.initialize().catch((e: unknown) => e);
      await peer.waitForSent(1);

      peer.replyError(1, -32602, 'Unsupported protocol version');

      expect(await pending).toBeInstanceOf(CallError);
      expect(client.gateState).toBe('uninitialized');
      expect(peer.methods()).toEqual(['initialize']);
    });

    it('should reject a malformed initialize result', async () => {
      peer.handle('initialize', () => ({ protocolVersion: '2024-11-05' }));

      const error = await client.initialize().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('issues', ['serverInfo: Required']);
      expect(client.gateState).toBe('uninitialized');
    });

    it('should warn when the peer negotiates another protocol version', async () => {
      peer.handle('initialize', () => ({ ...INITIALIZE_RESULT, protocolVersion: '2025-03-26' }));

      await client.initialize();

      expect(logger.warn).toHaveBeenCalledWith('Peer negotiated a different protocol version', {
        requested: '2024-11-05',
        negotiated: '2025-03-26',
      });
    });
  });

  describe('gating', () => {
    it('should refuse every operation before initialize without writing a byte', async () => {
      const operations = [
        () => client.ping(),
        () => client.listTools(),
        () => client.listAllTools(),
        () => client.callTool('echo', { text: 'hi' }),
        () => client.listResources(),
        () => client.listAllResources(),
        () => client.readResource('file:///a.txt'),
      ];

      for (const operation of operations) {
        await expect(operation()).rejects.toBeInstanceOf(NotInitializedError);
      }
      expect(peer.rawWrites).toHaveLength(0);
    });

    it('should name the refused operation', async () => {
      await expect(client.callTool('echo')).rejects.toThrow(
        'Client not initialized: call initialize() before tools/call'
      );
    });
  });

  describe('operations', () => {
    beforeEach(async () => {
      await initialized();
    });

    it('should ping', async () => {
      peer.handle('ping', () => ({}));

      await expect(client.ping()).resolves.toBeUndefined();
      expect(peer.requests('ping')[0]).toEqual({ jsonrpc: '2.0', id: 2, method: 'ping' });
    });

    it('should list one page of tools', async () => {
      peer.handle('tools/list', () => ({
        tools: [{ name: 'echo', description: 'Echo text', inputSchema: { type: 'object' } }],
        nextCursor: 'next',
      }));

      const page = await client.listTools();

      expect(page).toEqual({
        items: [{ name: 'echo', description: 'Echo text', inputSchema: { type: 'object' } }],
        nextCursor: 'next',
      });
      expect(peer.requests('tools/list')[0]?.params).toEqual({});
    });

    it('should pass the cursor and treat a null cursor as the last page', async () => {
      peer.handle('tools/list', () => ({ tools: [], nextCursor: null }));

      const page = await client.listTools('abc');

      expect(page).toEqual({ items: [] });
      expect(peer.requests('tools/list')[0]?.params).toEqual({ cursor: 'abc' });
    });

    it('should collect all tools across pages', async () => {
      peer.handle('tools/list', (params) =>
        cursorOf(params) === undefined
          ? { tools: [{ name: 'a' }, { name: 'b' }], nextCursor: 'p2' }
          : { tools: [{ name: 'c' }] }
      );

      const tools = await client.listAllTools();

      expect(tools.map((t) => t.name)).toEqual(['a', 'b', 'c']);
      expect(peer.requests('tools/list').map((r) => r.params)).toEqual([{}, { cursor: 'p2' }]);
    });

    it('should call a tool and keep unknown result fields', async () => {
      peer.handle('tools/call', (params) => ({
        content: [{ type: 'text', text: JSON.stringify(params) }],
        isError: false,
        _meta: { traceId: 't-1' },
      }));

      const result = await client.callTool('echo', { text: 'hi' });

      expect(result).toEqual({
        content: [{ type: 'text', text: '{"name":"echo","arguments":{"text":"hi"}}' }],
        isError: false,
        _meta: { traceId: 't-1' },
      });
    });

    it('should default missing tool content to an empty list', async () => {
      peer.handle('tools/call', () => ({}));

      await expect(client.callTool('noop')).resolves.toEqual({ content: [] });
      expect(peer.requests('tools/call')[0]?.params).toEqual({ name: 'noop', arguments: {} });
    });

    it('should surface a tool error response as CallError', async () => {
      const pending = client.callTool('missing').catch((e: unknown) => e);
      await peer.waitForMethod('tools/call');
      const [, request] = peer.requests();

      peer.replyError(request?.id ?? -1, -32602, 'Unknown tool: missing');

      const error = await pending;
      expect(error).toBeInstanceOf(CallError);
      expect(error).toMatchObject({ code: -32602, method: 'tools/call' });
    });

    it('should collect all resources across pages', async () => {
      peer.handle('resources/list', (params) =>
        cursorOf(params) === undefined
          ? { resources: [{ uri: 'mem://1', name: 'one' }], nextCursor: 'r2' }
          : { resources: [{ uri: 'mem://2', name: 'two', mimeType: 'text/plain' }] }
      );

      const resources = await client.listAllResources();

      expect(resources).toEqual([
        { uri: 'mem://1', name: 'one' },
        { uri: 'mem://2', name: 'two', mimeType: 'text/plain' },
      ]);
    });

    it('should read a resource', async () => {
      peer.handle('resources/read', (params) => ({
        contents: [{ uri: isRecord(params) ? params.uri : '', mimeType: 'text/plain', text: 'hello' }],
      }));

      const contents = await client.readResource('mem://greeting');

      expect(contents).toEqual([{ uri: 'mem://greeting', mimeType: 'text/plain', text: 'hello' }]);
    });

    it('should answer a ping from the peer', async () => {
      peer.send({ jsonrpc: '2.0', id: 'srv-ping', method: 'ping' });
      await peer.waitFor((sent) => sent.some((m) => 'id' in m && m.id === 'srv-ping'));

      expect(peer.sent).toContainEqual({ jsonrpc: '2.0', id: 'srv-ping', result: {} });
    });
  });

  describe('close', () => {
    it('should close the gate and fail outstanding operations', async () => {
      await initialized();
      const pending = client.callTool('slow').catch((e: unknown) => e);
      await peer.waitForMethod('tools/call');

      await client.close();

      expect(await pending).toBeInstanceOf(TransportClosedError);
      expect(client.gateState).toBe('uninitialized');
      expect(client.session.state).toBe('closed');
    });

    it('should be safe before initialize and when repeated', async () => {
      await client.close();
      await client.close();

      expect(client.session.state).toBe('closed');
      expect(peer.killCount).toBe(1);
    });
  });
});
