import { injectable, inject } from 'inversify';
import { z } from 'zod';
import { TYPES } from '@runtime/core/types';
import type {
  ClientIdentity,
  ConnectOptions,
  IConfig,
  ILogger,
  IMcpClientFactory,
  IProcessTransport,
  PeerCommand,
} from '@runtime/core/interfaces';
import { readSetting } from '@runtime/services/core/config.service';
import { FramingCodec } from './framing-codec';
import { McpClient } from './mcp-client.service';
import { Session } from './session';

const DurationSchema = z.number().int().nonnegative();

/**
 * Composes transport, codec and session for one peer process.
 * Each connect() spawns a fresh peer; nothing is shared between sessions.
 */
@injectable()
export class McpClientFactory implements IMcpClientFactory {
  constructor(
    @inject(TYPES.Logger) private logger: ILogger,
    @inject(TYPES.Config) private config: IConfig,
    @inject(TYPES.ProcessTransport) private transport: IProcessTransport
  ) {}

  /**
   * Spawn the peer and return a client ready for initialize().
   */
  async connect(peer: PeerCommand, options: ConnectOptions = {}): Promise<McpClient> {
    const session = await this.dial(peer, options);
    return new McpClient(session, this.logger.child({ sessionId: session.id }), this.identity());
  }

  /**
   * Spawn the peer and return the bare session, for callers that speak
   * their own methods over it.
   */
  async dial(peer: PeerCommand, options: ConnectOptions = {}): Promise<Session> {
    const processHandle = await this.transport.spawn(peer.command, peer.args, {
      cwd: peer.cwd,
      env: peer.env,
      onStderr: options.onStderr,
    });

    const { stdin, stdout } = processHandle.endpoints;
    const codec = new FramingCodec(stdout, stdin, this.logger, {
      trace: readSetting(this.config, this.logger, 'codec.trace', z.boolean(), false),
    });

    return new Session(processHandle, codec, this.logger.child({ command: peer.command }), {
      signal: options.signal,
      requestTimeoutMs: readSetting(this.config, this.logger, 'request.timeoutMs', DurationSchema, 0),
      shutdownGraceMs: readSetting(this.config, this.logger, 'session.shutdownGraceMs', DurationSchema, 0),
    });
  }

  private identity(): ClientIdentity {
    return {
      clientInfo: {
        name: this.config.get<string>('client.name', 'mcpipe'),
        version: this.config.get<string>('client.version', '0.1.0'),
      },
      protocolVersion: this.config.get<string>('protocol.version', '2024-11-05'),
      capabilities: {},
    };
  }
}
