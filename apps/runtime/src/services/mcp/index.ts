/**
 * MCP Protocol Layer Services
 *
 * - FramingCodec: newline-delimited JSON over a pair of byte streams
 * - ProcessTransport / PeerProcess: child process spawning and supervision
 * - StderrMonitor: peer stderr as diagnostics
 * - Session: request/response correlation, read loop and teardown
 * - HandshakeGate: initialize-before-use state machine
 * - McpClient: gated MCP operations over a session
 * - McpClientFactory: composes the above for one peer process
 */

export { FramingCodec, FrameReader, FrameWriter, encodeFrame, decodeFrame } from './framing-codec';
export { isRequest, isResponse, isNotification } from './framing-codec';
export { LineSplitter } from './line-splitter';
export { ProcessTransport, PeerProcess } from './process-transport';
export { StderrMonitor, DEFAULT_ERROR_PATTERNS } from './stderr-monitor';
export { Session } from './session';
export { HandshakeGate } from './handshake-gate';
export { McpClient, DEFAULT_CLIENT_IDENTITY } from './mcp-client.service';
export { McpClientFactory } from './mcp-client-factory';
export { fetchAll } from './pagination';
export type { SessionOptions } from './session';
export type { FramingCodecOptions } from './framing-codec';
export type { PeerProcessOptions } from './process-transport';
export type { FetchAllOptions } from './pagination';
