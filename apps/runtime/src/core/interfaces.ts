import type { Readable, Writable } from 'stream';
import type { z } from 'zod';
import type {
  CallToolResultSchema,
  ContentSchema,
  ImplementationSchema,
  InitializeResultSchema,
  JsonRpcErrorSchema,
  JsonRpcNotificationSchema,
  JsonRpcRequestSchema,
  JsonRpcResponseSchema,
  ResourceContentsSchema,
  ResourceSchema,
  ToolSchema,
} from './schemas';

/**
 * Core service interfaces for dependency injection.
 * All services implement these interfaces to enable testability and loose coupling.
 */

// ============================================================================
// Core Infrastructure
// ============================================================================

export interface IConfig {
  get<T>(key: string): T | undefined;
  get<T>(key: string, defaultValue: T): T;
  set<T>(key: string, value: T): void;
  has(key: string): boolean;
  readonly configPath: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}

// ============================================================================
// JSON-RPC Wire Messages
// ============================================================================

export type JsonRpcId = string | number;
export type JsonRpcError = z.infer<typeof JsonRpcErrorSchema>;
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema>;
export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;
export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

// ============================================================================
// Process Transport
// ============================================================================

export interface PeerCommand {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export type StderrListener = (line: string, elevated: boolean) => void;

export interface SpawnOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Attached before the process starts, so no early line is missed */
  onStderr?: StderrListener;
}

export interface ExitOutcome {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface PeerEndpoints {
  /** Input to the peer */
  readonly stdin: Writable;
  /** Protocol output from the peer */
  readonly stdout: Readable;
  /** Diagnostic output from the peer */
  readonly stderr: Readable;
}

export interface IPeerProcess {
  readonly command: string;
  readonly args: readonly string[];
  readonly pid: number | undefined;
  readonly endpoints: PeerEndpoints;
  /** Published once, when the process has exited and its pipes are drained or released. Never rejects. */
  readonly exited: Promise<ExitOutcome>;
  hasExited(): boolean;
  kill(signal?: NodeJS.Signals): void;
  wait(): Promise<ExitOutcome>;
}

export interface IProcessTransport {
  spawn(command: string, args: string[], options?: SpawnOptions): Promise<IPeerProcess>;
}

// ============================================================================
// Framing Codec
// ============================================================================

export interface IFramingCodec {
  /** Resolves with the next message, or null once the peer closed its output. */
  read(signal?: AbortSignal): Promise<JsonRpcMessage | null>;
  write(message: JsonRpcMessage): Promise<void>;
  closeWrite(): void;
  closeRead(): void;
}

// ============================================================================
// Session
// ============================================================================

export type SessionState = 'open' | 'closing' | 'closed';

export interface CallOptions {
  /** Cancels only this call */
  signal?: AbortSignal;
  /** Overrides the session default; 0 waits indefinitely */
  timeoutMs?: number;
}

export type RequestHandler = (params: unknown) => unknown;
export type NotificationHandler = (params: unknown) => void | Promise<void>;

export interface ISession {
  readonly id: string;
  readonly state: SessionState;
  readonly pendingCount: number;
  call(method: string, params?: unknown, options?: CallOptions): Promise<unknown>;
  notify(method: string, params?: unknown): Promise<void>;
  onRequest(method: string, handler: RequestHandler): () => void;
  onNotification(method: string, handler: NotificationHandler): () => void;
  close(): Promise<void>;
}

// ============================================================================
// MCP Client
// ============================================================================

export type GateState = 'uninitialized' | 'initializing' | 'ready';

export type Implementation = z.infer<typeof ImplementationSchema>;
export type InitializeResult = z.infer<typeof InitializeResultSchema>;
export type Tool = z.infer<typeof ToolSchema>;
export type Content = z.infer<typeof ContentSchema>;
export type CallToolResult = z.infer<typeof CallToolResultSchema>;
export type Resource = z.infer<typeof ResourceSchema>;
export type ResourceContents = z.infer<typeof ResourceContentsSchema>;

export interface ClientIdentity {
  clientInfo: { name: string; version: string };
  protocolVersion: string;
  capabilities: Record<string, unknown>;
}

export interface Page<T> {
  items: T[];
  /** Absent on the final page */
  nextCursor?: string;
}

export type PageFetcher<T> = (cursor: string | undefined, signal?: AbortSignal) => Promise<Page<T>>;

export interface IMcpClient {
  readonly session: ISession;
  readonly gateState: GateState;
  readonly serverInfo: InitializeResult | null;
  initialize(options?: CallOptions): Promise<InitializeResult>;
  ping(options?: CallOptions): Promise<void>;
  listTools(cursor?: string, options?: CallOptions): Promise<Page<Tool>>;
  listAllTools(options?: CallOptions): Promise<Tool[]>;
  callTool(name: string, args?: Record<string, unknown>, options?: CallOptions): Promise<CallToolResult>;
  listResources(cursor?: string, options?: CallOptions): Promise<Page<Resource>>;
  listAllResources(options?: CallOptions): Promise<Resource[]>;
  readResource(uri: string, options?: CallOptions): Promise<ResourceContents[]>;
  close(): Promise<void>;
}

export interface ConnectOptions {
  /** Parent cancellation scope for the session */
  signal?: AbortSignal;
  /** Receives every stderr line of the peer */
  onStderr?: StderrListener;
}

export interface IMcpClientFactory {
  connect(peer: PeerCommand, options?: ConnectOptions): Promise<IMcpClient>;
  dial(peer: PeerCommand, options?: ConnectOptions): Promise<ISession>;
}
