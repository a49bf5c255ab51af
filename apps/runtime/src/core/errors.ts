/**
 * Error taxonomy for the runtime. Nothing here is retried internally;
 * callers decide whether to restart a peer or repeat a call.
 */

export abstract class McpError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The peer executable could not be launched. */
export class SpawnError extends McpError {
  constructor(
    public readonly command: string,
    cause: unknown
  ) {
    super(
      `Failed to start peer process "${command}": ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export type FramingFailure = 'empty message' | 'malformed json' | 'invalid message';

/** A line read from the peer is not a JSON-RPC message. Ends the read loop. */
export class FramingError extends McpError {
  constructor(
    public readonly reason: FramingFailure,
    public readonly line?: string,
    options?: ErrorOptions
  ) {
    super(reason, options);
  }
}

/** A gated operation was attempted before the initialize handshake completed. */
export class NotInitializedError extends McpError {
  constructor(public readonly operation: string) {
    super(`Client not initialized: call initialize() before ${operation}`);
  }
}

/** The peer answered with a JSON-RPC error object. */
export class CallError extends McpError {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown,
    public readonly method?: string
  ) {
    super(message);
  }
}

/** The session went away while the operation was outstanding. */
export class TransportClosedError extends McpError {
  constructor(public readonly reason: string) {
    super(`Transport closed: ${reason}`);
  }
}

/** The session is closing or closed; no new operation is accepted. */
export class SessionClosedError extends TransportClosedError {
  constructor() {
    super('session is closed');
  }
}

/** The caller's own signal or timeout fired. Only that call is affected. */
export class CancellationError extends McpError {
  constructor(
    public readonly method: string | undefined,
    public readonly reason: 'aborted' | 'timeout',
    timeoutMs?: number
  ) {
    super(
      reason === 'timeout'
        ? `Request timed out after ${timeoutMs}ms: ${method}`
        : `Request aborted${method ? `: ${method}` : ''}`
    );
  }
}

/** The peer's result does not have the shape the protocol prescribes. */
export class ProtocolError extends McpError {
  constructor(
    public readonly method: string,
    public readonly issues: string[]
  ) {
    super(`Unexpected result for ${method}: ${issues.join('; ')}`);
  }
}
