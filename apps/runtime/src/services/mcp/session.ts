import { nanoid } from 'nanoid';
import {
  CallError,
  CancellationError,
  SessionClosedError,
  TransportClosedError,
} from '@runtime/core/errors';
import type {
  CallOptions,
  IFramingCodec,
  ILogger,
  IPeerProcess,
  ISession,
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  NotificationHandler,
  RequestHandler,
  SessionState,
} from '@runtime/core/interfaces';
import { isRequest, isResponse } from './framing-codec';

const METHOD_NOT_FOUND = -32601;
const INTERNAL_ERROR = -32603;

interface PendingRequest {
  method: string;
  startTime: number;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  /** Clears the timer and abort listener attached to this call */
  dispose: () => void;
}

export interface SessionOptions {
  /** Parent cancellation scope; aborting it closes the session */
  signal?: AbortSignal;
  /** Default per-call timeout; 0 waits indefinitely */
  requestTimeoutMs?: number;
  /** How long close() lets the peer exit on its own before killing it */
  shutdownGraceMs?: number;
}

/**
 * One protocol session over one peer process.
 *
 * Owns the read loop (the only consumer of the codec's decode side), the
 * pending-request table, and teardown. Teardown starts on close(), on
 * peer exit, when the read loop ends, or when the parent signal aborts;
 * every path funnels into the same idempotent shutdown.
 */
export class Session implements ISession {
  readonly id = nanoid(10);
  private _state: SessionState = 'open';
  private readonly scope = new AbortController();
  private readonly pending = new Map<JsonRpcId, PendingRequest>();
  private readonly requestHandlers = new Map<string, RequestHandler>();
  private readonly notificationHandlers = new Map<string, NotificationHandler>();
  private readonly logger: ILogger;
  private readonly requestTimeoutMs: number;
  private readonly shutdownGraceMs: number;
  private nextId = 1;
  private closing: Promise<void> | null = null;
  private detachParent: () => void = () => undefined;

  constructor(
    private readonly peer: IPeerProcess,
    private readonly codec: IFramingCodec,
    logger: ILogger,
    options: SessionOptions = {}
  ) {
    this.logger = logger.child({ sessionId: this.id });
    this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
    this.shutdownGraceMs = options.shutdownGraceMs ?? 0;

    // Exit watcher: publishes only, the close path owns kill/wait
    void this.peer.exited.then((outcome) =>
      this.shutdown(`peer process exited (code ${outcome.code}, signal ${outcome.signal})`)
    );

    void this.runReadLoop();

    const parent = options.signal;
    if (parent?.aborted) {
      void this.shutdown('parent scope cancelled');
    } else if (parent) {
      const onAbort = (): void => void this.shutdown('parent scope cancelled');
      parent.addEventListener('abort', onAbort, { once: true });
      this.detachParent = () => parent.removeEventListener('abort', onAbort);
    }
  }

  get state(): SessionState {
    return this._state;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Send a request and wait for its response.
   */
  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    if (this._state !== 'open') {
      return Promise.reject(new SessionClosedError());
    }
    if (options.signal?.aborted) {
      return Promise.reject(new CancellationError(method, 'aborted'));
    }

    const id = this.nextId++;
    const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

    const result = new Promise<unknown>((resolve, reject) => {
      const signal = options.signal;
      let timer: NodeJS.Timeout | undefined;

      const onAbort = (): void => {
        if (this.takePending(id)) {
          this.logger.debug('Request aborted by caller', { id, method });
          reject(new CancellationError(method, 'aborted'));
        }
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          if (this.takePending(id)) {
            this.logger.warn('Request timed out', { id, method, timeoutMs });
            reject(new CancellationError(method, 'timeout', timeoutMs));
          }
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        method,
        startTime: Date.now(),
        resolve,
        reject,
        dispose: () => {
          if (timer) {
            clearTimeout(timer);
          }
          signal?.removeEventListener('abort', onAbort);
        },
      });
    });

    this.logger.debug('Sending request', { id, method });
    this.codec.write(request).catch((error: unknown) => {
      const pending = this.takePending(id);
      pending?.reject(error instanceof Error ? error : new TransportClosedError(String(error)));
    });

    return result;
  }

  /**
   * Send a notification; nothing is awaited beyond the write itself.
   */
  async notify(method: string, params?: unknown): Promise<void> {
    if (this._state !== 'open') {
      throw new SessionClosedError();
    }

    const notification: JsonRpcNotification = { jsonrpc: '2.0', method, params };
    this.logger.debug('Sending notification', { method });
    await this.codec.write(notification);
  }

  onRequest(method: string, handler: RequestHandler): () => void {
    this.requestHandlers.set(method, handler);
    return () => {
      if (this.requestHandlers.get(method) === handler) {
        this.requestHandlers.delete(method);
      }
    };
  }

  onNotification(method: string, handler: NotificationHandler): () => void {
    this.notificationHandlers.set(method, handler);
    return () => {
      if (this.notificationHandlers.get(method) === handler) {
        this.notificationHandlers.delete(method);
      }
    };
  }

  /**
   * Tear the session down. Safe to call any number of times, concurrently
   * or after the peer is gone; never rejects.
   */
  close(): Promise<void> {
    return this.shutdown('closed by caller');
  }

  private shutdown(reason: string): Promise<void> {
    if (!this.closing) {
      this.closing = this.teardown(reason);
    }
    return this.closing;
  }

  private async teardown(reason: string): Promise<void> {
    this._state = 'closing';
    this.logger.debug('Closing session', { reason, pending: this.pending.size });
    this.detachParent();

    // Best effort: the peer may already be gone
    const exit: JsonRpcNotification = { jsonrpc: '2.0', method: 'exit' };
    this.codec.write(exit).catch((error: unknown) => {
      this.logger.debug('Exit notification not delivered', {
        error: error instanceof Error ? error.message : String(error),
      });
    });

    this.codec.closeWrite();
    this.codec.closeRead();
    this.scope.abort();

    const failure = new TransportClosedError(reason);
    for (const id of [...this.pending.keys()]) {
      this.takePending(id)?.reject(failure);
    }

    if (!this.peer.hasExited() && this.shutdownGraceMs > 0) {
      await this.waitForExit(this.shutdownGraceMs);
    }
    if (!this.peer.hasExited()) {
      this.peer.kill();
    }
    const outcome = await this.peer.wait();

    this._state = 'closed';
    this.logger.debug('Session closed', { reason, code: outcome.code, signal: outcome.signal });
  }

  private async waitForExit(ms: number): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      this.peer.exited,
      new Promise<void>((resolve) => {
        timer = setTimeout(resolve, ms);
      }),
    ]);
    clearTimeout(timer);
  }

  private async runReadLoop(): Promise<void> {
    let reason = 'peer closed its output';
    try {
      for (;;) {
        const message = await this.codec.read(this.scope.signal);
        if (message === null) {
          break;
        }
        this.dispatch(message);
      }
    } catch (error) {
      if (error instanceof CancellationError) {
        return;
      }
      reason = `read loop failed: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error('Read loop terminated', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    await this.shutdown(reason);
  }

  private dispatch(message: JsonRpcMessage): void {
    if (isResponse(message)) {
      this.handleResponse(message);
    } else if (isRequest(message)) {
      void this.handleRequest(message);
    } else {
      this.handleNotification(message);
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const pending = response.id === null ? undefined : this.takePending(response.id);
    if (!pending) {
      this.logger.warn('Discarding response for unknown request', { id: response.id });
      return;
    }

    this.logger.debug('Received response', {
      id: response.id,
      method: pending.method,
      duration: Date.now() - pending.startTime,
      hasError: response.error !== undefined,
    });

    if (response.error) {
      const { code, message, data } = response.error;
      pending.reject(new CallError(code, message, data, pending.method));
    } else {
      pending.resolve(response.result);
    }
  }

  private async handleRequest(request: JsonRpcRequest): Promise<void> {
    const handler = this.requestHandlers.get(request.method);
    if (!handler) {
      this.logger.warn('No handler for inbound request', { id: request.id, method: request.method });
      await this.respond({
        jsonrpc: '2.0',
        id: request.id,
        error: { code: METHOD_NOT_FOUND, message: 'Method not found' },
      });
      return;
    }

    let response: JsonRpcResponse;
    try {
      const result = await handler(request.params);
      response = { jsonrpc: '2.0', id: request.id, result: result ?? null };
    } catch (error) {
      response = {
        jsonrpc: '2.0',
        id: request.id,
        error:
          error instanceof CallError
            ? { code: error.code, message: error.message, data: error.data }
            : { code: INTERNAL_ERROR, message: error instanceof Error ? error.message : 'Internal error' },
      };
    }
    await this.respond(response);
  }

  private async respond(response: JsonRpcResponse): Promise<void> {
    if (this._state !== 'open') {
      return;
    }
    try {
      await this.codec.write(response);
    } catch (error) {
      this.logger.warn('Failed to answer inbound request', {
        id: response.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private handleNotification(notification: JsonRpcNotification): void {
    const handler = this.notificationHandlers.get(notification.method);
    if (!handler) {
      this.logger.debug('Dropping notification with no handler', { method: notification.method });
      return;
    }

    const report = (error: unknown): void => {
      this.logger.warn('Notification handler threw', {
        method: notification.method,
        error: error instanceof Error ? error.message : String(error),
      });
    };

    try {
      const result = handler(notification.params);
      if (result instanceof Promise) {
        void result.catch(report);
      }
    } catch (error) {
      report(error);
    }
  }

  /**
   * Remove a pending request so it can be settled exactly once.
   */
  private takePending(id: JsonRpcId): PendingRequest | undefined {
    const pending = this.pending.get(id);
    if (!pending) {
      return undefined;
    }
    this.pending.delete(id);
    pending.dispose();
    return pending;
  }
}
