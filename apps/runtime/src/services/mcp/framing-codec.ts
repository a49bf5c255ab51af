import type { Readable, Writable } from 'stream';
import { JsonRpcMessageSchema } from '@runtime/core/schemas';
import { CancellationError, FramingError, TransportClosedError } from '@runtime/core/errors';
import type {
  IFramingCodec,
  ILogger,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
} from '@runtime/core/interfaces';
import { LineSplitter } from './line-splitter';

export function isResponse(message: JsonRpcMessage): message is JsonRpcResponse {
  return !('method' in message);
}

export function isRequest(message: JsonRpcMessage): message is JsonRpcRequest {
  return 'method' in message && 'id' in message;
}

export function isNotification(message: JsonRpcMessage): message is JsonRpcNotification {
  return 'method' in message && !('id' in message);
}

/**
 * Serialize a message as one newline-terminated line of compact JSON.
 * JSON.stringify escapes newlines inside strings, so the frame holds exactly one `\n`.
 */
export function encodeFrame(message: JsonRpcMessage): string {
  return JSON.stringify(message) + '\n';
}

/**
 * Parse one line from the wire into a message.
 */
export function decodeFrame(line: string): JsonRpcMessage {
  const text = line.trim();
  if (text.length === 0) {
    throw new FramingError('empty message', line);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FramingError('malformed json', line, { cause: error });
  }

  const result = JsonRpcMessageSchema.safeParse(raw);
  if (!result.success) {
    throw new FramingError('invalid message', line, { cause: result.error });
  }
  return result.data;
}

interface LineWaiter {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

/**
 * Decode side of the codec. Lines are queued as they arrive; a single
 * consumer pulls them with read().
 */
export class FrameReader {
  private readonly splitter = new LineSplitter();
  private readonly lines: string[] = [];
  private waiter: LineWaiter | null = null;
  private ended = false;
  private failure: Error | null = null;

  constructor(
    private readonly input: Readable,
    private readonly logger: ILogger,
    private readonly trace = false
  ) {
    input.setEncoding('utf8');
    input.on('data', (chunk: string) => this.handleData(chunk));
    input.on('end', () => this.handleEnd());
    input.on('close', () => this.handleEnd());
    input.on('error', (error: Error) => this.handleError(error));
  }

  /**
   * Read the next message; null once the stream has ended.
   */
  async read(signal?: AbortSignal): Promise<JsonRpcMessage | null> {
    if (signal?.aborted) {
      throw new CancellationError(undefined, 'aborted');
    }

    const line = await this.nextLine(signal);
    if (line === null) {
      return null;
    }

    if (this.trace) {
      this.logger.debug('Frame received', { frame: line });
    }
    return decodeFrame(line);
  }

  close(): void {
    this.handleEnd();
    if (!this.input.destroyed) {
      this.input.destroy();
    }
  }

  private nextLine(signal?: AbortSignal): Promise<string | null> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameReader allows only one pending read'));
    }

    return new Promise<string | null>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiter = null;
        reject(new CancellationError(undefined, 'aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waiter = {
        resolve: (line) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(line);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
    });
  }

  private handleData(chunk: string): void {
    for (const line of this.splitter.push(chunk)) {
      const waiter = this.waiter;
      if (waiter) {
        this.waiter = null;
        waiter.resolve(line);
      } else {
        this.lines.push(line);
      }
    }
  }

  private handleEnd(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;

    const rest = this.splitter.flush();
    if (rest !== null && rest.trim().length > 0) {
      this.logger.warn('Discarding unterminated frame at end of stream', { length: rest.length });
    }

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.resolve(null);
  }

  private handleError(error: Error): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.failure = error;

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(error);
  }
}

/**
 * Encode side of the codec. Every message goes out as a single write() of
 * its complete frame, so concurrent writers never interleave bytes.
 */
export class FrameWriter {
  private closed = false;

  constructor(
    private readonly output: Writable,
    private readonly logger: ILogger,
    private readonly trace = false
  ) {
    output.on('error', (error: Error) => {
      this.closed = true;
      this.logger.debug('Peer input stream failed', { error: error.message });
    });
  }

  async write(message: JsonRpcMessage): Promise<void> {
    if (this.closed || this.output.writableEnded || this.output.destroyed) {
      throw new TransportClosedError('write side is closed');
    }

    const frame = encodeFrame(message);
    if (this.trace) {
      this.logger.debug('Frame sent', { frame: frame.trimEnd() });
    }

    await new Promise<void>((resolve, reject) => {
      this.output.write(frame, (error) => {
        if (error) {
          reject(new TransportClosedError(`write failed: ${error.message}`));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.output.writableEnded && !this.output.destroyed) {
      this.output.end();
    }
  }
}

export interface FramingCodecOptions {
  /** Log every frame at debug level */
  trace?: boolean;
}

/**
 * Newline-delimited JSON codec over a pair of byte streams.
 */
export class FramingCodec implements IFramingCodec {
  private readonly reader: FrameReader;
  private readonly writer: FrameWriter;

  constructor(input: Readable, output: Writable, logger: ILogger, options: FramingCodecOptions = {}) {
    this.reader = new FrameReader(input, logger, options.trace);
    this.writer = new FrameWriter(output, logger, options.trace);
  }

  read(signal?: AbortSignal): Promise<JsonRpcMessage | null> {
    return this.reader.read(signal);
  }

  write(message: JsonRpcMessage): Promise<void> {
    return this.writer.write(message);
  }

  closeWrite(): void {
    this.writer.close();
  }

  closeRead(): void {
    this.reader.close();
  }
}
