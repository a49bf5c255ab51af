import type { Readable } from 'stream';
import type { ILogger, StderrListener } from '@runtime/core/interfaces';
import { LineSplitter } from './line-splitter';

export const DEFAULT_ERROR_PATTERNS = ['error:', 'fatal:'];

/**
 * Surfaces a peer's stderr as diagnostics, one log entry per line.
 * Lines matching an error pattern are logged at error level; nothing
 * here ever fails the session.
 */
export class StderrMonitor {
  private readonly splitter = new LineSplitter();
  private readonly listeners = new Set<StderrListener>();
  private readonly patterns: string[];

  constructor(
    stream: Readable,
    private readonly logger: ILogger,
    patterns: string[] = DEFAULT_ERROR_PATTERNS
  ) {
    this.patterns = patterns.map((pattern) => pattern.toLowerCase());

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      for (const line of this.splitter.push(chunk)) {
        this.handleLine(line);
      }
    });
    stream.on('end', () => {
      const rest = this.splitter.flush();
      if (rest !== null) {
        this.handleLine(rest);
      }
    });
    stream.on('error', (error: Error) => {
      this.logger.warn('Error reading peer stderr', { error: error.message });
    });
  }

  onLine(listener: StderrListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  isElevated(line: string): boolean {
    const lower = line.toLowerCase();
    return this.patterns.some((pattern) => lower.includes(pattern));
  }

  private handleLine(raw: string): void {
    const line = raw.trim();
    if (!line) {
      return;
    }

    const elevated = this.isElevated(line);
    this.logger.debug('Peer stderr', { line });
    if (elevated) {
      this.logger.error('Peer reported an error', { line });
    }

    for (const listener of this.listeners) {
      try {
        listener(line, elevated);
      } catch (error) {
        this.logger.warn('Stderr listener threw', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
