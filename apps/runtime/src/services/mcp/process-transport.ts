import { injectable, inject } from 'inversify';
import { spawn, type ChildProcess } from 'child_process';
import { constants } from 'os';
import { z } from 'zod';
import { TYPES } from '@runtime/core/types';
import { SpawnError } from '@runtime/core/errors';
import type {
  ExitOutcome,
  IConfig,
  ILogger,
  IPeerProcess,
  IProcessTransport,
  PeerEndpoints,
  SpawnOptions,
  StderrListener,
} from '@runtime/core/interfaces';
import { readSetting } from '@runtime/services/core/config.service';
import { DEFAULT_ERROR_PATTERNS, StderrMonitor } from './stderr-monitor';

const ErrorPatternsSchema = z.array(z.string());
const SignalSchema = z.custom<NodeJS.Signals>(
  (value) => typeof value === 'string' && Object.prototype.hasOwnProperty.call(constants.signals, value)
);

/** How long pipes may stay open after the process itself has exited */
const EXIT_DRAIN_MS = 200;

export interface PeerProcessOptions {
  killSignal?: NodeJS.Signals;
  errorPatterns?: string[];
  onStderr?: StderrListener;
}

/**
 * Handle on a spawned peer: its pipes, its stderr monitor and its exit.
 * The exit outcome is published once through `exited`; kill() is a no-op
 * once the process is gone or a kill was already sent.
 *
 * Exit is taken from the process, not from its pipes: a helper the peer
 * started may inherit stdout or stderr and hold them open indefinitely.
 * Output already in flight gets a short window to arrive, then the pipes are
 * released.
 */
export class PeerProcess implements IPeerProcess {
  readonly endpoints: PeerEndpoints;
  readonly stderr: StderrMonitor;
  readonly exited: Promise<ExitOutcome>;
  private outcome: ExitOutcome | null = null;
  private killSent = false;
  private readonly killSignal: NodeJS.Signals;

  constructor(
    private readonly child: ChildProcess,
    readonly command: string,
    readonly args: readonly string[],
    private readonly logger: ILogger,
    options: PeerProcessOptions = {}
  ) {
    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout || !stderr) {
      throw new SpawnError(command, new Error('peer process has no stdio pipes'));
    }
    this.endpoints = { stdin, stdout, stderr };
    this.killSignal = options.killSignal ?? 'SIGKILL';
    this.stderr = new StderrMonitor(stderr, logger, options.errorPatterns);
    if (options.onStderr) {
      this.stderr.onLine(options.onStderr);
    }

    this.exited = new Promise<ExitOutcome>((resolve) => {
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const outcome: ExitOutcome = { code, signal };
        this.outcome = outcome;
        this.logger.info('Peer process exited', { pid: child.pid, code, signal });
        void this.releasePipes().then(() => resolve(outcome));
      });
    });

    child.on('error', (error: Error) => {
      this.logger.error('Peer process error', { pid: child.pid, error: error.message });
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  hasExited(): boolean {
    return this.outcome !== null || this.child.exitCode !== null || this.child.signalCode !== null;
  }

  kill(signal: NodeJS.Signals = this.killSignal): void {
    if (this.hasExited() || this.killSent) {
      this.logger.debug('Peer process already stopped, not killing', { pid: this.pid });
      return;
    }
    this.killSent = true;

    this.logger.info('Killing peer process', { pid: this.pid, signal });
    if (!this.child.kill(signal)) {
      this.logger.warn('Kill signal was not delivered', { pid: this.pid, signal });
    }
  }

  wait(): Promise<ExitOutcome> {
    return this.exited;
  }

  private async releasePipes(): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const drained = await Promise.race([
      new Promise<boolean>((resolve) => this.child.once('close', () => resolve(true))),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), EXIT_DRAIN_MS);
      }),
    ]);
    clearTimeout(timer);

    if (!drained) {
      this.logger.debug('Peer pipes still open after exit, releasing them', { pid: this.pid });
      for (const stream of [this.endpoints.stdin, this.endpoints.stdout, this.endpoints.stderr]) {
        if (!stream.destroyed) {
          stream.destroy();
        }
      }
    }
  }
}

/**
 * Launches peers as child processes with three pipes.
 */
@injectable()
export class ProcessTransport implements IProcessTransport {
  constructor(
    @inject(TYPES.Logger) private logger: ILogger,
    @inject(TYPES.Config) private config: IConfig
  ) {}

  /**
   * Spawn the peer. Resolves once the OS reports the process started;
   * rejects with SpawnError if it could not be launched.
   */
  async spawn(command: string, args: string[], options: SpawnOptions = {}): Promise<PeerProcess> {
    this.logger.info('Spawning peer process', { command, args });

    let child: ChildProcess;
    try {
      child = spawn(command, args, {
        cwd: options.cwd,
        env: {
          ...process.env,
          ...options.env,
        },
        stdio: ['pipe', 'pipe', 'pipe'],
        shell: false,
      });
    } catch (error) {
      throw new SpawnError(command, error);
    }

    // Listeners go on before the first tick so no output or exit is missed
    const peer = new PeerProcess(child, command, args, this.logger.child({ command }), {
      killSignal: this.killSignal(),
      errorPatterns: this.errorPatterns(),
      onStderr: options.onStderr,
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new SpawnError(command, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    this.logger.info('Peer process spawned', { command, pid: peer.pid });
    return peer;
  }

  private killSignal(): NodeJS.Signals {
    return readSetting(this.config, this.logger, 'process.killSignal', SignalSchema, 'SIGKILL');
  }

  private errorPatterns(): string[] {
    return readSetting(
      this.config,
      this.logger,
      'stderr.errorPatterns',
      ErrorPatternsSchema,
      DEFAULT_ERROR_PATTERNS
    );
  }
}
