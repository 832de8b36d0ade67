/**
 * Long-lived RPC worker process.
 * Spawns the worker once and keeps it across sessions; the correlator
 * handles request/response matching over its stdio.
 */
import type { DecodeError } from '../errors.js';
import { SpawnFailureError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { nodeSpawner, type ProcessSpawner, type SpawnedProcess } from '../jobs/spawner.js';
import { validateArgv } from '../validation.js';
import { RpcCorrelator } from './correlator.js';
import type { RpcFraming, RpcNotification } from './types.js';

export interface RpcWorkerOptions {
  argv: readonly string[];
  cwd: string;
  framing?: RpcFraming;
  spawner?: ProcessSpawner;
  logger?: Logger;
  onDiagnostic?: (error: DecodeError) => void;
  onNotification?: (notification: RpcNotification) => void;
  /** Called once when the worker goes away. */
  onExit?: (code: number | null) => void;
}

export class RpcWorker {
  readonly correlator: RpcCorrelator;
  private proc?: SpawnedProcess;
  private readonly logger: Logger;
  private readonly onExit?: (code: number | null) => void;
  private exited = false;

  private constructor(options: RpcWorkerOptions, proc: SpawnedProcess) {
    this.logger = options.logger ?? silentLogger;
    this.onExit = options.onExit;
    this.proc = proc;

    const stdin = proc.stdin;
    this.correlator = new RpcCorrelator({
      framing: options.framing,
      logger: this.logger,
      onDiagnostic: options.onDiagnostic,
      onNotification: options.onNotification,
      write: (frame) => {
        if (!stdin || this.exited) {
          throw new Error('RPC worker is not running');
        }
        stdin.write(frame);
      },
    });

    proc.stdout?.on('data', (chunk: Buffer) => this.correlator.feed(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => {
      const text = chunk.toString().trim();
      if (text) this.logger.warn(`worker stderr: ${text}`);
    });
    // A dead worker surfaces as EPIPE on the next write.
    stdin?.on('error', (err: Error) => {
      this.logger.error(`worker stdin error: ${err.message}`);
      this.markExited(null);
    });
    proc.on('error', (err: Error) => {
      this.logger.error(`worker error: ${err.message}`);
      this.markExited(null);
    });
    proc.on('close', (code: number | null) => this.markExited(code));
  }

  /**
   * Spawn the worker.
   * @throws {Error} on an empty command line
   * @throws {SpawnFailureError} when the executable cannot be started
   */
  static start(options: RpcWorkerOptions): RpcWorker {
    const spawner = options.spawner ?? nodeSpawner;
    const [executable, ...args] = validateArgv(options.argv);
    let proc: SpawnedProcess;
    try {
      proc = spawner(executable, args, { cwd: options.cwd, stdin: 'pipe' });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SpawnFailureError({ argv: options.argv, cwd: options.cwd }, reason, { cause: err });
    }
    return new RpcWorker(options, proc);
  }

  get running(): boolean {
    return !this.exited;
  }

  stop(): void {
    const proc = this.proc;
    if (!proc || this.exited) return;
    proc.stdin?.end();
    proc.kill('SIGTERM');
    this.markExited(null);
  }

  private markExited(code: number | null): void {
    if (this.exited) return;
    this.exited = true;
    this.proc = undefined;
    const failed = this.correlator.failAll('RPC worker exited');
    if (failed > 0) this.logger.warn(`worker exited with ${failed} request(s) pending`);
    this.onExit?.(code);
  }
}
