/**
 * Fake child process for job and worker tests.
 * Output is emitted synchronously so tests control ordering exactly.
 */
import { EventEmitter } from 'node:events';
import { PassThrough, Writable } from 'node:stream';
import type { ProcessSpawner, SpawnedProcess, SpawnOptions } from '../../src/jobs/spawner.js';

export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly pid: number;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly stdin: Writable;
  readonly written: string[] = [];
  readonly signals: Array<NodeJS.Signals | number> = [];

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly options: SpawnOptions,
    pid: number,
  ) {
    super();
    this.pid = pid;
    const written = this.written;
    this.stdin = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString());
        callback();
      },
    });
  }

  get argv(): string[] {
    return [this.command, ...this.args];
  }

  get killed(): boolean {
    return this.signals.length > 0;
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    this.signals.push(signal);
    return true;
  }

  emitStdout(text: string): void {
    this.stdout.emit('data', Buffer.from(text));
  }

  emitStderr(text: string): void {
    this.stderr.emit('data', Buffer.from(text));
  }

  exit(code: number | null = 0): void {
    this.emit('close', code, null);
  }

  fail(code: string, message: string): void {
    const err: NodeJS.ErrnoException = new Error(message);
    err.code = code;
    this.emit('error', err);
  }
}

export class FakeSpawner {
  readonly processes: FakeProcess[] = [];
  /** Thrown by the next spawn call. */
  throwOnSpawn?: Error;
  private nextPid = 1000;

  readonly spawn: ProcessSpawner = (command, args, options) => {
    const error = this.throwOnSpawn;
    if (error) {
      this.throwOnSpawn = undefined;
      throw error;
    }
    const proc = new FakeProcess(command, args, options, this.nextPid++);
    this.processes.push(proc);
    return proc;
  };

  get count(): number {
    return this.processes.length;
  }

  /**
   * @throws {Error} when nothing was spawned
   */
  last(): FakeProcess {
    const proc = this.processes[this.processes.length - 1];
    if (!proc) throw new Error('no process spawned');
    return proc;
  }
}
