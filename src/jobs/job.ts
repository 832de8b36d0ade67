/**
 * Job Lifecycle
 *
 * One Job is one external process: a search, a filter run, a forerunner or
 * a dynamic filter. The runner decodes stdout into lines and reports to a
 * consumer; it never decides whether output is still wanted.
 */
import { LineFramer } from '../framing/line-framer.js';
import { SpawnFailureError, StreamError, type SearchError } from '../errors.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import { nodeSpawner, type ProcessSpawner, type SpawnedProcess } from './spawner.js';
import {
  TERMINAL_JOB_STATES,
  type JobCommand,
  type JobConsumer,
  type JobKind,
  type JobSpec,
  type JobState,
} from './types.js';

const SPAWN_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR']);

export class Job {
  readonly generation: number;
  readonly kind: JobKind;
  readonly command: JobCommand;
  readonly successCodes: readonly number[];
  readonly startedAt = Date.now();

  state: JobState = 'pending';
  lineCount = 0;
  exitCode: number | null = null;
  endedAt?: number;
  error?: SearchError;
  readonly stderrLines: string[] = [];

  /** Set while the process handle is held. */
  process?: SpawnedProcess;
  readonly framer = new LineFramer();

  constructor(spec: JobSpec) {
    this.generation = spec.generation;
    this.kind = spec.kind;
    this.command = { ...spec.command, argv: [...spec.command.argv] };
    this.successCodes = spec.successCodes ?? [0];
  }

  get pid(): number | undefined {
    return this.process?.pid;
  }

  get isTerminal(): boolean {
    return TERMINAL_JOB_STATES.has(this.state);
  }

  get isLive(): boolean {
    return this.state === 'running' || this.state === 'draining';
  }
}

export interface JobRunnerOptions {
  spawner?: ProcessSpawner;
  logger?: Logger;
}

export class JobRunner {
  private readonly spawner: ProcessSpawner;
  private readonly logger: Logger;
  private readonly active = new Set<Job>();

  constructor(options: JobRunnerOptions = {}) {
    this.spawner = options.spawner ?? nodeSpawner;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start a process for `spec`. A synchronous spawn failure is reported to
   * the consumer before this returns and the Job never reaches `running`.
   */
  spawn(spec: JobSpec, consumer: JobConsumer): Job {
    const job = new Job(spec);
    const [executable, ...args] = job.command.argv;

    let proc: SpawnedProcess;
    try {
      proc = this.spawner(executable, args, { cwd: job.command.cwd, env: job.command.env });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.fail(job, new SpawnFailureError(job.command, reason, { cause: err }), consumer);
      return job;
    }

    job.process = proc;
    job.state = 'running';
    this.active.add(job);
    this.logger.debug(`spawned gen=${job.generation} kind=${job.kind}: ${job.command.argv.join(' ')}`);

    proc.stdout?.on('data', (chunk: Buffer) => {
      if (job.state !== 'running') return;
      const lines = job.framer.feed(chunk);
      if (lines.length > 0) this.deliver(job, lines, consumer);
    });

    proc.stderr?.on('data', (chunk: Buffer) => {
      if (job.isTerminal) return;
      const text = chunk.toString();
      job.stderrLines.push(...text.split('\n').filter((line) => line.length > 0));
      if (text.trim().length === 0) return;
      this.fail(job, new StreamError(job.command, job.stderrLines.join('\n')), consumer);
    });

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (job.isTerminal) return;
      const error =
        err.code && SPAWN_ERROR_CODES.has(err.code)
          ? new SpawnFailureError(job.command, err.message, { cause: err })
          : new StreamError(job.command, err.message);
      this.fail(job, error, consumer);
    });

    proc.on('close', (code: number | null) => {
      this.onClose(job, code, consumer);
    });

    return job;
  }

  /** Best-effort termination. No-op on a Job that already ended. */
  cancel(job: Job): void {
    if (job.isTerminal) return;
    job.state = 'cancelled';
    this.release(job);
  }

  /** Cancel everything still running, e.g. on shutdown. */
  cancelAll(): void {
    for (const job of [...this.active]) this.cancel(job);
  }

  get activeCount(): number {
    return this.active.size;
  }

  private onClose(job: Job, code: number | null, consumer: JobConsumer): void {
    job.exitCode = code;
    job.process = undefined;
    if (job.isTerminal) return;

    job.state = 'draining';
    const tail = job.framer.flush();
    if (tail.length > 0) this.deliver(job, tail, consumer);
    if (job.isTerminal) return;

    if (code !== null && !job.successCodes.includes(code)) {
      this.fail(job, new StreamError(job.command, job.stderrLines.join('\n'), code), consumer);
      return;
    }

    job.state = 'completed';
    job.endedAt = Date.now();
    this.active.delete(job);
    consumer.onComplete(job, { lineCount: job.lineCount, exitCode: code });
  }

  private deliver(job: Job, lines: string[], consumer: JobConsumer): void {
    job.lineCount += lines.length;
    consumer.onLines(job, lines);
  }

  private fail(job: Job, error: SearchError, consumer: JobConsumer): void {
    job.state = 'failed';
    job.error = error;
    this.logger.debug(`gen=${job.generation} failed: ${error.message}`);
    this.release(job);
    consumer.onFailed(job, error);
  }

  private release(job: Job): void {
    job.endedAt = Date.now();
    this.active.delete(job);
    const proc = job.process;
    job.process = undefined;
    proc?.kill('SIGTERM');
  }
}
