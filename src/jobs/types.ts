/**
 * Job Module Types
 */
import type { SearchError } from '../errors.js';
import type { Job } from './job.js';

export type JobKind = 'search' | 'filter' | 'forerunner' | 'dynamic-filter';

export type JobState = 'pending' | 'running' | 'draining' | 'completed' | 'cancelled' | 'failed';

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set(['completed', 'cancelled', 'failed']);

export interface JobCommand {
  argv: readonly string[];
  cwd: string;
  env?: Record<string, string>;
}

export interface JobSpec {
  command: JobCommand;
  generation: number;
  kind: JobKind;
  /** Exit codes treated as success. Defaults to `[0]`. */
  successCodes?: readonly number[];
}

export interface JobSummary {
  lineCount: number;
  exitCode: number | null;
}

/**
 * Receives a Job's decoded output. Callbacks fire for every Job the runner
 * started; consumers compare `job.generation` to decide whether to act.
 */
export interface JobConsumer {
  onLines(job: Job, lines: string[]): void;
  onComplete(job: Job, summary: JobSummary): void;
  onFailed(job: Job, error: SearchError): void;
}
