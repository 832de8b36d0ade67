/**
 * Process spawning port.
 * The default implementation wraps child_process.spawn; tests substitute a
 * fake process with the same surface.
 */
import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';

/**
 * The part of a ChildProcess the pipeline relies on. Emits
 * `close(code, signal)` and `error(err)`.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Long-lived workers take requests on stdin; search jobs do not. */
  stdin?: 'pipe' | 'ignore';
}

export type ProcessSpawner = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export const nodeSpawner: ProcessSpawner = (command, args, options) =>
  spawn(command, [...args], {
    cwd: options.cwd,
    env: options.env ? { ...process.env, ...options.env } : process.env,
    stdio: [options.stdin ?? 'ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });
