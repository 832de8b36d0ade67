/**
 * swiftpick Error Types
 *
 * Spawn and stream errors end a Job and replace the result view with a
 * diagnostic. Decode errors end a forerunner Job, or only the one malformed
 * message when raised by the RPC correlator.
 */

export type SearchErrorCode = 'SPAWN_FAILURE' | 'STREAM_ERROR' | 'DECODE_ERROR';

export interface CommandContext {
  argv: readonly string[];
  cwd: string;
}

export class SearchError extends Error {
  public readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SearchError';
    this.code = code;
  }
}

/** Executable missing, not permitted, or otherwise impossible to start. */
export class SpawnFailureError extends SearchError {
  public readonly command: CommandContext;

  constructor(command: CommandContext, reason: string, options?: { cause?: unknown }) {
    super('SPAWN_FAILURE', `Failed to spawn ${command.argv[0] ?? '<empty>'}: ${reason}`, options);
    this.name = 'SpawnFailureError';
    this.command = command;
  }
}

/** Non-empty stderr, or an exit code the provider does not accept. */
export class StreamError extends SearchError {
  public readonly command: CommandContext;
  public readonly stderr: string;
  public readonly exitCode?: number;

  constructor(command: CommandContext, stderr: string, exitCode?: number) {
    const detail = stderr.trim() || `exited with code ${exitCode ?? 'unknown'}`;
    super('STREAM_ERROR', detail);
    this.name = 'StreamError';
    this.command = command;
    this.stderr = stderr;
    this.exitCode = exitCode;
  }
}

/** Malformed JSON or framing. */
export class DecodeError extends SearchError {
  public readonly raw: string;

  constructor(message: string, raw: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
    this.name = 'DecodeError';
    this.raw = raw;
  }
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}

/** Lines shown in place of results when a Job fails. */
export interface Diagnostic {
  command: string;
  cwd: string;
  message: string;
}

export function toDiagnostic(error: unknown, fallback: CommandContext): Diagnostic {
  const command =
    error instanceof SpawnFailureError || error instanceof StreamError ? error.command : fallback;
  const message = error instanceof Error ? error.message : String(error);
  return {
    command: command.argv.join(' '),
    cwd: command.cwd,
    message,
  };
}

export function formatDiagnostic(diagnostic: Diagnostic): string[] {
  return [
    `Error: ${diagnostic.message.split('\n')[0] ?? ''}`,
    `Command: ${diagnostic.command}`,
    `Cwd: ${diagnostic.cwd}`,
    ...diagnostic.message.split('\n').slice(1).filter((line) => line.trim().length > 0),
  ];
}
