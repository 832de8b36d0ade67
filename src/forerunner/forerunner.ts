/**
 * Forerunner
 *
 * Runs a provider's candidate-producing command once per session, before
 * the user types. Large outputs are spilled to a temp file so later
 * filtering can read from disk instead of re-running the command, and the
 * spill location is remembered in the command cache.
 *
 * A forerunner may print plain lines, or a single JSON object
 * `{"total": N, "lines": [...], "tempfile": "..."}` when it already wrote
 * its full output somewhere.
 */
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { CommandCache } from '../cache/command-cache.js';
import { DecodeError, SearchError } from '../errors.js';
import type { JobRunner } from '../jobs/job.js';
import type { JobCommand } from '../jobs/types.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';

export const ForerunnerPayloadSchema = z.object({
  total: z.number().int().nonnegative(),
  lines: z.array(z.string()),
  tempfile: z.string().min(1).optional(),
});

export interface ForerunnerResult {
  /** Number of candidates the command produced. */
  total: number;
  /** Candidates held in memory; a preview when `tempfile` is set. */
  lines: string[];
  /** Full output on disk. */
  tempfile?: string;
  fromCache: boolean;
  /** Set when this run spilled `tempfile` and nothing else tracks it; the caller deletes it. */
  ownsTempfile?: boolean;
}

/** A lone line is only a payload when it is a JSON object carrying `total`. */
function decodePayload(line: string): object | undefined {
  if (!line.trimStart().startsWith('{')) return undefined;
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch {
    // A file name such as `{a}.txt`.
    return undefined;
  }
  return typeof decoded === 'object' && decoded !== null && 'total' in decoded ? decoded : undefined;
}

/**
 * Interpret the complete stdout of a forerunner command.
 * @throws {DecodeError} when a JSON payload is malformed
 */
export function parseForerunnerOutput(lines: readonly string[]): ForerunnerResult {
  const decoded = lines.length === 1 ? decodePayload(lines[0]) : undefined;
  if (decoded) {
    const parsed = ForerunnerPayloadSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new DecodeError(`Invalid forerunner payload: ${parsed.error.issues[0]?.message ?? 'bad shape'}`, lines[0]);
    }
    return { ...parsed.data, fromCache: false };
  }
  return { total: lines.length, lines: [...lines], fromCache: false };
}

let spillSequence = 0;

/** File-name-safe slug for a command line; `seq` keeps same-millisecond spills apart. */
export function spillFileName(argv: readonly string[], now = Date.now(), seq = 0): string {
  const slug = argv.join('_').replace(/[^A-Za-z0-9._-]+/g, '_').slice(0, 80);
  return `${slug || 'output'}_${now}${seq > 0 ? `-${seq}` : ''}.txt`;
}

/** Write `lines` to a new file under `dir` and return its path. */
export async function spillLines(dir: string, argv: readonly string[], lines: readonly string[]): Promise<string> {
  await mkdir(dir, { recursive: true });
  const tempfile = join(dir, spillFileName(argv, Date.now(), ++spillSequence));
  await writeFile(tempfile, lines.join('\n') + '\n', 'utf-8');
  return tempfile;
}

export async function removeSpilled(tempfiles: readonly string[]): Promise<void> {
  await Promise.all(tempfiles.map((tempfile) => rm(tempfile, { force: true })));
}

/** Read up to `limit` lines from a spilled output file. */
export async function readSpilled(tempfile: string, limit = Infinity): Promise<string[]> {
  const content = await readFile(tempfile, 'utf-8');
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return Number.isFinite(limit) ? lines.slice(0, limit) : lines;
}

export interface ForerunnerOptions {
  runner: JobRunner;
  cache?: CommandCache;
  /** Outputs with more lines than this are spilled to disk. */
  threshold: number;
  spillDir: string;
  /** Lines kept in memory once output has been spilled. */
  previewSize: number;
  logger?: Logger;
}

export class Forerunner {
  private readonly options: ForerunnerOptions;
  private readonly logger: Logger;
  private generation = 0;
  private cancelCurrent?: () => void;

  constructor(options: ForerunnerOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Produce the candidate set for `command`, from the cache when a previous
   * run spilled it, otherwise by running the command.
   */
  async run(command: JobCommand): Promise<ForerunnerResult> {
    const { cache, previewSize } = this.options;
    const hit = cache?.lookup(command.argv, command.cwd);
    if (hit) {
      this.logger.debug(`cache hit for ${command.argv.join(' ')} (${hit.total} lines)`);
      const lines = await readSpilled(hit.tempfile, previewSize);
      return { total: hit.total, lines, tempfile: hit.tempfile, fromCache: true };
    }

    const output = await this.collect(command);
    const parsed = parseForerunnerOutput(output);
    const result = await this.spill(command, parsed);
    if (result.tempfile) {
      if (cache) {
        cache.store(command.argv, command.cwd, result.total, result.tempfile);
      } else if (result.tempfile !== parsed.tempfile) {
        return { ...result, ownsTempfile: true };
      }
    }
    return result;
  }

  /** Stop a running forerunner; its `run` promise rejects. */
  cancel(): void {
    this.cancelCurrent?.();
  }

  private collect(command: JobCommand): Promise<string[]> {
    const generation = ++this.generation;
    const collected: string[] = [];

    return new Promise<string[]>((resolve, reject) => {
      const job = this.options.runner.spawn(
        { command, generation, kind: 'forerunner' },
        {
          onLines: (_job, lines) => {
            collected.push(...lines);
          },
          onComplete: () => {
            this.cancelCurrent = undefined;
            resolve(collected);
          },
          onFailed: (_job, error) => {
            this.cancelCurrent = undefined;
            reject(error);
          },
        },
      );

      if (job.isTerminal) return;
      this.cancelCurrent = () => {
        this.cancelCurrent = undefined;
        this.options.runner.cancel(job);
        reject(new SearchError('STREAM_ERROR', 'Forerunner cancelled'));
      };
    });
  }

  private async spill(command: JobCommand, result: ForerunnerResult): Promise<ForerunnerResult> {
    const { threshold, spillDir, previewSize } = this.options;
    if (result.tempfile || result.total <= threshold) return result;

    const tempfile = await spillLines(spillDir, command.argv, result.lines);
    this.logger.debug(`spilled ${result.total} lines to ${tempfile}`);
    return { total: result.total, lines: result.lines.slice(0, previewSize), tempfile, fromCache: false };
  }
}
