/**
 * Command lines for the external matching engine.
 */
import type { PipelineConfig } from '../config.js';
import type { JobCommand } from '../jobs/types.js';

export interface EngineInput {
  /** Candidate file to read. */
  tempfile?: string;
  /** Command whose output the engine should run and filter itself. */
  sourceArgv?: readonly string[];
}

/**
 * `<engine> --input FILE QUERY` when candidates are on disk, otherwise
 * `<engine> --cmd "CMD" --cmd-dir DIR QUERY`.
 */
export function engineFilterCommand(
  config: PipelineConfig,
  query: string,
  cwd: string,
  input: EngineInput,
): JobCommand {
  const argv = [...config.engineCommand, '--number', String(config.preloadCapacity)];
  if (input.tempfile) {
    argv.push('--input', input.tempfile);
  } else if (input.sourceArgv && input.sourceArgv.length > 0) {
    argv.push('--cmd', input.sourceArgv.join(' '), '--cmd-dir', cwd);
  } else {
    throw new Error('Engine filter needs a candidate file or a source command');
  }
  argv.push('--', query);
  return { argv, cwd };
}
