/**
 * Files provider.
 * Candidates come from `rg --files`; once the forerunner has listed them,
 * the engine filters the spilled list instead of re-running ripgrep.
 */
import type { PipelineConfig } from '../config.js';
import type { Provider } from './types.js';
import { engineFilterCommand } from './engine.js';

function listFilesArgv(config: PipelineConfig): string[] {
  return [config.rgPath, '--files', '--color=never'];
}

export const filesProvider: Provider = {
  id: 'files',
  description: 'Files under the working directory (ripgrep --files)',
  overflowPolicy: 'cache',

  source({ config }) {
    return { kind: 'command', argv: listFilesArgv(config) };
  },

  queryCommand(query, { config, cwd, tempfile }) {
    return engineFilterCommand(config, query, cwd, { tempfile, sourceArgv: listFilesArgv(config) });
  },
};
