/**
 * Grep provider.
 * No candidate list: every query runs its own ripgrep search.
 */
import type { Provider } from './types.js';

export const grepProvider: Provider = {
  id: 'grep',
  description: 'Live ripgrep search in the working directory',
  // rg exits 1 when nothing matched
  successCodes: [0, 1],
  overflowPolicy: 'cache',

  source() {
    return { kind: 'streaming' };
  },

  queryCommand(query, { config, cwd }) {
    return {
      argv: [
        config.rgPath,
        '--column',
        '--line-number',
        '--no-heading',
        '--color=never',
        '--smart-case',
        '--',
        query,
        '.',
      ],
      cwd,
    };
  },
};
