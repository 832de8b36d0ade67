/**
 * Ad-hoc providers over lines the host already has.
 */
import type { FilterMode } from '../dispatch/mode-selector.js';
import type { OverflowPolicy } from '../stream/result-stream.js';
import { engineFilterCommand } from './engine.js';
import type { JobCommand } from '../jobs/types.js';
import type { Provider, QueryContext } from './types.js';

export interface ListProviderOptions {
  description?: string;
  overflowPolicy?: OverflowPolicy;
  forceMode?: FilterMode;
}

/** Lists too large for in-process filtering go to the engine as a file. */
function filterSpilled(query: string, context: QueryContext): JobCommand {
  return engineFilterCommand(context.config, query, context.cwd, { tempfile: context.tempfile });
}

export function createListProvider(id: string, lines: readonly string[], options: ListProviderOptions = {}): Provider {
  const snapshot = [...lines];
  return {
    id,
    description: options.description ?? `${snapshot.length} static lines`,
    overflowPolicy: options.overflowPolicy ?? 'cache',
    forceMode: options.forceMode,
    source: () => ({ kind: 'static', lines: snapshot }),
    queryCommand: filterSpilled,
  };
}

export function createLazyProvider(id: string, load: () => string[], options: ListProviderOptions = {}): Provider {
  return {
    id,
    description: options.description ?? 'Lines produced on demand',
    overflowPolicy: options.overflowPolicy ?? 'cache',
    forceMode: options.forceMode,
    source: () => ({ kind: 'lazy', load }),
    queryCommand: filterSpilled,
  };
}
