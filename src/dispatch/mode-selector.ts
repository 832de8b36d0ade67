/**
 * Mode Selector
 * Decides, per query edit, whether filtering runs in-process or through a
 * freshly spawned Job.
 */

export type FilterMode = 'sync' | 'async';

/** Where a provider's candidates come from. */
export type Source =
  /** A command listing every candidate (e.g. `rg --files`). */
  | { kind: 'command'; argv: readonly string[] }
  /** Candidates already in memory. */
  | { kind: 'static'; lines: readonly string[] }
  /** Candidates produced on demand by a function. */
  | { kind: 'lazy'; load: () => string[] }
  /** No candidate list at all: every query spawns its own search (grep). */
  | { kind: 'streaming' }
  /** Answers come from a long-lived worker over the RPC protocol. */
  | { kind: 'rpc'; method: string };

export interface ModeState {
  source: Source;
  /** Candidate count if known: static length, forerunner total, last lazy load. */
  knownSize?: number;
  threshold: number;
  forceMode?: FilterMode;
}

export function selectMode(state: ModeState): FilterMode {
  const { source } = state;
  if (source.kind === 'streaming' || source.kind === 'rpc') return 'async';

  // An unlisted command has to run before its size is known.
  const size = state.knownSize ?? knownSizeOf(source);
  if (size === undefined ? source.kind === 'command' : size > state.threshold) return 'async';

  if (state.forceMode) return state.forceMode;
  return 'sync';
}

/** Size that can be read off the source without running anything. */
export function knownSizeOf(source: Source): number | undefined {
  switch (source.kind) {
    case 'static':
      return source.lines.length;
    case 'lazy':
    case 'command':
    case 'streaming':
    case 'rpc':
      return undefined;
  }
}
