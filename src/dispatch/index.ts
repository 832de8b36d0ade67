export {
  Dispatcher,
  type DispatcherOptions,
  type DispatcherState,
  type DispatcherStats,
} from './dispatcher.js';
export { MemoryDisplay, type Display, type DisplaySnapshot, type DisplayStatus } from './display.js';
export {
  createFuzzyMatcher,
  createMatcher,
  createRegexMatcher,
  createSubstringMatcher,
  type CaseMode,
  type Matcher,
  type MatcherName,
} from './matcher.js';
export { knownSizeOf, selectMode, type FilterMode, type ModeState, type Source } from './mode-selector.js';
