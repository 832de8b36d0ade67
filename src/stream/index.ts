export {
  ResultStream,
  type OverflowPolicy,
  type SplitResult,
  type ResultStreamSnapshot,
} from './result-stream.js';
export { formatIndicator } from './indicator.js';
