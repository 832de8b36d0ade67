/**
 * Stream framing: newline records and Content-Length frames.
 */

export { LineFramer } from './line-framer.js';
export {
  ContentLengthFramer,
  encodeContentLength,
  type ContentLengthFramerOptions,
} from './content-length.js';
