/**
 * RPC framing codec.
 * Chooses between JSON-per-line and Content-Length framing.
 */
import { ContentLengthFramer, LineFramer, encodeContentLength } from '../framing/index.js';
import type { RpcFraming } from './types.js';

export interface FrameDecoder {
  /** Complete message bodies found in this chunk. */
  feed(chunk: Buffer | string): string[];
}

export function createFrameDecoder(framing: RpcFraming, onInvalidHeader?: (header: string) => void): FrameDecoder {
  if (framing === 'content-length') {
    return new ContentLengthFramer({ onInvalidHeader });
  }
  const framer = new LineFramer();
  return {
    feed: (chunk) => framer.feed(chunk).filter((line) => line.trim().length > 0),
  };
}

export function encodeFrame(framing: RpcFraming, message: unknown): string {
  const body = JSON.stringify(message);
  return framing === 'content-length' ? encodeContentLength(body) : `${body}\n`;
}
