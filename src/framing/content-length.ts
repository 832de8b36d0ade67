/**
 * Content-Length Framer
 *
 * HTTP-header style framing for payloads that may span several lines:
 *
 *   Content-Length: 17\n
 *   \n
 *   {"id":1,"x":"y"}\n
 *
 * Both `\n\n` and `\r\n\r\n` end the header. The length counts UTF-8 bytes
 * of the body. Line breaks between messages are skipped.
 */

const LF = 0x0a;
const CR = 0x0d;
const HEADER_PATTERN = /content-length:\s*(\d+)/i;

export interface ContentLengthFramerOptions {
  /** Called with the raw header when it carries no usable length. */
  onInvalidHeader?: (header: string) => void;
}

export class ContentLengthFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly onInvalidHeader?: (header: string) => void;

  constructor(options: ContentLengthFramerOptions = {}) {
    this.onInvalidHeader = options.onInvalidHeader;
  }

  feed(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const messages: string[] = [];
    for (;;) {
      this.skipLineBreaks();
      const end = findHeaderEnd(this.buffer);
      if (!end) break;

      const header = this.buffer.subarray(0, end.index).toString('ascii');
      const match = HEADER_PATTERN.exec(header);
      if (!match) {
        this.buffer = this.buffer.subarray(end.index + end.length);
        this.onInvalidHeader?.(header);
        continue;
      }

      const bodyStart = end.index + end.length;
      const bodyLength = Number(match[1]);
      if (this.buffer.length < bodyStart + bodyLength) break;

      messages.push(this.buffer.subarray(bodyStart, bodyStart + bodyLength).toString('utf8'));
      this.buffer = this.buffer.subarray(bodyStart + bodyLength);
    }
    return messages;
  }

  /** Drops any partial frame. Returns the number of bytes discarded. */
  flush(): number {
    const discarded = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    return discarded;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  private skipLineBreaks(): void {
    let start = 0;
    while (start < this.buffer.length && (this.buffer[start] === LF || this.buffer[start] === CR)) {
      start++;
    }
    if (start > 0) this.buffer = this.buffer.subarray(start);
  }
}

function findHeaderEnd(buffer: Buffer): { index: number; length: number } | null {
  const crlf = buffer.indexOf('\r\n\r\n');
  const lf = buffer.indexOf('\n\n');
  if (crlf === -1 && lf === -1) return null;
  if (lf === -1 || (crlf !== -1 && crlf < lf)) return { index: crlf, length: 4 };
  return { index: lf, length: 2 };
}

/** Frame one message body. */
export function encodeContentLength(body: string): string {
  return `Content-Length: ${Buffer.byteLength(body, 'utf8')}\n\n${body}\n`;
}
