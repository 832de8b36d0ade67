/**
 * Line Framer
 * Splits a process output stream into newline-delimited records.
 */
import { StringDecoder } from 'string_decoder';

export class LineFramer {
  private decoder = new StringDecoder('utf8');
  private tail = '';

  /**
   * Feed one chunk of raw output. Returns the complete lines found so far;
   * an unterminated tail is held until the next chunk or `flush()`.
   */
  feed(chunk: Buffer | string): string[] {
    const text = typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    if (text.length === 0) return [];

    const parts = (this.tail + text).split('\n');
    this.tail = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  /**
   * Emit whatever is buffered as a final record. Called once the process
   * has exited, since the last line may lack a terminator.
   */
  flush(): string[] {
    const rest = this.tail + this.decoder.end();
    this.tail = '';
    this.decoder = new StringDecoder('utf8');
    return rest.length > 0 ? [stripCarriageReturn(rest)] : [];
  }

  /** Bytes decoded but not yet emitted. */
  get pending(): string {
    return this.tail;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
