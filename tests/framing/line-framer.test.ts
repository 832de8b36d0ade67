/**
 * Tests for src/framing/line-framer.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { LineFramer } from '../../src/framing/line-framer.js';

describe('LineFramer', () => {
  it('should return every complete line of a chunk', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed('a\nb\n'), ['a', 'b']);
    assert.strictEqual(framer.pending, '');
  });

  it('should hold an unterminated tail until the next chunk', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed('ab'), []);
    assert.strictEqual(framer.pending, 'ab');
    assert.deepStrictEqual(framer.feed('c\nd'), ['abc']);
    assert.strictEqual(framer.pending, 'd');
  });

  it('should emit the tail on flush', () => {
    const framer = new LineFramer();
    framer.feed('one\ntwo');
    assert.deepStrictEqual(framer.flush(), ['two']);
    assert.deepStrictEqual(framer.flush(), []);
  });

  it('should not emit a line twice', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed('last\n'), ['last']);
    assert.deepStrictEqual(framer.flush(), []);
  });

  it('should keep empty lines in place', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed('a\n\nb\n'), ['a', '', 'b']);
  });

  it('should strip carriage returns', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed('x\r\ny\r\n'), ['x', 'y']);
    framer.feed('z\r');
    assert.deepStrictEqual(framer.flush(), ['z']);
  });

  it('should decode a multi-byte character split across chunks', () => {
    const framer = new LineFramer();
    assert.deepStrictEqual(framer.feed(Buffer.from([0x61, 0xc3])), []);
    assert.deepStrictEqual(framer.feed(Buffer.from([0xa9, 0x0a])), ['aé']);
  });

  it('should preserve order across many small chunks', () => {
    const framer = new LineFramer();
    const out: string[] = [];
    for (const ch of 'l1\nl2\nl3\nl4') out.push(...framer.feed(ch));
    out.push(...framer.flush());
    assert.deepStrictEqual(out, ['l1', 'l2', 'l3', 'l4']);
  });
});
