/**
 * Tests for src/stream/result-stream.ts and src/stream/indicator.ts
 * Preload/cache split and the match-count indicator.
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ResultStream } from '../../src/stream/result-stream.js';
import { formatIndicator } from '../../src/stream/indicator.js';

function conserved(stream: ResultStream): boolean {
  return stream.loadedSize + stream.cache.length + stream.droppedSize === stream.total;
}

describe('ResultStream', () => {
  it('should display lines up to capacity and cache the rest', () => {
    const stream = new ResultStream(3);
    const result = stream.accept(['a', 'ab', 'abc', 'abcd']);
    assert.deepStrictEqual(result, { toDisplay: ['a', 'ab', 'abc'], newlyCached: 1, newlyDropped: 0 });
    assert.strictEqual(stream.loadedSize, 3);
    assert.deepStrictEqual(stream.cache, ['abcd']);
    assert.strictEqual(stream.droppedSize, 0);
  });

  it('should defer a whole batch once full', () => {
    const stream = new ResultStream(2);
    stream.accept(['1', '2']);
    assert.strictEqual(stream.isFull, true);
    const result = stream.accept(['3', '4']);
    assert.deepStrictEqual(result.toDisplay, []);
    assert.strictEqual(result.newlyCached, 2);
    assert.deepStrictEqual(stream.cache, ['3', '4']);
  });

  it('should only count overflow under the drop policy', () => {
    const stream = new ResultStream(2, 'drop');
    const result = stream.accept(['1', '2', '3', '4', '5']);
    assert.deepStrictEqual(result, { toDisplay: ['1', '2'], newlyCached: 0, newlyDropped: 3 });
    assert.deepStrictEqual(stream.cache, []);
    assert.strictEqual(stream.droppedSize, 3);
    assert.strictEqual(stream.deferredSize, 3);
  });

  it('should conserve every line across batches', () => {
    for (const policy of ['cache', 'drop'] as const) {
      const stream = new ResultStream(5, policy);
      const batches = [['a', 'b'], [], ['c', 'd', 'e', 'f'], ['g'], ['h', 'i', 'j']];
      let fed = 0;
      for (const batch of batches) {
        stream.accept(batch);
        fed += batch.length;
        assert.strictEqual(stream.total, fed);
        assert.ok(conserved(stream), `${policy} after ${fed} lines`);
      }
      assert.strictEqual(stream.loadedSize, 5);
    }
  });

  it('should hand out cached lines oldest first', () => {
    const stream = new ResultStream(1);
    stream.accept(['x', 'y', 'z']);
    assert.deepStrictEqual(stream.takeCached(1), ['y']);
    assert.deepStrictEqual(stream.takeCached(5), ['z']);
    assert.deepStrictEqual(stream.takeCached(5), []);
    assert.strictEqual(stream.loadedSize, 3);
    assert.ok(conserved(stream));
  });

  it('should start over on reset', () => {
    const stream = new ResultStream(1, 'drop');
    stream.accept(['a', 'b']);
    stream.reset();
    assert.deepStrictEqual(stream.snapshot(), { loadedSize: 0, cachedSize: 0, droppedSize: 0, total: 0 });
    assert.deepStrictEqual(stream.accept(['c']).toDisplay, ['c']);
  });

  it('should reject a negative capacity', () => {
    assert.throws(() => new ResultStream(-1), /non-negative integer/);
    assert.throws(() => new ResultStream(1.5), /non-negative integer/);
  });
});

describe('formatIndicator', () => {
  it('should show only the displayed count when the total is unknown or equal', () => {
    assert.strictEqual(formatIndicator(3), '3');
    assert.strictEqual(formatIndicator(3, 3), '3');
  });

  it('should show displayed/total otherwise', () => {
    assert.strictEqual(formatIndicator(100, 2500), '100/2500');
    assert.strictEqual(formatIndicator(0, 12), '0/12');
  });
});
