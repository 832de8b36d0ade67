/**
 * Tests for src/validation.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MAX_QUERY_LENGTH } from '../src/config.js';
import { validateArgv, validateCapacity, validateQuery } from '../src/validation.js';

describe('validation', () => {
  it('should accept queries up to the maximum length', () => {
    const longest = 'q'.repeat(MAX_QUERY_LENGTH);
    assert.strictEqual(validateQuery(longest), longest);
    assert.throws(() => validateQuery(longest + 'q'), /exceeds maximum length of 1024/);
  });

  it('should validate command argv', () => {
    assert.deepStrictEqual(validateArgv(['rg', '--files']), ['rg', '--files']);
    assert.throws(() => validateArgv([]), /at least one element/);
    assert.throws(() => validateArgv(['  ']), /must not be empty/);
  });

  it('should validate capacity', () => {
    assert.strictEqual(validateCapacity(0), 0);
    assert.throws(() => validateCapacity(1.5), /non-negative integer, got 1.5/);
    assert.throws(() => validateCapacity(-2), /got -2/);
  });
});
