/**
 * Tests for src/errors.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DecodeError,
  SearchError,
  SpawnFailureError,
  StreamError,
  formatDiagnostic,
  isSearchError,
  toDiagnostic,
} from '../src/errors.js';

const rg = { argv: ['rg', '--files'], cwd: '/proj' };

describe('error types', () => {
  it('should name the executable that failed to spawn', () => {
    const err = new SpawnFailureError(rg, 'spawn rg ENOENT');
    assert.strictEqual(err.code, 'SPAWN_FAILURE');
    assert.strictEqual(err.message, 'Failed to spawn rg: spawn rg ENOENT');
    assert.ok(isSearchError(err));
  });

  it('should use stderr as the stream error message', () => {
    assert.strictEqual(new StreamError(rg, '  rg: bad flag \n').message, 'rg: bad flag');
  });

  it('should fall back to the exit code without stderr', () => {
    const err = new StreamError(rg, '', 2);
    assert.strictEqual(err.message, 'exited with code 2');
    assert.strictEqual(err.exitCode, 2);
  });

  it('should keep the raw text of a decode error', () => {
    const err = new DecodeError('Invalid JSON from worker', '{x');
    assert.strictEqual(err.code, 'DECODE_ERROR');
    assert.strictEqual(err.raw, '{x');
  });

  it('should not treat plain errors as search errors', () => {
    assert.strictEqual(isSearchError(new Error('x')), false);
  });
});

describe('toDiagnostic', () => {
  it('should prefer the command carried by the error', () => {
    const diagnostic = toDiagnostic(new StreamError(rg, 'denied'), { argv: ['other'], cwd: '/' });
    assert.deepStrictEqual(diagnostic, { command: 'rg --files', cwd: '/proj', message: 'denied' });
  });

  it('should use the fallback context for other errors', () => {
    const diagnostic = toDiagnostic(new SearchError('STREAM_ERROR', 'worker gone'), { argv: ['filer'], cwd: '/w' });
    assert.deepStrictEqual(diagnostic, { command: 'filer', cwd: '/w', message: 'worker gone' });
  });

  it('should stringify thrown non-errors', () => {
    assert.strictEqual(toDiagnostic('boom', rg).message, 'boom');
  });
});

describe('formatDiagnostic', () => {
  it('should put message, command and directory first', () => {
    assert.deepStrictEqual(formatDiagnostic({ command: 'rg --files', cwd: '/proj', message: 'denied' }), [
      'Error: denied',
      'Command: rg --files',
      'Cwd: /proj',
    ]);
  });

  it('should append further message lines, skipping blank ones', () => {
    const lines = formatDiagnostic({ command: 'rg', cwd: '/', message: 'first\n\nsecond\nthird' });
    assert.deepStrictEqual(lines, ['Error: first', 'Command: rg', 'Cwd: /', 'second', 'third']);
  });
});
