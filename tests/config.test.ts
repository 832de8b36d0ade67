/**
 * Tests for src/config.ts
 */
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';
import {
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_PRELOAD_CAPACITY,
  ENGINE_THRESHOLDS,
  cacheDbPath,
  defaultConfig,
  loadConfig,
  spillDir,
  thresholdFor,
} from '../src/config.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});
    assert.strictEqual(config.preloadCapacity, DEFAULT_PRELOAD_CAPACITY);
    assert.strictEqual(config.debounceMs, DEFAULT_DEBOUNCE_MS);
    assert.strictEqual(config.engine, 'builtin');
    assert.deepStrictEqual(config.engineCommand, ['maple', 'filter']);
    assert.strictEqual(config.rpcFraming, 'content-length');
    assert.strictEqual(config.debug, false);
  });

  it('should read and coerce environment overrides', () => {
    const config = loadConfig({
      SWIFTPICK_PRELOAD_CAPACITY: '25',
      SWIFTPICK_DEBOUNCE_MS: ' 80 ',
      SWIFTPICK_ENGINE: 'native',
      SWIFTPICK_ENGINE_COMMAND: 'fzy-filter  --fast',
      SWIFTPICK_DEBUG: 'yes',
    });
    assert.strictEqual(config.preloadCapacity, 25);
    assert.strictEqual(config.debounceMs, 80);
    assert.strictEqual(config.engine, 'native');
    assert.deepStrictEqual(config.engineCommand, ['fzy-filter', '--fast']);
    assert.strictEqual(config.debug, true);
  });

  it('should ignore blank variables', () => {
    assert.strictEqual(loadConfig({ SWIFTPICK_DEBOUNCE_MS: '   ' }).debounceMs, DEFAULT_DEBOUNCE_MS);
  });

  it('should name every invalid variable', () => {
    assert.throws(
      () => loadConfig({ SWIFTPICK_PRELOAD_CAPACITY: '-1', SWIFTPICK_ENGINE: 'gpu' }),
      (err: unknown) =>
        err instanceof Error &&
        err.message.startsWith('Invalid configuration: ') &&
        err.message.includes('SWIFTPICK_PRELOAD_CAPACITY: ') &&
        err.message.includes('SWIFTPICK_ENGINE: '),
    );
  });
});

describe('config helpers', () => {
  it('should pick the threshold of the configured engine', () => {
    const config = defaultConfig();
    assert.strictEqual(thresholdFor(config), ENGINE_THRESHOLDS.builtin);
    assert.strictEqual(thresholdFor(config, 'native'), ENGINE_THRESHOLDS.native);
    assert.strictEqual(thresholdFor({ ...config, engine: 'native', nativeThreshold: 7 }), 7);
  });

  it('should place the cache and spill files under the data directory', () => {
    const config = { ...defaultConfig(), dataDir: '/data' };
    assert.strictEqual(cacheDbPath(config), join('/data', 'cache.db'));
    assert.strictEqual(spillDir(config), join('/data', 'spill'));
  });
});
