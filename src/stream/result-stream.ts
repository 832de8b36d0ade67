/**
 * Preload/Cache Splitter
 *
 * Bounds how many result lines reach the live display. Lines beyond the
 * preload capacity are either cached for a later "load more" or dropped and
 * only counted, depending on the overflow policy chosen for the Job.
 *
 * Invariant: loadedSize + cache.length + droppedSize === total
 */
import { validateCapacity } from '../validation.js';

export type OverflowPolicy = 'cache' | 'drop';

export interface SplitResult {
  toDisplay: string[];
  newlyCached: number;
  newlyDropped: number;
}

export interface ResultStreamSnapshot {
  loadedSize: number;
  cachedSize: number;
  droppedSize: number;
  total: number;
}

export class ResultStream {
  readonly capacity: number;
  readonly policy: OverflowPolicy;

  private _loadedSize = 0;
  private _droppedSize = 0;
  private _total = 0;
  private _cache: string[] = [];

  constructor(capacity: number, policy: OverflowPolicy = 'cache') {
    this.capacity = validateCapacity(capacity);
    this.policy = policy;
  }

  accept(lines: readonly string[]): SplitResult {
    const room = Math.max(0, this.capacity - this._loadedSize);
    const toDisplay = lines.slice(0, room);
    const deferred = lines.length - toDisplay.length;

    this._loadedSize += toDisplay.length;
    this._total += lines.length;

    if (deferred === 0) {
      return { toDisplay, newlyCached: 0, newlyDropped: 0 };
    }
    if (this.policy === 'drop') {
      this._droppedSize += deferred;
      return { toDisplay, newlyCached: 0, newlyDropped: deferred };
    }
    for (let i = toDisplay.length; i < lines.length; i++) {
      this._cache.push(lines[i]);
    }
    return { toDisplay, newlyCached: deferred, newlyDropped: 0 };
  }

  /** Move up to `count` cached lines to the display, oldest first. */
  takeCached(count: number): string[] {
    if (count <= 0 || this._cache.length === 0) return [];
    const taken = this._cache.splice(0, count);
    this._loadedSize += taken.length;
    return taken;
  }

  /** Start over for a new generation. */
  reset(): void {
    this._loadedSize = 0;
    this._droppedSize = 0;
    this._total = 0;
    this._cache = [];
  }

  get loadedSize(): number {
    return this._loadedSize;
  }

  get droppedSize(): number {
    return this._droppedSize;
  }

  get total(): number {
    return this._total;
  }

  get cache(): readonly string[] {
    return this._cache;
  }

  /** Lines received but not displayed. */
  get deferredSize(): number {
    return this._cache.length + this._droppedSize;
  }

  get isFull(): boolean {
    return this._loadedSize >= this.capacity;
  }

  snapshot(): ResultStreamSnapshot {
    return {
      loadedSize: this._loadedSize,
      cachedSize: this._cache.length,
      droppedSize: this._droppedSize,
      total: this._total,
    };
  }
}
