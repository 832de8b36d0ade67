/**
 * Manual clock implementing TimerHost.
 */
import type { TimerHandle, TimerHost } from '../../src/scheduling/timers.js';

interface FakeTimer {
  at: number;
  callback: () => void;
}

export class FakeTimers implements TimerHost {
  private current = 0;
  private nextId = 1;
  private readonly timers = new Map<number, FakeTimer>();

  setTimeout(callback: () => void, delayMs: number): TimerHandle {
    const id = this.nextId++;
    this.timers.set(id, { at: this.current + delayMs, callback });
    return id;
  }

  clearTimeout(handle: TimerHandle): void {
    if (typeof handle === 'number') this.timers.delete(handle);
  }

  now(): number {
    return this.current;
  }

  /** Move the clock forward, firing due timers in deadline order. */
  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      let nextId: number | undefined;
      let next: FakeTimer | undefined;
      for (const [id, timer] of this.timers) {
        if (timer.at <= target && (!next || timer.at < next.at)) {
          nextId = id;
          next = timer;
        }
      }
      if (nextId === undefined || !next) break;
      this.timers.delete(nextId);
      this.current = next.at;
      next.callback();
    }
    this.current = target;
  }

  get pendingCount(): number {
    return this.timers.size;
  }
}
