/**
 * Debounce Scheduler
 *
 * Coalesces a burst of query edits into one Job start: each `schedule`
 * replaces the previous pending action, so only the last edit of a burst
 * shorter than `delay` ever runs.
 */
import { nodeTimers, type TimerHandle, type TimerHost } from './timers.js';

interface PendingTimer {
  handle: TimerHandle;
  deadline: number;
  action: () => void;
}

export class Debouncer {
  private pending: PendingTimer | null = null;
  private readonly timers: TimerHost;

  constructor(timers: TimerHost = nodeTimers) {
    this.timers = timers;
  }

  schedule(delayMs: number, action: () => void): void {
    this.cancel();
    const entry: PendingTimer = {
      deadline: this.timers.now() + delayMs,
      action,
      handle: this.timers.setTimeout(() => this.fire(entry), delayMs),
    };
    this.pending = entry;
  }

  /** Drop the pending action without running it. */
  cancel(): boolean {
    if (!this.pending) return false;
    this.timers.clearTimeout(this.pending.handle);
    this.pending = null;
    return true;
  }

  /** Run the pending action now instead of at its deadline. */
  flush(): boolean {
    const entry = this.pending;
    if (!entry) return false;
    this.timers.clearTimeout(entry.handle);
    this.fire(entry);
    return true;
  }

  get isPending(): boolean {
    return this.pending !== null;
  }

  get deadline(): number | undefined {
    return this.pending?.deadline;
  }

  private fire(entry: PendingTimer): void {
    // A replaced timer that fires late must not run the newer action.
    if (this.pending !== entry) return;
    this.pending = null;
    entry.action();
  }
}
