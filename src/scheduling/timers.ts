/**
 * Timer host abstraction so debouncing can run on a fake clock.
 */

export type TimerHandle = ReturnType<typeof setTimeout> | number;

export interface TimerHost {
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
  clearTimeout(handle: TimerHandle): void;
  now(): number;
}

export const nodeTimers: TimerHost = {
  setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
  clearTimeout: (handle) => clearTimeout(handle),
  now: () => Date.now(),
};
