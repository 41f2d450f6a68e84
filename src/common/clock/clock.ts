/**
 * Time source injected into every component that compares timestamps.
 * Stores and the reaper never read the system clock directly.
 */
export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const CLOCK = Symbol('CLOCK');

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}
