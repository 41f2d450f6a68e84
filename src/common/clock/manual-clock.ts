import { Clock } from './clock';

/**
 * Clock that only moves when told to. Used by tests and by tooling that
 * replays recorded traffic.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
