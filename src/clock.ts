// src/clock.ts
import { PreconditionError } from './errors';

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

// Test/replay clock: time only moves when told to.
export class VirtualClock implements Clock {
  private ts: number;

  constructor(startTs: number) {
    this.ts = startTs;
  }

  now(): number {
    return this.ts;
  }

  set(ts: number): void {
    if (ts < this.ts) {
      throw new PreconditionError(`VirtualClock cannot move backwards (${this.ts} -> ${ts})`);
    }
    this.ts = ts;
  }

  advance(ms: number): number {
    this.set(this.ts + ms);
    return this.ts;
  }
}
