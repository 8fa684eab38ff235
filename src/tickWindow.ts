// src/tickWindow.ts
import type { Tick } from './types';

// Latest `capacity` ticks of one instrument, oldest first.
export class TickWindow {
  private readonly capacity: number;
  private readonly items: Tick[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  push(tick: Tick): void {
    this.items.push(tick);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  // Last n ticks (current one included), oldest first.
  last(n: number): readonly Tick[] {
    return n <= 0 ? [] : this.items.slice(-n);
  }
}
