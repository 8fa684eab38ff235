// src/volatility.ts
import type { Candle } from './types';

export const trueRange = (candle: Candle, prevClose: number | null): number => {
  const highLow = candle.high - candle.low;
  if (prevClose === null) return highLow;
  return Math.max(highLow, Math.abs(candle.high - prevClose), Math.abs(candle.low - prevClose));
};

/**
 * Rolling ATR over a fixed-size ring of true ranges. Until the ring is full
 * currentATR() returns the configured fallback.
 */
export class VolatilityEstimator {
  private readonly period: number;
  private readonly fallback: number;
  private readonly ring: number[];
  private next = 0;
  private count = 0;
  private sum = 0;
  private prevClose: number | null = null;

  constructor(period: number, fallback: number) {
    this.period = Math.max(1, Math.floor(period));
    this.fallback = fallback;
    this.ring = new Array<number>(this.period).fill(0);
  }

  addCandle(candle: Candle): number {
    const tr = trueRange(candle, this.prevClose);
    this.prevClose = candle.close;

    if (this.count === this.period) {
      this.sum -= this.ring[this.next];
    } else {
      this.count += 1;
    }
    this.ring[this.next] = tr;
    this.sum += tr;
    this.next = (this.next + 1) % this.period;
    return tr;
  }

  get sampleCount(): number {
    return this.count;
  }

  get isWarm(): boolean {
    return this.count === this.period;
  }

  currentATR(): number {
    if (!this.isWarm) return this.fallback;
    return this.sum / this.period;
  }
}
