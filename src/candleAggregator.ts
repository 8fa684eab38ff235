// src/candleAggregator.ts
import type { Candle, Tick } from './types';

/**
 * Buckets post-capture ticks into fixed-interval candles aligned to the end
 * of the opening range. Returns a CLOSED candle when a tick lands in a later
 * bucket (or when flush() sees the bucket has ended).
 */
export class CandleAggregator {
  private readonly instrumentId: string;
  private readonly originTs: number;
  private readonly intervalMs: number;
  private bucketStartTs: number | null = null;
  private cur: Candle | null = null;

  constructor(instrumentId: string, originTs: number, intervalMs: number) {
    this.instrumentId = instrumentId;
    this.originTs = originTs;
    this.intervalMs = intervalMs;
  }

  private floorToBucket(ts: number): number {
    return this.originTs + Math.floor((ts - this.originTs) / this.intervalMs) * this.intervalMs;
  }

  private startBucket(start: number, tick: Tick): void {
    this.bucketStartTs = start;
    this.cur = {
      instrumentId: this.instrumentId,
      startTs: start,
      endTs: start + this.intervalMs,
      open: tick.price,
      high: tick.price,
      low: tick.price,
      close: tick.price,
      volume: tick.volume,
      captured: true,
    };
  }

  addTick(tick: Tick): Candle | null {
    if (tick.ts < this.originTs) return null;
    const start = this.floorToBucket(tick.ts);
    const c = this.cur;

    if (c === null || this.bucketStartTs === null) {
      this.startBucket(start, tick);
      return null;
    }

    if (start !== this.bucketStartTs) {
      const finished = Object.freeze(c);
      this.startBucket(start, tick);
      return finished;
    }

    c.high = Math.max(c.high, tick.price);
    c.low = Math.min(c.low, tick.price);
    c.close = tick.price;
    c.volume += tick.volume;
    return null;
  }

  // Closes the current candle if its bucket has ended without a newer tick.
  flush(now: number): Candle | null {
    const c = this.cur;
    if (c === null || now < c.endTs) return null;
    this.cur = null;
    this.bucketStartTs = null;
    return Object.freeze(c);
  }
}
