// src/openingRange.ts
import type { ClockGate } from './clockGate';
import { InsufficientDataError, PreconditionError } from './errors';
import { logState } from './logger';
import type { Candle, Tick } from './types';

export type CaptureStatus = 'CAPTURING' | 'WINDOW_CLOSED';

interface RangeAccumulator {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  ticks: number;
}

/**
 * Builds the opening candle for one instrument from the ticks that arrive
 * inside the capture window. Once frozen it ignores every further tick.
 */
export class OpeningRangeCapture {
  readonly instrumentId: string;
  private readonly gate: ClockGate;
  private acc: RangeAccumulator | null = null;
  private frozen: Candle | null = null;

  constructor(instrumentId: string, gate: ClockGate) {
    this.instrumentId = instrumentId;
    this.gate = gate;
  }

  get isCaptured(): boolean {
    return this.frozen !== null;
  }

  get candle(): Candle {
    if (!this.frozen) {
      throw new PreconditionError(`${this.instrumentId} opening candle not captured yet`);
    }
    return this.frozen;
  }

  addTick(tick: Tick): CaptureStatus {
    if (this.frozen) return 'WINDOW_CLOSED';
    if (this.gate.isCaptureWindowClosed(tick.ts)) return 'WINDOW_CLOSED';
    if (tick.ts < this.gate.sessionOpenTs) {
      logState('Pre-open tick ignored', { instrumentId: this.instrumentId, ts: tick.ts });
      return 'CAPTURING';
    }

    const acc = this.acc;
    if (!acc) {
      this.acc = {
        open: tick.price,
        high: tick.price,
        low: tick.price,
        close: tick.price,
        volume: tick.volume,
        ticks: 1,
      };
      return 'CAPTURING';
    }

    acc.high = Math.max(acc.high, tick.price);
    acc.low = Math.min(acc.low, tick.price);
    acc.close = tick.price;
    acc.volume += tick.volume;
    acc.ticks += 1;
    return 'CAPTURING';
  }

  // Freezes the candle; repeated calls return the same candle.
  close(now: number): Candle {
    if (this.frozen) return this.frozen;

    const acc = this.acc;
    if (!acc) {
      throw new InsufficientDataError(
        this.instrumentId,
        `${this.instrumentId} capture window closed with no ticks`,
      );
    }

    this.frozen = Object.freeze({
      instrumentId: this.instrumentId,
      startTs: this.gate.sessionOpenTs,
      endTs: this.gate.captureWindowEnd,
      open: acc.open,
      high: acc.high,
      low: acc.low,
      close: acc.close,
      volume: acc.volume,
      captured: true,
    });

    logState('Opening candle captured', {
      instrumentId: this.instrumentId,
      open: acc.open,
      high: acc.high,
      low: acc.low,
      close: acc.close,
      volume: acc.volume,
      ticks: acc.ticks,
      closedAt: now,
    });
    return this.frozen;
  }
}
