import { describe, it, expect } from 'vitest';
import { CandleAggregator } from '../src/candleAggregator';
import { VolatilityEstimator, trueRange } from '../src/volatility';
import { MINUTE_MS } from '../src/sessionTime';
import type { Candle } from '../src/types';
import { CAPTURE_END_TS, buildTick } from './fixtures';

const candle = (high: number, low: number, close: number): Candle => ({
  instrumentId: 'NIFTY',
  startTs: 0,
  endTs: 1,
  open: close,
  high,
  low,
  close,
  volume: 0,
  captured: true,
});

describe('trueRange', () => {
  it('is high minus low without a previous close', () => {
    expect(trueRange(candle(110, 100, 105), null)).toBe(10);
  });

  it('includes the gap from the previous close', () => {
    expect(trueRange(candle(110, 100, 105), 120)).toBe(20);
    expect(trueRange(candle(110, 100, 105), 95)).toBe(15);
  });
});

describe('VolatilityEstimator', () => {
  it('returns the fallback until the period is filled', () => {
    const vol = new VolatilityEstimator(3, 25);
    vol.addCandle(candle(110, 100, 105));
    vol.addCandle(candle(108, 102, 104));
    expect(vol.isWarm).toBe(false);
    expect(vol.currentATR()).toBe(25);
  });

  it('averages the last `period` true ranges once warm', () => {
    const vol = new VolatilityEstimator(3, 25);
    expect(vol.addCandle(candle(110, 100, 105))).toBe(10);
    expect(vol.addCandle(candle(108, 102, 104))).toBe(6);
    expect(vol.addCandle(candle(112, 104, 110))).toBe(8);
    expect(vol.currentATR()).toBe(8);

    // 10 drops out of the ring: (6 + 8 + 4) / 3
    expect(vol.addCandle(candle(112, 108, 111))).toBe(4);
    expect(vol.currentATR()).toBe(6);
    expect(vol.sampleCount).toBe(3);
  });
});

describe('CandleAggregator', () => {
  const interval = 5 * MINUTE_MS;

  it('emits a candle when a tick opens the next bucket', () => {
    const agg = new CandleAggregator('NIFTY', CAPTURE_END_TS, interval);
    expect(agg.addTick(buildTick(100, CAPTURE_END_TS + MINUTE_MS, { volume: 2 }))).toBeNull();
    expect(agg.addTick(buildTick(104, CAPTURE_END_TS + 2 * MINUTE_MS, { volume: 3 }))).toBeNull();
    expect(agg.addTick(buildTick(98, CAPTURE_END_TS + 3 * MINUTE_MS, { volume: 1 }))).toBeNull();

    const done = agg.addTick(buildTick(101, CAPTURE_END_TS + interval));
    expect(done).toEqual({
      instrumentId: 'NIFTY',
      startTs: CAPTURE_END_TS,
      endTs: CAPTURE_END_TS + interval,
      open: 100,
      high: 104,
      low: 98,
      close: 98,
      volume: 6,
      captured: true,
    });
  });

  it('flushes a bucket that ended without a newer tick', () => {
    const agg = new CandleAggregator('NIFTY', CAPTURE_END_TS, interval);
    agg.addTick(buildTick(100, CAPTURE_END_TS + MINUTE_MS));
    expect(agg.flush(CAPTURE_END_TS + interval - 1)).toBeNull();
    expect(agg.flush(CAPTURE_END_TS + interval)?.close).toBe(100);
    expect(agg.flush(CAPTURE_END_TS + 2 * interval)).toBeNull();
  });
});
