import { describe, it, expect } from 'vitest';
import { ClockGate } from '../src/clockGate';
import { InsufficientDataError, PreconditionError } from '../src/errors';
import { OpeningRangeCapture } from '../src/openingRange';
import { DEFAULT_CONFIG } from '../src/config';
import { CAPTURE_END_TS, OPEN_TS, SESSION_DATE, at, buildTick } from './fixtures';

const newCapture = () =>
  new OpeningRangeCapture('NIFTY', ClockGate.forSession(OPEN_TS, DEFAULT_CONFIG.session, SESSION_DATE));

describe('OpeningRangeCapture', () => {
  it('builds the opening candle from ticks inside the window', () => {
    const capture = newCapture();
    expect(capture.addTick(buildTick(100, at(0.5), { volume: 5 }))).toBe('CAPTURING');
    capture.addTick(buildTick(105, at(2), { volume: 7 }));
    capture.addTick(buildTick(99, at(3), { volume: 3 }));
    capture.addTick(buildTick(102, at(4.9), { volume: 1 }));

    const candle = capture.close(CAPTURE_END_TS);
    expect(candle).toEqual({
      instrumentId: 'NIFTY',
      startTs: OPEN_TS,
      endTs: CAPTURE_END_TS,
      open: 100,
      high: 105,
      low: 99,
      close: 102,
      volume: 16,
      captured: true,
    });
    expect(capture.isCaptured).toBe(true);
  });

  it('reports the window closed for a tick at the window end', () => {
    const capture = newCapture();
    capture.addTick(buildTick(100, at(1)));
    expect(capture.addTick(buildTick(120, CAPTURE_END_TS))).toBe('WINDOW_CLOSED');
    expect(capture.close(CAPTURE_END_TS).high).toBe(100);
  });

  it('ignores ticks from before the open', () => {
    const capture = newCapture();
    capture.addTick(buildTick(90, OPEN_TS - 1));
    capture.addTick(buildTick(100, at(1)));
    expect(capture.close(CAPTURE_END_TS).low).toBe(100);
  });

  it('leaves the frozen candle untouched by later ticks', () => {
    const capture = newCapture();
    capture.addTick(buildTick(100, at(1)));
    const first = capture.close(CAPTURE_END_TS);
    expect(capture.addTick(buildTick(200, at(1)))).toBe('WINDOW_CLOSED');
    expect(capture.close(CAPTURE_END_TS + 1)).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('fails with InsufficientDataError when no tick arrived', () => {
    expect(() => newCapture().close(CAPTURE_END_TS)).toThrow(InsufficientDataError);
  });

  it('refuses to hand out the candle before capture', () => {
    expect(() => newCapture().candle).toThrow(PreconditionError);
  });
});
