// src/breakoutLevels.ts
import { PreconditionError } from './errors';
import type { BreakoutLevel, Candle } from './types';

export const computeBreakoutLevel = (candle: Candle, buffer: number): BreakoutLevel => {
  if (!candle.captured) {
    throw new PreconditionError(`${candle.instrumentId} breakout level requested before capture`);
  }
  if (!Number.isFinite(buffer)) {
    throw new PreconditionError(`${candle.instrumentId} breakout buffer must be finite, got ${buffer}`);
  }

  return Object.freeze({
    instrumentId: candle.instrumentId,
    upper: candle.high + buffer,
    lower: candle.low - buffer,
    buffer,
    candle,
  });
};
