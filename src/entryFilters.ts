// src/entryFilters.ts
import { AmbiguousSignalError } from './errors';
import { logEvent } from './logger';
import type {
  EntryFilterSpec,
  EntryPremiumFilterSpec,
  MomentumFilterSpec,
  VolumeFilterSpec,
} from './config';
import type { BreakoutLevel, Direction, Tick } from './types';

export type EntrySignal = 'NONE' | Direction;

export interface EntryFilterContext {
  tick: Tick;
  direction: Direction;
  level: BreakoutLevel;
  // Recent ticks of the instrument, oldest first, current tick last.
  recent: readonly Tick[];
}

export interface EntryEvaluation {
  signal: EntrySignal;
  failed: string[];
}

const mean = (values: readonly number[]): number =>
  values.reduce((s, v) => s + v, 0) / values.length;

const volumeConfirmed = (f: VolumeFilterSpec, ctx: EntryFilterContext): boolean => {
  const prior = ctx.recent.slice(0, -1).slice(-f.periods);
  if (prior.length === 0) return true; // nothing to compare against yet
  const avg = mean(prior.map((t) => t.volume));
  return ctx.tick.volume >= avg * f.multiple;
};

const momentumConfirmed = (f: MomentumFilterSpec, ctx: EntryFilterContext): boolean => {
  const window = ctx.recent.slice(-f.periods);
  if (window.length < f.periods) return true;

  const sign = ctx.direction === 'CALL' ? 1 : -1;
  for (let i = 1; i < window.length; i += 1) {
    const move = (window[i].price - window[i - 1].price) * sign;
    if (move < -f.tolerance) return false;
  }
  const net = (window[window.length - 1].price - window[0].price) * sign;
  return net > 0;
};

const premiumAcceptable = (f: EntryPremiumFilterSpec, ctx: EntryFilterContext): boolean => {
  const ref = ctx.direction === 'CALL' ? ctx.level.upper : ctx.level.lower;
  if (ref === 0) return true;
  const beyond = ctx.direction === 'CALL' ? ctx.tick.price - ref : ref - ctx.tick.price;
  return (beyond / Math.abs(ref)) * 100 <= f.maxPremiumPct;
};

// Disabled filters pass.
export const evaluateFilter = (f: EntryFilterSpec, ctx: EntryFilterContext): boolean => {
  if (!f.enabled) return true;
  switch (f.kind) {
    case 'volume':
      return volumeConfirmed(f, ctx);
    case 'momentum':
      return momentumConfirmed(f, ctx);
    case 'entryPremium':
      return premiumAcceptable(f, ctx);
  }
};

// How many recent ticks the enabled filters need, current tick included.
export const requiredLookback = (filters: readonly EntryFilterSpec[]): number =>
  filters.reduce((n, f) => {
    if (f.kind === 'volume') return Math.max(n, f.periods + 1);
    if (f.kind === 'momentum') return Math.max(n, f.periods);
    return n;
  }, 1);

export const breakoutDirection = (price: number, level: BreakoutLevel): EntrySignal => {
  const up = price > level.upper;
  const down = price < level.lower;
  if (up && down) {
    const err = new AmbiguousSignalError(level.instrumentId, price, level.upper, level.lower);
    logEvent('warn', 'Ambiguous breakout suppressed', { error: err.message });
    return 'NONE';
  }
  if (up) return 'CALL';
  if (down) return 'PUT';
  return 'NONE';
};

export const evaluateEntry = (
  tick: Tick,
  level: BreakoutLevel,
  recent: readonly Tick[],
  filters: readonly EntryFilterSpec[],
): EntryEvaluation => {
  const direction = breakoutDirection(tick.price, level);
  if (direction === 'NONE') return { signal: 'NONE', failed: [] };

  const ctx: EntryFilterContext = { tick, direction, level, recent };
  const failed = filters.filter((f) => !evaluateFilter(f, ctx)).map((f) => f.kind);
  if (failed.length) return { signal: 'NONE', failed };

  return { signal: direction, failed: [] };
};
