// src/exitPolicies.ts
import { MINUTE_MS } from './sessionTime';
import { pointsPnl } from './pnl';
import type { LadderConfig, LadderStep, RiskConfig } from './config';
import type { Position, StopSource } from './positionStates';
import type { Direction } from './types';

export interface InitialStop {
  price: number;
  distance: number;
  source: StopSource;
}

// ATR x multiplier when enabled and usable, otherwise the fixed points.
export const initialStop = (
  direction: Direction,
  entry: number,
  risk: RiskConfig,
  atr: number,
): InitialStop => {
  const atrDistance = atr * risk.atrMultiplier;
  const useAtr = risk.useAtrStopLoss && atrDistance > 0;
  const distance = useAtr ? atrDistance : risk.stopLossPoints;
  return {
    price: direction === 'CALL' ? entry - distance : entry + distance,
    distance,
    source: useAtr ? 'ATR' : 'FIXED',
  };
};

export const initialTarget = (
  direction: Direction,
  entry: number,
  stopDistance: number,
  risk: RiskConfig,
): number => {
  const distance = risk.targetPoints ?? risk.rewardRiskRatio * stopDistance;
  return direction === 'CALL' ? entry + distance : entry - distance;
};

export const isStopHit = (p: Position, price: number): boolean =>
  p.direction === 'CALL' ? price <= p.stopLossPrice : price >= p.stopLossPrice;

export const isTargetHit = (p: Position, price: number): boolean =>
  p.direction === 'CALL' ? price >= p.targetPrice : price <= p.targetPrice;

export const isMaxHoldingExceeded = (p: Position, now: number, risk: RiskConfig): boolean =>
  now - p.entryTs >= risk.maxHoldingMinutes * MINUTE_MS;

// An unconsumed step asking for more profit than we have now defers the target.
export const hasHigherLadderStepPending = (
  p: Position,
  ladder: LadderConfig,
  currentProfitPct: number,
): boolean =>
  ladder.enabled &&
  ladder.steps.slice(p.nextLadderIndex).some((s) => s.minProfitPct > currentProfitPct);

export interface DueLadderStep {
  index: number;
  step: LadderStep;
}

// Steps whose time has come, in ladder order, starting at the next unconsumed one.
export const dueLadderSteps = (
  p: Position,
  ladder: LadderConfig,
  now: number,
): DueLadderStep[] => {
  if (!ladder.enabled) return [];
  const elapsed = now - p.entryTs;
  const due: DueLadderStep[] = [];
  for (let i = p.nextLadderIndex; i < ladder.steps.length; i += 1) {
    const step = ladder.steps[i];
    if (elapsed < step.timeMinutes * MINUTE_MS) break;
    due.push({ index: i, step });
  }
  return due;
};

// Share of the remaining quantity, rounded down to whole lots.
export const ladderExitQuantity = (remaining: number, exitPct: number, lotSize: number): number => {
  const lots = Math.floor((remaining * exitPct) / 100 / lotSize);
  return Math.min(remaining, lots * lotSize);
};

export const trailingShouldActivate = (p: Position, price: number, risk: RiskConfig): boolean => {
  if (!risk.trailingEnabled || p.trailingActive) return false;
  const targetDistance = Math.abs(p.targetPrice - p.entryPrice);
  return pointsPnl(p.direction, p.entryPrice, price) >= risk.trailingActivationFraction * targetDistance;
};

/**
 * Stop after trailing to `price`. Gives back at most trailFraction of the
 * open profit and never loosens the current stop.
 */
export const trailedStop = (p: Position, price: number, risk: RiskConfig): number => {
  const profit = pointsPnl(p.direction, p.entryPrice, price);
  if (profit <= 0) return p.stopLossPrice;
  const giveBack = risk.trailingTrailFraction * profit;
  return p.direction === 'CALL'
    ? Math.max(p.stopLossPrice, price - giveBack)
    : Math.min(p.stopLossPrice, price + giveBack);
};
