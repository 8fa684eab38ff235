// src/positionMachine.ts
import { v4 as uuidv4 } from 'uuid';
import { PreconditionError } from './errors';
import { logState } from './logger';
import { pointsPnl, profitPct, round2 } from './pnl';
import {
  dueLadderSteps,
  hasHigherLadderStepPending,
  initialStop,
  initialTarget,
  isMaxHoldingExceeded,
  isStopHit,
  isTargetHit,
  ladderExitQuantity,
  trailedStop,
  trailingShouldActivate,
} from './exitPolicies';
import { PositionState, isPositionOpen } from './positionStates';
import type {
  EntryEvent,
  FullExitEvent,
  PartialExitEvent,
  Position,
  PositionEvent,
} from './positionStates';
import type { LadderConfig, RiskConfig } from './config';
import type { Direction, ExitReason, Instrument } from './types';

export interface ExitPolicySet {
  risk: RiskConfig;
  ladder: LadderConfig;
}

export interface OpenPositionRequest {
  instrument: Readonly<Instrument>;
  direction: Direction;
  price: number;
  ts: number;
  atr: number;
  optionSymbol: string | null;
}

const assertOpen = (p: Position, action: string): void => {
  if (!isPositionOpen(p)) {
    throw new PreconditionError(`${action} on ${p.instrumentId} position ${p.id} in state ${p.state}`);
  }
};

/**
 * AWAITING_ENTRY -> OPEN. Callers must already hold the governor's permit;
 * stop and target are fixed here from the triggering tick price.
 */
export const openPosition = (
  req: OpenPositionRequest,
  policy: ExitPolicySet,
): { position: Position; event: EntryEvent } => {
  const { instrument, direction, price, ts } = req;
  if (!(instrument.quantity > 0)) {
    throw new PreconditionError(`${instrument.id} cannot open a position with quantity ${instrument.quantity}`);
  }

  const stop = initialStop(direction, price, policy.risk, req.atr);
  const target = initialTarget(direction, price, stop.distance, policy.risk);

  const position: Position = {
    id: uuidv4(),
    instrumentId: instrument.id,
    direction,
    state: PositionState.AWAITING_ENTRY,
    entryPrice: price,
    entryTs: ts,
    originalQuantity: instrument.quantity,
    remainingQuantity: instrument.quantity,
    lotSize: instrument.lotSize,
    optionSymbol: req.optionSymbol,
    stopLossPrice: stop.price,
    initialStopPrice: stop.price,
    stopSource: stop.source,
    targetPrice: target,
    trailingActive: false,
    nextLadderIndex: 0,
    realizedPnl: 0,
    fills: [],
    exitReason: null,
    closedAt: null,
  };

  const from = position.state;
  position.state = PositionState.OPEN;

  logState(`Open ${direction} position`, {
    instrumentId: instrument.id,
    positionId: position.id,
    from,
    to: position.state,
    entryPrice: price,
    quantity: position.originalQuantity,
    stop: position.stopLossPrice,
    stopSource: stop.source,
    target,
    atr: req.atr,
  });

  const event: EntryEvent = {
    type: 'ENTRY',
    positionId: position.id,
    instrumentId: position.instrumentId,
    direction,
    ts,
    price,
    quantity: position.originalQuantity,
    stopLossPrice: position.stopLossPrice,
    targetPrice: position.targetPrice,
    stopSource: position.stopSource,
    optionSymbol: position.optionSymbol,
  };
  return { position, event };
};

const closeFully = (
  p: Position,
  price: number,
  ts: number,
  reason: ExitReason,
): FullExitEvent => {
  const quantity = p.remainingQuantity;
  const pnl = round2(pointsPnl(p.direction, p.entryPrice, price) * quantity);

  p.fills.push({ ts, price, quantity, pnl, reason, ladderIndex: null });
  p.realizedPnl = round2(p.realizedPnl + pnl);
  p.remainingQuantity = 0;
  p.state = PositionState.CLOSED;
  p.exitReason = reason;
  p.closedAt = ts;

  logState('Position closed', {
    instrumentId: p.instrumentId,
    positionId: p.id,
    direction: p.direction,
    reason,
    exitPrice: price,
    quantity,
    pnl,
    totalPnl: p.realizedPnl,
    heldMs: ts - p.entryTs,
  });

  return {
    type: 'FULL_EXIT',
    positionId: p.id,
    instrumentId: p.instrumentId,
    direction: p.direction,
    ts,
    price,
    quantity,
    reason,
    pnl,
    totalPnl: p.realizedPnl,
  };
};

const exitPartially = (
  p: Position,
  quantity: number,
  price: number,
  ts: number,
  ladderIndex: number,
): PartialExitEvent => {
  if (!(quantity > 0 && quantity < p.remainingQuantity)) {
    throw new PreconditionError(
      `${p.instrumentId} partial exit of ${quantity} invalid with ${p.remainingQuantity} remaining`,
    );
  }
  const pnl = round2(pointsPnl(p.direction, p.entryPrice, price) * quantity);

  p.fills.push({ ts, price, quantity, pnl, reason: 'LADDER', ladderIndex });
  p.realizedPnl = round2(p.realizedPnl + pnl);
  p.remainingQuantity -= quantity;
  p.state = PositionState.PARTIAL_EXIT;

  logState('Ladder partial exit', {
    instrumentId: p.instrumentId,
    positionId: p.id,
    ladderIndex,
    exitPrice: price,
    quantity,
    remaining: p.remainingQuantity,
    pnl,
  });

  return {
    type: 'PARTIAL_EXIT',
    positionId: p.id,
    instrumentId: p.instrumentId,
    direction: p.direction,
    ts,
    price,
    quantity,
    remainingQuantity: p.remainingQuantity,
    pnl,
    ladderIndex,
  };
};

const updateTrailing = (p: Position, price: number, risk: RiskConfig): void => {
  if (trailingShouldActivate(p, price, risk)) {
    p.trailingActive = true;
    logState('Trailing stop activated', {
      instrumentId: p.instrumentId,
      positionId: p.id,
      price,
      stop: p.stopLossPrice,
    });
  }
  if (!p.trailingActive) return;

  const next = trailedStop(p, price, risk);
  if (next !== p.stopLossPrice) {
    logState('Trailing stop moved', {
      instrumentId: p.instrumentId,
      positionId: p.id,
      from: p.stopLossPrice,
      to: next,
      price,
    });
    p.stopLossPrice = next;
  }
};

/**
 * Runs one evaluation of an open position at `price`/`now`, in fixed
 * priority: stop-loss, target, max holding, ladder steps, trailing update.
 * The first three close the position and end the evaluation. A trailed stop
 * is only checked from the next evaluation on.
 */
export const evaluatePosition = (
  p: Position,
  price: number,
  now: number,
  policy: ExitPolicySet,
): PositionEvent[] => {
  assertOpen(p, 'evaluate');
  const { risk, ladder } = policy;

  if (isStopHit(p, price)) return [closeFully(p, price, now, 'STOP_LOSS')];

  const pct = profitPct(p.direction, p.entryPrice, price);
  if (isTargetHit(p, price)) {
    if (!hasHigherLadderStepPending(p, ladder, pct)) {
      return [closeFully(p, price, now, 'TARGET')];
    }
    logState('Target reached but a higher ladder step is pending', {
      instrumentId: p.instrumentId,
      positionId: p.id,
      price,
      profitPct: round2(pct),
    });
  }

  if (isMaxHoldingExceeded(p, now, risk)) return [closeFully(p, price, now, 'TIME_EXIT')];

  const events: PositionEvent[] = [];
  for (const { index, step } of dueLadderSteps(p, ladder, now)) {
    // A due step waits for its profit gate; later steps wait behind it.
    if (pct < step.minProfitPct) break;

    p.nextLadderIndex = index + 1;
    const qty = ladderExitQuantity(p.remainingQuantity, step.exitPct, p.lotSize);
    if (qty >= p.remainingQuantity) {
      events.push(closeFully(p, price, now, 'LADDER'));
      return events;
    }
    if (qty === 0) {
      logState('Ladder step below one lot, nothing to exit', {
        instrumentId: p.instrumentId,
        positionId: p.id,
        ladderIndex: index,
        remaining: p.remainingQuantity,
      });
      continue;
    }
    events.push(exitPartially(p, qty, price, now, index));
  }

  updateTrailing(p, price, risk);
  return events;
};

// Flatten or session end: close at `price`, bypassing the priority order.
export const forceClose = (
  p: Position,
  price: number,
  now: number,
  reason: Extract<ExitReason, 'MANUAL' | 'SESSION_END'>,
): FullExitEvent => {
  assertOpen(p, 'forceClose');
  return closeFully(p, price, now, reason);
};

export const unrealizedPnl = (p: Position, price: number): number =>
  isPositionOpen(p) ? round2(pointsPnl(p.direction, p.entryPrice, price) * p.remainingQuantity) : 0;
