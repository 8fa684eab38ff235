// src/positionStates.ts
import type { Direction, ExitReason } from './types';

export enum PositionState {
  AWAITING_ENTRY = 'AWAITING_ENTRY',
  OPEN = 'OPEN',
  PARTIAL_EXIT = 'PARTIAL_EXIT', // still open, reduced by one or more ladder steps
  CLOSED = 'CLOSED',
}

export type StopSource = 'FIXED' | 'ATR';

export interface PositionFill {
  ts: number;
  price: number;
  quantity: number;
  pnl: number;
  reason: ExitReason;
  ladderIndex: number | null;
}

export interface Position {
  id: string;
  instrumentId: string;
  direction: Direction;
  state: PositionState;

  entryPrice: number;
  entryTs: number;
  originalQuantity: number;
  remainingQuantity: number;
  lotSize: number;
  optionSymbol: string | null;

  // Risk levels; stopLossPrice only ever tightens once trailing is active
  stopLossPrice: number;
  initialStopPrice: number;
  stopSource: StopSource;
  targetPrice: number;
  trailingActive: boolean;

  nextLadderIndex: number;
  realizedPnl: number;
  fills: PositionFill[];

  exitReason: ExitReason | null;
  closedAt: number | null;
}

export const isPositionOpen = (p: Position): boolean =>
  p.state === PositionState.OPEN || p.state === PositionState.PARTIAL_EXIT;

interface PositionEventBase {
  positionId: string;
  instrumentId: string;
  direction: Direction;
  ts: number;
  price: number;
  quantity: number;
}

export interface EntryEvent extends PositionEventBase {
  type: 'ENTRY';
  stopLossPrice: number;
  targetPrice: number;
  stopSource: StopSource;
  optionSymbol: string | null;
}

export interface PartialExitEvent extends PositionEventBase {
  type: 'PARTIAL_EXIT';
  remainingQuantity: number;
  pnl: number;
  ladderIndex: number;
}

export interface FullExitEvent extends PositionEventBase {
  type: 'FULL_EXIT';
  reason: ExitReason;
  pnl: number;        // this fill
  totalPnl: number;   // whole position, partial exits included
}

export type PositionEvent = EntryEvent | PartialExitEvent | FullExitEvent;
