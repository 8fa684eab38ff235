import { describe, it, expect } from 'vitest';
import { PreconditionError } from '../src/errors';
import { evaluatePosition, forceClose, openPosition, unrealizedPnl } from '../src/positionMachine';
import type { ExitPolicySet } from '../src/positionMachine';
import { PositionState } from '../src/positionStates';
import type { Position } from '../src/positionStates';
import type { LadderConfig } from '../src/config';
import type { Direction, Instrument } from '../src/types';
import { NO_LADDER, at, buildInstrument, buildRisk } from './fixtures';

const ENTRY_TS = at(10);
const LADDER: LadderConfig = {
  enabled: true,
  steps: [
    { timeMinutes: 30, minProfitPct: 0.1, exitPct: 30 },
    { timeMinutes: 60, minProfitPct: 0.2, exitPct: 50 },
  ],
};

const minutesIn = (m: number): number => ENTRY_TS + m * 60_000;

function open(
  policy: ExitPolicySet,
  direction: Direction = 'CALL',
  instrument: Instrument = buildInstrument(),
  atr = 0,
): Position {
  return openPosition(
    { instrument, direction, price: 25000, ts: ENTRY_TS, atr, optionSymbol: null },
    policy,
  ).position;
}

const filledQuantity = (p: Position): number => p.fills.reduce((s, f) => s + f.quantity, 0);

describe('openPosition', () => {
  it('opens with fixed stop and a reward-multiple target', () => {
    const { position, event } = openPosition(
      {
        instrument: buildInstrument(),
        direction: 'CALL',
        price: 25000,
        ts: ENTRY_TS,
        atr: 0,
        optionSymbol: 'NIFTY26O2225000CE',
      },
      { risk: buildRisk(), ladder: NO_LADDER },
    );
    expect(position.state).toBe(PositionState.OPEN);
    expect(position.stopLossPrice).toBe(24970);
    expect(position.targetPrice).toBe(25060);
    expect(position.stopSource).toBe('FIXED');
    expect(event).toMatchObject({
      type: 'ENTRY',
      quantity: 300,
      price: 25000,
      optionSymbol: 'NIFTY26O2225000CE',
    });
  });

  it('sizes the stop from ATR when enabled', () => {
    const risk = buildRisk({ useAtrStopLoss: true, atrMultiplier: 1.5 });
    const p = open({ risk, ladder: NO_LADDER }, 'PUT', buildInstrument(), 20);
    expect(p.stopLossPrice).toBe(25030);
    expect(p.targetPrice).toBe(24940);
    expect(p.stopSource).toBe('ATR');
  });

  it('falls back to fixed points when ATR is zero', () => {
    const risk = buildRisk({ useAtrStopLoss: true });
    expect(open({ risk, ladder: NO_LADDER }).stopSource).toBe('FIXED');
  });

  it('uses explicit target points when configured', () => {
    const p = open({ risk: buildRisk({ targetPoints: 45 }), ladder: NO_LADDER });
    expect(p.targetPrice).toBe(25045);
  });
});

describe('evaluatePosition', () => {
  it('checks the stop before a due ladder step', () => {
    const p = open({ risk: buildRisk(), ladder: LADDER });
    const events = evaluatePosition(p, 24960, minutesIn(30), { risk: buildRisk(), ladder: LADDER });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'FULL_EXIT', reason: 'STOP_LOSS', quantity: 300, pnl: -12000 });
    expect(p.state).toBe(PositionState.CLOSED);
    expect(p.nextLadderIndex).toBe(0);
  });

  it('mirrors stop and target for PUT positions', () => {
    const policy = { risk: buildRisk(), ladder: NO_LADDER };
    const p = open(policy, 'PUT');
    expect(evaluatePosition(p, 25031, minutesIn(1), policy)[0]).toMatchObject({
      reason: 'STOP_LOSS',
      pnl: -9300,
    });

    const q = open(policy, 'PUT');
    expect(evaluatePosition(q, 24940, minutesIn(1), policy)[0]).toMatchObject({
      reason: 'TARGET',
      pnl: 18000,
    });
  });

  it('exits on target when no richer ladder step is pending', () => {
    const policy = { risk: buildRisk(), ladder: LADDER };
    const p = open(policy);
    expect(evaluatePosition(p, 25060, minutesIn(10), policy)[0]).toMatchObject({
      type: 'FULL_EXIT',
      reason: 'TARGET',
      pnl: 18000,
    });
  });

  it('defers the target while a ladder step asks for more profit', () => {
    const ladder: LadderConfig = { enabled: true, steps: [{ timeMinutes: 30, minProfitPct: 0.5, exitPct: 50 }] };
    const policy = { risk: buildRisk({ trailingEnabled: true }), ladder };
    const p = open(policy);
    expect(evaluatePosition(p, 25060, minutesIn(10), policy)).toEqual([]);
    expect(p.state).toBe(PositionState.OPEN);
    // trailing took over: 25060 - 0.5 x 60
    expect(p.trailingActive).toBe(true);
    expect(p.stopLossPrice).toBe(25030);
  });

  it('closes flat positions once the holding time runs out', () => {
    const policy = { risk: buildRisk(), ladder: LADDER };
    const p = open(policy);
    expect(evaluatePosition(p, 25000, minutesIn(119), policy)).toHaveLength(0);
    const events = evaluatePosition(p, 25000, minutesIn(120), policy);
    expect(events).toEqual([
      expect.objectContaining({ type: 'FULL_EXIT', reason: 'TIME_EXIT', quantity: 300, pnl: 0 }),
    ]);
  });

  it('takes a ladder partial rounded down to whole lots', () => {
    const policy = { risk: buildRisk({ trailingEnabled: true }), ladder: LADDER };
    const p = open(policy);
    const events = evaluatePosition(p, 25030, minutesIn(30), policy);
    expect(events).toEqual([
      expect.objectContaining({
        type: 'PARTIAL_EXIT',
        quantity: 75,
        remainingQuantity: 225,
        pnl: 2250,
        ladderIndex: 0,
      }),
    ]);
    expect(p.state).toBe(PositionState.PARTIAL_EXIT);
    expect(p.remainingQuantity + filledQuantity(p)).toBe(p.originalQuantity);
    // trailing activated at half the target distance: 25030 - 0.5 x 30
    expect(p.stopLossPrice).toBe(25015);
  });

  it('keeps a due ladder step until its profit gate is met', () => {
    const ladder: LadderConfig = { enabled: true, steps: [{ timeMinutes: 30, minProfitPct: 0.1, exitPct: 50 }] };
    const policy = { risk: buildRisk(), ladder };
    const p = open(policy);
    expect(evaluatePosition(p, 25005, minutesIn(30), policy)).toEqual([]);
    expect(p.nextLadderIndex).toBe(0);

    // 0.2% at minute 35: 50% of 300 rounds down to 2 lots
    expect(evaluatePosition(p, 25050, minutesIn(35), policy)).toEqual([
      expect.objectContaining({ type: 'PARTIAL_EXIT', quantity: 150, remainingQuantity: 150, pnl: 7500, ladderIndex: 0 }),
    ]);
    expect(p.nextLadderIndex).toBe(1);
  });

  it('holds later ladder steps behind an unmet earlier one', () => {
    const policy = { risk: buildRisk(), ladder: LADDER };
    const p = open(policy);
    // both steps due, step 0 needs 0.1%: 0.04% keeps both waiting
    expect(evaluatePosition(p, 25010, minutesIn(60), policy)).toEqual([]);
    expect(p.nextLadderIndex).toBe(0);

    // 0.236% meets both: 30% of 300 = 1 lot, then 50% of 225 = 1 lot
    const events = evaluatePosition(p, 25059, minutesIn(61), policy);
    expect(events).toEqual([
      expect.objectContaining({ type: 'PARTIAL_EXIT', quantity: 75, remainingQuantity: 225, ladderIndex: 0 }),
      expect.objectContaining({ type: 'PARTIAL_EXIT', quantity: 75, remainingQuantity: 150, ladderIndex: 1 }),
    ]);
    expect(p.nextLadderIndex).toBe(2);
  });

  it('skips a ladder step smaller than one lot', () => {
    const policy = { risk: buildRisk(), ladder: LADDER };
    const p = open(policy, 'CALL', buildInstrument({ quantity: 75 }));
    expect(evaluatePosition(p, 25030, minutesIn(30), policy)).toEqual([]);
    expect(p.remainingQuantity).toBe(75);
    expect(p.nextLadderIndex).toBe(1);
  });

  it('closes fully when a ladder step covers the whole remainder', () => {
    const ladder: LadderConfig = { enabled: true, steps: [{ timeMinutes: 30, minProfitPct: 0, exitPct: 100 }] };
    const policy = { risk: buildRisk(), ladder };
    const p = open(policy);
    expect(evaluatePosition(p, 25020, minutesIn(30), policy)).toEqual([
      expect.objectContaining({ type: 'FULL_EXIT', reason: 'LADDER', quantity: 300, totalPnl: 6000 }),
    ]);
    expect(p.remainingQuantity).toBe(0);
  });

  it('only ever tightens a trailing stop', () => {
    const policy = { risk: buildRisk({ trailingEnabled: true }), ladder: NO_LADDER };
    const p = open(policy);

    evaluatePosition(p, 25030, minutesIn(1), policy);
    expect(p.stopLossPrice).toBe(25015);
    evaluatePosition(p, 25020, minutesIn(2), policy);
    expect(p.stopLossPrice).toBe(25015);
    evaluatePosition(p, 25050, minutesIn(3), policy);
    expect(p.stopLossPrice).toBe(25025);

    expect(evaluatePosition(p, 25024, minutesIn(4), policy)).toEqual([
      expect.objectContaining({ reason: 'STOP_LOSS', pnl: 7200 }),
    ]);
  });

  it('refuses to evaluate a closed position', () => {
    const policy = { risk: buildRisk(), ladder: NO_LADDER };
    const p = open(policy);
    forceClose(p, 25010, minutesIn(5), 'MANUAL');
    expect(() => evaluatePosition(p, 25010, minutesIn(6), policy)).toThrow(PreconditionError);
    expect(() => forceClose(p, 25010, minutesIn(6), 'SESSION_END')).toThrow(PreconditionError);
  });
});

describe('forceClose', () => {
  it('closes the remainder and totals partial fills', () => {
    const policy = { risk: buildRisk(), ladder: LADDER };
    const p = open(policy);
    evaluatePosition(p, 25030, minutesIn(30), policy);
    expect(unrealizedPnl(p, 25040)).toBe(9000);

    const event = forceClose(p, 25040, minutesIn(40), 'SESSION_END');
    expect(event).toMatchObject({ reason: 'SESSION_END', quantity: 225, pnl: 9000, totalPnl: 11250 });
    expect(p.exitReason).toBe('SESSION_END');
    expect(p.closedAt).toBe(minutesIn(40));
    expect(filledQuantity(p)).toBe(300);
    expect(unrealizedPnl(p, 25100)).toBe(0);
  });
});
