// src/instrumentWorker.ts
import { v4 as uuidv4 } from 'uuid';
import { computeBreakoutLevel } from './breakoutLevels';
import { CandleAggregator } from './candleAggregator';
import type { ClockGate } from './clockGate';
import { InsufficientDataError, PreconditionError } from './errors';
import type { BreachedLimit } from './errors';
import { evaluateEntry, requiredLookback } from './entryFilters';
import type { IntentQueue } from './intentQueue';
import { logEvent, logState } from './logger';
import { OpeningRangeCapture } from './openingRange';
import { optionSymbolFor } from './optionSymbols';
import { evaluatePosition, forceClose, openPosition, unrealizedPnl } from './positionMachine';
import type { ExitPolicySet } from './positionMachine';
import { PositionState, isPositionOpen } from './positionStates';
import type { Position, PositionEvent } from './positionStates';
import type { DailyRiskGovernor } from './riskGovernor';
import { MINUTE_MS } from './sessionTime';
import { TickWindow } from './tickWindow';
import { VolatilityEstimator } from './volatility';
import type { StrategyConfig } from './config';
import type {
  AuditEvent,
  AuditEventType,
  BreakoutLevel,
  Candle,
  ExitReason,
  Instrument,
  OrderIntent,
  Tick,
} from './types';

export type WorkerPhase = 'CAPTURING' | 'TRADING' | 'SESSION_CLOSED' | 'DISABLED' | 'HALTED';

export type WorkerEvent =
  | { kind: 'TICK'; tick: Tick }
  | { kind: 'TIMER'; now: number }
  | { kind: 'FLATTEN'; now: number }
  | { kind: 'SESSION_CLOSE'; now: number };

export interface WorkerDeps {
  instrument: Readonly<Instrument>;
  config: StrategyConfig;
  gate: ClockGate;
  governor: DailyRiskGovernor;
  orders: IntentQueue<OrderIntent>;
  audit: IntentQueue<AuditEvent>;
}

export interface InstrumentSnapshot {
  instrumentId: string;
  phase: WorkerPhase;
  positionState: PositionState | null;
  lastPrice: number | null;
  lastTs: number | null;
  candle: Candle | null;
  level: { upper: number; lower: number; buffer: number } | null;
  atr: number;
  atrWarm: boolean;
  position: Position | null;
  closedPositions: Position[];
  realizedPnl: number;
  unrealizedPnl: number;
  stopReason: string | null;
}

/**
 * Owns every piece of mutable state for one instrument. Ticks, timer beats
 * and operator commands all arrive through enqueue() and are processed one
 * at a time, in arrival order.
 */
export class InstrumentWorker {
  readonly instrumentId: string;
  private readonly deps: WorkerDeps;
  private readonly policy: ExitPolicySet;
  private readonly capture: OpeningRangeCapture;
  private readonly volatility: VolatilityEstimator;
  private readonly ticks: TickWindow;
  private readonly lookback: number;

  private queue: WorkerEvent[] = [];
  private draining = false;

  private phase: WorkerPhase = 'CAPTURING';
  private stopReason: string | null = null;
  private aggregator: CandleAggregator | null = null;
  private level: BreakoutLevel | null = null;
  private position: Position | null = null;
  private readonly closed: Position[] = [];
  private lastPrice: number | null = null;
  private lastTs: number | null = null;
  private lastRejection: BreachedLimit | null = null;
  private lastFiltered: string | null = null;

  constructor(deps: WorkerDeps) {
    this.deps = deps;
    this.instrumentId = deps.instrument.id;
    this.policy = { risk: deps.config.risk, ladder: deps.config.ladder };
    this.capture = new OpeningRangeCapture(this.instrumentId, deps.gate);
    this.volatility = new VolatilityEstimator(deps.config.risk.atrPeriod, deps.config.risk.atrFallback);
    this.lookback = requiredLookback(deps.config.filters);
    this.ticks = new TickWindow(this.lookback);
  }

  get currentPhase(): WorkerPhase {
    return this.phase;
  }

  get openPosition(): Position | null {
    return this.position;
  }

  enqueue(event: WorkerEvent): void {
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.process(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private process(event: WorkerEvent): void {
    if (this.phase === 'DISABLED') return;
    // A halted instrument still honours flatten and session close for its open position.
    if (this.phase === 'HALTED' && (event.kind === 'TICK' || event.kind === 'TIMER')) return;

    try {
      switch (event.kind) {
        case 'TICK':
          this.onTick(event.tick);
          break;
        case 'TIMER':
          this.onTimer(event.now);
          break;
        case 'FLATTEN':
          this.closeOut(event.now, 'MANUAL');
          break;
        case 'SESSION_CLOSE':
          this.closeOut(event.now, 'SESSION_END');
          break;
      }
    } catch (e) {
      if (e instanceof InsufficientDataError) {
        this.disable(e);
        return;
      }
      this.halt(e);
    }
  }

  private onTick(tick: Tick): void {
    if (this.lastTs !== null && tick.ts < this.lastTs) {
      logEvent('warn', 'Out-of-order tick dropped', {
        instrumentId: this.instrumentId,
        ts: tick.ts,
        lastTs: this.lastTs,
      });
      return;
    }
    this.lastTs = tick.ts;
    this.lastPrice = tick.price;
    this.ticks.push(tick);

    if (this.phase === 'CAPTURING') {
      if (this.capture.addTick(tick) === 'CAPTURING') return;
      this.finishCapture(tick.ts);
    }
    if (this.phase !== 'TRADING') return;

    this.recordCandle(this.aggregator?.addTick(tick) ?? null);

    if (this.deps.gate.isSessionForceClose(tick.ts)) {
      this.closeOut(tick.ts, 'SESSION_END');
      return;
    }

    if (this.position && isPositionOpen(this.position)) {
      this.evaluate(this.position, tick.price, tick.ts);
      return;
    }
    this.tryEnter(tick);
  }

  private onTimer(now: number): void {
    if (this.phase === 'CAPTURING' && this.deps.gate.isCaptureWindowClosed(now)) {
      this.finishCapture(now);
    }
    if (this.phase !== 'TRADING') return;

    this.recordCandle(this.aggregator?.flush(now) ?? null);

    if (this.deps.gate.isSessionForceClose(now)) {
      this.closeOut(now, 'SESSION_END');
      return;
    }
    if (this.position && isPositionOpen(this.position) && this.lastPrice !== null) {
      this.evaluate(this.position, this.lastPrice, now);
    }
  }

  private finishCapture(now: number): void {
    const candle = this.capture.close(now);
    const { risk } = this.deps.config;
    this.level = computeBreakoutLevel(candle, risk.breakoutBuffer);
    this.volatility.addCandle(candle);
    this.aggregator = new CandleAggregator(this.instrumentId, candle.endTs, risk.atrCandleMinutes * MINUTE_MS);
    this.phase = 'TRADING';

    logState('Breakout levels computed', {
      instrumentId: this.instrumentId,
      upper: this.level.upper,
      lower: this.level.lower,
      buffer: this.level.buffer,
    });
    this.audit('CANDLE_CAPTURED', now, null, {
      open: candle.open,
      high: candle.high,
      low: candle.low,
      close: candle.close,
      volume: candle.volume,
      upper: this.level.upper,
      lower: this.level.lower,
    });
  }

  private recordCandle(candle: Candle | null): void {
    if (!candle) return;
    const tr = this.volatility.addCandle(candle);
    logState('ATR sample', {
      instrumentId: this.instrumentId,
      trueRange: tr,
      atr: this.volatility.currentATR(),
      samples: this.volatility.sampleCount,
    });
  }

  private tryEnter(tick: Tick): void {
    const level = this.level;
    if (!level) {
      throw new PreconditionError(`${this.instrumentId} entry evaluated without breakout levels`);
    }

    const { signal, failed } = evaluateEntry(tick, level, this.ticks.last(this.lookback), this.deps.config.filters);
    this.noteFiltered(tick, failed);
    if (signal === 'NONE') return;

    const permit = this.deps.governor.tryOpenTrade(this.instrumentId);
    if (!permit.ok) {
      // One audit record per distinct limit, not one per breakout tick.
      if (this.lastRejection !== permit.rejection.limit) {
        this.lastRejection = permit.rejection.limit;
        this.audit('ENTRY_REJECTED', tick.ts, null, {
          direction: signal,
          price: tick.price,
          limit: permit.rejection.limit,
          message: permit.rejection.message,
        });
      }
      return;
    }

    const { instrument } = this.deps;
    const { position, event } = openPosition(
      {
        instrument,
        direction: signal,
        price: tick.price,
        ts: tick.ts,
        atr: this.volatility.currentATR(),
        optionSymbol: optionSymbolFor(instrument, signal, tick.price, tick.ts),
      },
      this.policy,
    );
    this.position = position;
    this.emit(position, event);
  }

  // Logs a filtered breakout only when the set of failing filters changes.
  private noteFiltered(tick: Tick, failed: string[]): void {
    const key = failed.length ? failed.join(',') : null;
    if (key === this.lastFiltered) return;
    this.lastFiltered = key;
    if (key === null) return;
    logState('Breakout filtered', {
      instrumentId: this.instrumentId,
      price: tick.price,
      failed,
    });
  }

  private evaluate(position: Position, price: number, now: number): void {
    for (const event of evaluatePosition(position, price, now, this.policy)) {
      this.emit(position, event);
    }
  }

  private closeOut(now: number, reason: Extract<ExitReason, 'MANUAL' | 'SESSION_END'>): void {
    if (this.phase === 'SESSION_CLOSED') return;

    const position = this.position;
    if (position && isPositionOpen(position)) {
      const price = this.lastPrice ?? position.entryPrice;
      this.emit(position, forceClose(position, price, now, reason));
    }
    if (this.phase === 'HALTED') {
      logState('Halted instrument closed out', { instrumentId: this.instrumentId, reason });
      return;
    }
    this.phase = 'SESSION_CLOSED';
    this.stopReason = reason;
    logState('Instrument closed for the session', { instrumentId: this.instrumentId, reason });
  }

  private emit(position: Position, event: PositionEvent): void {
    const { orders, governor } = this.deps;
    const intent = (action: OrderIntent['action'], reason: OrderIntent['reason']): OrderIntent => ({
      id: uuidv4(),
      positionId: position.id,
      instrumentId: this.instrumentId,
      action,
      direction: position.direction,
      quantity: event.quantity,
      priceHint: event.price,
      reason,
      optionSymbol: position.optionSymbol,
      ts: event.ts,
    });

    switch (event.type) {
      case 'ENTRY':
        orders.enqueue(intent('ENTER', 'BREAKOUT'));
        this.audit('ENTRY', event.ts, position.id, {
          direction: event.direction,
          entryPrice: event.price,
          quantity: event.quantity,
          stopLossPrice: event.stopLossPrice,
          targetPrice: event.targetPrice,
          stopSource: event.stopSource,
          optionSymbol: event.optionSymbol,
        });
        break;
      case 'PARTIAL_EXIT':
        orders.enqueue(intent('PARTIAL_EXIT', 'LADDER'));
        this.audit('PARTIAL_EXIT', event.ts, position.id, {
          exitPrice: event.price,
          quantity: event.quantity,
          remainingQuantity: event.remainingQuantity,
          pnl: event.pnl,
          ladderIndex: event.ladderIndex,
        });
        break;
      case 'FULL_EXIT':
        orders.enqueue(intent('FULL_EXIT', event.reason));
        this.audit('FULL_EXIT', event.ts, position.id, {
          reason: event.reason,
          exitPrice: event.price,
          quantity: event.quantity,
          pnl: event.pnl,
          totalPnl: event.totalPnl,
          entryPrice: position.entryPrice,
          entryTs: position.entryTs,
        });
        governor.recordTradeClosed(event.totalPnl);
        this.closed.push(position);
        this.position = null;
        break;
    }
  }

  private audit(
    type: AuditEventType,
    ts: number,
    positionId: string | null,
    payload: Record<string, unknown>,
  ): void {
    this.deps.audit.enqueue({
      id: uuidv4(),
      type,
      instrumentId: this.instrumentId,
      positionId,
      ts,
      payload,
    });
  }

  private disable(e: InsufficientDataError): void {
    this.phase = 'DISABLED';
    this.stopReason = e.message;
    logEvent('warn', 'Instrument disabled for the session', {
      instrumentId: this.instrumentId,
      error: e.message,
    });
    this.audit('INSTRUMENT_DISABLED', this.lastTs ?? this.deps.gate.captureWindowEnd, null, {
      error: e.message,
    });
  }

  // Anything other than missing data means our own sequencing is broken: stop this instrument.
  private halt(e: unknown): void {
    this.phase = 'HALTED';
    this.stopReason = e instanceof Error ? e.message : String(e);
    logEvent('error', 'Instrument processing halted', {
      instrumentId: this.instrumentId,
      error: this.stopReason,
      stack: e instanceof Error ? e.stack : undefined,
      openPositionId: this.position?.id ?? null,
    });
    this.audit('INSTRUMENT_HALTED', this.lastTs ?? this.deps.gate.sessionOpenTs, this.position?.id ?? null, {
      error: this.stopReason,
      precondition: e instanceof PreconditionError,
    });
  }

  snapshot(): InstrumentSnapshot {
    const position = this.position;
    let positionState: PositionState | null = null;
    if (position) positionState = position.state;
    else if (this.phase === 'TRADING') positionState = PositionState.AWAITING_ENTRY;

    const realized = this.closed.reduce((s, p) => s + p.realizedPnl, 0) + (position?.realizedPnl ?? 0);
    return {
      instrumentId: this.instrumentId,
      phase: this.phase,
      positionState,
      lastPrice: this.lastPrice,
      lastTs: this.lastTs,
      candle: this.capture.isCaptured ? this.capture.candle : null,
      level: this.level ? { upper: this.level.upper, lower: this.level.lower, buffer: this.level.buffer } : null,
      atr: this.volatility.currentATR(),
      atrWarm: this.volatility.isWarm,
      position: position ? { ...position, fills: [...position.fills] } : null,
      closedPositions: this.closed.map((p) => ({ ...p, fills: [...p.fills] })),
      realizedPnl: Math.round(realized * 100) / 100,
      unrealizedPnl: position && this.lastPrice !== null ? unrealizedPnl(position, this.lastPrice) : 0,
      stopReason: this.stopReason,
    };
  }
}
