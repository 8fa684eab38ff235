// src/sessionEngine.ts
import { v4 as uuidv4 } from 'uuid';
import { systemClock } from './clock';
import type { Clock } from './clock';
import { ClockGate } from './clockGate';
import { PreconditionError } from './errors';
import { IntentQueue } from './intentQueue';
import { InstrumentWorker } from './instrumentWorker';
import type { InstrumentSnapshot } from './instrumentWorker';
import { logEvent, logState } from './logger';
import { DailyRiskGovernor } from './riskGovernor';
import type { DailyRiskState } from './riskGovernor';
import { istDateKey, istTimestamp } from './sessionTime';
import type { StrategyConfig } from './config';
import type { AuditEvent, OrderIntent, Tick } from './types';

export interface SessionInfo {
  id: string;
  dateKey: string;
  sessionOpenTs: number;
  captureWindowEnd: number;
  forceCloseTs: number;
  closedAt: number | null;
  closeReason: 'SESSION_END' | 'MANUAL' | null;
}

export type TickOutcome = 'ACCEPTED' | 'NO_SESSION' | 'UNKNOWN_INSTRUMENT' | 'INSTRUMENT_DISABLED';

export interface EngineSnapshot {
  simulation: boolean;
  session: SessionInfo | null;
  governor: DailyRiskState | null;
  instruments: InstrumentSnapshot[];
  pendingOrders: number;
  pendingAudit: number;
}

export interface SessionEngineOptions {
  config: StrategyConfig;
  clock?: Clock;
  orders?: IntentQueue<OrderIntent>;
  audit?: IntentQueue<AuditEvent>;
}

/**
 * One trading session across every configured instrument. Each instrument
 * gets its own worker; the daily governor is the only state they share.
 */
export class SessionEngine {
  readonly config: StrategyConfig;
  readonly clock: Clock;
  readonly orders: IntentQueue<OrderIntent>;
  readonly audit: IntentQueue<AuditEvent>;

  private workers = new Map<string, InstrumentWorker>();
  private governor: DailyRiskGovernor | null = null;
  private gate: ClockGate | null = null;
  private session: SessionInfo | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(opts: SessionEngineOptions) {
    this.config = opts.config;
    this.clock = opts.clock ?? systemClock;
    this.orders = opts.orders ?? new IntentQueue<OrderIntent>('orders');
    this.audit = opts.audit ?? new IntentQueue<AuditEvent>('audit');
  }

  get isActive(): boolean {
    return this.session !== null && this.session.closedAt === null;
  }

  /** Opens a session whose opening range starts at `sessionOpenTs` (defaults to today's configured open). */
  startSession(sessionOpenTs?: number): SessionInfo {
    if (this.isActive) {
      throw new PreconditionError(`session ${this.session?.dateKey ?? ''} is still active`);
    }
    const now = this.clock.now();
    const openTs = sessionOpenTs ?? istTimestamp(istDateKey(now), this.config.session.marketOpenTime);
    const dateKey = istDateKey(openTs);
    const gate = ClockGate.forSession(openTs, this.config.session, dateKey);
    const governor = new DailyRiskGovernor(this.config.governor);

    this.workers = new Map();
    for (const instrument of this.config.instruments) {
      if (!instrument.enabled) continue;
      this.workers.set(
        instrument.id,
        new InstrumentWorker({
          instrument,
          config: this.config,
          gate,
          governor,
          orders: this.orders,
          audit: this.audit,
        }),
      );
    }

    this.gate = gate;
    this.governor = governor;
    this.session = {
      id: uuidv4(),
      dateKey,
      sessionOpenTs: gate.sessionOpenTs,
      captureWindowEnd: gate.captureWindowEnd,
      forceCloseTs: gate.forceCloseTs,
      closedAt: null,
      closeReason: null,
    };

    logEvent('info', 'Session started', {
      sessionId: this.session.id,
      dateKey,
      instruments: [...this.workers.keys()],
      simulation: this.config.engine.simulation,
    });
    return { ...this.session };
  }

  onTick(tick: Tick): TickOutcome {
    if (!this.isActive) {
      logState('Tick ignored, no active session', { instrumentId: tick.instrumentId, ts: tick.ts });
      return 'NO_SESSION';
    }
    const worker = this.workers.get(tick.instrumentId);
    if (!worker) {
      const configured = this.config.instruments.some((i) => i.id === tick.instrumentId);
      logState('Tick ignored, instrument not trading', { instrumentId: tick.instrumentId, configured });
      return configured ? 'INSTRUMENT_DISABLED' : 'UNKNOWN_INSTRUMENT';
    }
    worker.enqueue({ kind: 'TICK', tick });
    return 'ACCEPTED';
  }

  // Timer beat: closes capture windows without waiting for a tick, advances time-based exits.
  onTimer(now: number = this.clock.now()): void {
    if (!this.isActive) return;
    for (const worker of this.workers.values()) {
      worker.enqueue({ kind: 'TIMER', now });
    }
    if (this.gate?.isSessionForceClose(now)) {
      this.forceCloseSession(now);
    }
  }

  startTimer(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.onTimer();
      } catch (e) {
        logEvent('error', 'Session timer failed', { error: String(e) });
      }
    }, this.config.engine.timerIntervalMs);
  }

  stopTimer(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  // Operator kill switch: close every open position now and take no new entries.
  flattenAll(now: number = this.clock.now()): void {
    this.closeSession(now, 'MANUAL');
  }

  forceCloseSession(now: number = this.clock.now()): void {
    this.closeSession(now, 'SESSION_END');
  }

  private closeSession(now: number, reason: 'SESSION_END' | 'MANUAL'): void {
    const session = this.session;
    if (!session || session.closedAt !== null) return;

    const kind = reason === 'MANUAL' ? 'FLATTEN' : 'SESSION_CLOSE';
    for (const worker of this.workers.values()) {
      worker.enqueue({ kind, now });
    }
    this.governor?.close();
    this.stopTimer();
    session.closedAt = now;
    session.closeReason = reason;

    logEvent('info', 'Session closed', {
      sessionId: session.id,
      reason,
      governor: this.governor?.snapshot(),
    });
  }

  worker(instrumentId: string): InstrumentWorker | undefined {
    return this.workers.get(instrumentId);
  }

  snapshot(): EngineSnapshot {
    return {
      simulation: this.config.engine.simulation,
      session: this.session ? { ...this.session } : null,
      governor: this.governor ? this.governor.snapshot() : null,
      instruments: [...this.workers.values()].map((w) => w.snapshot()),
      pendingOrders: this.orders.pending,
      pendingAudit: this.audit.pending,
    };
  }
}
