// src/riskGovernor.ts
import { LimitBreachedRejection, PreconditionError } from './errors';
import type { BreachedLimit } from './errors';
import { logEvent, logState } from './logger';
import { round2 } from './pnl';
import type { GovernorConfig } from './config';

export interface DailyRiskState {
  realizedPnl: number;
  tradeCount: number;
  openTrades: number;
  breached: boolean;
  closed: boolean;
}

export type TradePermit =
  | { ok: true }
  | { ok: false; rejection: LimitBreachedRejection };

/**
 * Session-wide limiter shared by every instrument worker. One instance per
 * session; all mutation goes through these methods, which run to completion
 * on the event loop and so never interleave.
 */
export class DailyRiskGovernor {
  private readonly limits: GovernorConfig;
  private realizedPnl = 0;
  private tradeCount = 0;
  private openTrades = 0;
  private lossFloorBreached = false;
  private closed = false;

  constructor(limits: GovernorConfig) {
    this.limits = limits;
  }

  private currentBlock(): BreachedLimit | null {
    if (this.closed) return 'SESSION_CLOSED';
    if (this.lossFloorBreached) return 'MAX_DAILY_LOSS';
    if (this.tradeCount >= this.limits.maxTradesPerDay) return 'MAX_TRADES';
    return null;
  }

  canOpenNewTrade(): boolean {
    return this.currentBlock() === null;
  }

  recordTradeOpened(): void {
    if (!this.canOpenNewTrade()) {
      throw new PreconditionError('recordTradeOpened called while daily limits are breached');
    }
    this.tradeCount += 1;
    this.openTrades += 1;
  }

  // Check-and-increment in one step; the path workers use.
  tryOpenTrade(instrumentId: string): TradePermit {
    const block = this.currentBlock();
    if (block !== null) {
      const rejection = new LimitBreachedRejection(
        instrumentId,
        block,
        `${instrumentId} entry rejected: ${block} (trades=${this.tradeCount}/${this.limits.maxTradesPerDay}, pnl=${this.realizedPnl})`,
      );
      logEvent('info', 'Entry rejected by daily governor', {
        instrumentId,
        limit: block,
        tradeCount: this.tradeCount,
        realizedPnl: this.realizedPnl,
      });
      return { ok: false, rejection };
    }

    this.recordTradeOpened();
    logState('Daily governor permitted trade', {
      instrumentId,
      tradeCount: this.tradeCount,
    });
    return { ok: true };
  }

  recordTradeClosed(realizedPnl: number): void {
    if (this.openTrades <= 0) {
      throw new PreconditionError('recordTradeClosed called with no open trades');
    }
    this.openTrades -= 1;
    this.realizedPnl = round2(this.realizedPnl + realizedPnl);

    // Latches: the floor stays breached even if later trades recover.
    if (!this.lossFloorBreached && this.realizedPnl <= this.limits.maxDailyLoss) {
      this.lossFloorBreached = true;
      logEvent('warn', 'Daily loss floor breached; no new trades this session', {
        realizedPnl: this.realizedPnl,
        maxDailyLoss: this.limits.maxDailyLoss,
      });
    }
  }

  close(): void {
    this.closed = true;
  }

  snapshot(): DailyRiskState {
    return {
      realizedPnl: this.realizedPnl,
      tradeCount: this.tradeCount,
      openTrades: this.openTrades,
      breached: this.lossFloorBreached || this.tradeCount >= this.limits.maxTradesPerDay,
      closed: this.closed,
    };
  }
}
