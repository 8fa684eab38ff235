import { describe, it, expect } from 'vitest';
import { LimitBreachedRejection, PreconditionError } from '../src/errors';
import { DailyRiskGovernor } from '../src/riskGovernor';

const newGovernor = () => new DailyRiskGovernor({ maxTradesPerDay: 2, maxDailyLoss: -1000 });

describe('DailyRiskGovernor', () => {
  it('permits trades until the daily count is used up', () => {
    const governor = newGovernor();
    expect(governor.tryOpenTrade('NIFTY')).toEqual({ ok: true });
    expect(governor.tryOpenTrade('BANKNIFTY')).toEqual({ ok: true });

    const third = governor.tryOpenTrade('NIFTY');
    expect(third.ok).toBe(false);
    if (!third.ok) {
      expect(third.rejection).toBeInstanceOf(LimitBreachedRejection);
      expect(third.rejection.limit).toBe('MAX_TRADES');
      expect(third.rejection.instrumentId).toBe('NIFTY');
    }
    expect(governor.snapshot()).toEqual({
      realizedPnl: 0,
      tradeCount: 2,
      openTrades: 2,
      breached: true,
      closed: false,
    });
  });

  it('latches the loss floor even if later trades recover', () => {
    const governor = new DailyRiskGovernor({ maxTradesPerDay: 5, maxDailyLoss: -1000 });
    governor.tryOpenTrade('NIFTY');
    governor.recordTradeClosed(-1000);
    expect(governor.canOpenNewTrade()).toBe(false);

    const denied = governor.tryOpenTrade('NIFTY');
    expect(denied.ok ? null : denied.rejection.limit).toBe('MAX_DAILY_LOSS');
    expect(governor.snapshot().realizedPnl).toBe(-1000);
  });

  it('keeps trading while the loss stays above the floor', () => {
    const governor = new DailyRiskGovernor({ maxTradesPerDay: 5, maxDailyLoss: -1000 });
    governor.tryOpenTrade('NIFTY');
    governor.recordTradeClosed(-999.5);
    expect(governor.canOpenNewTrade()).toBe(true);
  });

  it('rejects everything once the session is closed', () => {
    const governor = newGovernor();
    governor.close();
    const denied = governor.tryOpenTrade('NIFTY');
    expect(denied.ok ? null : denied.rejection.limit).toBe('SESSION_CLOSED');
  });

  it('refuses bookkeeping calls made out of order', () => {
    const governor = newGovernor();
    expect(() => governor.recordTradeClosed(10)).toThrow(PreconditionError);
    governor.recordTradeOpened();
    governor.recordTradeOpened();
    expect(() => governor.recordTradeOpened()).toThrow(PreconditionError);
  });

  it('sums realized pnl to two decimals', () => {
    const governor = new DailyRiskGovernor({ maxTradesPerDay: 5, maxDailyLoss: -1000 });
    governor.tryOpenTrade('NIFTY');
    governor.tryOpenTrade('NIFTY');
    governor.recordTradeClosed(0.1);
    governor.recordTradeClosed(0.2);
    expect(governor.snapshot()).toMatchObject({ realizedPnl: 0.3, openTrades: 0, tradeCount: 2 });
  });
});
