import { DEFAULT_CONFIG } from '../src/config';
import type { LadderConfig, RiskConfig, StrategyConfig } from '../src/config';
import { MINUTE_MS, istTimestamp } from '../src/sessionTime';
import type { Instrument, Tick } from '../src/types';

// Monday 2026-10-19, 09:15 IST
export const SESSION_DATE = '2026-10-19';
export const OPEN_TS = istTimestamp(SESSION_DATE, '09:15');
export const CAPTURE_END_TS = OPEN_TS + 5 * MINUTE_MS;

export const at = (minutesAfterOpen: number): number => OPEN_TS + minutesAfterOpen * MINUTE_MS;

export function buildInstrument(overrides: Partial<Instrument> = {}): Instrument {
  return {
    id: 'NIFTY',
    stepSize: 50,
    enabled: true,
    quantity: 300,
    lotSize: 75,
    expiryWeekday: 4,
    ...overrides,
  };
}

export function buildRisk(overrides: Partial<RiskConfig> = {}): RiskConfig {
  return {
    ...DEFAULT_CONFIG.risk,
    stopLossPoints: 30,
    targetPoints: null,
    rewardRiskRatio: 2,
    useAtrStopLoss: false,
    maxHoldingMinutes: 120,
    trailingEnabled: false,
    ...overrides,
  };
}

export const NO_LADDER: LadderConfig = { enabled: false, steps: [] };

export function buildTick(price: number, ts: number, overrides: Partial<Tick> = {}): Tick {
  return { instrumentId: 'NIFTY', price, volume: 10, ts, ...overrides };
}

// Plain breakout strategy: ATR stop from the fallback, no filters, no ladder.
export function buildStrategy(overrides: Partial<StrategyConfig> = {}): StrategyConfig {
  return {
    ...DEFAULT_CONFIG,
    session: { ...DEFAULT_CONFIG.session, holidays: [] },
    risk: buildRisk({
      breakoutBuffer: 2,
      useAtrStopLoss: true,
      atrMultiplier: 0.5,
      atrFallback: 30,
    }),
    ladder: NO_LADDER,
    filters: DEFAULT_CONFIG.filters.map((f) => ({ ...f, enabled: false })),
    governor: { maxTradesPerDay: 2, maxDailyLoss: -5000 },
    instruments: [
      buildInstrument({ quantity: 75 }),
      buildInstrument({ id: 'BANKNIFTY', stepSize: 100, quantity: 35, lotSize: 35 }),
    ],
    ...overrides,
  };
}
