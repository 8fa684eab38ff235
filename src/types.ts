// src/types.ts

// CALL profits when the underlying rises, PUT when it falls.
export type Direction = 'CALL' | 'PUT';

export interface Tick {
  instrumentId: string; // e.g. "NIFTY" or "BANKNIFTY"
  price: number;        // last traded price of the underlying
  volume: number;       // quantity traded since the previous tick
  ts: number;           // timestamp in ms
}

export interface Instrument {
  id: string;
  stepSize: number;     // strike spacing
  enabled: boolean;
  quantity: number;     // units per trade
  lotSize: number;      // partial exits are rounded down to whole lots
  expiryWeekday: number; // 0 = Sunday ... 4 = Thursday
}

export interface Candle {
  instrumentId: string;
  startTs: number;
  endTs: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  captured: boolean;
}

export interface BreakoutLevel {
  instrumentId: string;
  upper: number;
  lower: number;
  buffer: number;
  candle: Candle;
}

export type ExitReason =
  | 'STOP_LOSS'
  | 'TARGET'
  | 'TIME_EXIT'
  | 'LADDER'
  | 'MANUAL'
  | 'SESSION_END';

export type EntryReason = 'BREAKOUT';

export type IntentAction = 'ENTER' | 'PARTIAL_EXIT' | 'FULL_EXIT';

export interface OrderIntent {
  id: string;
  positionId: string;
  instrumentId: string;
  action: IntentAction;
  direction: Direction;
  quantity: number;
  priceHint: number;
  reason: EntryReason | ExitReason;
  optionSymbol: string | null;
  ts: number;
}

export type AuditEventType =
  | 'CANDLE_CAPTURED'
  | 'ENTRY'
  | 'PARTIAL_EXIT'
  | 'FULL_EXIT'
  | 'ENTRY_REJECTED'
  | 'INSTRUMENT_DISABLED'
  | 'INSTRUMENT_HALTED';

export interface AuditEvent {
  id: string;
  type: AuditEventType;
  instrumentId: string;
  positionId: string | null;
  ts: number;
  payload: Record<string, unknown>;
}
