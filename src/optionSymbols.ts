// src/optionSymbols.ts
import { istDateKey, istMinuteOfDay, istWeekday } from './sessionTime';
import type { Direction, Instrument } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;
const EXPIRY_CUTOFF_MINUTE = 15 * 60 + 30; // contracts expire at 15:30 IST

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];
// Weekly contracts encode the month as 1-9, O, N, D
const WEEKLY_MONTH_CODES = ['1', '2', '3', '4', '5', '6', '7', '8', '9', 'O', 'N', 'D'];

export type OptionType = 'CE' | 'PE';

export const atmStrike = (price: number, stepSize: number): number =>
  Math.round(price / stepSize) * stepSize;

const addDays = (dateKey: string, days: number): string =>
  new Date(Date.parse(`${dateKey}T00:00:00Z`) + days * DAY_MS).toISOString().slice(0, 10);

// Next expiry on `expiryWeekday` (IST); rolls a week once today's contract has expired.
export const nextWeeklyExpiry = (tsMs: number, expiryWeekday: number): string => {
  let daysAhead = (expiryWeekday - istWeekday(tsMs) + 7) % 7;
  if (daysAhead === 0 && istMinuteOfDay(tsMs) >= EXPIRY_CUTOFF_MINUTE) {
    daysAhead = 7;
  }
  return addDays(istDateKey(tsMs), daysAhead);
};

// The last expiry weekday of a month carries the monthly contract.
export const isMonthlyExpiry = (expiryKey: string): boolean =>
  addDays(expiryKey, 7).slice(5, 7) !== expiryKey.slice(5, 7);

export const formatOptionSymbol = (
  underlying: string,
  expiryKey: string,
  strike: number,
  type: OptionType,
): string => {
  const yy = expiryKey.slice(2, 4);
  const month = Number(expiryKey.slice(5, 7));
  const dd = expiryKey.slice(8, 10);
  const expiryCode = isMonthlyExpiry(expiryKey)
    ? `${yy}${MONTHS[month - 1]}`
    : `${yy}${WEEKLY_MONTH_CODES[month - 1]}${dd}`;
  return `${underlying.toUpperCase()}${expiryCode}${strike}${type}`;
};

export const optionTypeFor = (direction: Direction): OptionType =>
  direction === 'CALL' ? 'CE' : 'PE';

// ATM contract of the nearest expiry for an entry at `price`.
export const optionSymbolFor = (
  instrument: Readonly<Instrument>,
  direction: Direction,
  price: number,
  tsMs: number,
): string =>
  formatOptionSymbol(
    instrument.id,
    nextWeeklyExpiry(tsMs, instrument.expiryWeekday),
    atmStrike(price, instrument.stepSize),
    optionTypeFor(direction),
  );
