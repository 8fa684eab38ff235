// src/sessionTime.ts
import { ConfigError } from './errors';

export const IST_OFFSET_MS = 5.5 * 60 * 60 * 1000;
export const MINUTE_MS = 60_000;

const HHMM = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

// "09:15" -> 555
export function parseHhMm(value: string): number {
  const m = HHMM.exec(value);
  if (!m) throw new ConfigError([`expected HH:MM time, got "${value}"`]);
  return Number(m[1]) * 60 + Number(m[2]);
}

// Shift into IST and read the UTC fields; avoids depending on the host timezone.
export function toIst(tsMs: number): Date {
  return new Date(tsMs + IST_OFFSET_MS);
}

export function istDateKey(tsMs: number): string {
  return toIst(tsMs).toISOString().slice(0, 10);
}

export function istMinuteOfDay(tsMs: number): number {
  const ist = toIst(tsMs);
  return ist.getUTCHours() * 60 + ist.getUTCMinutes();
}

export function istWeekday(tsMs: number): number {
  return toIst(tsMs).getUTCDay();
}

// Epoch ms of an IST wall-clock time on the given date.
export function istTimestamp(dateKey: string, hhmm: string): number {
  if (!DATE_KEY.test(dateKey)) throw new ConfigError([`expected YYYY-MM-DD date, got "${dateKey}"`]);
  const midnightUtc = Date.parse(`${dateKey}T00:00:00Z`);
  return midnightUtc + parseHhMm(hhmm) * MINUTE_MS - IST_OFFSET_MS;
}

export function isTradingDay(tsMs: number, holidays: readonly string[]): boolean {
  const weekday = istWeekday(tsMs);
  if (weekday === 0 || weekday === 6) return false;
  return !holidays.includes(istDateKey(tsMs));
}
