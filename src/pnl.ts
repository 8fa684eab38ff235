// src/pnl.ts
import type { Direction } from './types';

// Round to 2 decimal places
export const round2 = (value: number): number =>
  Math.round(value * 100) / 100;

// Points gained per unit; CALL gains as price rises, PUT as it falls.
export const pointsPnl = (direction: Direction, entry: number, price: number): number =>
  direction === 'CALL' ? price - entry : entry - price;

export const profitPct = (direction: Direction, entry: number, price: number): number =>
  entry === 0 ? 0 : (pointsPnl(direction, entry, price) / entry) * 100;
