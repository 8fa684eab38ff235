// src/tradeJournal.ts
import fs from 'fs';
import path from 'path';
import { logEvent } from './logger';
import { istDateKey, toIst } from './sessionTime';
import type { AuditEvent, OrderIntent, Tick } from './types';

function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

function csvCell(value: unknown): string {
  // JSON-encoded so strings come out quoted and escaped.
  return JSON.stringify(value ?? '');
}

function appendLine(filePath: string, line: string, header?: string): void {
  // best-effort only; never break trading flow
  try {
    ensureDir(path.dirname(filePath));
    const prefix = header && !fs.existsSync(filePath) ? `${header}\n` : '';
    fs.appendFileSync(filePath, `${prefix}${line}\n`, 'utf8');
  } catch (e) {
    logEvent('error', 'Journal write failed', { filePath, error: String(e) });
  }
}

export const TICK_CSV_HEADER = 'timeIst,tsMs,instrumentId,price,volume';

export const tickCsvRow = (tick: Tick): string =>
  [toIst(tick.ts).toISOString().slice(0, 19).replace('T', ' '), tick.ts, tick.instrumentId, tick.price, tick.volume]
    .map(csvCell)
    .join(',');

/** Audit sink: one JSON line per lifecycle event, one file per IST day. */
export const createAuditJournal = (dir: string) => (event: Readonly<AuditEvent>): void => {
  appendLine(path.join(dir, `trades-${istDateKey(event.ts)}.jsonl`), JSON.stringify(event));
};

// Order sink used in simulation mode: records what would have been sent.
export const createIntentJournal = (dir: string) => (intent: Readonly<OrderIntent>): void => {
  appendLine(path.join(dir, `intents-${istDateKey(intent.ts)}.jsonl`), JSON.stringify(intent));
};

export const captureTick = (dir: string, tick: Tick): void => {
  appendLine(path.join(dir, `ticks-${istDateKey(tick.ts)}.csv`), tickCsvRow(tick), TICK_CSV_HEADER);
};

export function parseTickCsv(raw: string): Tick[] {
  const lines = raw.trim().split('\n');
  if (lines.length <= 1) return [];

  const out: Tick[] = [];
  for (let i = 1; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (!line) continue;
    // Each cell was written with JSON.stringify, so the row parses as a JSON array.
    let cells: unknown;
    try {
      cells = JSON.parse(`[${line}]`);
    } catch {
      logEvent('warn', 'Skipping malformed tick row', { line: i + 1 });
      continue;
    }
    if (!Array.isArray(cells) || cells.length < 5) continue;
    const ts = Number(cells[1]);
    const instrumentId = String(cells[2]);
    const price = Number(cells[3]);
    const volume = Number(cells[4]);
    if (!Number.isFinite(ts) || !Number.isFinite(price) || !Number.isFinite(volume) || !instrumentId) continue;
    out.push({ instrumentId, price, volume, ts });
  }
  return out;
}
