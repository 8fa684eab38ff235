import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { TICK_CSV_HEADER, captureTick, createAuditJournal, parseTickCsv, tickCsvRow } from '../src/tradeJournal';
import type { AuditEvent } from '../src/types';
import { at, buildTick } from './fixtures';

let dir = '';

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'orb-journal-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('tick capture', () => {
  it('formats one CSV row per tick with IST time', () => {
    const tick = buildTick(25010.5, at(1), { volume: 12 });
    expect(tickCsvRow(tick)).toBe(`"2026-10-19 09:16:00",${at(1)},"NIFTY",25010.5,12`);
  });

  it('writes the header once and reads the ticks back', () => {
    captureTick(dir, buildTick(100, at(1), { volume: 3 }));
    captureTick(dir, buildTick(101, at(2), { volume: 4, instrumentId: 'BANKNIFTY' }));

    const raw = fs.readFileSync(path.join(dir, 'ticks-2026-10-19.csv'), 'utf8');
    expect(raw.split('\n')[0]).toBe(TICK_CSV_HEADER);
    expect(parseTickCsv(raw)).toEqual([
      { instrumentId: 'NIFTY', price: 100, volume: 3, ts: at(1) },
      { instrumentId: 'BANKNIFTY', price: 101, volume: 4, ts: at(2) },
    ]);
  });

  it('skips rows it cannot parse', () => {
    const raw = [TICK_CSV_HEADER, 'not,json"', `"x",${at(1)},"NIFTY",100,1`, `"x","soon","NIFTY",100,1`].join('\n');
    expect(parseTickCsv(raw)).toEqual([{ instrumentId: 'NIFTY', price: 100, volume: 1, ts: at(1) }]);
  });
});

describe('createAuditJournal', () => {
  it('appends one JSON line per event to the day file', () => {
    const sink = createAuditJournal(dir);
    const event: AuditEvent = {
      id: 'evt-1',
      type: 'ENTRY',
      instrumentId: 'NIFTY',
      positionId: 'pos-1',
      ts: at(6),
      payload: { entryPrice: 108 },
    };
    sink(event);
    sink({ ...event, id: 'evt-2', type: 'FULL_EXIT' });

    const lines = fs.readFileSync(path.join(dir, 'trades-2026-10-19.jsonl'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toEqual({ ...event, id: 'evt-2', type: 'FULL_EXIT' });
  });
});
