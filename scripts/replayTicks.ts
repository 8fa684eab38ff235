import fs from 'fs';
import path from 'path';
import { VirtualClock } from '../src/clock';
import { loadStrategyConfig } from '../src/config';
import { loadEnvOnce } from '../src/loadEnv';
import { logger } from '../src/logger';
import { SessionEngine } from '../src/sessionEngine';
import { istTimestamp } from '../src/sessionTime';
import { createAuditJournal, createIntentJournal, parseTickCsv } from '../src/tradeJournal';

function usage(): never {
  // eslint-disable-next-line no-console
  console.log(
    [
      'Usage:',
      '  node dist/scripts/replayTicks.js --date YYYY-MM-DD [--symbol NIFTY] [--captureDir logs/capture]',
      '',
      'Input (written by the server when CAPTURE_DIR is set):',
      '  <captureDir>/ticks-YYYY-MM-DD.csv',
      '',
      'Output:',
      '  replay-output/<date>-<runId>/ with the trade journal, order intents and summary.json.',
    ].join('\n'),
  );
  process.exit(2);
}

function getArg(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

async function main(): Promise<void> {
  loadEnvOnce();
  const date = getArg('--date');
  const captureDir = getArg('--captureDir') ?? path.join('logs', 'capture');
  const symbolFilter = getArg('--symbol')?.toUpperCase() ?? null;
  if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date)) usage();

  const ticksPath = path.resolve(captureDir, `ticks-${date}.csv`);
  if (!fs.existsSync(ticksPath)) {
    logger.error(`No captured ticks at ${ticksPath}`);
    process.exit(1);
  }
  const ticks = parseTickCsv(fs.readFileSync(ticksPath, 'utf8'))
    .filter((t) => !symbolFilter || t.instrumentId === symbolFilter)
    .sort((a, b) => a.ts - b.ts);

  // Replays never place orders.
  const config = loadStrategyConfig(undefined, { ...process.env, SIMULATION: 'true' });
  const openTs = istTimestamp(date, config.session.marketOpenTime);
  const clock = new VirtualClock(openTs);
  const engine = new SessionEngine({ config, clock });

  const outDir = path.join('replay-output', `${date}-${Date.now()}`);
  engine.audit.subscribe(createAuditJournal(outDir));
  engine.orders.subscribe(createIntentJournal(outDir));

  const session = engine.startSession(openTs);
  logger.info(`Replaying ${ticks.length} ticks for ${date}${symbolFilter ? ` (${symbolFilter})` : ''}`);

  // Timer beats are replayed between ticks so capture close and time exits fire as they would live.
  const beat = config.engine.timerIntervalMs;
  let nextBeat = openTs + beat;
  const runBeatsUntil = (ts: number): void => {
    while (nextBeat <= ts && engine.isActive) {
      clock.set(nextBeat);
      engine.onTimer(nextBeat);
      nextBeat += beat;
    }
  };

  for (const tick of ticks) {
    if (tick.ts < clock.now()) continue;
    runBeatsUntil(tick.ts);
    if (!engine.isActive) break;
    clock.set(tick.ts);
    engine.onTick(tick);
  }
  runBeatsUntil(session.forceCloseTs);
  if (engine.isActive) engine.forceCloseSession(clock.now());

  await engine.audit.drain();
  await engine.orders.drain();

  fs.mkdirSync(outDir, { recursive: true });
  const snapshot = engine.snapshot();
  fs.writeFileSync(path.join(outDir, 'summary.json'), JSON.stringify(snapshot, null, 2), 'utf8');

  logger.info(
    `Replay complete: trades=${snapshot.governor?.tradeCount ?? 0} pnl=${snapshot.governor?.realizedPnl ?? 0}. ` +
      `Output in ${path.resolve(outDir)}`,
  );
}

main().catch((e: unknown) => {
  logger.error(`Replay failed: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
  process.exit(1);
});
