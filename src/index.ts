// src/index.ts
import { loadEnvOnce } from './loadEnv';
import { loadStrategyConfig } from './config';
import type { StrategyConfig } from './config';
import { logEvent, logger } from './logger';
import { createServer } from './server';
import { SessionEngine } from './sessionEngine';
import { isTradingDay, istDateKey, istTimestamp } from './sessionTime';
import { captureTick, createAuditJournal, createIntentJournal } from './tradeJournal';

loadEnvOnce();

const SCHEDULER_INTERVAL_MS = 30_000;

/**
 * Starts today's session once the market has opened, if today is a trading
 * day and no session ran yet. Runs on a slow interval next to the engine's
 * own timer.
 */
export function scheduleDailySessions(engine: SessionEngine, config: StrategyConfig): NodeJS.Timeout {
  let lastStartedKey: string | null = null;

  const check = (): void => {
    const now = engine.clock.now();
    const dateKey = istDateKey(now);
    if (engine.isActive || lastStartedKey === dateKey) return;
    if (!isTradingDay(now, config.session.holidays)) return;

    const openTs = istTimestamp(dateKey, config.session.marketOpenTime);
    const forceCloseTs = istTimestamp(dateKey, config.session.forceCloseTime);
    if (now < openTs || now >= forceCloseTs) return;

    lastStartedKey = dateKey;
    engine.startSession(openTs);
    engine.startTimer();
  };

  check();
  return setInterval(() => {
    try {
      check();
    } catch (e) {
      logEvent('error', 'Session scheduler failed', { error: String(e) });
    }
  }, SCHEDULER_INTERVAL_MS);
}

function main(): void {
  const config = loadStrategyConfig();
  const engine = new SessionEngine({ config });

  const journalDir = process.env.JOURNAL_DIR || 'logs/journal';
  const captureDir = process.env.CAPTURE_DIR;

  engine.audit.subscribe(createAuditJournal(journalDir));
  engine.orders.subscribe((intent) => {
    logEvent('info', `Order intent ${intent.action}`, intent);
  });
  if (config.engine.simulation) {
    engine.orders.subscribe(createIntentJournal(journalDir));
  } else {
    logEvent('warn', 'Simulation off: order intents are only logged until a broker sink is subscribed');
  }

  const app = createServer(engine, {
    corsOrigins: (process.env.CORS_ORIGINS ?? '')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    onTick: captureDir ? (tick) => captureTick(captureDir, tick) : undefined,
  });

  scheduleDailySessions(engine, config);

  const port = Number(process.env.PORT) || 3000;
  app.listen(port, () => {
    logger.info(
      `Breakout engine listening on http://localhost:${port} (simulation=${config.engine.simulation}, ` +
        `timer=${config.engine.timerIntervalMs}ms)`,
    );
  });
}

if (require.main === module) {
  main();
}
