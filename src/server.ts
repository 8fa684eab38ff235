// src/server.ts
import express from 'express';
import cors from 'cors';
import { getRecentLogs, logEvent, logState } from './logger';
import { EngineError } from './errors';
import type { SessionEngine } from './sessionEngine';
import type { Tick } from './types';

export type BodyResult<T> = { ok: true; value: T } | { ok: false; error: string };

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const finite = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);

// POST /tick  { instrumentId, price, volume?, ts? }
export function parseTickBody(body: unknown, nowTs: number): BodyResult<Tick> {
  if (!isRecord(body)) return { ok: false, error: 'body must be a JSON object' };
  const { instrumentId, price, volume, ts } = body;

  if (typeof instrumentId !== 'string' || !instrumentId.trim()) {
    return { ok: false, error: 'instrumentId must be a non-empty string' };
  }
  if (!finite(price) || price <= 0) return { ok: false, error: 'price must be a positive number' };
  if (volume !== undefined && (!finite(volume) || volume < 0)) {
    return { ok: false, error: 'volume must be a non-negative number' };
  }
  if (ts !== undefined && !finite(ts)) return { ok: false, error: 'ts must be epoch milliseconds' };

  return {
    ok: true,
    value: {
      instrumentId: instrumentId.trim().toUpperCase(),
      price,
      volume: volume ?? 0,
      ts: ts ?? nowTs,
    },
  };
}

// POST /session/start  { sessionOpenTs? }
export function parseStartBody(body: unknown): BodyResult<{ sessionOpenTs?: number }> {
  if (body === undefined || body === null) return { ok: true, value: {} };
  if (!isRecord(body)) return { ok: false, error: 'body must be a JSON object' };
  const { sessionOpenTs } = body;
  if (sessionOpenTs === undefined) return { ok: true, value: {} };
  if (!finite(sessionOpenTs)) return { ok: false, error: 'sessionOpenTs must be epoch milliseconds' };
  return { ok: true, value: { sessionOpenTs } };
}

export interface ServerOptions {
  corsOrigins?: string[];
  // Called with every valid tick before the engine sees it (tick capture).
  onTick?: (tick: Tick) => void;
}

export function createServer(engine: SessionEngine, opts: ServerOptions = {}): express.Express {
  const app = express();
  if (opts.corsOrigins && opts.corsOrigins.length) {
    app.use(cors({ origin: opts.corsOrigins, credentials: true }));
  }
  app.use(express.json());

  app.post('/tick', (req, res) => {
    const parsed = parseTickBody(req.body, engine.clock.now());
    if (!parsed.ok) return res.status(400).json({ error: parsed.error });

    opts.onTick?.(parsed.value);
    const outcome = engine.onTick(parsed.value);
    if (outcome === 'ACCEPTED') return res.json({ outcome });
    if (outcome === 'UNKNOWN_INSTRUMENT') return res.status(404).json({ outcome });
    return res.status(409).json({ outcome });
  });

  app.post('/session/start', (req, res) => {
    const parsed = parseStartBody(req.body);
    if (!parsed.ok) return res.status(400).json({ error: parsed.error });

    const session = engine.startSession(parsed.value.sessionOpenTs);
    engine.startTimer();
    return res.json({ message: 'Session started', session });
  });

  app.post('/session/close', (_req, res) => {
    engine.forceCloseSession();
    res.json({ message: 'Session closed', state: engine.snapshot() });
  });

  // Operator flatten: closes everything with reason MANUAL and stops new entries.
  app.post('/flatten', (_req, res) => {
    engine.flattenAll();
    res.json({ message: 'All positions flattened', state: engine.snapshot() });
  });

  app.get('/status', (_req, res) => {
    res.json(engine.snapshot());
  });

  app.get('/orders', (_req, res) => {
    res.json({ orders: engine.orders.recent() });
  });

  app.get('/logs', (_req, res) => {
    res.json({ logs: getRecentLogs() });
  });

  const onError: express.ErrorRequestHandler = (err: unknown, req, res, next) => {
    const isBadJson =
      err instanceof SyntaxError ||
      (isRecord(err) && err.type === 'entity.parse.failed');
    if (isBadJson) {
      logState('Invalid JSON body rejected', {
        method: req.method,
        path: req.path,
        contentType: req.headers['content-type'] ?? null,
      });
      return res.status(400).json({ error: 'invalid_json_body' });
    }
    if (err instanceof EngineError) {
      logEvent('warn', 'Request rejected', { path: req.path, code: err.code, error: err.message });
      return res.status(409).json({ error: err.code, message: err.message });
    }
    return next(err);
  };
  app.use(onError);

  return app;
}
