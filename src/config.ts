// src/config.ts
import fs from 'fs';
import path from 'path';
import { ConfigError } from './errors';
import { logState } from './logger';
import { parseHhMm } from './sessionTime';
import type { Instrument } from './types';

export interface SessionConfig {
  readonly marketOpenTime: string;   // IST "HH:MM"
  readonly captureMinutes: number;
  readonly forceCloseTime: string;   // IST "HH:MM"
  readonly holidays: readonly string[]; // "YYYY-MM-DD"
}

export interface RiskConfig {
  readonly stopLossPoints: number;
  readonly targetPoints: number | null; // null -> rewardRiskRatio x stop distance
  readonly rewardRiskRatio: number;
  readonly breakoutBuffer: number;
  readonly useAtrStopLoss: boolean;
  readonly atrMultiplier: number;
  readonly atrPeriod: number;
  readonly atrFallback: number;
  readonly atrCandleMinutes: number;
  readonly maxHoldingMinutes: number;
  readonly trailingEnabled: boolean;
  readonly trailingActivationFraction: number;
  readonly trailingTrailFraction: number;
}

export interface LadderStep {
  readonly timeMinutes: number;
  readonly minProfitPct: number;
  readonly exitPct: number; // of the remaining quantity
}

export interface LadderConfig {
  readonly enabled: boolean;
  readonly steps: readonly LadderStep[];
}

export interface VolumeFilterSpec {
  readonly kind: 'volume';
  readonly enabled: boolean;
  readonly multiple: number;
  readonly periods: number;
}

export interface MomentumFilterSpec {
  readonly kind: 'momentum';
  readonly enabled: boolean;
  readonly periods: number;
  readonly tolerance: number;
}

export interface EntryPremiumFilterSpec {
  readonly kind: 'entryPremium';
  readonly enabled: boolean;
  readonly maxPremiumPct: number;
}

export type EntryFilterSpec = VolumeFilterSpec | MomentumFilterSpec | EntryPremiumFilterSpec;

export interface GovernorConfig {
  readonly maxTradesPerDay: number;
  readonly maxDailyLoss: number; // negative floor, e.g. -5000
}

export interface EngineConfig {
  readonly timerIntervalMs: number;
  readonly simulation: boolean;
}

export interface StrategyConfig {
  readonly session: SessionConfig;
  readonly risk: RiskConfig;
  readonly ladder: LadderConfig;
  readonly filters: readonly EntryFilterSpec[];
  readonly governor: GovernorConfig;
  readonly engine: EngineConfig;
  readonly instruments: readonly Readonly<Instrument>[];
}

const DEFAULT_VOLUME_FILTER: VolumeFilterSpec = { kind: 'volume', enabled: true, multiple: 1.2, periods: 10 };
const DEFAULT_MOMENTUM_FILTER: MomentumFilterSpec = { kind: 'momentum', enabled: true, periods: 3, tolerance: 0 };
const DEFAULT_PREMIUM_FILTER: EntryPremiumFilterSpec = { kind: 'entryPremium', enabled: false, maxPremiumPct: 5 };

export const DEFAULT_CONFIG: StrategyConfig = {
  session: {
    marketOpenTime: '09:15',
    captureMinutes: 5,
    forceCloseTime: '15:15',
    holidays: [],
  },
  risk: {
    stopLossPoints: 30,
    targetPoints: null,
    rewardRiskRatio: 2,
    breakoutBuffer: 2,
    useAtrStopLoss: false,
    atrMultiplier: 1.5,
    atrPeriod: 14,
    atrFallback: 0,
    atrCandleMinutes: 5,
    maxHoldingMinutes: 120,
    trailingEnabled: true,
    trailingActivationFraction: 0.5,
    trailingTrailFraction: 0.5,
  },
  ladder: {
    enabled: true,
    steps: [
      // profit gates are % moves of the underlying
      { timeMinutes: 30, minProfitPct: 0.1, exitPct: 30 },
      { timeMinutes: 60, minProfitPct: 0.2, exitPct: 50 },
    ],
  },
  filters: [DEFAULT_VOLUME_FILTER, DEFAULT_MOMENTUM_FILTER, DEFAULT_PREMIUM_FILTER],
  governor: {
    maxTradesPerDay: 3,
    maxDailyLoss: -5000,
  },
  engine: {
    timerIntervalMs: 3000,
    simulation: true,
  },
  instruments: [
    { id: 'NIFTY', stepSize: 50, enabled: true, quantity: 300, lotSize: 75, expiryWeekday: 4 },
    { id: 'BANKNIFTY', stepSize: 100, enabled: true, quantity: 140, lotSize: 35, expiryWeekday: 4 },
  ],
};

// --- raw JSON readers -------------------------------------------------------

type Raw = Record<string, unknown>;

const isRecord = (v: unknown): v is Raw =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

class Reader {
  readonly problems: string[] = [];

  section(raw: Raw, key: string): Raw {
    const v = raw[key];
    if (v === undefined) return {};
    if (isRecord(v)) return v;
    this.problems.push(`${key} must be an object`);
    return {};
  }

  num(raw: Raw, key: string, def: number, at: string): number {
    const v = raw[key];
    if (v === undefined) return def;
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    this.problems.push(`${at}.${key} must be a finite number`);
    return def;
  }

  bool(raw: Raw, key: string, def: boolean, at: string): boolean {
    const v = raw[key];
    if (v === undefined) return def;
    if (typeof v === 'boolean') return v;
    this.problems.push(`${at}.${key} must be a boolean`);
    return def;
  }

  str(raw: Raw, key: string, def: string, at: string): string {
    const v = raw[key];
    if (v === undefined) return def;
    if (typeof v === 'string') return v;
    this.problems.push(`${at}.${key} must be a string`);
    return def;
  }

  list(raw: Raw, key: string, at: string): unknown[] | undefined {
    const v = raw[key];
    if (v === undefined) return undefined;
    if (Array.isArray(v)) return v;
    this.problems.push(`${at}.${key} must be an array`);
    return undefined;
  }
}

const readSession = (r: Reader, raw: Raw): SessionConfig => {
  const d = DEFAULT_CONFIG.session;
  const holidays = r.list(raw, 'holidays', 'session');
  return {
    marketOpenTime: r.str(raw, 'marketOpenTime', d.marketOpenTime, 'session'),
    captureMinutes: r.num(raw, 'captureMinutes', d.captureMinutes, 'session'),
    forceCloseTime: r.str(raw, 'forceCloseTime', d.forceCloseTime, 'session'),
    holidays: holidays
      ? holidays.filter((h): h is string => {
        if (typeof h === 'string') return true;
        r.problems.push('session.holidays must contain strings');
        return false;
      })
      : d.holidays,
  };
};

const readRisk = (r: Reader, raw: Raw): RiskConfig => {
  const d = DEFAULT_CONFIG.risk;
  return {
    stopLossPoints: r.num(raw, 'stopLossPoints', d.stopLossPoints, 'risk'),
    targetPoints:
      raw.targetPoints === undefined || raw.targetPoints === null
        ? d.targetPoints
        : r.num(raw, 'targetPoints', 0, 'risk'),
    rewardRiskRatio: r.num(raw, 'rewardRiskRatio', d.rewardRiskRatio, 'risk'),
    breakoutBuffer: r.num(raw, 'breakoutBuffer', d.breakoutBuffer, 'risk'),
    useAtrStopLoss: r.bool(raw, 'useAtrStopLoss', d.useAtrStopLoss, 'risk'),
    atrMultiplier: r.num(raw, 'atrMultiplier', d.atrMultiplier, 'risk'),
    atrPeriod: r.num(raw, 'atrPeriod', d.atrPeriod, 'risk'),
    atrFallback: r.num(raw, 'atrFallback', d.atrFallback, 'risk'),
    atrCandleMinutes: r.num(raw, 'atrCandleMinutes', d.atrCandleMinutes, 'risk'),
    maxHoldingMinutes: r.num(raw, 'maxHoldingMinutes', d.maxHoldingMinutes, 'risk'),
    trailingEnabled: r.bool(raw, 'trailingEnabled', d.trailingEnabled, 'risk'),
    trailingActivationFraction: r.num(raw, 'trailingActivationFraction', d.trailingActivationFraction, 'risk'),
    trailingTrailFraction: r.num(raw, 'trailingTrailFraction', d.trailingTrailFraction, 'risk'),
  };
};

const readLadder = (r: Reader, raw: Raw): LadderConfig => {
  const d = DEFAULT_CONFIG.ladder;
  const steps = r.list(raw, 'steps', 'ladder');
  return {
    enabled: r.bool(raw, 'enabled', d.enabled, 'ladder'),
    steps: steps
      ? steps.map((s, i) => {
        const at = `ladder.steps[${i}]`;
        const step = isRecord(s) ? s : {};
        if (!isRecord(s)) r.problems.push(`${at} must be an object`);
        return {
          timeMinutes: r.num(step, 'timeMinutes', NaN, at),
          minProfitPct: r.num(step, 'minProfitPct', NaN, at),
          exitPct: r.num(step, 'exitPct', NaN, at),
        };
      })
      : d.steps,
  };
};

const readFilters = (r: Reader, raw: Raw): EntryFilterSpec[] => {
  const volume = r.section(raw, 'volume');
  const momentum = r.section(raw, 'momentum');
  const premium = r.section(raw, 'entryPremium');
  return [
    {
      kind: 'volume',
      enabled: r.bool(volume, 'enabled', DEFAULT_VOLUME_FILTER.enabled, 'filters.volume'),
      multiple: r.num(volume, 'multiple', DEFAULT_VOLUME_FILTER.multiple, 'filters.volume'),
      periods: r.num(volume, 'periods', DEFAULT_VOLUME_FILTER.periods, 'filters.volume'),
    },
    {
      kind: 'momentum',
      enabled: r.bool(momentum, 'enabled', DEFAULT_MOMENTUM_FILTER.enabled, 'filters.momentum'),
      periods: r.num(momentum, 'periods', DEFAULT_MOMENTUM_FILTER.periods, 'filters.momentum'),
      tolerance: r.num(momentum, 'tolerance', DEFAULT_MOMENTUM_FILTER.tolerance, 'filters.momentum'),
    },
    {
      kind: 'entryPremium',
      enabled: r.bool(premium, 'enabled', DEFAULT_PREMIUM_FILTER.enabled, 'filters.entryPremium'),
      maxPremiumPct: r.num(premium, 'maxPremiumPct', DEFAULT_PREMIUM_FILTER.maxPremiumPct, 'filters.entryPremium'),
    },
  ];
};

const readInstruments = (r: Reader, raw: unknown[] | undefined): Instrument[] => {
  if (!raw) return DEFAULT_CONFIG.instruments.map((i) => ({ ...i }));
  return raw.map((item, i) => {
    const at = `instruments[${i}]`;
    const rec = isRecord(item) ? item : {};
    if (!isRecord(item)) r.problems.push(`${at} must be an object`);
    const lotSize = r.num(rec, 'lotSize', 1, at);
    return {
      id: r.str(rec, 'id', '', at),
      stepSize: r.num(rec, 'stepSize', NaN, at),
      enabled: r.bool(rec, 'enabled', true, at),
      quantity: r.num(rec, 'quantity', lotSize, at),
      lotSize,
      expiryWeekday: r.num(rec, 'expiryWeekday', 4, at),
    };
  });
};

// --- env overrides ------------------------------------------------------------

const envNumber = (env: NodeJS.ProcessEnv, name: string, problems: string[]): number | undefined => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    problems.push(`env ${name} must be a number`);
    return undefined;
  }
  return n;
};

const envBool = (env: NodeJS.ProcessEnv, name: string, problems: string[]): boolean | undefined => {
  const raw = (env[name] ?? '').trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === '1' || raw === 'true' || raw === 'yes') return true;
  if (raw === '0' || raw === 'false' || raw === 'no') return false;
  problems.push(`env ${name} must be a boolean`);
  return undefined;
};

// --- validation ---------------------------------------------------------------

const isInteger = (n: number): boolean => Number.isInteger(n);
const isFraction = (n: number): boolean => n > 0 && n <= 1;

export function validateStrategyConfig(cfg: StrategyConfig): string[] {
  const problems: string[] = [];
  const { session, risk, ladder, governor, engine } = cfg;

  for (const key of ['marketOpenTime', 'forceCloseTime'] as const) {
    try {
      parseHhMm(session[key]);
    } catch {
      problems.push(`session.${key} must be HH:MM, got "${session[key]}"`);
    }
  }
  if (!(session.captureMinutes > 0)) problems.push('session.captureMinutes must be positive');
  for (const h of session.holidays) {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(h)) problems.push(`session.holidays entry "${h}" must be YYYY-MM-DD`);
  }

  if (!(risk.stopLossPoints > 0)) problems.push('risk.stopLossPoints must be positive');
  if (risk.targetPoints !== null && !(risk.targetPoints > 0)) problems.push('risk.targetPoints must be positive or null');
  if (!(risk.rewardRiskRatio > 0)) problems.push('risk.rewardRiskRatio must be positive');
  if (!Number.isFinite(risk.breakoutBuffer)) problems.push('risk.breakoutBuffer must be finite');
  if (!(risk.atrMultiplier > 0)) problems.push('risk.atrMultiplier must be positive');
  if (!(risk.atrPeriod >= 1) || !isInteger(risk.atrPeriod)) problems.push('risk.atrPeriod must be a positive integer');
  if (!(risk.atrFallback >= 0)) problems.push('risk.atrFallback must be >= 0');
  if (!(risk.atrCandleMinutes > 0)) problems.push('risk.atrCandleMinutes must be positive');
  if (!(risk.maxHoldingMinutes > 0)) problems.push('risk.maxHoldingMinutes must be positive');
  if (!isFraction(risk.trailingActivationFraction)) problems.push('risk.trailingActivationFraction must be in (0, 1]');
  if (!isFraction(risk.trailingTrailFraction)) problems.push('risk.trailingTrailFraction must be in (0, 1]');

  let prevTime = -Infinity;
  ladder.steps.forEach((s, i) => {
    const at = `ladder.steps[${i}]`;
    if (!(s.timeMinutes >= 0)) problems.push(`${at}.timeMinutes must be >= 0`);
    if (!Number.isFinite(s.minProfitPct)) problems.push(`${at}.minProfitPct must be finite`);
    if (!(s.exitPct > 0 && s.exitPct <= 100)) problems.push(`${at}.exitPct must be in (0, 100]`);
    if (s.timeMinutes <= prevTime) problems.push(`${at}.timeMinutes must be strictly ascending`);
    prevTime = s.timeMinutes;
  });

  for (const f of cfg.filters) {
    switch (f.kind) {
      case 'volume':
        if (!(f.multiple > 0)) problems.push('filters.volume.multiple must be positive');
        if (!(f.periods >= 1) || !isInteger(f.periods)) problems.push('filters.volume.periods must be a positive integer');
        break;
      case 'momentum':
        if (!(f.periods >= 2) || !isInteger(f.periods)) problems.push('filters.momentum.periods must be an integer >= 2');
        if (!(f.tolerance >= 0)) problems.push('filters.momentum.tolerance must be >= 0');
        break;
      case 'entryPremium':
        if (!(f.maxPremiumPct >= 0)) problems.push('filters.entryPremium.maxPremiumPct must be >= 0');
        break;
    }
  }

  if (!(governor.maxTradesPerDay >= 0) || !isInteger(governor.maxTradesPerDay)) {
    problems.push('governor.maxTradesPerDay must be a non-negative integer');
  }
  if (!(governor.maxDailyLoss < 0)) problems.push('governor.maxDailyLoss must be negative');
  if (!(engine.timerIntervalMs > 0)) problems.push('engine.timerIntervalMs must be positive');

  const seen = new Set<string>();
  cfg.instruments.forEach((inst, i) => {
    const at = `instruments[${i}]`;
    if (!inst.id) problems.push(`${at}.id is required`);
    if (seen.has(inst.id)) problems.push(`${at}.id "${inst.id}" is duplicated`);
    seen.add(inst.id);
    if (!(inst.stepSize > 0)) problems.push(`${at}.stepSize must be positive`);
    if (!(inst.lotSize >= 1) || !isInteger(inst.lotSize)) problems.push(`${at}.lotSize must be a positive integer`);
    if (!(inst.quantity >= inst.lotSize) || !isInteger(inst.quantity) || inst.quantity % inst.lotSize !== 0) {
      problems.push(`${at}.quantity must be a whole number of lots`);
    }
    if (!(inst.expiryWeekday >= 1 && inst.expiryWeekday <= 5) || !isInteger(inst.expiryWeekday)) {
      problems.push(`${at}.expiryWeekday must be 1..5`);
    }
  });

  return problems;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
};

/** Builds a frozen config from parsed JSON, defaults and env overrides. */
export function parseStrategyConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): StrategyConfig {
  const r = new Reader();
  const root = isRecord(raw) ? raw : {};
  if (!isRecord(raw)) r.problems.push('config root must be an object');

  const governorRaw = r.section(root, 'governor');
  const engineRaw = r.section(root, 'engine');
  let risk = readRisk(r, r.section(root, 'risk'));
  let governor: GovernorConfig = {
    maxTradesPerDay: r.num(governorRaw, 'maxTradesPerDay', DEFAULT_CONFIG.governor.maxTradesPerDay, 'governor'),
    maxDailyLoss: r.num(governorRaw, 'maxDailyLoss', DEFAULT_CONFIG.governor.maxDailyLoss, 'governor'),
  };
  let engine: EngineConfig = {
    timerIntervalMs: r.num(engineRaw, 'timerIntervalMs', DEFAULT_CONFIG.engine.timerIntervalMs, 'engine'),
    simulation: r.bool(engineRaw, 'simulation', DEFAULT_CONFIG.engine.simulation, 'engine'),
  };

  const maxTrades = envNumber(env, 'MAX_TRADES_PER_DAY', r.problems);
  const maxLoss = envNumber(env, 'MAX_DAILY_LOSS', r.problems);
  const useAtr = envBool(env, 'USE_ATR_STOP', r.problems);
  const simulation = envBool(env, 'SIMULATION', r.problems);
  if (maxTrades !== undefined) governor = { ...governor, maxTradesPerDay: maxTrades };
  if (maxLoss !== undefined) governor = { ...governor, maxDailyLoss: maxLoss };
  if (useAtr !== undefined) risk = { ...risk, useAtrStopLoss: useAtr };
  if (simulation !== undefined) engine = { ...engine, simulation };

  const cfg: StrategyConfig = {
    session: readSession(r, r.section(root, 'session')),
    risk,
    ladder: readLadder(r, r.section(root, 'ladder')),
    filters: readFilters(r, r.section(root, 'filters')),
    governor,
    engine,
    instruments: readInstruments(r, r.list(root, 'instruments', 'config')),
  };

  const problems = [...r.problems, ...validateStrategyConfig(cfg)];
  if (problems.length) throw new ConfigError(problems);
  return deepFreeze(cfg);
}

export function loadStrategyConfig(
  filePath: string = process.env.STRATEGY_CONFIG_PATH || path.join('config', 'strategy.json'),
  env: NodeJS.ProcessEnv = process.env,
): StrategyConfig {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    logState('Strategy config not found, using defaults', { path: resolved });
    return parseStrategyConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (e) {
    throw new ConfigError([`${resolved} is not valid JSON: ${String(e)}`]);
  }
  const cfg = parseStrategyConfig(raw, env);
  logState('Strategy config loaded', {
    path: resolved,
    instruments: cfg.instruments.map((i) => i.id),
  });
  return cfg;
}
