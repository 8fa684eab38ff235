// src/logger.ts
import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

// Format timestamp in Indian time (Asia/Kolkata) for readability
const logFormat = printf(info => {
  const tsRaw = typeof info.timestamp === 'string' ? info.timestamp : '';
  let tsIst = tsRaw;
  try {
    const d = new Date(tsRaw);
    tsIst = d.toLocaleString('en-IN', {
      timeZone: 'Asia/Kolkata',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    });
  } catch {
    // fall back to raw timestamp on any error
    tsIst = tsRaw;
  }
  return `${tsIst} [${info.level}] ${String(info.message)}`;
});

// Simple in-memory log buffer for the status endpoint (last N engine logs)
const MAX_IN_MEMORY_LOGS = 500;
const inMemoryLogs: string[] = [];

export const logger = winston.createLogger({
  level: 'debug',
  format: combine(timestamp(), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp(), logFormat),
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

let fileTransportAdded = false;

// LOG_LEVEL / LOG_FILE are read after the env file is loaded, not at import time.
export const configureLogger = (env: NodeJS.ProcessEnv = process.env): void => {
  if (env.LOG_LEVEL) logger.level = env.LOG_LEVEL;
  if (env.LOG_FILE && !fileTransportAdded) {
    logger.add(new winston.transports.File({ filename: env.LOG_FILE }));
    fileTransportAdded = true;
  }
};

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const remember = (line: string): void => {
  inMemoryLogs.push(line);
  if (inMemoryLogs.length > MAX_IN_MEMORY_LOGS) {
    inMemoryLogs.shift();
  }
};

const formatLine = (msg: string, ctx?: unknown): string =>
  ctx !== undefined ? `${msg} ${JSON.stringify(ctx)}` : msg;

export const logEvent = (level: LogLevel, msg: string, ctx?: unknown): void => {
  const line = formatLine(msg, ctx);
  logger.log(level, line);
  remember(line);
};

export const logState = (msg: string, ctx?: unknown): void => {
  logEvent('debug', msg, ctx);
};

export const getRecentLogs = (): string[] => {
  return inMemoryLogs;
};
