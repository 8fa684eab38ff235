// src/clockGate.ts
import { ConfigError } from './errors';
import { MINUTE_MS, istTimestamp } from './sessionTime';
import type { SessionConfig } from './config';

export interface ClockGateOptions {
  sessionOpenTs: number;
  captureDurationMs: number;
  forceCloseTs: number;
}

/**
 * Answers the two time questions of a session: has the opening-range
 * window closed, and is it time to flatten everything. Holds no state
 * besides the immutable session boundaries; callers pass `now` from
 * whatever clock they run on.
 */
export class ClockGate {
  readonly sessionOpenTs: number;
  readonly captureWindowEnd: number;
  readonly forceCloseTs: number;

  constructor(opts: ClockGateOptions) {
    if (!(opts.captureDurationMs > 0)) {
      throw new ConfigError([`capture duration must be positive, got ${opts.captureDurationMs}`]);
    }
    const captureWindowEnd = opts.sessionOpenTs + opts.captureDurationMs;
    if (opts.forceCloseTs <= captureWindowEnd) {
      throw new ConfigError(['force-close time must be after the capture window ends']);
    }
    this.sessionOpenTs = opts.sessionOpenTs;
    this.captureWindowEnd = captureWindowEnd;
    this.forceCloseTs = opts.forceCloseTs;
  }

  static forSession(sessionOpenTs: number, session: SessionConfig, dateKey: string): ClockGate {
    return new ClockGate({
      sessionOpenTs,
      captureDurationMs: session.captureMinutes * MINUTE_MS,
      forceCloseTs: istTimestamp(dateKey, session.forceCloseTime),
    });
  }

  isCaptureWindowClosed(now: number): boolean {
    return now >= this.captureWindowEnd;
  }

  isSessionForceClose(now: number): boolean {
    return now >= this.forceCloseTs;
  }
}
