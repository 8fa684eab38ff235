// src/errors.ts

export type EngineErrorCode =
  | 'INSUFFICIENT_DATA'
  | 'PRECONDITION'
  | 'AMBIGUOUS_SIGNAL'
  | 'LIMIT_BREACHED'
  | 'CONFIG';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

// Capture window closed without a single tick; the instrument sits out the session.
export class InsufficientDataError extends EngineError {
  readonly instrumentId: string;

  constructor(instrumentId: string, message: string) {
    super('INSUFFICIENT_DATA', message);
    this.instrumentId = instrumentId;
  }
}

// Operation invoked on an entity in the wrong lifecycle state.
export class PreconditionError extends EngineError {
  constructor(message: string) {
    super('PRECONDITION', message);
  }
}

export class AmbiguousSignalError extends EngineError {
  readonly instrumentId: string;
  readonly price: number;

  constructor(instrumentId: string, price: number, upper: number, lower: number) {
    super(
      'AMBIGUOUS_SIGNAL',
      `${instrumentId} price ${price} breaches both upper ${upper} and lower ${lower}`,
    );
    this.instrumentId = instrumentId;
    this.price = price;
  }
}

export type BreachedLimit = 'MAX_TRADES' | 'MAX_DAILY_LOSS' | 'SESSION_CLOSED';

/** Returned (not thrown) when the daily governor refuses a new entry. */
export class LimitBreachedRejection extends EngineError {
  readonly limit: BreachedLimit;
  readonly instrumentId: string;

  constructor(instrumentId: string, limit: BreachedLimit, message: string) {
    super('LIMIT_BREACHED', message);
    this.instrumentId = instrumentId;
    this.limit = limit;
  }
}

export class ConfigError extends EngineError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG', `Invalid strategy config: ${problems.join('; ')}`);
    this.problems = problems;
  }
}
