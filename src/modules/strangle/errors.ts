export type StrangleErrorCode =
  | 'INVALID_TIME'
  | 'INVALID_PRICE'
  | 'QUOTE_UNAVAILABLE'
  | 'ORDER_REJECTED'
  | 'INSTRUMENT_LOOKUP'
  | 'SESSION_REJECTED'
  | 'UNEXPECTED';

export class StrangleError extends Error {
  readonly code: StrangleErrorCode;

  constructor(code: StrangleErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StrangleError';
    this.code = code;
  }
}

export class InvalidTimeError extends StrangleError {
  constructor(message: string) {
    super('INVALID_TIME', message);
    this.name = 'InvalidTimeError';
  }
}

export class InvalidPriceError extends StrangleError {
  constructor(price: number) {
    super('INVALID_PRICE', `Target price must be a positive number, got ${price}`);
    this.name = 'InvalidPriceError';
  }
}

export class QuoteUnavailableError extends StrangleError {
  readonly keys: string[];

  constructor(keys: string[], reason: string, options?: { cause?: unknown }) {
    super('QUOTE_UNAVAILABLE', `Quote unavailable for ${keys.join(', ')}: ${reason}`, options);
    this.name = 'QuoteUnavailableError';
    this.keys = keys;
  }
}

export class OrderRejectedError extends StrangleError {
  readonly symbol: string;
  readonly reason: string;

  constructor(symbol: string, reason: string, options?: { cause?: unknown }) {
    super('ORDER_REJECTED', `Order for ${symbol} rejected: ${reason}`, options);
    this.name = 'OrderRejectedError';
    this.symbol = symbol;
    this.reason = reason;
  }
}

export class InstrumentLookupError extends StrangleError {
  constructor(message: string) {
    super('INSTRUMENT_LOOKUP', message);
    this.name = 'InstrumentLookupError';
  }
}

export class SessionRejectedError extends StrangleError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('SESSION_REJECTED', `Session rejected: ${reason}`, options);
    this.name = 'SessionRejectedError';
  }
}

// The broker SDK rejects with plain `{ message, error_type }` objects as well as Errors.
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function toStrangleError(error: unknown): StrangleError {
  if (error instanceof StrangleError) return error;
  return new StrangleError('UNEXPECTED', describeError(error), { cause: error });
}
