/**
 * Base error class for the tt ledger
 */
export class TTError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when parsing fails
 */
export class ParseError extends TTError {
  constructor(
    message: string,
    public readonly input?: string
  ) {
    super(message);
  }
}

/**
 * Error thrown for malformed or non-positive duration input
 */
export class InvalidDurationError extends ParseError {}

/**
 * Error thrown when a ledger record has a missing or unparsable timestamp
 */
export class MalformedRecordError extends TTError {
  constructor(
    message: string,
    public readonly field: 'start' | 'end'
  ) {
    super(message);
  }
}

/**
 * Error thrown when the ledger file cannot be read or written
 */
export class StorageError extends TTError {}

/**
 * Error thrown when validation fails
 */
export class ValidationError extends TTError {}
