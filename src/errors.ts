// src/errors.ts

export type ErrorContext = Readonly<Record<string, unknown>>;

/** Common base so callers can catch every engine failure at once. */
export class TournamentError extends Error {
  constructor(
    message: string,
    public readonly context: ErrorContext = {}
  ) {
    super(message);
    this.name = 'TournamentError';
  }
}

/** Invalid input to a builder or engine (e.g. fewer than two teams). */
export class ConfigurationError extends TournamentError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'ConfigurationError';
  }
}

/** A numeric function called outside its domain. */
export class DomainError extends TournamentError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'DomainError';
  }
}

/** A match (or set of matches) in the wrong state for the requested operation. */
export class PreconditionError extends TournamentError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'PreconditionError';
  }
}

export class InsufficientDataError extends TournamentError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'InsufficientDataError';
  }
}

/** Programming error upstream; not recoverable. */
export class InvariantViolation extends TournamentError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'InvariantViolation';
  }
}
