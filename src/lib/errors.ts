export type LedgerErrorKind = 'validation' | 'parse' | 'io' | 'not_found';

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = 'LedgerError';
  }
}

/** A required field is missing, empty or out of range. */
export class ValidationError extends LedgerError {
  readonly field?: string;

  constructor(message: string, field?: string, kind: LedgerErrorKind = 'validation') {
    super(kind, message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** A date or amount was present but could not be parsed. */
export class ParseError extends ValidationError {
  constructor(message: string, field?: string) {
    super(message, field, 'parse');
    this.name = 'ParseError';
  }
}

export class IOError extends LedgerError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('io', message, { cause });
    this.name = 'IOError';
    this.path = path;
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export const describeError = (e: unknown) => (e instanceof Error ? e.message : String(e));
