/**
 * Error types
 *
 * Every failure condition of the memory engine and the bundle codec has its
 * own class so callers can branch on `kind` (or `instanceof`) instead of
 * parsing messages.
 */

export type SdmErrorKind =
  | 'MalformedEncoding'
  | 'CounterOverflow'
  | 'LengthMismatch'
  | 'SourceUnavailable'
  | 'UnknownFile'
  | 'DimensionMismatch'
  | 'UnsupportedBackend';

export abstract class SdmError extends Error {
  abstract readonly kind: SdmErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedEncodingError extends SdmError {
  readonly kind = 'MalformedEncoding';
}

export class CounterOverflowError extends SdmError {
  readonly kind = 'CounterOverflow';

  constructor(
    readonly row: number,
    readonly column: number,
    readonly value: number
  ) {
    super(`Counter [${row}][${column}] = ${value} is out of signed byte range (-128 to 127)`);
  }
}

export class LengthMismatchError extends SdmError {
  readonly kind = 'LengthMismatch';

  constructor(
    readonly expected: number,
    readonly available: number
  ) {
    super(`Original length ${expected} exceeds the ${available} bits available in the chunks`);
  }
}

export class SourceUnavailableError extends SdmError {
  readonly kind = 'SourceUnavailable';

  constructor(
    readonly path: string,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unreadable');
    super(`Source file unavailable: ${path} (${reason})`, { cause });
  }
}

export class UnknownFileError extends SdmError {
  readonly kind = 'UnknownFile';

  constructor(
    readonly fileName: string,
    readonly available: string[]
  ) {
    super(
      available.length > 0
        ? `Unknown file "${fileName}". Available: ${available.join(', ')}`
        : `Unknown file "${fileName}". The bundle has no files`
    );
  }
}

export class DimensionMismatchError extends SdmError {
  readonly kind = 'DimensionMismatch';

  constructor(
    readonly what: string,
    readonly expected: number,
    readonly actual: number
  ) {
    super(`${what} has length ${actual}, expected ${expected}`);
  }
}

export class UnsupportedBackendError extends SdmError {
  readonly kind = 'UnsupportedBackend';
}
