/**
 * Error taxonomy for match-key issuance and verification.
 *
 * Every error carries a machine-readable error_type for structured log lines.
 * None of these is process-fatal: validation errors reject the request,
 * storage read errors are degraded to empty history by the ledger.
 */

export type InputValidationErrorType =
  | 'MISSING_ATTRIBUTE'
  | 'INVALID_DATE'
  | 'INVALID_TIME'
  | 'INPUT_LENGTH'
  | 'INVALID_TOKEN_LENGTH'
  | 'UNKNOWN_OPERATION';

export class InputValidationError extends Error {
  public readonly error_type: InputValidationErrorType;

  constructor(error_type: InputValidationErrorType, message: string) {
    super(message);
    this.name = 'InputValidationError';
    this.error_type = error_type;
  }
}

/**
 * Thrown by verify() when the trimmed candidate is not exactly token-length.
 * No comparison is attempted.
 */
export class InputLengthError extends InputValidationError {
  public readonly expected_length: number;
  public readonly actual_length: number;

  constructor(expected_length: number, actual_length: number) {
    super(
      'INPUT_LENGTH',
      `Token must contain exactly ${expected_length} characters, got ${actual_length}`
    );
    this.name = 'InputLengthError';
    this.expected_length = expected_length;
    this.actual_length = actual_length;
  }
}

export class TemplateSyntaxError extends Error {
  public readonly error_type = 'MALFORMED_PLACEHOLDER' as const;
  /** 0-based offset of the unmatched opening brace. */
  public readonly offset: number;

  constructor(offset: number, message: string) {
    super(message);
    this.name = 'TemplateSyntaxError';
    this.offset = offset;
  }
}

export type StorageErrorType = 'READ_FAILED' | 'CORRUPT' | 'WRITE_FAILED';

export class StorageError extends Error {
  public readonly error_type: StorageErrorType;
  public readonly path: string;

  constructor(error_type: StorageErrorType, path: string, message: string) {
    super(message);
    this.name = 'StorageError';
    this.error_type = error_type;
    this.path = path;
  }
}

/** Machine-readable classification for any thrown value. */
export function errorTypeOf(err: unknown): string {
  if (
    err instanceof InputValidationError ||
    err instanceof TemplateSyntaxError ||
    err instanceof StorageError
  ) {
    return err.error_type;
  }
  return 'UNKNOWN';
}
