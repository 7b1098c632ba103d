/**
 * Error taxonomy for the GF(2) algebra, the block codes and the McEliece engine.
 *
 * Every error carries a stable `code` so callers can branch without instanceof
 * checks across module boundaries.
 */

export type McElieceErrorCode =
  | 'DIMENSION_MISMATCH'
  | 'SINGULAR_MATRIX'
  | 'SAMPLING_EXHAUSTED'
  | 'INVALID_MESSAGE_LENGTH'
  | 'UNCORRECTABLE';

export class McElieceError extends Error {
  readonly code: McElieceErrorCode;

  constructor(code: McElieceErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Operand shapes are incompatible. Always a programming error.
 */
export class DimensionMismatchError extends McElieceError {
  constructor(message: string) {
    super('DIMENSION_MISMATCH', message);
  }
}

export class SingularMatrixError extends McElieceError {
  readonly rank: number;
  readonly size: number;

  constructor(rank: number, size: number) {
    super('SINGULAR_MATRIX', `Matrix is singular over GF(2): rank ${rank} < ${size}`);
    this.rank = rank;
    this.size = size;
  }
}

/**
 * Raised when rejection sampling of an invertible matrix runs out of attempts.
 */
export class SamplingExhaustedError extends McElieceError {
  readonly attempts: number;

  constructor(size: number, attempts: number) {
    super('SAMPLING_EXHAUSTED', `No invertible ${size}x${size} matrix found after ${attempts} attempts`);
    this.attempts = attempts;
  }
}

export class InvalidMessageLengthError extends McElieceError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, what: 'message' | 'ciphertext' = 'message') {
    super('INVALID_MESSAGE_LENGTH', `Invalid ${what} length: expected ${expected} bits, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A block's syndrome matches no correctable error pattern.
 * `blockIndex` is -1 when raised outside a multi-block context.
 */
export class UncorrectableError extends McElieceError {
  readonly blockIndex: number;

  constructor(blockIndex: number, reason: string) {
    super('UNCORRECTABLE', blockIndex >= 0 ? `Block ${blockIndex} is uncorrectable: ${reason}` : `Uncorrectable block: ${reason}`);
    this.blockIndex = blockIndex;
  }
}
