import { DEFAULT_MAX_SAMPLING_ATTEMPTS, createSecureRandom, type RandomSource } from '../gf2/random';

export type FailurePolicy = 'fail-fast' | 'collect';

export interface McElieceConfig {
  /** Retry bound for invertible scrambler sampling */
  maxSamplingAttempts: number;
  /** Per-block injected error weight; undefined means exactly t */
  errorWeight: number | undefined;
  /** What decrypt does when a block is uncorrectable */
  failurePolicy: FailurePolicy;
  random: RandomSource;
}

export type McElieceOptions = Partial<McElieceConfig>;

// 各操作が実際に使うフィールドだけを受け付ける
export type KeyGenerationOptions = Pick<McElieceOptions, 'random' | 'maxSamplingAttempts'>;
export type EncryptOptions = Pick<McElieceOptions, 'random' | 'errorWeight'>;
export type DecryptOptions = Pick<McElieceOptions, 'failurePolicy'>;

export const DEFAULT_MCELIECE_CONFIG: Readonly<Omit<McElieceConfig, 'random'>> = Object.freeze({
  maxSamplingAttempts: DEFAULT_MAX_SAMPLING_ATTEMPTS,
  errorWeight: undefined,
  failurePolicy: 'fail-fast'
});

/**
 * Merge options over the defaults. Only the fields the caller gave are
 * validated; a fresh secure source is created when none is given.
 */
export function resolveConfig(options: McElieceOptions = {}): McElieceConfig {
  const { maxSamplingAttempts, errorWeight, failurePolicy } = options;

  if (maxSamplingAttempts !== undefined && (!Number.isInteger(maxSamplingAttempts) || maxSamplingAttempts <= 0)) {
    throw new RangeError(`maxSamplingAttempts must be a positive integer, got ${maxSamplingAttempts}`);
  }
  if (errorWeight !== undefined && (!Number.isInteger(errorWeight) || errorWeight < 0)) {
    throw new RangeError(`errorWeight must be a non-negative integer, got ${errorWeight}`);
  }
  if (failurePolicy !== undefined && failurePolicy !== 'fail-fast' && failurePolicy !== 'collect') {
    throw new RangeError(`Unknown failurePolicy: ${String(failurePolicy)}`);
  }

  // 明示的な undefined でデフォルトを上書きしない
  return {
    maxSamplingAttempts: maxSamplingAttempts ?? DEFAULT_MCELIECE_CONFIG.maxSamplingAttempts,
    errorWeight: errorWeight ?? DEFAULT_MCELIECE_CONFIG.errorWeight,
    failurePolicy: failurePolicy ?? DEFAULT_MCELIECE_CONFIG.failurePolicy,
    random: options.random ?? createSecureRandom()
  };
}
