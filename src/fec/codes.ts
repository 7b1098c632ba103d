import { BCHCode } from './bch';
import type { BlockCode, CodeParameters, CodeVariant } from './block-code';
import { HammingCode } from './hamming';

// 各符号は一度だけ構築して凍結する
const BLOCK_CODES: Readonly<Record<CodeVariant, BlockCode>> = Object.freeze({
  hamming: Object.freeze(new HammingCode()),
  bch: Object.freeze(new BCHCode())
});

export function isCodeVariant(value: string): value is CodeVariant {
  return value === 'hamming' || value === 'bch';
}

export function getBlockCode(variant: CodeVariant): BlockCode {
  const code = BLOCK_CODES[variant];
  if (!code) {
    throw new RangeError(`Unknown code variant: ${String(variant)}`);
  }
  return code;
}

export function getCodeParameters(variant: CodeVariant): CodeParameters {
  return getBlockCode(variant).params;
}

/**
 * Ciphertext bits per plaintext bit, n/k
 */
export function expansionRatio(variant: CodeVariant): number {
  const { n, k } = getCodeParameters(variant);
  return n / k;
}
