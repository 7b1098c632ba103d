import { describe, test, expect } from 'vitest';
import { expansionRatio, getBlockCode, getCodeParameters, isCodeVariant } from '../../src/fec/codes';
import { CODE_VARIANTS } from '../../src/fec/block-code';
import { HammingCode } from '../../src/fec/hamming';
import { BCHCode } from '../../src/fec/bch';

describe('Block code registry', () => {
  test('variants', () => {
    expect(CODE_VARIANTS).toEqual(['hamming', 'bch']);
    expect(isCodeVariant('hamming')).toBe(true);
    expect(isCodeVariant('bch')).toBe(true);
    expect(isCodeVariant('golay')).toBe(false);
  });

  test('returns one shared instance per variant', () => {
    expect(getBlockCode('hamming')).toBeInstanceOf(HammingCode);
    expect(getBlockCode('bch')).toBeInstanceOf(BCHCode);
    expect(getBlockCode('bch')).toBe(getBlockCode('bch'));
    expect(Object.isFrozen(getBlockCode('hamming'))).toBe(true);
  });

  test('parameters and expansion ratio', () => {
    expect(getCodeParameters('hamming')).toEqual({ n: 15, k: 11, t: 1 });
    expect(getCodeParameters('bch')).toEqual({ n: 15, k: 7, t: 2 });
    expect(expansionRatio('hamming')).toBe(15 / 11);
    expect(expansionRatio('bch')).toBe(15 / 7);
  });
});
