import { describe, test, expect } from 'vitest';
import {
  bitsToBytes,
  bitsToText,
  bytesToBits,
  calculateBER,
  concatBlocks,
  countBitErrors,
  hammingWeight,
  isBitVector,
  padBits,
  splitBlocks,
  textToBits,
  toBitVector
} from '../src/utils';
import { DimensionMismatchError } from '../src/errors';

const bits = (s: number[]) => Uint8Array.from(s);

describe('Bit vector helpers', () => {
  test('isBitVector / toBitVector', () => {
    expect(isBitVector([0, 1, 1])).toBe(true);
    expect(isBitVector([0, 2])).toBe(false);
    expect(toBitVector([1, 0, 1])).toEqual(bits([1, 0, 1]));
    expect(() => toBitVector([1, -1])).toThrow(RangeError);
  });

  test('hammingWeight', () => {
    expect(hammingWeight(bits([1, 0, 1, 1, 0]))).toBe(3);
    expect(hammingWeight(new Uint8Array(0))).toBe(0);
  });

  test('countBitErrors and calculateBER', () => {
    const a = bits([1, 0, 1, 0, 1, 0, 1, 0]);
    const b = bits([1, 1, 1, 0, 0, 0, 1, 0]);
    expect(countBitErrors(a, b)).toBe(2);
    expect(calculateBER(a, b)).toBe(0.25);
    expect(calculateBER(new Uint8Array(0), new Uint8Array(0))).toBe(0);
    expect(() => countBitErrors(a, bits([1]))).toThrow(DimensionMismatchError);
  });

  test('splitBlocks and concatBlocks are inverse', () => {
    const v = bits([1, 0, 0, 1, 1, 1]);
    const blocks = splitBlocks(v, 3);
    expect(blocks).toEqual([bits([1, 0, 0]), bits([1, 1, 1])]);
    expect(concatBlocks(blocks)).toEqual(v);
    expect(() => splitBlocks(v, 4)).toThrow(DimensionMismatchError);
    expect(() => splitBlocks(v, 0)).toThrow(RangeError);
  });

  test('padBits rounds up to a multiple with zeros', () => {
    expect(padBits(bits([1, 1, 1]), 4)).toEqual(bits([1, 1, 1, 0]));
    expect(padBits(bits([1, 1, 1, 1]), 4)).toEqual(bits([1, 1, 1, 1]));
    expect(padBits(new Uint8Array(0), 11)).toHaveLength(0);
    expect(() => padBits(bits([1]), 0)).toThrow(RangeError);
  });
});

describe('Bytes and text', () => {
  test('bytesToBits is MSB first', () => {
    expect(bytesToBits(new Uint8Array([0x41]))).toEqual(bits([0, 1, 0, 0, 0, 0, 0, 1]));
  });

  test('bitsToBytes pads the last byte with zeros', () => {
    expect(bitsToBytes(bits([1, 0, 1]))).toEqual(new Uint8Array([0xA0]));
    expect(bitsToBytes(bits([0, 1, 0, 0, 0, 0, 0, 1, 1]))).toEqual(new Uint8Array([0x41, 0x80]));
  });

  test('UTF-8 text', () => {
    expect(textToBits('é')).toEqual(bytesToBits(new Uint8Array([0xC3, 0xA9])));
    expect(bitsToText(textToBits('Hello, 世界'))).toBe('Hello, 世界');
  });

  test('bitsToText drops NUL padding', () => {
    expect(bitsToText(padBits(textToBits('Hi'), 11))).toBe('Hi');
  });
});
