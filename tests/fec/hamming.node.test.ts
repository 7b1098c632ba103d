import { describe, test, expect } from 'vitest';
import { HammingCode, HAMMING_DATA_POSITIONS, syndromeValue } from '../../src/fec/hamming';
import { matrixMultiplyMod2, rankMod2, transpose } from '../../src/gf2/matrix';
import { DimensionMismatchError } from '../../src/errors';
import { countBitErrors } from '../../src/utils';

const code = new HammingCode();
const bits = (s: number[]) => Uint8Array.from(s);

function messageFromIndex(index: number): Uint8Array {
  return Uint8Array.from({ length: 11 }, (_, i) => (index >> i) & 1);
}

describe('Hamming(15,11) structure', () => {
  test('parameters', () => {
    expect(code.params).toEqual({ n: 15, k: 11, t: 1 });
    expect(code.generatorMatrix.length).toBe(11);
    expect(code.generatorMatrix.every(r => r.length === 15)).toBe(true);
    expect(code.parityCheckMatrix.length).toBe(4);
  });

  test('column i of H spells i+1 with the LSB in row 0', () => {
    const H = code.parityCheckMatrix;
    for (let col = 0; col < 15; col++) {
      const value = H[0][col] | (H[1][col] << 1) | (H[2][col] << 2) | (H[3][col] << 3);
      expect(value).toBe(col + 1);
    }
  });

  test('G·Hᵗ = 0 and G has full rank', () => {
    const product = matrixMultiplyMod2(code.generatorMatrix, transpose(code.parityCheckMatrix));
    expect(product.every(row => row.every(b => b === 0))).toBe(true);
    expect(rankMod2(code.generatorMatrix)).toBe(11);
  });

  test('G is systematic on the data positions', () => {
    HAMMING_DATA_POSITIONS.forEach((pos, i) => {
      const column = code.generatorMatrix.map(row => row[pos]);
      expect(column).toEqual(Array.from({ length: 11 }, (_, r) => (r === i ? 1 : 0)));
    });
  });
});

describe('Hamming encoding', () => {
  test('known codeword', () => {
    const message = bits([1, 0, 1, 1, 0, 1, 1, 0, 1, 0, 1]);
    expect(Array.from(code.encode(message))).toEqual([1, 0, 1, 0, 0, 1, 1, 0, 0, 1, 1, 0, 1, 0, 1]);
  });

  test('every codeword has a zero syndrome and yields its message back', () => {
    for (let index = 0; index < 1 << 11; index++) {
      const message = messageFromIndex(index);
      const codeword = code.encode(message);
      expect(syndromeValue(code.syndrome(codeword))).toBe(0);
      expect(code.extractMessage(codeword)).toEqual(message);
    }
  });

  test('rejects wrong lengths', () => {
    expect(() => code.encode(new Uint8Array(10))).toThrow(DimensionMismatchError);
    expect(() => code.decode(new Uint8Array(14))).toThrow(DimensionMismatchError);
    expect(() => code.extractMessage(new Uint8Array(16))).toThrow(DimensionMismatchError);
  });
});

describe('Hamming decoding', () => {
  const message = bits([1, 0, 1, 1, 0, 1, 1, 0, 1, 0, 1]);
  const codeword = code.encode(message);

  test('clean codeword decodes with status success', () => {
    const result = code.decode(codeword);
    expect(result.status).toBe('success');
    if (result.status !== 'uncorrectable') {
      expect(result.codeword).toEqual(codeword);
      expect(result.errorPositions).toEqual([]);
    }
  });

  test.each(Array.from({ length: 15 }, (_, i) => i))('single flip at position %i is corrected', (pos) => {
    const received = new Uint8Array(codeword);
    received[pos] ^= 1;

    const result = code.decode(received);
    expect(result.status).toBe('corrected');
    if (result.status !== 'uncorrectable') {
      expect(result.errorPositions).toEqual([pos]);
      expect(result.codeword).toEqual(codeword);
      expect(code.extractMessage(result.codeword)).toEqual(message);
      // シンドローム値 = エラー位置 + 1
      expect(syndromeValue(result.syndrome)).toBe(pos + 1);
    }
  });

  test('decode does not modify the received word', () => {
    const received = new Uint8Array(codeword);
    received[4] ^= 1;
    const copy = new Uint8Array(received);
    code.decode(received);
    expect(received).toEqual(copy);
  });

  test('flips at positions 0 and 1 are miscorrected by flipping position 2', () => {
    // syndrome = 1 ^ 2 = 3 → 列 2 を反転: 結果は 3 ビット離れた別の符号語
    const received = new Uint8Array(codeword);
    received[0] ^= 1;
    received[1] ^= 1;

    const result = code.decode(received);
    expect(result.status).toBe('corrected');
    if (result.status !== 'uncorrectable') {
      expect(result.errorPositions).toEqual([2]);
      expect(syndromeValue(code.syndrome(result.codeword))).toBe(0);
      expect(countBitErrors(result.codeword, codeword)).toBe(3);
      expect(code.extractMessage(result.codeword)).not.toEqual(message);
    }
  });

  test('every double flip lands on a wrong codeword without being detected', () => {
    for (let i = 0; i < 15; i++) {
      for (let j = i + 1; j < 15; j++) {
        const received = new Uint8Array(codeword);
        received[i] ^= 1;
        received[j] ^= 1;

        const result = code.decode(received);
        expect(result.status).toBe('corrected');
        if (result.status !== 'uncorrectable') {
          expect(result.errorPositions).toEqual([((i + 1) ^ (j + 1)) - 1]);
          expect(result.codeword).not.toEqual(codeword);
        }
      }
    }
  });
});
