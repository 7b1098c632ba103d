/**
 * McEliece encryption: per block c = m·G_pub ⊕ e, wt(e) ≤ t
 */

import { InvalidMessageLengthError, DimensionMismatchError } from '../errors';
import { vectorMatrixMultiplyMod2, xorVectors, type BitVector } from '../gf2/matrix';
import { sampleErrorVector } from '../gf2/random';
import { concatBlocks, isBitVector, splitBlocks } from '../utils';
import { resolveConfig, type EncryptOptions } from './config';
import type { PublicKey } from './types';

function splitMessage(publicKey: PublicKey, message: BitVector): BitVector[] {
  const { k } = publicKey.params;
  const expected = publicKey.blockCount * k;
  if (message.length !== expected) {
    throw new InvalidMessageLengthError(expected, message.length, 'message');
  }
  if (!isBitVector(message)) {
    throw new RangeError('Message entries must be 0 or 1');
  }
  return splitBlocks(message, k);
}

/**
 * Encrypt L·k message bits into L·n ciphertext bits.
 * Every block draws its own error vector; by default of weight exactly t.
 */
export function encrypt(publicKey: PublicKey, message: BitVector, options: EncryptOptions = {}): BitVector {
  const config = resolveConfig(options);
  const { n, t } = publicKey.params;
  const weight = config.errorWeight ?? t;
  if (weight > t) {
    throw new RangeError(`errorWeight ${weight} exceeds the code's correction capability t=${t}`);
  }

  // 長さ検証を先に済ませる（部分的な出力は作らない）
  const blocks = splitMessage(publicKey, message);

  const cipherBlocks = blocks.map(block => {
    const codeword = vectorMatrixMultiplyMod2(block, publicKey.matrix);
    const error = sampleErrorVector(config.random, n, weight);
    return xorVectors(codeword, error);
  });
  return concatBlocks(cipherBlocks);
}

/**
 * Encrypt with caller-chosen error vectors, one n-bit vector per block.
 * Weights are not checked against t, so capacity-boundary behavior can be exercised.
 */
export function encryptWithErrors(publicKey: PublicKey, message: BitVector, errors: readonly BitVector[]): BitVector {
  const { n } = publicKey.params;
  const blocks = splitMessage(publicKey, message);
  if (errors.length !== blocks.length) {
    throw new DimensionMismatchError(`Expected ${blocks.length} error vectors, got ${errors.length}`);
  }

  return concatBlocks(blocks.map((block, i) => {
    const error = errors[i];
    if (error.length !== n) {
      throw new DimensionMismatchError(`Error vector ${i} must be ${n} bits, got ${error.length}`);
    }
    return xorVectors(vectorMatrixMultiplyMod2(block, publicKey.matrix), error);
  }));
}
