/**
 * McEliece key generation: G_pub = S·G·P
 */

import { getBlockCode } from '../fec/codes';
import type { CodeVariant } from '../fec/block-code';
import { matrixMultiplyMod2, transpose } from '../gf2/matrix';
import { randomInvertibleMatrix, randomPermutationMatrix } from '../gf2/random';
import { resolveConfig, type KeyGenerationOptions } from './config';
import type { KeyPair, PrivateKey, PublicKey, PublicKeyInfo } from './types';

export function assertBlockCount(blockCount: number): void {
  if (!Number.isInteger(blockCount) || blockCount <= 0) {
    throw new RangeError(`Block count must be a positive integer, got ${blockCount}`);
  }
}

export function generateKeyPair(variant: CodeVariant, blockCount: number, options: KeyGenerationOptions = {}): KeyPair {
  assertBlockCount(blockCount);
  const config = resolveConfig(options);
  const code = getBlockCode(variant);
  const { n, k } = code.params;

  const { matrix: scrambler, inverse: scramblerInverse } = randomInvertibleMatrix(k, config.random, config.maxSamplingAttempts);
  const permutation = randomPermutationMatrix(n, config.random);
  // 置換行列の逆行列は転置
  const permutationInverse = transpose(permutation);

  const matrix = matrixMultiplyMod2(matrixMultiplyMod2(scrambler, code.generatorMatrix), permutation);

  const publicKey: PublicKey = Object.freeze({
    variant,
    blockCount,
    params: code.params,
    matrix
  });

  const privateKey: PrivateKey = Object.freeze({
    variant,
    blockCount,
    params: code.params,
    code,
    scrambler,
    scramblerInverse,
    permutation,
    permutationInverse
  });

  return Object.freeze({ publicKey, privateKey });
}

/**
 * Dimensions and size of the public key as the block-diagonal L·k × L·n matrix
 */
export function describePublicKey(publicKey: PublicKey): PublicKeyInfo {
  const { n, k } = publicKey.params;
  const L = publicKey.blockCount;
  const rows = L * k;
  const cols = L * n;
  return {
    variant: publicKey.variant,
    blockCount: L,
    rows,
    cols,
    messageBits: rows,
    ciphertextBits: cols,
    expansionRatio: n / k,
    sizeBytes: Math.ceil((rows * cols) / 8)
  };
}
