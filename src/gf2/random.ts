/**
 * Random sources and random GF(2) structures
 *
 * All sampling goes through an explicit RandomSource so that key generation and
 * error injection can be reproduced from a seed in tests.
 */

import { shake256 } from '@noble/hashes/sha3';
import { randomBytes, utf8ToBytes } from '@noble/hashes/utils';
import { SamplingExhaustedError, SingularMatrixError } from '../errors';
import { invert, zeroMatrix, type BitMatrix, type BitVector } from './matrix';

export interface RandomSource {
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
  /** Uniform bit */
  nextBit(): 0 | 1;
}

export type RandomSeed = string | number | Uint8Array;

const UINT32_RANGE = 0x1_0000_0000;
const POOL_SIZE = 256;

/**
 * Byte-stream backed source; uniform integers by rejection sampling on 32-bit words
 */
class ByteStreamRandom implements RandomSource {
  private pool: Uint8Array = new Uint8Array(0);
  private offset = 0;

  constructor(private readonly refill: (size: number) => Uint8Array) {}

  private nextUint32(): number {
    if (this.offset + 4 > this.pool.length) {
      this.pool = this.refill(POOL_SIZE);
      this.offset = 0;
    }
    const p = this.pool;
    const o = this.offset;
    this.offset += 4;
    return ((p[o] << 24) | (p[o + 1] << 16) | (p[o + 2] << 8) | p[o + 3]) >>> 0;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0 || bound > UINT32_RANGE) {
      throw new RangeError(`Random bound must be an integer in [1, 2^32], got ${bound}`);
    }
    // 2^32 を bound の倍数に切り詰めた範囲外は捨てる（剰余バイアス除去）
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (;;) {
      const x = this.nextUint32();
      if (x < limit) return x % bound;
    }
  }

  nextBit(): 0 | 1 {
    return this.nextInt(2) === 0 ? 0 : 1;
  }
}

/**
 * CSPRNG-backed source (default for key generation and encryption)
 */
export function createSecureRandom(): RandomSource {
  return new ByteStreamRandom(size => randomBytes(size));
}

/**
 * Deterministic source: SHAKE256 XOF stream expanded from the seed.
 * Same seed, same sequence of draws.
 */
export function createSeededRandom(seed: RandomSeed): RandomSource {
  const seedBytes = typeof seed === 'number' ? utf8ToBytes(`seed:${seed}`)
    : typeof seed === 'string' ? utf8ToBytes(seed)
    : new Uint8Array(seed);
  const xof = shake256.create({}).update(seedBytes);
  return new ByteStreamRandom(size => xof.xof(size));
}

export function randomBitVector(rng: RandomSource, length: number): BitVector {
  const v = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    v[i] = rng.nextBit();
  }
  return v;
}

export function randomBitMatrix(rng: RandomSource, rows: number, cols: number): BitMatrix {
  return Array(rows).fill(0).map(() => randomBitVector(rng, cols));
}

/**
 * Fisher-Yates shuffle of [0, n)
 */
export function randomPermutation(rng: RandomSource, n: number): number[] {
  const perm = Array(n).fill(0).map((_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1);
    [perm[i], perm[j]] = [perm[j], perm[i]];
  }
  return perm;
}

/**
 * Row i carries its single 1 in column perm[i], so v·P moves bit i to perm[i].
 */
export function permutationToMatrix(perm: readonly number[]): BitMatrix {
  const n = perm.length;
  const seen = new Set(perm);
  if (seen.size !== n || perm.some(p => !Number.isInteger(p) || p < 0 || p >= n)) {
    throw new RangeError(`Not a permutation of [0, ${n}): [${perm.join(', ')}]`);
  }
  const P = zeroMatrix(n, n);
  for (let i = 0; i < n; i++) {
    P[i][perm[i]] = 1;
  }
  return P;
}

export function randomPermutationMatrix(n: number, rng: RandomSource = createSecureRandom()): BitMatrix {
  return permutationToMatrix(randomPermutation(rng, n));
}

export interface InvertibleSample {
  matrix: BitMatrix;
  inverse: BitMatrix;
  attempts: number;
}

export const DEFAULT_MAX_SAMPLING_ATTEMPTS = 1000;

// 15x15 でも一様サンプルが正則になる確率は約 0.29 なので、これを超えるのは異常
const ATTEMPT_WARNING_THRESHOLD = 50;

/**
 * Rejection-sample a uniformly random invertible size×size matrix.
 * @throws SamplingExhaustedError when maxAttempts samples were all singular
 */
export function randomInvertibleMatrix(
  size: number,
  rng: RandomSource = createSecureRandom(),
  maxAttempts: number = DEFAULT_MAX_SAMPLING_ATTEMPTS
): InvertibleSample {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Matrix size must be a positive integer, got ${size}`);
  }
  for (let attempts = 1; attempts <= maxAttempts; attempts++) {
    const candidate = randomBitMatrix(rng, size, size);
    try {
      const inverse = invert(candidate);
      if (attempts > ATTEMPT_WARNING_THRESHOLD) {
        console.warn(`randomInvertibleMatrix: ${size}x${size} sample needed ${attempts} attempts`);
      }
      return { matrix: candidate, inverse, attempts };
    } catch (error) {
      if (!(error instanceof SingularMatrixError)) {
        throw error;
      }
      // 特異行列: 再サンプル
    }
  }
  throw new SamplingExhaustedError(size, maxAttempts);
}

/**
 * Error vector of length n with exactly `weight` ones at distinct uniform positions
 */
export function sampleErrorVector(rng: RandomSource, n: number, weight: number): BitVector {
  if (!Number.isInteger(weight) || weight < 0 || weight > n) {
    throw new RangeError(`Error weight must be an integer in [0, ${n}], got ${weight}`);
  }
  // 部分 Fisher-Yates: 先頭 weight 個だけ確定させる
  const positions = Array(n).fill(0).map((_, i) => i);
  const e = new Uint8Array(n);
  for (let i = 0; i < weight; i++) {
    const j = i + rng.nextInt(n - i);
    [positions[i], positions[j]] = [positions[j], positions[i]];
    e[positions[i]] = 1;
  }
  return e;
}
