import { DimensionMismatchError } from './errors';
import type { BitVector } from './gf2/matrix';

// ==============================================================================
// Bit vector helpers
// ==============================================================================

export function isBitVector(value: ArrayLike<number>): boolean {
  for (let i = 0; i < value.length; i++) {
    if (value[i] !== 0 && value[i] !== 1) return false;
  }
  return true;
}

/**
 * Normalize an array of 0/1 numbers into a bit vector
 */
export function toBitVector(bits: ArrayLike<number>): BitVector {
  if (!isBitVector(bits)) {
    throw new RangeError('Bit vector entries must be 0 or 1');
  }
  return Uint8Array.from(bits);
}

export function hammingWeight(bits: BitVector): number {
  let weight = 0;
  for (let i = 0; i < bits.length; i++) {
    weight += bits[i];
  }
  return weight;
}

export function countBitErrors(originalBits: BitVector, receivedBits: BitVector): number {
  if (originalBits.length !== receivedBits.length) {
    throw new DimensionMismatchError(`Bit arrays must have same length: ${originalBits.length} != ${receivedBits.length}`);
  }
  let errors = 0;
  for (let i = 0; i < originalBits.length; i++) {
    if (originalBits[i] !== receivedBits[i]) {
      errors++;
    }
  }
  return errors;
}

/**
 * Calculate Bit Error Rate between two bit arrays
 * @returns BER (0.0 to 1.0)
 */
export function calculateBER(originalBits: BitVector, receivedBits: BitVector): number {
  const errors = countBitErrors(originalBits, receivedBits);
  return originalBits.length === 0 ? 0 : errors / originalBits.length;
}

export function splitBlocks(bits: BitVector, blockSize: number): BitVector[] {
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new RangeError(`Block size must be a positive integer, got ${blockSize}`);
  }
  if (bits.length % blockSize !== 0) {
    throw new DimensionMismatchError(`Length ${bits.length} is not a multiple of block size ${blockSize}`);
  }
  const blocks: BitVector[] = [];
  for (let offset = 0; offset < bits.length; offset += blockSize) {
    blocks.push(bits.slice(offset, offset + blockSize));
  }
  return blocks;
}

export function concatBlocks(blocks: readonly BitVector[]): BitVector {
  const total = blocks.reduce((sum, b) => sum + b.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const block of blocks) {
    out.set(block, offset);
    offset += block.length;
  }
  return out;
}

/**
 * Zero-pad to the next multiple of `multiple` bits
 */
export function padBits(bits: BitVector, multiple: number): BitVector {
  if (!Number.isInteger(multiple) || multiple <= 0) {
    throw new RangeError(`Padding multiple must be a positive integer, got ${multiple}`);
  }
  const padded = new Uint8Array(Math.ceil(bits.length / multiple) * multiple);
  padded.set(bits);
  return padded;
}

// ==============================================================================
// Text <-> bits
// ==============================================================================

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * バイト配列をビット配列に変換（最上位ビットから）
 */
export function bytesToBits(bytes: Uint8Array): BitVector {
  const bits = new Uint8Array(bytes.length * 8);
  for (let i = 0; i < bytes.length; i++) {
    for (let j = 0; j < 8; j++) {
      bits[i * 8 + j] = (bytes[i] >> (7 - j)) & 1;
    }
  }
  return bits;
}

/**
 * ビット配列をバイト配列に変換（端数は 0 で埋める）
 */
export function bitsToBytes(bits: BitVector): Uint8Array {
  const bytes = new Uint8Array(Math.ceil(bits.length / 8));
  for (let i = 0; i < bits.length; i++) {
    if (bits[i]) {
      bytes[i >> 3] |= 1 << (7 - (i % 8));
    }
  }
  return bytes;
}

export function textToBits(text: string): BitVector {
  return bytesToBits(textEncoder.encode(text));
}

/**
 * Inverse of textToBits. NUL bytes (e.g. from block padding) are dropped.
 */
export function bitsToText(bits: BitVector): string {
  const bytes = bitsToBytes(bits).filter(b => b !== 0);
  return textDecoder.decode(bytes);
}
