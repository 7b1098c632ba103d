/**
 * Binary linear block code contract shared by the Hamming and BCH variants
 */

import { DimensionMismatchError } from '../errors';
import { cloneMatrix, matrixVectorMultiplyMod2, vectorMatrixMultiplyMod2, type BitMatrix, type BitVector } from '../gf2/matrix';

export type CodeVariant = 'hamming' | 'bch';

export const CODE_VARIANTS: readonly CodeVariant[] = ['hamming', 'bch'];

export interface CodeParameters {
  readonly n: number;  // 符号長
  readonly k: number;  // 情報長
  readonly t: number;  // 訂正可能エラー数
}

export type BlockDecodeResult =
  | {
    status: 'success' | 'corrected';
    codeword: BitVector;
    errorPositions: number[];   // 反転したビット位置（昇順）
    syndrome: BitVector;
  }
  | {
    status: 'uncorrectable';
    received: BitVector;
    syndrome: BitVector;
    reason: string;
  };

export interface BlockCode {
  readonly variant: CodeVariant;
  readonly params: CodeParameters;
  /** k×n, a fresh copy on every read */
  readonly generatorMatrix: readonly Uint8Array[];
  /** (n-k)×n, H·cᵗ = 0 for every codeword; a fresh copy on every read */
  readonly parityCheckMatrix: readonly Uint8Array[];
  /** Codeword indices that carry the message bits verbatim (systematic positions) */
  readonly informationPositions: readonly number[];

  encode(message: BitVector): BitVector;
  syndrome(received: BitVector): BitVector;
  decode(received: BitVector): BlockDecodeResult;
  /** Solves m·G = c for a valid codeword c */
  extractMessage(codeword: BitVector): BitVector;
}

/**
 * Shared systematic-code plumbing; subclasses supply matrices and a decoder.
 *
 * One instance serves every key in the process, so G and H stay private and
 * callers only ever see copies.
 */
export abstract class SystematicBlockCode implements BlockCode {
  abstract readonly variant: CodeVariant;
  abstract readonly params: CodeParameters;
  abstract readonly informationPositions: readonly number[];
  protected abstract readonly G: readonly Uint8Array[];
  protected abstract readonly H: readonly Uint8Array[];

  abstract decode(received: BitVector): BlockDecodeResult;

  get generatorMatrix(): BitMatrix {
    return cloneMatrix(this.G);
  }

  get parityCheckMatrix(): BitMatrix {
    return cloneMatrix(this.H);
  }

  protected assertLength(bits: BitVector, expected: number, what: string): void {
    if (bits.length !== expected) {
      throw new DimensionMismatchError(`${this.variant} ${what} must be ${expected} bits, got ${bits.length}`);
    }
  }

  encode(message: BitVector): BitVector {
    this.assertLength(message, this.params.k, 'message');
    return vectorMatrixMultiplyMod2(message, this.G);
  }

  syndrome(received: BitVector): BitVector {
    this.assertLength(received, this.params.n, 'received word');
    return matrixVectorMultiplyMod2(this.H, received);
  }

  extractMessage(codeword: BitVector): BitVector {
    this.assertLength(codeword, this.params.n, 'codeword');
    return Uint8Array.from(this.informationPositions, pos => codeword[pos]);
  }

  /** Flip the given positions in a copy of `received` */
  protected flip(received: BitVector, positions: readonly number[]): BitVector {
    const corrected = new Uint8Array(received);
    for (const pos of positions) {
      corrected[pos] ^= 1;
    }
    return corrected;
  }
}

export function isZeroVector(v: BitVector): boolean {
  return v.every(bit => bit === 0);
}
