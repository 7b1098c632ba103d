/**
 * Hamming(15,11) single-error-correcting code
 *
 * - H (4×15): column i is the binary representation of i+1, bit j in row j
 * - parity bits at 1-based positions 1, 2, 4, 8 (0-based 0, 1, 3, 7)
 * - message bits at the remaining 11 positions, in increasing order
 *
 * A weight-2 error always produces a non-zero syndrome that equals some column
 * of H, so the decoder flips a third bit and lands on a different codeword
 * without noticing. That is inherent to a distance-3 code.
 */

import { zeroMatrix, type BitMatrix, type BitVector } from '../gf2/matrix';
import { SystematicBlockCode, isZeroVector, type BlockDecodeResult, type CodeParameters } from './block-code';

export const HAMMING_PARAMS: CodeParameters = Object.freeze({ n: 15, k: 11, t: 1 });

const PARITY_BITS = 4;
export const HAMMING_PARITY_POSITIONS: readonly number[] = Object.freeze([0, 1, 3, 7]);
export const HAMMING_DATA_POSITIONS: readonly number[] = Object.freeze([2, 4, 5, 6, 8, 9, 10, 11, 12, 13, 14]);

function buildParityCheckMatrix(): BitMatrix {
  const H = zeroMatrix(PARITY_BITS, HAMMING_PARAMS.n);
  for (let col = 0; col < HAMMING_PARAMS.n; col++) {
    for (let row = 0; row < PARITY_BITS; row++) {
      H[row][col] = ((col + 1) >> row) & 1;
    }
  }
  return H;
}

function buildGeneratorMatrix(): BitMatrix {
  const G = zeroMatrix(HAMMING_PARAMS.k, HAMMING_PARAMS.n);
  HAMMING_DATA_POSITIONS.forEach((pos, msgBit) => {
    G[msgBit][pos] = 1;
    // データ位置 (1-based) の各ビットが対応するパリティ位置を立てる
    const position1 = pos + 1;
    for (let j = 0; j < PARITY_BITS; j++) {
      if (position1 & (1 << j)) {
        G[msgBit][HAMMING_PARITY_POSITIONS[j]] = 1;
      }
    }
  });
  return G;
}

/** Syndrome bits (row 0 = LSB) as the integer it spells */
export function syndromeValue(syndrome: BitVector): number {
  let value = 0;
  for (let j = 0; j < syndrome.length; j++) {
    value |= syndrome[j] << j;
  }
  return value;
}

export class HammingCode extends SystematicBlockCode {
  readonly variant = 'hamming' as const;
  readonly params = HAMMING_PARAMS;
  protected readonly G: readonly Uint8Array[] = buildGeneratorMatrix();
  protected readonly H: readonly Uint8Array[] = buildParityCheckMatrix();
  readonly informationPositions = HAMMING_DATA_POSITIONS;

  decode(received: BitVector): BlockDecodeResult {
    const syndrome = this.syndrome(received);

    if (isZeroVector(syndrome)) {
      return { status: 'success', codeword: new Uint8Array(received), errorPositions: [], syndrome };
    }

    // シンドロームと一致する H の列を探す
    const errorPos = this.findColumn(syndrome);
    if (errorPos === -1) {
      return {
        status: 'uncorrectable',
        received: new Uint8Array(received),
        syndrome,
        reason: `syndrome ${syndromeValue(syndrome)} matches no column of H`
      };
    }

    return {
      status: 'corrected',
      codeword: this.flip(received, [errorPos]),
      errorPositions: [errorPos],
      syndrome
    };
  }

  private findColumn(syndrome: BitVector): number {
    const H = this.H;
    for (let col = 0; col < this.params.n; col++) {
      let match = true;
      for (let row = 0; row < H.length; row++) {
        if (H[row][col] !== syndrome[row]) {
          match = false;
          break;
        }
      }
      if (match) return col;
    }
    return -1;
  }
}
