/**
 * Key and result structures for the McEliece engine
 */

import type { BlockCode, CodeParameters, CodeVariant } from '../fec/block-code';
import type { BitVector } from '../gf2/matrix';

/**
 * G_pub = S·G·P (k×n). Every one of the `blockCount` message blocks is
 * encoded with the same matrix, i.e. the conceptual public key is the
 * block-diagonal repetition of `matrix`.
 */
export interface PublicKey {
  readonly variant: CodeVariant;
  readonly blockCount: number;
  readonly params: CodeParameters;
  readonly matrix: readonly Uint8Array[];
}

export interface PrivateKey {
  readonly variant: CodeVariant;
  readonly blockCount: number;
  readonly params: CodeParameters;
  readonly code: BlockCode;
  /** S (k×k), invertible over GF(2) */
  readonly scrambler: readonly Uint8Array[];
  readonly scramblerInverse: readonly Uint8Array[];
  /** P (n×n), a permuted identity */
  readonly permutation: readonly Uint8Array[];
  readonly permutationInverse: readonly Uint8Array[];
}

export interface KeyPair {
  readonly publicKey: PublicKey;
  readonly privateKey: PrivateKey;
}

export type DecryptedBlock =
  | {
    index: number;
    status: 'success' | 'corrected';
    message: BitVector;
    /** Flipped positions in code coordinates (after P⁻¹) */
    errorPositions: number[];
  }
  | {
    index: number;
    status: 'failed';
    reason: string;
  };

export interface DecryptionReport {
  /** L·k bits; failed blocks are zero-filled */
  message: BitVector;
  failedBlocks: number[];
  blocks: DecryptedBlock[];
}

export interface PublicKeyInfo {
  variant: CodeVariant;
  blockCount: number;
  /** Dimensions of the block-diagonal public matrix (L·k × L·n) */
  rows: number;
  cols: number;
  messageBits: number;
  ciphertextBits: number;
  expansionRatio: number;
  sizeBytes: number;
}
