/**
 * McEliece decryption
 *
 * Per block: r' = r·P⁻¹ → syndrome decode → m' = information bits → m = m'·S⁻¹
 */

import { InvalidMessageLengthError, UncorrectableError } from '../errors';
import { vectorMatrixMultiplyMod2, type BitVector } from '../gf2/matrix';
import { concatBlocks, isBitVector, splitBlocks } from '../utils';
import { DEFAULT_MCELIECE_CONFIG, type DecryptOptions } from './config';
import type { DecryptedBlock, DecryptionReport, PrivateKey } from './types';

function decryptBlock(privateKey: PrivateKey, block: BitVector, index: number): DecryptedBlock {
  const unpermuted = vectorMatrixMultiplyMod2(block, privateKey.permutationInverse);
  const result = privateKey.code.decode(unpermuted);

  if (result.status === 'uncorrectable') {
    return { index, status: 'failed', reason: result.reason };
  }

  const scrambled = privateKey.code.extractMessage(result.codeword);
  return {
    index,
    status: result.status,
    message: vectorMatrixMultiplyMod2(scrambled, privateKey.scramblerInverse),
    errorPositions: result.errorPositions
  };
}

/**
 * Decode every block independently and report each outcome; never throws on
 * an uncorrectable block.
 */
export function decryptBlocks(privateKey: PrivateKey, ciphertext: BitVector): DecryptedBlock[] {
  const { n } = privateKey.params;
  const expected = privateKey.blockCount * n;
  if (ciphertext.length !== expected) {
    throw new InvalidMessageLengthError(expected, ciphertext.length, 'ciphertext');
  }
  if (!isBitVector(ciphertext)) {
    throw new RangeError('Ciphertext entries must be 0 or 1');
  }

  return splitBlocks(ciphertext, n).map((block, index) => decryptBlock(privateKey, block, index));
}

/**
 * Decrypt L·n ciphertext bits.
 * - 'fail-fast' (default): throws UncorrectableError for the first failing block
 * - 'collect': returns a report with failed blocks zero-filled
 */
export function decrypt(privateKey: PrivateKey, ciphertext: BitVector, options?: { failurePolicy?: 'fail-fast' }): BitVector;
export function decrypt(privateKey: PrivateKey, ciphertext: BitVector, options: { failurePolicy: 'collect' }): DecryptionReport;
export function decrypt(privateKey: PrivateKey, ciphertext: BitVector, options?: DecryptOptions): BitVector | DecryptionReport;
export function decrypt(privateKey: PrivateKey, ciphertext: BitVector, options: DecryptOptions = {}): BitVector | DecryptionReport {
  const policy = options.failurePolicy ?? DEFAULT_MCELIECE_CONFIG.failurePolicy;
  if (policy !== 'fail-fast' && policy !== 'collect') {
    throw new RangeError(`Unknown failurePolicy: ${String(policy)}`);
  }
  const { k } = privateKey.params;
  const blocks = decryptBlocks(privateKey, ciphertext);

  if (policy === 'fail-fast') {
    return concatBlocks(blocks.map(block => {
      if (block.status === 'failed') {
        throw new UncorrectableError(block.index, block.reason);
      }
      return block.message;
    }));
  }

  const failedBlocks = blocks.filter(block => block.status === 'failed').map(block => block.index);
  if (failedBlocks.length > 0) {
    console.warn(`decrypt: ${failedBlocks.length}/${blocks.length} blocks uncorrectable: [${failedBlocks.join(', ')}]`);
  }

  return {
    message: concatBlocks(blocks.map(block => block.status === 'failed' ? new Uint8Array(k) : block.message)),
    failedBlocks,
    blocks
  };
}
