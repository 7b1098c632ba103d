// McEliece public-key encryption over Hamming(15,11) and BCH(15,7)

export { generateKeyPair, describePublicKey } from './mceliece/keygen';
export { encrypt, encryptWithErrors } from './mceliece/encrypt';
export { decrypt, decryptBlocks } from './mceliece/decrypt';
export {
  DEFAULT_MCELIECE_CONFIG,
  type McElieceConfig,
  type McElieceOptions,
  type KeyGenerationOptions,
  type EncryptOptions,
  type DecryptOptions,
  type FailurePolicy
} from './mceliece/config';
export type { PublicKey, PrivateKey, KeyPair, DecryptedBlock, DecryptionReport, PublicKeyInfo } from './mceliece/types';

export { getBlockCode, getCodeParameters, expansionRatio, isCodeVariant } from './fec/codes';
export { CODE_VARIANTS, type BlockCode, type BlockDecodeResult, type CodeParameters, type CodeVariant } from './fec/block-code';
export { HammingCode, HAMMING_PARAMS } from './fec/hamming';
export { BCHCode, BCH_PARAMS, BCH_GENERATOR_POLY } from './fec/bch';
export { GaloisField } from './fec/galois-field';

export {
  matrixMultiplyMod2,
  vectorMatrixMultiplyMod2,
  matrixVectorMultiplyMod2,
  invert,
  rankMod2,
  transpose,
  identityMatrix,
  xorVectors,
  isIdentity,
  type BitMatrix,
  type BitVector
} from './gf2/matrix';
export {
  createSecureRandom,
  createSeededRandom,
  randomInvertibleMatrix,
  randomPermutationMatrix,
  sampleErrorVector,
  type RandomSource,
  type RandomSeed
} from './gf2/random';

export {
  textToBits,
  bitsToText,
  padBits,
  toBitVector,
  hammingWeight,
  countBitErrors,
  calculateBER,
  splitBlocks,
  concatBlocks
} from './utils';

export {
  McElieceError,
  DimensionMismatchError,
  SingularMatrixError,
  SamplingExhaustedError,
  InvalidMessageLengthError,
  UncorrectableError,
  type McElieceErrorCode
} from './errors';
