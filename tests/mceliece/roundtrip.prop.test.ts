/**
 * Property-based tests for the encrypt/decrypt round trip
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { generateKeyPair } from '../../src/mceliece/keygen';
import { encrypt, encryptWithErrors } from '../../src/mceliece/encrypt';
import { decrypt } from '../../src/mceliece/decrypt';
import { getCodeParameters } from '../../src/fec/codes';
import type { CodeVariant } from '../../src/fec/block-code';
import { createSeededRandom } from '../../src/gf2/random';

const PROPERTY_TEST_CONFIG = { numRuns: 40, seed: 20241019 };

const variantArb = fc.constantFrom<CodeVariant>('hamming', 'bch');

// (variant, L, message bits) を一度に生成
const caseArb = variantArb.chain(variant => {
  const { k } = getCodeParameters(variant);
  return fc.integer({ min: 1, max: 6 }).chain(blockCount =>
    fc.record({
      variant: fc.constant(variant),
      blockCount: fc.constant(blockCount),
      message: fc.array(fc.integer({ min: 0, max: 1 }), { minLength: blockCount * k, maxLength: blockCount * k }),
      seed: fc.string({ minLength: 1, maxLength: 16 })
    })
  );
});

describe('McEliece round trip properties', () => {
  it('decrypt(encrypt(m)) = m for any message', () => {
    fc.assert(
      fc.property(caseArb, ({ variant, blockCount, message, seed }) => {
        const rng = createSeededRandom(seed);
        const { publicKey, privateKey } = generateKeyPair(variant, blockCount, { random: rng });
        const bits = Uint8Array.from(message);
        expect(decrypt(privateKey, encrypt(publicKey, bits, { random: rng }))).toEqual(bits);
      }),
      PROPERTY_TEST_CONFIG
    );
  });

  it('any error pattern of weight ≤ t per block is removed', () => {
    const patternArb = caseArb.chain(c => {
      const { n, t } = getCodeParameters(c.variant);
      const blockErrors = fc.uniqueArray(fc.integer({ min: 0, max: n - 1 }), { minLength: 0, maxLength: t });
      return fc.record({
        c: fc.constant(c),
        positions: fc.array(blockErrors, { minLength: c.blockCount, maxLength: c.blockCount })
      });
    });

    fc.assert(
      fc.property(patternArb, ({ c, positions }) => {
        const { n } = getCodeParameters(c.variant);
        const { publicKey, privateKey } = generateKeyPair(c.variant, c.blockCount, { random: createSeededRandom(c.seed) });
        const errors = positions.map(ps => {
          const e = new Uint8Array(n);
          for (const p of ps) e[p] = 1;
          return e;
        });
        const bits = Uint8Array.from(c.message);
        expect(decrypt(privateKey, encryptWithErrors(publicKey, bits, errors))).toEqual(bits);
      }),
      PROPERTY_TEST_CONFIG
    );
  });
});
