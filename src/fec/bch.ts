/**
 * BCH (Bose-Chaudhuri-Hocquenghem) (15,7) 符号: t=2 の2ビット訂正
 *
 * BCH符号の数学的基礎:
 * - ガロア体 GF(2^4), 原始多項式 p(x) = x^4 + x + 1
 * - 生成多項式: g(x) = lcm(m_1(x), m_3(x)) = x^8 + x^7 + x^6 + x^4 + 1
 * - シンドローム: S_1 = r(α), S_3 = r(α^3)  (S_2 = S_1^2 なので不要)
 * - エラー位置: 誤り位置多項式 σ(x) = 1 + σ_1 x + σ_2 x^2 の Chien 探索
 *
 * ビット配列は最上位から: インデックス i が x^{14-i} の係数。
 * 組織符号: 情報ビットがインデックス 0..6, パリティが 7..14。
 */

import { zeroMatrix, type BitMatrix, type BitVector } from '../gf2/matrix';
import { SystematicBlockCode, isZeroVector, type BlockDecodeResult, type CodeParameters } from './block-code';
import { GaloisField, multiplyBinaryPolynomials } from './galois-field';

export const BCH_PARAMS: CodeParameters = Object.freeze({ n: 15, k: 7, t: 2 });

const FIELD_DEGREE = 4;
const PRIMITIVE_POLY = 0b10011; // x^4 + x + 1
const PARITY_BITS = BCH_PARAMS.n - BCH_PARAMS.k;

export const BCH_FIELD = GaloisField.get(FIELD_DEGREE, PRIMITIVE_POLY);

/**
 * 生成多項式 g(x) = m_1(x) · m_3(x)
 * （α と α^3 の共役類は互いに素なので lcm は積になる）
 * @returns 係数（最高次から最低次へ）
 */
function constructGeneratorPoly(gf: GaloisField): number[] {
  const m1 = gf.minimalPolynomial(gf.alpha(1));
  const m3 = gf.minimalPolynomial(gf.alpha(3));
  return multiplyBinaryPolynomials(m1, m3).reverse();
}

export const BCH_GENERATOR_POLY: readonly number[] = Object.freeze(constructGeneratorPoly(BCH_FIELD));

/**
 * 多項式による除算の剰余（ビット配列、最上位から最下位へ）
 */
function polyRemainder(dividend: ArrayLike<number>, divisor: readonly number[]): number[] {
  if (divisor.length === 0 || divisor[0] === 0) {
    throw new Error('Divisor must represent a non-zero polynomial with a leading 1 coefficient.');
  }

  const result = Array.from(dividend);
  const divisorLen = divisor.length;

  // 長除法実行：最上位ビットから処理
  for (let i = 0; i <= result.length - divisorLen; i++) {
    if (result[i] === 1) {
      for (let j = 0; j < divisorLen; j++) {
        result[i + j] ^= divisor[j];
      }
    }
  }

  return result.slice(result.length - (divisorLen - 1));
}

/**
 * 組織符号化: c(x) = x^{n-k} i(x) + (x^{n-k} i(x) mod g(x))
 */
export function bchEncodePolynomial(message: BitVector): BitVector {
  const shifted = [...message, ...new Array(PARITY_BITS).fill(0)];
  const parity = polyRemainder(shifted, BCH_GENERATOR_POLY);
  return Uint8Array.from([...message, ...parity]);
}

function buildGeneratorMatrix(): BitMatrix {
  // 行 i = 単位ベクトル e_i の符号語 → G = [I_7 | P]
  return Array(BCH_PARAMS.k).fill(0).map((_, i) => {
    const unit = new Uint8Array(BCH_PARAMS.k);
    unit[i] = 1;
    return bchEncodePolynomial(unit);
  });
}

function buildParityCheckMatrix(G: readonly Uint8Array[]): BitMatrix {
  // G = [I_k | P] ならば H = [Pᵗ | I_{n-k}]
  const { n, k } = BCH_PARAMS;
  const H = zeroMatrix(PARITY_BITS, n);
  for (let row = 0; row < PARITY_BITS; row++) {
    for (let col = 0; col < k; col++) {
      H[row][col] = G[col][k + row];
    }
    H[row][k + row] = 1;
  }
  return H;
}

export interface BCHSyndromes {
  s1: number;
  s3: number;
}

/**
 * シンドローム計算: S_j = r(α^j) for j = 1, 3
 */
export function calculateSyndromes(received: ArrayLike<number>, gf: GaloisField = BCH_FIELD): BCHSyndromes {
  return {
    s1: gf.evaluate(received, gf.alpha(1)),
    s3: gf.evaluate(received, gf.alpha(3))
  };
}

type LocatorResult =
  | { ok: true; exponents: number[] }
  | { ok: false; reason: string };

/**
 * 誤り位置の指数 j (エラーは x^j の係数) を求める
 */
export function locateErrors(syndromes: BCHSyndromes, gf: GaloisField = BCH_FIELD): LocatorResult {
  const { s1, s3 } = syndromes;

  if (s1 === 0 && s3 === 0) {
    return { ok: true, exponents: [] };
  }

  if (s1 === 0) {
    // S_1 = 0 だが S_3 ≠ 0: 重み2以下のどのエラーとも整合しない
    return { ok: false, reason: 'S1 = 0 with S3 != 0 (3 or more errors)' };
  }

  const s1Cubed = gf.power(s1, 3);

  if (s3 === s1Cubed) {
    // 1ビットエラー: S_1 = α^j
    return { ok: true, exponents: [gf.log(s1)] };
  }

  // 2ビットエラー: σ_1 = S_1, σ_2 = (S_3 + S_1^3) / S_1
  const sigma1 = s1;
  const sigma2 = gf.divide(s3 ^ s1Cubed, s1);

  // Chien 探索: σ(α^{-j}) = 0 となる j が誤り位置
  const exponents: number[] = [];
  for (let j = 0; j < gf.n; j++) {
    const xInv = gf.alpha(-j);
    const value = 1 ^ gf.multiply(sigma1, xInv) ^ gf.multiply(sigma2, gf.multiply(xInv, xInv));
    if (value === 0) {
      exponents.push(j);
    }
  }

  if (exponents.length !== 2) {
    return { ok: false, reason: `error locator has ${exponents.length} roots in GF(16), expected 2` };
  }
  return { ok: true, exponents };
}

export class BCHCode extends SystematicBlockCode {
  readonly variant = 'bch' as const;
  readonly params = BCH_PARAMS;
  protected readonly G: readonly Uint8Array[] = buildGeneratorMatrix();
  protected readonly H: readonly Uint8Array[] = buildParityCheckMatrix(this.G);
  readonly informationPositions: readonly number[] = Object.freeze(Array(BCH_PARAMS.k).fill(0).map((_, i) => i));
  readonly field = BCH_FIELD;

  encode(message: BitVector): BitVector {
    this.assertLength(message, this.params.k, 'message');
    return bchEncodePolynomial(message);
  }

  decode(received: BitVector): BlockDecodeResult {
    const syndrome = this.syndrome(received);

    if (isZeroVector(syndrome)) {
      return { status: 'success', codeword: new Uint8Array(received), errorPositions: [], syndrome };
    }

    const located = locateErrors(calculateSyndromes(received, this.field), this.field);
    if (!located.ok) {
      return { status: 'uncorrectable', received: new Uint8Array(received), syndrome, reason: located.reason };
    }

    // 指数 j → ビット配列インデックス n-1-j
    const positions = located.exponents.map(j => this.params.n - 1 - j).sort((a, b) => a - b);
    // σ の根 X_1, X_2 は S_1 = X_1 + X_2, S_3 = X_1^3 + X_2^3 を満たすので
    // 反転後のシンドロームは必ず 0 になる（再検証は不要）
    return { status: 'corrected', codeword: this.flip(received, positions), errorPositions: positions, syndrome };
  }
}
