/**
 * ガロア体 GF(2^m)
 *
 * 要素は m ビット整数で表現する（ビット i が α^i の多項式基底係数）。
 * - alphaTo[i] = α^i (i = 0 .. n-1)
 * - logAlpha[x] = log_α(x) (x = 1 .. n), logAlpha[0] = -1
 */

const galoisFieldCache = new Map<string, GaloisField>();

export class GaloisField {
  readonly m: number;              // 体の次数
  readonly n: number;              // 2^m - 1 (乗法群の位数)
  readonly primitivePoly: number;  // 原始多項式
  readonly alphaTo: readonly number[];
  readonly logAlpha: readonly number[];

  constructor(m: number, primitivePoly: number) {
    if (!Number.isInteger(m) || m < 2 || m > 16) {
      throw new RangeError(`Field degree must be in [2, 16], got ${m}`);
    }
    if ((primitivePoly >> m) !== 1) {
      throw new RangeError(`Primitive polynomial 0b${primitivePoly.toString(2)} is not of degree ${m}`);
    }

    const n = (1 << m) - 1;
    const alphaTo: number[] = new Array(n + 1).fill(0);
    const logAlpha: number[] = new Array(n + 1).fill(-1);

    // α^0 = 1
    alphaTo[0] = 1;

    // α^i を計算（原始多項式での剰余演算）
    for (let i = 1; i < n; i++) {
      alphaTo[i] = alphaTo[i - 1] << 1;
      if (alphaTo[i] & (1 << m)) {
        alphaTo[i] ^= primitivePoly;
      }
    }

    // 対数テーブル
    for (let i = 0; i < n; i++) {
      if (logAlpha[alphaTo[i]] !== -1) {
        throw new RangeError(`Polynomial 0b${primitivePoly.toString(2)} is not primitive over GF(2^${m})`);
      }
      logAlpha[alphaTo[i]] = i;
    }

    this.m = m;
    this.n = n;
    this.primitivePoly = primitivePoly;
    this.alphaTo = alphaTo;
    this.logAlpha = logAlpha;
  }

  /**
   * キャッシュ付きで体を取得
   */
  static get(m: number, primitivePoly: number): GaloisField {
    const cacheKey = `${m}_${primitivePoly}`;
    const cached = galoisFieldCache.get(cacheKey);
    if (cached) return cached;

    const gf = new GaloisField(m, primitivePoly);
    galoisFieldCache.set(cacheKey, gf);
    return gf;
  }

  /** α^i (i は任意の整数、n を法として正規化) */
  alpha(i: number): number {
    return this.alphaTo[((i % this.n) + this.n) % this.n];
  }

  log(x: number): number {
    if (x <= 0 || x > this.n) {
      throw new RangeError(`log of ${x} is undefined in GF(2^${this.m})`);
    }
    return this.logAlpha[x];
  }

  multiply(a: number, b: number): number {
    if (a === 0 || b === 0) return 0;
    return this.alphaTo[(this.logAlpha[a] + this.logAlpha[b]) % this.n];
  }

  divide(a: number, b: number): number {
    if (b === 0) {
      throw new RangeError('Division by zero in GF(2^m)');
    }
    if (a === 0) return 0;
    return this.alphaTo[(this.logAlpha[a] - this.logAlpha[b] + this.n) % this.n];
  }

  inverse(a: number): number {
    return this.divide(1, a);
  }

  /**
   * 累乗（負の指数も可）
   */
  power(base: number, exp: number): number {
    if (base === 0) return exp === 0 ? 1 : 0;
    if (exp === 0) return 1;

    const normalizedExp = ((exp % this.n) + this.n) % this.n;
    return this.alphaTo[(this.logAlpha[base] * normalizedExp) % this.n];
  }

  /**
   * 多項式評価 r(y) - Horner法
   * @param coefficients 係数（最高次 c_{len-1} から最低次 c_0 へ）
   */
  evaluate(coefficients: ArrayLike<number>, y: number): number {
    let result = 0;
    for (let i = 0; i < coefficients.length; i++) {
      result = this.multiply(result, y) ^ coefficients[i];
    }
    return result;
  }

  /**
   * 最小多項式: ∏(x - β) を共役元 β, β^2, β^4, ... について展開
   * @returns 係数（最低次から最高次へ、各係数は GF(2) に落ちる）
   */
  minimalPolynomial(element: number): number[] {
    if (element === 0) return [0, 1]; // x

    const conjugates: number[] = [];
    let current = element;
    do {
      conjugates.push(current);
      current = this.multiply(current, current);
    } while (!conjugates.includes(current));

    let poly = [1];
    for (const conj of conjugates) {
      const next: number[] = new Array(poly.length + 1).fill(0);
      // x * poly(x)
      for (let i = 0; i < poly.length; i++) {
        next[i + 1] ^= poly[i];
      }
      // conj * poly(x) （GF(2^m) では -1 = 1）
      for (let i = 0; i < poly.length; i++) {
        next[i] ^= this.multiply(conj, poly[i]);
      }
      poly = next;
    }
    return poly;
  }
}

/**
 * GF(2) 係数の多項式積（係数は最低次から最高次へ）
 */
export function multiplyBinaryPolynomials(a: readonly number[], b: readonly number[]): number[] {
  const out: number[] = new Array(a.length + b.length - 1).fill(0);
  for (let i = 0; i < a.length; i++) {
    if (a[i] === 0) continue;
    for (let j = 0; j < b.length; j++) {
      out[i + j] ^= b[j];
    }
  }
  return out;
}
