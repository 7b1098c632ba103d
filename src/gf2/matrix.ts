/**
 * GF(2) 上の線形代数
 *
 * 型ルール:
 * - ビットベクトル: 2値データ (0/1) → Uint8Array
 * - ビット行列: 行優先の Uint8Array[] (全行同じ長さ)
 *
 * 加算 = XOR, 乗算 = AND。どの関数も入力を書き換えず、新しい値を返す。
 */

import { DimensionMismatchError, SingularMatrixError } from '../errors';

export type BitVector = Uint8Array;
export type BitMatrix = Uint8Array[];

export interface MatrixShape {
  rows: number;
  cols: number;
}

/**
 * 行列の形状を取得（ragged な行列は DimensionMismatchError）
 */
export function shapeOf(matrix: readonly Uint8Array[]): MatrixShape {
  const rows = matrix.length;
  const cols = rows > 0 ? matrix[0].length : 0;
  for (let r = 1; r < rows; r++) {
    if (matrix[r].length !== cols) {
      throw new DimensionMismatchError(`Ragged matrix: row ${r} has ${matrix[r].length} columns, expected ${cols}`);
    }
  }
  return { rows, cols };
}

export function zeroMatrix(rows: number, cols: number): BitMatrix {
  return Array(rows).fill(0).map(() => new Uint8Array(cols));
}

export function identityMatrix(size: number): BitMatrix {
  const I = zeroMatrix(size, size);
  for (let i = 0; i < size; i++) {
    I[i][i] = 1;
  }
  return I;
}

export function cloneMatrix(matrix: readonly Uint8Array[]): BitMatrix {
  return matrix.map(row => new Uint8Array(row));
}

export function transpose(matrix: readonly Uint8Array[]): BitMatrix {
  const { rows, cols } = shapeOf(matrix);
  const T = zeroMatrix(cols, rows);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      T[c][r] = matrix[r][c];
    }
  }
  return T;
}

export function matricesEqual(a: readonly Uint8Array[], b: readonly Uint8Array[]): boolean {
  if (a.length !== b.length) return false;
  for (let r = 0; r < a.length; r++) {
    if (a[r].length !== b[r].length) return false;
    for (let c = 0; c < a[r].length; c++) {
      if (a[r][c] !== b[r][c]) return false;
    }
  }
  return true;
}

export function isIdentity(matrix: readonly Uint8Array[]): boolean {
  const { rows, cols } = shapeOf(matrix);
  return rows === cols && matricesEqual(matrix, identityMatrix(rows));
}

export function xorVectors(a: BitVector, b: BitVector): BitVector {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(`Cannot XOR vectors of length ${a.length} and ${b.length}`);
  }
  const out = new Uint8Array(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] ^ b[i];
  }
  return out;
}

/**
 * 行列積 A·B (mod 2)
 */
export function matrixMultiplyMod2(a: readonly Uint8Array[], b: readonly Uint8Array[]): BitMatrix {
  const sa = shapeOf(a);
  const sb = shapeOf(b);
  if (sa.cols !== sb.rows) {
    throw new DimensionMismatchError(`Cannot multiply ${sa.rows}x${sa.cols} by ${sb.rows}x${sb.cols}`);
  }

  const out = zeroMatrix(sa.rows, sb.cols);
  for (let r = 0; r < sa.rows; r++) {
    const rowA = a[r];
    const rowOut = out[r];
    // A の行で 1 が立っている列に対応する B の行を XOR で足し込む
    for (let i = 0; i < sa.cols; i++) {
      if (rowA[i] === 0) continue;
      const rowB = b[i];
      for (let c = 0; c < sb.cols; c++) {
        rowOut[c] ^= rowB[c];
      }
    }
  }
  return out;
}

/**
 * 行ベクトル × 行列 (mod 2): 符号化 m·G に使う
 */
export function vectorMatrixMultiplyMod2(vector: BitVector, matrix: readonly Uint8Array[]): BitVector {
  const { rows, cols } = shapeOf(matrix);
  if (vector.length !== rows) {
    throw new DimensionMismatchError(`Cannot multiply vector of length ${vector.length} by ${rows}x${cols} matrix`);
  }
  const out = new Uint8Array(cols);
  for (let i = 0; i < rows; i++) {
    if (vector[i] === 0) continue;
    const row = matrix[i];
    for (let c = 0; c < cols; c++) {
      out[c] ^= row[c];
    }
  }
  return out;
}

/**
 * 行列 × 列ベクトル (mod 2): シンドローム H·rᵗ に使う
 */
export function matrixVectorMultiplyMod2(matrix: readonly Uint8Array[], vector: BitVector): BitVector {
  const { rows, cols } = shapeOf(matrix);
  if (vector.length !== cols) {
    throw new DimensionMismatchError(`Cannot multiply ${rows}x${cols} matrix by vector of length ${vector.length}`);
  }
  const out = new Uint8Array(rows);
  for (let r = 0; r < rows; r++) {
    let sum = 0;
    const row = matrix[r];
    for (let c = 0; c < cols; c++) {
      sum ^= row[c] & vector[c];
    }
    out[r] = sum;
  }
  return out;
}

/**
 * GF(2) 上のランク（コピーに対して Gaussian Elimination）
 */
export function rankMod2(matrix: readonly Uint8Array[]): number {
  const { rows, cols } = shapeOf(matrix);
  const M = cloneMatrix(matrix);

  let rank = 0;
  for (let col = 0; col < cols && rank < rows; col++) {
    // ピボット行を探す
    let pivotRow = -1;
    for (let row = rank; row < rows; row++) {
      if (M[row][col] === 1) {
        pivotRow = row;
        break;
      }
    }
    if (pivotRow === -1) continue;

    [M[rank], M[pivotRow]] = [M[pivotRow], M[rank]];

    // 下の行の 1 を消去
    for (let row = rank + 1; row < rows; row++) {
      if (M[row][col] === 1) {
        for (let c = col; c < cols; c++) {
          M[row][c] ^= M[rank][c];
        }
      }
    }
    rank++;
  }
  return rank;
}

/**
 * 逆行列 (mod 2): 拡大行列 [M | I] に対する Gauss-Jordan 消去
 * @throws DimensionMismatchError 正方行列でない場合
 * @throws SingularMatrixError ランクがサイズ未満の場合
 */
export function invert(matrix: readonly Uint8Array[]): BitMatrix {
  const { rows, cols } = shapeOf(matrix);
  if (rows !== cols) {
    throw new DimensionMismatchError(`Cannot invert non-square ${rows}x${cols} matrix`);
  }
  const size = rows;

  const A = cloneMatrix(matrix);
  const inv = identityMatrix(size);

  for (let col = 0; col < size; col++) {
    let pivotRow = -1;
    for (let row = col; row < size; row++) {
      if (A[row][col] === 1) {
        pivotRow = row;
        break;
      }
    }
    if (pivotRow === -1) {
      // この列はピボットなし: 最終的なランクを数えてから失敗させる
      throw new SingularMatrixError(rankMod2(matrix), size);
    }

    if (pivotRow !== col) {
      [A[col], A[pivotRow]] = [A[pivotRow], A[col]];
      [inv[col], inv[pivotRow]] = [inv[pivotRow], inv[col]];
    }

    // この列の他の行の 1 を消去（前進消去と後退代入を同時に行う）
    for (let row = 0; row < size; row++) {
      if (row !== col && A[row][col] === 1) {
        for (let c = 0; c < size; c++) {
          A[row][c] ^= A[col][c];
          inv[row][c] ^= inv[col][c];
        }
      }
    }
  }
  return inv;
}
