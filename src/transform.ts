import { CompileError } from "./errors.js";
import type { CsgValue } from "./value.js";

/** Row-major 4x4 homogeneous matrix: element (row, col) lives at `row * 4 + col`. */
export type Matrix4 = number[];

export type Vec3 = [number, number, number];

export function matrixElement(matrix: Matrix4, row: number, col: number): number {
  return matrix[row * 4 + col] ?? 0;
}

export function matrixRows(matrix: Matrix4): [Matrix4, Matrix4, Matrix4, Matrix4] {
  return [
    matrix.slice(0, 4),
    matrix.slice(4, 8),
    matrix.slice(8, 12),
    matrix.slice(12, 16),
  ];
}

/**
 * Reads a nested `[[a,b,c,d], ...]` literal as a row-major matrix. Anything
 * other than exactly four rows of four numbers is rejected; the error carries
 * the sizes found.
 */
export function matrixFromValue(value: CsgValue): Matrix4 {
  if (!value.isVector() || value.size() !== 4) {
    throw new CompileError(
      "param_malformed",
      `transform matrix must have 4 rows, found ${value.isVector() ? value.size() : "a scalar"}`,
      undefined,
      { expected: 4, found: value.isVector() ? value.size() : 0 }
    );
  }
  const out: Matrix4 = [];
  for (let row = 0; row < 4; row += 1) {
    const cells = value.get(row);
    if (!cells.isVector() || cells.size() !== 4) {
      throw new CompileError(
        "param_malformed",
        `transform matrix row ${row} must have 4 columns, found ${cells.isVector() ? cells.size() : "a scalar"}`,
        undefined,
        { row, expected: 4, found: cells.isVector() ? cells.size() : 0 }
      );
    }
    for (let col = 0; col < 4; col += 1) {
      const cell = cells.get(col);
      const number = cell.toNumber();
      if (!Number.isFinite(number)) {
        throw new CompileError(
          "param_domain",
          `transform matrix element (${row}, ${col}) must be finite, found ${cell.toString()}`,
          undefined,
          { row, col }
        );
      }
      out.push(number);
    }
  }
  return out;
}

export function rotationX(angleDeg: number): Matrix4 {
  const rad = (angleDeg * Math.PI) / 180;
  const c = roundTrig(Math.cos(rad));
  const s = roundTrig(Math.sin(rad));
  return [
    1, 0, 0, 0,
    0, c, -s, 0,
    0, s, c, 0,
    0, 0, 0, 1,
  ];
}

export function multiplyMatrices(a: Matrix4, b: Matrix4): Matrix4 {
  const out = new Array<number>(16).fill(0);
  for (let row = 0; row < 4; row += 1) {
    for (let col = 0; col < 4; col += 1) {
      let sum = 0;
      for (let k = 0; k < 4; k += 1) {
        sum += matrixElement(a, row, k) * matrixElement(b, k, col);
      }
      out[row * 4 + col] = sum;
    }
  }
  return out;
}

/**
 * Composes an encoder's corrective transform with a parameter matrix. The
 * parameter matrix applies first, so the corrective one is left-multiplied.
 */
export function composeTransforms(
  corrective: Matrix4 | undefined,
  explicit: Matrix4 | undefined
): Matrix4 | undefined {
  if (corrective && explicit) return multiplyMatrices(corrective, explicit);
  return corrective ?? explicit;
}

// sin/cos of multiples of 90 degrees come back as ~1e-16 instead of 0
function roundTrig(value: number): number {
  const rounded = Math.round(value);
  return Math.abs(value - rounded) < 1e-15 ? rounded : value;
}
