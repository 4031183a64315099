import { EquilibriumFitError } from "../core/alchemy-errors";

/**
 * Polynomial in the scaled variable t = (x - center) / scale. Fitting in t
 * keeps the normal equations well conditioned for bond lengths around 1-3 Å.
 */
export interface FittedPolynomial {
  /** Increasing degree, in t. */
  coeffs: number[];
  center: number;
  scale: number;
}

export interface PolynomialMinimum {
  x: number;
  value: number;
  /** False when no stationary minimum was found and an endpoint was used. */
  stationary: boolean;
}

export interface PolynomialFitter {
  fit(x: readonly number[], y: readonly number[], order: number): FittedPolynomial;
  findMinimum(poly: FittedPolynomial, lower: number, upper: number): PolynomialMinimum;
}

const MINIMUM_SCAN_INTERVALS = 256;
const BISECTION_STEPS = 200;
const PIVOT_EPS = 1e-14;

const hornerEval = (coeffs: readonly number[], t: number): number => {
  let value = 0;
  for (let i = coeffs.length - 1; i >= 0; i -= 1) {
    value = value * t + coeffs[i];
  }
  return value;
};

export const evaluatePolynomial = (poly: FittedPolynomial, x: number): number =>
  hornerEval(poly.coeffs, (x - poly.center) / poly.scale);

const derivativeCoeffs = (coeffs: readonly number[]): number[] =>
  coeffs.slice(1).map((c, idx) => c * (idx + 1));

/** Gaussian elimination with partial pivoting; the inputs are copied. */
export function solveLinearSystem(matrix: readonly number[][], rhs: readonly number[]): number[] {
  const n = rhs.length;
  const a = matrix.map((row) => [...row]);
  const b = [...rhs];
  const maxAbs = a.reduce((acc, row) => Math.max(acc, ...row.map(Math.abs)), 0);
  for (let col = 0; col < n; col += 1) {
    let pivot = col;
    for (let row = col + 1; row < n; row += 1) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) <= PIVOT_EPS * Math.max(1, maxAbs)) {
      throw new EquilibriumFitError("polynomial fit is singular; bond lengths must be distinct", {
        column: col,
      });
    }
    if (pivot !== col) {
      [a[pivot], a[col]] = [a[col], a[pivot]];
      [b[pivot], b[col]] = [b[col], b[pivot]];
    }
    for (let row = col + 1; row < n; row += 1) {
      const factor = a[row][col] / a[col][col];
      if (factor === 0) continue;
      for (let k = col; k < n; k += 1) {
        a[row][k] -= factor * a[col][k];
      }
      b[row] -= factor * b[col];
    }
  }
  const solution = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row -= 1) {
    let sum = b[row];
    for (let k = row + 1; k < n; k += 1) {
      sum -= a[row][k] * solution[k];
    }
    solution[row] = sum / a[row][row];
  }
  return solution;
}

export function leastSquaresPolyFit(
  x: readonly number[],
  y: readonly number[],
  order: number,
): FittedPolynomial {
  if (x.length !== y.length) {
    throw new EquilibriumFitError(`fit needs paired samples, got ${x.length} x and ${y.length} y`);
  }
  if (!Number.isInteger(order) || order < 0) {
    throw new EquilibriumFitError(`polynomial order must be a non-negative integer, got ${order}`);
  }
  if (x.length < order + 1) {
    throw new EquilibriumFitError(
      `order ${order} fit needs at least ${order + 1} samples, got ${x.length}`,
      { samples: x.length, order },
    );
  }
  const center = x.reduce((sum, value) => sum + value, 0) / x.length;
  const spread = x.reduce((acc, value) => Math.max(acc, Math.abs(value - center)), 0);
  const scale = spread > 0 ? spread : 1;
  const t = x.map((value) => (value - center) / scale);

  const size = order + 1;
  const normal = Array.from({ length: size }, () => new Array<number>(size).fill(0));
  const rhs = new Array<number>(size).fill(0);
  for (let i = 0; i < t.length; i += 1) {
    const powers = [1];
    for (let k = 1; k < 2 * size - 1; k += 1) {
      powers.push(powers[k - 1] * t[i]);
    }
    for (let j = 0; j < size; j += 1) {
      rhs[j] += y[i] * powers[j];
      for (let k = 0; k < size; k += 1) {
        normal[j][k] += powers[j + k];
      }
    }
  }
  return { coeffs: solveLinearSystem(normal, rhs), center, scale };
}

const bisectRoot = (coeffs: readonly number[], lo: number, hi: number): number => {
  let left = lo;
  let right = hi;
  for (let step = 0; step < BISECTION_STEPS; step += 1) {
    const mid = 0.5 * (left + right);
    if (mid === left || mid === right) break;
    if (hornerEval(coeffs, mid) < 0) {
      left = mid;
    } else {
      right = mid;
    }
  }
  return 0.5 * (left + right);
};

/**
 * Lowest local minimum of the polynomial inside [lower, upper], located by
 * scanning the derivative for negative-to-positive crossings and bisecting.
 */
export function findPolynomialMinimum(
  poly: FittedPolynomial,
  lower: number,
  upper: number,
): PolynomialMinimum {
  const tLo = (Math.min(lower, upper) - poly.center) / poly.scale;
  const tHi = (Math.max(lower, upper) - poly.center) / poly.scale;
  const slope = derivativeCoeffs(poly.coeffs);

  let best: { t: number; value: number } | null = null;
  if (slope.length > 0 && tHi > tLo) {
    const step = (tHi - tLo) / MINIMUM_SCAN_INTERVALS;
    let prevT = tLo;
    let prevSlope = hornerEval(slope, prevT);
    for (let i = 1; i <= MINIMUM_SCAN_INTERVALS; i += 1) {
      const nextT = i === MINIMUM_SCAN_INTERVALS ? tHi : tLo + i * step;
      const nextSlope = hornerEval(slope, nextT);
      if (prevSlope < 0 && nextSlope >= 0) {
        const root = bisectRoot(slope, prevT, nextT);
        const value = hornerEval(poly.coeffs, root);
        if (best === null || value < best.value) best = { t: root, value };
      }
      prevT = nextT;
      prevSlope = nextSlope;
    }
  }
  if (best) {
    return { x: poly.center + poly.scale * best.t, value: best.value, stationary: true };
  }

  const loValue = hornerEval(poly.coeffs, tLo);
  const hiValue = hornerEval(poly.coeffs, tHi);
  const t = loValue <= hiValue ? tLo : tHi;
  return {
    x: poly.center + poly.scale * t,
    value: Math.min(loValue, hiValue),
    stationary: false,
  };
}

export const leastSquaresPolynomialFitter: PolynomialFitter = {
  fit: leastSquaresPolyFit,
  findMinimum: findPolynomialMinimum,
};
