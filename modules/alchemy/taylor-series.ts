import { TaylorOrderError } from "../core/alchemy-errors";

/**
 * QATS-n prediction: the Taylor series in lambda truncated after `order`.
 * Coefficients are in increasing degree. A scalar lambda is treated as a
 * one-element list; the output always has one energy per lambda.
 */
export function qatsPrediction(
  polyCoeffs: readonly number[],
  order: number,
  lambdaValues: number | readonly number[],
): number[] {
  if (!Number.isInteger(order) || order < 0 || order >= polyCoeffs.length) {
    throw new TaylorOrderError(
      `Taylor order ${order} is outside the available range 0..${polyCoeffs.length - 1}`,
      { order, available: polyCoeffs.length },
    );
  }
  const lambdas = typeof lambdaValues === "number" ? [lambdaValues] : lambdaValues;
  return lambdas.map((lambda) => {
    // Horner from the highest kept degree down.
    let energy = 0;
    for (let i = order; i >= 0; i -= 1) {
      energy = energy * lambda + polyCoeffs[i];
    }
    return energy;
  });
}

/** Highest Taylor order a coefficient list supports. */
export const maxQatsOrder = (polyCoeffs: readonly number[]): number => polyCoeffs.length - 1;
