import type { AlchemyRow, QatsRow, QuantumChemistryRow } from "../../shared/alchemy-schema";
import { readAlchemyConfig } from "../core/alchemy-config";
import { EquilibriumFitError, PredictionContractError } from "../core/alchemy-errors";
import { createAlchemyLogger } from "../core/alchemy-log";
import { DEFAULT_CAPABILITIES } from "./capabilities";
import type { FittedPolynomial, PolynomialFitter } from "./poly-fit";
import { qatsPrediction } from "./taylor-series";

const log = createAlchemyLogger("dimer");

/** Bond lengths (Å, ascending) paired with electronic energies (Hartree). */
export type DimerCurve = {
  bondLengths: number[];
  energies: number[];
};

const assertSingleCurve = (rows: readonly AlchemyRow[]): void => {
  if (rows.length === 0) {
    throw new PredictionContractError("a bond curve needs at least one row");
  }
  const first = rows[0];
  for (const row of rows) {
    if (row.atomicNumbers.length !== 2 || row.bondLength === undefined) {
      throw new PredictionContractError(`${row.system} rows are not dimer rows with bond lengths`);
    }
    if (
      row.system !== first.system ||
      row.charge !== first.charge ||
      row.multiplicity !== first.multiplicity
    ) {
      throw new PredictionContractError(
        "a bond curve must come from a single system, charge and multiplicity",
        { systems: Array.from(new Set(rows.map((r) => r.system))).sort() },
      );
    }
  }
};

function sortedCurve<R extends AlchemyRow>(rows: readonly R[], energyOf: (row: R) => number): DimerCurve {
  const ordered = [...rows].sort((a, b) => (a.bondLength ?? 0) - (b.bondLength ?? 0));
  const bondLengths = ordered.map((row) => row.bondLength ?? Number.NaN);
  for (let i = 1; i < bondLengths.length; i += 1) {
    if (bondLengths[i] === bondLengths[i - 1]) {
      throw new PredictionContractError(
        `${ordered[i].system} has more than one row at bond length ${bondLengths[i]}`,
      );
    }
  }
  return { bondLengths, energies: ordered.map(energyOf) };
}

/**
 * QC bond curve. When `lambdaValue` is given only rows computed at that
 * perturbation are used; otherwise the rows must share a single lambda.
 */
export function qcDimerCurve(
  rows: readonly QuantumChemistryRow[],
  lambdaValue?: number,
): DimerCurve {
  const selected = lambdaValue === undefined ? rows : rows.filter((row) => row.lambdaValue === lambdaValue);
  assertSingleCurve(selected);
  const lambdas = new Set(selected.map((row) => row.lambdaValue));
  if (lambdas.size > 1) {
    throw new PredictionContractError(
      `${selected[0].system} rows span lambdas ${Array.from(lambdas).sort((a, b) => a - b).join(", ")}; pick one`,
    );
  }
  return sortedCurve(selected, (row) => row.electronicEnergy);
}

/** Bond curve extrapolated with a QATS-n prediction at every bond length. */
export function qatsDimerCurve(
  rows: readonly QatsRow[],
  lambdaValue: number,
  order: number,
): DimerCurve {
  assertSingleCurve(rows);
  return sortedCurve(rows, (row) => qatsPrediction(row.polyCoeffs, order, lambdaValue)[0]);
}

export type DimerFitOptions = {
  /** Samples kept on either side of the lowest-energy sample. */
  nPoints?: number;
  polyOrder?: number;
  removeOutliers?: boolean;
  zscoreCutoff?: number;
  fitter?: PolynomialFitter;
};

/** Drops samples whose energy z-score (population standard deviation) exceeds the cutoff. */
export function removeEnergyOutliers(curve: DimerCurve, zscoreCutoff: number): DimerCurve {
  const n = curve.energies.length;
  if (n === 0) return { bondLengths: [], energies: [] };
  const mean = curve.energies.reduce((sum, e) => sum + e, 0) / n;
  const variance = curve.energies.reduce((sum, e) => sum + (e - mean) ** 2, 0) / n;
  const std = Math.sqrt(variance);
  if (!(std > 0)) return { bondLengths: [...curve.bondLengths], energies: [...curve.energies] };

  const bondLengths: number[] = [];
  const energies: number[] = [];
  curve.energies.forEach((energy, idx) => {
    if (Math.abs(energy - mean) / std <= zscoreCutoff) {
      bondLengths.push(curve.bondLengths[idx]);
      energies.push(energy);
    }
  });
  if (energies.length < n) {
    log.debug("removed outlier bond lengths", {
      removed: curve.bondLengths.filter((bl) => !bondLengths.includes(bl)),
      zscoreCutoff,
    });
  }
  return { bondLengths, energies };
}

export type DimerPolyFit = {
  /** Samples the polynomial was fitted to. */
  window: DimerCurve;
  poly: FittedPolynomial;
};

/**
 * Fits a polynomial to the lowest-energy sample and up to `nPoints`
 * neighbours on each side. Fewer samples than `polyOrder + 1` is an error.
 */
export function fitDimerPoly(curve: DimerCurve, opts: DimerFitOptions = {}): DimerPolyFit {
  const config = readAlchemyConfig();
  const nPoints = opts.nPoints ?? config.fitPoints;
  const polyOrder = opts.polyOrder ?? config.fitOrder;
  const fitter = opts.fitter ?? DEFAULT_CAPABILITIES.polyFitter;

  if (curve.bondLengths.length !== curve.energies.length) {
    throw new EquilibriumFitError(
      `bond curve has ${curve.bondLengths.length} bond lengths but ${curve.energies.length} energies`,
    );
  }
  const cleaned = opts.removeOutliers
    ? removeEnergyOutliers(curve, opts.zscoreCutoff ?? config.zscoreCutoff)
    : curve;
  if (cleaned.energies.length === 0) {
    throw new EquilibriumFitError("bond curve has no samples to fit");
  }

  let anchor = 0;
  cleaned.energies.forEach((energy, idx) => {
    if (energy < cleaned.energies[anchor]) anchor = idx;
  });
  const start = Math.max(0, anchor - nPoints);
  const end = Math.min(cleaned.energies.length, anchor + nPoints + 1);
  const window: DimerCurve = {
    bondLengths: cleaned.bondLengths.slice(start, end),
    energies: cleaned.energies.slice(start, end),
  };
  if (window.energies.length < polyOrder + 1) {
    throw new EquilibriumFitError(
      `only ${window.energies.length} samples around the minimum at ${cleaned.bondLengths[anchor]} Å; ` +
        `an order ${polyOrder} fit needs ${polyOrder + 1}. Widen the bond-length range or lower the order.`,
      { samples: window.energies.length, polyOrder, nPoints },
    );
  }
  return { window, poly: fitter.fit(window.bondLengths, window.energies, polyOrder) };
}

export type DimerEquilibrium = {
  /** Å */
  bondLength: number;
  /** Hartree */
  energy: number;
};

/** Equilibrium bond length and energy from a local polynomial fit. */
export function dimerMinimum(curve: DimerCurve, opts: DimerFitOptions = {}): DimerEquilibrium {
  const fitter = opts.fitter ?? DEFAULT_CAPABILITIES.polyFitter;
  const { window, poly } = fitDimerPoly(curve, { ...opts, fitter });
  const lower = window.bondLengths[0];
  const upper = window.bondLengths[window.bondLengths.length - 1];
  const minimum = fitter.findMinimum(poly, lower, upper);
  if (!minimum.stationary) {
    log.warn("no stationary minimum inside the fit window; using the lower-energy endpoint", {
      lower,
      upper,
      bondLength: minimum.x,
    });
  }
  return { bondLength: minimum.x, energy: minimum.value };
}
