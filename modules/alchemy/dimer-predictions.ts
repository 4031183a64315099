import type {
  AlchemyTables,
  LambdaDirection,
  PredictionMode,
  QatsRow,
  QuantumChemistryRow,
} from "../../shared/alchemy-schema";
import { readAlchemyConfig } from "../core/alchemy-config";
import { PredictionContractError, ReferenceConsistencyError } from "../core/alchemy-errors";
import { createAlchemyLogger } from "../core/alchemy-log";
import { resolveCapabilities, type AlchemyCapabilities } from "./capabilities";
import {
  dimerMinimum,
  qatsDimerCurve,
  qcDimerCurve,
  type DimerCurve,
  type DimerFitOptions,
} from "./dimer-curve";
import type { LambdaPolicy } from "./lambda-value";
import {
  assertChargeChange,
  isLambdaConsidered,
  noData,
  okOutcome,
  type AlchemyModeOptions,
  type ChargeChangeOptions,
  type CommonPredictionOptions,
  type PredictionOutcome,
  type ReferencePrediction,
} from "./prediction-types";
import { getQaRefs, resolveReferencePair } from "./reference-resolver";
import { groupBySystem, queryQc } from "./rows";

const log = createAlchemyLogger("dimer");

/** Fit settings for the equilibrium search; the fitter itself comes from the capabilities. */
export type EquilibriumFitOptions = Omit<DimerFitOptions, "fitter">;

export type DimerLambdaOptions = {
  /** Put the whole perturbation on this atom (OH -> FH+ changes atom 0 only). */
  lambdaSpecificAtom?: number | null;
  /** "counter": one atom gains the charge the other loses (CO -> BF). */
  lambdaDirection?: LambdaDirection | null;
};

const lambdaPolicyOf = (opts: DimerLambdaOptions): LambdaPolicy => {
  const specificAtom = opts.lambdaSpecificAtom ?? null;
  const direction = opts.lambdaDirection ?? null;
  if (specificAtom === null && direction === null) {
    throw new PredictionContractError(
      "dimer predictions need lambdaSpecificAtom or lambdaDirection to distribute the perturbation",
    );
  }
  return { specificAtom, direction };
};

const assertDimers = (rows: readonly QuantumChemistryRow[], target: string) => {
  if (rows.some((row) => row.atomicNumbers.length !== 2)) {
    throw new PredictionContractError(`${target} is not a dimer; use the atom predictors`, { target });
  }
};

const fitOptions = (
  opts: EquilibriumFitOptions,
  capabilities: AlchemyCapabilities,
): DimerFitOptions => ({
  nPoints: opts.nPoints,
  polyOrder: opts.polyOrder,
  removeOutliers: opts.removeOutliers,
  zscoreCutoff: opts.zscoreCutoff,
  fitter: capabilities.polyFitter,
});

/** Rows of the target's selected state at lambda = 0, or null when missing. */
function targetStateRows(
  rows: readonly QuantumChemistryRow[],
  excitationLevel: number,
  ignoreOneRow: boolean,
  capabilities: AlchemyCapabilities,
): QuantumChemistryRow[] | null {
  if (rows.length === 0) return null;
  const multiplicity = capabilities.stateSelector.getMultiplicity(rows, excitationLevel, ignoreOneRow);
  if (multiplicity === null) return null;
  return rows.filter((row) => row.multiplicity === multiplicity);
}

export type DimerChargeChangeOptions = ChargeChangeOptions & EquilibriumFitOptions;

/**
 * Energy to change the charge of a dimer from quantum chemistry: the ground
 * state bond curve of each charge is minimized and the equilibrium energies
 * are subtracted.
 */
export function energyChangeChargeQcDimer(
  tables: Pick<AlchemyTables, "qc">,
  opts: DimerChargeChangeOptions,
): PredictionOutcome {
  const changeSigns = opts.changeSigns ?? false;
  assertChargeChange(opts.deltaCharge, changeSigns);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().dimerBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const initialCharge = opts.targetInitialCharge ?? 0;

  const initialAll = queryQc(tables.qc, {
    system: opts.targetLabel,
    charge: initialCharge,
    lambdaValue: 0,
    basisSet,
  });
  assertDimers(initialAll, opts.targetLabel);
  const initialRows = targetStateRows(initialAll, 0, ignoreOneRow, capabilities);
  if (!initialRows) {
    return noData(`no ${basisSet} data for ${opts.targetLabel} at charge ${initialCharge}`);
  }
  const finalNElectrons = initialRows[0].nElectrons - opts.deltaCharge;
  const finalRows = targetStateRows(
    queryQc(tables.qc, {
      system: opts.targetLabel,
      lambdaValue: 0,
      nElectrons: finalNElectrons,
      basisSet,
    }),
    0,
    ignoreOneRow,
    capabilities,
  );
  if (!finalRows) {
    return noData(`no ${basisSet} data for ${opts.targetLabel} with ${finalNElectrons} electrons`);
  }

  const fit = fitOptions(opts, capabilities);
  const initial = dimerMinimum(qcDimerCurve(initialRows, 0), fit);
  const final = dimerMinimum(qcDimerCurve(finalRows, 0), fit);
  const diff = final.energy - initial.energy;
  return okOutcome(changeSigns ? -diff : diff);
}

type DimerReferenceInput = {
  qc: readonly QuantumChemistryRow[];
  reference: string;
  refInitial: QatsRow[];
  refFinal: QatsRow[];
  lambda: number;
  mode: PredictionMode;
  sign: 1 | -1;
  basisSet: string;
  fit: DimerFitOptions;
};

/** Equilibrium energy of the QC curve of a reference state perturbed by `lambda`. */
function alchemicalCurveMinimum(
  qc: readonly QuantumChemistryRow[],
  ref: QatsRow,
  lambda: number,
  basisSet: string,
  fit: DimerFitOptions,
): number | null {
  const rows = queryQc(qc, {
    system: ref.system,
    lambdaValue: lambda,
    charge: ref.charge,
    multiplicity: ref.multiplicity,
    basisSet,
  });
  if (rows.length === 0) return null;
  return dimerMinimum(qcDimerCurve(rows, lambda), fit).energy;
}

function predictDimerReference(input: DimerReferenceInput): ReferencePrediction | null {
  const { refInitial, refFinal, lambda, mode, sign, fit } = input;
  let taylor: number[] = [];
  if (mode === "qats" || mode === "qats-vs-qa") {
    // The bond-length grid is shared but the predicted energies change with
    // the order, so every order gets its own curve and minimum.
    const orders = refInitial[0].polyCoeffs.length;
    for (let order = 0; order < orders; order += 1) {
      const eInitial = dimerMinimum(qatsDimerCurve(refInitial, lambda, order), fit).energy;
      const eFinal = dimerMinimum(qatsDimerCurve(refFinal, lambda, order), fit).energy;
      taylor.push(sign * (eFinal - eInitial));
    }
    if (mode === "qats") {
      return { reference: input.reference, perturbation: lambda, mode, predictions: taylor };
    }
  }

  const eInitial = alchemicalCurveMinimum(input.qc, refInitial[0], lambda, input.basisSet, fit);
  const eFinal = alchemicalCurveMinimum(input.qc, refFinal[0], lambda, input.basisSet, fit);
  if (eInitial === null || eFinal === null) {
    log.debug("reference skipped; alchemical QC curve missing", {
      reference: input.reference,
      lambda,
    });
    return null;
  }
  const direct = sign * (eFinal - eInitial);
  if (mode === "qa") {
    return { reference: input.reference, perturbation: lambda, mode, predictions: [direct] };
  }
  taylor = taylor.map((value) => value - direct);
  return { reference: input.reference, perturbation: lambda, mode, predictions: taylor };
}

export type DimerChargeChangeAlchemyOptions = DimerChargeChangeOptions &
  AlchemyModeOptions &
  DimerLambdaOptions;

/**
 * Energy to change the charge of a dimer predicted from every QATS reference
 * with both electron counts. Every prediction minimizes its own bond curve.
 */
export function energyChangeChargeQaDimer(
  tables: AlchemyTables,
  opts: DimerChargeChangeAlchemyOptions,
): ReferencePrediction[] {
  const changeSigns = opts.changeSigns ?? false;
  assertChargeChange(opts.deltaCharge, changeSigns);
  const lambdaPolicy = lambdaPolicyOf(opts);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().dimerBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const initialCharge = opts.targetInitialCharge ?? 0;
  const mode = opts.mode ?? "qats";
  const sign = changeSigns ? -1 : 1;

  const initialAll = queryQc(tables.qc, {
    system: opts.targetLabel,
    charge: initialCharge,
    lambdaValue: 0,
    basisSet,
  });
  assertDimers(initialAll, opts.targetLabel);
  const targetRows = targetStateRows(initialAll, 0, ignoreOneRow, capabilities);
  if (!targetRows) {
    log.debug("no target data", { target: opts.targetLabel, charge: initialCharge, basisSet });
    return [];
  }
  const target = targetRows[0];
  const finalNElectrons = target.nElectrons - opts.deltaCharge;
  const finalTargetRows = targetStateRows(
    queryQc(tables.qc, { system: opts.targetLabel, lambdaValue: 0, nElectrons: finalNElectrons, basisSet }),
    0,
    ignoreOneRow,
    capabilities,
  );
  if (!finalTargetRows) {
    log.debug("no target data", { target: opts.targetLabel, nElectrons: finalNElectrons, basisSet });
    return [];
  }

  // References follow the target's ground-state spin at both endpoints.
  const pair = resolveReferencePair(tables, {
    targetLabel: opts.targetLabel,
    targetAtomicNumbers: target.atomicNumbers,
    basisSet,
    initialNElectrons: target.nElectrons,
    finalNElectrons,
    initialMultiplicity: target.multiplicity,
    finalMultiplicity: finalTargetRows[0].multiplicity,
    lambdaPolicy,
    ignoreOneRow,
    capabilities,
  });
  const calculator = capabilities.lambdaCalculator;
  const fit = fitOptions(opts, capabilities);

  const predictions: ReferencePrediction[] = [];
  for (const system of pair.systems) {
    const refInitial = pair.initial.get(system) ?? [];
    const refFinal = pair.final.get(system) ?? [];
    if (refInitial.length === 0 || refFinal.length === 0) continue;

    const lambdaInitial = calculator.getLambdaValue(refInitial[0].atomicNumbers, target.atomicNumbers, lambdaPolicy);
    const lambdaFinal = calculator.getLambdaValue(refFinal[0].atomicNumbers, target.atomicNumbers, lambdaPolicy);
    if (lambdaInitial !== lambdaFinal) {
      throw new ReferenceConsistencyError(
        `reference ${system} reaches ${opts.targetLabel} with lambda ${lambdaInitial} initially but ${lambdaFinal} finally`,
        { reference: system, target: opts.targetLabel, lambdaInitial, lambdaFinal },
      );
    }
    if (!isLambdaConsidered(lambdaInitial, opts.consideredLambdas)) continue;

    const prediction = predictDimerReference({
      qc: tables.qc,
      reference: system,
      refInitial,
      refFinal,
      lambda: lambdaInitial,
      mode,
      sign,
      basisSet,
      fit,
    });
    if (prediction) predictions.push(prediction);
  }
  return predictions;
}

export type BondingCurveMethod = "qc" | "qa" | "qats";

export type BondingCurveOptions = CommonPredictionOptions &
  DimerLambdaOptions & {
    targetLabel: string;
    targetCharge?: number;
    excitationLevel?: number;
    /** "qc": the target itself; "qa": QC curves of references at their lambda; "qats": Taylor curves per order. */
    method?: BondingCurveMethod;
    consideredLambdas?: readonly number[] | null;
  };

export type BondingCurveSet = {
  /** The target label for "qc", otherwise the reference label. */
  reference: string;
  perturbation: number;
  /** One curve for "qc" and "qa"; one per Taylor order for "qats". */
  curves: DimerCurve[];
};

/** Bond curves of a dimer state from quantum chemistry or from every alchemical reference. */
export function dimerBondingCurves(
  tables: AlchemyTables,
  opts: BondingCurveOptions,
): BondingCurveSet[] {
  const method = opts.method ?? "qc";
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().dimerBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const charge = opts.targetCharge ?? 0;
  const excitationLevel = opts.excitationLevel ?? 0;

  const targetAll = queryQc(tables.qc, { system: opts.targetLabel, charge, lambdaValue: 0, basisSet });
  assertDimers(targetAll, opts.targetLabel);
  const targetRows = targetStateRows(targetAll, excitationLevel, ignoreOneRow, capabilities);
  if (!targetRows) {
    log.debug("no target data", { target: opts.targetLabel, charge, basisSet });
    return [];
  }
  if (method === "qc") {
    return [{ reference: opts.targetLabel, perturbation: 0, curves: [qcDimerCurve(targetRows, 0)] }];
  }

  const lambdaPolicy = lambdaPolicyOf(opts);
  const target = targetRows[0];
  const refOptions = {
    targetLabel: opts.targetLabel,
    targetNElectrons: target.nElectrons,
    targetAtomicNumbers: target.atomicNumbers,
    basisSet,
    lambdaPolicy,
    excitationLevel,
    ignoreOneRow,
    capabilities,
  };
  const lambdaFor = (atomicNumbers: readonly number[]) =>
    capabilities.lambdaCalculator.getLambdaValue(atomicNumbers, target.atomicNumbers, lambdaPolicy);

  const sets: BondingCurveSet[] = [];
  if (method === "qats") {
    const refs = groupBySystem(getQaRefs(tables, refOptions));
    for (const system of Array.from(refs.keys()).sort()) {
      const rows = refs.get(system) ?? [];
      const lambda = lambdaFor(rows[0].atomicNumbers);
      if (!isLambdaConsidered(lambda, opts.consideredLambdas)) continue;
      const curves: DimerCurve[] = [];
      for (let order = 0; order < rows[0].polyCoeffs.length; order += 1) {
        curves.push(qatsDimerCurve(rows, lambda, order));
      }
      sets.push({ reference: system, perturbation: lambda, curves });
    }
    return sets;
  }

  const refs = groupBySystem(getQaRefs(tables, { ...refOptions, source: "qc" }));
  for (const system of Array.from(refs.keys()).sort()) {
    const rows = refs.get(system) ?? [];
    const lambda = lambdaFor(rows[0].atomicNumbers);
    if (!isLambdaConsidered(lambda, opts.consideredLambdas)) continue;
    const atLambda = rows.filter((row) => row.lambdaValue === lambda);
    if (atLambda.length === 0) {
      log.debug("reference skipped; no QC curve at its lambda", { reference: system, lambda });
      continue;
    }
    sets.push({ reference: system, perturbation: lambda, curves: [qcDimerCurve(atLambda, lambda)] });
  }
  return sets;
}

export type DimerEquilibriumSet = {
  reference: string;
  perturbation: number;
  /** Å, one per curve (Taylor order for "qats"). */
  bondLengths: number[];
  /** Hartree, one per curve. */
  energies: number[];
};

export type DimerEquilibriumOptions = BondingCurveOptions & EquilibriumFitOptions;

/** Equilibrium bond lengths and energies for every curve from `dimerBondingCurves`. */
export function dimerEquilibrium(
  tables: AlchemyTables,
  opts: DimerEquilibriumOptions,
): DimerEquilibriumSet[] {
  const capabilities = resolveCapabilities(opts.capabilities);
  const fit = fitOptions(opts, capabilities);
  return dimerBondingCurves(tables, { ...opts, capabilities }).map((set) => {
    const minima = set.curves.map((curve) => dimerMinimum(curve, fit));
    return {
      reference: set.reference,
      perturbation: set.perturbation,
      bondLengths: minima.map((minimum) => minimum.bondLength),
      energies: minima.map((minimum) => minimum.energy),
    };
  });
}
