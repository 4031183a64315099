import type {
  AlchemyTables,
  PredictionMode,
  QatsRow,
  QuantumChemistryRow,
} from "../../shared/alchemy-schema";
import { readAlchemyConfig } from "../core/alchemy-config";
import {
  PredictionContractError,
  ReferenceConsistencyError,
} from "../core/alchemy-errors";
import { createAlchemyLogger } from "../core/alchemy-log";
import { resolveCapabilities, type AlchemyCapabilities } from "./capabilities";
import {
  assertChargeChange,
  exactlyOne,
  isLambdaConsidered,
  noData,
  okOutcome,
  type AlchemyModeOptions,
  type ChargeChangeOptions,
  type CommonPredictionOptions,
  type PredictionOutcome,
  type ReferencePrediction,
} from "./prediction-types";
import { resolveReferencePair } from "./reference-resolver";
import { queryQc } from "./rows";
import { qatsPrediction } from "./taylor-series";

const log = createAlchemyLogger("atom");

const assertAtoms = (rows: readonly QuantumChemistryRow[], target: string) => {
  if (rows.some((row) => row.atomicNumbers.length !== 1)) {
    throw new PredictionContractError(`${target} is not an atom; use the dimer predictors`, { target });
  }
};

/** Ground (or excited) lambda = 0 row of the target, or null when the data is missing. */
function selectTargetRow(
  rows: readonly QuantumChemistryRow[],
  excitationLevel: number,
  ignoreOneRow: boolean,
  capabilities: AlchemyCapabilities,
  what: string,
): QuantumChemistryRow | null {
  if (rows.length === 0) return null;
  const selected = capabilities.stateSelector.selectState(rows, excitationLevel, ignoreOneRow);
  if (selected.length === 0) return null;
  return exactlyOne(selected, what);
}

/**
 * Energy to change the charge of an atom from direct quantum chemistry
 * (lambda = 0 rows only). The final state is located by electron count.
 */
export function energyChangeChargeQcAtom(
  tables: Pick<AlchemyTables, "qc">,
  opts: ChargeChangeOptions,
): PredictionOutcome {
  const changeSigns = opts.changeSigns ?? false;
  assertChargeChange(opts.deltaCharge, changeSigns);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().atomBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const initialCharge = opts.targetInitialCharge ?? 0;

  const initialRows = queryQc(tables.qc, {
    system: opts.targetLabel,
    charge: initialCharge,
    lambdaValue: 0,
    basisSet,
  });
  assertAtoms(initialRows, opts.targetLabel);
  const initial = selectTargetRow(initialRows, 0, ignoreOneRow, capabilities, `${opts.targetLabel} initial state`);
  if (!initial) {
    return noData(`no ${basisSet} data for ${opts.targetLabel} at charge ${initialCharge}`);
  }

  const finalNElectrons = initial.nElectrons - opts.deltaCharge;
  const finalRows = queryQc(tables.qc, {
    system: opts.targetLabel,
    lambdaValue: 0,
    nElectrons: finalNElectrons,
    basisSet,
  });
  const final = selectTargetRow(finalRows, 0, ignoreOneRow, capabilities, `${opts.targetLabel} final state`);
  if (!final) {
    return noData(`no ${basisSet} data for ${opts.targetLabel} with ${finalNElectrons} electrons`);
  }

  const diff = final.electronicEnergy - initial.electronicEnergy;
  return okOutcome(changeSigns ? -diff : diff);
}

type AtomReferenceInput = {
  qc: readonly QuantumChemistryRow[];
  reference: string;
  refInitial: QatsRow;
  refFinal: QatsRow;
  lambda: number;
  mode: PredictionMode;
  sign: 1 | -1;
  basisSet: string;
};

/** QC energy of a reference perturbed by `lambda`, or null when that point was not computed. */
function alchemicalPointEnergy(
  qc: readonly QuantumChemistryRow[],
  ref: QatsRow,
  lambda: number,
  basisSet: string,
): number | null {
  const rows = queryQc(qc, {
    system: ref.system,
    lambdaValue: lambda,
    charge: ref.charge,
    multiplicity: ref.multiplicity,
    basisSet,
  });
  if (rows.length === 0) return null;
  if (rows.length > 1) {
    throw new ReferenceConsistencyError(
      `${rows.length} QC rows for ${ref.system} (charge ${ref.charge}, multiplicity ${ref.multiplicity}) at lambda ${lambda}`,
      { reference: ref.system, lambda },
    );
  }
  return rows[0].electronicEnergy;
}

function predictAtomReference(input: AtomReferenceInput): ReferencePrediction | null {
  const { refInitial, refFinal, lambda, mode, sign } = input;
  let taylor: number[] = [];
  if (mode === "qats" || mode === "qats-vs-qa") {
    for (let order = 0; order < refInitial.polyCoeffs.length; order += 1) {
      const eInitial = qatsPrediction(refInitial.polyCoeffs, order, lambda)[0];
      const eFinal = qatsPrediction(refFinal.polyCoeffs, order, lambda)[0];
      taylor.push(sign * (eFinal - eInitial));
    }
    if (mode === "qats") {
      return { reference: input.reference, perturbation: lambda, mode, predictions: taylor };
    }
  }

  const eInitial = alchemicalPointEnergy(input.qc, refInitial, lambda, input.basisSet);
  const eFinal = alchemicalPointEnergy(input.qc, refFinal, lambda, input.basisSet);
  if (eInitial === null || eFinal === null) {
    log.debug("reference skipped; alchemical QC point missing", {
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

type AtomAlchemyInput = {
  tables: AlchemyTables;
  targetLabel: string;
  targetAtomicNumbers: readonly number[];
  initialNElectrons: number;
  finalNElectrons: number;
  finalExcitation: number;
  sign: 1 | -1;
  basisSet: string;
  ignoreOneRow: boolean;
  capabilities: AlchemyCapabilities;
  mode: PredictionMode;
  consideredLambdas: readonly number[] | null | undefined;
};

function predictFromAtomReferences(input: AtomAlchemyInput): ReferencePrediction[] {
  const pair = resolveReferencePair(input.tables, {
    targetLabel: input.targetLabel,
    targetAtomicNumbers: input.targetAtomicNumbers,
    basisSet: input.basisSet,
    initialNElectrons: input.initialNElectrons,
    finalNElectrons: input.finalNElectrons,
    initialExcitation: 0,
    finalExcitation: input.finalExcitation,
    ignoreOneRow: input.ignoreOneRow,
    capabilities: input.capabilities,
  });
  const calculator = input.capabilities.lambdaCalculator;

  const predictions: ReferencePrediction[] = [];
  for (const system of pair.systems) {
    const refInitial = exactlyOne(pair.initial.get(system) ?? [], `reference ${system} initial state`);
    const refFinal = exactlyOne(pair.final.get(system) ?? [], `reference ${system} final state`);

    const lambdaInitial = calculator.getLambdaValue(refInitial.atomicNumbers, input.targetAtomicNumbers);
    const lambdaFinal = calculator.getLambdaValue(refFinal.atomicNumbers, input.targetAtomicNumbers);
    if (lambdaInitial !== lambdaFinal) {
      throw new ReferenceConsistencyError(
        `reference ${system} reaches ${input.targetLabel} with lambda ${lambdaInitial} initially but ${lambdaFinal} finally`,
        { reference: system, target: input.targetLabel, lambdaInitial, lambdaFinal },
      );
    }
    if (!isLambdaConsidered(lambdaInitial, input.consideredLambdas)) continue;

    const prediction = predictAtomReference({
      qc: input.tables.qc,
      reference: system,
      refInitial,
      refFinal,
      lambda: lambdaInitial,
      mode: input.mode,
      sign: input.sign,
      basisSet: input.basisSet,
    });
    if (prediction) predictions.push(prediction);
  }
  return predictions;
}

export type ChargeChangeAlchemyOptions = ChargeChangeOptions & AlchemyModeOptions;

/**
 * Energy to change the charge of a target atom, predicted from every QATS
 * reference that has both the target's initial and final electron counts.
 * Empty when the target itself is missing from the data.
 */
export function energyChangeChargeQaAtom(
  tables: AlchemyTables,
  opts: ChargeChangeAlchemyOptions,
): ReferencePrediction[] {
  const changeSigns = opts.changeSigns ?? false;
  assertChargeChange(opts.deltaCharge, changeSigns);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().atomBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const initialCharge = opts.targetInitialCharge ?? 0;

  const initialRows = queryQc(tables.qc, {
    system: opts.targetLabel,
    charge: initialCharge,
    lambdaValue: 0,
    basisSet,
  });
  assertAtoms(initialRows, opts.targetLabel);
  const initial = selectTargetRow(initialRows, 0, ignoreOneRow, capabilities, `${opts.targetLabel} initial state`);
  if (!initial) {
    log.debug("no target data", { target: opts.targetLabel, charge: initialCharge, basisSet });
    return [];
  }

  return predictFromAtomReferences({
    tables,
    targetLabel: opts.targetLabel,
    targetAtomicNumbers: initial.atomicNumbers,
    initialNElectrons: initial.nElectrons,
    finalNElectrons: initial.nElectrons - opts.deltaCharge,
    finalExcitation: 0,
    sign: changeSigns ? -1 : 1,
    basisSet,
    ignoreOneRow,
    capabilities,
    mode: opts.mode ?? "qats",
    consideredLambdas: opts.consideredLambdas,
  });
}

export type MultiplicityGapOptions = CommonPredictionOptions & {
  targetLabel: string;
  targetCharge?: number;
  /** Excited state compared against the ground state. Defaults to the first. */
  excitationLevel?: number;
};

const assertExcitedLevel = (level: number) => {
  if (!Number.isInteger(level) || level < 1) {
    throw new PredictionContractError(`multiplicity gaps need an excitation level >= 1, got ${level}`);
  }
};

/** Energy between the ground and an excited multiplicity of an atom from quantum chemistry. */
export function multGapQcAtom(
  tables: Pick<AlchemyTables, "qc">,
  opts: MultiplicityGapOptions,
): PredictionOutcome {
  const excitationLevel = opts.excitationLevel ?? 1;
  assertExcitedLevel(excitationLevel);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().atomBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const charge = opts.targetCharge ?? 0;

  const rows = queryQc(tables.qc, { system: opts.targetLabel, charge, lambdaValue: 0, basisSet });
  assertAtoms(rows, opts.targetLabel);
  if (rows.length < 2) {
    return noData(`${opts.targetLabel} at charge ${charge} has ${rows.length} computed state(s)`);
  }
  const ground = selectTargetRow(rows, 0, ignoreOneRow, capabilities, `${opts.targetLabel} ground state`);
  const excited = selectTargetRow(rows, excitationLevel, ignoreOneRow, capabilities, `${opts.targetLabel} excited state`);
  if (!ground || !excited) {
    return noData(`${opts.targetLabel} at charge ${charge} has no excitation level ${excitationLevel}`);
  }
  return okOutcome(excited.electronicEnergy - ground.electronicEnergy);
}

export type MultiplicityGapAlchemyOptions = MultiplicityGapOptions & AlchemyModeOptions;

/** Multiplicity gap of an atom predicted from every reference with the same electron count. */
export function multGapQaAtom(
  tables: AlchemyTables,
  opts: MultiplicityGapAlchemyOptions,
): ReferencePrediction[] {
  const excitationLevel = opts.excitationLevel ?? 1;
  assertExcitedLevel(excitationLevel);
  const capabilities = resolveCapabilities(opts.capabilities);
  const basisSet = opts.basisSet ?? readAlchemyConfig().atomBasisSet;
  const ignoreOneRow = opts.ignoreOneRow ?? true;
  const charge = opts.targetCharge ?? 0;

  const rows = queryQc(tables.qc, { system: opts.targetLabel, charge, lambdaValue: 0, basisSet });
  assertAtoms(rows, opts.targetLabel);
  if (rows.length < 2) {
    log.debug("target has fewer than two states", { target: opts.targetLabel, charge, basisSet });
    return [];
  }
  const electronCounts = new Set(rows.map((row) => row.nElectrons));
  if (electronCounts.size !== 1) {
    throw new ReferenceConsistencyError(
      `${opts.targetLabel} at charge ${charge} has rows with different electron counts`,
      { target: opts.targetLabel, electronCounts: Array.from(electronCounts) },
    );
  }
  const ground = selectTargetRow(rows, 0, ignoreOneRow, capabilities, `${opts.targetLabel} ground state`);
  if (!ground) return [];

  return predictFromAtomReferences({
    tables,
    targetLabel: opts.targetLabel,
    targetAtomicNumbers: ground.atomicNumbers,
    initialNElectrons: ground.nElectrons,
    finalNElectrons: ground.nElectrons,
    finalExcitation: excitationLevel,
    sign: 1,
    basisSet,
    ignoreOneRow,
    capabilities,
    mode: opts.mode ?? "qats",
    consideredLambdas: opts.consideredLambdas,
  });
}
