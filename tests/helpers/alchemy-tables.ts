import type {
  AlchemyTables,
  QatsRow,
  QuantumChemistryRow,
} from "../../shared/alchemy-schema";

export const ATOM_BASIS = "aug-cc-pV5Z";
export const DIMER_BASIS = "cc-pV5Z";

type RowSeed = {
  system: string;
  atomicNumbers: number[];
  charge: number;
  multiplicity: number;
  basisSet?: string;
  bondLength?: number;
};

const nElectronsOf = (seed: RowSeed) =>
  seed.atomicNumbers.reduce((sum, z) => sum + z, 0) - seed.charge;

export const qcRow = (
  seed: RowSeed & { lambdaValue?: number; electronicEnergy: number },
): QuantumChemistryRow => ({
  system: seed.system,
  atomicNumbers: seed.atomicNumbers,
  charge: seed.charge,
  multiplicity: seed.multiplicity,
  nElectrons: nElectronsOf(seed),
  basisSet: seed.basisSet ?? (seed.atomicNumbers.length === 2 ? DIMER_BASIS : ATOM_BASIS),
  lambdaValue: seed.lambdaValue ?? 0,
  bondLength: seed.bondLength,
  electronicEnergy: seed.electronicEnergy,
});

export const qatsRow = (seed: RowSeed & { polyCoeffs: number[] }): QatsRow => ({
  system: seed.system,
  atomicNumbers: seed.atomicNumbers,
  charge: seed.charge,
  multiplicity: seed.multiplicity,
  nElectrons: nElectronsOf(seed),
  basisSet: seed.basisSet ?? (seed.atomicNumbers.length === 2 ? DIMER_BASIS : ATOM_BASIS),
  bondLength: seed.bondLength,
  polyCoeffs: seed.polyCoeffs,
});

/**
 * Carbon target with boron (lambda +1) and nitrogen (lambda -1) references.
 * Energies are made up; only their differences matter.
 */
export const buildAtomTables = (): AlchemyTables => ({
  qc: [
    qcRow({ system: "c", atomicNumbers: [6], charge: 0, multiplicity: 3, electronicEnergy: -37.8 }),
    qcRow({ system: "c", atomicNumbers: [6], charge: 0, multiplicity: 1, electronicEnergy: -37.75 }),
    qcRow({ system: "c", atomicNumbers: [6], charge: 1, multiplicity: 2, electronicEnergy: -37.4 }),
    qcRow({ system: "c", atomicNumbers: [6], charge: -1, multiplicity: 4, electronicEnergy: -37.85 }),
    // Alchemical points: boron perturbed to carbon.
    qcRow({ system: "b", atomicNumbers: [5], charge: -1, multiplicity: 3, lambdaValue: 0, electronicEnergy: -24.5 }),
    qcRow({ system: "b", atomicNumbers: [5], charge: -1, multiplicity: 3, lambdaValue: 1, electronicEnergy: -37.7 }),
    qcRow({ system: "b", atomicNumbers: [5], charge: 0, multiplicity: 2, lambdaValue: 0, electronicEnergy: -24.6 }),
    qcRow({ system: "b", atomicNumbers: [5], charge: 0, multiplicity: 2, lambdaValue: 1, electronicEnergy: -37.35 }),
    // Nitrogen perturbed to carbon.
    qcRow({ system: "n", atomicNumbers: [7], charge: 1, multiplicity: 3, lambdaValue: -1, electronicEnergy: -37.72 }),
    qcRow({ system: "n", atomicNumbers: [7], charge: 2, multiplicity: 2, lambdaValue: -1, electronicEnergy: -37.36 }),
  ],
  qats: [
    qatsRow({ system: "c", atomicNumbers: [6], charge: 0, multiplicity: 3, polyCoeffs: [-37.8, -14.0, -0.9] }),
    qatsRow({ system: "c", atomicNumbers: [6], charge: 1, multiplicity: 2, polyCoeffs: [-37.4, -13.5, -0.8] }),
    qatsRow({ system: "b", atomicNumbers: [5], charge: -1, multiplicity: 3, polyCoeffs: [-24.5, -12.0, -1.0] }),
    qatsRow({ system: "b", atomicNumbers: [5], charge: -1, multiplicity: 1, polyCoeffs: [-24.45, -12.5, -0.8] }),
    qatsRow({ system: "b", atomicNumbers: [5], charge: 0, multiplicity: 2, polyCoeffs: [-24.6, -11.0, -1.5] }),
    qatsRow({ system: "n", atomicNumbers: [7], charge: 1, multiplicity: 3, polyCoeffs: [-53.9, 14.0, -0.5] }),
    qatsRow({ system: "n", atomicNumbers: [7], charge: 2, multiplicity: 2, polyCoeffs: [-53.3, 13.0, -0.4] }),
  ],
});

export const BOND_GRID = [0.8, 0.9, 1.0, 1.1, 1.2, 1.3, 1.4];

export const harmonic = (depth: number, k: number, re: number) => (b: number) => depth + k * (b - re) ** 2;

type DimerSeed = RowSeed & { energy: (bondLength: number) => number; lambdaValue?: number };

const qcCurveRows = (seed: DimerSeed): QuantumChemistryRow[] =>
  BOND_GRID.map((bondLength) =>
    qcRow({ ...seed, bondLength, electronicEnergy: seed.energy(bondLength) }),
  );

type QatsCurveSeed = RowSeed & { zeroth: (bondLength: number) => number; higher: number[] };

export const qatsCurveRows = (seed: QatsCurveSeed): QatsRow[] =>
  BOND_GRID.map((bondLength) =>
    qatsRow({ ...seed, bondLength, polyCoeffs: [seed.zeroth(bondLength), ...seed.higher] }),
  );

/**
 * Carbon monoxide target. Under a counter perturbation N2 reaches CO with
 * lambda +1 and BF with lambda -1. Only N2 has computed alchemical curves.
 */
export const buildDimerTables = (): AlchemyTables => ({
  qc: [
    ...qcCurveRows({ system: "c.o", atomicNumbers: [6, 8], charge: 0, multiplicity: 1, energy: harmonic(-113.0, 0.8, 1.1) }),
    ...qcCurveRows({ system: "c.o", atomicNumbers: [6, 8], charge: 0, multiplicity: 3, energy: harmonic(-112.7, 0.8, 1.2) }),
    ...qcCurveRows({ system: "c.o", atomicNumbers: [6, 8], charge: 1, multiplicity: 2, energy: harmonic(-112.5, 0.7, 1.1) }),
    ...qcCurveRows({ system: "n.n", atomicNumbers: [7, 7], charge: 0, multiplicity: 1, energy: harmonic(-109.0, 0.5, 1.1) }),
    ...qcCurveRows({ system: "n.n", atomicNumbers: [7, 7], charge: 0, multiplicity: 1, lambdaValue: 1, energy: harmonic(-113.1, 0.5, 1.1) }),
    ...qcCurveRows({ system: "n.n", atomicNumbers: [7, 7], charge: 1, multiplicity: 2, lambdaValue: 1, energy: harmonic(-112.55, 0.5, 1.1) }),
  ],
  qats: [
    ...qatsCurveRows({ system: "n.n", atomicNumbers: [7, 7], charge: 0, multiplicity: 1, zeroth: harmonic(-109.0, 0.5, 1.1), higher: [-15.0, -0.6] }),
    ...qatsCurveRows({ system: "n.n", atomicNumbers: [7, 7], charge: 1, multiplicity: 2, zeroth: harmonic(-108.5, 0.5, 1.1), higher: [-14.6, -0.5] }),
    ...qatsCurveRows({ system: "b.f", atomicNumbers: [5, 9], charge: 0, multiplicity: 1, zeroth: harmonic(-124.0, 0.6, 1.2), higher: [8.0, -0.3] }),
    ...qatsCurveRows({ system: "b.f", atomicNumbers: [5, 9], charge: 1, multiplicity: 2, zeroth: harmonic(-123.4, 0.6, 1.2), higher: [7.5, -0.2] }),
  ],
});
