import { describe, expect, it } from "vitest";
import { PredictionContractError, ReferenceConsistencyError } from "../modules/core/alchemy-errors";
import {
  dimerBondingCurves,
  dimerEquilibrium,
  energyChangeChargeQaDimer,
  energyChangeChargeQcDimer,
} from "../modules/alchemy/dimer-predictions";
import { predictionsByReference, toNumber } from "../modules/alchemy/prediction-types";
import {
  BOND_GRID,
  buildAtomTables,
  buildDimerTables,
  harmonic,
  qatsCurveRows,
} from "./helpers/alchemy-tables";

const expectClose = (actual: number[] | undefined, expected: number[], digits = 6) => {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, idx) => expect(actual?.[idx]).toBeCloseTo(value, digits));
};

describe("quantum chemistry dimer predictions", () => {
  const tables = buildDimerTables();

  it("subtracts equilibrium energies of the two charge states", () => {
    const outcome = energyChangeChargeQcDimer(tables, { targetLabel: "c.o", deltaCharge: 1 });
    expect(outcome.status).toBe("ok");
    expect(toNumber(outcome)).toBeCloseTo(0.5, 6);
  });

  it("reports missing charge states as no data", () => {
    expect(energyChangeChargeQcDimer(tables, { targetLabel: "c.o", deltaCharge: 2 }).status).toBe("no-data");
    expect(energyChangeChargeQcDimer(tables, { targetLabel: "n.o", deltaCharge: 1 }).status).toBe("no-data");
  });

  it("refuses atom targets", () => {
    expect(() =>
      energyChangeChargeQcDimer(buildAtomTables(), { targetLabel: "c", deltaCharge: 1, basisSet: "aug-cc-pV5Z" }),
    ).toThrow(PredictionContractError);
  });
});

describe("alchemical dimer predictions", () => {
  const tables = buildDimerTables();
  const base = { targetLabel: "c.o", deltaCharge: 1, lambdaDirection: "counter" as const };

  it("minimizes a Taylor curve per order and reference", () => {
    const predictions = energyChangeChargeQaDimer(tables, base);
    expect(predictions.map((entry) => [entry.reference, entry.perturbation])).toEqual([
      ["b.f", -1],
      ["n.n", 1],
    ]);
    const byRef = predictionsByReference(predictions);
    expectClose(byRef["b.f"], [0.6, 1.1, 1.2]);
    expectClose(byRef["n.n"], [0.5, 0.9, 1.0]);
  });

  it("uses computed alchemical curves in qa mode", () => {
    const predictions = energyChangeChargeQaDimer(tables, { ...base, mode: "qa" });
    expect(predictions.map((entry) => entry.reference)).toEqual(["n.n"]);
    expectClose(predictions[0]?.predictions, [0.55]);
  });

  it("reports Taylor errors against the alchemical curves", () => {
    const byRef = predictionsByReference(energyChangeChargeQaDimer(tables, { ...base, mode: "qats-vs-qa" }));
    expect(Object.keys(byRef)).toEqual(["n.n"]);
    expectClose(byRef["n.n"], [-0.05, 0.35, 0.45]);
  });

  it("filters references by lambda", () => {
    const predictions = energyChangeChargeQaDimer(tables, { ...base, consideredLambdas: [-1] });
    expect(predictions.map((entry) => entry.reference)).toEqual(["b.f"]);
  });

  it("follows the target's ground-state multiplicity for references", () => {
    const lowTriplet = qatsCurveRows({
      system: "b.f",
      atomicNumbers: [5, 9],
      charge: 0,
      multiplicity: 3,
      zeroth: harmonic(-125.0, 0.6, 1.2),
      higher: [8.0, -0.3],
    });
    const withTriplet = { qc: tables.qc, qats: [...tables.qats, ...lowTriplet] };
    const byRef = predictionsByReference(energyChangeChargeQaDimer(withTriplet, base));
    expectClose(byRef["b.f"], [0.6, 1.1, 1.2]);

    const tripletOnly = {
      qc: tables.qc,
      qats: [
        ...tables.qats.filter((row) => !(row.system === "b.f" && row.charge === 0)),
        ...lowTriplet,
      ],
    };
    const predictions = energyChangeChargeQaDimer(tripletOnly, base);
    expect(predictions.map((entry) => entry.reference)).toEqual(["n.n"]);
  });

  it("fails when a reference reaches the target with two lambdas", () => {
    const inconsistent = {
      qc: tables.qc,
      qats: [
        ...tables.qats,
        ...qatsCurveRows({
          system: "x",
          atomicNumbers: [7, 7],
          charge: 0,
          multiplicity: 1,
          zeroth: harmonic(-109.0, 0.5, 1.1),
          higher: [-15.0],
        }),
        ...qatsCurveRows({
          system: "x",
          atomicNumbers: [5, 9],
          charge: 1,
          multiplicity: 2,
          zeroth: harmonic(-123.4, 0.6, 1.2),
          higher: [7.5],
        }),
      ],
    };
    expect(() => energyChangeChargeQaDimer(inconsistent, base)).toThrow(ReferenceConsistencyError);
  });

  it("needs a way to distribute the perturbation", () => {
    expect(() => energyChangeChargeQaDimer(tables, { targetLabel: "c.o", deltaCharge: 1 })).toThrow(
      PredictionContractError,
    );
  });

  it("returns nothing for a missing target", () => {
    expect(energyChangeChargeQaDimer(tables, { ...base, targetLabel: "n.o" })).toEqual([]);
  });
});

describe("dimer bonding curves and equilibria", () => {
  const tables = buildDimerTables();

  it("returns the target's own curve for quantum chemistry", () => {
    const [set] = dimerBondingCurves(tables, { targetLabel: "c.o" });
    expect(set?.reference).toBe("c.o");
    expect(set?.perturbation).toBe(0);
    expect(set?.curves).toHaveLength(1);
    expect(set?.curves[0]?.bondLengths).toEqual(BOND_GRID);
    expect(set?.curves[0]?.energies[3]).toBeCloseTo(-113.0, 12);
  });

  it("returns reference curves at their lambda for qa", () => {
    const sets = dimerBondingCurves(tables, { targetLabel: "c.o", method: "qa", lambdaDirection: "counter" });
    expect(sets.map((set) => [set.reference, set.perturbation])).toEqual([["n.n", 1]]);
    expect(sets[0]?.curves[0]?.energies[3]).toBeCloseTo(-113.1, 12);
    expect(() => dimerBondingCurves(tables, { targetLabel: "c.o", method: "qa" })).toThrow(
      PredictionContractError,
    );
  });

  it("finds the quantum chemistry equilibrium", () => {
    const [ground] = dimerEquilibrium(tables, { targetLabel: "c.o" });
    expectClose(ground?.bondLengths, [1.1]);
    expectClose(ground?.energies, [-113.0]);
    const [excited] = dimerEquilibrium(tables, { targetLabel: "c.o", excitationLevel: 1 });
    expectClose(excited?.bondLengths, [1.2]);
    expectClose(excited?.energies, [-112.7]);
  });

  it("finds one equilibrium per Taylor order", () => {
    const sets = dimerEquilibrium(tables, { targetLabel: "c.o", method: "qats", lambdaDirection: "counter" });
    expect(sets.map((set) => set.reference)).toEqual(["b.f", "n.n"]);
    expectClose(sets[0]?.bondLengths, [1.2, 1.2, 1.2]);
    expectClose(sets[0]?.energies, [-124.0, -132.0, -132.3]);
    expectClose(sets[1]?.bondLengths, [1.1, 1.1, 1.1]);
    expectClose(sets[1]?.energies, [-109.0, -124.0, -124.6]);
  });
});
